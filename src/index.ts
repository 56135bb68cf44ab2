export { DatabaseService, IN_MEMORY } from './services/database.js';
export type { SessionOutcome, SessionQuery, SessionAggregates } from './services/database.js';
export { SessionLedger, CONTENT_PREVIEW_LENGTH } from './services/ledger.js';
export { QueryService, DEFAULT_HISTORY_LIMIT } from './services/query.js';
export { ExportService, parseExportFormat, toCsv, EXPORT_LIMIT } from './services/export.js';
export type { ExportFormat } from './services/export.js';
export { TokenEstimator, resolveModelEncoding } from './services/token-estimator.js';
export { CostEstimator, DEFAULT_PRICING } from './services/cost-estimator.js';
export { DocumentReader } from './services/document.js';
export { NotesPipeline } from './services/notes-pipeline.js';
export { OpenAIProvider } from './providers/openai.js';
export { ConfigManager } from './utils/config.js';
export { createLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export * from './utils/errors.js';
export type * from './types/session.js';
export type { NotesConfig, ModelPrice } from './types/config.js';
export type { AIProvider, NotesGenerationOptions, NotesResponse } from './types/provider.js';
