import { ConfigManager } from '../utils/config.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { DatabaseService } from '../services/database.js';
import { SessionLedger } from '../services/ledger.js';
import { QueryService } from '../services/query.js';
import { ExportService } from '../services/export.js';
import { TokenEstimator } from '../services/token-estimator.js';
import { CostEstimator } from '../services/cost-estimator.js';
import type { NotesConfig } from '../types/config.js';

export interface LedgerContext {
  config: NotesConfig;
  logger: Logger;
  db: DatabaseService;
  ledger: SessionLedger;
  query: QueryService;
  exporter: ExportService;
}

/**
 * Open the configured ledger database for the duration of `fn` and always close it.
 */
export async function withLedger<T>(
  configPath: string | undefined,
  fn: (context: LedgerContext) => Promise<T>
): Promise<T> {
  const config = await new ConfigManager(configPath).loadOrDefault();
  const logger = createLogger({ level: config.logging.level });

  const db = new DatabaseService(config.database.path, { logger });
  await db.initialize();

  try {
    const query = new QueryService(db);
    const ledger = new SessionLedger(db, {
      logger,
      tokenEstimator: new TokenEstimator({ logger }),
      costEstimator: new CostEstimator({ pricing: config.pricing }),
    });
    const exporter = new ExportService(query, { directory: config.export.directory });

    return await fn({ config, logger, db, ledger, query, exporter });
  } finally {
    db.close();
  }
}
