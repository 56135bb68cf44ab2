import { DatabaseService } from './database.js';
import { TokenEstimator } from './token-estimator.js';
import { CostEstimator } from './cost-estimator.js';
import { DatabaseError, ValidationError } from '../utils/errors.js';
import { characterCount, generateSessionId, hashContent, previewText } from '../utils/hashing.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import {
  StartSessionInputSchema,
  CompleteSessionInputSchema,
} from '../types/session.js';
import type { FileInput, CompleteSessionInput, Session, ProcessedFile } from '../types/session.js';

export const CONTENT_PREVIEW_LENGTH = 500;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SessionLedgerOptions {
  tokenEstimator?: TokenEstimator;
  costEstimator?: CostEstimator;
  logger?: Logger;
  clock?: () => Date;
  generateId?: (now: Date) => string;
}

/**
 * Write side of the run ledger: every session, file and note row is created,
 * completed or purged through here.
 */
export class SessionLedger {
  private db: DatabaseService;
  private tokenEstimator: TokenEstimator;
  private costEstimator: CostEstimator;
  private logger: Logger;
  private clock: () => Date;
  private generateId: (now: Date) => string;

  constructor(db: DatabaseService, options: SessionLedgerOptions = {}) {
    this.db = db;
    this.logger = options.logger ?? defaultLogger;
    this.tokenEstimator = options.tokenEstimator ?? new TokenEstimator({ logger: this.logger });
    this.costEstimator = options.costEstimator ?? new CostEstimator();
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? generateSessionId;
  }

  /**
   * Record a new run with its input files and return its id.
   * The session and all file rows are written in one transaction.
   */
  async startSession(model: string, temperature: number, files: FileInput[]): Promise<string> {
    const parsed = StartSessionInputSchema.safeParse({ model, temperature, files });
    if (!parsed.success) {
      throw new ValidationError(`Invalid session input: ${parsed.error.message}`);
    }

    const now = this.clock();
    const sessionId = this.generateId(now);
    const inputs = parsed.data.files;

    const totalInputTokens = inputs.reduce(
      (sum, file) => sum + this.tokenEstimator.countTokens(file.content, model),
      0
    );

    const session: Session = {
      session_id: sessionId,
      created_at: now.toISOString(),
      model_used: model,
      temperature,
      total_files: inputs.length,
      processing_time_seconds: 0,
      total_input_tokens: totalInputTokens,
      total_output_tokens: 0,
      estimated_cost_usd: 0,
      success: false,
      error_message: null,
      notes_length: 0,
    };

    const fileRows: ProcessedFile[] = inputs.map(file => ({
      session_id: sessionId,
      filename: file.filename,
      file_type: file.fileType,
      file_size_bytes: file.fileSize,
      file_hash: hashContent(file.content),
      content_preview: file.content ? previewText(file.content, CONTENT_PREVIEW_LENGTH) : null,
      processing_success: file.processingSuccess,
      error_message: file.errorMessage,
    }));

    this.runWrite('start session', () => {
      this.db.insertSession(session);
      for (const row of fileRows) {
        this.db.insertFile(row);
      }
    });

    this.logger.info(
      { sessionId, model, files: inputs.length, inputTokens: totalInputTokens },
      'Session started'
    );
    return sessionId;
  }

  /**
   * Record the outcome of a run. Outcome fields are overwritten on every call and a
   * previously stored note is replaced. Returns false when the session does not exist.
   */
  async completeSession(sessionId: string, input: CompleteSessionInput): Promise<boolean> {
    const parsed = CompleteSessionInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(`Invalid completion input: ${parsed.error.message}`);
    }
    const { success, notesContent, processingTime, errorMessage } = parsed.data;

    const updated = this.runWrite('complete session', () => {
      const session = this.db.getSessionById(sessionId);
      if (!session) {
        return false;
      }

      const outputTokens = notesContent
        ? this.tokenEstimator.countTokens(notesContent, session.model_used)
        : 0;
      const estimatedCost = this.costEstimator.estimateCost(
        session.total_input_tokens,
        outputTokens,
        session.model_used
      );

      this.db.updateSessionOutcome(sessionId, {
        processing_time_seconds: processingTime,
        total_output_tokens: outputTokens,
        estimated_cost_usd: estimatedCost,
        success,
        error_message: errorMessage,
        notes_length: characterCount(notesContent),
      });

      this.db.deleteNotesBySessionId(sessionId);
      if (success && notesContent) {
        this.db.insertNote({
          session_id: sessionId,
          notes_content: notesContent,
          notes_hash: hashContent(notesContent),
          created_at: this.clock().toISOString(),
        });
      }

      this.logger.info(
        { sessionId, success, outputTokens, estimatedCost },
        'Session completed'
      );
      return true;
    });

    if (!updated) {
      this.logger.warn({ sessionId }, 'Cannot complete unknown session');
    }
    return updated;
  }

  /**
   * Delete sessions created more than `retentionDays` ago, with their files and notes.
   */
  async cleanupOldData(retentionDays: number): Promise<number> {
    if (!Number.isFinite(retentionDays) || retentionDays < 0) {
      throw new ValidationError('Retention days must be a non-negative number');
    }

    const cutoff = new Date(this.clock().getTime() - retentionDays * DAY_MS).toISOString();
    const deleted = this.runWrite('clean up sessions', () => this.db.deleteSessionsCreatedBefore(cutoff));

    this.logger.info({ retentionDays, cutoff, deleted }, 'Old sessions removed');
    return deleted;
  }

  private runWrite<T>(operation: string, fn: () => T): T {
    try {
      return this.db.transaction(fn);
    } catch (error) {
      if (error instanceof DatabaseError) {
        throw error;
      }
      throw new DatabaseError(`Failed to ${operation}: ${String(error)}`);
    }
  }
}
