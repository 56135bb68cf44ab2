import Database from 'better-sqlite3';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { DatabaseError } from '../utils/errors.js';
import { MigrationManager } from '../utils/migrations.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import {
  SessionRowSchema,
  ProcessedFileRowSchema,
  GeneratedNoteRowSchema,
} from '../types/session.js';
import type { Session, ProcessedFile, GeneratedNote } from '../types/session.js';

export const IN_MEMORY = ':memory:';

const SESSION_COLUMNS = `
  session_id, created_at, model_used, temperature, total_files, processing_time_seconds,
  total_input_tokens, total_output_tokens, estimated_cost_usd, success, error_message, notes_length
`;

const FILE_COLUMNS = `
  session_id, filename, file_type, file_size_bytes, file_hash, content_preview,
  processing_success, error_message
`;

const NOTE_COLUMNS = 'session_id, notes_content, notes_hash, created_at';

const AggregateRowSchema = z.object({
  total_sessions: z.number().int(),
  successful_sessions: z.number().int(),
  total_cost: z.number(),
  total_input_tokens: z.number(),
  total_output_tokens: z.number(),
  total_processing_time: z.number(),
});

const ModelUsageRowSchema = z.object({
  model_used: z.string(),
  count: z.number().int(),
});

export type SessionAggregates = z.infer<typeof AggregateRowSchema>;

export type SessionOutcome = Pick<
  Session,
  'processing_time_seconds' | 'total_output_tokens' | 'estimated_cost_usd' | 'success' | 'error_message' | 'notes_length'
>;

export interface SessionQuery {
  model?: string;
  createdFrom?: string;
  createdTo?: string;
  limit?: number;
}

export interface DatabaseServiceOptions {
  logger?: Logger;
  /** How long a writer waits for another connection's write lock before failing. */
  busyTimeoutMs?: number;
}

export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

/**
 * Owns the SQLite handle for the ledger. Open it with `initialize()`, release it with `close()`.
 */
export class DatabaseService {
  private db: Database.Database | null = null;
  private dbPath: string;
  private logger: Logger;
  private busyTimeoutMs: number;

  constructor(dbPath?: string, options: DatabaseServiceOptions = {}) {
    this.dbPath = dbPath || this.getDefaultDbPath();
    this.logger = options.logger ?? defaultLogger;
    this.busyTimeoutMs = options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS;
  }

  private getDefaultDbPath(): string {
    return path.join(os.homedir(), '.notes-ledger', 'database.db');
  }

  /**
   * Initialize database connection and schema
   */
  async initialize(): Promise<void> {
    try {
      if (this.dbPath !== IN_MEMORY) {
        await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
      }

      this.db = new Database(this.dbPath, { timeout: this.busyTimeoutMs });

      // WAL lets readers in other processes see committed runs while a write is open
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('foreign_keys = ON');

      const migrations = new MigrationManager(this, this.logger);
      if (migrations.needsMigration()) {
        migrations.migrate();
      }
    } catch (error) {
      this.close();
      throw new DatabaseError(`Failed to initialize database: ${String(error)}`);
    }
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  getDb(): Database.Database {
    if (!this.db) {
      throw new DatabaseError('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  /**
   * Run `fn` in one transaction; any throw rolls every statement back.
   * BEGIN IMMEDIATE takes the write lock before `fn` reads, so no other connection
   * commits between its reads and its writes. Competing writers wait up to the busy timeout.
   */
  transaction<T>(fn: () => T): T {
    const db = this.getDb();
    const transaction = db.transaction(fn);
    return transaction.immediate();
  }

  // Session operations

  insertSession(session: Session): void {
    const db = this.getDb();

    try {
      db.prepare(`
        INSERT INTO sessions (${SESSION_COLUMNS})
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        session.session_id,
        session.created_at,
        session.model_used,
        session.temperature,
        session.total_files,
        session.processing_time_seconds,
        session.total_input_tokens,
        session.total_output_tokens,
        session.estimated_cost_usd,
        session.success ? 1 : 0,
        session.error_message,
        session.notes_length
      );
    } catch (error) {
      throw new DatabaseError(`Failed to insert session: ${String(error)}`);
    }
  }

  getSessionById(sessionId: string): Session | null {
    const db = this.getDb();

    try {
      const row = db.prepare(`SELECT ${SESSION_COLUMNS} FROM sessions WHERE session_id = ?`).get(sessionId);
      return row === undefined ? null : SessionRowSchema.parse(row);
    } catch (error) {
      throw new DatabaseError(`Failed to get session: ${String(error)}`);
    }
  }

  /**
   * Overwrite the outcome fields of a session. Returns false when no row matched.
   */
  updateSessionOutcome(sessionId: string, outcome: SessionOutcome): boolean {
    const db = this.getDb();

    try {
      const result = db.prepare(`
        UPDATE sessions
        SET processing_time_seconds = ?, total_output_tokens = ?, estimated_cost_usd = ?,
            success = ?, error_message = ?, notes_length = ?
        WHERE session_id = ?
      `).run(
        outcome.processing_time_seconds,
        outcome.total_output_tokens,
        outcome.estimated_cost_usd,
        outcome.success ? 1 : 0,
        outcome.error_message,
        outcome.notes_length,
        sessionId
      );
      return result.changes > 0;
    } catch (error) {
      throw new DatabaseError(`Failed to update session: ${String(error)}`);
    }
  }

  /**
   * List sessions newest first, optionally narrowed by model and an inclusive created_at range.
   */
  listSessions(query: SessionQuery = {}): Session[] {
    const db = this.getDb();
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (query.model) {
      conditions.push('model_used = ?');
      params.push(query.model);
    }
    if (query.createdFrom) {
      conditions.push('created_at >= ?');
      params.push(query.createdFrom);
    }
    if (query.createdTo) {
      conditions.push('created_at <= ?');
      params.push(query.createdTo);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    // SQLite treats a negative LIMIT as no limit
    params.push(query.limit ?? -1);

    try {
      const rows = db.prepare(`
        SELECT ${SESSION_COLUMNS} FROM sessions
        ${where}
        ORDER BY created_at DESC, id DESC
        LIMIT ?
      `).all(...params);
      return rows.map(row => SessionRowSchema.parse(row));
    } catch (error) {
      throw new DatabaseError(`Failed to list sessions: ${String(error)}`);
    }
  }

  /**
   * Delete one session; its files and notes cascade.
   */
  deleteSession(sessionId: string): boolean {
    const db = this.getDb();

    try {
      return db.prepare('DELETE FROM sessions WHERE session_id = ?').run(sessionId).changes > 0;
    } catch (error) {
      throw new DatabaseError(`Failed to delete session: ${String(error)}`);
    }
  }

  /**
   * Delete sessions created strictly before `cutoff`; files and notes cascade.
   */
  deleteSessionsCreatedBefore(cutoff: string): number {
    const db = this.getDb();

    try {
      return db.prepare('DELETE FROM sessions WHERE created_at < ?').run(cutoff).changes;
    } catch (error) {
      throw new DatabaseError(`Failed to delete sessions: ${String(error)}`);
    }
  }

  getAggregates(): SessionAggregates {
    const db = this.getDb();

    try {
      const row = db.prepare(`
        SELECT
          COUNT(*) AS total_sessions,
          COALESCE(SUM(success), 0) AS successful_sessions,
          COALESCE(SUM(estimated_cost_usd), 0) AS total_cost,
          COALESCE(SUM(total_input_tokens), 0) AS total_input_tokens,
          COALESCE(SUM(total_output_tokens), 0) AS total_output_tokens,
          COALESCE(SUM(processing_time_seconds), 0) AS total_processing_time
        FROM sessions
      `).get();
      return AggregateRowSchema.parse(row);
    } catch (error) {
      throw new DatabaseError(`Failed to aggregate sessions: ${String(error)}`);
    }
  }

  getModelUsage(): Record<string, number> {
    const db = this.getDb();

    try {
      const rows = db.prepare(`
        SELECT model_used, COUNT(*) AS count FROM sessions
        GROUP BY model_used
        ORDER BY count DESC, model_used
      `).all();

      // fromEntries defines own keys, so a model named "__proto__" is kept
      return Object.fromEntries(rows.map(row => {
        const { model_used, count } = ModelUsageRowSchema.parse(row);
        return [model_used, count] as const;
      }));
    } catch (error) {
      throw new DatabaseError(`Failed to get model usage: ${String(error)}`);
    }
  }

  // File operations

  insertFile(file: ProcessedFile): void {
    const db = this.getDb();

    try {
      db.prepare(`
        INSERT INTO processed_files (${FILE_COLUMNS})
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        file.session_id,
        file.filename,
        file.file_type,
        file.file_size_bytes,
        file.file_hash,
        file.content_preview,
        file.processing_success ? 1 : 0,
        file.error_message
      );
    } catch (error) {
      throw new DatabaseError(`Failed to insert file: ${String(error)}`);
    }
  }

  getFilesBySessionId(sessionId: string): ProcessedFile[] {
    const db = this.getDb();

    try {
      const rows = db.prepare(`SELECT ${FILE_COLUMNS} FROM processed_files WHERE session_id = ? ORDER BY id`).all(sessionId);
      return rows.map(row => ProcessedFileRowSchema.parse(row));
    } catch (error) {
      throw new DatabaseError(`Failed to get files: ${String(error)}`);
    }
  }

  // Note operations

  insertNote(note: GeneratedNote): void {
    const db = this.getDb();

    try {
      db.prepare(`INSERT INTO generated_notes (${NOTE_COLUMNS}) VALUES (?, ?, ?, ?)`).run(
        note.session_id,
        note.notes_content,
        note.notes_hash,
        note.created_at
      );
    } catch (error) {
      throw new DatabaseError(`Failed to insert note: ${String(error)}`);
    }
  }

  deleteNotesBySessionId(sessionId: string): number {
    const db = this.getDb();

    try {
      return db.prepare('DELETE FROM generated_notes WHERE session_id = ?').run(sessionId).changes;
    } catch (error) {
      throw new DatabaseError(`Failed to delete notes: ${String(error)}`);
    }
  }

  getNoteBySessionId(sessionId: string): GeneratedNote | null {
    const db = this.getDb();

    try {
      const row = db.prepare(`
        SELECT ${NOTE_COLUMNS} FROM generated_notes WHERE session_id = ? ORDER BY id DESC LIMIT 1
      `).get(sessionId);
      return row === undefined ? null : GeneratedNoteRowSchema.parse(row);
    } catch (error) {
      throw new DatabaseError(`Failed to get note: ${String(error)}`);
    }
  }

  /**
   * Row counts per table, used by `db-init --test` and diagnostics.
   */
  countRows(): { sessions: number; files: number; notes: number } {
    const db = this.getDb();

    try {
      const count = (table: string): number => {
        const value = db.prepare(`SELECT COUNT(*) FROM ${table}`).pluck().get();
        return typeof value === 'number' ? value : 0;
      };
      return {
        sessions: count('sessions'),
        files: count('processed_files'),
        notes: count('generated_notes'),
      };
    } catch (error) {
      throw new DatabaseError(`Failed to count rows: ${String(error)}`);
    }
  }
}
