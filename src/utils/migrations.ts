import type { DatabaseService } from '../services/database.js';
import { DatabaseError } from './errors.js';
import { logger as defaultLogger } from './logger.js';
import type { Logger } from './logger.js';

interface Migration {
  version: number;
  name: string;
  up: (db: DatabaseService) => void;
}

export class MigrationManager {
  private db: DatabaseService;
  private logger: Logger;
  private migrations: Migration[] = [];

  constructor(db: DatabaseService, logger: Logger = defaultLogger) {
    this.db = db;
    this.logger = logger;
    this.initializeMigrations();
  }

  private initializeMigrations(): void {
    this.migrations.push({
      version: 1,
      name: 'initial_schema',
      up: (db: DatabaseService) => {
        db.getDb().exec(`
          CREATE TABLE IF NOT EXISTS sessions (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            session_id TEXT NOT NULL UNIQUE,
            created_at TEXT NOT NULL,
            model_used TEXT NOT NULL,
            temperature REAL NOT NULL,
            total_files INTEGER NOT NULL,
            processing_time_seconds REAL NOT NULL DEFAULT 0,
            total_input_tokens INTEGER NOT NULL DEFAULT 0,
            total_output_tokens INTEGER NOT NULL DEFAULT 0,
            estimated_cost_usd REAL NOT NULL DEFAULT 0,
            success INTEGER NOT NULL DEFAULT 0,
            error_message TEXT,
            notes_length INTEGER NOT NULL DEFAULT 0
          );

          CREATE TABLE IF NOT EXISTS processed_files (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            session_id TEXT NOT NULL,
            filename TEXT NOT NULL,
            file_type TEXT NOT NULL,
            file_size_bytes INTEGER NOT NULL,
            file_hash TEXT NOT NULL,
            content_preview TEXT,
            processing_success INTEGER NOT NULL,
            error_message TEXT,
            FOREIGN KEY (session_id) REFERENCES sessions(session_id) ON DELETE CASCADE
          );

          CREATE TABLE IF NOT EXISTS generated_notes (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            session_id TEXT NOT NULL,
            notes_content TEXT NOT NULL,
            notes_hash TEXT NOT NULL,
            created_at TEXT NOT NULL,
            FOREIGN KEY (session_id) REFERENCES sessions(session_id) ON DELETE CASCADE
          );

          CREATE INDEX IF NOT EXISTS idx_sessions_created_at ON sessions(created_at);
          CREATE INDEX IF NOT EXISTS idx_sessions_model ON sessions(model_used);
          CREATE INDEX IF NOT EXISTS idx_files_session ON processed_files(session_id);
          CREATE INDEX IF NOT EXISTS idx_files_hash ON processed_files(file_hash);
          CREATE INDEX IF NOT EXISTS idx_notes_session ON generated_notes(session_id);
          CREATE INDEX IF NOT EXISTS idx_notes_hash ON generated_notes(notes_hash);
        `);
      },
    });
  }

  private ensureMigrationsTable(): void {
    this.db.getDb().exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  /**
   * Get current schema version
   */
  getCurrentVersion(): number {
    try {
      this.ensureMigrationsTable();
      const row = this.db.getDb().prepare('SELECT MAX(version) AS version FROM migrations').get();
      if (row && typeof row === 'object' && 'version' in row && typeof row.version === 'number') {
        return row.version;
      }
      return 0;
    } catch (error) {
      throw new DatabaseError(`Failed to get current version: ${String(error)}`);
    }
  }

  getLatestVersion(): number {
    return Math.max(...this.migrations.map(m => m.version), 0);
  }

  needsMigration(): boolean {
    return this.getCurrentVersion() < this.getLatestVersion();
  }

  /**
   * Run pending migrations
   */
  migrate(): void {
    const currentVersion = this.getCurrentVersion();
    const pendingMigrations = this.migrations
      .filter(m => m.version > currentVersion)
      .sort((a, b) => a.version - b.version);

    if (pendingMigrations.length === 0) {
      return;
    }

    try {
      this.db.transaction(() => {
        const record = this.db.getDb().prepare('INSERT INTO migrations (version, name) VALUES (?, ?)');
        for (const migration of pendingMigrations) {
          this.logger.info({ version: migration.version, name: migration.name }, 'Running migration');
          migration.up(this.db);
          record.run(migration.version, migration.name);
        }
      });

      this.logger.info({ version: this.getCurrentVersion() }, 'Database migrated');
    } catch (error) {
      throw new DatabaseError(`Migration failed: ${String(error)}`);
    }
  }
}
