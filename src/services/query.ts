import { DatabaseService } from './database.js';
import { roundTo } from './cost-estimator.js';
import { ValidationError } from '../utils/errors.js';
import type {
  AnalyticsSummary,
  SearchFilters,
  SessionDetails,
  SessionSummary,
} from '../types/session.js';

export const DEFAULT_HISTORY_LIMIT = 50;

/**
 * Read-only views over the ledger. Nothing here writes.
 */
export class QueryService {
  private db: DatabaseService;

  constructor(db: DatabaseService) {
    this.db = db;
  }

  /**
   * Most recent sessions, newest first.
   */
  async getHistory(limit: number = DEFAULT_HISTORY_LIMIT): Promise<SessionSummary[]> {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new ValidationError('Limit must be a non-negative integer');
    }
    return this.db.listSessions({ limit });
  }

  async getSessionDetails(sessionId: string): Promise<SessionDetails | null> {
    const session = this.db.getSessionById(sessionId);
    if (!session) {
      return null;
    }

    return {
      session,
      files: this.db.getFilesBySessionId(sessionId),
      notes: this.db.getNoteBySessionId(sessionId),
    };
  }

  /**
   * Sessions matching every supplied filter, newest first. A non-empty text query
   * keeps only sessions whose note contains it, ignoring case.
   */
  async search(filters: SearchFilters = {}): Promise<SessionSummary[]> {
    const { query = '', model, startDate, endDate } = filters;

    if (startDate && endDate && startDate.getTime() > endDate.getTime()) {
      throw new ValidationError('Start date must not be after end date');
    }

    const sessions = this.db.listSessions({
      ...(model ? { model } : {}),
      ...(startDate ? { createdFrom: startDate.toISOString() } : {}),
      ...(endDate ? { createdTo: endDate.toISOString() } : {}),
    });

    if (!query) {
      return sessions;
    }

    const needle = query.toLowerCase();
    return sessions.filter(session => {
      const note = this.db.getNoteBySessionId(session.session_id);
      return note !== null && note.notes_content.toLowerCase().includes(needle);
    });
  }

  async getAnalytics(): Promise<AnalyticsSummary> {
    const totals = this.db.getAggregates();
    const { total_sessions: totalSessions } = totals;

    return {
      totalSessions,
      successfulSessions: totals.successful_sessions,
      successRatePercent: totalSessions > 0 ? (totals.successful_sessions / totalSessions) * 100 : 0,
      totalCostUsd: roundTo(totals.total_cost, 4),
      totalInputTokens: totals.total_input_tokens,
      totalOutputTokens: totals.total_output_tokens,
      avgProcessingTimeSeconds: totalSessions > 0 ? roundTo(totals.total_processing_time / totalSessions, 2) : 0,
      modelUsage: this.db.getModelUsage(),
    };
  }
}
