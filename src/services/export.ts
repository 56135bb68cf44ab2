import { promises as fs } from 'fs';
import path from 'path';
import { QueryService } from './query.js';
import { FileError, UnsupportedExportFormatError } from '../utils/errors.js';
import type { SessionSummary } from '../types/session.js';

export type ExportFormat = 'csv' | 'json';

export const EXPORT_LIMIT = 1000;

export const EXPORT_COLUMNS: Array<keyof SessionSummary> = [
  'session_id',
  'created_at',
  'model_used',
  'temperature',
  'total_files',
  'processing_time_seconds',
  'total_input_tokens',
  'total_output_tokens',
  'estimated_cost_usd',
  'success',
  'notes_length',
  'error_message',
];

export function parseExportFormat(format: string): ExportFormat {
  const normalized = format.trim().toLowerCase();
  if (normalized === 'csv' || normalized === 'json') {
    return normalized;
  }
  throw new UnsupportedExportFormatError(format);
}

export interface ExportServiceOptions {
  directory?: string;
  clock?: () => Date;
}

export class ExportService {
  private query: QueryService;
  private directory: string;
  private clock: () => Date;

  constructor(query: QueryService, options: ExportServiceOptions = {}) {
    this.query = query;
    this.directory = options.directory || process.cwd();
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Write the most recent sessions to a timestamped file and return its path.
   */
  async export(format: string): Promise<string> {
    const exportFormat = parseExportFormat(format);
    const sessions = await this.query.getHistory(EXPORT_LIMIT);

    const body = exportFormat === 'csv' ? toCsv(sessions) : `${JSON.stringify(sessions, null, 2)}\n`;
    const filePath = path.join(this.directory, exportFileName(this.clock(), exportFormat));

    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(filePath, body, { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      throw new FileError(`Failed to write export ${filePath}: ${String(error)}`);
    }

    return filePath;
  }
}

export function exportFileName(date: Date, format: ExportFormat): string {
  const pad = (value: number, width: number = 2) => String(value).padStart(width, '0');
  const stamp =
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
    `_${pad(date.getUTCMilliseconds(), 3)}`;
  return `notes-export_${stamp}.${format}`;
}

export function toCsv(sessions: SessionSummary[]): string {
  const lines = [EXPORT_COLUMNS.join(',')];
  for (const session of sessions) {
    lines.push(EXPORT_COLUMNS.map(column => csvCell(session[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

function csvCell(value: string | number | boolean | null): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}
