import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { DatabaseService } from '../src/services/database.js';
import { SessionLedger } from '../src/services/ledger.js';
import { QueryService } from '../src/services/query.js';
import { ExportService, exportFileName, parseExportFormat, toCsv } from '../src/services/export.js';
import { UnsupportedExportFormatError } from '../src/utils/errors.js';
import { characterEstimator, fixedClock, openMemoryDb, silentLogger } from './helpers.js';

const HEADER =
  'session_id,created_at,model_used,temperature,total_files,processing_time_seconds,' +
  'total_input_tokens,total_output_tokens,estimated_cost_usd,success,notes_length,error_message';

describe('parseExportFormat', () => {
  it('accepts csv and json in any case', () => {
    expect(parseExportFormat('CSV')).toBe('csv');
    expect(parseExportFormat(' json ')).toBe('json');
  });

  it('rejects other formats', () => {
    expect(() => parseExportFormat('xml')).toThrow('Unsupported export format "xml". Use "csv" or "json".');
  });
});

describe('exportFileName', () => {
  it('stamps the UTC time down to milliseconds', () => {
    expect(exportFileName(new Date('2024-03-05T07:08:09.010Z'), 'csv')).toBe('notes-export_20240305_070809_010.csv');
  });
});

describe('toCsv', () => {
  it('writes only the header for no sessions', () => {
    expect(toCsv([])).toBe(`${HEADER}\n`);
  });
});

describe('ExportService', () => {
  let db: DatabaseService;
  let dir: string;
  let exporter: ExportService;
  let query: QueryService;

  beforeEach(async () => {
    db = await openMemoryDb();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'notes-export-'));
    query = new QueryService(db);
    exporter = new ExportService(query, {
      directory: dir,
      clock: () => new Date('2024-03-05T07:08:09.010Z'),
    });

    const ledger = new SessionLedger(db, {
      tokenEstimator: characterEstimator(),
      logger: silentLogger,
      clock: fixedClock('2024-03-01T10:00:00.000Z').clock,
      generateId: () => 'abc123',
    });
    const id = await ledger.startSession('gpt-4', 0.3, [
      { filename: 'a.txt', fileType: 'txt', fileSize: 8, content: 'abcdefgh' },
    ]);
    await ledger.completeSession(id, { success: false, errorMessage: 'bad input, "retry" later', processingTime: 1.5 });
  });

  afterEach(async () => {
    db.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes a CSV file with quoted cells where needed', async () => {
    const filePath = await exporter.export('csv');

    expect(filePath).toBe(path.join(dir, 'notes-export_20240305_070809_010.csv'));
    expect(await fs.readFile(filePath, 'utf-8')).toBe(
      `${HEADER}\n` +
      'abc123,2024-03-01T10:00:00.000Z,gpt-4,0.3,1,1.5,2,0,0.00006,false,0,"bad input, ""retry"" later"\n'
    );
  });

  it('writes the history as a JSON array', async () => {
    const filePath = await exporter.export('json');

    expect(path.basename(filePath)).toBe('notes-export_20240305_070809_010.json');
    const parsed: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    expect(parsed).toEqual(await query.getHistory(1000));
  });

  it('rejects an unsupported format without writing a file', async () => {
    await expect(exporter.export('xml')).rejects.toThrow(UnsupportedExportFormatError);
    expect(await fs.readdir(dir)).toEqual([]);
  });
});
