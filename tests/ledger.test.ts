import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { DatabaseService } from '../src/services/database.js';
import { SessionLedger } from '../src/services/ledger.js';
import { DatabaseError, ValidationError } from '../src/utils/errors.js';
import { hashContent } from '../src/utils/hashing.js';
import type { FileInput } from '../src/types/session.js';
import { characterEstimator, fixedClock, openMemoryDb, sequentialIds, silentLogger } from './helpers.js';

const NOTES = '# Title\n- point';

function textFile(filename: string, content: string): FileInput {
  return { filename, fileType: 'txt', fileSize: content.length, content };
}

describe('SessionLedger', () => {
  let db: DatabaseService;
  let time: ReturnType<typeof fixedClock>;
  let ledger: SessionLedger;

  beforeEach(async () => {
    db = await openMemoryDb();
    time = fixedClock('2024-03-01T10:00:00.000Z');
    ledger = new SessionLedger(db, {
      tokenEstimator: characterEstimator(),
      logger: silentLogger,
      clock: time.clock,
      generateId: sequentialIds(),
    });
  });

  afterEach(() => {
    db.close();
  });

  describe('startSession', () => {
    it('stores the session with its input token total and defaults', async () => {
      const id = await ledger.startSession('gpt-4', 0.3, [
        textFile('a.txt', 'a'.repeat(4000)),
        textFile('b.txt', 'b'.repeat(2000)),
      ]);

      expect(id).toBe('session-1');
      expect(db.getSessionById(id)).toEqual({
        session_id: 'session-1',
        created_at: '2024-03-01T10:00:00.000Z',
        model_used: 'gpt-4',
        temperature: 0.3,
        total_files: 2,
        processing_time_seconds: 0,
        total_input_tokens: 1500,
        total_output_tokens: 0,
        estimated_cost_usd: 0,
        success: false,
        error_message: null,
        notes_length: 0,
      });
    });

    it('stores one file row per input in order', async () => {
      const long = 'x'.repeat(600);
      const id = await ledger.startSession('gpt-4', 0.3, [
        textFile('long.txt', long),
        { filename: 'broken.pdf', fileType: 'pdf', fileSize: 0, content: '', processingSuccess: false, errorMessage: 'unreadable' },
      ]);

      const files = db.getFilesBySessionId(id);
      expect(files).toHaveLength(2);
      expect(files[0]).toEqual({
        session_id: id,
        filename: 'long.txt',
        file_type: 'txt',
        file_size_bytes: 600,
        file_hash: hashContent(long),
        content_preview: 'x'.repeat(500),
        processing_success: true,
        error_message: null,
      });
      expect(files[1]).toEqual({
        session_id: id,
        filename: 'broken.pdf',
        file_type: 'pdf',
        file_size_bytes: 0,
        file_hash: hashContent(''),
        content_preview: null,
        processing_success: false,
        error_message: 'unreadable',
      });
    });

    it('accepts a session with no files', async () => {
      const id = await ledger.startSession('gpt-4', 0, []);
      expect(db.getSessionById(id)?.total_files).toBe(0);
      expect(db.getSessionById(id)?.total_input_tokens).toBe(0);
    });

    it('rejects invalid input without writing', async () => {
      await expect(ledger.startSession('gpt-4', 1.5, [])).rejects.toThrow(ValidationError);
      await expect(ledger.startSession('', 0.3, [])).rejects.toThrow(ValidationError);
      await expect(
        ledger.startSession('gpt-4', 0.3, [{ filename: 'a.txt', fileType: 'txt', fileSize: -1, content: '' }])
      ).rejects.toThrow(ValidationError);
      expect(db.countRows()).toEqual({ sessions: 0, files: 0, notes: 0 });
    });

    it('rolls back the session when a file row fails', async () => {
      const insertFile = db.insertFile.bind(db);
      let calls = 0;
      vi.spyOn(db, 'insertFile').mockImplementation(file => {
        calls += 1;
        if (calls === 2) {
          throw new Error('disk full');
        }
        insertFile(file);
      });

      await expect(
        ledger.startSession('gpt-4', 0.3, [textFile('a.txt', 'aaaa'), textFile('b.txt', 'bbbb')])
      ).rejects.toThrow(DatabaseError);
      expect(db.countRows()).toEqual({ sessions: 0, files: 0, notes: 0 });
    });
  });

  describe('completeSession', () => {
    it('records output tokens, cost and the note', async () => {
      const id = await ledger.startSession('gpt-4', 0.3, [
        textFile('a.txt', 'a'.repeat(4000)),
        textFile('b.txt', 'b'.repeat(2000)),
      ]);
      time.set('2024-03-01T10:00:05.000Z');

      const updated = await ledger.completeSession(id, {
        success: true,
        notesContent: NOTES,
        processingTime: 5.25,
      });

      expect(updated).toBe(true);
      const session = db.getSessionById(id);
      expect(session?.success).toBe(true);
      expect(session?.total_output_tokens).toBe(3);
      expect(session?.notes_length).toBe(15);
      expect(session?.processing_time_seconds).toBe(5.25);
      expect(session?.estimated_cost_usd).toBeCloseTo(0.04518, 6);
      expect(session?.created_at).toBe('2024-03-01T10:00:00.000Z');

      expect(db.getNoteBySessionId(id)).toEqual({
        session_id: id,
        notes_content: NOTES,
        notes_hash: hashContent(NOTES),
        created_at: '2024-03-01T10:00:05.000Z',
      });
    });

    it('stores no note for a failed run', async () => {
      const id = await ledger.startSession('gpt-4', 0.3, [textFile('a.txt', 'aaaa')]);

      await ledger.completeSession(id, { success: false, errorMessage: 'Error generating notes: timeout' });

      const session = db.getSessionById(id);
      expect(session?.success).toBe(false);
      expect(session?.error_message).toBe('Error generating notes: timeout');
      expect(session?.total_output_tokens).toBe(0);
      expect(session?.estimated_cost_usd).toBe(0.00003);
      expect(db.getNoteBySessionId(id)).toBeNull();
    });

    it('replaces the outcome and note on a second completion', async () => {
      const id = await ledger.startSession('gpt-4', 0.3, [textFile('a.txt', 'aaaa')]);

      await ledger.completeSession(id, { success: true, notesContent: 'first draft' });
      await ledger.completeSession(id, { success: true, notesContent: NOTES });

      expect(db.countRows().notes).toBe(1);
      expect(db.getNoteBySessionId(id)?.notes_content).toBe(NOTES);
      expect(db.getSessionById(id)?.notes_length).toBe(15);

      await ledger.completeSession(id, { success: false, errorMessage: 'retry failed' });

      expect(db.countRows().notes).toBe(0);
      expect(db.getSessionById(id)?.success).toBe(false);
    });

    it('returns false and warns for an unknown session', async () => {
      const warn = vi.spyOn(silentLogger, 'warn');

      const updated = await ledger.completeSession('nope', { success: true, notesContent: NOTES });

      expect(updated).toBe(false);
      expect(warn).toHaveBeenCalledWith({ sessionId: 'nope' }, 'Cannot complete unknown session');
      expect(db.countRows()).toEqual({ sessions: 0, files: 0, notes: 0 });
      warn.mockRestore();
    });

    it('rejects a negative processing time', async () => {
      const id = await ledger.startSession('gpt-4', 0.3, []);
      await expect(ledger.completeSession(id, { success: true, processingTime: -1 })).rejects.toThrow(ValidationError);
    });
  });

  describe('cleanupOldData', () => {
    it('deletes sessions older than the retention window with their rows', async () => {
      time.set('2024-01-01T00:00:00.000Z');
      const old = await ledger.startSession('gpt-4', 0.3, [textFile('old.txt', 'old!')]);
      await ledger.completeSession(old, { success: true, notesContent: NOTES });

      time.set('2024-03-25T00:00:00.000Z');
      const recent = await ledger.startSession('gpt-4', 0.3, [textFile('new.txt', 'new!')]);

      time.set('2024-04-01T00:00:00.000Z');
      const deleted = await ledger.cleanupOldData(30);

      expect(deleted).toBe(1);
      expect(db.getSessionById(old)).toBeNull();
      expect(db.getSessionById(recent)).not.toBeNull();
      expect(db.countRows()).toEqual({ sessions: 1, files: 1, notes: 0 });
    });

    it('keeps a session created exactly at the cutoff', async () => {
      time.set('2024-03-02T00:00:00.000Z');
      await ledger.startSession('gpt-4', 0.3, []);

      time.set('2024-03-03T00:00:00.000Z');
      expect(await ledger.cleanupOldData(1)).toBe(0);
      expect(await ledger.cleanupOldData(0)).toBe(1);
    });

    it('rejects a negative retention', async () => {
      await expect(ledger.cleanupOldData(-1)).rejects.toThrow(ValidationError);
    });
  });
});

describe('SessionLedger on two connections', () => {
  let dir: string;
  let first: DatabaseService;
  let second: DatabaseService;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'notes-ledger-'));
    const dbPath = path.join(dir, 'ledger.db');
    first = new DatabaseService(dbPath, { logger: silentLogger, busyTimeoutMs: 0 });
    second = new DatabaseService(dbPath, { logger: silentLogger, busyTimeoutMs: 0 });
    await first.initialize();
    await second.initialize();
  });

  afterEach(async () => {
    first.close();
    second.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('keeps the write lock from the session read to the outcome write', async () => {
    const ledgerA = new SessionLedger(first, { tokenEstimator: characterEstimator(), logger: silentLogger });
    const ledgerB = new SessionLedger(second, { tokenEstimator: characterEstimator(), logger: silentLogger });
    const id = await ledgerA.startSession('gpt-4', 0.3, [textFile('a.txt', 'aaaa')]);

    const getSessionById = first.getSessionById.bind(first);
    let competing: Promise<unknown> | undefined;
    const spy = vi.spyOn(first, 'getSessionById').mockImplementation(sessionId => {
      const session = getSessionById(sessionId);
      competing = ledgerB
        .completeSession(id, { success: true, notesContent: 'from B' })
        .catch((error: unknown) => error);
      return session;
    });

    expect(await ledgerA.completeSession(id, { success: true, notesContent: 'from A' })).toBe(true);
    expect(await competing).toBeInstanceOf(DatabaseError);
    expect(second.getNoteBySessionId(id)?.notes_content).toBe('from A');
    spy.mockRestore();

    expect(await ledgerB.completeSession(id, { success: true, notesContent: 'from B' })).toBe(true);
    expect(first.getNoteBySessionId(id)?.notes_content).toBe('from B');
    expect(first.countRows().notes).toBe(1);
  });
});
