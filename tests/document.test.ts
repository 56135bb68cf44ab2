import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { DocumentReader } from '../src/services/document.js';
import { FileError } from '../src/utils/errors.js';

describe('DocumentReader', () => {
  let dir: string;
  const reader = new DocumentReader();

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'notes-docs-'));
    await fs.writeFile(path.join(dir, 'lecture.txt'), 'Cells divide.\n', 'utf-8');
    await fs.writeFile(path.join(dir, 'data.json'), '{"topic":"cells","pages":[1,2]}', 'utf-8');
    await fs.writeFile(path.join(dir, 'broken.json'), '{"topic":', 'utf-8');
    await fs.writeFile(path.join(dir, 'slides.pdf'), '%PDF-1.4', 'utf-8');
    await fs.writeFile(path.join(dir, 'readme.md'), '# hi', 'utf-8');
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads text files as UTF-8', async () => {
    expect(await reader.read(path.join(dir, 'lecture.txt'))).toEqual({
      filename: 'lecture.txt',
      fileType: 'txt',
      fileSize: 14,
      content: 'Cells divide.\n',
    });
  });

  it('re-serialises JSON with a two-space indent', async () => {
    const document = await reader.read(path.join(dir, 'data.json'));
    expect(document.fileType).toBe('json');
    expect(document.content).toBe('{\n  "topic": "cells",\n  "pages": [\n    1,\n    2\n  ]\n}');
  });

  it('rejects invalid JSON', async () => {
    await expect(reader.read(path.join(dir, 'broken.json'))).rejects.toThrow(/^Invalid JSON in broken\.json/);
  });

  it('extracts the text of PDF pages', async () => {
    const fixture = fileURLToPath(new URL('./fixtures/lecture.pdf', import.meta.url));
    const document = await reader.read(fixture);

    expect(document.filename).toBe('lecture.pdf');
    expect(document.fileType).toBe('pdf');
    expect(document.fileSize).toBe(626);
    expect(document.content).toBe('Cells divide by mitosis.');
  });

  it('reports a PDF it cannot parse', async () => {
    await expect(reader.read(path.join(dir, 'slides.pdf'))).rejects.toThrow(/^Failed to extract text from slides\.pdf/);
  });

  it('rejects unsupported extensions', async () => {
    await expect(reader.read(path.join(dir, 'readme.md'))).rejects.toThrow('Unsupported file type: .md');
  });

  it('reports a missing file', async () => {
    const missing = path.join(dir, 'missing.txt');
    await expect(reader.read(missing)).rejects.toThrow(`File not found: ${missing}`);
  });

  it('rejects directories', async () => {
    const folder = path.join(dir, 'folder.txt');
    await fs.mkdir(folder, { recursive: true });
    await expect(reader.read(folder)).rejects.toThrow(FileError);
  });

  it('enforces the size limit', async () => {
    const tiny = new DocumentReader({ maxFileSizeMb: 0.000001 });
    await expect(tiny.read(path.join(dir, 'lecture.txt'))).rejects.toThrow('File too large: lecture.txt (14 bytes)');
  });
});
