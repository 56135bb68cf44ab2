import { promises as fs } from 'fs';
import path from 'path';
import { extractText } from 'unpdf';
import { FileError } from '../utils/errors.js';

export interface ReadDocument {
  filename: string;
  fileType: string;
  fileSize: number;
  content: string;
}

export interface DocumentReaderOptions {
  maxFileSizeMb?: number;
  supportedFileTypes?: string[];
}

/**
 * Reads input files into text for the notes pipeline.
 * Plain text is read as UTF-8, JSON is re-serialised with a two-space indent and
 * PDF pages are extracted to text, one block per page.
 */
export class DocumentReader {
  private maxFileSizeBytes: number;
  private supportedFileTypes: string[];

  constructor(options: DocumentReaderOptions = {}) {
    this.maxFileSizeBytes = (options.maxFileSizeMb ?? 50) * 1024 * 1024;
    this.supportedFileTypes = (options.supportedFileTypes ?? ['.txt', '.pdf', '.json'])
      .map(type => type.toLowerCase());
  }

  async read(filePath: string): Promise<ReadDocument> {
    const absolutePath = path.resolve(filePath);
    const filename = path.basename(absolutePath);
    const extension = path.extname(filename).toLowerCase();

    if (!this.supportedFileTypes.includes(extension)) {
      throw new FileError(`Unsupported file type: ${extension || '(none)'}`);
    }

    let size: number;
    try {
      const stats = await fs.stat(absolutePath);
      if (!stats.isFile()) {
        throw new FileError(`Not a file: ${filePath}`);
      }
      size = stats.size;
    } catch (error) {
      if (error instanceof FileError) throw error;
      if ((error as { code?: string }).code === 'ENOENT') {
        throw new FileError(`File not found: ${filePath}`);
      }
      throw new FileError(`Cannot access ${filePath}: ${String(error)}`);
    }

    if (size > this.maxFileSizeBytes) {
      throw new FileError(`File too large: ${filename} (${size} bytes)`);
    }

    const content = await this.extractContent(absolutePath, extension);

    return {
      filename,
      fileType: extension.slice(1),
      fileSize: size,
      content,
    };
  }

  private async extractContent(absolutePath: string, extension: string): Promise<string> {
    switch (extension) {
      case '.txt':
        return fs.readFile(absolutePath, 'utf-8');
      case '.json': {
        const raw = await fs.readFile(absolutePath, 'utf-8');
        try {
          return JSON.stringify(JSON.parse(raw), null, 2);
        } catch (error) {
          throw new FileError(`Invalid JSON in ${path.basename(absolutePath)}: ${String(error)}`);
        }
      }
      case '.pdf':
        return this.extractPdfText(absolutePath);
      default:
        throw new FileError(`Unsupported file type: ${extension}`);
    }
  }

  private async extractPdfText(absolutePath: string): Promise<string> {
    const filename = path.basename(absolutePath);
    const data = new Uint8Array(await fs.readFile(absolutePath));

    let pages: string[];
    try {
      const result = await extractText(data, { mergePages: false });
      pages = Array.isArray(result.text) ? result.text : [result.text];
    } catch (error) {
      throw new FileError(`Failed to extract text from ${filename}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const text = pages.map(page => page.trim()).filter(page => page.length > 0).join('\n\n');
    if (text.length === 0) {
      throw new FileError(`No text could be extracted from ${filename}`);
    }
    return text;
  }
}
