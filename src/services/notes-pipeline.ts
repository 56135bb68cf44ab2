import { DocumentReader } from './document.js';
import type { ReadDocument } from './document.js';
import type { AIProvider, NotesGenerationOptions, NotesResponse } from '../types/provider.js';
import type { FileInput } from '../types/session.js';

export interface ReadInputsResult {
  inputs: FileInput[];
  documents: ReadDocument[];
  errors: string[];
}

export interface GenerateResult {
  outputText: string;
  errors: string[];
  /** Token usage as reported by the provider, when it reports any. */
  usage?: NotesResponse['usage'];
}

const BANNER = '='.repeat(50);

/**
 * Read files, join their text and ask the provider for notes. Failures are
 * collected in `errors` rather than thrown.
 */
export class NotesPipeline {
  private reader: DocumentReader;
  private provider: AIProvider;
  private options: NotesGenerationOptions;

  constructor(reader: DocumentReader, provider: AIProvider, options: NotesGenerationOptions) {
    this.reader = reader;
    this.provider = provider;
    this.options = options;
  }

  /**
   * Read every path. Unreadable files come back as failed inputs with empty content.
   */
  async readInputs(filePaths: string[]): Promise<ReadInputsResult> {
    const inputs: FileInput[] = [];
    const documents: ReadDocument[] = [];
    const errors: string[] = [];

    for (const filePath of filePaths) {
      try {
        const document = await this.reader.read(filePath);
        documents.push(document);
        inputs.push({
          filename: document.filename,
          fileType: document.fileType,
          fileSize: document.fileSize,
          content: document.content,
        });
      } catch (error) {
        const message = `Error reading ${filePath}: ${error instanceof Error ? error.message : String(error)}`;
        errors.push(message);
        inputs.push({
          filename: filePath,
          fileType: extensionOf(filePath),
          fileSize: 0,
          content: '',
          processingSuccess: false,
          errorMessage: message,
        });
      }
    }

    return { inputs, documents, errors };
  }

  async generate(documents: ReadDocument[]): Promise<GenerateResult> {
    if (documents.length === 0) {
      return { outputText: '', errors: ['No readable input files'] };
    }

    try {
      const response = await this.provider.generateNotes(combineDocuments(documents), this.options);
      return { outputText: response.text, errors: [], usage: response.usage };
    } catch (error) {
      return {
        outputText: '',
        errors: [`Error generating notes: ${error instanceof Error ? error.message : String(error)}`],
      };
    }
  }
}

export function combineDocuments(documents: ReadDocument[]): string {
  return documents
    .map(document => `\n${BANNER}\nFILE: ${document.filename}\n${BANNER}\n${document.content}\n`)
    .join('');
}

function extensionOf(filePath: string): string {
  const match = /\.([^./\\]+)$/.exec(filePath);
  return match?.[1]?.toLowerCase() ?? '';
}
