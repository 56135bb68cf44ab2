import type { AIProvider, NotesGenerationOptions, NotesResponse } from '../types/provider.js';
import { ApiError } from '../utils/errors.js';

export interface RetryOptions {
  maxRetries?: number;
  retryDelayMs?: number;
}

export abstract class BaseAIProvider implements AIProvider {
  abstract name: string;
  protected apiKey: string;
  protected maxRetries: number;
  protected retryDelayMs: number;

  constructor(apiKey: string, options: RetryOptions = {}) {
    this.apiKey = apiKey;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  abstract validateApiKey(apiKey: string): Promise<boolean>;
  abstract generateNotes(content: string, options: NotesGenerationOptions): Promise<NotesResponse>;

  /**
   * Handle API errors with retry logic
   */
  protected async withRetry<T>(operation: () => Promise<T>): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;

        // Don't retry on authentication errors
        if (this.isAuthError(error)) {
          throw new ApiError(`Authentication failed: ${errorMessage(error)}`, this.name);
        }

        if (attempt === this.maxRetries) {
          break;
        }

        // Exponential backoff
        await this.sleep(this.retryDelayMs * Math.pow(2, attempt - 1));
      }
    }

    throw new ApiError(
      `Operation failed after ${this.maxRetries} attempts: ${errorMessage(lastError)}`,
      this.name
    );
  }

  protected isAuthError(error: unknown): boolean {
    const message = String(error).toLowerCase();
    return message.includes('unauthorized') ||
           message.includes('api key') ||
           message.includes('authentication');
  }

  protected sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  protected validateText(text: string): void {
    if (!text || text.trim().length === 0) {
      throw new ApiError('Text cannot be empty', this.name);
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
