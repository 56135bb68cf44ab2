import OpenAI from 'openai';
import { BaseAIProvider } from './base.js';
import type { RetryOptions } from './base.js';
import type { NotesGenerationOptions, NotesResponse } from '../types/provider.js';
import { ApiError } from '../utils/errors.js';

/**
 * The slice of the chat completions API the provider calls.
 */
export interface ChatCompletionsClient {
  create(body: {
    model: string;
    messages: Array<{ role: 'system' | 'user'; content: string }>;
    temperature?: number;
    max_tokens?: number;
  }): Promise<{
    choices: Array<{ message: { content: string | null } }>;
    usage?: {
      prompt_tokens: number;
      completion_tokens: number;
      total_tokens: number;
    } | null;
  }>;
}

export interface OpenAIProviderOptions extends RetryOptions {
  completions?: ChatCompletionsClient;
}

export class OpenAIProvider extends BaseAIProvider {
  name = 'openai';
  private completions: ChatCompletionsClient;

  constructor(apiKey: string, options: OpenAIProviderOptions = {}) {
    super(apiKey, options);
    this.completions = options.completions ?? new OpenAI({ apiKey }).chat.completions;
  }

  async validateApiKey(apiKey: string): Promise<boolean> {
    try {
      const testClient = new OpenAI({ apiKey });
      await testClient.models.list();
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Turn the concatenated source text into Markdown notes.
   */
  async generateNotes(content: string, options: NotesGenerationOptions): Promise<NotesResponse> {
    this.validateText(content);

    try {
      const response = await this.withRetry(() =>
        this.completions.create({
          model: options.model,
          messages: [
            { role: 'system', content: options.prompt },
            { role: 'user', content: `Please create comprehensive notes from the following content:\n\n${content}` },
          ],
          temperature: options.temperature,
          max_tokens: options.maxTokens,
        })
      );

      const result: NotesResponse = {
        text: response.choices[0]?.message.content?.trim() ?? '',
      };

      if (response.usage) {
        result.usage = {
          promptTokens: response.usage.prompt_tokens,
          completionTokens: response.usage.completion_tokens,
          totalTokens: response.usage.total_tokens,
        };
      }

      return result;
    } catch (error) {
      if (error instanceof ApiError) {
        throw error;
      }
      throw new ApiError(`Failed to generate notes: ${String(error)}`, this.name);
    }
  }
}
