import { getEncoding } from 'js-tiktoken';
import type { Tiktoken } from 'js-tiktoken';
import { characterCount } from '../utils/hashing.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export type EncodingName = Parameters<typeof getEncoding>[0];

export const CHARS_PER_TOKEN = 4;

const MODEL_ENCODINGS: Record<string, EncodingName> = {
  'gpt-4': 'cl100k_base',
  'gpt-4-turbo': 'cl100k_base',
  'gpt-4-32k': 'cl100k_base',
  'gpt-3.5-turbo': 'cl100k_base',
  'gpt-4o': 'o200k_base',
  'gpt-4o-mini': 'o200k_base',
  'text-embedding-3-small': 'cl100k_base',
  'text-embedding-3-large': 'cl100k_base',
  'text-embedding-ada-002': 'cl100k_base',
};

// Dated and suffixed releases, longest prefix first.
const MODEL_PREFIX_ENCODINGS: Array<[string, EncodingName]> = [
  ['gpt-4o-', 'o200k_base'],
  ['gpt-4-', 'cl100k_base'],
  ['gpt-3.5-turbo-', 'cl100k_base'],
];

export type EncodingResolver = (model: string) => EncodingName | null;

export function resolveModelEncoding(model: string): EncodingName | null {
  if (Object.hasOwn(MODEL_ENCODINGS, model)) {
    return MODEL_ENCODINGS[model] ?? null;
  }

  for (const [prefix, encoding] of MODEL_PREFIX_ENCODINGS) {
    if (model.startsWith(prefix)) return encoding;
  }

  return null;
}

export interface TokenEstimatorOptions {
  resolveEncoding?: EncodingResolver;
  logger?: Logger;
}

/**
 * Counts tokens with the model's tiktoken encoding, or estimates one token per
 * four characters when the model has no known encoding or encoding fails.
 */
export class TokenEstimator {
  private resolveEncoding: EncodingResolver;
  private logger: Logger;
  private encoders = new Map<EncodingName, Tiktoken>();

  constructor(options: TokenEstimatorOptions = {}) {
    this.resolveEncoding = options.resolveEncoding ?? resolveModelEncoding;
    this.logger = options.logger ?? defaultLogger;
  }

  countTokens(text: string, model: string): number {
    if (text.length === 0) return 0;

    const encodingName = this.resolveEncoding(model);
    if (encodingName === null) {
      this.logger.debug({ model }, 'No tokenizer for model, using character estimate');
      return this.fallbackCount(text);
    }

    try {
      return this.getEncoder(encodingName).encode(text).length;
    } catch (error) {
      this.logger.warn(
        { model, encoding: encodingName, error: String(error) },
        'Tokenizer failed, using character estimate'
      );
      return this.fallbackCount(text);
    }
  }

  fallbackCount(text: string): number {
    return Math.floor(characterCount(text) / CHARS_PER_TOKEN);
  }

  private getEncoder(name: EncodingName): Tiktoken {
    let encoder = this.encoders.get(name);
    if (!encoder) {
      encoder = getEncoding(name);
      this.encoders.set(name, encoder);
    }
    return encoder;
  }
}
