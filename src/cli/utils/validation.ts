import { ValidationError } from '../../utils/errors.js';

export function validateApiKey(apiKey: string): void {
  if (!apiKey || apiKey.trim().length === 0) {
    throw new ValidationError('OpenAI API key cannot be empty');
  }
  if (!apiKey.startsWith('sk-')) {
    throw new ValidationError('OpenAI API key should start with "sk-"');
  }
  if (apiKey.length < 20) {
    throw new ValidationError('OpenAI API key appears to be too short');
  }
}

export function validateFilePath(filePath: string): void {
  if (!filePath || filePath.trim().length === 0) {
    throw new ValidationError('File path cannot be empty');
  }

  if (filePath.startsWith('/etc/') || filePath.startsWith('/proc/') || filePath.startsWith('/sys/')) {
    throw new ValidationError('Cannot access system directories');
  }
}

export function parseInteger(value: string, name: string, { min = 0, max = Number.MAX_SAFE_INTEGER } = {}): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new ValidationError(`${name} must be an integer between ${min} and ${max}`);
  }
  return parsed;
}

export function parseTemperature(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new ValidationError('Temperature must be a number between 0 and 1');
  }
  return parsed;
}

/**
 * Parse a date option. A bare YYYY-MM-DD end bound covers the whole day (UTC).
 */
export function parseDate(value: string, bound: 'start' | 'end'): Date {
  const dateOnly = /^\d{4}-\d{2}-\d{2}$/.test(value);
  const text = dateOnly ? `${value}T${bound === 'start' ? '00:00:00.000' : '23:59:59.999'}Z` : value;
  const date = new Date(text);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Invalid date: ${value}`);
  }
  return date;
}

export function formatValidationError(error: unknown): string {
  if (error instanceof ValidationError) {
    return `❌ Validation Error: ${error.message}`;
  }

  if (error instanceof Error) {
    return `❌ Error: ${error.message}`;
  }

  return `❌ Unknown error: ${String(error)}`;
}
