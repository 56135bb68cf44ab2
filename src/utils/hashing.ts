import crypto from 'crypto';

/**
 * SHA-256 hex digest of the UTF-8 bytes of `content`.
 */
export function hashContent(content: string): string {
  return crypto.createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Session ids are a 16 hex character prefix of a digest over the creation time,
 * a monotonic high-resolution reading and a random UUID.
 */
export function generateSessionId(now: Date = new Date()): string {
  const seed = `${now.toISOString()}:${process.hrtime.bigint()}:${crypto.randomUUID()}`;
  return hashContent(seed).slice(0, 16);
}

/**
 * Length in Unicode code points, so astral characters count once.
 */
export function characterCount(text: string): number {
  return Array.from(text).length;
}

/**
 * First `length` code points of `text`.
 */
export function previewText(text: string, length: number = 500): string {
  return Array.from(text).slice(0, length).join('');
}
