import { createHash } from 'node:crypto';

/**
 * SHA-256 hex digest of the text, used as a stable chapter id
 */
export function contentHash(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}
