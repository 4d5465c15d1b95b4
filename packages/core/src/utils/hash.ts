import { createHash } from 'node:crypto';

/**
 * Create a SHA-256 hex digest for a string or byte buffer.
 */
export function sha256Hex(data: string | Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}
