import { createHash } from 'node:crypto';

/** Truncated sha256 hex digest, used to fingerprint rule sets and runs. */
export function contentHash(content: string, length = 16): string {
  return createHash('sha256').update(content, 'utf8').digest('hex').slice(0, length);
}
