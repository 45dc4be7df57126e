import { createHash } from 'node:crypto';

/**
 * Computes a SHA-256 hash of a statement's text.
 * Returns the hash prefixed with 'sha256:'.
 */
export function hashText(text: string): string {
    const hash = createHash('sha256').update(text, 'utf8').digest('hex');
    return `sha256:${hash}`;
}
