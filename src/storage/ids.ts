/**
 * Canonical arXiv identifier: YYMM.NNNN or YYMM.NNNNN, no version suffix.
 */
const ARXIV_ID_PATTERN = /^[0-9]{4}\.[0-9]{4,5}$/;

/**
 * True only for a full match of the canonical ID shape.
 * Anything that could escape a directory (`..`, `/`, `\`, `C:`) fails the pattern.
 */
export function isValidArxivId(id: unknown): id is string {
    return typeof id === 'string' && ARXIV_ID_PATTERN.test(id);
}

const MAX_USERNAME_LENGTH = 50;

/**
 * Make a user-supplied name safe to embed in a file name.
 * Dots are replaced along with everything else, so no `..` survives.
 */
export function sanitizeUsername(username: string): string {
    const sanitized = username.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, MAX_USERNAME_LENGTH);
    return sanitized || 'anonymous';
}

/**
 * First canonical ID embedded in a URL or string.
 * "http://arxiv.org/abs/2401.12345v2" → "2401.12345"
 */
export function extractArxivId(input: string | null | undefined): string | null {
    if (!input) return null;
    const match = /(\d{4}\.\d{4,5})/.exec(input);
    return match?.[1] ?? null;
}
