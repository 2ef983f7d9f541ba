/**
 * Lowercase alphanumeric runs that stand alone as words. A run glued to
 * another letter, digit, or underscore (as in "naïve" or "foo_bar") is not
 * a token.
 */
const TOKEN_PATTERN = /(?<![\p{L}\p{N}_])[a-z0-9]+(?![\p{L}\p{N}_])/gu;

/** Single-character words kept as terms */
const SHORT_WORDS = new Set(['a', 'i']);

/**
 * Tokenize text into searchable terms.
 * - Lowercase
 * - Extract whole-word alphanumeric runs
 * - Remove single-character tokens other than "a" and "i"
 * - No stopwords, no stemming
 */
export function tokenize(text: string): string[] {
    if (!text) return [];

    const tokens = text.toLowerCase().match(TOKEN_PATTERN) ?? [];
    return tokens.filter((token) => token.length > 1 || SHORT_WORDS.has(token));
}
