const WHITESPACE = new Set([' ', '\n', '\t']);

function isWhitespace(char: string | undefined): boolean {
    return char !== undefined && WHITESPACE.has(char);
}

/**
 * Extract a short excerpt around the earliest occurrence of any term,
 * widened to whole words and marked with "..." where text was cut.
 * Without a match, the start of the text is returned instead.
 */
export function extractExcerpt(
    terms: readonly string[],
    text: string,
    maxLength = 150,
    context = 50
): string {
    if (!text || terms.length === 0) return '';

    const lower = text.toLowerCase();
    let bestPos = text.length;
    let matched = '';

    for (const term of terms) {
        const pos = lower.indexOf(term);
        if (pos !== -1 && pos < bestPos) {
            bestPos = pos;
            matched = term;
        }
    }

    if (bestPos === text.length) {
        if (text.length <= maxLength) return text.trim();
        return `${text.slice(0, maxLength).trim()}...`;
    }

    let start = Math.max(0, bestPos - context);
    let end = Math.min(text.length, bestPos + matched.length + context);

    if (start > 0) {
        while (start > 0 && !isWhitespace(text[start])) start--;
        start++;
    }

    if (end < text.length) {
        while (end < text.length && !isWhitespace(text[end])) end++;
    }

    const prefix = start > 0 ? '...' : '';
    const suffix = end < text.length ? '...' : '';
    return `${prefix}${text.slice(start, end).trim()}${suffix}`;
}
