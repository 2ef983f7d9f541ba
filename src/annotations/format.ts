import type { Annotation, AnnotationFormat } from '../types/index.js';
import { parseTimestamp } from '../utils/time.js';

const RULE = '-'.repeat(40);
const DOUBLE_RULE = '='.repeat(40);

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1);
}

/** "YYYY-MM-DD HH:MM" in UTC, or the raw value when it does not parse */
function displayDate(value: string): string {
    const date = parseTimestamp(value);
    if (!date) return value;
    return date.toISOString().slice(0, 16).replace('T', ' ');
}

export function formatAnnotationText(annotation: Annotation): string {
    return [
        `[${annotation.type.toUpperCase()}] by ${annotation.author}`,
        `Created: ${annotation.created_at}`,
        '',
        annotation.content,
        '',
        RULE,
    ].join('\n');
}

export function formatAnnotationMarkdown(annotation: Annotation): string {
    return [
        `### ${capitalize(annotation.type)}`,
        '',
        `**Author:** ${annotation.author}  `,
        `**Created:** ${displayDate(annotation.created_at)}`,
        '',
        annotation.content,
        '',
        '---',
        '',
    ].join('\n');
}

/**
 * Render a paper's annotations. `json` yields the document that the
 * command prints; the other formats yield plain text.
 */
export function formatAnnotations(annotations: readonly Annotation[], paperId: string, format: AnnotationFormat): string {
    switch (format) {
        case 'json':
            return JSON.stringify({ paper_id: paperId, count: annotations.length, annotations }, null, 2);
        case 'markdown':
            return [
                `# Annotations for Paper ${paperId}`,
                '',
                `**Total annotations:** ${annotations.length}`,
                '',
                '---',
                '',
                ...annotations.map(formatAnnotationMarkdown),
            ].join('\n');
        case 'text':
            return [
                `Annotations for Paper ${paperId}`,
                `Total: ${annotations.length}`,
                DOUBLE_RULE,
                '',
                ...annotations.map(formatAnnotationText),
            ].join('\n');
    }
}
