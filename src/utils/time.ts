import { ResearchError } from './errors.js';

const TIMESPAN_PATTERN = /^(\d+)([dwmh])$/;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/** Widest span a Date can represent back from the epoch. */
const MAX_TIMESPAN_MS = 8.64e15;

const UNIT_MS: Record<string, number> = {
    h: HOUR_MS,
    d: DAY_MS,
    w: 7 * DAY_MS,
    m: 30 * DAY_MS,
};

/**
 * Parse a timespan like "7d", "1w", "24h", or "3m" (30-day months) into milliseconds.
 */
export function parseTimespan(timespan: string): number {
    const normalized = timespan.trim().toLowerCase();
    const match = TIMESPAN_PATTERN.exec(normalized);
    if (!match?.[1] || !match[2]) {
        throw new ResearchError(
            'INVALID_ARGUMENT',
            `Invalid timespan format: '${normalized}'. Use: 1d, 7d, 14d, 30d, 1w, 24h`
        );
    }

    const value = parseInt(match[1], 10);
    if (value <= 0) {
        throw new ResearchError('INVALID_ARGUMENT', 'Timespan value must be positive');
    }

    const span = value * (UNIT_MS[match[2]] ?? DAY_MS);
    if (!Number.isFinite(span) || span > MAX_TIMESPAN_MS) {
        throw new ResearchError('INVALID_ARGUMENT', `Timespan too large: '${normalized}'`);
    }
    return span;
}

const ZONE_SUFFIX = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;

/**
 * Parse an ISO-8601 timestamp. Timestamps without a zone are read as UTC.
 * Returns null when unparseable.
 */
export function parseTimestamp(value: string): Date | null {
    if (!value) return null;
    const withZone = value.includes('T') && !ZONE_SUFFIX.test(value) ? `${value}Z` : value;
    const time = Date.parse(withZone);
    return isNaN(time) ? null : new Date(time);
}

/** YYYY-MM-DD in UTC */
export function formatDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/** YYYYMMDD in UTC */
export function formatCompactDate(date: Date): string {
    return formatDate(date).replace(/-/g, '');
}

/** YYYYMMDDHHMMSS in UTC */
export function formatCompactTimestamp(date: Date): string {
    return date.toISOString().slice(0, 19).replace(/[-T:]/g, '');
}

export function nowIso(): string {
    return new Date().toISOString();
}
