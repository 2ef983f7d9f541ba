import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { formatCompactDate, formatCompactTimestamp, formatDate, parseTimespan, parseTimestamp } from '../utils/time.js';
import { resolveConfig } from '../utils/config.js';
import { thrownBy } from './helpers.js';

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;

describe('parseTimespan', () => {
    it('should read hours, days, weeks and months', () => {
        expect(parseTimespan('24h')).toBe(24 * HOUR);
        expect(parseTimespan('7d')).toBe(7 * DAY);
        expect(parseTimespan('2w')).toBe(14 * DAY);
        expect(parseTimespan('3m')).toBe(90 * DAY);
    });

    it('should ignore case and surrounding whitespace', () => {
        expect(parseTimespan(' 2D ')).toBe(2 * DAY);
    });

    it('should reject malformed and zero spans', () => {
        expect(thrownBy(() => parseTimespan('week'))).toMatchObject({
            code: 'INVALID_ARGUMENT',
            message: "Invalid timespan format: 'week'. Use: 1d, 7d, 14d, 30d, 1w, 24h",
        });
        expect(thrownBy(() => parseTimespan('-1d'))).toMatchObject({ code: 'INVALID_ARGUMENT' });
        expect(thrownBy(() => parseTimespan('0d'))).toMatchObject({ message: 'Timespan value must be positive' });
    });

    it('should reject spans wider than a date can hold', () => {
        expect(thrownBy(() => parseTimespan('99999999999d'))).toMatchObject({
            code: 'INVALID_ARGUMENT',
            message: "Timespan too large: '99999999999d'",
        });
        expect(parseTimespan('100000000d')).toBe(100000000 * DAY);
    });
});

describe('timestamps', () => {
    it('should read timestamps without a zone as UTC', () => {
        expect(parseTimestamp('2024-01-20T10:00:00')?.toISOString()).toBe('2024-01-20T10:00:00.000Z');
        expect(parseTimestamp('2024-01-20T10:00:00+02:00')?.toISOString()).toBe('2024-01-20T08:00:00.000Z');
        expect(parseTimestamp('2024-01-20')?.toISOString()).toBe('2024-01-20T00:00:00.000Z');
    });

    it('should return null for unparseable values', () => {
        expect(parseTimestamp('')).toBeNull();
        expect(parseTimestamp('not a date')).toBeNull();
    });

    it('should format dates in UTC', () => {
        const date = new Date('2024-01-20T10:30:45.123Z');
        expect(formatDate(date)).toBe('2024-01-20');
        expect(formatCompactDate(date)).toBe('20240120');
        expect(formatCompactTimestamp(date)).toBe('20240120103045');
    });
});

describe('resolveConfig', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-'));
        vi.stubEnv('PAPER_RESEARCHER_DATA_DIR', '');
        vi.stubEnv('PAPER_RESEARCHER_USERNAME', '');
        vi.stubEnv('USER', '');
        vi.stubEnv('LOG_LEVEL', '');
    });

    afterEach(() => {
        vi.unstubAllEnvs();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    function writeConfig(value: unknown): void {
        fs.writeFileSync(path.join(dir, 'paper-researcher.config.json'), JSON.stringify(value));
    }

    it('should use defaults without a config file', async () => {
        const config = await resolveConfig({}, { searchFrom: dir });
        expect(config).toEqual({
            dataDir: './data',
            logLevel: 'info',
            jsonLogs: false,
            username: 'anonymous',
            searchLimit: 10,
            highlyCitedTop: 10,
            arxiv: { maxResults: 50, days: 7 },
            http: { timeoutMs: 30000 },
        });
    });

    it('should layer file, environment and flags', async () => {
        writeConfig({ dataDir: 'file-data', username: 'file-user', searchLimit: 5, arxiv: { days: 3 } });
        vi.stubEnv('PAPER_RESEARCHER_USERNAME', 'env-user');
        vi.stubEnv('LOG_LEVEL', 'debug');

        const config = await resolveConfig({ dataDir: 'cli-data' }, { searchFrom: dir });

        expect(config).toMatchObject({
            dataDir: 'cli-data',
            username: 'env-user',
            logLevel: 'debug',
            searchLimit: 5,
            arxiv: { maxResults: 50, days: 3 },
        });
    });

    it('should take the login name over the default username only', async () => {
        vi.stubEnv('USER', 'login-name');
        expect((await resolveConfig({}, { searchFrom: dir })).username).toBe('login-name');

        writeConfig({ username: 'file-user' });
        expect((await resolveConfig({}, { searchFrom: dir })).username).toBe('file-user');
    });

    it('should fall back to defaults for an invalid config file', async () => {
        writeConfig({ searchLimit: -1 });
        const config = await resolveConfig({}, { searchFrom: dir });
        expect(config.searchLimit).toBe(10);
    });
});
