import fs from 'node:fs';
import path from 'node:path';
import { randomBytes } from 'node:crypto';
import { getLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const logger = getLogger();

/**
 * Write text to `filePath` atomically: write a uniquely named temp file in
 * the same directory, then rename it over the target. On failure the temp
 * file is removed, the target is left as it was, and the error is rethrown.
 */
export function atomicWriteText(filePath: string, text: string): void {
    const dir = path.dirname(filePath);
    const tempPath = path.join(dir, `.${path.basename(filePath)}.${randomBytes(6).toString('hex')}.tmp`);

    try {
        fs.writeFileSync(tempPath, text, { encoding: 'utf-8', flag: 'wx' });
        fs.renameSync(tempPath, filePath);
    } catch (error) {
        try {
            fs.rmSync(tempPath, { force: true });
        } catch (cleanupError) {
            logger.warn({ tempPath, error: errorMessage(cleanupError) }, 'Failed to remove temp file');
        }
        throw error;
    }
}

/**
 * Serialize `value` as indented JSON and write it atomically.
 */
export function atomicWriteJson(filePath: string, value: unknown): void {
    atomicWriteText(filePath, JSON.stringify(value, null, 2));
}
