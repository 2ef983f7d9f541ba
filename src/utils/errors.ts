/**
 * Stable error codes reported in the `error.code` field of failed commands.
 */
export type ErrorCode =
    | 'INDEX_NOT_FOUND'
    | 'INVALID_INDEX'
    | 'INVALID_QUERY'
    | 'DATA_DIR_NOT_FOUND'
    | 'INVALID_PAPER_ID'
    | 'PAPER_NOT_FOUND'
    | 'PAPER_NOT_IN_COLLECTION'
    | 'INVALID_ARGUMENT'
    | 'INVALID_INPUT'
    | 'INPUT_NOT_FOUND'
    | 'INVALID_JSON'
    | 'ARXIV_API_UNAVAILABLE'
    | 'UPDATE_FAILED'
    | 'METADATA_ERROR'
    | 'NO_SUMMARY'
    | 'INVALID_CONTENT'
    | 'CONTENT_TOO_LONG'
    | 'SAVE_FAILED'
    | 'FILE_NOT_FOUND'
    | 'INVALID_PACKAGE'
    | 'INVALID_ZIP'
    | 'FILE_ERROR'
    | 'UNKNOWN_ERROR';

/**
 * Top-level failure of a command, carrying a machine-readable code.
 */
export class ResearchError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly details: string | null = null
    ) {
        super(message);
        this.name = 'ResearchError';
    }
}

export const INVALID_ID_DETAILS = 'arXiv ID must be in format YYMM.NNNNN (e.g., 2401.12345)';

export function invalidPaperId(paperId: string): ResearchError {
    return new ResearchError('INVALID_PAPER_ID', `Invalid arXiv ID format: ${paperId}`, INVALID_ID_DETAILS);
}

/**
 * Node system error code (ENOENT, EACCES, ...) if the value carries one.
 */
export function systemErrorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
