/**
 * Regency Kernel Error Taxonomy
 * Centralized error codes for rejected requests. Every code is local to a
 * single request: the session keeps running after any of them.
 */

export enum ErrorCode {
    // I. Data Model
    PATH_NOT_FOUND = 'PATH_NOT_FOUND',
    RANGE_VIOLATION = 'RANGE_VIOLATION',
    TYPE_MISMATCH = 'TYPE_MISMATCH',
    PATH_ALREADY_EXISTS = 'PATH_ALREADY_EXISTS',
    INVALID_PATH = 'INVALID_PATH',

    // II. State Machines
    INVALID_TRANSITION = 'INVALID_TRANSITION',
    INVALID_DURATION = 'INVALID_DURATION',
    NOT_CONTESTED = 'NOT_CONTESTED',
    PATH_LOCKED = 'PATH_LOCKED',
    UNKNOWN_ID = 'UNKNOWN_ID',

    // III. External Contracts
    ARBITRATION_PARSE_ERROR = 'ARBITRATION_PARSE_ERROR',
    GENERATION_UNAVAILABLE = 'GENERATION_UNAVAILABLE',
    INVALID_REQUEST = 'INVALID_REQUEST',
    CORRUPT_SNAPSHOT = 'CORRUPT_SNAPSHOT',
}

export class KernelError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata: Record<string, unknown> = {}
    ) {
        super(`[Regency:${code}] ${message}`);
        this.name = 'KernelError';
    }
}

export function isKernelError(e: unknown, code?: ErrorCode): e is KernelError {
    return e instanceof KernelError && (code === undefined || e.code === code);
}
