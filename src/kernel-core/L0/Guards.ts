// src/kernel-core/L0/Guards.ts
import type { Bounds, LeafKind, LeafValue, WorldLeaf, WorldPath } from './Ontology.js';
import type { PathLock } from './PathLock.js';
import { ErrorCode, KernelError } from '../Errors.js';

// --- Guard Pattern ---
export interface GuardResult {
    ok: boolean;
    code?: ErrorCode;
    violation?: string;
    details?: Record<string, unknown>;
}

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, msg: string, details?: Record<string, unknown>): GuardResult => ({ ok: false, code, violation: msg, details });

/**
 * Throws the guard's rejection as a KernelError. Guards stay pure so the
 * Authority can evaluate them for classification without throwing.
 */
export function enforce(result: GuardResult): void {
    if (result.ok) return;
    throw new KernelError(
        result.code ?? ErrorCode.INVALID_REQUEST,
        result.violation ?? 'Guard rejected request',
        result.details
    );
}

export function leafKindOf(value: LeafValue): LeafKind {
    if (typeof value === 'number') return 'number';
    if (typeof value === 'boolean') return 'boolean';
    return 'string';
}

// --- Concrete Guards ---

const SEGMENT = /^[A-Za-z][A-Za-z0-9_]*$/;

// 1. Path Format
export const PathFormatGuard: Guard<{ path: string }> = ({ path }) => {
    if (!path) return FAIL(ErrorCode.INVALID_PATH, 'Path cannot be empty', { path });
    const segments = path.split('.');
    if (!segments.every(s => SEGMENT.test(s))) {
        return FAIL(ErrorCode.INVALID_PATH, `Path '${path}' is not valid dot-notation`, { path });
    }
    const reserved = ['__proto__', 'prototype', 'constructor'];
    if (segments.some(s => reserved.includes(s))) {
        return FAIL(ErrorCode.INVALID_PATH, `Path '${path}' uses a reserved segment`, { path });
    }
    return OK;
};

// 2. Leaf Kind (set must keep the leaf's kind)
export const LeafKindGuard: Guard<{ path: WorldPath, leaf: WorldLeaf, value: LeafValue }> = ({ path, leaf, value }) => {
    const kind = leafKindOf(value);
    if (kind !== leaf.kind) {
        return FAIL(ErrorCode.TYPE_MISMATCH, `Cannot write ${kind} to ${leaf.kind} leaf '${path}'`, { path, expected: leaf.kind, actual: kind });
    }
    return OK;
};

// 3. Numeric Leaf (delta arithmetic)
export const NumericLeafGuard: Guard<{ path: WorldPath, leaf: WorldLeaf }> = ({ path, leaf }) => {
    if (leaf.kind !== 'number') {
        return FAIL(ErrorCode.TYPE_MISMATCH, `Delta arithmetic on non-numeric leaf '${path}'`, { path, kind: leaf.kind });
    }
    return OK;
};

// 4. Bounds (value inside declared range)
export const BoundsGuard: Guard<{ path: WorldPath, value: number, bounds?: Bounds }> = ({ path, value, bounds }) => {
    if (!Number.isFinite(value)) {
        return FAIL(ErrorCode.RANGE_VIOLATION, `Non-finite value for '${path}'`, { path, value });
    }
    if (bounds?.min !== undefined && value < bounds.min) {
        return FAIL(ErrorCode.RANGE_VIOLATION, `'${path}' would fall to ${value}, below minimum ${bounds.min}`, { path, value, min: bounds.min });
    }
    if (bounds?.max !== undefined && value > bounds.max) {
        return FAIL(ErrorCode.RANGE_VIOLATION, `'${path}' would rise to ${value}, above maximum ${bounds.max}`, { path, value, max: bounds.max });
    }
    return OK;
};

// 5. Leaf Declaration (new leaf: bounds well-formed and containing the value)
export const DeclarationGuard: Guard<{ path: WorldPath, value: LeafValue, bounds?: Bounds }> = ({ path, value, bounds }) => {
    if (typeof value !== 'number') {
        if (bounds && (bounds.min !== undefined || bounds.max !== undefined)) {
            return FAIL(ErrorCode.TYPE_MISMATCH, `Bounds declared on non-numeric leaf '${path}'`, { path });
        }
        return OK;
    }
    if (bounds?.min !== undefined && bounds.max !== undefined && bounds.min > bounds.max) {
        return FAIL(ErrorCode.RANGE_VIOLATION, `Empty range for '${path}': ${bounds.min} > ${bounds.max}`, { path, ...bounds });
    }
    return BoundsGuard({ path, value, bounds });
};

// 6. Duration (positive whole days)
export const DurationGuard: Guard<{ days: number, max?: number }> = ({ days, max }) => {
    if (!Number.isInteger(days) || days <= 0) {
        return FAIL(ErrorCode.INVALID_DURATION, `Duration must be a positive whole number of days, got ${days}`, { days });
    }
    if (max !== undefined && days > max) {
        return FAIL(ErrorCode.INVALID_DURATION, `Cannot span more than ${max} days at once, got ${days}`, { days, max });
    }
    return OK;
};

// 7. Finite Delta
export const DeltaGuard: Guard<{ path: WorldPath, delta: number }> = ({ path, delta }) => {
    if (typeof delta !== 'number' || !Number.isFinite(delta)) {
        return FAIL(ErrorCode.TYPE_MISMATCH, `Delta for '${path}' must be a finite number`, { path });
    }
    return OK;
};

// 8. Lock (paths under arbitration are frozen)
export const LockGuard: Guard<{ paths: WorldPath[], lock: PathLock }> = ({ paths, lock }) => {
    const blocked = lock.blocked(paths);
    if (blocked.length > 0) {
        return FAIL(ErrorCode.PATH_LOCKED, `Paths under arbitration: ${blocked.join(', ')}`, { paths: blocked });
    }
    return OK;
};
