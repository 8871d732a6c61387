// src/kernel-core/L0/Crypto.ts
import { createHash } from 'crypto';

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Canonical JSON: object keys sorted, undefined members dropped
export function canonicalize(value: unknown): string {
    return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
    if (Array.isArray(value)) return value.map(sortKeys);
    if (value !== null && typeof value === 'object') {
        const out: Record<string, unknown> = {};
        for (const key of Object.keys(value).sort()) {
            const member: unknown = Reflect.get(value, key);
            if (member !== undefined) out[key] = sortKeys(member);
        }
        return out;
    }
    return value;
}

export const GENESIS_HASH = '0000000000000000000000000000000000000000000000000000000000000000';
