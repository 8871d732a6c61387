// src/kernel-core/L0/Invariants.ts
import type { SessionSnapshot } from './Ontology.js';
import { BoundsGuard, PathFormatGuard, leafKindOf } from './Guards.js';
import { sequenceNumber } from './Primitives.js';

export interface Invariant {
    id: string;
    boundary: string; // The named boundary (e.g. "World Integrity")
    description: string;
    predicate: (session: SessionSnapshot) => boolean;
}

export interface Rejection {
    invariantId: string;
    boundary: string;
    message: string;
}

// I. World Integrity
export const WORLD_LEAF_KINDS: Invariant = {
    id: 'world-leaf-kinds',
    boundary: 'World Integrity',
    description: 'Every leaf holds a value of its declared kind; only numeric leaves carry bounds',
    predicate: ({ world }) => Object.values(world.leaves).every(leaf =>
        leafKindOf(leaf.value) === leaf.kind && (leaf.bounds === undefined || leaf.kind === 'number')
    )
};

export const WORLD_BOUNDS: Invariant = {
    id: 'world-bounds',
    boundary: 'World Integrity',
    description: 'Every numeric leaf is finite and within its bounds',
    predicate: ({ world }) => Object.entries(world.leaves).every(([path, leaf]) =>
        typeof leaf.value !== 'number' || BoundsGuard({ path, value: leaf.value, bounds: leaf.bounds }).ok
    )
};

export const WORLD_PATHS: Invariant = {
    id: 'world-paths',
    boundary: 'World Integrity',
    description: 'Every path is well-formed and no leaf sits under another leaf',
    predicate: ({ world }) => {
        const paths = Object.keys(world.leaves);
        const set = new Set(paths);
        return paths.every(path => {
            if (!PathFormatGuard({ path }).ok) return false;
            const segments = path.split('.');
            for (let i = 1; i < segments.length; i++) {
                if (set.has(segments.slice(0, i).join('.'))) return false;
            }
            return true;
        });
    }
};

// II. Order Lifecycle
export const ORDER_ELAPSED: Invariant = {
    id: 'order-elapsed',
    boundary: 'Order Lifecycle',
    description: 'Elapsed days never exceed the duration',
    predicate: ({ orders }) => orders.every(o => o.elapsedDays >= 0 && o.elapsedDays <= o.durationDays)
};

export const ORDER_COMPLETION: Invariant = {
    id: 'order-completion',
    boundary: 'Order Lifecycle',
    description: 'An order is completed exactly when its elapsed days reach its duration',
    predicate: ({ orders }) => orders.every(o => {
        if (o.status === 'completed') return o.elapsedDays === o.durationDays;
        if (o.status === 'active') return o.elapsedDays < o.durationDays;
        return true;
    })
};

// III. Claim Consistency
export const CLAIM_SINGLE_CANON: Invariant = {
    id: 'claim-single-canon',
    boundary: 'Claim Consistency',
    description: 'No two approved claims assign different values to one path',
    predicate: ({ claims }) => {
        const canon = new Map<string, unknown>();
        for (const claim of claims) {
            if (claim.status !== 'approved' || claim.statement.kind !== 'assignment') continue;
            const { path, value } = claim.statement;
            if (canon.has(path) && canon.get(path) !== value) return false;
            canon.set(path, value);
        }
        return true;
    }
};

export const CLAIM_CONTEST_ESCALATED: Invariant = {
    id: 'claim-contest-escalated',
    boundary: 'Claim Consistency',
    description: 'Every contested claim belongs to an unresolved escalation',
    predicate: ({ claims, escalations }) => claims
        .filter(c => c.status === 'contested')
        .every(c => escalations.some(e => e.status !== 'resolved' && e.claimIds.includes(c.id)))
};

// IV. Identity
export const IDS_ISSUED: Invariant = {
    id: 'ids-issued',
    boundary: 'Identity',
    description: 'Ids are unique and none is ahead of its sequence',
    predicate: ({ claims, orders, pendingApprovals, escalations, sequences }) => {
        const groups: [string[], number][] = [
            [claims.map(c => c.id), sequences.claim],
            [orders.map(o => o.id), sequences.order],
            [pendingApprovals.map(p => p.id), sequences.request],
            [escalations.map(e => e.id), sequences.escalation]
        ];
        return groups.every(([ids, counter]) =>
            new Set(ids).size === ids.length &&
            ids.every(id => {
                const n = sequenceNumber(id);
                return Number.isInteger(n) && n >= 1 && n <= counter;
            })
        );
    }
};

export const SESSION_INVARIANTS: Invariant[] = [
    WORLD_LEAF_KINDS,
    WORLD_BOUNDS,
    WORLD_PATHS,
    ORDER_ELAPSED,
    ORDER_COMPLETION,
    CLAIM_SINGLE_CANON,
    CLAIM_CONTEST_ESCALATED,
    IDS_ISSUED
];

export function checkInvariants(session: SessionSnapshot): { ok: boolean; rejection?: Rejection } {
    for (const inv of SESSION_INVARIANTS) {
        if (!inv.predicate(session)) {
            return {
                ok: false,
                rejection: {
                    invariantId: inv.id,
                    boundary: inv.boundary,
                    message: `Invariant Violation: ${inv.description}`
                }
            };
        }
    }
    return { ok: true };
}
