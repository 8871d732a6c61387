// src/kernel-core/L5/Audit.ts
import { hash, canonicalize, GENESIS_HASH } from '../L0/Crypto.js';

/**
 * Event Store Port (declared here so the kernel does not depend on the
 * platform layer; Platform/Ports re-exports it).
 */
export interface IEventStore {
    append(entry: ChronicleEntry): void;
    getHistory(): ChronicleEntry[];
    getLatest(): ChronicleEntry | null;
}

export const CHRONICLE_KINDS = [
    'REQUEST_APPLIED',
    'REQUEST_QUEUED',
    'REQUEST_REJECTED',
    'REQUEST_APPROVED',
    'REQUEST_DENIED',
    'ORDER_CREATED',
    'ORDER_COMPLETED',
    'ORDER_CANCELLED',
    'EFFECT_FAILED',
    'CLAIM_PROPOSED',
    'CLAIM_APPROVED',
    'CLAIM_DENIED',
    'CLAIM_CONTESTED',
    'ESCALATION_OPENED',
    'ESCALATION_RESOLVED',
    'ESCALATION_FAILED',
    'TIME_ADVANCED',
    'SESSION_LOADED'
] as const;

export type ChronicleKind = typeof CHRONICLE_KINDS[number];

// --- Chronicle entry: what happened, to what, by whom, on which day ---
export interface ChronicleEntry {
    entryId: string; // The identifying hash
    previousEntryId: string; // Chain linkage
    sequence: number;
    tick: number;
    kind: ChronicleKind;
    subject: string; // Claim, order, request, escalation id or world path
    actor: string;
    detail: Record<string, unknown>;
}

export interface ChronicleInput {
    kind: ChronicleKind;
    subject: string;
    actor: string;
    tick: number;
    detail?: Record<string, unknown>;
}

/**
 * Chronicle: the append-only, hash-chained record of every decision the
 * kernel makes. Narrative generation reads it; nothing in the kernel reads it
 * back to decide anything.
 */
export class Chronicle {
    private localChain: ChronicleEntry[] = [];

    constructor(private store?: IEventStore) {
        this.localChain = store?.getHistory() ?? [];
    }

    public append(input: ChronicleInput): ChronicleEntry {
        const latest = this.localChain[this.localChain.length - 1];
        const previousEntryId = latest ? latest.entryId : GENESIS_HASH;
        const sequence = latest ? latest.sequence + 1 : 1;
        const detail = input.detail ?? {};

        const entry: ChronicleEntry = {
            entryId: this.calculateHash(previousEntryId, sequence, input.tick, input.kind, input.subject, input.actor, detail),
            previousEntryId,
            sequence,
            tick: input.tick,
            kind: input.kind,
            subject: input.subject,
            actor: input.actor,
            detail
        };

        Object.freeze(entry);

        this.store?.append(entry);
        this.localChain.push(entry);
        return entry;
    }

    public getHistory(): ChronicleEntry[] {
        return [...this.localChain];
    }

    public recent(count: number): ChronicleEntry[] {
        return this.localChain.slice(-count);
    }

    public since(tick: number): ChronicleEntry[] {
        return this.localChain.filter(e => e.tick >= tick);
    }

    public about(subject: string): ChronicleEntry[] {
        return this.localChain.filter(e => e.subject === subject);
    }

    public getTip(): ChronicleEntry | null {
        return this.localChain[this.localChain.length - 1] ?? null;
    }

    public verifyChain(): boolean {
        let prev = GENESIS_HASH;

        for (const entry of this.localChain) {
            // 1. Linkage
            if (entry.previousEntryId !== prev) return false;
            // 2. Content
            const h = this.calculateHash(prev, entry.sequence, entry.tick, entry.kind, entry.subject, entry.actor, entry.detail);
            if (h !== entry.entryId) return false;

            prev = entry.entryId;
        }
        return true;
    }

    private calculateHash(
        prevHash: string,
        sequence: number,
        tick: number,
        kind: ChronicleKind,
        subject: string,
        actor: string,
        detail: Record<string, unknown>
    ): string {
        const canonical: [string, number, number, string, string, string, string] = [
            prevHash,
            sequence,
            tick,
            kind,
            subject,
            actor,
            hash(canonicalize(detail))
        ];
        return hash(canonicalize(canonical));
    }
}
