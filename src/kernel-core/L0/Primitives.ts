import type { Sequences } from './Ontology.js';

/**
 * Day counter for one session. Only the kernel's advance moves it forward.
 */
export class GameClock {
    constructor(private current: number = 0) { }

    public get tick() { return this.current; }

    public advance(days: number): number {
        this.current += days;
        return this.current;
    }

    public reset(tick: number) {
        this.current = tick;
    }
}

export type SequenceName = keyof Sequences;

/**
 * Monotonic id sources, one per entity kind: claim-1, claim-2, ...
 */
export class Sequence {
    private counters: Sequences = { claim: 0, order: 0, request: 0, escalation: 0 };

    public next(name: SequenceName): string {
        this.counters[name] += 1;
        return `${name}-${this.counters[name]}`;
    }

    public snapshot(): Sequences {
        return { ...this.counters };
    }

    public restore(counters: Sequences) {
        this.counters = { ...counters };
    }
}

/** Numeric part of a sequence id, or NaN. */
export function sequenceNumber(id: string): number {
    const dash = id.lastIndexOf('-');
    return dash < 0 ? NaN : Number(id.slice(dash + 1));
}
