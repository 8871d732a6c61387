import type { LeafValue, OrderEffect, WorldPath } from '../L0/Ontology.js';
import { DurationGuard, enforce } from '../L0/Guards.js';
import { WorldStateStore } from '../L2/State.js';
import { ErrorCode, KernelError, isKernelError } from '../Errors.js';
import type { EffectWriter } from './Orders.js';

/** What a rule may look at when deciding its effects for a day. */
export interface DayView {
    day: number;
    read(path: WorldPath): LeafValue;
    has(path: WorldPath): boolean;
}

export interface DayRule {
    id: string;
    description?: string;
    /** Deltas for `view.day`, applied in the order returned. */
    effects(view: DayView): OrderEffect[];
}

export interface RuleEffect {
    ruleId: string;
    day: number;
    path: WorldPath;
    delta: number;
    previous: number;
    current: number;
}

export interface RuleFailure {
    ruleId: string;
    day: number;
    path?: WorldPath;
    code: string;
    message: string;
}

export interface DayRuleReport {
    applied: RuleEffect[];
    failures: RuleFailure[];
}

/**
 * Rules that run once per elapsed day, in registration order, after that
 * day's orders. Their deltas go through the same writer as order effects
 * and are best-effort in the same way: a failure is reported and the next
 * effect still runs.
 */
export class DayRuleBook {
    private rules: DayRule[] = [];

    constructor(private world: WorldStateStore) { }

    public register(rule: DayRule) {
        if (!rule.id.trim()) {
            throw new KernelError(ErrorCode.INVALID_REQUEST, 'Day rule id cannot be empty');
        }
        if (this.rules.some(r => r.id === rule.id)) {
            throw new KernelError(ErrorCode.INVALID_REQUEST, `Day rule '${rule.id}' is already registered`, { id: rule.id });
        }
        this.rules.push(rule);
    }

    public unregister(id: string): boolean {
        const before = this.rules.length;
        this.rules = this.rules.filter(r => r.id !== id);
        return this.rules.length < before;
    }

    public list(): string[] {
        return this.rules.map(r => r.id);
    }

    public run(day: number, writer: EffectWriter, into: DayRuleReport = { applied: [], failures: [] }): DayRuleReport {
        const view: DayView = {
            day,
            read: path => this.world.read(path),
            has: path => this.world.has(path)
        };

        for (const rule of this.rules) {
            let effects: OrderEffect[];
            try {
                effects = rule.effects(view);
            } catch (e) {
                if (!isKernelError(e)) throw e;
                into.failures.push({ ruleId: rule.id, day, code: e.code, message: e.message });
                continue;
            }

            for (const effect of effects) {
                try {
                    const result = writer.applyEffect(`rule:${rule.id}`, effect);
                    into.applied.push({
                        ruleId: rule.id,
                        day,
                        path: effect.path,
                        delta: effect.delta,
                        previous: Number(result.previous),
                        current: Number(result.current)
                    });
                } catch (e) {
                    if (!isKernelError(e)) throw e;
                    into.failures.push({ ruleId: rule.id, day, path: effect.path, code: e.code, message: e.message });
                }
            }
        }
        return into;
    }
}

/** A fixed delta on one path every `everyDays` days (day numbers divisible by it). */
export function periodicDelta(options: { id: string; path: WorldPath; delta: number; everyDays?: number; description?: string }): DayRule {
    const every = options.everyDays ?? 1;
    enforce(DurationGuard({ days: every }));
    const rule: DayRule = {
        id: options.id,
        effects: ({ day }) => (day % every === 0 ? [{ path: options.path, delta: options.delta }] : [])
    };
    if (options.description) rule.description = options.description;
    return rule;
}
