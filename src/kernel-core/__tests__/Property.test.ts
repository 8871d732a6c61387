import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import { RegencyKernel } from '../Kernel.js';
import type { ClaimStatus, MutationRequest } from '../L0/Ontology.js';
import { isKernelError } from '../Errors.js';
import { REALM, makeCore, silentLogger } from './helpers.js';

// Generators
const genOrderOp = fc.record({
    op: fc.constant('order' as const),
    path: fc.constantFrom('resources.treasury', 'resources.grain'),
    delta: fc.integer({ min: -15, max: 20 }),
    duration: fc.integer({ min: 1, max: 8 })
});
const genAdvanceOp = fc.record({ op: fc.constant('advance' as const), days: fc.integer({ min: 1, max: 5 }) });
const genCancelOp = fc.record({ op: fc.constant('cancel' as const), index: fc.nat(20) });
const genTimelineOp = fc.oneof(genOrderOp, genAdvanceOp, genCancelOp);

const genClaimOp = fc.oneof(
    fc.record({
        op: fc.constant('propose' as const),
        path: fc.constantFrom('factions.rebels.strength', 'factions.rebels.morale'),
        value: fc.integer({ min: 1, max: 3 })
    }),
    fc.record({ op: fc.constant('approve' as const), index: fc.nat(15) }),
    fc.record({ op: fc.constant('deny' as const), index: fc.nat(15) }),
    fc.record({ op: fc.constant('resolve' as const), pick: fc.nat(5) })
);

/** Runs `fn`, ignoring rejections the kernel raises for bad requests. */
function attempt(fn: () => unknown) {
    try {
        fn();
    } catch (e) {
        if (!isKernelError(e)) throw e;
    }
}

function orderRequest(path: string, delta: number, durationDays: number): MutationRequest {
    return {
        kind: 'order-creation',
        origin: { tier: 'advisor', id: 'steward' },
        payload: { description: `Adjust ${path}`, durationDays, effects: [{ path, delta }] }
    };
}

describe('Kernel properties', () => {
    test('elapsed days never decrease or overrun, and effects land exactly on completion', () => {
        fc.assert(fc.property(fc.array(genTimelineOp, { maxLength: 30 }), ops => {
            const core = makeCore();
            const elapsed = new Map<string, number>();

            for (const step of ops) {
                if (step.op === 'order') {
                    core.authority.submit(orderRequest(step.path, step.delta, step.duration));
                } else if (step.op === 'advance') {
                    core.clock.advance(step.days);
                    core.orders.advance(step.days, core.authority);
                } else {
                    const target = core.orders.list()[step.index];
                    if (target) attempt(() => core.orders.cancel(target.id));
                }

                for (const order of core.orders.list()) {
                    expect(order.elapsedDays).toBeGreaterThanOrEqual(elapsed.get(order.id) ?? 0);
                    expect(order.elapsedDays).toBeLessThanOrEqual(order.durationDays);
                    elapsed.set(order.id, order.elapsedDays);
                }
            }

            const completed = core.orders.list('completed');
            const sum = (path: string) => completed.flatMap(o => o.effects).filter(e => e.path === path).reduce((acc, e) => acc + e.delta, 0);
            expect(core.world.read('resources.treasury')).toBe(500 + sum('resources.treasury'));
            expect(core.world.read('resources.grain')).toBe(1000 + sum('resources.grain'));
            expect(completed.every(o => o.elapsedDays === o.durationDays)).toBe(true);
        }));
    });

    test('terminal claims stay terminal and only approved canon adds paths', () => {
        fc.assert(fc.property(fc.array(genClaimOp, { maxLength: 40 }), ops => {
            const { claims, world } = makeCore();
            const settled = new Map<string, ClaimStatus>();

            for (const step of ops) {
                const all = claims.list();
                if (step.op === 'propose') {
                    attempt(() => claims.propose({ kind: 'assignment', path: step.path, value: step.value }, 'fuzzer'));
                } else if (step.op === 'approve') {
                    const target = all[step.index];
                    if (target) attempt(() => claims.approve(target.id));
                } else if (step.op === 'deny') {
                    const target = all[step.index];
                    if (target) attempt(() => claims.deny(target.id));
                } else {
                    const contested = claims.list('contested');
                    const first = contested[0];
                    if (first && first.statement.kind === 'assignment') {
                        const path = first.statement.path;
                        const candidates = claims.contestedOn(path).map(c => c.id);
                        const winner = step.pick < candidates.length ? candidates[step.pick] ?? 'neither' : 'neither';
                        claims.resolveContested({ winner, candidates });
                    }
                }

                for (const claim of claims.list()) {
                    const before = settled.get(claim.id);
                    if (before) expect(claim.status).toBe(before);
                    if (claim.status === 'approved' || claim.status === 'denied') settled.set(claim.id, claim.status);
                }
            }

            const canon = new Map<string, unknown>();
            for (const claim of claims.list('approved')) {
                if (claim.statement.kind !== 'assignment') continue;
                const prior = canon.get(claim.statement.path);
                if (prior !== undefined) expect(claim.statement.value).toBe(prior);
                canon.set(claim.statement.path, claim.statement.value);
            }

            for (const path of world.paths()) {
                if (Object.hasOwn(REALM, path)) continue;
                expect(canon.has(path)).toBe(true);
            }
        }));
    });

    test('identical inputs give identical sessions, and saves reload losslessly', async () => {
        await fc.assert(fc.asyncProperty(fc.array(genTimelineOp, { maxLength: 15 }), async ops => {
            const play = async () => {
                const kernel = new RegencyKernel(REALM, { logger: silentLogger() });
                for (const step of ops) {
                    if (step.op === 'order') {
                        await kernel.submit(orderRequest(step.path, step.delta, step.duration));
                    } else if (step.op === 'advance') {
                        kernel.advance(step.days);
                    } else {
                        const target = kernel.orders()[step.index];
                        if (target) attempt(() => kernel.cancel(target.id));
                    }
                }
                return kernel;
            };

            const first = await play();
            const second = await play();
            expect(second.save()).toEqual(first.save());
            expect(second.chronicle().map(e => e.entryId)).toEqual(first.chronicle().map(e => e.entryId));

            const saved = first.save();
            const reloaded = new RegencyKernel(REALM, { logger: silentLogger() });
            reloaded.load(JSON.parse(JSON.stringify(saved)));
            expect(reloaded.save()).toEqual(saved);
        }), { numRuns: 50 });
    });
});
