import { describe, test, expect, beforeEach } from '@jest/globals';
import { RegencyKernel } from '../Kernel.js';
import type { KernelOptions } from '../Kernel.js';
import type { GenerationService, MutationRequest, SessionSnapshot } from '../L0/Ontology.js';
import { periodicDelta } from '../L3/DayRules.js';
import type { DayRule } from '../L3/DayRules.js';
import { canonicalize, hash } from '../L0/Crypto.js';
import { ErrorCode, isKernelError } from '../Errors.js';
import { REALM, ScriptedGeneration, assignment, codeOf, codeOfAsync, silentLogger } from './helpers.js';

function session(options: KernelOptions = {}) {
    return new RegencyKernel(REALM, { logger: silentLogger(), ...options });
}

function resealed(snapshot: SessionSnapshot): SessionSnapshot {
    const { checksum: _previous, ...body } = snapshot;
    return { ...body, checksum: hash(canonicalize(body)) };
}

const fundFleet: MutationRequest = {
    kind: 'order-creation',
    origin: { tier: 'advisor', id: 'admiral' },
    payload: { description: 'Fund the fleet', durationDays: 3, effects: [{ path: 'resources.treasury', delta: -110 }] }
};

/** Holds every arbitration reply until the test answers. */
class HeldGeneration implements GenerationService {
    public calls = 0;
    private release: (reply: string) => void = () => undefined;
    private readonly reply = new Promise<string>(resolve => { this.release = resolve; });

    async generate(): Promise<string> {
        this.calls++;
        return this.reply;
    }

    public answer(text: string) {
        this.release(text);
    }
}

/** The fleet order exceeds the default major-change threshold, so it is queued and approved. */
async function fundTheFleet(k: RegencyKernel) {
    const queued = await k.submit(fundFleet);
    k.approve(queued.requestId);
}

describe('Regency Kernel', () => {
    let kernel: RegencyKernel;

    beforeEach(() => {
        kernel = session();
    });

    describe('sessions', () => {
        test('an order applies its effects only on completion', async () => {
            const queued = await kernel.submit(fundFleet);
            expect(queued).toMatchObject({ disposition: 'queued', tier: 'structural' });
            kernel.approve(queued.requestId);

            const first = kernel.advance(2);
            expect(first.tick).toBe(2);
            expect(kernel.orders()[0]).toMatchObject({ id: 'order-1', status: 'active', elapsedDays: 2 });
            expect(kernel.read('resources.treasury')).toBe(500);

            const second = kernel.advance(1);
            expect(second.report.completed.map(o => o.id)).toEqual(['order-1']);
            expect(kernel.orders()[0]).toMatchObject({ status: 'completed', elapsedDays: 3, completedAtTick: 3 });
            expect(kernel.read('resources.treasury')).toBe(390);
        });

        test('conflicting claims are settled by arbitration', async () => {
            const generation = new ScriptedGeneration(['claim-1']);
            kernel = session({ generation, autoArbitrate: false });

            const a = await kernel.submit(assignment('factions.rebels.exists', true, 'spymaster'));
            expect(a).toMatchObject({ disposition: 'claim-registered', claim: { status: 'pending' } });
            const b = await kernel.submit(assignment('factions.rebels.exists', false, 'marshal'));
            expect(b).toMatchObject({ disposition: 'escalated', escalation: { id: 'escalation-1' } });
            expect(kernel.claims('contested').map(c => c.id)).toEqual(['claim-1', 'claim-2']);

            const verdict = await kernel.retryEscalation('escalation-1');

            expect(verdict.winner).toBe('claim-1');
            expect(kernel.claims().map(c => c.status)).toEqual(['approved', 'denied']);
            expect(kernel.read('factions.rebels.exists')).toBe(true);
        });

        test('a large structural change is queued and denying it changes nothing', async () => {
            const outcome = await kernel.submit({
                kind: 'structural-change',
                origin: { tier: 'advisor', id: 'steward' },
                payload: { op: 'delta', path: 'resources.treasury', delta: -250 }
            });

            expect(outcome).toMatchObject({ disposition: 'queued', requestId: 'request-1' });
            expect(kernel.pendingApprovals().map(p => p.id)).toEqual(['request-1']);

            const denial = kernel.deny('request-1');
            expect(denial.target).toBe('request');
            expect(kernel.read('resources.treasury')).toBe(500);
            expect(kernel.pendingApprovals()).toEqual([]);
        });
    });

    describe('automatic arbitration', () => {
        test('a new escalation is arbitrated before the request returns', async () => {
            const generation = new ScriptedGeneration(['{"winner": "claim-2", "reasoning": "The marshal saw the camp"}']);
            kernel = session({ generation });

            await kernel.submit(assignment('factions.rebels.exists', false, 'spymaster'));
            const outcome = await kernel.submit(assignment('factions.rebels.exists', true, 'marshal'));

            expect(outcome).toMatchObject({
                disposition: 'escalated',
                claim: { id: 'claim-2', status: 'approved' },
                escalation: { status: 'resolved' },
                verdict: { winner: 'claim-2', reasoning: 'The marshal saw the camp' }
            });
            expect(kernel.read('factions.rebels.exists')).toBe(true);
        });

        test('a failed arbitration leaves the claims contested until a retry', async () => {
            const generation = new ScriptedGeneration(['Both sound plausible to me.']);
            kernel = session({ generation });

            await kernel.submit(assignment('factions.rebels.exists', false, 'spymaster'));
            const outcome = await kernel.submit(assignment('factions.rebels.exists', true, 'marshal'));

            expect(outcome).toMatchObject({ disposition: 'escalated', escalation: { status: 'failed', attempts: 1 } });
            expect('verdict' in outcome).toBe(false);
            expect(kernel.claims('contested')).toHaveLength(2);

            generation.push('neither');
            await kernel.retryEscalation('escalation-1');
            expect(kernel.claims('denied')).toHaveLength(2);
            expect(kernel.escalations('resolved')).toHaveLength(1);
        });

        test('while arbitration is pending only the contested path is locked', async () => {
            const generation = new HeldGeneration();
            kernel = session({ generation });

            await kernel.submit(assignment('population.capital.morale', 80, 'spymaster'));
            const contest = kernel.submit(assignment('population.capital.morale', 45, 'marshal'));

            const unrelated = await kernel.submit({
                kind: 'structural-change',
                origin: { tier: 'advisor', id: 'steward' },
                payload: { op: 'delta', path: 'resources.grain', delta: -5 }
            });
            expect(unrelated).toMatchObject({ disposition: 'applied' });
            expect(kernel.read('resources.grain')).toBe(995);

            expect(await codeOfAsync(() => kernel.submit({
                kind: 'structural-change',
                origin: { tier: 'advisor', id: 'steward' },
                payload: { op: 'delta', path: 'population.capital.morale', delta: 5 }
            }))).toBe(ErrorCode.PATH_LOCKED);
            expect(await codeOfAsync(() => kernel.retryEscalation('escalation-1'))).toBe(ErrorCode.INVALID_TRANSITION);
            expect(kernel.read('population.capital.morale')).toBe(60);
            expect(kernel.escalations()).toMatchObject([{ id: 'escalation-1', status: 'open', attempts: 1 }]);

            generation.answer('{"winner": "claim-2", "reasoning": "The marshal walked the streets"}');
            const outcome = await contest;

            expect(outcome).toMatchObject({
                disposition: 'escalated',
                claim: { id: 'claim-2', status: 'approved' },
                escalation: { status: 'resolved' },
                verdict: { winner: 'claim-2', reasoning: 'The marshal walked the streets' }
            });
            expect(generation.calls).toBe(1);
            expect(kernel.claims().map(c => c.status)).toEqual(['denied', 'approved']);
            expect(kernel.read('population.capital.morale')).toBe(45);

            await kernel.submit({
                kind: 'structural-change',
                origin: { tier: 'advisor', id: 'steward' },
                payload: { op: 'delta', path: 'population.capital.morale', delta: 5 }
            });
            expect(kernel.read('population.capital.morale')).toBe(50);
        });

        test('without a generation service escalations stay open', async () => {
            await kernel.submit(assignment('factions.rebels.exists', false, 'spymaster'));
            const outcome = await kernel.submit(assignment('factions.rebels.exists', true, 'marshal'));

            expect(outcome).toMatchObject({ disposition: 'escalated', escalation: { status: 'open', attempts: 0 } });
        });
    });

    describe('commands', () => {
        test('malformed requests are refused before classification', async () => {
            expect(await codeOfAsync(() => kernel.submit({ kind: 'structural-change', origin: { tier: 'advisor', id: 'steward' } }))).toBe(ErrorCode.INVALID_REQUEST);
            expect(await codeOfAsync(() => kernel.submit({ kind: 'decree', origin: { tier: 'advisor', id: 'steward' }, payload: {} }))).toBe(ErrorCode.INVALID_REQUEST);
            expect(await codeOfAsync(() => kernel.submit('raise taxes'))).toBe(ErrorCode.INVALID_REQUEST);
            expect(kernel.chronicle()).toEqual([]);
        });

        test('approve and deny dispatch on the id', async () => {
            await kernel.submit(assignment('realm.capital', 'Westhold', 'steward'));
            await kernel.submit({
                kind: 'structural-change',
                origin: { tier: 'advisor', id: 'steward' },
                payload: { op: 'delta', path: 'resources.treasury', delta: -150 }
            });

            expect(kernel.approve('claim-1')).toMatchObject({ target: 'claim', claim: { status: 'approved' } });
            expect(kernel.approve('request-2')).toMatchObject({ target: 'request', outcome: { disposition: 'applied' } });
            expect(kernel.read('realm.capital')).toBe('Westhold');
            expect(kernel.read('resources.treasury')).toBe(350);
            expect(codeOf(() => kernel.approve('order-1'))).toBe(ErrorCode.UNKNOWN_ID);
            expect(codeOf(() => kernel.deny('claim-1'))).toBe(ErrorCode.INVALID_TRANSITION);
        });

        test('a structural change cannot introduce a path', async () => {
            expect(await codeOfAsync(() => kernel.submit({
                kind: 'structural-change',
                origin: { tier: 'advisor', id: 'steward' },
                payload: { op: 'define', path: 'military.levies', value: 200 }
            }))).toBe(ErrorCode.INVALID_REQUEST);
            expect(await codeOfAsync(() => kernel.submit({
                kind: 'structural-change',
                origin: { tier: 'advisor', id: 'steward' },
                payload: { op: 'set', path: 'military.levies', value: 200 }
            }))).toBe(ErrorCode.PATH_NOT_FOUND);
            expect(kernel.worldView('military')).toEqual({});
        });

        test('time advances by positive whole days up to the configured maximum', () => {
            expect(codeOf(() => kernel.advance(0))).toBe(ErrorCode.INVALID_DURATION);
            expect(codeOf(() => kernel.advance(31))).toBe(ErrorCode.INVALID_DURATION);

            kernel.configure({ maxAdvanceDays: 60 });
            expect(kernel.advance(45).tick).toBe(45);
            expect(kernel.thresholds.maxAdvanceDays).toBe(60);
        });

        test('cancelled orders never apply', async () => {
            await fundTheFleet(kernel);
            kernel.advance(1);
            expect(kernel.cancel('order-1', 'The fleet was sunk').outcome).toBe('The fleet was sunk');

            kernel.advance(5);
            expect(kernel.read('resources.treasury')).toBe(500);
            expect(codeOf(() => kernel.cancel('order-1'))).toBe(ErrorCode.INVALID_TRANSITION);
        });

        test('a failed order effect is reported and time still moves', async () => {
            await kernel.submit({
                kind: 'order-creation',
                origin: { tier: 'advisor', id: 'steward' },
                payload: { description: 'Feast', durationDays: 1, effects: [{ path: 'population.capital.morale', delta: 50 }] }
            });

            const { tick, report } = kernel.advance(1);

            expect(tick).toBe(1);
            expect(report.failures).toEqual([{
                orderId: 'order-1',
                path: 'population.capital.morale',
                code: ErrorCode.RANGE_VIOLATION,
                message: "[Regency:RANGE_VIOLATION] 'population.capital.morale' would rise to 110, above maximum 100"
            }]);
            expect(kernel.read('population.capital.morale')).toBe(60);
            expect(kernel.chronicle().map(e => e.kind)).toEqual(['ORDER_CREATED', 'REQUEST_APPLIED', 'EFFECT_FAILED', 'ORDER_COMPLETED', 'TIME_ADVANCED']);
        });

        test('day rules run once per day after that day\'s orders', async () => {
            const seen: number[] = [];
            const audit: DayRule = {
                id: 'audit',
                effects: ({ read }) => {
                    const grain = read('resources.grain');
                    if (typeof grain === 'number') seen.push(grain);
                    return [];
                }
            };
            kernel = session({ dayRules: [periodicDelta({ id: 'rations', path: 'resources.grain', delta: -10 })] });
            kernel.registerDayRule(audit);
            await kernel.submit({
                kind: 'order-creation',
                origin: { tier: 'advisor', id: 'steward' },
                payload: { description: 'Stock the granary', durationDays: 2, effects: [{ path: 'resources.grain', delta: 30 }] }
            });

            const { tick, report } = kernel.advance(3);

            expect(tick).toBe(3);
            expect(kernel.dayRules()).toEqual(['rations', 'audit']);
            expect(seen).toEqual([990, 1010, 1000]);
            expect(report.rules.applied.map(e => [e.day, e.current])).toEqual([[1, 990], [2, 1010], [3, 1000]]);
            expect(report.rules.failures).toEqual([]);
            expect(report.completed).toMatchObject([{ id: 'order-1', completedAtTick: 2 }]);
            expect(kernel.read('resources.grain')).toBe(1000);
            expect(kernel.chronicle(2)).toMatchObject([
                { kind: 'ORDER_COMPLETED', subject: 'order-1', tick: 2 },
                { kind: 'TIME_ADVANCED', subject: 'day-3', detail: { days: 3, completed: ['order-1'], failures: 0, ruleEffects: 3, ruleFailures: 0 } }
            ]);
        });

        test('a failing day rule is reported and later days still run', () => {
            kernel = session({ dayRules: [periodicDelta({ id: 'war-chest', path: 'resources.treasury', delta: -300 })] });

            const { report } = kernel.advance(2);

            expect(report.rules.applied).toMatchObject([{ ruleId: 'war-chest', day: 1, current: 200 }]);
            expect(report.rules.failures).toMatchObject([{ ruleId: 'war-chest', day: 2, path: 'resources.treasury', code: ErrorCode.RANGE_VIOLATION }]);
            expect(kernel.read('resources.treasury')).toBe(200);
            expect(codeOf(() => kernel.registerDayRule(periodicDelta({ id: 'war-chest', path: 'resources.grain', delta: -1 })))).toBe(ErrorCode.INVALID_REQUEST);
            expect(kernel.unregisterDayRule('war-chest')).toBe(true);
            expect(kernel.advance(1).report.rules).toEqual({ applied: [], failures: [] });
        });

        test('advisors propose through the same pipeline', async () => {
            const generation = new ScriptedGeneration(['{"kind": "structural-change", "payload": {"op": "delta", "path": "resources.grain", "delta": -30}}']);
            kernel = session({ generation });

            const outcome = await kernel.propose('steward', 'Feed the garrison');
            expect(outcome).toMatchObject({ disposition: 'applied', tier: 'simple' });
            expect(kernel.read('resources.grain')).toBe(970);
            expect(kernel.chronicle()[0]?.actor).toBe('steward');
        });
    });

    describe('queries', () => {
        test('world views', () => {
            expect(kernel.worldView('resources')).toEqual({ 'resources.treasury': 500, 'resources.grain': 1000 });
            expect(Object.keys(kernel.worldView())).toHaveLength(6);
            expect(kernel.leaf('population.capital.morale')).toEqual({ kind: 'number', value: 60, bounds: { min: 0, max: 100 } });
            expect(codeOf(() => kernel.read('resources.silver'))).toBe(ErrorCode.PATH_NOT_FOUND);
        });

        test('returned records are copies', async () => {
            await fundTheFleet(kernel);
            const [order] = kernel.orders();
            if (!order) throw new Error('expected an order');
            order.elapsedDays = 3;
            order.effects.push({ path: 'resources.grain', delta: -1000 });

            expect(kernel.orders()[0]).toMatchObject({ elapsedDays: 0, effects: [{ path: 'resources.treasury', delta: -110 }] });
        });

        test('the chronicle is hash-chained', async () => {
            await fundTheFleet(kernel);
            kernel.advance(3);

            const entries = kernel.chronicle();
            expect(entries.map(e => e.kind)).toEqual(['REQUEST_QUEUED', 'ORDER_CREATED', 'REQUEST_APPROVED', 'ORDER_COMPLETED', 'TIME_ADVANCED']);
            expect(entries[4]).toMatchObject({ subject: 'day-3', tick: 3, detail: { days: 3, completed: ['order-1'], failures: 0 } });
            expect(kernel.chronicle(1)).toEqual([entries[4]]);
            expect(kernel.verifyChronicle()).toBe(true);
        });

        test('sessions are isolated from each other', async () => {
            const other = session();
            await fundTheFleet(kernel);
            kernel.advance(3);

            expect(other.read('resources.treasury')).toBe(500);
            expect(other.orders()).toEqual([]);
            expect(other.tick).toBe(0);
        });
    });

    describe('persistence', () => {
        async function populated(): Promise<RegencyKernel> {
            const k = session();
            await fundTheFleet(k);
            k.advance(1);
            await k.submit(assignment('realm.capital', 'Westhold', 'steward'));
            await k.submit({
                kind: 'structural-change',
                origin: { tier: 'advisor', id: 'steward' },
                payload: { op: 'delta', path: 'resources.grain', delta: -400 }
            });
            await k.submit(assignment('population.capital.morale', 80, 'spymaster'));
            await k.submit(assignment('population.capital.morale', 45, 'marshal'));
            return k;
        }

        test('load(save()) restores an identical session', async () => {
            const original = await populated();
            const saved = original.save();

            const restored = session();
            restored.load(JSON.parse(JSON.stringify(saved)));

            expect(restored.save()).toEqual(saved);
            expect(restored.tick).toBe(1);
            expect(restored.orders()).toEqual(original.orders());
            expect(restored.claims()).toEqual(original.claims());
            expect(restored.pendingApprovals()).toEqual(original.pendingApprovals());
            expect(restored.escalations()).toEqual(original.escalations());
            expect(restored.worldView()).toEqual(original.worldView());
        });

        test('a restored session carries on where the saved one stopped', async () => {
            const original = await populated();
            const restored = session();
            restored.load(original.save());

            restored.advance(2);
            expect(restored.read('resources.treasury')).toBe(390);
            expect(restored.approve('request-3')).toMatchObject({ target: 'request' });
            expect(restored.read('resources.grain')).toBe(600);
            expect(codeOf(() => restored.approve('claim-3'))).toBe(ErrorCode.INVALID_TRANSITION);
            expect(await codeOfAsync(() => restored.submit({
                kind: 'structural-change',
                origin: { tier: 'advisor', id: 'steward' },
                payload: { op: 'delta', path: 'population.capital.morale', delta: 5 }
            }))).toBe(ErrorCode.PATH_LOCKED);

            const next = await restored.submit(fundFleet);
            expect(next).toMatchObject({ requestId: 'request-7', disposition: 'queued' });
            expect(restored.approve('request-7')).toMatchObject({ outcome: { result: { order: { id: 'order-2' } } } });
        });

        test('loading is recorded in the chronicle', async () => {
            const saved = (await populated()).save();
            kernel.load(saved);
            expect(kernel.chronicle(1)[0]).toMatchObject({ kind: 'SESSION_LOADED', subject: saved.checksum, tick: 1 });
        });

        test('a snapshot that does not match its checksum is refused', async () => {
            const saved = (await populated()).save();
            const tampered = { ...saved, tick: 40 };

            expect(codeOf(() => kernel.load(tampered))).toBe(ErrorCode.CORRUPT_SNAPSHOT);
            expect(kernel.tick).toBe(0);
            expect(kernel.orders()).toEqual([]);
        });

        test('a malformed snapshot is refused', () => {
            expect(codeOf(() => kernel.load({}))).toBe(ErrorCode.CORRUPT_SNAPSHOT);
            expect(codeOf(() => kernel.load({ ...kernel.save(), formatVersion: 2 }))).toBe(ErrorCode.CORRUPT_SNAPSHOT);
            expect(codeOf(() => kernel.load('not a save'))).toBe(ErrorCode.CORRUPT_SNAPSHOT);
        });

        test('a snapshot that breaks an invariant is refused even with a valid checksum', () => {
            const saved = kernel.save();
            saved.world.leaves['resources.treasury'] = { kind: 'number', value: -5, bounds: { min: 0 } };

            try {
                kernel.load(resealed(saved));
                throw new Error('expected the load to fail');
            } catch (e) {
                expect(isKernelError(e, ErrorCode.CORRUPT_SNAPSHOT)).toBe(true);
                if (isKernelError(e)) expect(e.metadata).toEqual({ invariantId: 'world-bounds' });
            }
            expect(kernel.read('resources.treasury')).toBe(500);
        });
    });
});
