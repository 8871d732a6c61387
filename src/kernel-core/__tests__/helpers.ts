import type {
    GenerationRequest,
    GenerationService,
    LeafValue,
    MutationRequest,
    WorldDefinition,
    WorldPath
} from '../L0/Ontology.js';
import { GameClock, Sequence } from '../L0/Primitives.js';
import { PathLock } from '../L0/PathLock.js';
import { Logger, LogLevel } from '../L0/Logger.js';
import { WorldStateStore } from '../L2/State.js';
import { ClaimRegistry } from '../L3/Claims.js';
import { OrderTracker } from '../L3/Orders.js';
import { MutationAuthority } from '../L4/Authority.js';
import type { AuthorityThresholds } from '../L4/Authority.js';
import { Chronicle } from '../L5/Audit.js';
import { EscalationRouter } from '../L6/Escalation.js';
import { ErrorCode, isKernelError } from '../Errors.js';

export const REALM: WorldDefinition = {
    'resources.treasury': { value: 500, bounds: { min: 0 } },
    'resources.grain': { value: 1000, bounds: { min: 0 } },
    'population.capital.morale': { value: 60, bounds: { min: 0, max: 100 } },
    'factions.nobles.disposition': { value: 10, bounds: { min: -100, max: 100 } },
    'realm.name': 'Aldmere',
    'realm.atWar': false
};

export function silentLogger(): Logger {
    return new Logger(LogLevel.SILENT);
}

/** The error code `fn` throws, or undefined when it returns. Non-kernel errors propagate. */
export function codeOf(fn: () => unknown): ErrorCode | undefined {
    try {
        fn();
    } catch (e) {
        if (isKernelError(e)) return e.code;
        throw e;
    }
    return undefined;
}

export async function codeOfAsync(fn: () => Promise<unknown>): Promise<ErrorCode | undefined> {
    try {
        await fn();
    } catch (e) {
        if (isKernelError(e)) return e.code;
        throw e;
    }
    return undefined;
}

export function assignment(path: WorldPath, value: LeafValue, proposer: string): MutationRequest {
    return {
        kind: 'claim-assertion',
        origin: { tier: 'advisor', id: proposer },
        payload: { statement: { kind: 'assignment', path, value } }
    };
}

/** Replays scripted replies in order; an Error entry is thrown as a transport failure. */
export class ScriptedGeneration implements GenerationService {
    public calls: GenerationRequest[] = [];

    constructor(private replies: (string | Error)[] = []) { }

    public push(...replies: (string | Error)[]) {
        this.replies.push(...replies);
    }

    async generate(request: GenerationRequest): Promise<string> {
        this.calls.push(request);
        const next = this.replies.shift();
        if (next === undefined) throw new Error('No scripted reply left');
        if (next instanceof Error) throw next;
        return next;
    }
}

/** Every subsystem wired the way the session wires them, without the session. */
export function makeCore(definition: WorldDefinition = REALM, options: { generation?: GenerationService; thresholds?: Partial<AuthorityThresholds> } = {}) {
    const logger = silentLogger();
    const world = new WorldStateStore(definition);
    const clock = new GameClock();
    const sequence = new Sequence();
    const lock = new PathLock();
    const chronicle = new Chronicle();
    const claims = new ClaimRegistry(world, clock, sequence);
    const orders = new OrderTracker(world, clock, sequence);
    const router = new EscalationRouter({
        world,
        claims,
        lock,
        chronicle,
        clock,
        sequence,
        log: logger.scope('Escalation'),
        generation: options.generation
    });
    const authority = new MutationAuthority({
        world,
        claims,
        orders,
        lock,
        chronicle,
        clock,
        sequence,
        desk: router,
        log: logger.scope('Authority'),
        thresholds: options.thresholds
    });
    claims.onContest(contest => router.open(contest));
    return { world, clock, sequence, lock, chronicle, claims, orders, router, authority };
}
