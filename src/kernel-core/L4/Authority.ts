import type {
    Claim,
    ClaimID,
    Escalation,
    LeafValue,
    MutationRequest,
    Order,
    OrderEffect,
    OrderID,
    PendingApproval,
    RequestID,
    RiskTier,
    StructuralChange,
    Verdict,
    WorldPath,
    WriteResult
} from '../L0/Ontology.js';
import { LockGuard, enforce } from '../L0/Guards.js';
import { PathLock } from '../L0/PathLock.js';
import { GameClock, Sequence, sequenceNumber } from '../L0/Primitives.js';
import type { ScopedLogger } from '../L0/Logger.js';
import { WorldStateStore } from '../L2/State.js';
import { ClaimRegistry } from '../L3/Claims.js';
import { OrderTracker } from '../L3/Orders.js';
import type { EffectWriter } from '../L3/Orders.js';
import { Chronicle } from '../L5/Audit.js';
import type { ChronicleKind } from '../L5/Audit.js';
import { ErrorCode, KernelError, isKernelError } from '../Errors.js';

export interface AuthorityThresholds {
    /** Largest absolute numeric change applied without player approval. */
    majorDeltaThreshold: number;
    /** Longest order created without player approval. */
    majorOrderDays: number;
    /** Longest single time advance. */
    maxAdvanceDays: number;
}

export const DEFAULT_THRESHOLDS: AuthorityThresholds = {
    majorDeltaThreshold: 100,
    majorOrderDays: 30,
    maxAdvanceDays: 30
};

/**
 * Where contested claims went. Implemented by the escalation layer; the
 * Authority only needs to find the escalation a contest opened.
 */
export interface EscalationDesk {
    forClaim(id: ClaimID): Escalation | undefined;
}

export interface Classification {
    tier: RiskTier;
    reason: string;
}

export type ApplyResult =
    | { kind: 'write'; write: WriteResult }
    | { kind: 'order'; order: Order };

export type MutationOutcome =
    | { disposition: 'answered'; requestId: RequestID; tier: 'read-only'; values: Record<WorldPath, LeafValue> }
    | { disposition: 'applied'; requestId: RequestID; tier: RiskTier; reason: string; result: ApplyResult }
    | { disposition: 'queued'; requestId: RequestID; tier: 'structural'; reason: string; approval: PendingApproval }
    | { disposition: 'claim-registered'; requestId: RequestID; tier: RiskTier; reason: string; claim: Claim }
    | { disposition: 'escalated'; requestId: RequestID; tier: 'contested'; reason: string; claim: Claim; escalation: Escalation; verdict?: Verdict };

export interface AuthorityDeps {
    world: WorldStateStore;
    claims: ClaimRegistry;
    orders: OrderTracker;
    lock: PathLock;
    chronicle: Chronicle;
    clock: GameClock;
    sequence: Sequence;
    desk: EscalationDesk;
    log: ScopedLogger;
    thresholds?: Partial<AuthorityThresholds>;
}

/**
 * Mutation Authority
 * The single gate between proposals and the world. Every request is
 * validated, classified into a risk tier and then answered, applied, queued
 * for the player, registered as a claim, or escalated. Classification is
 * recomputed for each request against the thresholds in force at that moment.
 */
export class MutationAuthority implements EffectWriter {
    private pendingApprovals: Map<RequestID, PendingApproval> = new Map();
    private thresholds: AuthorityThresholds;

    private world: WorldStateStore;
    private claims: ClaimRegistry;
    private orders: OrderTracker;
    private lock: PathLock;
    private chronicle: Chronicle;
    private clock: GameClock;
    private sequence: Sequence;
    private desk: EscalationDesk;
    private log: ScopedLogger;

    constructor(deps: AuthorityDeps) {
        this.world = deps.world;
        this.claims = deps.claims;
        this.orders = deps.orders;
        this.lock = deps.lock;
        this.chronicle = deps.chronicle;
        this.clock = deps.clock;
        this.sequence = deps.sequence;
        this.desk = deps.desk;
        this.log = deps.log;
        this.thresholds = { ...DEFAULT_THRESHOLDS, ...deps.thresholds };
    }

    public get Thresholds(): AuthorityThresholds { return { ...this.thresholds }; }

    public configure(thresholds: Partial<AuthorityThresholds>) {
        const next = { ...this.thresholds, ...thresholds };
        for (const [key, value] of Object.entries(next)) {
            if (!Number.isFinite(value) || value < 0) {
                throw new KernelError(ErrorCode.INVALID_REQUEST, `Threshold ${key} must be a non-negative number`, { key, value });
            }
        }
        this.thresholds = next;
        this.log.info('Thresholds reconfigured', { ...next });
    }

    /**
     * Article I: Submission
     * Validation failures are recorded in the chronicle and rethrown to the
     * caller; nothing has been mutated at that point.
     */
    public submit(request: MutationRequest): MutationOutcome {
        const requestId = this.sequence.next('request');
        try {
            return this.route(requestId, request);
        } catch (e) {
            if (isKernelError(e)) {
                this.record('REQUEST_REJECTED', requestId, request.origin.id, { kind: request.kind, code: e.code, message: e.message });
                this.log.warn(`Rejected ${requestId} (${request.kind}): ${e.code}`);
            }
            throw e;
        }
    }

    /** Pure classification. Never throws for well-formed requests. */
    public classify(request: MutationRequest): Classification {
        const t = this.thresholds;
        switch (request.kind) {
            case 'direct-query':
                return { tier: 'read-only', reason: 'Read-only query' };

            case 'claim-assertion': {
                const statement = request.payload.statement;
                if (statement.kind === 'assignment' && this.claims.contestedOn(statement.path).length > 0) {
                    return { tier: 'contested', reason: `'${statement.path}' is already under arbitration` };
                }
                return { tier: 'structural', reason: 'Claims await approval before becoming canon' };
            }

            case 'order-creation': {
                const locked = this.lock.blocked(request.payload.effects.map(e => e.path));
                if (locked.length > 0) return { tier: 'contested', reason: `Effects target paths under arbitration: ${locked.join(', ')}` };
                if (request.payload.durationDays > t.majorOrderDays) {
                    return { tier: 'structural', reason: `Duration ${request.payload.durationDays} days exceeds major-order threshold ${t.majorOrderDays}` };
                }
                const large = request.payload.effects.find(e => Math.abs(e.delta) > t.majorDeltaThreshold);
                if (large) {
                    return { tier: 'structural', reason: `Effect on '${large.path}' of ${large.delta} exceeds major-change threshold ${t.majorDeltaThreshold}` };
                }
                return { tier: 'simple', reason: 'Order within thresholds' };
            }

            case 'structural-change':
                return this.classifyChange(request.payload);
        }
    }

    // --- Player decisions on queued requests ---

    public approve(id: RequestID): MutationOutcome {
        const pending = this.requirePending(id);
        const request = pending.request;

        this.validate(request);
        enforce(LockGuard({ paths: this.touchedPaths(request), lock: this.lock }));

        const result = this.apply(request);
        this.pendingApprovals.delete(id);
        this.record('REQUEST_APPROVED', id, 'player', { kind: request.kind, result: summarize(result) });
        this.log.info(`Approved ${id}`);
        return { disposition: 'applied', requestId: id, tier: pending.tier, reason: 'Approved by player', result };
    }

    public deny(id: RequestID): PendingApproval {
        const pending = this.requirePending(id);
        this.pendingApprovals.delete(id);
        this.record('REQUEST_DENIED', id, 'player', { kind: pending.request.kind });
        this.log.info(`Denied ${id}`);
        return pending;
    }

    // --- Player decisions on claims ---

    public approveClaim(id: ClaimID): Claim {
        const claim = this.claims.require(id);
        if (claim.status === 'pending' && claim.statement.kind === 'assignment') {
            enforce(LockGuard({ paths: [claim.statement.path], lock: this.lock }));
        }
        this.claims.approve(id, 'player');
        this.record('CLAIM_APPROVED', id, 'player', { statement: claim.statement });
        return claim;
    }

    public denyClaim(id: ClaimID, reason?: string): Claim {
        const claim = this.claims.deny(id, 'player', reason);
        this.record('CLAIM_DENIED', id, 'player', reason ? { reason } : {});
        return claim;
    }

    public cancelOrder(id: OrderID, reason?: string): Order {
        const order = this.orders.cancel(id, reason);
        this.record('ORDER_CANCELLED', id, 'player', { elapsedDays: order.elapsedDays });
        return order;
    }

    /** EffectWriter: completed-order and day-rule effects enter the world here. */
    public applyEffect(source: string, effect: OrderEffect): WriteResult {
        try {
            enforce(LockGuard({ paths: [effect.path], lock: this.lock }));
            return this.world.write(effect.path, effect.delta, 'delta');
        } catch (e) {
            if (isKernelError(e)) {
                this.record('EFFECT_FAILED', source, 'system', { path: effect.path, delta: effect.delta, code: e.code });
                this.log.warn(`Effect of ${source} on '${effect.path}' failed: ${e.code}`);
            }
            throw e;
        }
    }

    public pending(): PendingApproval[] {
        return [...this.pendingApprovals.values()].sort((a, b) => sequenceNumber(a.id) - sequenceNumber(b.id));
    }

    public hasPending(id: RequestID): boolean {
        return this.pendingApprovals.has(id);
    }

    public snapshot(): PendingApproval[] {
        return structuredClone(this.pending());
    }

    public restore(pending: PendingApproval[]) {
        this.pendingApprovals = new Map(structuredClone(pending).map(p => [p.id, p]));
    }

    // --- Internals ---

    private route(requestId: RequestID, request: MutationRequest): MutationOutcome {
        this.validate(request);
        const { tier, reason } = this.classify(request);
        const actor = request.origin.id;

        if (request.kind === 'direct-query') {
            const values: Record<WorldPath, LeafValue> = {};
            for (const path of request.payload.paths) values[path] = this.world.read(path);
            return { disposition: 'answered', requestId, tier: 'read-only', values };
        }

        if (request.kind === 'claim-assertion') {
            return this.registerClaim(requestId, request.payload.statement, actor, request.payload.rationale);
        }

        if (tier === 'contested') {
            throw new KernelError(ErrorCode.PATH_LOCKED, reason, { requestId, paths: this.lock.blocked(this.touchedPaths(request)) });
        }

        if (tier === 'structural') {
            const approval: PendingApproval = { id: requestId, request: structuredClone(request), tier, reason, queuedAtTick: this.clock.tick };
            this.pendingApprovals.set(requestId, approval);
            this.record('REQUEST_QUEUED', requestId, actor, { kind: request.kind, reason });
            this.log.info(`Queued ${requestId} for approval: ${reason}`);
            return { disposition: 'queued', requestId, tier, reason, approval };
        }

        const result = this.apply(request);
        this.record('REQUEST_APPLIED', requestId, actor, { kind: request.kind, result: summarize(result) });
        this.log.debug(`Applied ${requestId}: ${reason}`);
        return { disposition: 'applied', requestId, tier, reason, result };
    }

    private registerClaim(requestId: RequestID, statement: Claim['statement'], proposer: string, rationale?: string): MutationOutcome {
        const { claim, contest } = this.claims.propose(statement, proposer, rationale);
        this.record('CLAIM_PROPOSED', claim.id, proposer, { requestId, statement, status: claim.status });

        if (contest) {
            this.record('CLAIM_CONTESTED', contest.path, proposer, { claimIds: contest.claimIds });
            const escalation = this.desk.forClaim(claim.id);
            if (!escalation) {
                throw new Error(`Contest on '${contest.path}' opened no escalation`);
            }
            this.log.info(`${claim.id} contests '${contest.path}' -> ${escalation.id}`);
            return { disposition: 'escalated', requestId, tier: 'contested', reason: `Conflicts with ${claim.contestedWith.join(', ')}`, claim, escalation };
        }

        if (claim.status === 'approved') {
            this.record('CLAIM_APPROVED', claim.id, claim.resolvedBy ?? 'rule', {});
            return { disposition: 'claim-registered', requestId, tier: 'simple', reason: 'Approved by low-risk rule', claim };
        }
        if (claim.status === 'denied') {
            this.record('CLAIM_DENIED', claim.id, claim.resolvedBy ?? 'rule', { reason: claim.resolution });
            return { disposition: 'claim-registered', requestId, tier: 'simple', reason: claim.resolution ?? 'Denied by rule', claim };
        }
        return { disposition: 'claim-registered', requestId, tier: 'structural', reason: 'Awaiting player approval', claim };
    }

    private classifyChange(change: StructuralChange): Classification {
        const t = this.thresholds;
        if (this.lock.isLocked(change.path)) {
            return { tier: 'contested', reason: `'${change.path}' is under arbitration` };
        }
        switch (change.op) {
            case 'delta':
                return Math.abs(change.delta) > t.majorDeltaThreshold
                    ? { tier: 'structural', reason: `Delta ${change.delta} on '${change.path}' exceeds major-change threshold ${t.majorDeltaThreshold}` }
                    : { tier: 'simple', reason: `Bounded delta on '${change.path}'` };
            case 'set': {
                const current = this.world.read(change.path);
                if (typeof current !== 'number' || typeof change.value !== 'number') {
                    return { tier: 'structural', reason: `Overwrites non-numeric '${change.path}'` };
                }
                const distance = Math.abs(change.value - current);
                return distance > t.majorDeltaThreshold
                    ? { tier: 'structural', reason: `Change of ${distance} on '${change.path}' exceeds major-change threshold ${t.majorDeltaThreshold}` }
                    : { tier: 'simple', reason: `Bounded change on '${change.path}'` };
            }
        }
    }

    /** Throws what applying the request would throw, without applying it. */
    private validate(request: MutationRequest) {
        switch (request.kind) {
            case 'direct-query':
                for (const path of request.payload.paths) this.world.leaf(path);
                return;
            case 'claim-assertion':
                this.claims.validateStatement(request.payload.statement);
                return;
            case 'order-creation':
                if (!request.payload.description.trim()) {
                    throw new KernelError(ErrorCode.INVALID_REQUEST, 'Order description cannot be empty');
                }
                this.orders.validate(request.payload);
                return;
            case 'structural-change': {
                const change = request.payload;
                if (change.op === 'delta') this.world.preview(change.path, change.delta, 'delta');
                else this.world.preview(change.path, change.value, 'set');
                return;
            }
        }
    }

    private apply(request: MutationRequest): ApplyResult {
        if (request.kind === 'order-creation') {
            const { description, durationDays, effects, assignedTo } = request.payload;
            const order = this.orders.create(description, durationDays, effects, assignedTo ?? request.origin.id);
            this.record('ORDER_CREATED', order.id, request.origin.id, { description, durationDays, effects });
            return { kind: 'order', order };
        }
        if (request.kind !== 'structural-change') {
            throw new KernelError(ErrorCode.INVALID_REQUEST, `${request.kind} requests are not applied through the approval queue`);
        }
        const change = request.payload;
        switch (change.op) {
            case 'delta':
                return { kind: 'write', write: this.world.write(change.path, change.delta, 'delta') };
            case 'set':
                return { kind: 'write', write: this.world.write(change.path, change.value, 'set') };
        }
    }

    private touchedPaths(request: MutationRequest): WorldPath[] {
        switch (request.kind) {
            case 'direct-query': return [];
            case 'order-creation': return request.payload.effects.map(e => e.path);
            case 'structural-change': return [request.payload.path];
            case 'claim-assertion':
                return request.payload.statement.kind === 'assignment' ? [request.payload.statement.path] : [];
        }
    }

    private requirePending(id: RequestID): PendingApproval {
        const pending = this.pendingApprovals.get(id);
        if (!pending) throw new KernelError(ErrorCode.UNKNOWN_ID, `No request ${id} awaiting approval`, { id });
        return pending;
    }

    private record(kind: ChronicleKind, subject: string, actor: string, detail: Record<string, unknown>) {
        this.chronicle.append({ kind, subject, actor, tick: this.clock.tick, detail });
    }
}

function summarize(result: ApplyResult): Record<string, unknown> {
    switch (result.kind) {
        case 'write': return { path: result.write.path, previous: result.write.previous, current: result.write.current };
        case 'order': return { orderId: result.order.id };
    }
}
