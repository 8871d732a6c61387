import type {
    Claim,
    ClaimID,
    Escalation,
    EscalationID,
    EscalationStatus,
    GenerationService,
    LeafValue,
    Verdict,
    VerdictWinner,
    WorldPath
} from '../L0/Ontology.js';
import { ArbitrationReplySchema, describeIssue, extractJson } from '../L0/Schemas.js';
import { PathLock } from '../L0/PathLock.js';
import { GameClock, Sequence, sequenceNumber } from '../L0/Primitives.js';
import type { ScopedLogger } from '../L0/Logger.js';
import { WorldStateStore } from '../L2/State.js';
import { ClaimRegistry } from '../L3/Claims.js';
import type { Contest } from '../L3/Claims.js';
import type { EscalationDesk } from '../L4/Authority.js';
import { Chronicle } from '../L5/Audit.js';
import { ErrorCode, KernelError, isKernelError } from '../Errors.js';

export interface EscalationRouterDeps {
    world: WorldStateStore;
    claims: ClaimRegistry;
    lock: PathLock;
    chronicle: Chronicle;
    clock: GameClock;
    sequence: Sequence;
    log: ScopedLogger;
    generation?: GenerationService;
}

const ARBITER_SYSTEM_PROMPT = [
    'You are the chief minister of the realm, settling a dispute between advisors.',
    'Several claims assign different values to the same fact. Pick the one most consistent with the realm as described, or reject them all.',
    'Reply with JSON only: {"winner": "<claim id>" | "neither", "reasoning": "<one sentence>"}.'
].join('\n');

/**
 * Escalation Router
 * Holds one escalation per contested path set. While an escalation is open or
 * failed its paths stay locked; only a verdict unlocks them. A failed
 * arbitration is never settled by default: the claims stay contested until
 * a retry succeeds.
 */
export class EscalationRouter implements EscalationDesk {
    private escalations: Map<EscalationID, Escalation> = new Map();
    private inFlight: Set<EscalationID> = new Set();

    private world: WorldStateStore;
    private claims: ClaimRegistry;
    private lock: PathLock;
    private chronicle: Chronicle;
    private clock: GameClock;
    private sequence: Sequence;
    private log: ScopedLogger;
    private generation?: GenerationService;

    constructor(deps: EscalationRouterDeps) {
        this.world = deps.world;
        this.claims = deps.claims;
        this.lock = deps.lock;
        this.chronicle = deps.chronicle;
        this.clock = deps.clock;
        this.sequence = deps.sequence;
        this.log = deps.log;
        this.generation = deps.generation;
    }

    /** Called synchronously by the registry whenever a contest forms or grows. */
    public open(contest: Contest): Escalation {
        const existing = this.unresolved().find(e => e.paths.includes(contest.path));
        if (existing) {
            const joined = contest.claimIds.filter(id => !existing.claimIds.includes(id));
            existing.claimIds.push(...joined);
            this.chronicle.append({
                kind: 'ESCALATION_OPENED',
                subject: existing.id,
                actor: 'system',
                tick: this.clock.tick,
                detail: { path: contest.path, joined }
            });
            this.log.info(`${joined.join(', ')} joined ${existing.id} on '${contest.path}'`);
            return existing;
        }

        const escalation: Escalation = {
            id: this.sequence.next('escalation'),
            claimIds: [...contest.claimIds],
            paths: [contest.path],
            status: 'open',
            attempts: 0,
            openedAtTick: this.clock.tick
        };
        this.escalations.set(escalation.id, escalation);
        this.lock.acquire(escalation.id, escalation.paths);
        this.chronicle.append({
            kind: 'ESCALATION_OPENED',
            subject: escalation.id,
            actor: 'system',
            tick: this.clock.tick,
            detail: { path: contest.path, claimIds: escalation.claimIds }
        });
        this.log.info(`Opened ${escalation.id} on '${contest.path}' for ${escalation.claimIds.join(', ')}`);
        return escalation;
    }

    /**
     * Asks the orchestrator tier to pick a winner. On success the verdict is
     * fed to the Claim Registry and the paths are unlocked; on failure the
     * escalation is marked failed and the error is rethrown.
     */
    public async arbitrate(id: EscalationID): Promise<Verdict> {
        const escalation = this.require(id);
        if (escalation.status === 'resolved') {
            throw new KernelError(ErrorCode.INVALID_TRANSITION, `${id} is already resolved`, { id, from: 'resolved', to: 'resolved' });
        }
        if (this.inFlight.has(id)) {
            throw new KernelError(ErrorCode.INVALID_TRANSITION, `${id} is already being arbitrated`, { id });
        }

        this.inFlight.add(id);
        escalation.attempts += 1;
        try {
            const candidates = escalation.claimIds.map(c => this.claims.require(c));
            const generation = this.generation;
            if (!generation) {
                throw new KernelError(ErrorCode.GENERATION_UNAVAILABLE, 'No generation service configured for arbitration', { id });
            }

            const reply = await this.ask(generation, escalation, candidates);
            const { winner, reasoning } = parseVerdict(reply, escalation.claimIds);
            const verdict: Verdict = { winner, candidates: [...escalation.claimIds] };
            if (reasoning) verdict.reasoning = reasoning;

            this.claims.resolveContested(verdict);
            this.settle(escalation, verdict);
            return verdict;
        } catch (e) {
            if (isKernelError(e)) this.fail(escalation, e);
            throw e;
        } finally {
            this.inFlight.delete(id);
        }
    }

    // --- Queries ---

    public get(id: EscalationID): Escalation | undefined {
        return this.escalations.get(id);
    }

    public require(id: EscalationID): Escalation {
        const escalation = this.escalations.get(id);
        if (!escalation) throw new KernelError(ErrorCode.UNKNOWN_ID, `No escalation ${id}`, { id });
        return escalation;
    }

    public list(status?: EscalationStatus): Escalation[] {
        const all = [...this.escalations.values()].sort((a, b) => sequenceNumber(a.id) - sequenceNumber(b.id));
        return status ? all.filter(e => e.status === status) : all;
    }

    public isArbitrating(id: EscalationID): boolean {
        return this.inFlight.has(id);
    }

    /** The most recent escalation a claim belongs to. */
    public forClaim(id: ClaimID): Escalation | undefined {
        return this.list().filter(e => e.claimIds.includes(id)).pop();
    }

    public snapshot(): Escalation[] {
        return structuredClone(this.list());
    }

    /** Replaces every escalation and re-takes the locks of unresolved ones. */
    public restore(escalations: Escalation[]) {
        for (const escalation of this.escalations.values()) this.lock.release(escalation.id);
        this.escalations = new Map(structuredClone(escalations).map(e => [e.id, e]));
        this.inFlight.clear();
        for (const escalation of this.unresolved()) this.lock.acquire(escalation.id, escalation.paths);
    }

    // --- Internals ---

    private unresolved(): Escalation[] {
        return this.list().filter(e => e.status !== 'resolved');
    }

    private async ask(generation: GenerationService, escalation: Escalation, candidates: Claim[]): Promise<string> {
        const context: Record<WorldPath, LeafValue> = {};
        for (const path of escalation.paths) Object.assign(context, this.world.subtree(parentOf(path)));

        const lines = candidates.map(c => `- ${c.id} (proposed by ${c.proposer}): ${describeStatement(c)}${c.rationale ? ` Rationale: ${c.rationale}` : ''}`);
        const prompt = [
            `Day ${this.clock.tick}. Disputed: ${escalation.paths.join(', ')}.`,
            'Candidates:',
            ...lines,
            'Answer with the id of the winning claim, or "neither".'
        ].join('\n');

        this.log.debug(`Arbitrating ${escalation.id} (attempt ${escalation.attempts})`);
        try {
            return await generation.generate({ tier: 'orchestrator', system: ARBITER_SYSTEM_PROMPT, prompt, context });
        } catch (e) {
            if (isKernelError(e)) throw e;
            const reason = e instanceof Error ? e.message : String(e);
            throw new KernelError(ErrorCode.GENERATION_UNAVAILABLE, `Arbitration call failed: ${reason}`, { id: escalation.id });
        }
    }

    private settle(escalation: Escalation, verdict: Verdict) {
        escalation.status = 'resolved';
        escalation.verdict = verdict;
        delete escalation.lastError;
        this.lock.release(escalation.id);
        this.chronicle.append({
            kind: 'ESCALATION_RESOLVED',
            subject: escalation.id,
            actor: 'orchestrator',
            tick: this.clock.tick,
            detail: { winner: verdict.winner, candidates: verdict.candidates, reasoning: verdict.reasoning }
        });
        this.log.info(`${escalation.id} resolved: ${verdict.winner}`);
    }

    private fail(escalation: Escalation, error: KernelError) {
        escalation.status = 'failed';
        escalation.lastError = error.message;
        this.chronicle.append({
            kind: 'ESCALATION_FAILED',
            subject: escalation.id,
            actor: 'system',
            tick: this.clock.tick,
            detail: { code: error.code, attempts: escalation.attempts }
        });
        this.log.warn(`${escalation.id} failed (attempt ${escalation.attempts}): ${error.code}`);
    }
}

/**
 * Maps an arbiter's reply to a winner among `candidates`. Accepts a bare id
 * or "neither", or a JSON object `{winner, reasoning?}` anywhere in the text.
 */
export function parseVerdict(reply: string, candidates: ClaimID[]): { winner: VerdictWinner; reasoning?: string } {
    const bare = matchCandidate(reply.trim().replace(/^["'`]+|["'`.]+$/g, ''), candidates);
    if (bare) return { winner: bare };

    const json = extractJson(reply);
    if (json === undefined) {
        throw parseError('Reply names no candidate', reply, candidates);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw parseError(`Reply is not valid JSON (${reason})`, reply, candidates);
    }

    const parsed = ArbitrationReplySchema.safeParse(raw);
    if (!parsed.success) {
        throw parseError(`Reply has the wrong shape (${describeIssue(parsed.error)})`, reply, candidates);
    }

    const winner = matchCandidate(parsed.data.winner.trim(), candidates);
    if (!winner) {
        throw parseError(`Winner '${parsed.data.winner}' is not a candidate`, reply, candidates);
    }
    return parsed.data.reasoning ? { winner, reasoning: parsed.data.reasoning } : { winner };
}

function matchCandidate(text: string, candidates: ClaimID[]): VerdictWinner | undefined {
    if (text.toLowerCase() === 'neither') return 'neither';
    return candidates.find(c => c === text);
}

function parseError(message: string, reply: string, candidates: ClaimID[]): KernelError {
    return new KernelError(ErrorCode.ARBITRATION_PARSE_ERROR, message, { reply: reply.slice(0, 500), candidates });
}

function parentOf(path: WorldPath): WorldPath {
    const dot = path.lastIndexOf('.');
    return dot < 0 ? path : path.slice(0, dot);
}

function describeStatement(claim: Claim): string {
    const s = claim.statement;
    return s.kind === 'assignment' ? `${s.path} = ${JSON.stringify(s.value)}` : s.text;
}
