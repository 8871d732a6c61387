import type {
    Claim,
    ClaimID,
    ClaimStatement,
    ClaimStatus,
    Verdict,
    WorldPath
} from '../L0/Ontology.js';
import { PathFormatGuard, enforce } from '../L0/Guards.js';
import { GameClock, Sequence, sequenceNumber } from '../L0/Primitives.js';
import { WorldStateStore } from '../L2/State.js';
import { ErrorCode, KernelError } from '../Errors.js';

/** Claims contesting one world path. */
export interface Contest {
    path: WorldPath;
    claimIds: ClaimID[];
}

export interface ProposeResult {
    claim: Claim;
    contest?: Contest;
}

export type ContestListener = (contest: Contest) => void;

export interface ClaimRegistryOptions {
    /** Assignment claims under these top-level prefixes are approved on arrival. */
    autoApprovePrefixes?: string[];
}

export const DEFAULT_AUTO_APPROVE_PREFIXES = ['rumors', 'conditions', 'history'];

const RULE_LOW_RISK = 'rule:low-risk';
const RULE_CANON = 'rule:contradicts-canon';

/**
 * Claim Registry
 * pending -> approved | denied | contested; contested -> approved | denied.
 * approved and denied are terminal.
 */
export class ClaimRegistry {
    private claims: Map<ClaimID, Claim> = new Map();
    private listeners: ContestListener[] = [];
    private autoApprovePrefixes: string[];

    constructor(
        private world: WorldStateStore,
        private clock: GameClock,
        private sequence: Sequence,
        options: ClaimRegistryOptions = {}
    ) {
        this.autoApprovePrefixes = options.autoApprovePrefixes ?? DEFAULT_AUTO_APPROVE_PREFIXES;
    }

    public onContest(listener: ContestListener) {
        this.listeners.push(listener);
    }

    /**
     * Registers a proposed fact. The statement is checked against the world
     * without being applied; a statement the world could never hold is
     * rejected and no claim is created.
     */
    public propose(statement: ClaimStatement, proposer: string, rationale?: string): ProposeResult {
        this.validateStatement(statement);

        const claim: Claim = {
            id: this.sequence.next('claim'),
            statement: structuredClone(statement),
            proposer,
            status: 'pending',
            createdAtTick: this.clock.tick,
            contestedWith: []
        };
        if (rationale) claim.rationale = rationale;
        this.claims.set(claim.id, claim);

        if (statement.kind !== 'assignment') return { claim };

        const canon = this.canonFor(statement.path);
        if (canon && canon.statement.kind === 'assignment' && canon.statement.value !== statement.value) {
            this.close(claim, 'denied', RULE_CANON, `Contradicts approved ${canon.id}`);
            return { claim };
        }

        const rivals = this.rivalsOf(claim);
        if (rivals.length > 0) {
            const contest = this.contest(statement.path, [claim, ...rivals]);
            for (const listener of this.listeners) listener(contest);
            return { claim, contest };
        }

        if (this.isLowRisk(statement.path) && this.contestedOn(statement.path).length === 0) {
            this.applyCanon(claim);
            this.close(claim, 'approved', RULE_LOW_RISK);
        }
        return { claim };
    }

    public approve(id: ClaimID, resolver: string = 'player'): Claim {
        const claim = this.require(id);
        this.assertPending(claim, 'approved');
        this.applyCanon(claim);
        this.close(claim, 'approved', resolver);
        return claim;
    }

    public deny(id: ClaimID, resolver: string = 'player', reason?: string): Claim {
        const claim = this.require(id);
        this.assertPending(claim, 'denied');
        this.close(claim, 'denied', resolver, reason);
        return claim;
    }

    /**
     * Settles a contest. The winner becomes canon and is applied to the
     * world; every other candidate is denied. 'neither' denies them all.
     */
    public resolveContested(verdict: Verdict, resolver: string = 'escalation'): Claim[] {
        const candidates = verdict.candidates.map(id => this.require(id));
        const uncontested = candidates.filter(c => c.status !== 'contested');
        if (candidates.length === 0 || uncontested.length > 0) {
            throw new KernelError(ErrorCode.NOT_CONTESTED, `Claims not contested: ${uncontested.map(c => c.id).join(', ') || '(none given)'}`, {
                claimIds: uncontested.map(c => c.id)
            });
        }

        const winner = verdict.winner === 'neither' ? undefined : candidates.find(c => c.id === verdict.winner);
        if (verdict.winner !== 'neither' && !winner) {
            throw new KernelError(ErrorCode.NOT_CONTESTED, `Verdict names ${verdict.winner}, which is not a candidate`, {
                winner: verdict.winner,
                candidates: verdict.candidates
            });
        }

        if (winner) this.applyCanon(winner);

        for (const claim of candidates) {
            if (claim === winner) {
                this.close(claim, 'approved', resolver, verdict.reasoning);
            } else {
                this.close(claim, 'denied', resolver, verdict.reasoning ?? (winner ? `Lost to ${winner.id}` : 'Arbitrated: neither'));
            }
        }
        return candidates;
    }

    public validateStatement(statement: ClaimStatement) {
        if (statement.kind === 'assertion') {
            if (!statement.text.trim()) {
                throw new KernelError(ErrorCode.INVALID_REQUEST, 'Assertion text cannot be empty');
            }
            return;
        }
        enforce(PathFormatGuard({ path: statement.path }));
        if (this.world.has(statement.path)) {
            this.world.preview(statement.path, statement.value, 'set');
        } else {
            this.world.validateDefinition(statement.path, statement.value, statement.bounds);
        }
    }

    // --- Queries ---

    public get(id: ClaimID): Claim | undefined {
        return this.claims.get(id);
    }

    public require(id: ClaimID): Claim {
        const claim = this.claims.get(id);
        if (!claim) throw new KernelError(ErrorCode.UNKNOWN_ID, `No claim ${id}`, { id });
        return claim;
    }

    public list(status?: ClaimStatus): Claim[] {
        const all = [...this.claims.values()].sort((a, b) => sequenceNumber(a.id) - sequenceNumber(b.id));
        return status ? all.filter(c => c.status === status) : all;
    }

    public byProposer(proposer: string): Claim[] {
        return this.list().filter(c => c.proposer === proposer);
    }

    public counts(): Record<ClaimStatus, number> {
        const counts: Record<ClaimStatus, number> = { pending: 0, approved: 0, denied: 0, contested: 0 };
        for (const claim of this.claims.values()) counts[claim.status]++;
        return counts;
    }

    /** The approved assignment currently standing for `path`, if any. */
    public canonFor(path: WorldPath): Claim | undefined {
        return this.list('approved').filter(c => c.statement.kind === 'assignment' && c.statement.path === path).pop();
    }

    public contestedOn(path: WorldPath): Claim[] {
        return this.list('contested').filter(c => c.statement.kind === 'assignment' && c.statement.path === path);
    }

    public snapshot(): Claim[] {
        return structuredClone(this.list());
    }

    public restore(claims: Claim[]) {
        this.claims = new Map(structuredClone(claims).map(c => [c.id, c]));
    }

    // --- Internals ---

    private rivalsOf(claim: Claim): Claim[] {
        const statement = claim.statement;
        if (statement.kind !== 'assignment') return [];
        return this.list().filter(other =>
            other !== claim &&
            (other.status === 'pending' || other.status === 'contested') &&
            other.statement.kind === 'assignment' &&
            other.statement.path === statement.path &&
            other.statement.value !== statement.value
        );
    }

    private contest(path: WorldPath, entrants: Claim[]): Contest {
        for (const claim of entrants) claim.status = 'contested';
        const members = this.contestedOn(path);
        const ids = members.map(c => c.id);
        for (const member of members) {
            member.contestedWith = ids.filter(id => id !== member.id);
        }
        return { path, claimIds: ids };
    }

    private isLowRisk(path: WorldPath): boolean {
        const prefix = path.split('.')[0] ?? '';
        return this.autoApprovePrefixes.includes(prefix);
    }

    /** Brings the world in line with an assignment. Assertions change nothing. */
    private applyCanon(claim: Claim) {
        const statement = claim.statement;
        if (statement.kind !== 'assignment') return;
        if (this.world.has(statement.path)) {
            this.world.write(statement.path, statement.value, 'set');
        } else {
            this.world.definePath(statement.path, statement.value, statement.bounds);
        }
    }

    private assertPending(claim: Claim, to: ClaimStatus) {
        if (claim.status !== 'pending') {
            throw new KernelError(ErrorCode.INVALID_TRANSITION, `Claim ${claim.id} is ${claim.status}, cannot become ${to}`, {
                id: claim.id,
                from: claim.status,
                to
            });
        }
    }

    private close(claim: Claim, status: 'approved' | 'denied', resolver: string, resolution?: string) {
        claim.status = status;
        claim.resolvedBy = resolver;
        claim.resolvedAtTick = this.clock.tick;
        if (resolution) claim.resolution = resolution;
    }
}
