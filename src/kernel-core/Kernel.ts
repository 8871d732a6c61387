import type {
    Claim,
    ClaimStatus,
    Escalation,
    EscalationID,
    EscalationStatus,
    GenerationService,
    LeafValue,
    Order,
    OrderID,
    OrderStatus,
    PendingApproval,
    SessionSnapshot,
    Verdict,
    WorldDefinition,
    WorldLeaf,
    WorldPath
} from './L0/Ontology.js';
import { MutationRequestSchema, SessionSnapshotSchema, describeIssue } from './L0/Schemas.js';
import { DurationGuard, enforce } from './L0/Guards.js';
import { checkInvariants } from './L0/Invariants.js';
import { canonicalize, hash } from './L0/Crypto.js';
import { GameClock, Sequence } from './L0/Primitives.js';
import { PathLock } from './L0/PathLock.js';
import { Logger } from './L0/Logger.js';
import type { ScopedLogger } from './L0/Logger.js';
import { WorldStateStore } from './L2/State.js';
import { ClaimRegistry } from './L3/Claims.js';
import { OrderTracker } from './L3/Orders.js';
import type { AdvanceReport } from './L3/Orders.js';
import { DayRuleBook } from './L3/DayRules.js';
import type { DayRule, DayRuleReport } from './L3/DayRules.js';
import { MutationAuthority } from './L4/Authority.js';
import type { AuthorityThresholds, MutationOutcome } from './L4/Authority.js';
import { Chronicle } from './L5/Audit.js';
import type { ChronicleEntry, IEventStore } from './L5/Audit.js';
import { EscalationRouter } from './L6/Escalation.js';
import { AdvisorIntake } from './L6/AdvisorIntake.js';
import type { ProposalSink } from './L6/AdvisorIntake.js';
import { ErrorCode, KernelError, isKernelError } from './Errors.js';

export interface KernelOptions {
    thresholds?: Partial<AuthorityThresholds>;
    generation?: GenerationService;
    eventStore?: IEventStore;
    logger?: Logger;
    /** Arbitrate new escalations as soon as they open. Default true. */
    autoArbitrate?: boolean;
    autoApprovePrefixes?: string[];
    /** Registered in order; they run after each day's orders. */
    dayRules?: DayRule[];
}

export interface SessionAdvanceReport extends AdvanceReport {
    rules: DayRuleReport;
}

export interface AdvanceOutcome {
    tick: number;
    report: SessionAdvanceReport;
}

export type Decision =
    | { target: 'request'; outcome: MutationOutcome }
    | { target: 'claim'; claim: Claim };

export type Denial =
    | { target: 'request'; approval: PendingApproval }
    | { target: 'claim'; claim: Claim };

/**
 * Regency Kernel
 * One game session. Owns every subsystem; nothing is shared between two
 * kernels in the same process. All player-facing commands enter here and
 * run to completion before the next one, except arbitration, which awaits
 * the generation service while unrelated paths stay writable.
 */
export class RegencyKernel implements ProposalSink {
    private clock = new GameClock();
    private sequence = new Sequence();
    private lock = new PathLock();

    private world: WorldStateStore;
    private claimRegistry: ClaimRegistry;
    private orderTracker: OrderTracker;
    private dayRuleBook: DayRuleBook;
    private authority: MutationAuthority;
    private router: EscalationRouter;
    private intake: AdvisorIntake;
    private history: Chronicle;
    private logger: Logger;
    private log: ScopedLogger;
    private autoArbitrate: boolean;
    private hasGeneration: boolean;

    constructor(definition: WorldDefinition, options: KernelOptions = {}) {
        this.logger = options.logger ?? new Logger();
        this.log = this.logger.scope('Kernel');
        this.autoArbitrate = options.autoArbitrate ?? true;
        this.hasGeneration = options.generation !== undefined;

        this.world = new WorldStateStore(definition);
        this.history = new Chronicle(options.eventStore);
        this.claimRegistry = new ClaimRegistry(this.world, this.clock, this.sequence, {
            autoApprovePrefixes: options.autoApprovePrefixes
        });
        this.orderTracker = new OrderTracker(this.world, this.clock, this.sequence);
        this.dayRuleBook = new DayRuleBook(this.world);
        for (const rule of options.dayRules ?? []) this.dayRuleBook.register(rule);
        this.router = new EscalationRouter({
            world: this.world,
            claims: this.claimRegistry,
            lock: this.lock,
            chronicle: this.history,
            clock: this.clock,
            sequence: this.sequence,
            log: this.logger.scope('Escalation'),
            generation: options.generation
        });
        this.authority = new MutationAuthority({
            world: this.world,
            claims: this.claimRegistry,
            orders: this.orderTracker,
            lock: this.lock,
            chronicle: this.history,
            clock: this.clock,
            sequence: this.sequence,
            desk: this.router,
            log: this.logger.scope('Authority'),
            thresholds: options.thresholds
        });
        this.intake = new AdvisorIntake(this.world, this.clock, this, this.logger.scope('Advisors'), options.generation);

        this.claimRegistry.onContest(contest => this.router.open(contest));
        this.log.info(`Session ready with ${this.world.paths().length} world paths`);
    }

    public get tick() { return this.clock.tick; }

    // --- Commands ---

    /**
     * Submits a request from outside. The shape is checked first; an
     * escalation opened by the request is arbitrated before returning when
     * a generation service is configured.
     */
    public async submit(input: unknown): Promise<MutationOutcome> {
        const parsed = MutationRequestSchema.safeParse(input);
        if (!parsed.success) {
            throw new KernelError(ErrorCode.INVALID_REQUEST, `Malformed request (${describeIssue(parsed.error)})`);
        }

        const outcome = this.authority.submit(parsed.data);
        if (outcome.disposition !== 'escalated' || !this.shouldArbitrate(outcome.escalation)) {
            return structuredClone(outcome);
        }

        const verdict = await this.tryArbitrate(outcome.escalation.id);
        const settled = {
            ...outcome,
            claim: this.claimRegistry.require(outcome.claim.id),
            escalation: this.router.require(outcome.escalation.id)
        };
        if (verdict) settled.verdict = verdict;
        return structuredClone(settled);
    }

    /** Asks an advisor to turn the player's intent into a request. */
    public async propose(advisorId: string, intent: string, focus?: WorldPath[]): Promise<MutationOutcome> {
        return this.intake.propose(advisorId, intent, focus);
    }

    /**
     * The only way time passes. Days run one at a time: orders due that day
     * complete, then every day rule runs in registration order.
     */
    public advance(days: number): AdvanceOutcome {
        enforce(DurationGuard({ days, max: this.authority.Thresholds.maxAdvanceDays }));

        const report: SessionAdvanceReport = { days, completed: [], applied: [], failures: [], rules: { applied: [], failures: [] } };
        for (let step = 0; step < days; step++) {
            const day = this.clock.advance(1);
            const daily = this.orderTracker.advance(1, this.authority);
            report.completed.push(...daily.completed);
            report.applied.push(...daily.applied);
            report.failures.push(...daily.failures);

            for (const order of daily.completed) {
                this.history.append({
                    kind: 'ORDER_COMPLETED',
                    subject: order.id,
                    actor: 'system',
                    tick: day,
                    detail: { outcome: order.outcome, failures: order.effectFailures.length }
                });
            }
            this.dayRuleBook.run(day, this.authority, report.rules);
        }

        const tick = this.clock.tick;
        this.history.append({
            kind: 'TIME_ADVANCED',
            subject: `day-${tick}`,
            actor: 'player',
            tick,
            detail: {
                days,
                completed: report.completed.map(o => o.id),
                failures: report.failures.length,
                ruleEffects: report.rules.applied.length,
                ruleFailures: report.rules.failures.length
            }
        });
        if (report.failures.length > 0) {
            this.log.warn(`${report.failures.length} order effect(s) failed by day ${tick}`);
        }
        if (report.rules.failures.length > 0) {
            this.log.warn(`${report.rules.failures.length} day rule effect(s) failed by day ${tick}`);
        }
        return structuredClone({ tick, report });
    }

    /** Day rules are code, not session state: a loaded snapshot keeps the current set. */
    public registerDayRule(rule: DayRule) {
        this.dayRuleBook.register(rule);
        this.log.info(`Day rule '${rule.id}' registered`);
    }

    public unregisterDayRule(id: string): boolean {
        return this.dayRuleBook.unregister(id);
    }

    public dayRules(): string[] {
        return this.dayRuleBook.list();
    }

    /** Approves a queued request (`request-N`) or a pending claim (`claim-N`). */
    public approve(id: string): Decision {
        if (id.startsWith('claim-')) {
            return { target: 'claim', claim: structuredClone(this.authority.approveClaim(id)) };
        }
        if (id.startsWith('request-')) {
            return { target: 'request', outcome: structuredClone(this.authority.approve(id)) };
        }
        throw new KernelError(ErrorCode.UNKNOWN_ID, `Nothing awaiting approval under '${id}'`, { id });
    }

    public deny(id: string, reason?: string): Denial {
        if (id.startsWith('claim-')) {
            return { target: 'claim', claim: structuredClone(this.authority.denyClaim(id, reason)) };
        }
        if (id.startsWith('request-')) {
            return { target: 'request', approval: structuredClone(this.authority.deny(id)) };
        }
        throw new KernelError(ErrorCode.UNKNOWN_ID, `Nothing awaiting approval under '${id}'`, { id });
    }

    public cancel(orderId: OrderID, reason?: string): Order {
        return structuredClone(this.authority.cancelOrder(orderId, reason));
    }

    /** Re-runs arbitration for an open or failed escalation. Errors propagate. */
    public async retryEscalation(id: EscalationID): Promise<Verdict> {
        return this.router.arbitrate(id);
    }

    public configure(thresholds: Partial<AuthorityThresholds>): AuthorityThresholds {
        this.authority.configure(thresholds);
        return this.authority.Thresholds;
    }

    // --- Queries ---

    public read(path: WorldPath): LeafValue {
        return this.world.read(path);
    }

    public leaf(path: WorldPath): WorldLeaf {
        return this.world.leaf(path);
    }

    public worldView(prefix?: WorldPath): Record<WorldPath, LeafValue> {
        if (prefix) return this.world.subtree(prefix);
        const out: Record<WorldPath, LeafValue> = {};
        for (const path of this.world.paths()) out[path] = this.world.read(path);
        return out;
    }

    public orders(status?: OrderStatus): Order[] {
        return structuredClone(this.orderTracker.list(status));
    }

    public claims(status?: ClaimStatus): Claim[] {
        return structuredClone(this.claimRegistry.list(status));
    }

    public pendingApprovals(): PendingApproval[] {
        return this.authority.snapshot();
    }

    public escalations(status?: EscalationStatus): Escalation[] {
        return structuredClone(this.router.list(status));
    }

    public chronicle(limit?: number): ChronicleEntry[] {
        return limit === undefined ? this.history.getHistory() : this.history.recent(limit);
    }

    public verifyChronicle(): boolean {
        return this.history.verifyChain();
    }

    public get thresholds(): AuthorityThresholds {
        return this.authority.Thresholds;
    }

    // --- Persistence ---

    public save(): SessionSnapshot {
        const body: Omit<SessionSnapshot, 'checksum'> = {
            formatVersion: 1,
            tick: this.clock.tick,
            world: structuredClone(this.world.snapshot()),
            orders: this.orderTracker.snapshot(),
            claims: this.claimRegistry.snapshot(),
            pendingApprovals: this.authority.snapshot(),
            escalations: this.router.snapshot(),
            sequences: this.sequence.snapshot()
        };
        return { ...body, checksum: checksumOf(body) };
    }

    /**
     * Replaces the whole session with a saved one. The snapshot must parse,
     * match its checksum and satisfy every invariant; otherwise nothing
     * changes.
     */
    public load(input: unknown) {
        const parsed = SessionSnapshotSchema.safeParse(input);
        if (!parsed.success) {
            throw new KernelError(ErrorCode.CORRUPT_SNAPSHOT, `Snapshot is malformed (${describeIssue(parsed.error)})`);
        }
        const snapshot: SessionSnapshot = parsed.data;
        const { checksum, ...body } = snapshot;
        if (checksumOf(body) !== checksum) {
            throw new KernelError(ErrorCode.CORRUPT_SNAPSHOT, 'Snapshot checksum does not match its contents', { checksum });
        }
        const check = checkInvariants(snapshot);
        if (!check.ok) {
            throw new KernelError(ErrorCode.CORRUPT_SNAPSHOT, check.rejection?.message ?? 'Snapshot violates an invariant', {
                invariantId: check.rejection?.invariantId
            });
        }

        this.clock.reset(snapshot.tick);
        this.world.restore(snapshot.world);
        this.orderTracker.restore(snapshot.orders);
        this.claimRegistry.restore(snapshot.claims);
        this.authority.restore(snapshot.pendingApprovals);
        this.router.restore(snapshot.escalations);
        this.sequence.restore(snapshot.sequences);

        this.history.append({
            kind: 'SESSION_LOADED',
            subject: checksum,
            actor: 'player',
            tick: snapshot.tick,
            detail: { orders: snapshot.orders.length, claims: snapshot.claims.length }
        });
        this.log.info(`Loaded session at day ${snapshot.tick}`);
    }

    // --- Internals ---

    private shouldArbitrate(escalation: Escalation): boolean {
        return this.autoArbitrate && this.hasGeneration && escalation.status !== 'resolved' && !this.router.isArbitrating(escalation.id);
    }

    /** Arbitration failures leave the escalation failed and the request still answered. */
    private async tryArbitrate(id: EscalationID): Promise<Verdict | undefined> {
        try {
            return await this.router.arbitrate(id);
        } catch (e) {
            if (isKernelError(e, ErrorCode.ARBITRATION_PARSE_ERROR) || isKernelError(e, ErrorCode.GENERATION_UNAVAILABLE)) {
                this.log.warn(`Arbitration of ${id} deferred: ${e.message}`);
                return undefined;
            }
            throw e;
        }
    }
}

function checksumOf(body: Omit<SessionSnapshot, 'checksum'>): string {
    return hash(canonicalize(body));
}
