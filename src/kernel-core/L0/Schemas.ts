import { z } from 'zod';

/**
 * Shapes of everything that enters the kernel from outside: model replies,
 * HTTP bodies and saved sessions. Parsing only checks structure; the
 * Authority and the invariants check meaning.
 */

export const LeafValueSchema = z.union([z.number(), z.string(), z.boolean()]);

export const BoundsSchema = z.object({
    min: z.number().optional(),
    max: z.number().optional(),
});

const PathSchema = z.string().min(1);

export const OriginSchema = z.object({
    tier: z.enum(['advisor', 'orchestrator']),
    id: z.string().min(1),
});

export const ClaimStatementSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('assignment'), path: PathSchema, value: LeafValueSchema, bounds: BoundsSchema.optional() }),
    z.object({ kind: z.literal('assertion'), text: z.string() }),
]);

export const OrderEffectSchema = z.object({
    path: PathSchema,
    delta: z.number(),
});

export const StructuralChangeSchema = z.discriminatedUnion('op', [
    z.object({ op: z.literal('delta'), path: PathSchema, delta: z.number() }),
    z.object({ op: z.literal('set'), path: PathSchema, value: LeafValueSchema }),
]);

export const OrderProposalSchema = z.object({
    description: z.string(),
    durationDays: z.number(),
    effects: z.array(OrderEffectSchema),
    assignedTo: z.string().optional(),
});

export const MutationRequestSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('direct-query'), origin: OriginSchema, payload: z.object({ paths: z.array(PathSchema) }) }),
    z.object({ kind: z.literal('order-creation'), origin: OriginSchema, payload: OrderProposalSchema }),
    z.object({
        kind: z.literal('claim-assertion'),
        origin: OriginSchema,
        payload: z.object({ statement: ClaimStatementSchema, rationale: z.string().optional() }),
    }),
    z.object({ kind: z.literal('structural-change'), origin: OriginSchema, payload: StructuralChangeSchema }),
]);

/** A request as an advisor writes it: the origin is filled in by the caller. */
export const ProposalSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('direct-query'), payload: z.object({ paths: z.array(PathSchema) }) }),
    z.object({ kind: z.literal('order-creation'), payload: OrderProposalSchema }),
    z.object({
        kind: z.literal('claim-assertion'),
        payload: z.object({ statement: ClaimStatementSchema, rationale: z.string().optional() }),
    }),
    z.object({ kind: z.literal('structural-change'), payload: StructuralChangeSchema }),
]);

export const ArbitrationReplySchema = z.object({
    winner: z.string().min(1),
    reasoning: z.string().optional(),
});

// --- Session snapshot ---

const WorldLeafSchema = z.object({
    kind: z.enum(['number', 'string', 'boolean']),
    value: LeafValueSchema,
    bounds: BoundsSchema.optional(),
});

const ClaimSchema = z.object({
    id: z.string(),
    statement: ClaimStatementSchema,
    proposer: z.string(),
    status: z.enum(['pending', 'approved', 'denied', 'contested']),
    createdAtTick: z.number().int().nonnegative(),
    contestedWith: z.array(z.string()),
    rationale: z.string().optional(),
    resolvedBy: z.string().optional(),
    resolvedAtTick: z.number().int().nonnegative().optional(),
    resolution: z.string().optional(),
});

const OrderSchema = z.object({
    id: z.string(),
    description: z.string(),
    durationDays: z.number().int().positive(),
    effects: z.array(OrderEffectSchema),
    elapsedDays: z.number().int().nonnegative(),
    status: z.enum(['active', 'completed', 'cancelled']),
    createdAtTick: z.number().int().nonnegative(),
    assignedTo: z.string().optional(),
    completedAtTick: z.number().int().nonnegative().optional(),
    cancelledAtTick: z.number().int().nonnegative().optional(),
    outcome: z.string().optional(),
    effectFailures: z.array(z.object({ orderId: z.string(), path: z.string(), code: z.string(), message: z.string() })),
});

const PendingApprovalSchema = z.object({
    id: z.string(),
    request: MutationRequestSchema,
    tier: z.enum(['read-only', 'simple', 'structural', 'contested']),
    reason: z.string(),
    queuedAtTick: z.number().int().nonnegative(),
});

const EscalationSchema = z.object({
    id: z.string(),
    claimIds: z.array(z.string()),
    paths: z.array(z.string()),
    status: z.enum(['open', 'failed', 'resolved']),
    attempts: z.number().int().nonnegative(),
    openedAtTick: z.number().int().nonnegative(),
    lastError: z.string().optional(),
    verdict: z.object({ winner: z.string(), candidates: z.array(z.string()), reasoning: z.string().optional() }).optional(),
});

const SequenceCounter = z.number().int().nonnegative();

export const SessionSnapshotSchema = z.object({
    formatVersion: z.literal(1),
    tick: z.number().int().nonnegative(),
    world: z.object({
        leaves: z.record(z.string(), WorldLeafSchema),
        version: z.number().int().nonnegative(),
    }),
    orders: z.array(OrderSchema),
    claims: z.array(ClaimSchema),
    pendingApprovals: z.array(PendingApprovalSchema),
    escalations: z.array(EscalationSchema),
    sequences: z.object({
        claim: SequenceCounter,
        order: SequenceCounter,
        request: SequenceCounter,
        escalation: SequenceCounter,
    }),
    checksum: z.string().regex(/^[0-9a-f]{64}$/),
});

/** First issue of a failed parse, as `path: message`. */
export function describeIssue(error: z.ZodError): string {
    const issue = error.issues[0];
    if (!issue) return 'Invalid input';
    return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/** The outermost `{...}` of a reply, looking inside a fenced block first. */
export function extractJson(reply: string): string | undefined {
    const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(reply);
    const body = fenced?.[1] ?? reply;
    const start = body.indexOf('{');
    const end = body.lastIndexOf('}');
    return start >= 0 && end > start ? body.slice(start, end + 1) : undefined;
}
