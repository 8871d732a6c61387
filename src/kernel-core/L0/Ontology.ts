/**
 * REGENCY ONTOLOGY
 * The single source of truth for the kernel's primitives. Subsystems refer to
 * each other's data only through the string keys declared here.
 */

// --- 1. World ---
export type WorldPath = string;
export type LeafValue = number | string | boolean;
export type LeafKind = 'number' | 'string' | 'boolean';

/** Inclusive bounds. Only numeric leaves may carry them. */
export interface Bounds {
    min?: number;
    max?: number;
}

export interface WorldLeaf {
    kind: LeafKind;
    value: LeafValue;
    bounds?: Bounds;
}

export interface WorldSnapshot {
    leaves: Record<WorldPath, WorldLeaf>;
    version: number;
}

/** Bootstrap input: a leaf value, or a value with bounds. */
export type LeafDefinition = LeafValue | { value: LeafValue; bounds?: Bounds };
export type WorldDefinition = Record<WorldPath, LeafDefinition>;

export type WriteMode = 'set' | 'delta';

export interface WriteResult {
    path: WorldPath;
    previous: LeafValue;
    current: LeafValue;
}

// --- 2. Actors ---
export type OriginTier = 'advisor' | 'orchestrator';

export interface Origin {
    tier: OriginTier;
    id: string;
}

export type ModelTier = 'advisor' | 'orchestrator';

/**
 * One call to an external text model. `context` is the slice of the world
 * the model may see; its reply is untrusted text.
 */
export interface GenerationRequest {
    tier: ModelTier;
    system: string;
    prompt: string;
    context: Record<WorldPath, LeafValue>;
}

export interface GenerationService {
    generate(request: GenerationRequest): Promise<string>;
}

// --- 3. Claims ---
export type ClaimID = string;
export type ClaimStatus = 'pending' | 'approved' | 'denied' | 'contested';

export type ClaimStatement =
    | { kind: 'assignment'; path: WorldPath; value: LeafValue; bounds?: Bounds }
    | { kind: 'assertion'; text: string };

export interface Claim {
    id: ClaimID;
    statement: ClaimStatement;
    proposer: string;
    status: ClaimStatus;
    createdAtTick: number;
    contestedWith: ClaimID[];
    rationale?: string;
    resolvedBy?: string;
    resolvedAtTick?: number;
    resolution?: string;
}

// --- 4. Orders ---
export type OrderID = string;
export type OrderStatus = 'active' | 'completed' | 'cancelled';

export interface OrderEffect {
    path: WorldPath;
    delta: number;
}

export interface EffectFailure {
    orderId: OrderID;
    path: WorldPath;
    code: string;
    message: string;
}

export interface Order {
    id: OrderID;
    description: string;
    durationDays: number;
    effects: OrderEffect[];
    elapsedDays: number;
    status: OrderStatus;
    createdAtTick: number;
    assignedTo?: string;
    completedAtTick?: number;
    cancelledAtTick?: number;
    outcome?: string;
    effectFailures: EffectFailure[];
}

// --- 5. Mutation Requests ---
export type StructuralChange =
    | { op: 'delta'; path: WorldPath; delta: number }
    | { op: 'set'; path: WorldPath; value: LeafValue };

export interface OrderProposal {
    description: string;
    durationDays: number;
    effects: OrderEffect[];
    assignedTo?: string;
}

export interface ClaimProposal {
    statement: ClaimStatement;
    rationale?: string;
}

export type MutationRequest =
    | { kind: 'direct-query'; origin: Origin; payload: { paths: WorldPath[] } }
    | { kind: 'order-creation'; origin: Origin; payload: OrderProposal }
    | { kind: 'claim-assertion'; origin: Origin; payload: ClaimProposal }
    | { kind: 'structural-change'; origin: Origin; payload: StructuralChange };

export type MutationKind = MutationRequest['kind'];
export type RiskTier = 'read-only' | 'simple' | 'structural' | 'contested';

export type RequestID = string;

export interface PendingApproval {
    id: RequestID;
    request: MutationRequest;
    tier: RiskTier;
    reason: string;
    queuedAtTick: number;
}

// --- 6. Escalation ---
export type EscalationID = string;
export type EscalationStatus = 'open' | 'failed' | 'resolved';

/** A claim id, or 'neither' when every candidate is rejected. */
export type VerdictWinner = ClaimID | 'neither';

export interface Verdict {
    winner: VerdictWinner;
    candidates: ClaimID[];
    reasoning?: string;
}

export interface Escalation {
    id: EscalationID;
    claimIds: ClaimID[];
    paths: WorldPath[];
    status: EscalationStatus;
    attempts: number;
    openedAtTick: number;
    lastError?: string;
    verdict?: Verdict;
}

// --- 7. Session ---
export interface Sequences {
    claim: number;
    order: number;
    request: number;
    escalation: number;
}

export interface SessionSnapshot {
    formatVersion: 1;
    tick: number;
    world: WorldSnapshot;
    orders: Order[];
    claims: Claim[];
    pendingApprovals: PendingApproval[];
    escalations: Escalation[];
    sequences: Sequences;
    checksum: string;
}
