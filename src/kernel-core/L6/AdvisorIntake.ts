import type { GenerationService, LeafValue, MutationRequest, WorldPath } from '../L0/Ontology.js';
import { ProposalSchema, describeIssue, extractJson } from '../L0/Schemas.js';
import { GameClock } from '../L0/Primitives.js';
import type { ScopedLogger } from '../L0/Logger.js';
import { WorldStateStore } from '../L2/State.js';
import type { MutationOutcome } from '../L4/Authority.js';
import { ErrorCode, KernelError, isKernelError } from '../Errors.js';

/** Where a parsed proposal goes. The kernel session implements this. */
export interface ProposalSink {
    submit(request: MutationRequest): Promise<MutationOutcome>;
}

const ADVISOR_SYSTEM_PROMPT = [
    'You are an advisor to the ruler. Turn the ruler\'s intent into exactly one structured proposal.',
    'Reply with JSON only, one of:',
    '{"kind": "direct-query", "payload": {"paths": ["<path>"]}}',
    '{"kind": "order-creation", "payload": {"description": "...", "durationDays": <days>, "effects": [{"path": "<path>", "delta": <number>}]}}',
    '{"kind": "claim-assertion", "payload": {"statement": {"kind": "assignment", "path": "<path>", "value": <value>}, "rationale": "..."}}',
    '{"kind": "structural-change", "payload": {"op": "delta", "path": "<path>", "delta": <number>}}',
    'Use only paths that appear in the context unless you are asserting a new fact.'
].join('\n');

/**
 * Advisor Intake
 * Asks the advisor tier to translate a player's intent into a proposal and
 * hands it to the session as an ordinary request. The advisor's reply is
 * untrusted: it goes through the same validation as any other request, and
 * the origin is always the advisor's, whatever the reply says.
 */
export class AdvisorIntake {
    constructor(
        private world: WorldStateStore,
        private clock: GameClock,
        private sink: ProposalSink,
        private log: ScopedLogger,
        private generation?: GenerationService
    ) { }

    public async propose(advisorId: string, intent: string, focus: WorldPath[] = []): Promise<MutationOutcome> {
        if (!intent.trim()) {
            throw new KernelError(ErrorCode.INVALID_REQUEST, 'Intent cannot be empty');
        }
        const generation = this.generation;
        if (!generation) {
            throw new KernelError(ErrorCode.GENERATION_UNAVAILABLE, 'No generation service configured for advisors', { advisorId });
        }

        let reply: string;
        try {
            reply = await generation.generate({
                tier: 'advisor',
                system: ADVISOR_SYSTEM_PROMPT,
                prompt: `Day ${this.clock.tick}. Advisor ${advisorId}. The ruler says: ${intent}`,
                context: this.contextFor(focus)
            });
        } catch (e) {
            if (isKernelError(e)) throw e;
            const reason = e instanceof Error ? e.message : String(e);
            throw new KernelError(ErrorCode.GENERATION_UNAVAILABLE, `Advisor call failed: ${reason}`, { advisorId });
        }

        const request = parseProposal(reply, advisorId);
        this.log.info(`${advisorId} proposed ${request.kind}`);
        return this.sink.submit(request);
    }

    private contextFor(focus: WorldPath[]): Record<WorldPath, LeafValue> {
        if (focus.length === 0) {
            const all: Record<WorldPath, LeafValue> = {};
            for (const path of this.world.paths()) all[path] = this.world.read(path);
            return all;
        }
        const context: Record<WorldPath, LeafValue> = {};
        for (const prefix of focus) Object.assign(context, this.world.subtree(prefix));
        return context;
    }
}

/** Reads an advisor reply as a request from `advisorId`. */
export function parseProposal(reply: string, advisorId: string): MutationRequest {
    const json = extractJson(reply);
    if (json === undefined) {
        throw new KernelError(ErrorCode.INVALID_REQUEST, 'Advisor reply contains no proposal', { advisorId });
    }

    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new KernelError(ErrorCode.INVALID_REQUEST, `Advisor reply is not valid JSON (${reason})`, { advisorId });
    }

    const parsed = ProposalSchema.safeParse(raw);
    if (!parsed.success) {
        throw new KernelError(ErrorCode.INVALID_REQUEST, `Advisor proposal is malformed (${describeIssue(parsed.error)})`, { advisorId });
    }
    return { ...parsed.data, origin: { tier: 'advisor', id: advisorId } };
}
