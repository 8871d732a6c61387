import type {
    EffectFailure,
    Order,
    OrderEffect,
    OrderID,
    OrderProposal,
    OrderStatus,
    WorldPath,
    WriteResult
} from '../L0/Ontology.js';
import { DeltaGuard, DurationGuard, NumericLeafGuard, enforce } from '../L0/Guards.js';
import { GameClock, Sequence, sequenceNumber } from '../L0/Primitives.js';
import { WorldStateStore } from '../L2/State.js';
import { ErrorCode, KernelError, isKernelError } from '../Errors.js';

/**
 * Applies one timed effect to the world. `source` is the order id, or
 * `rule:<id>` for a day rule. The Mutation Authority implements this so
 * timed effects go through the same lock checks as every other mutation.
 */
export interface EffectWriter {
    applyEffect(source: string, effect: OrderEffect): WriteResult;
}

export interface AppliedEffect {
    orderId: OrderID;
    path: WorldPath;
    delta: number;
    previous: number;
    current: number;
}

export interface AdvanceReport {
    days: number;
    completed: Order[];
    applied: AppliedEffect[];
    failures: EffectFailure[];
}

/**
 * Order Tracker
 * active -> completed (elapsed reaches duration) | cancelled (player).
 * Effects touch the world only on completion, in listed order, best-effort:
 * a failed effect is recorded on the order and reported, never retried and
 * never rolled back.
 */
export class OrderTracker {
    private orders: Map<OrderID, Order> = new Map();

    constructor(
        private world: WorldStateStore,
        private clock: GameClock,
        private sequence: Sequence
    ) { }

    /** Checks an order could be created, reading the world without writing. */
    public validate(proposal: OrderProposal) {
        enforce(DurationGuard({ days: proposal.durationDays }));
        for (const effect of proposal.effects) {
            enforce(DeltaGuard({ path: effect.path, delta: effect.delta }));
            const leaf = this.world.leaf(effect.path);
            enforce(NumericLeafGuard({ path: effect.path, leaf }));
        }
    }

    public create(description: string, durationDays: number, effects: OrderEffect[], assignedTo?: string): Order {
        this.validate({ description, durationDays, effects });

        const order: Order = {
            id: this.sequence.next('order'),
            description,
            durationDays,
            effects: effects.map(e => ({ path: e.path, delta: e.delta })),
            elapsedDays: 0,
            status: 'active',
            createdAtTick: this.clock.tick,
            effectFailures: []
        };
        if (assignedTo) order.assignedTo = assignedTo;

        this.orders.set(order.id, order);
        return order;
    }

    /**
     * The only way time reaches orders. Every active order gains `days`
     * (clamped to its duration); orders that reach their duration apply
     * their effects and complete, in creation order.
     */
    public advance(days: number, writer: EffectWriter): AdvanceReport {
        enforce(DurationGuard({ days }));

        const report: AdvanceReport = { days, completed: [], applied: [], failures: [] };

        for (const order of this.list('active')) {
            order.elapsedDays = Math.min(order.elapsedDays + days, order.durationDays);
            if (order.elapsedDays < order.durationDays) continue;

            for (const effect of order.effects) {
                try {
                    const result = writer.applyEffect(order.id, effect);
                    report.applied.push({
                        orderId: order.id,
                        path: effect.path,
                        delta: effect.delta,
                        previous: Number(result.previous),
                        current: Number(result.current)
                    });
                } catch (e) {
                    const failure: EffectFailure = isKernelError(e)
                        ? { orderId: order.id, path: effect.path, code: e.code, message: e.message }
                        : { orderId: order.id, path: effect.path, code: 'INTERNAL', message: e instanceof Error ? e.message : String(e) };
                    order.effectFailures.push(failure);
                    report.failures.push(failure);
                    if (!isKernelError(e)) {
                        // Effects already written stay written; the rest are dropped.
                        this.complete(order);
                        throw e;
                    }
                }
            }

            this.complete(order);
            report.completed.push(order);
        }

        return report;
    }

    private complete(order: Order) {
        order.status = 'completed';
        order.completedAtTick = this.clock.tick;
        order.outcome = order.effectFailures.length === 0
            ? 'Completed'
            : `Completed with ${order.effectFailures.length} failed effect(s)`;
    }

    public cancel(id: OrderID, reason: string = 'Cancelled by ruler'): Order {
        const order = this.require(id);
        if (order.status !== 'active') {
            throw new KernelError(ErrorCode.INVALID_TRANSITION, `Order ${id} is ${order.status}, cannot be cancelled`, {
                id,
                from: order.status,
                to: 'cancelled'
            });
        }
        order.status = 'cancelled';
        order.cancelledAtTick = this.clock.tick;
        order.outcome = reason;
        return order;
    }

    // --- Queries ---

    public get(id: OrderID): Order | undefined {
        return this.orders.get(id);
    }

    public require(id: OrderID): Order {
        const order = this.orders.get(id);
        if (!order) throw new KernelError(ErrorCode.UNKNOWN_ID, `No order ${id}`, { id });
        return order;
    }

    public list(status?: OrderStatus): Order[] {
        const all = [...this.orders.values()].sort((a, b) => sequenceNumber(a.id) - sequenceNumber(b.id));
        return status ? all.filter(o => o.status === status) : all;
    }

    public byAdvisor(advisor: string): Order[] {
        return this.list('active').filter(o => o.assignedTo === advisor);
    }

    public snapshot(): Order[] {
        return structuredClone(this.list());
    }

    public restore(orders: Order[]) {
        this.orders = new Map(structuredClone(orders).map(o => [o.id, o]));
    }
}

export function daysRemaining(order: Order): number {
    return Math.max(0, order.durationDays - order.elapsedDays);
}

export function progressPercent(order: Order): number {
    return Math.min(100, Math.floor((order.elapsedDays / order.durationDays) * 100));
}
