import express from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server } from 'http';
import { z } from 'zod';
import { RegencyKernel } from '../kernel-core/Kernel.js';
import { Logger } from '../kernel-core/L0/Logger.js';
import type { ScopedLogger } from '../kernel-core/L0/Logger.js';
import { describeIssue } from '../kernel-core/L0/Schemas.js';
import { ErrorCode, KernelError, isKernelError } from '../kernel-core/Errors.js';
import type { ISnapshotRepository } from '../Platform/Ports.js';
import { PlatformError } from '../Platform/Errors.js';

const AdvanceBody = z.object({ days: z.number() });
const DenyBody = z.object({ reason: z.string().optional() }).default({});
const ProposeBody = z.object({ intent: z.string(), focus: z.array(z.string()).optional() });
const ThresholdsBody = z.object({
    majorDeltaThreshold: z.number().optional(),
    majorOrderDays: z.number().optional(),
    maxAdvanceDays: z.number().optional(),
});
const SlotName = z.string().regex(/^[A-Za-z0-9_-]{1,64}$/, 'Slot names use letters, digits, _ and -');

/** HTTP status for a kernel error code. */
export function statusFor(code: ErrorCode): number {
    switch (code) {
        case ErrorCode.PATH_NOT_FOUND:
        case ErrorCode.UNKNOWN_ID:
            return 404;
        case ErrorCode.INVALID_TRANSITION:
        case ErrorCode.NOT_CONTESTED:
        case ErrorCode.PATH_LOCKED:
            return 409;
        case ErrorCode.RANGE_VIOLATION:
        case ErrorCode.TYPE_MISMATCH:
        case ErrorCode.PATH_ALREADY_EXISTS:
        case ErrorCode.INVALID_PATH:
        case ErrorCode.INVALID_DURATION:
        case ErrorCode.INVALID_REQUEST:
        case ErrorCode.CORRUPT_SNAPSHOT:
            return 422;
        case ErrorCode.ARBITRATION_PARSE_ERROR:
        case ErrorCode.GENERATION_UNAVAILABLE:
            return 502;
    }
}

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        throw new KernelError(ErrorCode.INVALID_REQUEST, `Malformed body (${describeIssue(parsed.error)})`);
    }
    return parsed.data;
}

/**
 * Player-facing command boundary over HTTP. One server fronts one session.
 */
export class RegencyServer {
    private app: express.Express;
    private server?: Server;
    private log: ScopedLogger;

    constructor(
        private kernel: RegencyKernel,
        private saves?: ISnapshotRepository,
        logger: Logger = new Logger()
    ) {
        this.log = logger.scope('Server');
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());
        this.setupRoutes();
    }

    public get App() { return this.app; }

    /** Starts listening; port 0 picks a free port. Resolves with the bound port. */
    public listen(port: number): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(port);
            server.once('listening', () => {
                this.server = server;
                const address = server.address();
                const bound = typeof address === 'object' && address !== null ? address.port : port;
                this.log.info(`Listening on port ${bound}`);
                resolve(bound);
            });
            server.once('error', reject);
        });
    }

    public close(): Promise<void> {
        return new Promise((resolve, reject) => {
            const server = this.server;
            if (!server) {
                resolve();
                return;
            }
            server.close(err => (err ? reject(err) : resolve()));
            this.server = undefined;
        });
    }

    private setupRoutes() {
        this.app.use((req, _res, next) => {
            this.log.debug(`${req.method} ${req.url}`);
            next();
        });

        // World
        this.app.get('/world', (req, res) => {
            const prefix = typeof req.query.prefix === 'string' ? req.query.prefix : undefined;
            res.json({ tick: this.kernel.tick, values: this.kernel.worldView(prefix) });
        });

        this.app.get('/world/:path', (req, res) => {
            res.json({ path: req.params.path, ...this.kernel.leaf(req.params.path) });
        });

        // Registries
        this.app.get('/orders', (_req, res) => {
            res.json(this.kernel.orders());
        });

        this.app.get('/claims', (_req, res) => {
            res.json(this.kernel.claims());
        });

        this.app.get('/approvals', (_req, res) => {
            res.json(this.kernel.pendingApprovals());
        });

        this.app.get('/escalations', (_req, res) => {
            res.json(this.kernel.escalations());
        });

        this.app.get('/chronicle', (req, res) => {
            const limit = Number(req.query.limit);
            res.json(Number.isInteger(limit) && limit > 0 ? this.kernel.chronicle(limit) : this.kernel.chronicle());
        });

        this.app.get('/thresholds', (_req, res) => {
            res.json(this.kernel.thresholds);
        });

        // Commands
        this.app.post('/requests', async (req, res, next) => {
            try {
                res.json(await this.kernel.submit(req.body));
            } catch (e) {
                next(e);
            }
        });

        this.app.post('/advisors/:id/propose', async (req, res, next) => {
            try {
                const body = parseBody(ProposeBody, req.body);
                res.json(await this.kernel.propose(req.params.id, body.intent, body.focus));
            } catch (e) {
                next(e);
            }
        });

        this.app.post('/advance', (req, res) => {
            const { days } = parseBody(AdvanceBody, req.body);
            res.json(this.kernel.advance(days));
        });

        this.app.post('/approve/:id', (req, res) => {
            res.json(this.kernel.approve(req.params.id));
        });

        this.app.post('/deny/:id', (req, res) => {
            const { reason } = parseBody(DenyBody, req.body);
            res.json(this.kernel.deny(req.params.id, reason));
        });

        this.app.post('/orders/:id/cancel', (req, res) => {
            const { reason } = parseBody(DenyBody, req.body);
            res.json(this.kernel.cancel(req.params.id, reason));
        });

        this.app.post('/escalations/:id/retry', async (req, res, next) => {
            try {
                res.json(await this.kernel.retryEscalation(req.params.id));
            } catch (e) {
                next(e);
            }
        });

        this.app.post('/thresholds', (req, res) => {
            res.json(this.kernel.configure(parseBody(ThresholdsBody, req.body)));
        });

        // Save slots
        this.app.get('/saves', (_req, res) => {
            res.json(this.requireSaves().listSlots());
        });

        this.app.post('/saves/:slot', (req, res) => {
            const slot = parseBody(SlotName, req.params.slot);
            res.json(this.requireSaves().saveSlot(slot, this.kernel.save()));
        });

        this.app.post('/saves/:slot/load', (req, res) => {
            const slot = parseBody(SlotName, req.params.slot);
            const snapshot = this.requireSaves().loadSlot(slot);
            if (snapshot === null) {
                throw new KernelError(ErrorCode.UNKNOWN_ID, `No save slot '${slot}'`, { slot });
            }
            this.kernel.load(snapshot);
            res.json({ slot, tick: this.kernel.tick });
        });

        this.app.delete('/saves/:slot', (req, res) => {
            const slot = parseBody(SlotName, req.params.slot);
            if (!this.requireSaves().deleteSlot(slot)) {
                throw new KernelError(ErrorCode.UNKNOWN_ID, `No save slot '${slot}'`, { slot });
            }
            res.status(204).end();
        });

        // Errors
        this.app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
            if (isKernelError(err)) {
                res.status(statusFor(err.code)).json({ error: err.message, code: err.code, metadata: err.metadata });
                return;
            }
            if (isMalformedJson(err)) {
                res.status(400).json({ error: 'Malformed JSON body', code: 'MALFORMED_JSON' });
                return;
            }
            this.log.error('Unhandled error', err);
            const message = err instanceof Error ? err.message : String(err);
            const code = err instanceof PlatformError ? err.code : 'INTERNAL';
            res.status(500).json({ error: message, code });
        });
    }

    private requireSaves(): ISnapshotRepository {
        if (!this.saves) {
            throw new KernelError(ErrorCode.INVALID_REQUEST, 'Save slots are not configured');
        }
        return this.saves;
    }
}

function isMalformedJson(err: unknown): boolean {
    return err instanceof SyntaxError && Reflect.get(err, 'type') === 'entity.parse.failed';
}
