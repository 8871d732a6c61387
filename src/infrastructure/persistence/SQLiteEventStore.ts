import Database from 'better-sqlite3';
import { z } from 'zod';
import { CHRONICLE_KINDS } from '../../kernel-core/L5/Audit.js';
import type { ChronicleEntry, IEventStore } from '../../kernel-core/L5/Audit.js';
import { InfrastructureError } from '../../Platform/Errors.js';

interface ChronicleRow {
    sequence: number;
    entryId: string;
    previousEntryId: string;
    tick: number;
    kind: string;
    subject: string;
    actor: string;
    detail: string;
}

const RowSchema = z.object({
    sequence: z.number().int(),
    entryId: z.string(),
    previousEntryId: z.string(),
    tick: z.number().int(),
    kind: z.enum(CHRONICLE_KINDS),
    subject: z.string(),
    actor: z.string(),
    detail: z.record(z.unknown()),
});

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'regency.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS chronicle (
                sequence INTEGER PRIMARY KEY,
                entryId TEXT UNIQUE NOT NULL,
                previousEntryId TEXT NOT NULL,
                tick INTEGER NOT NULL,
                kind TEXT NOT NULL,
                subject TEXT NOT NULL,
                actor TEXT NOT NULL,
                detail TEXT NOT NULL
            )
        `);
    }

    append(entry: ChronicleEntry): void {
        const stmt = this.db.prepare(`
            INSERT INTO chronicle (
                sequence, entryId, previousEntryId, tick, kind, subject, actor, detail
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?
            )
        `);

        stmt.run(
            entry.sequence,
            entry.entryId,
            entry.previousEntryId,
            entry.tick,
            entry.kind,
            entry.subject,
            entry.actor,
            JSON.stringify(entry.detail)
        );
    }

    getHistory(): ChronicleEntry[] {
        const stmt = this.db.prepare<[], ChronicleRow>('SELECT * FROM chronicle ORDER BY sequence ASC');
        return stmt.all().map(row => this.mapRowToEntry(row));
    }

    getLatest(): ChronicleEntry | null {
        const stmt = this.db.prepare<[], ChronicleRow>('SELECT * FROM chronicle ORDER BY sequence DESC LIMIT 1');
        const row = stmt.get();

        if (!row) return null;
        return this.mapRowToEntry(row);
    }

    private mapRowToEntry(row: ChronicleRow): ChronicleEntry {
        let detail: unknown;
        try {
            detail = JSON.parse(row.detail);
        } catch (e) {
            throw new InfrastructureError(`Chronicle entry ${row.sequence} has unreadable detail`, e);
        }
        const parsed = RowSchema.safeParse({ ...row, detail });
        if (!parsed.success) {
            throw new InfrastructureError(`Chronicle entry ${row.sequence} is malformed`, parsed.error.issues[0]?.message);
        }
        return parsed.data;
    }

    public close() {
        this.db.close();
    }
}
