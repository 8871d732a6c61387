import Database from 'better-sqlite3';
import type { SessionSnapshot } from '../../kernel-core/L0/Ontology.js';
import { canonicalize } from '../../kernel-core/L0/Crypto.js';
import type { ISnapshotRepository, SaveSlot } from '../../Platform/Ports.js';
import { InfrastructureError } from '../../Platform/Errors.js';

interface SlotRow {
    slot: string;
    tick: number;
    checksum: string;
    savedAt: string;
}

const SLOT_NAME = /^[A-Za-z0-9_-]{1,64}$/;

/**
 * Save slots: one canonical JSON snapshot per slot name. Saving to an
 * existing slot overwrites it.
 */
export class SQLiteSnapshotStore implements ISnapshotRepository {
    private db: Database.Database;

    constructor(dbPath: string = 'regency.db', private now: () => Date = () => new Date()) {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS save_slots (
                slot TEXT PRIMARY KEY,
                tick INTEGER NOT NULL,
                checksum TEXT NOT NULL,
                savedAt TEXT NOT NULL,
                snapshot TEXT NOT NULL
            )
        `);
    }

    saveSlot(slot: string, snapshot: SessionSnapshot): SaveSlot {
        assertSlotName(slot);
        const entry: SaveSlot = { slot, tick: snapshot.tick, checksum: snapshot.checksum, savedAt: this.now().toISOString() };
        this.db.prepare(`
            INSERT INTO save_slots (slot, tick, checksum, savedAt, snapshot)
            VALUES (?, ?, ?, ?, ?)
            ON CONFLICT(slot) DO UPDATE SET
                tick = excluded.tick,
                checksum = excluded.checksum,
                savedAt = excluded.savedAt,
                snapshot = excluded.snapshot
        `).run(entry.slot, entry.tick, entry.checksum, entry.savedAt, canonicalize(snapshot));
        return entry;
    }

    loadSlot(slot: string): unknown | null {
        const row = this.db.prepare<[string], { snapshot: string }>('SELECT snapshot FROM save_slots WHERE slot = ?').get(slot);
        if (!row) return null;
        try {
            const snapshot: unknown = JSON.parse(row.snapshot);
            return snapshot;
        } catch (e) {
            throw new InfrastructureError(`Save slot '${slot}' is unreadable`, e);
        }
    }

    listSlots(): SaveSlot[] {
        return this.db.prepare<[], SlotRow>('SELECT slot, tick, checksum, savedAt FROM save_slots ORDER BY savedAt DESC, slot ASC').all();
    }

    deleteSlot(slot: string): boolean {
        return this.db.prepare<[string]>('DELETE FROM save_slots WHERE slot = ?').run(slot).changes > 0;
    }

    public close() {
        this.db.close();
    }
}

function assertSlotName(slot: string) {
    if (!SLOT_NAME.test(slot)) {
        throw new InfrastructureError(`Invalid save slot name '${slot}'`);
    }
}
