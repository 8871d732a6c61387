import type { SessionSnapshot } from '../kernel-core/L0/Ontology.js';

export type { IEventStore, ChronicleEntry } from '../kernel-core/L5/Audit.js';
export type { GenerationService, GenerationRequest } from '../kernel-core/L0/Ontology.js';

/** Listing entry for a stored save. */
export interface SaveSlot {
    slot: string;
    tick: number;
    checksum: string;
    savedAt: string;
}

/**
 * Persistence Port: Save Slots
 * Stores whole session snapshots by name. What comes back from `loadSlot`
 * is untrusted: the kernel validates it on load.
 */
export interface ISnapshotRepository {
    saveSlot(slot: string, snapshot: SessionSnapshot): SaveSlot;
    loadSlot(slot: string): unknown | null;
    listSlots(): SaveSlot[];
    deleteSlot(slot: string): boolean;
}
