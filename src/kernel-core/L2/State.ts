import { freeze, produce } from 'immer';
import type {
    Bounds,
    LeafValue,
    WorldDefinition,
    WorldLeaf,
    WorldPath,
    WorldSnapshot,
    WriteMode,
    WriteResult
} from '../L0/Ontology.js';
import {
    BoundsGuard,
    DeclarationGuard,
    DeltaGuard,
    LeafKindGuard,
    NumericLeafGuard,
    PathFormatGuard,
    enforce,
    leafKindOf
} from '../L0/Guards.js';
import { ErrorCode, KernelError } from '../Errors.js';

/**
 * World State Store.
 * Canonical game data as a flat map of dot-paths to typed leaves. Holds no
 * policy: it only checks that each write keeps the leaf's kind and bounds.
 * Every transition produces a new frozen state object, so snapshots handed
 * out earlier never change underneath their holder.
 */
export class WorldStateStore {
    private currentState: WorldSnapshot = { leaves: {}, version: 0 };

    constructor(definition?: WorldDefinition) {
        if (definition) this.bootstrap(definition);
    }

    public get version() { return this.currentState.version; }

    /** Defines every leaf of a scenario. Paths are defined in sorted order. */
    public bootstrap(definition: WorldDefinition) {
        for (const path of Object.keys(definition).sort()) {
            const entry = definition[path];
            if (entry === undefined) continue;
            if (typeof entry === 'object') {
                this.definePath(path, entry.value, entry.bounds);
            } else {
                this.definePath(path, entry);
            }
        }
    }

    public has(path: WorldPath): boolean {
        return Object.prototype.hasOwnProperty.call(this.currentState.leaves, path);
    }

    public leaf(path: WorldPath): WorldLeaf {
        const leaf = this.has(path) ? this.currentState.leaves[path] : undefined;
        if (!leaf) throw new KernelError(ErrorCode.PATH_NOT_FOUND, `No world path '${path}'`, { path });
        return leaf;
    }

    public read(path: WorldPath): LeafValue {
        return this.leaf(path).value;
    }

    public paths(): WorldPath[] {
        return Object.keys(this.currentState.leaves).sort();
    }

    /** Values of every leaf at or under `prefix`. */
    public subtree(prefix: WorldPath): Record<WorldPath, LeafValue> {
        const out: Record<WorldPath, LeafValue> = {};
        for (const path of this.paths()) {
            if (path === prefix || path.startsWith(`${prefix}.`)) {
                const leaf = this.currentState.leaves[path];
                if (leaf) out[path] = leaf.value;
            }
        }
        return out;
    }

    /**
     * Checks that `path` could be defined with `value` and `bounds`, without
     * defining it.
     */
    public validateDefinition(path: WorldPath, value: LeafValue, bounds?: Bounds) {
        enforce(PathFormatGuard({ path }));
        if (this.has(path)) {
            throw new KernelError(ErrorCode.PATH_ALREADY_EXISTS, `World path '${path}' already exists`, { path });
        }
        const segments = path.split('.');
        for (let i = 1; i < segments.length; i++) {
            const ancestor = segments.slice(0, i).join('.');
            if (this.has(ancestor)) {
                throw new KernelError(ErrorCode.INVALID_PATH, `'${ancestor}' is a leaf and cannot hold '${path}'`, { path, ancestor });
            }
        }
        if (Object.keys(this.currentState.leaves).some(p => p.startsWith(`${path}.`))) {
            throw new KernelError(ErrorCode.INVALID_PATH, `'${path}' is a branch and cannot become a leaf`, { path });
        }
        enforce(DeclarationGuard({ path, value, bounds }));
    }

    public definePath(path: WorldPath, initial: LeafValue, bounds?: Bounds): WorldLeaf {
        this.validateDefinition(path, initial, bounds);

        const leaf: WorldLeaf = { kind: leafKindOf(initial), value: initial };
        const declared = normalizeBounds(bounds);
        if (declared) leaf.bounds = declared;

        this.currentState = produce(this.currentState, draft => {
            draft.leaves[path] = leaf;
            draft.version++;
        });
        return this.leaf(path);
    }

    /**
     * Computes the outcome of a write without applying it. Throws exactly
     * what `write` would throw.
     */
    public preview(path: WorldPath, value: LeafValue, mode: WriteMode): WriteResult {
        const leaf = this.leaf(path);

        let next: LeafValue;
        if (mode === 'delta') {
            enforce(NumericLeafGuard({ path, leaf }));
            if (typeof value !== 'number' || typeof leaf.value !== 'number') {
                throw new KernelError(ErrorCode.TYPE_MISMATCH, `Delta for '${path}' must be a number`, { path });
            }
            enforce(DeltaGuard({ path, delta: value }));
            next = leaf.value + value;
        } else {
            enforce(LeafKindGuard({ path, leaf, value }));
            next = value;
        }

        if (typeof next === 'number') {
            enforce(BoundsGuard({ path, value: next, bounds: leaf.bounds }));
        }
        return { path, previous: leaf.value, current: next };
    }

    /** Single-path atomic write: either the whole write applies or nothing does. */
    public write(path: WorldPath, value: LeafValue, mode: WriteMode): WriteResult {
        const result = this.preview(path, value, mode);
        this.currentState = produce(this.currentState, draft => {
            const leaf = draft.leaves[path];
            if (leaf) leaf.value = result.current;
            draft.version++;
        });
        return result;
    }

    public snapshot(): WorldSnapshot {
        return this.currentState;
    }

    public restore(snapshot: WorldSnapshot) {
        this.currentState = freeze(structuredClone(snapshot), true);
    }
}

function normalizeBounds(bounds?: Bounds): Bounds | undefined {
    if (!bounds) return undefined;
    const out: Bounds = {};
    if (bounds.min !== undefined) out.min = bounds.min;
    if (bounds.max !== undefined) out.max = bounds.max;
    return out.min === undefined && out.max === undefined ? undefined : out;
}
