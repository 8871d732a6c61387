import type { WorldPath } from './Ontology.js';

/**
 * Per-path lock table. A holder (an escalation id) locks a set of paths;
 * mutations against any locked path are refused until the holder releases.
 * Locking is per path set, never global.
 */
export class PathLock {
    private holders: Map<WorldPath, Set<string>> = new Map();

    public acquire(holder: string, paths: WorldPath[]) {
        for (const path of paths) {
            let set = this.holders.get(path);
            if (!set) {
                set = new Set();
                this.holders.set(path, set);
            }
            set.add(holder);
        }
    }

    public release(holder: string) {
        for (const [path, set] of this.holders) {
            set.delete(holder);
            if (set.size === 0) this.holders.delete(path);
        }
    }

    public isLocked(path: WorldPath): boolean {
        return this.holders.has(path);
    }

    /** Paths out of `paths` that are currently locked. */
    public blocked(paths: WorldPath[]): WorldPath[] {
        return paths.filter(p => this.holders.has(p));
    }

    public holdersOf(path: WorldPath): string[] {
        return [...(this.holders.get(path) ?? [])];
    }

    public clear() {
        this.holders.clear();
    }
}
