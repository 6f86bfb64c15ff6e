import type { ActiveSnapshot, CorpusMetadata } from "./types";

/**
 * Owns the process-wide reference to the active snapshot. Activation replaces the
 * reference in one assignment; readers take the reference once per operation and
 * keep using that generation even if a newer one is activated meanwhile.
 */
export class SnapshotHolder {
    private current: ActiveSnapshot | null = null;

    get isReady(): boolean {
        return this.current !== null;
    }

    activate(snapshot: ActiveSnapshot): ActiveSnapshot | null {
        const previous = this.current;
        this.current = snapshot;
        return previous;
    }

    peek(): ActiveSnapshot | null {
        return this.current;
    }

    get active(): ActiveSnapshot {
        if (!this.current) {
            throw new Error("No knowledge-base snapshot is active.");
        }
        return this.current;
    }

    get metadata(): Readonly<CorpusMetadata> {
        return this.active.metadata;
    }
}
