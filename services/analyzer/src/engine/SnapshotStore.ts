import type { Snapshot, SnapshotPair } from '@lanecoach/shared';

/**
 * Holds the two most recent snapshots for diffing.
 *
 * The pair is one frozen object swapped per ingestion, so a reader never
 * sees a `current` from one step next to a `previous` from another.
 */
export class SnapshotStore {
    private pair: Readonly<SnapshotPair> = Object.freeze({});

    ingest(snapshot: Snapshot): Readonly<SnapshotPair> {
        this.pair = Object.freeze({
            current: Object.freeze(snapshot),
            previous: this.pair.current,
        });
        return this.pair;
    }

    read(): Readonly<SnapshotPair> {
        return this.pair;
    }

    get current(): Snapshot | undefined {
        return this.pair.current;
    }
}
