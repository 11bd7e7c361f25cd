/**
 * SNAPSHOT STORE
 * ==============
 * Last good RankingSnapshot per universe. Publishing replaces the whole
 * reference; readers never see a partially built snapshot.
 */

import type { RankingSnapshot, SnapshotDraft, SnapshotState, UniverseId } from './rankings.types.js';

export class SnapshotStore {
  private snapshots = new Map<UniverseId, RankingSnapshot>();
  private version = 0;

  get(universeId: UniverseId): RankingSnapshot | undefined {
    return this.snapshots.get(universeId);
  }

  has(universeId: UniverseId): boolean {
    return this.snapshots.has(universeId);
  }

  publish(draft: SnapshotDraft): RankingSnapshot {
    const snapshot: RankingSnapshot = Object.freeze({
      ...draft,
      entries: Object.freeze([...draft.entries]),
      excluded: Object.freeze([...draft.excluded]),
      version: ++this.version,
    });
    this.snapshots.set(draft.universeId, snapshot);
    return snapshot;
  }

  state(universeId: UniverseId, now: number, maxAgeMs: number): SnapshotState {
    const snapshot = this.snapshots.get(universeId);
    if (!snapshot) return 'EMPTY';
    return now - snapshot.computedAt > maxAgeMs ? 'STALE' : 'FRESH';
  }
}
