export interface ChangeSet {
  /** Identifiers in the snapshot but not live, in snapshot order. */
  toAdd: string[];
  /** Identifiers live but not in the snapshot, in live order. */
  toRemove: string[];
  /** Identifiers present on both sides. These are never sent to the API. */
  unchanged: string[];
}

function uniqueInOrder(ids: Iterable<string>): string[] {
  return [...new Set(ids)];
}

/**
 * Set difference between snapshot and live track identifiers. Duplicates on
 * either side count as a single presence.
 */
export function reconcile(snapshotIds: Iterable<string>, liveIds: Iterable<string>): ChangeSet {
  const snapshot = uniqueInOrder(snapshotIds);
  const live = uniqueInOrder(liveIds);
  const snapshotSet = new Set(snapshot);
  const liveSet = new Set(live);

  return {
    toAdd: snapshot.filter((id) => !liveSet.has(id)),
    toRemove: live.filter((id) => !snapshotSet.has(id)),
    unchanged: snapshot.filter((id) => liveSet.has(id))
  };
}

export function isNoop(changeSet: Pick<ChangeSet, "toAdd" | "toRemove">): boolean {
  return changeSet.toAdd.length === 0 && changeSet.toRemove.length === 0;
}
