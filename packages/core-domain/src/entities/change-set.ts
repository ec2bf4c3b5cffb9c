import type { RelativePath } from "../value-objects/ids";

export interface ChangeSet {
  added: RelativePath[];
  modified: RelativePath[];
  removed: RelativePath[];
}

export function emptyChangeSet(): ChangeSet {
  return { added: [], modified: [], removed: [] };
}

export function isEmptyChangeSet(changeSet: ChangeSet): boolean {
  return (
    changeSet.added.length === 0 &&
    changeSet.modified.length === 0 &&
    changeSet.removed.length === 0
  );
}

/** Paths whose content has to be transmitted: added ∪ modified, sorted. */
export function changedPaths(changeSet: ChangeSet): RelativePath[] {
  return [...changeSet.added, ...changeSet.modified].sort();
}
