import { DuplicateGroup, DuplicateSummary } from "./types";

export function createDuplicateGroup(paths: readonly string[], size: number): DuplicateGroup {
  const sorted = [...paths].sort();
  return {
    paths: sorted,
    size,
    count: sorted.length,
    wastedSize: (sorted.length - 1) * size
  };
}

function comparePaths(a: DuplicateGroup, b: DuplicateGroup): number {
  const pathA = a.paths[0] ?? "";
  const pathB = b.paths[0] ?? "";
  if (pathA < pathB) return -1;
  if (pathA > pathB) return 1;
  return 0;
}

/** Orders by wasted size descending, then by first member path ascending. */
export function compareByWaste(a: DuplicateGroup, b: DuplicateGroup): number {
  return b.wastedSize - a.wastedSize || comparePaths(a, b);
}

/**
 * Totals and ranks duplicate groups.
 *
 * Ties in copy count or wasted size go to the group whose first path sorts
 * lowest, so the same tree always yields the same summary.
 */
export function summarizeGroups(groups: readonly DuplicateGroup[]): DuplicateSummary {
  let totalWastedSize = 0;
  let mostDuplicatedGroup: DuplicateGroup | null = null;

  for (const group of groups) {
    totalWastedSize += group.wastedSize;
    if (
      !mostDuplicatedGroup ||
      group.count > mostDuplicatedGroup.count ||
      (group.count === mostDuplicatedGroup.count && comparePaths(group, mostDuplicatedGroup) < 0)
    ) {
      mostDuplicatedGroup = group;
    }
  }

  const sortedGroups = [...groups].sort(compareByWaste);

  return {
    totalWastedSize,
    mostDuplicatedGroup,
    largestWasteGroup: sortedGroups[0] ?? null,
    sortedGroups
  };
}
