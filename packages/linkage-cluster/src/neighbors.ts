import type { ClusterCollection } from "./collection";
import { clusterDistance } from "./distance";
import { PreconditionViolation } from "./errors";
import type { LinkageMethod } from "./types";

export interface NearestPair {
  /** Lower index of the pair */
  i: number;
  /** Higher index of the pair */
  j: number;
  distance: number;
}

/**
 * Find the two closest live clusters by exhaustive scan.
 *
 * Pairs are visited with `i` ascending, then `j` ascending within `i`.
 * On an exact tie the pair visited last wins.
 */
export function findNearestPair(
  collection: ClusterCollection,
  method: LinkageMethod,
): NearestPair {
  const { clusters, count } = collection;
  if (count < 2) {
    throw new PreconditionViolation(
      `findNearestPair: need at least 2 clusters, got ${count}`,
    );
  }

  let best: NearestPair = { i: 0, j: 1, distance: Infinity };

  for (let i = 0; i < count; i++) {
    for (let j = i + 1; j < count; j++) {
      const distance = clusterDistance(clusters[i], clusters[j], method);
      if (distance <= best.distance) {
        best = { i, j, distance };
      }
    }
  }

  return best;
}
