import type { ClusterCollection } from "./collection";
import { PreconditionViolation } from "./errors";
import { mergeInto, removeAndCompact } from "./merge";
import { findNearestPair } from "./neighbors";
import type { LinkageMethod, MergeStep } from "./types";

/**
 * Merge the closest pair of clusters until `target` clusters remain.
 *
 * Mutates `collection` in place and returns it. Performs exactly
 * `count - target` merges; `onMerge` is called after each one.
 */
export function runClustering(
  collection: ClusterCollection,
  target: number,
  method: LinkageMethod = "average",
  onMerge?: (step: MergeStep) => void,
): ClusterCollection {
  if (!Number.isInteger(target) || target < 1 || target > collection.count) {
    throw new PreconditionViolation(
      `runClustering: target ${target} is outside [1, ${collection.count}]`,
    );
  }

  let step = 0;
  while (collection.count > target) {
    const { i, j, distance } = findNearestPair(collection, method);
    const merged = collection.clusters[i];
    mergeInto(merged, collection.clusters[j]);
    removeAndCompact(collection, j);

    step++;
    onMerge?.({ step, target: i, source: j, distance, size: merged.size });
  }

  return collection;
}
