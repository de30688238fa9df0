import type { Cluster } from "./cluster-store";
import type { ClusterCollection } from "./collection";
import { PreconditionViolation, assertIndex } from "./errors";

/**
 * Append every element of `source` to `target`, then sort `target` by id.
 * `source` is left as it was; the caller removes it afterwards.
 * Storage grows through `append`, so capacity is reused across merges.
 */
export function mergeInto(target: Cluster, source: Cluster): void {
  if (target === source) {
    throw new PreconditionViolation("mergeInto: cannot merge a cluster into itself");
  }

  for (const point of source) target.append(point);
  target.sortById();
}

/**
 * Drop the cluster at `index` and shift the ones after it down by one slot.
 *
 * Clusters move by reference; their contents are neither copied nor
 * re-sorted. The removed cluster is released and parked in the vacated
 * last slot. Returns the new count.
 */
export function removeAndCompact(
  collection: ClusterCollection,
  index: number,
): number {
  const { clusters, count } = collection;
  assertIndex(index, count, "removeAndCompact");

  const removed = clusters[index];
  for (let k = index; k < count - 1; k++) {
    clusters[k] = clusters[k + 1];
  }
  removed.release();
  clusters[count - 1] = removed;

  collection.count = count - 1;
  return collection.count;
}
