import { Cluster } from "./cluster-store";
import { assertIndex } from "./errors";
import type { Point } from "./types";

/**
 * Ordered clusters with a logical length. Slots at `count` and beyond hold
 * released clusters left behind by compaction.
 */
export interface ClusterCollection {
  clusters: Cluster[];
  count: number;
}

/** One singleton cluster per point, in input order. */
export function createCollection(points: readonly Point[]): ClusterCollection {
  const clusters = points.map((p) => {
    const cluster = new Cluster(1);
    cluster.append(p);
    return cluster;
  });
  return { clusters, count: clusters.length };
}

/** Live cluster at `index`. */
export function clusterAt(collection: ClusterCollection, index: number): Cluster {
  assertIndex(index, collection.count, "clusterAt");
  return collection.clusters[index];
}

/** The live clusters, in order. */
export function liveClusters(collection: ClusterCollection): Cluster[] {
  return collection.clusters.slice(0, collection.count);
}

/** Sum of live cluster sizes. */
export function totalPoints(collection: ClusterCollection): number {
  let total = 0;
  for (let i = 0; i < collection.count; i++) total += collection.clusters[i].size;
  return total;
}

/** Release every slot and empty the collection. */
export function releaseCollection(collection: ClusterCollection): void {
  for (const cluster of collection.clusters) cluster.release();
  collection.clusters = [];
  collection.count = 0;
}
