/**
 * A labeled point in the plane. Coordinates lie in [0, 1000].
 */
export interface Point {
  id: number;
  x: number;
  y: number;
}

/**
 * Rule for computing the distance between two clusters from their members.
 *
 * - `average`: mean of all pairwise distances
 * - `min`: nearest neighbor (single linkage)
 * - `max`: farthest neighbor (complete linkage)
 */
export type LinkageMethod = "average" | "min" | "max";

export const LINKAGE_METHODS: readonly LinkageMethod[] = [
  "average",
  "min",
  "max",
] as const;

/**
 * One merge performed by the clustering driver.
 */
export interface MergeStep {
  /** 1-based merge counter within a run */
  step: number;
  /** Index of the cluster that absorbed the other (before compaction) */
  target: number;
  /** Index of the cluster that was folded in and removed */
  source: number;
  /** Inter-cluster distance under the run's linkage method */
  distance: number;
  /** Size of the merged cluster */
  size: number;
}

/**
 * Output of a clustering run: typed arrays, clusters laid out back to back.
 */
export interface ClusterOutput {
  /** Point ids grouped by cluster, ascending within each cluster */
  ids: Float64Array;
  /** Point positions, interleaved: [x0, y0, x1, y1, ...], same order as ids */
  positions: Float64Array;
  /** Cluster k spans ids[offsets[k]] .. ids[offsets[k + 1] - 1] */
  offsets: Uint32Array;
  /** Point count per cluster */
  pointCounts: Uint32Array;
  /** Number of clusters in this output */
  length: number;
}

/**
 * Options for configuring the LinkageClusterEngine.
 */
export interface LinkageClusterEngineOptions {
  /** Linkage method used to compare clusters. Default: "average" */
  method?: LinkageMethod;
}
