import type { Table } from "apache-arrow";
import { pointsFromTable } from "./arrow-helpers";
import {
  clusterAt,
  createCollection,
  releaseCollection,
  totalPoints,
  type ClusterCollection,
} from "./collection";
import { runClustering } from "./driver";
import { parsePoint } from "./point-schema";
import type {
  ClusterOutput,
  LinkageClusterEngineOptions,
  LinkageMethod,
  MergeStep,
  Point,
} from "./types";

/**
 * Agglomerative clustering engine for labeled 2-D points.
 *
 * Load points (plain objects or an Arrow Table), run down to a target
 * cluster count, then read the clusters back as typed arrays.
 */
export class LinkageClusterEngine {
  private collection: ClusterCollection = { clusters: [], count: 0 };
  private _history: MergeStep[] = [];

  readonly method: LinkageMethod;

  constructor(options: LinkageClusterEngineOptions = {}) {
    this.method = options.method ?? "average";
  }

  /** Number of live clusters. */
  get count(): number {
    return this.collection.count;
  }

  /** Number of points across all live clusters. */
  get pointCount(): number {
    return totalPoints(this.collection);
  }

  /** Merges performed by the last run(), in order. */
  get history(): readonly MergeStep[] {
    return this._history;
  }

  /**
   * Load points, one singleton cluster each. Replaces any previous state.
   */
  load(points: readonly Point[]): void {
    const validated = points.map((p) => parsePoint(p));
    this.release();
    this.collection = createCollection(validated);
  }

  /**
   * Load points from an Arrow Table with a GeoArrow Point geometry column
   * and an integer id column.
   */
  loadTable(
    table: Table,
    geometryColumn = "geometry",
    idColumn = "id",
    filterMask?: Uint8Array | null,
  ): void {
    this.load(pointsFromTable(table, geometryColumn, idColumn, filterMask));
  }

  /**
   * Merge clusters until `targetClusters` remain. Returns the number of
   * merges performed.
   */
  run(targetClusters: number): number {
    const history: MergeStep[] = [];
    runClustering(this.collection, targetClusters, this.method, (step) => {
      history.push(step);
    });
    this._history = history;
    return history.length;
  }

  /**
   * Current clusters as typed arrays, clusters back to back in order.
   */
  getClusters(): ClusterOutput {
    const length = this.collection.count;
    const total = this.pointCount;

    const ids = new Float64Array(total);
    const positions = new Float64Array(total * 2);
    const offsets = new Uint32Array(length + 1);
    const pointCounts = new Uint32Array(length);

    let k = 0;
    for (let c = 0; c < length; c++) {
      const cluster = this.collection.clusters[c];
      offsets[c] = k;
      pointCounts[c] = cluster.size;
      for (let i = 0; i < cluster.size; i++, k++) {
        ids[k] = cluster.idAt(i);
        positions[k * 2] = cluster.xAt(i);
        positions[k * 2 + 1] = cluster.yAt(i);
      }
    }
    offsets[length] = k;

    return { ids, positions, offsets, pointCounts, length };
  }

  /**
   * Ids of the points in one cluster, in stored order (ascending once the
   * cluster has taken part in a merge).
   */
  getLeaves(clusterIndex: number): number[] {
    const cluster = clusterAt(this.collection, clusterIndex);
    const leaves: number[] = [];
    for (let i = 0; i < cluster.size; i++) leaves.push(cluster.idAt(i));
    return leaves;
  }

  /** Free every cluster's storage. */
  release(): void {
    releaseCollection(this.collection);
    this._history = [];
  }
}
