export { LinkageClusterEngine } from "./linkage-cluster-engine";
export { Cluster, CLUSTER_CHUNK, MAX_CLUSTER_CAPACITY } from "./cluster-store";
export {
  clusterAt,
  createCollection,
  liveClusters,
  releaseCollection,
  totalPoints,
} from "./collection";
export type { ClusterCollection } from "./collection";
export { pointDistance, clusterDistance } from "./distance";
export { findNearestPair } from "./neighbors";
export type { NearestPair } from "./neighbors";
export { mergeInto, removeAndCompact } from "./merge";
export { runClustering } from "./driver";
export { getCoordBuffer, getIdBuffer, pointsFromTable } from "./arrow-helpers";
export {
  COORD_MAX,
  COORD_MIN,
  PointSchema,
  describePointIssue,
  parsePoint,
} from "./point-schema";
export {
  AllocationFailure,
  ClusteringError,
  PreconditionViolation,
} from "./errors";
export { LINKAGE_METHODS } from "./types";
export type {
  ClusterOutput,
  LinkageClusterEngineOptions,
  LinkageMethod,
  MergeStep,
  Point,
} from "./types";
