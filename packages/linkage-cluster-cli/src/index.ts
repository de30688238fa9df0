export { main, consoleIO } from "./cli";
export type { CliIO } from "./cli";
export { parseArgs, USAGE } from "./args";
export type { CliArgs } from "./args";
export { loadPointFile, parsePointFile, ARROW_EXTENSIONS } from "./loader";
export {
  formatG,
  formatCluster,
  formatClusters,
  formatMergeStep,
} from "./printer";
export { InputError } from "./errors";

// Re-export the engine for convenience
export { LinkageClusterEngine } from "linkage-cluster";
export type { ClusterOutput, LinkageMethod, Point } from "linkage-cluster";
