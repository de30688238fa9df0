import type { LinkageMethod } from "linkage-cluster";
import { InputError } from "./errors";

export interface CliArgs {
  file: string;
  /** Requested number of clusters */
  target: number;
  method: LinkageMethod;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `Usage: linkage-cluster FILE [N] [--avg|--min|--max] [--verbose]

  FILE       point file ("count=<n>" header, then "<id> <x> <y>" lines),
             or an Arrow IPC file (.arrow, .feather, .ipc)
  N          number of clusters to stop at (default 1)
  --avg      average linkage (default)
  --min      nearest-neighbor linkage
  --max      farthest-neighbor linkage
  --verbose  print each merge to stderr
  --help     show this message`;

const METHOD_FLAGS = new Map<string, LinkageMethod>([
  ["--avg", "average"],
  ["--min", "min"],
  ["--max", "max"],
]);

/**
 * Parse command-line arguments (without the node and script entries).
 * Flags may appear anywhere; the last linkage flag wins.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const positionals: string[] = [];
  let method: LinkageMethod = "average";
  let verbose = false;
  let help = false;

  for (const arg of argv) {
    const flagMethod = METHOD_FLAGS.get(arg);
    if (flagMethod) {
      method = flagMethod;
    } else if (arg === "--verbose") {
      verbose = true;
    } else if (arg === "--help" || arg === "-h") {
      help = true;
    } else if (arg.startsWith("--")) {
      throw new InputError(`Unknown option "${arg}"`);
    } else if (positionals.length < 2) {
      positionals.push(arg);
    } else {
      throw new InputError(`Unexpected argument "${arg}"`);
    }
  }

  if (help) return { file: positionals[0] ?? "", target: 1, method, verbose, help };

  const [file, count] = positionals;
  if (file === undefined) throw new InputError("Missing input file");

  return { file, target: parseTarget(count), method, verbose, help };
}

function parseTarget(arg: string | undefined): number {
  if (arg === undefined) return 1;
  if (!/^[+-]?\d+$/.test(arg)) {
    throw new InputError(`Invalid cluster count "${arg}"`);
  }
  const target = Number(arg);
  if (target < 1) {
    throw new InputError(`Cluster count must be at least 1, got ${target}`);
  }
  if (!Number.isSafeInteger(target)) {
    throw new InputError(`Invalid cluster count "${arg}"`);
  }
  return target;
}
