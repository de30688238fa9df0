import { LinkageClusterEngine } from "linkage-cluster";
import { USAGE, parseArgs } from "./args";
import { InputError } from "./errors";
import { loadPointFile } from "./loader";
import { formatClusters, formatMergeStep } from "./printer";

/** Where the CLI writes: results to `out`, diagnostics to `err`. */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Run the command line. Resolves to the process exit status: 0 on success,
 * 1 on any argument, file or clustering error.
 */
export async function main(
  argv: readonly string[],
  io: CliIO = consoleIO,
): Promise<number> {
  try {
    const args = parseArgs(argv);
    if (args.help) {
      io.out(USAGE);
      return 0;
    }

    const points = await loadPointFile(args.file);
    if (args.target > points.length) {
      throw new InputError(
        `Cluster count ${args.target} exceeds number of points ${points.length}`,
      );
    }

    const engine = new LinkageClusterEngine({ method: args.method });
    engine.load(points);
    engine.run(args.target);

    if (args.verbose) {
      for (const step of engine.history) io.err(formatMergeStep(step));
    }
    for (const line of formatClusters(engine.getClusters())) io.out(line);

    engine.release();
    return 0;
  } catch (err) {
    io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
