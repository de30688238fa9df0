import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { tableFromIPC } from "apache-arrow";
import { PointSchema, describePointIssue, pointsFromTable } from "linkage-cluster";
import type { Point } from "linkage-cluster";
import { InputError } from "./errors";

const COUNT_HEADER = /^count=([+-]?\d+)$/;
const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Extensions read as Arrow IPC instead of the text format. */
export const ARROW_EXTENSIONS = new Set([".arrow", ".feather", ".ipc"]);

/**
 * Parse the text point format:
 *
 *     count=3
 *     1 10.5 20
 *     2 30 40
 *     3 50 60
 *
 * Trailing blank lines are ignored. Throws InputError on the first problem.
 */
export function parsePointFile(text: string): Point[] {
  const lines = text.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1].trim() === "") lines.pop();

  const header = (lines[0] ?? "").trim();
  const match = COUNT_HEADER.exec(header);
  if (!match) {
    throw new InputError(`Invalid count header on line 1: "${header}"`);
  }
  const count = Number(match[1]);
  if (count < 1) {
    throw new InputError(`Invalid count value ${count} on line 1`);
  }

  const points: Point[] = [];
  for (let n = 1; n < lines.length; n++) {
    points.push(parsePointLine(lines[n], n + 1));
  }

  if (points.length !== count) {
    throw new InputError(`Expected ${count} points, found ${points.length}`);
  }
  return points;
}

function parsePointLine(line: string, lineNumber: number): Point {
  const tokens = line.trim().split(/\s+/);
  if (
    tokens.length !== 3 ||
    !INTEGER.test(tokens[0]) ||
    !DECIMAL.test(tokens[1]) ||
    !DECIMAL.test(tokens[2])
  ) {
    throw new InputError(`Malformed point on line ${lineNumber}: "${line.trim()}"`);
  }

  const result = PointSchema.safeParse({
    id: Number(tokens[0]),
    x: Number(tokens[1]),
    y: Number(tokens[2]),
  });
  if (!result.success) {
    throw new InputError(
      `Invalid point on line ${lineNumber}: ${describePointIssue(result.error)}`,
    );
  }
  return result.data;
}

/**
 * Read points from a file: Arrow IPC for the Arrow extensions, the text
 * format otherwise.
 */
export async function loadPointFile(path: string): Promise<Point[]> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputError(`Cannot read file "${path}": ${reason}`, { cause: err });
  }

  if (ARROW_EXTENSIONS.has(extname(path).toLowerCase())) {
    return pointsFromTable(tableFromIPC(bytes));
  }
  return parsePointFile(bytes.toString("utf8"));
}
