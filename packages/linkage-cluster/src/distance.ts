import type { Cluster } from "./cluster-store";
import { PreconditionViolation } from "./errors";
import type { LinkageMethod, Point } from "./types";

/** Euclidean distance between two points. */
export function pointDistance(p1: Point, p2: Point): number {
  const dx = p1.x - p2.x;
  const dy = p1.y - p2.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Total order over cluster contents: size, then elements as (id, x, y).
 * Returns 0 only for clusters holding the same elements in the same order.
 */
function compareContents(a: Cluster, b: Cluster): number {
  if (a.size !== b.size) return a.size - b.size;
  for (let i = 0; i < a.size; i++) {
    const diff =
      a.idAt(i) - b.idAt(i) || a.xAt(i) - b.xAt(i) || a.yAt(i) - b.yAt(i);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * Distance between two nonempty clusters under the given linkage method.
 * Every member pair is visited: O(size(c1) * size(c2)).
 *
 * The pair loop always runs over the clusters in the same order regardless
 * of argument order, so the floating-point average is exactly symmetric.
 */
export function clusterDistance(
  c1: Cluster,
  c2: Cluster,
  method: LinkageMethod,
): number {
  if (c1.size === 0 || c2.size === 0) {
    throw new PreconditionViolation(
      `clusterDistance: clusters must be nonempty (sizes ${c1.size}, ${c2.size})`,
    );
  }
  if (compareContents(c1, c2) > 0) [c1, c2] = [c2, c1];

  let sum = 0;
  let min = Infinity;
  let max = -Infinity;

  for (let i = 0; i < c1.size; i++) {
    const x = c1.xAt(i);
    const y = c1.yAt(i);
    for (let j = 0; j < c2.size; j++) {
      const dx = x - c2.xAt(j);
      const dy = y - c2.yAt(j);
      const d = Math.sqrt(dx * dx + dy * dy);
      sum += d;
      if (d < min) min = d;
      if (d > max) max = d;
    }
  }

  switch (method) {
    case "average":
      return sum / (c1.size * c2.size);
    case "min":
      return min;
    case "max":
      return max;
  }
}
