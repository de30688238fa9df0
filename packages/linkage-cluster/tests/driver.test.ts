import { describe, it, expect } from "vitest";
import {
  LINKAGE_METHODS,
  PreconditionViolation,
  createCollection,
  liveClusters,
  runClustering,
  totalPoints,
} from "../src/index";
import type { ClusterCollection, LinkageMethod, MergeStep } from "../src/index";
import { DIAGONAL_POINTS, generateTestPoints, pointsOnLine } from "./test-utils";

const clusterIds = (collection: ClusterCollection) =>
  liveClusters(collection).map((c) => c.points().map((p) => p.id));

describe("runClustering", () => {
  it("clusters the diagonal points into {1,2,3} and {4}", () => {
    const steps: MergeStep[] = [];
    const collection = createCollection(DIAGONAL_POINTS);

    runClustering(collection, 2, "average", (step) => steps.push(step));

    expect(clusterIds(collection)).toEqual([[1, 2, 3], [4]]);
    expect(steps).toHaveLength(2);
    // tie between {1}/{2} and {2}/{3} goes to the later pair
    expect(steps[0]).toEqual({
      step: 1,
      target: 1,
      source: 2,
      distance: Math.SQRT2,
      size: 2,
    });
    expect(steps[1]).toMatchObject({ step: 2, target: 0, source: 1, size: 3 });
    expect(steps[1].distance).toBeCloseTo(2.12132, 5);
  });

  it("keeps the merged cluster's points in ascending id order", () => {
    const collection = createCollection(DIAGONAL_POINTS);
    runClustering(collection, 2, "average");
    expect(liveClusters(collection)[0].points()).toEqual([
      { id: 1, x: 1, y: 1 },
      { id: 2, x: 2, y: 2 },
      { id: 3, x: 3, y: 3 },
    ]);
  });

  // Gaps 2, 3, 4, 5 between consecutive points on a line.
  const line = pointsOnLine([0, 2, 5, 9, 14]);

  it.each<[LinkageMethod, number[][]]>([
    ["average", [[1, 2, 3, 4], [5]]],
    ["min", [[1, 2, 3, 4], [5]]],
    ["max", [[1, 2], [3, 4, 5]]],
  ])("%s linkage splits the line into %j", (method, expected) => {
    const collection = createCollection(line);
    runClustering(collection, 2, method);
    expect(clusterIds(collection)).toEqual(expected);
  });

  it("records each merge of a complete-linkage run", () => {
    const steps: MergeStep[] = [];
    runClustering(createCollection(line), 2, "max", (step) => steps.push(step));

    expect(steps.map(({ target, source, distance, size }) => ({
      target,
      source,
      distance,
      size,
    }))).toEqual([
      { target: 0, source: 1, distance: 2, size: 2 },
      { target: 1, source: 2, distance: 4, size: 2 },
      // {1,2}/{3,4} and {3,4}/{5} both have a farthest pair at 9
      { target: 1, source: 2, distance: 9, size: 3 },
    ]);
  });

  it("performs no merges when the target equals the input size", () => {
    const points = generateTestPoints(6);
    const collection = createCollection(points);
    let merges = 0;

    const result = runClustering(collection, 6, "min", () => merges++);

    expect(result).toBe(collection);
    expect(merges).toBe(0);
    expect(clusterIds(collection)).toEqual([[1], [2], [3], [4], [5], [6]]);
  });

  it("merges everything into one cluster at target 1", () => {
    const collection = createCollection(generateTestPoints(12));
    runClustering(collection, 1, "max");
    expect(collection.count).toBe(1);
    expect(clusterIds(collection)).toEqual([
      [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12],
    ]);
  });

  it("leaves a single point alone at target 1", () => {
    const collection = createCollection([{ id: 42, x: 500, y: 500 }]);
    runClustering(collection, 1);
    expect(clusterIds(collection)).toEqual([[42]]);
  });

  describe.each(LINKAGE_METHODS)("with %s linkage", (method) => {
    const points = generateTestPoints(40);

    it.each([1, 3, 7, 40])("returns exactly %i clusters", (target) => {
      const collection = createCollection(points);
      runClustering(collection, target, method);
      expect(collection.count).toBe(target);
    });

    it("conserves every point exactly once", () => {
      const collection = createCollection(points);
      const sizes: number[] = [];

      runClustering(collection, 5, method, () => {
        sizes.push(totalPoints(collection));
      });

      expect(sizes).toHaveLength(35);
      expect(sizes.every((s) => s === 40)).toBe(true);

      const seen = clusterIds(collection).flat().sort((a, b) => a - b);
      expect(seen).toEqual(points.map((p) => p.id));
    });

    it("keeps every merged cluster sorted by id", () => {
      const collection = createCollection(points);
      runClustering(collection, 4, method);

      for (const ids of clusterIds(collection)) {
        for (let k = 1; k < ids.length; k++) {
          expect(ids[k]).toBeGreaterThan(ids[k - 1]);
        }
      }
    });
  });

  it("rejects targets outside [1, count]", () => {
    const collection = createCollection(pointsOnLine([0, 1, 2]));
    expect(() => runClustering(collection, 0)).toThrow(PreconditionViolation);
    expect(() => runClustering(collection, 4)).toThrow(PreconditionViolation);
    expect(() => runClustering(collection, 1.5)).toThrow(PreconditionViolation);
    expect(collection.count).toBe(3);
  });
});
