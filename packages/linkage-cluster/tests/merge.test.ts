import { describe, it, expect } from "vitest";
import {
  Cluster,
  CLUSTER_CHUNK,
  PreconditionViolation,
  createCollection,
  liveClusters,
  mergeInto,
  removeAndCompact,
  totalPoints,
} from "../src/index";
import { pointsOnLine } from "./test-utils";

const ids = (cluster: Cluster) => cluster.points().map((p) => p.id);

describe("mergeInto", () => {
  it("appends the source and sorts the target by id", () => {
    const target = Cluster.of([
      { id: 4, x: 4, y: 0 },
      { id: 9, x: 9, y: 0 },
    ]);
    const source = Cluster.of([
      { id: 7, x: 7, y: 0 },
      { id: 1, x: 1, y: 0 },
    ]);

    mergeInto(target, source);

    expect(ids(target)).toEqual([1, 4, 7, 9]);
    expect(target.pointAt(2)).toEqual({ id: 7, x: 7, y: 0 });
  });

  it("leaves the source untouched", () => {
    const target = Cluster.of([{ id: 2, x: 2, y: 2 }]);
    const source = Cluster.of([
      { id: 3, x: 3, y: 3 },
      { id: 1, x: 1, y: 1 },
    ]);

    mergeInto(target, source);

    expect(source.size).toBe(2);
    expect(ids(source)).toEqual([3, 1]);
  });

  it("grows the target past its capacity", () => {
    const target = new Cluster(1);
    target.append({ id: 100, x: 0, y: 0 });
    const source = Cluster.of(pointsOnLine(Array.from({ length: 30 }, (_, i) => i)));

    mergeInto(target, source);

    expect(target.size).toBe(31);
    expect(target.capacity).toBeGreaterThanOrEqual(31);
    expect(ids(target)).toEqual([...Array.from({ length: 30 }, (_, i) => i + 1), 100]);
  });

  it("grows geometrically and reuses spare capacity on later merges", () => {
    const target = Cluster.of([{ id: 1, x: 0, y: 0 }]);

    mergeInto(target, Cluster.of([{ id: 2, x: 1, y: 0 }]));
    expect(target.capacity).toBe(1 + CLUSTER_CHUNK);

    mergeInto(target, Cluster.of([{ id: 3, x: 2, y: 0 }]));
    expect(target.size).toBe(3);
    expect(target.capacity).toBe(1 + CLUSTER_CHUNK);
  });

  it("merging an empty source only sorts", () => {
    const target = Cluster.of([
      { id: 2, x: 0, y: 0 },
      { id: 1, x: 0, y: 0 },
    ]);
    mergeInto(target, new Cluster());
    expect(ids(target)).toEqual([1, 2]);
  });

  it("rejects merging a cluster into itself", () => {
    const cluster = Cluster.of([{ id: 1, x: 0, y: 0 }]);
    expect(() => mergeInto(cluster, cluster)).toThrow(PreconditionViolation);
    expect(cluster.size).toBe(1);
  });
});

describe("removeAndCompact", () => {
  it("shifts later clusters down by one", () => {
    const collection = createCollection(pointsOnLine([0, 1, 2, 3, 4]));
    const before = liveClusters(collection);

    const count = removeAndCompact(collection, 1);

    expect(count).toBe(4);
    expect(collection.count).toBe(4);
    expect(liveClusters(collection).map((c) => ids(c)[0])).toEqual([1, 3, 4, 5]);
    // moved by reference, not copied
    expect(collection.clusters[1]).toBe(before[2]);
    expect(collection.clusters[3]).toBe(before[4]);
  });

  it("releases the removed cluster into the vacated last slot", () => {
    const collection = createCollection(pointsOnLine([0, 1, 2]));
    const removed = collection.clusters[0];

    removeAndCompact(collection, 0);

    expect(collection.clusters[2]).toBe(removed);
    expect(removed.size).toBe(0);
    expect(removed.capacity).toBe(0);
  });

  it("removes the last cluster without moving others", () => {
    const collection = createCollection(pointsOnLine([0, 1, 2]));
    const first = collection.clusters[0];

    expect(removeAndCompact(collection, 2)).toBe(2);
    expect(collection.clusters[0]).toBe(first);
    expect(liveClusters(collection).map((c) => ids(c)[0])).toEqual([1, 2]);
  });

  it("conserves points across merge then compact", () => {
    const collection = createCollection(pointsOnLine([0, 1, 2, 3]));
    mergeInto(collection.clusters[0], collection.clusters[3]);
    removeAndCompact(collection, 3);

    expect(totalPoints(collection)).toBe(4);
    expect(ids(collection.clusters[0])).toEqual([1, 4]);
  });

  it("rejects indices outside the live range", () => {
    const collection = createCollection(pointsOnLine([0, 1, 2]));
    removeAndCompact(collection, 2);

    expect(() => removeAndCompact(collection, 2)).toThrow(PreconditionViolation);
    expect(() => removeAndCompact(collection, -1)).toThrow(PreconditionViolation);
    expect(collection.count).toBe(2);
  });
});
