import { AllocationFailure, PreconditionViolation, assertIndex } from "./errors";
import type { Point } from "./types";

// Offsets into the flat element buffer (stride = 3)
const OFFSET_X = 0;
const OFFSET_Y = 1;
const OFFSET_ID = 2;
const STRIDE = 3;

/** Minimum number of slots added when a full cluster grows. */
export const CLUSTER_CHUNK = 10;

/** Largest capacity a single cluster may reserve. */
export const MAX_CLUSTER_CAPACITY = Math.floor(2 ** 31 / STRIDE);

const { fround } = Math;

/**
 * Growable, ordered store of points owned by one cluster.
 *
 * Elements live in a single Float64Array as [x, y, id] triples. Coordinates
 * are kept at single precision, the precision of the point file format.
 */
export class Cluster implements Iterable<Point> {
  private data: Float64Array;
  private _size = 0;
  private _capacity = 0;

  constructor(capacityHint = 0) {
    if (!Number.isInteger(capacityHint) || capacityHint < 0) {
      throw new PreconditionViolation(
        `Cluster capacity must be a non-negative integer, got ${capacityHint}`,
      );
    }
    this.data = new Float64Array(0);
    this.reserve(capacityHint);
  }

  /** Build a cluster holding the given points, in order. */
  static of(points: readonly Point[]): Cluster {
    const cluster = new Cluster(points.length);
    for (const p of points) cluster.append(p);
    return cluster;
  }

  get size(): number {
    return this._size;
  }

  get capacity(): number {
    return this._capacity;
  }

  /**
   * Grow storage to hold at least `newCapacity` points. Never shrinks.
   */
  reserve(newCapacity: number): void {
    if (newCapacity <= this._capacity) return;
    if (!Number.isSafeInteger(newCapacity) || newCapacity > MAX_CLUSTER_CAPACITY) {
      throw new AllocationFailure(newCapacity);
    }

    let next: Float64Array;
    try {
      next = new Float64Array(newCapacity * STRIDE);
    } catch (err) {
      throw new AllocationFailure(newCapacity, { cause: err });
    }
    next.set(this.data.subarray(0, this._size * STRIDE));
    this.data = next;
    this._capacity = newCapacity;
  }

  /**
   * Add a point as the new last element, growing storage when full.
   * Growth doubles the capacity (at least CLUSTER_CHUNK slots at a time).
   */
  append(point: Point): void {
    if (this._size === this._capacity) {
      const cap = this._capacity;
      const grown = Math.max(cap + CLUSTER_CHUNK, cap * 2);
      // Clamp to the maximum once; a full cluster at the maximum fails.
      this.reserve(
        cap < MAX_CLUSTER_CAPACITY && grown > MAX_CLUSTER_CAPACITY
          ? MAX_CLUSTER_CAPACITY
          : grown,
      );
    }
    const k = this._size * STRIDE;
    this.data[k + OFFSET_X] = fround(point.x);
    this.data[k + OFFSET_Y] = fround(point.y);
    this.data[k + OFFSET_ID] = point.id;
    this._size++;
  }

  /** Free the storage and return to the empty state. */
  release(): void {
    this.data = new Float64Array(0);
    this._size = 0;
    this._capacity = 0;
  }

  // Unchecked accessors for the distance loops.

  idAt(index: number): number {
    return this.data[index * STRIDE + OFFSET_ID];
  }

  xAt(index: number): number {
    return this.data[index * STRIDE + OFFSET_X];
  }

  yAt(index: number): number {
    return this.data[index * STRIDE + OFFSET_Y];
  }

  pointAt(index: number): Point {
    assertIndex(index, this._size, "Cluster.pointAt");
    return { id: this.idAt(index), x: this.xAt(index), y: this.yAt(index) };
  }

  points(): Point[] {
    return Array.from(this);
  }

  *[Symbol.iterator](): Iterator<Point> {
    for (let i = 0; i < this._size; i++) {
      yield { id: this.idAt(i), x: this.xAt(i), y: this.yAt(i) };
    }
  }

  /**
   * Reorder elements ascending by id. Equal ids keep their relative order.
   */
  sortById(): void {
    const size = this._size;
    const order = Array.from({ length: size }, (_, i) => i);
    order.sort((a, b) => this.idAt(a) - this.idAt(b) || a - b);

    const sorted = new Float64Array(this.data.length);
    for (let i = 0; i < size; i++) {
      const from = order[i] * STRIDE;
      const to = i * STRIDE;
      sorted[to + OFFSET_X] = this.data[from + OFFSET_X];
      sorted[to + OFFSET_Y] = this.data[from + OFFSET_Y];
      sorted[to + OFFSET_ID] = this.data[from + OFFSET_ID];
    }
    this.data = sorted;
  }
}
