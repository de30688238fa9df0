/**
 * Base class for every error raised by the clustering core.
 */
export class ClusteringError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A cluster could not grow its storage to the requested capacity.
 */
export class AllocationFailure extends ClusteringError {
  readonly requestedCapacity: number;

  constructor(requestedCapacity: number, options?: { cause?: unknown }) {
    super(
      `Cannot allocate storage for ${requestedCapacity} points`,
      options,
    );
    this.requestedCapacity = requestedCapacity;
  }
}

/**
 * A caller broke an operation's contract (empty cluster, index out of
 * range, target count out of range). Not recoverable.
 */
export class PreconditionViolation extends ClusteringError {}

/** Throws PreconditionViolation unless 0 <= index < count. */
export function assertIndex(index: number, count: number, what: string): void {
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new PreconditionViolation(
      `${what}: index ${index} is out of range [0, ${count})`,
    );
  }
}
