export type QueryCacheErrorCode = "QUERY_CACHE_INDEX_OUT_OF_BOUNDS" | "QUERY_CACHE_INVALID_RANGE";

/** Thrown for an index that is not an integer in `[0, length)`. */
export class IndexOutOfBoundsError extends Error {
  readonly code: QueryCacheErrorCode = "QUERY_CACHE_INDEX_OUT_OF_BOUNDS";

  constructor(
    readonly index: number,
    readonly length: number,
  ) {
    super(`Index ${index} out of bounds for length ${length}`);
    this.name = "IndexOutOfBoundsError";
  }
}

/** Thrown for a range whose lower bound exceeds its upper bound. */
export class InvalidRangeError extends Error {
  readonly code: QueryCacheErrorCode = "QUERY_CACHE_INVALID_RANGE";

  constructor(
    readonly lo: number,
    readonly hi: number,
  ) {
    super(`Invalid range [${lo}, ${hi}]: lower bound exceeds upper bound`);
    this.name = "InvalidRangeError";
  }
}
