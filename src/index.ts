// src/index.ts

export { LruMap } from "./cache/lru-map";

export { ArrayStore } from "./range/array-store";
export { IndexOutOfBoundsError, InvalidRangeError } from "./range/errors";
export type { QueryCacheErrorCode } from "./range/errors";
export { DEFAULT_RANGE_CACHE_CAPACITY, RangeAggregateCache, rangeCacheKey } from "./range/range-cache";
export { pointUpdate, rangeAggregate, rangeSumDirect, updateDirect } from "./range/query";
export type { RangeQueryContext } from "./range/query";

export { SplayTree, splay, rotateLeft, rotateRight } from "./splay/splay-tree";
export type { SplayNode } from "./splay/splay-tree";

export { MemoizedRecurrence, fibonacci, fibonacciBig } from "./recurrence/memoized";
export type { RecurrenceSpec } from "./recurrence/memoized";
export { createLruFibonacci } from "./recurrence/lru-fibonacci";
export type { LruFibonacci } from "./recurrence/lru-fibonacci";

export type * from "./types";
