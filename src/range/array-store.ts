import { IndexOutOfBoundsError, InvalidRangeError } from "./errors";

/**
 * The mutable backing sequence for range queries.
 * Holds its own copy of the values; every write goes through `set`.
 */
export class ArrayStore {
  private readonly _values: number[];

  constructor(values: Iterable<number>) {
    this._values = [...values];
    for (const v of this._values) {
      if (!Number.isFinite(v)) throw new Error(`ArrayStore values must be finite numbers, got ${v}`);
    }
  }

  get length(): number {
    return this._values.length;
  }

  at(index: number): number {
    this.checkIndex(index);
    return this._values[index];
  }

  set(index: number, value: number): void {
    this.checkIndex(index);
    if (!Number.isFinite(value)) throw new Error(`ArrayStore values must be finite numbers, got ${value}`);
    this._values[index] = value;
  }

  /** Sum of the inclusive range `[lo, hi]`. */
  sum(lo: number, hi: number): number {
    this.checkRange(lo, hi);
    let total = 0;
    for (let i = lo; i <= hi; i++) total += this._values[i];
    return total;
  }

  checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this._values.length) {
      throw new IndexOutOfBoundsError(index, this._values.length);
    }
  }

  checkRange(lo: number, hi: number): void {
    this.checkIndex(lo);
    this.checkIndex(hi);
    if (lo > hi) throw new InvalidRangeError(lo, hi);
  }

  toArray(): number[] {
    return [...this._values];
  }
}
