import { NumberRange, rangeFromSegment } from "./adapters/number";
import { compactNumbers } from "./compactor";
import { Decimal } from "./decimal";
import { DEFAULT_SEPARATOR, parseSpec } from "./parser";
import { Progression } from "./progression";
import { formatSegment, Segment, segment } from "./segment";
import {
  firstMiddleLast,
  IndexOutOfRangeError,
  InvalidArgumentError,
  partition,
} from "./util";

export type CollectionArg =
  | SegmentCollection
  | NumberRange
  | Segment
  | string
  | number
  | CollectionArg[];

export type CollectionOptions = {
  separator?: string;
};

/**
 * An ordered list of numeric segments, e.g. the frames of a render job.
 *
 * ```ts
 * const frames = new SegmentCollection("1-9:3,20-30:2");
 * [...frames]; // [1, 4, 7, 20, 22, 24, 26, 28, 30]
 * frames.add(100).remove("22-24");
 * String(frames); // "1-9:3,20,26-30:2,100"
 * ```
 *
 * Insertion order is kept until `compact()` is called.
 */
export class SegmentCollection implements Iterable<number> {
  readonly separator: string;
  private ranges: NumberRange[] = [];

  constructor(
    arg?: CollectionArg,
    { separator = DEFAULT_SEPARATOR }: CollectionOptions = {}
  ) {
    this.separator = separator;
    if (arg !== undefined) {
      this.add(arg);
    }
  }

  get size(): number {
    return this.ranges.length;
  }

  get segments(): NumberRange[] {
    return this.ranges.map((range) => range.clone());
  }

  get continuous(): boolean {
    return this.ranges.length === 1 && this.ranges[0].numericStep.equals(1);
  }

  add(arg: CollectionArg): this {
    this.ranges.push(...this.resolve(arg));
    return this;
  }

  append(arg: CollectionArg): this {
    this.ranges.push(this.resolveOne(arg));
    return this;
  }

  insert(index: number, arg: CollectionArg): this {
    this.ranges.splice(index, 0, this.resolveOne(arg));
    return this;
  }

  at(index: number): NumberRange {
    return this.ranges[this.position(index)].clone();
  }

  set(index: number, arg: CollectionArg): this {
    const i = this.position(index);
    this.ranges[i] = this.resolveOne(arg);
    return this;
  }

  pop(index = -1): NumberRange {
    const [range] = this.ranges.splice(this.position(index), 1);
    return range;
  }

  /**
   * Drops the given values. A segment that loses values is replaced, in
   * place, by the compaction of what it has left.
   */
  remove(arg: CollectionArg): this {
    const excluded = new Set<string>();
    for (const range of this.resolve(arg)) {
      for (const num of range.numbers()) {
        excluded.add(num.toString());
      }
    }

    this.ranges = this.ranges.flatMap((range) => {
      const [kept, dropped] = partition(
        [...range.numbers()],
        (num) => !excluded.has(num.toString())
      );
      if (!dropped.length) return [range];
      return compactNumbers(kept).map(rangeFromSegment);
    });
    return this;
  }

  /** Rebuilds the list as the fewest segments covering every value, sorted. */
  compact(): this {
    const nums: Decimal[] = [];
    for (const range of this.ranges) {
      nums.push(...range.numbers());
    }
    this.ranges = compactNumbers(nums).map(rangeFromSegment);
    return this;
  }

  /** Reverses the order of the segments, not the segments themselves. */
  reverse(): this {
    this.ranges.reverse();
    return this;
  }

  union(arg: CollectionArg): SegmentCollection {
    return this.clone().add(arg);
  }

  difference(arg: CollectionArg): SegmentCollection {
    return this.clone().remove(arg);
  }

  clone(): SegmentCollection {
    return new SegmentCollection(this, { separator: this.separator });
  }

  *items(): Generator<number> {
    for (const range of this.ranges) {
      yield* range;
    }
  }

  [Symbol.iterator](): Iterator<number> {
    return this.items();
  }

  *reversedItems(): Generator<number> {
    for (let i = this.ranges.length - 1; i >= 0; i--) {
      yield* this.ranges[i].reversedItems();
    }
  }

  firstMiddleLast(): [number, number, number] {
    return firstMiddleLast(this);
  }

  /** Bounds are printed from their exact decimal values. */
  toString(): string {
    return this.ranges
      .map((range) => formatSegment(range.segment))
      .join(this.separator);
  }

  private position(index: number): number {
    const i = index < 0 ? index + this.ranges.length : index;
    if (!Number.isInteger(i) || i < 0 || i >= this.ranges.length) {
      throw new IndexOutOfRangeError(`Index '${index}' is out of range.`);
    }
    return i;
  }

  private resolveOne(arg: CollectionArg): NumberRange {
    const ranges = this.resolve(arg);
    if (ranges.length !== 1) {
      throw new InvalidArgumentError(
        `Expected exactly one segment, found ${ranges.length} in ${String(arg)}`
      );
    }
    return ranges[0];
  }

  private resolve(arg: CollectionArg): NumberRange[] {
    if (arg instanceof SegmentCollection) {
      return arg.segments;
    }
    if (arg instanceof Progression) {
      return [arg.clone()];
    }
    if (typeof arg === "string") {
      return parseSpec(arg, this.separator).map(rangeFromSegment);
    }
    if (typeof arg === "number") {
      return [rangeFromSegment(segment(arg))];
    }
    if (Array.isArray(arg)) {
      return arg.flatMap((item) => this.resolve(item));
    }
    return [rangeFromSegment(arg)];
  }
}

/**
 * The compacted spec string of anything a `SegmentCollection` accepts.
 *
 * ```ts
 * rangeStr("1,2,3,4,6,8,10,12"); // "1-4,6-12:2"
 * ```
 */
export function rangeStr(arg: CollectionArg, separator?: string): string {
  return new SegmentCollection(arg, { separator }).compact().toString();
}
