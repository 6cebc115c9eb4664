import { Conversion, formatItem, formatStep } from "./conversion";
import { Decimal, DecimalLike } from "./decimal";
import { formatSegment, Segment, segment } from "./segment";
import {
  IndexOutOfRangeError,
  InvalidArgumentError,
  middleIndex,
  NotFoundError,
} from "./util";

export type Bounds = {
  start: DecimalLike;
  stop: DecimalLike;
  step: DecimalLike;
};

/**
 * An inclusive arithmetic progression. Start, stop and step are held as
 * exact decimals; items are converted on the way in and out.
 *
 * ```ts
 * const odds = numberRange(1, 10, 2);
 * [...odds]; // [1, 3, 5, 7, 9]
 * String(odds); // "1-10:2"
 * ```
 */
export class Progression<Item, Step = Item> implements Iterable<Item> {
  private _start: Decimal;
  private _stop: Decimal;
  private _step: Decimal;

  constructor(
    public readonly conversion: Conversion<Item, Step>,
    bounds: Bounds
  ) {
    const { start, stop, step } = segment(
      bounds.start,
      bounds.stop,
      bounds.step
    );
    this._start = start;
    this._stop = stop;
    this._step = step;
  }

  /**
   * Builds a progression from items. Without a stop the progression holds
   * the single start item; without a step it counts by 1.
   */
  static of<Item, Step>(
    conversion: Conversion<Item, Step>,
    start: Item,
    stop: Item = start,
    step?: Step
  ): Progression<Item, Step> {
    return new Progression(conversion, {
      start: conversion.itemToNum(start),
      stop: conversion.itemToNum(stop),
      step: step === undefined ? Decimal.ONE : conversion.stepToNum(step),
    });
  }

  get start(): Item {
    return this.conversion.numToItem(this._start);
  }

  get stop(): Item {
    return this.conversion.numToItem(this._stop);
  }

  get step(): Step {
    return this.conversion.numToStep(this._step);
  }

  get numericStart(): Decimal {
    return this._start;
  }

  get numericStop(): Decimal {
    return this._stop;
  }

  get numericStep(): Decimal {
    return this._step;
  }

  get segment(): Segment {
    return { start: this._start, stop: this._stop, step: this._step };
  }

  get length(): number {
    const steps = this._stop.sub(this._start).floorDiv(this._step) + 1n;
    return steps > 0n ? Number(steps) : 0;
  }

  *[Symbol.iterator](): Iterator<Item> {
    for (const num of this.numbers()) {
      yield this.conversion.numToItem(num);
    }
  }

  iterate(): Iterator<Item> {
    return this[Symbol.iterator]();
  }

  /** The progression's values in numeric space. */
  *numbers(): Generator<Decimal> {
    for (let num = this._start; this.inRange(num); num = num.add(this._step)) {
      yield num;
    }
  }

  has(item: Item): boolean {
    return this.position(this.conversion.itemToNum(item)) !== null;
  }

  contains(item: Item): boolean {
    return this.has(item);
  }

  count(item: Item): number {
    return this.has(item) ? 1 : 0;
  }

  index(item: Item): number {
    const position = this.position(this.conversion.itemToNum(item));
    if (position === null) {
      throw new NotFoundError(`${formatItem(this.conversion, item)} is not in ${this}`);
    }
    return position;
  }

  at(index: number): Item {
    if (!Number.isInteger(index)) {
      throw new InvalidArgumentError(`Invalid index: ${index}`);
    }
    const length = this.length;
    const i = index < 0 ? index + length : index;
    if (i < 0 || i >= length) {
      throw new IndexOutOfRangeError(`Index '${index}' is out of range.`);
    }
    return this.conversion.numToItem(this._start.add(this._step.mul(i)));
  }

  slice(begin = 0, end = this.length): Item[] {
    const length = this.length;
    const clamp = (i: number) =>
      i < 0 ? Math.max(i + length, 0) : Math.min(i, length);
    const items: Item[] = [];
    for (let i = clamp(begin); i < clamp(end); i++) {
      items.push(this.at(i));
    }
    return items;
  }

  *enumerate(offset = 0): Generator<[number, Item]> {
    let i = offset;
    for (const item of this) {
      yield [i++, item];
    }
  }

  *excluding(items: Iterable<Item>): Generator<Item> {
    const excluded = new Set<string>();
    for (const item of items) {
      excluded.add(this.conversion.itemToNum(item).toString());
    }
    for (const num of this.numbers()) {
      if (!excluded.has(num.toString())) {
        yield this.conversion.numToItem(num);
      }
    }
  }

  *repeat(times = 2): Generator<Item> {
    if (!Number.isInteger(times) || times < 1) {
      throw new InvalidArgumentError(
        `Repeat count must be an integer >= 1, got ${times}`
      );
    }
    for (let t = 0; t < times; t++) {
      yield* this;
    }
  }

  /** Visits every item exactly once, in shuffled order. */
  *random(rng: () => number = Math.random): Generator<Item> {
    const indices = Array.from({ length: this.length }, (_, i) => i);
    for (let i = indices.length - 1; i > 0; i--) {
      const j = Math.floor(rng() * (i + 1));
      [indices[i], indices[j]] = [indices[j], indices[i]];
    }
    for (const i of indices) {
      yield this.at(i);
    }
  }

  firstMiddleLast(): [Item, Item, Item] {
    const length = this.length;
    if (length === 0) {
      throw new IndexOutOfRangeError(`${this} is empty`);
    }
    return [this.at(0), this.at(middleIndex(length)), this.at(-1)];
  }

  /** The items last to first; unlike `reversed()`, never leaves the lattice. */
  *reversedItems(): Generator<Item> {
    for (let i = this.length - 1; i >= 0; i--) {
      yield this.at(i);
    }
  }

  /** Reverses the progression in place. */
  reverse(): void {
    [this._start, this._stop] = [this._stop, this._start];
    this._step = this._step.negate();
  }

  reversed(): Progression<Item, Step> {
    const copy = this.clone();
    copy.reverse();
    return copy;
  }

  clone(): Progression<Item, Step> {
    return new Progression(this.conversion, this.segment);
  }

  /** Compares numeric start, stop & step; items are never materialised. */
  equals(other: Progression<Item, Step>): boolean {
    return (
      this._start.equals(other._start) &&
      this._stop.equals(other._stop) &&
      this._step.equals(other._step)
    );
  }

  toString(): string {
    return formatSegment(
      this.segment,
      (num) => formatItem(this.conversion, this.conversion.numToItem(num)),
      (num) => formatStep(this.conversion, this.conversion.numToStep(num))
    );
  }

  private inRange(num: Decimal): boolean {
    return this._step.sign() > 0
      ? num.gte(this._start) && num.lte(this._stop)
      : num.lte(this._start) && num.gte(this._stop);
  }

  private position(num: Decimal): number | null {
    if (!this.inRange(num)) return null;
    const offset = num.sub(this._start);
    if (!offset.isMultipleOf(this._step)) return null;
    return Number(offset.floorDiv(this._step));
  }
}
