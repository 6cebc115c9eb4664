import { Conversion, sameStepConversion } from "../conversion";
import { Decimal } from "../decimal";
import { Progression } from "../progression";
import { Segment } from "../segment";

export type NumberRange = Progression<number, number>;

const formatNumber = (value: number) => Decimal.fromNumber(value).toString();

/**
 * Numbers travel through `Decimal`, so fractional steps never accumulate
 * binary rounding error: `numberRange(0, 1, 0.1)` ends exactly on `1`.
 */
export const numberConversion: Conversion<number, number> = sameStepConversion({
  itemToNum(item: number) {
    if (typeof item !== "number") {
      throw new TypeError(`Expected a number, got ${typeof item}`);
    }
    return Decimal.fromNumber(item);
  },
  numToItem: (num: Decimal) => num.toNumber(),
  formatItem: formatNumber,
});

export function numberRange(
  start: number,
  stop?: number,
  step?: number
): NumberRange {
  return Progression.of(numberConversion, start, stop, step);
}

/** An inclusive counterpart of `range()`: the stop value is produced too. */
export const irange = numberRange;

export function rangeFromSegment(bounds: Segment): NumberRange {
  return new Progression(numberConversion, bounds);
}
