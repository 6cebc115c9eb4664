import { Conversion, numericSteps } from "../conversion";
import { Decimal } from "../decimal";
import { Progression } from "../progression";
import { InvalidArgumentError } from "../util";

export type Pow2Range = Progression<number, number>;

/** Items are powers of two; the numeric scale (and the step) is the exponent. */
export const pow2Conversion: Conversion<number, number> = {
  itemToNum(item) {
    if (typeof item !== "number") {
      throw new TypeError(`Expected a number, got ${typeof item}`);
    }
    const exponent = item > 0 ? Math.round(Math.log2(item)) : NaN;
    if (!Number.isFinite(exponent) || 2 ** exponent !== item) {
      throw new InvalidArgumentError(`Value is not a power of 2: ${item}`);
    }
    return Decimal.fromNumber(exponent);
  },
  numToItem: (num) => 2 ** num.toNumber(),
  ...numericSteps,
};

/**
 * ```ts
 * [...pow2Range(1, 64, 2)]; // [1, 4, 16, 64]
 * ```
 */
export function pow2Range(start: number, stop?: number, step?: number): Pow2Range {
  return Progression.of(pow2Conversion, start, stop, step);
}
