import { Conversion, numericSteps } from "../conversion";
import { Decimal } from "../decimal";
import { Progression } from "../progression";
import { InvalidArgumentError } from "../util";

export type AsciiRange = Progression<string, number>;

export const asciiConversion: Conversion<string, number> = {
  itemToNum(item) {
    if (typeof item !== "string") {
      throw new TypeError(`Expected a character, got ${typeof item}`);
    }
    if (item.length !== 1 || item.charCodeAt(0) > 0x7f) {
      throw new InvalidArgumentError(`Not an ascii character: "${item}"`);
    }
    return Decimal.of(BigInt(item.charCodeAt(0)));
  },
  numToItem: (num) => String.fromCharCode(num.toNumber()),
  ...numericSteps,
};

/**
 * Every 4th lowercase letter:
 *
 * ```ts
 * [...asciiRange("a", "z", 4)]; // ["a", "e", "i", "m", "q", "u", "y"]
 * ```
 */
export function asciiRange(
  start: string,
  stop?: string,
  step?: number
): AsciiRange {
  return Progression.of(asciiConversion, start, stop, step);
}
