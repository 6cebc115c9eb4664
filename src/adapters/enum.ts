import { Conversion, numericSteps } from "../conversion";
import { Decimal } from "../decimal";
import { Progression } from "../progression";
import { InvalidArgumentError } from "../util";

export type EnumRange = Progression<string, number>;

export const WEEKDAYS = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
] as const;

export const DAYS = ["Sunday", ...WEEKDAYS, "Saturday"] as const;

/** Labels map to their position; positions past the end wrap around. */
export function enumConversion(
  labels: readonly string[]
): Conversion<string, number> {
  if (!labels.length) {
    throw new InvalidArgumentError("An enumerated range needs labels");
  }
  const lookup = new Map(
    labels.map((label, i): [string, number] => [label, i])
  );
  return {
    itemToNum(item) {
      if (typeof item !== "string") {
        throw new TypeError(`Expected a label, got ${typeof item}`);
      }
      const index = lookup.get(item);
      if (index === undefined) {
        throw new InvalidArgumentError(
          `Invalid value for enumerated range: "${item}"`
        );
      }
      return Decimal.of(BigInt(index));
    },
    numToItem(num) {
      const n = num.toNumber();
      return labels[((n % labels.length) + labels.length) % labels.length];
    },
    ...numericSteps,
  };
}

/**
 * ```ts
 * [...enumRange(["low", "mid", "high"])]; // ["low", "mid", "high"]
 * ```
 */
export function enumRange(
  labels: readonly string[],
  start: string = labels[0],
  stop: string = labels[labels.length - 1],
  step?: number
): EnumRange {
  return Progression.of(enumConversion(labels), start, stop, step);
}

export function daysRange(
  start?: string,
  stop?: string,
  step?: number
): EnumRange {
  return enumRange(DAYS, start, stop, step);
}

export function weekdaysRange(
  start?: string,
  stop?: string,
  step?: number
): EnumRange {
  return enumRange(WEEKDAYS, start, stop, step);
}
