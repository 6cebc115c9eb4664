import { Conversion, numericSteps } from "../conversion";
import { Decimal } from "../decimal";
import { Progression } from "../progression";
import { InvalidArgumentError } from "../util";

export type BinaryStrRange = Progression<string, number>;

export type BinaryStrOptions = {
  /** minimum width of produced items, zero padded */
  padding?: number;
};

const BINARY_PATTERN = /^[01]+$/;

export function binaryStrConversion({
  padding = 0,
}: BinaryStrOptions = {}): Conversion<string, number> {
  return {
    itemToNum(item) {
      if (typeof item !== "string") {
        throw new TypeError(`Expected a binary string, got ${typeof item}`);
      }
      if (!BINARY_PATTERN.test(item)) {
        throw new InvalidArgumentError(`Not a binary string: "${item}"`);
      }
      return Decimal.of(BigInt(`0b${item}`));
    },
    numToItem(num) {
      if (!num.isInteger() || num.sign() < 0) {
        throw new InvalidArgumentError(`No binary string for ${num}`);
      }
      return num.unscaled.toString(2).padStart(padding, "0");
    },
    ...numericSteps,
    stepToNum(step) {
      if (!Number.isInteger(step)) {
        throw new InvalidArgumentError(
          `Binary string steps must be whole numbers, got ${step}`
        );
      }
      return numericSteps.stepToNum(step);
    },
  };
}

export function binaryStrRange(
  start: string,
  stop?: string,
  step?: number,
  options?: BinaryStrOptions
): BinaryStrRange {
  return Progression.of(binaryStrConversion(options), start, stop, step);
}
