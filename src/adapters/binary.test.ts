import { Progression } from "../progression";
import { binaryStrConversion, binaryStrRange } from "./binary";
import { Decimal } from "../decimal";
import { InvalidArgumentError } from "../util";

test("binary string ranges", () => {
  expect([...binaryStrRange("1", "101")]).toEqual(["1", "10", "11", "100", "101"]);
  expect([...binaryStrRange("0", "11", 1, { padding: 4 })]).toEqual([
    "0000",
    "0001",
    "0010",
    "0011",
  ]);
  const evens = binaryStrRange("0", "110", 2);
  expect(String(evens)).toEqual("0-110:2");
  expect(evens.has("100")).toEqual(true);
  expect(evens.has("101")).toEqual(false);
});

test("rejects non-binary strings", () => {
  expect(() => binaryStrRange("12")).toThrow('Not a binary string: "12"');
  expect(() => binaryStrRange("")).toThrow(InvalidArgumentError);
});

test("only whole, non-negative values have binary strings", () => {
  expect(() => binaryStrRange("0", "11", 0.5)).toThrow(
    "Binary string steps must be whole numbers, got 0.5"
  );
  const below = new Progression(binaryStrConversion(), {
    start: -1,
    stop: 1,
    step: 1,
  });
  expect(() => [...below]).toThrow("No binary string for -1");
  expect(() => binaryStrConversion().numToItem(Decimal.parse("1.5"))).toThrow(
    InvalidArgumentError
  );
});
