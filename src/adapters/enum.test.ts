import { Decimal } from "../decimal";
import {
  daysRange,
  enumConversion,
  enumRange,
  weekdaysRange,
  WEEKDAYS,
} from "./enum";
import { InvalidArgumentError } from "../util";

test("enumerated ranges", () => {
  expect([...enumRange(["low", "mid", "high"])]).toEqual(["low", "mid", "high"]);
  expect([...weekdaysRange()]).toEqual([...WEEKDAYS]);
  expect([...daysRange("Monday", "Friday", 2)]).toEqual([
    "Monday",
    "Wednesday",
    "Friday",
  ]);
  expect(String(daysRange("Monday", "Friday", 2))).toEqual("Monday-Friday:2");
  expect([...daysRange("Saturday", "Sunday", -3)]).toEqual([
    "Saturday",
    "Wednesday",
    "Sunday",
  ]);
});

test("positions wrap around", () => {
  const conversion = enumConversion(["a", "b"]);
  expect(conversion.numToItem(Decimal.of(3n))).toEqual("b");
  expect(conversion.numToItem(Decimal.of(-2n))).toEqual("a");
});

test("unknown labels", () => {
  expect(() => daysRange("Funday")).toThrow(
    'Invalid value for enumerated range: "Funday"'
  );
  expect(() => enumConversion([])).toThrow(InvalidArgumentError);
});
