import {
  firstMiddleLast,
  IndexOutOfRangeError,
  ParseError,
  partition,
  showInContext,
} from "./util";

test("showInContext", () => {
  expect(showInContext("1-x", { index: 2, length: 1 })).toEqual(
    ["1-x", "  ^"].join("\n")
  );

  // end of input
  expect(showInContext("1-", { index: 2, length: 0 })).toEqual(
    ["1-", "  ^"].join("\n")
  );

  const long = "a".repeat(50) + "X" + "b".repeat(50);
  expect(showInContext(long, { index: 50, length: 1 })).toEqual(
    ["a".repeat(40) + "X" + "b".repeat(40), " ".repeat(40) + "^"].join("\n")
  );
});

test("ParseError", () => {
  const err = new ParseError("Bad token", "1-x", { index: 2, length: 1 });
  expect(err.message).toEqual("Bad token\n1-x\n  ^");
  expect(err.source).toEqual("1-x");
  expect(err.pos).toEqual({ index: 2, length: 1 });
  expect(err).toBeInstanceOf(Error);
});

test("partition", () => {
  expect(partition([1, 2, 3, 4, 5], (x) => x % 2 === 1)).toEqual([
    [1, 3, 5],
    [2, 4],
  ]);
});

test("firstMiddleLast", () => {
  expect(firstMiddleLast([1, 2, 3, 4, 5])).toEqual([1, 3, 5]);
  expect(firstMiddleLast(["a", "b", "c", "d"])).toEqual(["a", "b", "d"]);
  expect(firstMiddleLast(new Set([7]))).toEqual([7, 7, 7]);
  expect(() => firstMiddleLast([])).toThrow(IndexOutOfRangeError);
});
