import { asciiConversion, asciiRange } from "./ascii";
import { InvalidArgumentError } from "../util";

test("ascii ranges", () => {
  expect([...asciiRange("a", "z", 4)]).toEqual(["a", "e", "i", "m", "q", "u", "y"]);
  expect([...asciiRange("z", "a", -5)]).toEqual(["z", "u", "p", "k", "f", "a"]);
  expect(String(asciiRange("a", "e"))).toEqual("a-e");
  expect(String(asciiRange("a", "e", 2))).toEqual("a-e:2");
  expect(asciiRange("A", "Z").length).toEqual(26);
});

test("rejects anything but one ascii character", () => {
  expect(() => asciiConversion.itemToNum("ab")).toThrow(InvalidArgumentError);
  expect(() => asciiConversion.itemToNum("é")).toThrow(InvalidArgumentError);
  expect(() => asciiConversion.itemToNum("")).toThrow(InvalidArgumentError);
});
