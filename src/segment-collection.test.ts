import { numberRange } from "./adapters/number";
import { parseSpec } from "./parser";
import { formatSegment, segment } from "./segment";
import { rangeStr, SegmentCollection } from "./segment-collection";
import { IndexOutOfRangeError, InvalidArgumentError } from "./util";

test("add & remove", () => {
  const frames = new SegmentCollection("1-9:3,20-30:2");
  expect([...frames]).toEqual([1, 4, 7, 20, 22, 24, 26, 28, 30]);

  frames.add(100).remove("22-24");
  expect(String(frames)).toEqual("1-9:3,20,26-30:2,100");
  expect(frames.size).toEqual(4);
});

test("remove drops emptied segments", () => {
  expect(String(new SegmentCollection("1-3,5").remove("1-3"))).toEqual("5");
  expect(String(new SegmentCollection("1-3").remove(2))).toEqual("1,3");
  expect(String(new SegmentCollection("1-3").remove(7))).toEqual("1-3");
});

test("insertion order is kept until compact", () => {
  const c = new SegmentCollection("20-30,1-5");
  expect(String(c)).toEqual("20-30,1-5");
  expect(String(c.compact())).toEqual("1-5,20-30");

  const overlapping = new SegmentCollection(["0-10:2", "1-11:2"]);
  expect(String(overlapping.compact())).toEqual("0-11");
});

test("continuous", () => {
  expect(new SegmentCollection("1-5").continuous).toEqual(true);
  expect(new SegmentCollection("1-5:2").continuous).toEqual(false);
  const split = new SegmentCollection("1-3,4-6");
  expect(split.continuous).toEqual(false);
  expect(split.compact().continuous).toEqual(true);
  expect(new SegmentCollection().continuous).toEqual(false);
});

test("accepted arguments", () => {
  const c = new SegmentCollection([1, "3-5", [segment(9)], numberRange(11, 15, 2)]);
  expect(String(c)).toEqual("1,3-5,9,11-15:2");
  expect(String(new SegmentCollection(c))).toEqual("1,3-5,9,11-15:2");
  expect(String(new SegmentCollection())).toEqual("");
  expect(new SegmentCollection().size).toEqual(0);
});

test("indexing", () => {
  const c = new SegmentCollection("20-30,1-5");
  expect(String(c.at(0))).toEqual("20-30");
  expect(String(c.at(-1))).toEqual("1-5");
  expect(() => c.at(2)).toThrow(IndexOutOfRangeError);
  expect(() => c.at(2)).toThrow("Index '2' is out of range.");

  c.set(0, "7");
  expect(String(c)).toEqual("7,1-5");
  expect(() => c.set(0, "1,2")).toThrow(InvalidArgumentError);

  c.insert(1, numberRange(10, 12));
  expect(String(c)).toEqual("7,10-12,1-5");
  c.append(segment(50));
  expect(String(c)).toEqual("7,10-12,1-5,50");

  expect(String(c.pop())).toEqual("50");
  expect(String(c.pop(0))).toEqual("7");
  expect(String(c)).toEqual("10-12,1-5");
});

test("segments are copies", () => {
  const c = new SegmentCollection("1-5");
  c.segments[0].reverse();
  c.at(0).reverse();
  expect(String(c)).toEqual("1-5");
});

test("reverse & reversedItems", () => {
  const c = new SegmentCollection("1-3,7-8");
  expect([...c.reversedItems()]).toEqual([8, 7, 3, 2, 1]);
  expect(String(c.reverse())).toEqual("7-8,1-3");
  expect([...c]).toEqual([7, 8, 1, 2, 3]);
});

test("union & difference leave the original alone", () => {
  const c = new SegmentCollection("1-10");
  expect(String(c.union("15"))).toEqual("1-10,15");
  expect(String(c.difference("4-6"))).toEqual("1-3,7-10");
  expect(String(c)).toEqual("1-10");
});

test("separators", () => {
  const c = new SegmentCollection("1;3-4", { separator: ";" });
  expect(String(c)).toEqual("1;3-4");
  expect(String(c.clone().add("8"))).toEqual("1;3-4;8");
  expect(c.separator).toEqual(";");
});

test("rangeStr", () => {
  expect(rangeStr("1,2,3,4,6,8,10,12")).toEqual("1-4,6-12:2");
  expect(rangeStr([5, 1, 2, 3])).toEqual("1-3,5");
  expect(rangeStr("3 1 2", " ")).toEqual("1-3");
  expect(rangeStr("")).toEqual("");
});

test("reversedItems follows the items", () => {
  const c = new SegmentCollection("1-10:2,20-11:-3");
  expect([...c]).toEqual([1, 3, 5, 7, 9, 20, 17, 14, 11]);
  expect([...c.reversedItems()]).toEqual([11, 14, 17, 20, 9, 7, 5, 3, 1]);
});

test("firstMiddleLast over all items", () => {
  expect(new SegmentCollection("1-3,10-12").firstMiddleLast()).toEqual([
    1, 3, 12,
  ]);
  expect(() => new SegmentCollection().firstMiddleLast()).toThrow(
    IndexOutOfRangeError
  );
});

test("bounds print exactly", () => {
  const spec =
    "9007199254740993,0.10000000000000000001-0.30000000000000000001:0.1";
  expect(String(new SegmentCollection(spec))).toEqual(spec);
  expect(rangeStr(spec)).toEqual(
    "0.10000000000000000001-0.30000000000000000001:0.1,9007199254740993"
  );
  expect(
    rangeStr("9007199254740993,9007199254740995,9007199254740997")
  ).toEqual("9007199254740993-9007199254740997:2");
});

const segmentsOf = (spec: string) =>
  parseSpec(spec).map((s) => formatSegment(s));

test("string form parses back to the same segments", () => {
  for (const spec of [
    "1-9:3,20-30:2,100",
    "0.5-2.5:0.5,-3,10-1:-3",
    "9007199254740993,0.10000000000000000001-0.30000000000000000001:0.1",
  ]) {
    const c = new SegmentCollection(spec);
    expect(segmentsOf(String(c))).toEqual(segmentsOf(spec));
    c.compact();
    expect(segmentsOf(String(c))).toEqual(
      c.segments.map((range) => formatSegment(range.segment))
    );
  }
});

test("compacting twice changes nothing", () => {
  for (const spec of [
    "1,4,5,6,7,9,11",
    "0-10:2,1-11:2,40",
    "20,1,3,5,2,40,60,80,81",
    "0.25-1:0.25,1000000000000000000001-1000000000000000000003",
  ]) {
    const c = new SegmentCollection(spec).compact();
    const once = String(c);
    expect(String(c.compact())).toEqual(once);
  }
  const scattered = new SegmentCollection("20,1,3,5,2,40,60,80,81");
  expect(String(scattered.compact())).toEqual("1-3,5,20-80:20,81");
});
