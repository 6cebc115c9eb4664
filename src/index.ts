export { Decimal } from "./decimal";
export type { DecimalLike } from "./decimal";
export { sameStepConversion, numericSteps } from "./conversion";
export type { Conversion, ItemConversion } from "./conversion";
export { Progression } from "./progression";
export type { Bounds } from "./progression";
export { segment, segmentsEqual, formatSegment } from "./segment";
export type { Segment } from "./segment";
export { tokenizeSegment } from "./lexer";
export type { Token } from "./lexer";
export {
  DEFAULT_SEPARATOR,
  parseSpec,
  parseSpecToken,
  specTokenToSegment,
  splitSpec,
} from "./parser";
export type { SpecToken, SpecPiece } from "./parser";
export { compactNumbers, compactToSpec } from "./compactor";
export { SegmentCollection, rangeStr } from "./segment-collection";
export type { CollectionArg, CollectionOptions } from "./segment-collection";
export {
  firstMiddleLast,
  ParseError,
  InvalidArgumentError,
  NotFoundError,
  IndexOutOfRangeError,
} from "./util";

export {
  numberConversion,
  numberRange,
  irange,
  rangeFromSegment,
} from "./adapters/number";
export type { NumberRange } from "./adapters/number";
export { asciiConversion, asciiRange } from "./adapters/ascii";
export type { AsciiRange } from "./adapters/ascii";
export { binaryStrConversion, binaryStrRange } from "./adapters/binary";
export type { BinaryStrRange, BinaryStrOptions } from "./adapters/binary";
export { pow2Conversion, pow2Range } from "./adapters/pow2";
export type { Pow2Range } from "./adapters/pow2";
export {
  dateConversion,
  datetimeConversion,
  timeConversion,
  dateRange,
  datetimeRange,
  timeRange,
  time,
  durationToSeconds,
  secondsToDuration,
  formatDuration,
} from "./adapters/date";
export type { DateRange, TimeRange, Duration, TimeOfDay } from "./adapters/date";
export {
  enumConversion,
  enumRange,
  daysRange,
  weekdaysRange,
  DAYS,
  WEEKDAYS,
} from "./adapters/enum";
export type { EnumRange } from "./adapters/enum";
