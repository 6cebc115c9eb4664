import { Conversion } from "../conversion";
import { Decimal } from "../decimal";
import { Progression } from "../progression";
import { InvalidArgumentError } from "../util";

export type Duration = {
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
};

export type TimeOfDay = {
  hour: number;
  minute: number;
  second: number;
};

export type DateRange = Progression<Date, Duration>;
export type TimeRange = Progression<TimeOfDay, Duration>;

const SECONDS_PER_DAY = 86400;

const UNITS = [
  ["days", SECONDS_PER_DAY],
  ["hours", 3600],
  ["minutes", 60],
] as const;

export function durationToSeconds(duration: Duration): Decimal {
  if (typeof duration !== "object" || duration === null) {
    throw new TypeError(`Expected a duration, got ${typeof duration}`);
  }
  let seconds = Decimal.fromNumber(duration.seconds ?? 0);
  for (const [unit, size] of UNITS) {
    seconds = seconds.add(Decimal.fromNumber(duration[unit] ?? 0).mul(size));
  }
  return seconds;
}

/** Splits seconds into days, hours, minutes & seconds, dropping zero fields. */
export function secondsToDuration(num: Decimal): Duration {
  const sign = num.sign() < 0 ? -1 : 1;
  let rest = num.abs();
  const duration: Duration = {};
  for (const [unit, size] of UNITS) {
    const whole = rest.floorDiv(size);
    if (whole > 0n) {
      duration[unit] = sign * Number(whole);
      rest = rest.sub(Decimal.of(whole).mul(size));
    }
  }
  if (!rest.isZero() || num.isZero()) {
    duration.seconds = sign * rest.toNumber();
  }
  return duration;
}

/** ISO 8601, e.g. `P1D`, `PT1H30M`, `-PT0.5S`. */
export function formatDuration(duration: Duration): string {
  const seconds = durationToSeconds(duration);
  const parts = secondsToDuration(seconds.abs());
  const date = parts.days ? `${parts.days}D` : "";
  const time = [
    parts.hours ? `${parts.hours}H` : "",
    parts.minutes ? `${parts.minutes}M` : "",
    parts.seconds !== undefined ? `${parts.seconds}S` : "",
  ].join("");
  return `${seconds.sign() < 0 ? "-" : ""}P${date}${time ? `T${time}` : ""}`;
}

function dateToSeconds(item: Date): Decimal {
  if (!(item instanceof Date)) {
    throw new TypeError(`Expected a Date, got ${typeof item}`);
  }
  const ms = item.getTime();
  if (Number.isNaN(ms)) {
    throw new InvalidArgumentError("Invalid date");
  }
  return Decimal.of(BigInt(ms), 3);
}

const secondsToDate = (num: Decimal) => new Date(num.mul(1000).toNumber());

const durationSteps = {
  stepToNum: durationToSeconds,
  numToStep: secondsToDuration,
  formatStep: formatDuration,
};

/** Instants, counted in seconds since the Unix epoch. */
export const datetimeConversion: Conversion<Date, Duration> = {
  itemToNum: dateToSeconds,
  numToItem: secondsToDate,
  formatItem: (item) => item.toISOString(),
  ...durationSteps,
};

/** Calendar days (UTC); the time of day of an item is ignored. */
export const dateConversion: Conversion<Date, Duration> = {
  itemToNum(item) {
    const seconds = dateToSeconds(item);
    return seconds.sub(mod(seconds, SECONDS_PER_DAY));
  },
  numToItem: secondsToDate,
  formatItem: (item) => item.toISOString().slice(0, 10),
  ...durationSteps,
};

function mod(num: Decimal, size: number): Decimal {
  return num.sub(Decimal.of(num.floorDiv(size)).mul(size));
}

function timeToSeconds(item: TimeOfDay): Decimal {
  if (typeof item !== "object" || item === null) {
    throw new TypeError(`Expected a time of day, got ${typeof item}`);
  }
  const { hour, minute, second } = item;
  if (
    !Number.isInteger(hour) || hour < 0 || hour > 23 ||
    !Number.isInteger(minute) || minute < 0 || minute > 59 ||
    !Number.isFinite(second) || second < 0 || second >= 60
  ) {
    throw new InvalidArgumentError(
      `Invalid time of day: ${hour}:${minute}:${second}`
    );
  }
  return Decimal.fromNumber(second).add(hour * 3600 + minute * 60);
}

const pad = (n: number) => String(n).padStart(2, "0");

/** Seconds since midnight; values past one day wrap around. */
export const timeConversion: Conversion<TimeOfDay, Duration> = {
  itemToNum: timeToSeconds,
  numToItem(num) {
    const seconds = mod(num, SECONDS_PER_DAY);
    const minutes = Number(seconds.floorDiv(60));
    return {
      hour: Math.floor(minutes / 60),
      minute: minutes % 60,
      second: mod(seconds, 60).toNumber(),
    };
  },
  formatItem: ({ hour, minute, second }) =>
    `${pad(hour)}:${pad(minute)}:${second < 10 ? "0" : ""}${second}`,
  ...durationSteps,
};

export function dateRange(start: Date, stop: Date, step: Duration): DateRange {
  return Progression.of(dateConversion, start, stop, step);
}

export function datetimeRange(
  start: Date,
  stop: Date,
  step: Duration
): DateRange {
  return Progression.of(datetimeConversion, start, stop, step);
}

/**
 * A stop earlier in the day than the start rolls over midnight:
 *
 * ```ts
 * timeRange(time(23, 0, 0), time(1, 0, 0), { hours: 1 }).toString();
 * // "23:00:00-01:00:00:PT1H"
 * ```
 */
export function timeRange(
  start: TimeOfDay,
  stop: TimeOfDay,
  step: Duration
): TimeRange {
  let startNum = timeToSeconds(start);
  let stopNum = timeToSeconds(stop);
  const stepNum = durationToSeconds(step);
  if (stepNum.sign() > 0 && stopNum.lt(startNum)) {
    stopNum = stopNum.add(SECONDS_PER_DAY);
  } else if (stepNum.sign() < 0 && startNum.lt(stopNum)) {
    startNum = startNum.add(SECONDS_PER_DAY);
  }
  return new Progression(timeConversion, {
    start: startNum,
    stop: stopNum,
    step: stepNum,
  });
}

export function time(hour: number, minute = 0, second = 0): TimeOfDay {
  return { hour, minute, second };
}
