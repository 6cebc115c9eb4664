import { Decimal, DecimalLike } from "./decimal";
import { InvalidArgumentError } from "./util";

/** `(start, stop, step)` in numeric space; the unit of parsing and compaction. */
export interface Segment {
  readonly start: Decimal;
  readonly stop: Decimal;
  readonly step: Decimal;
}

export function segment(
  start: DecimalLike,
  stop: DecimalLike = start,
  step: DecimalLike = 1
): Segment {
  const s = Decimal.from(step);
  if (s.isZero()) {
    throw new InvalidArgumentError("Step cannot be 0.");
  }
  return { start: Decimal.from(start), stop: Decimal.from(stop), step: s };
}

export function segmentsEqual(left: Segment, right: Segment): boolean {
  return (
    left.start.equals(right.start) &&
    left.stop.equals(right.stop) &&
    left.step.equals(right.step)
  );
}

export function formatSegment(
  { start, stop, step }: Segment,
  formatItem: (num: Decimal) => string = String,
  formatStep: (num: Decimal) => string = String
): string {
  if (start.equals(stop)) return formatItem(start);
  const spec = `${formatItem(start)}-${formatItem(stop)}`;
  return step.equals(1) ? spec : `${spec}:${formatStep(step)}`;
}
