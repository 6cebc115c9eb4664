import { Decimal, DecimalLike } from "./decimal";
import { DEFAULT_SEPARATOR } from "./parser";
import { formatSegment, Segment, segment } from "./segment";

// runs shorter than this are listed value by value
const MIN_RUN = 3;

function uniqueSorted(values: Iterable<DecimalLike>): Decimal[] {
  const unique = new Map<string, Decimal>();
  for (const value of values) {
    const num = Decimal.from(value);
    unique.set(num.toString(), num);
  }
  return [...unique.values()].sort(Decimal.compare);
}

function candidateSteps(sorted: Decimal[]): Decimal[] {
  return uniqueSorted(sorted.slice(1).map((num, i) => num.sub(sorted[i])));
}

/*
 * Splits `values` into maximal runs whose consecutive members differ by
 * exactly `step`. A value at position k is keyed by `k*step - value`, so
 * members of one run share a key; keys are compared as decimal strings.
 */
function runsForStep(values: Decimal[], step: Decimal): Decimal[][] {
  const runs: Decimal[][] = [];
  let lastKey: string | null = null;
  values.forEach((value, k) => {
    const key = step.mul(k).sub(value).toString();
    if (key === lastKey) {
      runs[runs.length - 1].push(value);
    } else {
      runs.push([value]);
      lastKey = key;
    }
  });
  return runs;
}

/**
 * Finds the fewest `(start, stop, step)` segments that cover exactly the
 * given values, duplicates collapsed.
 *
 * Every difference between neighbouring sorted values is tried as a step,
 * smallest first. Runs of three or more values with that step become
 * segments and leave the pool; passes repeat for the same step until none
 * is found. Whatever remains is listed as single values.
 *
 * ```ts
 * compactNumbers([8, 10, 12, 1, 2, 3, 4.5, 5.5, 6.5]).map(String);
 * // "1-3", "4.5-6.5", "8-12:2" (as segments)
 * ```
 */
export function compactNumbers(values: Iterable<DecimalLike>): Segment[] {
  let remaining = uniqueSorted(values);
  const segments: Segment[] = [];

  for (const step of candidateSteps(remaining)) {
    let found = true;
    while (found) {
      found = false;
      const leftover: Decimal[] = [];
      for (const run of runsForStep(remaining, step)) {
        if (run.length >= MIN_RUN) {
          segments.push(segment(run[0], run[run.length - 1], step));
          found = true;
        } else {
          leftover.push(...run);
        }
      }
      remaining = leftover;
    }
  }

  for (const value of remaining) {
    segments.push(segment(value));
  }

  return segments.sort((l, r) => l.start.compare(r.start));
}

/** The compacted spec string for a set of numbers. */
export function compactToSpec(
  values: Iterable<DecimalLike>,
  separator = DEFAULT_SEPARATOR
): string {
  return compactNumbers(values)
    .map((s) => formatSegment(s))
    .join(separator);
}
