// istanbul ignore next
export function assertUnreachable(value: never): never {
  console.error("shouldnt have gotten (", value, ")");
  throw new Error(`unreachable`);
}

export function partition<T>(xs: T[], fn: (x: T) => boolean): [T[], T[]] {
  const trues: T[] = [];
  const falses: T[] = [];
  for (const x of xs) {
    if (fn(x)) {
      trues.push(x);
    } else {
      falses.push(x);
    }
  }
  return [trues, falses];
}

// the lower middle when the count is even
export const middleIndex = (length: number) => Math.ceil(length / 2) - 1;

export function firstMiddleLast<T>(items: Iterable<T>): [T, T, T] {
  const all = [...items];
  if (!all.length) {
    throw new IndexOutOfRangeError("No items");
  }
  return [all[0], all[middleIndex(all.length)], all[all.length - 1]];
}

/*
 * index: position in the source string
 * length: length of the offending text
 * NOTE: a zero-length position (e.g. end of input) is underlined with a single caret
 */
export type TokenPosition = {
  index: number;
  length: number;
};

const MAX_OFFSET = 40;

export function showInContext(source: string, pos: TokenPosition): string {
  const from = Math.max(0, pos.index - MAX_OFFSET);
  const to = Math.min(source.length, pos.index + pos.length + MAX_OFFSET);
  const strInContext = source.slice(from, to);
  const underline =
    " ".repeat(pos.index - from) + "^".repeat(Math.max(1, pos.length));
  return [strInContext, underline]
    .filter((line) => line.trimEnd().length > 0)
    .join("\n");
}

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly pos: TokenPosition
  ) {
    super(`${message}\n${showInContext(source, pos)}`);
  }
}

export class InvalidArgumentError extends Error {}

export class NotFoundError extends Error {}

export class IndexOutOfRangeError extends Error {}
