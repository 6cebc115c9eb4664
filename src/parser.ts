import { Decimal } from "./decimal";
import { Token, tokenizeSegment } from "./lexer";
import { Segment, segment } from "./segment";
import { assertUnreachable, ParseError, TokenPosition } from "./util";

export const DEFAULT_SEPARATOR = ",";

export type SpecToken =
  | { type: "single"; value: Decimal; text: string }
  | { type: "range"; start: Decimal; stop: Decimal; text: string }
  | {
      type: "stepped";
      start: Decimal;
      stop: Decimal;
      step: Decimal;
      text: string;
    };

/** A piece of a spec string between separators, and where it starts. */
export type SpecPiece = { text: string; index: number };

type EofToken = { type: "eof" } & TokenPosition;

const showToken = (token: Token | EofToken) =>
  token.type === "eof" ? "(end of input)" : `"${token.value}"`;

class InternalParseError {
  constructor(
    public readonly message: string,
    public readonly pos: TokenPosition
  ) {}
}

class MatchError extends InternalParseError {
  constructor(expected: string, received: Token | EofToken) {
    super(`Expected ${expected}, received ${showToken(received)}`, {
      index: received.index,
      length: received.length,
    });
  }
}

class ParseState {
  private index = 0;
  constructor(
    private readonly tokens: Token[],
    private readonly end: number
  ) {}
  next(): Token | EofToken {
    return this.tokens[this.index++] || this.eofToken();
  }
  peek(): Token | EofToken {
    return this.tokens[this.index] || this.eofToken();
  }
  done(): boolean {
    return this.index >= this.tokens.length;
  }
  private eofToken(): EofToken {
    return { type: "eof", index: this.end, length: 0 };
  }
}

// NUMBER = "-"? number
function matchNumber(state: ParseState): Decimal {
  let sign = "";
  if (state.peek().type === "dash") {
    state.next();
    sign = "-";
  }
  const token = state.next();
  if (token.type !== "number") {
    throw new MatchError("a number", token);
  }
  return Decimal.parse(sign + token.value);
}

function matchSpecToken(state: ParseState, text: string): SpecToken {
  const start = matchNumber(state);
  if (state.done()) {
    return { type: "single", value: start, text };
  }

  const dash = state.next();
  if (dash.type !== "dash") {
    throw new MatchError(`"-"`, dash);
  }
  const stop = matchNumber(state);
  if (state.done()) {
    return { type: "range", start, stop, text };
  }

  const colon = state.next();
  if (colon.type !== "colon") {
    throw new MatchError(`":"`, colon);
  }
  const step = matchNumber(state);
  if (!state.done()) {
    throw new MatchError("end of input", state.peek());
  }
  return { type: "stepped", start, stop, step, text };
}

/**
 * Parses one range specification: `N`, `N-N` or `N-N:N`.
 *
 * `source` and `index` locate `text` inside a longer spec for error messages.
 */
export function parseSpecToken(
  text: string,
  source = text,
  index = 0
): SpecToken {
  const tokens = tokenizeSegment(text, index);
  try {
    return matchSpecToken(new ParseState(tokens, index + text.length), text);
  } catch (e) {
    // istanbul ignore else
    if (e instanceof InternalParseError) {
      throw new ParseError(
        `Unable to parse range specification "${text}": ${e.message}`,
        source,
        e.pos
      );
    } else {
      throw e;
    }
  }
}

export function specTokenToSegment(token: SpecToken): Segment {
  switch (token.type) {
    case "single":
      return segment(token.value);
    case "range":
      return segment(token.start, token.stop);
    case "stepped":
      return segment(token.start, token.stop, token.step);
    // istanbul ignore next
    default:
      return assertUnreachable(token);
  }
}

const escapeRegExp = (str: string) => str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

function separatorPattern(separator: string): RegExp {
  const core = separator.trim();
  return core ? new RegExp(`\\s*${escapeRegExp(core)}\\s*`, "g") : /\s+/g;
}

/**
 * Splits a spec on `separator`, ignoring whitespace around each separator.
 * An empty or blank spec has no pieces.
 */
export function splitSpec(
  spec: string,
  separator = DEFAULT_SEPARATOR
): SpecPiece[] {
  const trimmed = spec.trim();
  if (!trimmed) return [];

  const pieces: SpecPiece[] = [];
  const pattern = separatorPattern(separator);
  let index = spec.length - spec.trimStart().length;
  const end = index + trimmed.length;
  let match: RegExpExecArray | null;
  pattern.lastIndex = index;
  while ((match = pattern.exec(spec)) && match.index < end) {
    pieces.push({ text: spec.slice(index, match.index), index });
    index = pattern.lastIndex;
  }
  pieces.push({ text: spec.slice(index, end), index });
  return pieces;
}

/**
 * Parses a whole spec such as `"1-10:2, 15, 20-30"` into segments. Fails as
 * a whole on the first bad piece.
 */
export function parseSpec(
  spec: string,
  separator = DEFAULT_SEPARATOR
): Segment[] {
  return splitSpec(spec, separator).map(({ text, index }) =>
    specTokenToSegment(parseSpecToken(text, spec, index))
  );
}
