import moo from "moo";
import { TokenPosition } from "./util";

export type Token = {
  type: "number" | "dash" | "colon" | "invalid";
  value: string;
} & TokenPosition;

// one comma-delimited piece of a spec, e.g. "-10--20:-5"
const segmentTokenizer = moo.compile({
  number: /[0-9]+(?:\.[0-9]*)?|\.[0-9]+/,
  dash: "-",
  colon: ":",
  invalid: moo.error,
});

/**
 * Tokenizes a single range specification. Anything the grammar has no token
 * for ends the stream with one `invalid` token spanning the rest of the text.
 * `offset` shifts positions when `text` is a slice of a longer spec.
 */
export function tokenizeSegment(text: string, offset = 0): Token[] {
  const tokens: Token[] = [];
  for (const tok of segmentTokenizer.reset(text)) {
    tokens.push({
      type: tokenType(tok.type),
      value: tok.value,
      index: tok.offset + offset,
      length: tok.text.length,
    });
  }
  return tokens;
}

function tokenType(type: string | undefined): Token["type"] {
  switch (type) {
    case "number":
    case "dash":
    case "colon":
      return type;
    default:
      return "invalid";
  }
}
