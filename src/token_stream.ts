import { err, ok, type Result } from "./util.js";
import type { Vocabulary } from "./vocabulary.js";

/**
 * Pull interface over raw token text. Text files and decoded token-id arrays
 * are both adapted to this before parsing.
 */
export interface TokenStream {
  next(): string | undefined;
}

export function arrayTokenStream(tokens: readonly string[]): TokenStream {
  let i = 0;
  return {
    next(): string | undefined {
      if (i >= tokens.length) return undefined;
      const t = tokens[i];
      i += 1;
      return t;
    },
  };
}

/** Splits a `->`-joined sequence; empty pieces (trailing or doubled separators) are dropped. */
export function splitSequence(text: string): string[] {
  return text
    .split("->")
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
}

export function textTokenStream(text: string): TokenStream {
  return arrayTokenStream(splitSequence(text));
}

/**
 * Maps token ids to text. Decoding stops at the truncate token, so padding
 * after it never has to be in the vocabulary.
 */
export function decodeIds(ids: readonly number[], vocab: Vocabulary, truncateToken: string): Result<string[], string> {
  const out: string[] = [];
  for (let i = 0; i < ids.length; i += 1) {
    const id = ids[i];
    const token = vocab.get(id);
    if (token === undefined) return err(`Vocabulary has no token for id ${id} (position ${i})`);
    out.push(token);
    if (token === truncateToken) break;
  }
  return ok(out);
}
