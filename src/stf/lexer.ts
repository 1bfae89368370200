import { STF_TAGS, VALUELESS_TAGS } from "./types.js";
import type { Chunk, Diagnostics } from "./types.js";

const OPEN_TAG = "{";
const CLOSE_TAG = "}";
const ESCAPE_MARKER = " ";

// The C locale isspace() set.
const WHITESPACE = new Set([" ", "\t", "\n", "\v", "\f", "\r"]);

export function isSpace(ch: string): boolean {
  return WHITESPACE.has(ch);
}

function trimTrailingSpace(text: string): string {
  let end = text.length;
  while (end > 0 && isSpace(text[end - 1])) {
    end--;
  }
  return text.slice(0, end);
}

type LexState = "comment" | "tag" | "data";

/**
 * Splits an STF character stream into chunks of `{tag}value`.
 *
 * The lexer knows nothing about document structure. Anything before the
 * first tag is reported as a synthetic `S` (comment) chunk, and `{` followed
 * by a single space is a literal brace inside a value.
 */
export class ChunkLexer {
  private pos = 0;

  constructor(
    private readonly source: string,
    private readonly diagnostics?: Diagnostics
  ) {}

  get eof(): boolean {
    return this.pos >= this.source.length;
  }

  /**
   * Read the next chunk, or null once the input is exhausted. A chunk that
   * is still open when the input ends is dropped.
   */
  next(): Chunk | null {
    let state: LexState = "comment";
    let tag = "";
    let value = "";

    while (this.pos < this.source.length) {
      const c = this.source[this.pos++];

      if (state === "comment") {
        if (isSpace(c)) {
          continue;
        }
        if (c === OPEN_TAG) {
          state = "tag";
          continue;
        }
        // Prose before any tag.
        state = "data";
        tag = STF_TAGS.COMMENT;
      }

      if (state === "data") {
        if (c === OPEN_TAG) {
          if (this.source[this.pos] !== ESCAPE_MARKER) {
            this.pos--;
            return { tag, value: trimTrailingSpace(value) };
          }
          this.pos++;
        }
        if (isSpace(c) && value.length === 0) {
          continue;
        }
        value += c;
        continue;
      }

      // state === "tag"
      if (c === CLOSE_TAG) {
        state = "data";
        if (tag.length === 0) {
          this.diagnostics?.warn("found an empty tag, data may be malformed");
          continue;
        }
        if (VALUELESS_TAGS.has(tag)) {
          return { tag, value: null };
        }
        continue;
      }
      tag += c;
    }

    return null;
  }

  /** Drain the remaining input. */
  *chunks(): Generator<Chunk> {
    let chunk = this.next();
    while (chunk) {
      yield chunk;
      chunk = this.next();
    }
  }
}
