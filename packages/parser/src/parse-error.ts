/**
 * Structured parse diagnostics.
 *
 * A ParseError is a non-empty stack of frames. The first frame is the leaf
 * failure (what a primitive expected); every later frame is context added by
 * `label` while the failure unwound through the grammar. Errors are plain
 * values: `push` returns a new stack and leaves the receiver untouched, so
 * two alternatives may extend the same error independently.
 */

import type { Location } from "./location.js";

/** One diagnostic frame: a message anchored at a location. */
export interface Frame {
  readonly location: Location;
  readonly message: string;
}

/** Serialisable snapshot of a ParseError. */
export interface ParseErrorJSON {
  message: string;
  line: number;
  column: number;
  offset: number;
  context: string[];
}

export class ParseError {
  private constructor(
    /** Frames ordered from the innermost failure to the outermost context. */
    readonly frames: readonly [Frame, ...Frame[]]
  ) {}

  /** A one-frame error. */
  static at(location: Location, message: string): ParseError {
    return new ParseError([{ location, message }]);
  }

  /** A new error with `frame` added as the outermost context. */
  push(frame: Frame): ParseError {
    return new ParseError([...this.frames, frame]);
  }

  /** Shorthand for `push({ location, message })`. */
  label(location: Location, message: string): ParseError {
    return this.push({ location, message });
  }

  /** The innermost (most specific) frame. */
  get leaf(): Frame {
    return this.frames[0];
  }

  get location(): Location {
    return this.leaf.location;
  }

  get message(): string {
    return this.leaf.message;
  }

  get offset(): number {
    return this.leaf.location.offset;
  }

  get line(): number {
    return this.leaf.location.line;
  }

  get column(): number {
    return this.leaf.location.column;
  }

  /** Context labels, outermost first. */
  get context(): string[] {
    return this.frames
      .slice(1)
      .map((f) => f.message)
      .reverse();
  }

  /**
   * Single-line rendering, e.g.
   * `expected ':' at line 3, column 12 (while parsing object > value for key "a")`.
   */
  toString(): string {
    const head = `${this.message} at ${this.location.toString()}`;
    const context = this.context;
    return context.length === 0 ? head : `${head} (while parsing ${context.join(" > ")})`;
  }

  /** Multi-line rendering with the offending source line and a caret. */
  format(): string {
    const lines = [
      this.toString(),
      `  ${this.location.sourceLine}`,
      `  ${" ".repeat(this.column - 1)}^`,
    ];
    for (const frame of this.frames.slice(1)) {
      lines.push(`  while parsing ${frame.message} at ${frame.location.toString()}`);
    }
    return lines.join("\n");
  }

  toJSON(): ParseErrorJSON {
    return {
      message: this.message,
      line: this.line,
      column: this.column,
      offset: this.offset,
      context: this.context,
    };
  }
}

// ---------------------------------------------------------------------------
// Thrown errors
// ---------------------------------------------------------------------------

/** Thrown by the `parseAll`-style conveniences when a document fails to parse. */
export class ParseFailure extends Error {
  readonly error: ParseError;

  constructor(error: ParseError) {
    super(error.toString());
    this.name = "ParseFailure";
    this.error = error;
  }
}

/**
 * A defect in the grammar itself, never in the document: a repetition whose
 * inner parser succeeded without consuming input would loop forever.
 */
export class GrammarDefect extends Error {
  /** Offset at which the zero-width success happened. */
  readonly offset: number;

  constructor(combinator: string, offset: number) {
    super(
      `${combinator}: inner parser succeeded without consuming input at offset ${offset}; ` +
        `the grammar would loop forever`
    );
    this.name = "GrammarDefect";
    this.offset = offset;
  }
}
