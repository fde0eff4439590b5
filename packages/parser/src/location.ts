/**
 * Immutable cursor into the input being parsed.
 *
 * A Location pairs the full input text with an offset (a UTF-16 code-unit
 * index). Every successful match produces a new Location; the one it started
 * from stays valid, which is what makes backtracking free.
 */
export class Location {
  private constructor(
    /** The complete input text, shared by every Location of one run. */
    readonly text: string,
    /** Zero-based offset into `text`, `0 <= offset <= text.length`. */
    readonly offset: number
  ) {}

  /** The location at the very beginning of `text`. */
  static start(text: string): Location {
    return new Location(text, 0);
  }

  /** A new location `n` code units further on. Callers keep it in bounds. */
  advance(n: number): Location {
    return new Location(this.text, this.offset + n);
  }

  /** Everything from this location to the end of the input. */
  get remaining(): string {
    return this.text.slice(this.offset);
  }

  get atEnd(): boolean {
    return this.offset >= this.text.length;
  }

  /** The text consumed between this location and `to`. */
  slice(to: Location): string {
    return this.text.slice(this.offset, to.offset);
  }

  /** 1-based line number. */
  get line(): number {
    let line = 1;
    for (let i = 0; i < this.offset && i < this.text.length; i++) {
      if (this.text[i] === "\n") line++;
    }
    return line;
  }

  /** 1-based column, in code units since the last newline. */
  get column(): number {
    return this.offset - this.lineStart() + 1;
  }

  /** The full source line this location sits on, without its newline. */
  get sourceLine(): string {
    const start = this.lineStart();
    const end = this.text.indexOf("\n", this.offset);
    return this.text.slice(start, end === -1 ? this.text.length : end);
  }

  private lineStart(): number {
    if (this.offset === 0) return 0;
    return this.text.lastIndexOf("\n", this.offset - 1) + 1;
  }

  equals(other: Location): boolean {
    return this.text === other.text && this.offset === other.offset;
  }

  toString(): string {
    return `line ${this.line}, column ${this.column}`;
  }
}
