import { describe, it, expect } from "vitest";
import { Location, ParseError, ParseFailure } from "../index.js";

describe("Location", () => {
  const text = "ab\ncd\nef";

  it("starts at offset 0", () => {
    const loc = Location.start(text);
    expect(loc.offset).toBe(0);
    expect(loc.line).toBe(1);
    expect(loc.column).toBe(1);
  });

  it("advance returns a new location and leaves the original alone", () => {
    const a = Location.start("abc");
    const b = a.advance(2);
    expect(a.offset).toBe(0);
    expect(b.offset).toBe(2);
    expect(b.remaining).toBe("c");
    expect(a.slice(b)).toBe("ab");
  });

  it("computes line and column from newlines", () => {
    expect(Location.start(text).advance(4).line).toBe(2);
    expect(Location.start(text).advance(4).column).toBe(2);
    expect(Location.start(text).advance(3).column).toBe(1);
    expect(Location.start(text).advance(2).line).toBe(1);
    expect(Location.start(text).advance(2).column).toBe(3);
  });

  it("handles a leading newline", () => {
    const loc = Location.start("\nx");
    expect(loc.column).toBe(1);
    expect(loc.advance(1).line).toBe(2);
    expect(loc.advance(1).column).toBe(1);
  });

  it("returns the source line it sits on", () => {
    expect(Location.start(text).advance(4).sourceLine).toBe("cd");
    expect(Location.start(text).advance(7).sourceLine).toBe("ef");
  });

  it("reports end of input", () => {
    expect(Location.start("ab").advance(2).atEnd).toBe(true);
    expect(Location.start("ab").advance(1).atEnd).toBe(false);
  });

  it("compares by text and offset", () => {
    expect(Location.start("ab").advance(1).equals(Location.start("ab").advance(1))).toBe(true);
    expect(Location.start("ab").equals(Location.start("ab").advance(1))).toBe(false);
  });
});

describe("ParseError", () => {
  const text = "ab\ncd";
  const leafLoc = Location.start(text).advance(4);
  const labelLoc = Location.start(text).advance(3);

  it("push never mutates the original stack", () => {
    const base = ParseError.at(leafLoc, "expected 'z'");
    const left = base.label(labelLoc, "left");
    const right = base.label(labelLoc, "right");
    expect(base.frames).toHaveLength(1);
    expect(left.context).toEqual(["left"]);
    expect(right.context).toEqual(["right"]);
  });

  it("exposes the innermost frame", () => {
    const err = ParseError.at(leafLoc, "expected 'z'").label(labelLoc, "thing");
    expect(err.message).toBe("expected 'z'");
    expect(err.offset).toBe(4);
    expect(err.line).toBe(2);
    expect(err.column).toBe(2);
  });

  it("orders context outermost first", () => {
    const err = ParseError.at(leafLoc, "expected 'z'")
      .label(labelLoc, "inner")
      .label(Location.start(text), "outer");
    expect(err.context).toEqual(["outer", "inner"]);
  });

  it("renders a single line", () => {
    expect(ParseError.at(leafLoc, "expected 'z'").toString()).toBe(
      "expected 'z' at line 2, column 2"
    );
    expect(
      ParseError.at(leafLoc, "expected 'z'")
        .label(labelLoc, "inner")
        .label(Location.start(text), "outer")
        .toString()
    ).toBe("expected 'z' at line 2, column 2 (while parsing outer > inner)");
  });

  it("formats the offending line with a caret", () => {
    const err = ParseError.at(leafLoc, "expected 'z'").label(labelLoc, "thing");
    expect(err.format()).toBe(
      [
        "expected 'z' at line 2, column 2 (while parsing thing)",
        "  cd",
        "   ^",
        "  while parsing thing at line 2, column 1",
      ].join("\n")
    );
  });

  it("serialises to JSON", () => {
    const err = ParseError.at(leafLoc, "expected 'z'").label(labelLoc, "thing");
    expect(err.toJSON()).toEqual({
      message: "expected 'z'",
      line: 2,
      column: 2,
      offset: 4,
      context: ["thing"],
    });
  });
});

describe("ParseFailure", () => {
  it("carries the error and its rendering", () => {
    const error = ParseError.at(Location.start("x"), "expected 'y'");
    const thrown = new ParseFailure(error);
    expect(thrown).toBeInstanceOf(Error);
    expect(thrown.name).toBe("ParseFailure");
    expect(thrown.message).toBe("expected 'y' at line 1, column 1");
    expect(thrown.error).toBe(error);
  });
});
