/**
 * Tests for the code-point string primitives behind the fixed-width codec
 */

import { describe, expect, test } from "vitest";
import {
  fixedWidth,
  pad,
  scalarLength,
  stripPadding,
  truncate,
} from "../../../src/formats/fixed/primitives";

describe("scalarLength", () => {
  test("counts ASCII characters", () => {
    expect(scalarLength("")).toBe(0);
    expect(scalarLength("abc")).toBe(3);
  });

  test("counts astral characters once", () => {
    expect(scalarLength("a😀b")).toBe(3);
    expect("a😀b".length).toBe(4);
  });

  test("counts a lone surrogate as one character", () => {
    expect(scalarLength("\ud800x")).toBe(2);
  });
});

describe("truncate", () => {
  test("keeps strings that already fit", () => {
    expect(truncate("abc", 3)).toBe("abc");
    expect(truncate("abc", 10)).toBe("abc");
  });

  test("cuts at the given number of characters", () => {
    expect(truncate("abcdef", 4)).toBe("abcd");
  });

  test("never splits a surrogate pair", () => {
    expect(truncate("😀😀😀", 2)).toBe("😀😀");
  });
});

describe("pad", () => {
  test("left alignment pads on the right", () => {
    expect(pad("ab", 5, "left", ".")).toBe("ab...");
  });

  test("right alignment pads on the left", () => {
    expect(pad("ab", 5, "right", "0")).toBe("000ab");
  });

  test("returns long strings unchanged", () => {
    expect(pad("abcdef", 3, "left", " ")).toBe("abcdef");
  });

  test("measures width in code points", () => {
    expect(pad("😀", 3, "left", "-")).toBe("😀--");
  });
});

describe("fixedWidth", () => {
  test("produces exactly the requested width", () => {
    expect(fixedWidth("abcdef", 4, "left", " ")).toBe("abcd");
    expect(fixedWidth("ab", 4, "right", "0")).toBe("00ab");
    expect(fixedWidth("abcd", 4, "left", " ")).toBe("abcd");
  });

  test("truncation keeps the leading characters for either alignment", () => {
    expect(fixedWidth("abcdef", 4, "right", " ")).toBe("abcd");
  });
});

describe("stripPadding", () => {
  test("left alignment removes the trailing run", () => {
    expect(stripPadding("ab   ", "left", " ")).toBe("ab");
  });

  test("right alignment removes the leading run", () => {
    expect(stripPadding("000ab", "right", "0")).toBe("ab");
  });

  test("keeps padding characters on the opposite edge", () => {
    expect(stripPadding("  ab  ", "left", " ")).toBe("  ab");
    expect(stripPadding("  ab  ", "right", " ")).toBe("ab  ");
  });

  test("removes value characters that match the padding at the padded edge", () => {
    expect(stripPadding("1000", "left", "0")).toBe("1");
  });

  test("an all-padding slot becomes empty", () => {
    expect(stripPadding("     ", "left", " ")).toBe("");
    expect(stripPadding("*****", "right", "*")).toBe("");
  });

  test("handles astral padding characters", () => {
    expect(stripPadding("ab😀😀", "left", "😀")).toBe("ab");
    expect(stripPadding("😀😀ab", "right", "😀")).toBe("ab");
  });
});
