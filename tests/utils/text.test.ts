import { describe, it, expect } from "vitest";
import {
  cleanBullet,
  codePointLength,
  displayName,
  shorten,
  wrapLines
} from "../../src/utils/text.js";

describe("shorten", () => {
  it("should drop backticks and collapse whitespace", () => {
    expect(shorten("run `make`   now")).toBe("run make now");
  });

  it("should replace angle brackets and hashes with spaces", () => {
    expect(shorten("a<b>c#d")).toBe("a b c d");
  });

  it("should keep text within the limit unchanged", () => {
    expect(shorten("x".repeat(140))).toBe("x".repeat(140));
  });

  it("should cut long text and append an ellipsis", () => {
    const result = shorten("x".repeat(150));
    expect(result).toBe("x".repeat(139) + "…");
    expect(result.length).toBe(140);
  });

  it("should count and cut by code points", () => {
    const result = shorten("a".repeat(138) + "😀😀😀", 140);

    expect(result).toBe("a".repeat(138) + "😀…");
    expect(codePointLength(result)).toBe(140);
  });

  it("should keep astral text that fits the limit", () => {
    expect(shorten("🚀".repeat(100))).toBe("🚀".repeat(100));
  });

  it("should not leave a space before the ellipsis", () => {
    expect(shorten("abc def", 5)).toBe("abc…");
  });
});

describe("wrapLines", () => {
  it("should wrap greedily on whitespace", () => {
    expect(wrapLines("the quick brown fox", 10)).toEqual([
      "the quick",
      "brown fox"
    ]);
  });

  it("should split words longer than the width", () => {
    expect(wrapLines("abcdefghij", 4)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("should measure line width in code points", () => {
    expect(wrapLines("😀😀 😀😀", 5)).toEqual(["😀😀 😀😀"]);
  });

  it("should return no lines for blank input", () => {
    expect(wrapLines("   ")).toEqual([]);
  });
});

describe("cleanBullet", () => {
  it("should strip list markers and backticks and escape pipes", () => {
    expect(cleanBullet("1. Setup: use `x` | y")).toBe("Setup: use x \\| y");
  });

  it("should return empty string for marker-only input", () => {
    expect(cleanBullet(" - ")).toBe("");
  });
});

describe("displayName", () => {
  it("should title-case hyphenated slugs", () => {
    expect(displayName("control-theory")).toBe("Control Theory");
  });

  it("should capitalise words around underscores", () => {
    expect(displayName("ai_book")).toBe("Ai_Book");
  });

  it("should lower-case the rest of each word", () => {
    expect(displayName("ROBOTICS")).toBe("Robotics");
  });
});

describe("codePointLength", () => {
  it("should count code points rather than UTF-16 units", () => {
    expect(codePointLength("控制系统")).toBe(4);
    expect(codePointLength("😀")).toBe(1);
  });
});
