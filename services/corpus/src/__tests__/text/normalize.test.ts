import { describe, it, expect } from "vitest";
import { normalizeText } from "../../text/normalize.js";

describe("normalizeText", () => {
  it("collapses whitespace runs and trims", () => {
    expect(normalizeText("  one\n\n two\t three  ")).toBe("one two three");
  });

  it("composes decomposed characters", () => {
    expect(normalizeText("cafe\u0301")).toBe("caf\u00E9");
  });

  it("maps typographic quotes to ASCII", () => {
    expect(normalizeText("\u201CHi\u201D, she said. \u2018Ok\u2019 \u00ABbien\u00BB")).toBe("\"Hi\", she said. 'Ok' \"bien\"");
  });

  it("maps dashes and the minus sign to a hyphen", () => {
    expect(normalizeText("1990\u20132000 \u2014 a \u2212 b")).toBe("1990-2000 - a - b");
  });

  it("expands the ellipsis character", () => {
    expect(normalizeText("Wait\u2026 what")).toBe("Wait... what");
  });

  it("removes zero-width characters, soft hyphens and the BOM", () => {
    expect(normalizeText("\uFEFFhy\u00ADphen\u200Bated")).toBe("hyphenated");
  });

  it("drops control characters but keeps line breaks as spaces", () => {
    expect(normalizeText("a\u0000b\u0007c\r\nd\u000Ce")).toBe("abc d e");
  });

  it("returns an empty string for whitespace-only input", () => {
    expect(normalizeText(" \n\t ")).toBe("");
  });

  it("is idempotent", () => {
    const once = normalizeText("\u201CA\u201D \u2014 b\u2026  c");
    expect(normalizeText(once)).toBe(once);
  });
});
