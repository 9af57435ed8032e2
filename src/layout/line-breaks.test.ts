import { describe, expect, it } from "vitest";
import { findBreakOpportunities, stripMandatoryBreak } from "./line-breaks";

describe("findBreakOpportunities", () => {
  it("allows breaks after spaces", () => {
    expect(findBreakOpportunities("aaa bbb")).toEqual([
      { position: 4, required: false },
      { position: 7, required: false },
    ]);
  });

  it("requires a break after a line feed", () => {
    expect(findBreakOpportunities("ab\ncd")).toEqual([
      { position: 3, required: true },
      { position: 5, required: false },
    ]);
  });

  it("treats CRLF as one mandatory break", () => {
    expect(findBreakOpportunities("ab\r\ncd")).toEqual([
      { position: 4, required: true },
      { position: 6, required: false },
    ]);
  });

  it("returns nothing for empty text", () => {
    expect(findBreakOpportunities("")).toEqual([]);
  });
});

describe("stripMandatoryBreak", () => {
  it("removes one trailing line ending", () => {
    expect(stripMandatoryBreak("ab\r\n")).toBe("ab");
    expect(stripMandatoryBreak("ab ")).toBe("ab");
    expect(stripMandatoryBreak("ab\n\n")).toBe("ab\n");
  });

  it("keeps spaces", () => {
    expect(stripMandatoryBreak("ab ")).toBe("ab ");
  });
});
