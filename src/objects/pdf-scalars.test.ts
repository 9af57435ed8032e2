import { describe, expect, it } from "vitest";
import { serialize } from "#src/test-utils";
import { PdfBool, PdfNull } from "./pdf-keyword";
import { PdfNumber } from "./pdf-number";

describe("PdfBool", () => {
  it("shares one instance per value", () => {
    expect(PdfBool.of(true)).toBe(PdfBool.TRUE);
    expect(PdfBool.of(false)).toBe(PdfBool.FALSE);
    expect(PdfBool.of(true).value).toBe(true);
  });

  it("writes its keyword", () => {
    expect(serialize(PdfBool.TRUE)).toBe("true");
    expect(serialize(PdfBool.FALSE)).toBe("false");
  });
});

describe("PdfNull", () => {
  it("writes null", () => {
    expect(PdfNull.instance.type).toBe("null");
    expect(serialize(PdfNull.instance)).toBe("null");
  });
});

describe("PdfNumber", () => {
  it("writes integers as they are", () => {
    expect(serialize(PdfNumber.of(612))).toBe("612");
    expect(serialize(PdfNumber.of(-3))).toBe("-3");
  });

  it("rounds reals to five decimals without trailing zeros", () => {
    expect(serialize(PdfNumber.of(0.5))).toBe("0.5");
    expect(serialize(PdfNumber.of(1 / 3))).toBe("0.33333");
    expect(serialize(PdfNumber.of(-0.000001))).toBe("0");
  });

  it("keeps the unrounded value", () => {
    expect(PdfNumber.of(1 / 3).value).toBe(1 / 3);
  });

  it("rejects NaN and infinities", () => {
    expect(() => PdfNumber.of(Number.NaN)).toThrow("Cannot write NaN as a PDF number");
    expect(() => PdfNumber.of(Number.NEGATIVE_INFINITY)).toThrow(RangeError);
  });
});
