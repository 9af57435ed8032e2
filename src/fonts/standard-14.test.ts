import { describe, expect, it } from "vitest";
import { ConfigurationError } from "#src/config/errors";
import { availableStandardFonts, getStandardFontMetrics, isStandard14Font, kerningKey } from "./standard-14";

describe("standard 14 metrics", () => {
  it("bundles Helvetica and the Courier family", () => {
    expect(availableStandardFonts()).toEqual([
      "Helvetica",
      "Courier",
      "Courier-Bold",
      "Courier-Oblique",
      "Courier-BoldOblique",
    ]);
  });

  it("loads widths keyed by WinAnsi code", () => {
    const metrics = getStandardFontMetrics("Helvetica");

    expect(metrics.widths.get(72)).toBe(722);
    expect(metrics.widths.get(32)).toBe(278);
    expect(metrics.widths.get(0x80)).toBe(556);
    expect(metrics.ascender).toBe(718);
    expect(metrics.descender).toBe(-207);
  });

  it("loads kerning pairs", () => {
    const metrics = getStandardFontMetrics("Helvetica");

    expect(metrics.kerning.get(kerningKey(0x41, 0x56))).toBe(-70);
    expect(metrics.kerning.get(kerningKey(0x56, 0x41))).toBe(-80);
  });

  it("gives every Courier glyph the same width", () => {
    const widths = new Set(getStandardFontMetrics("Courier-Bold").widths.values());

    expect([...widths]).toEqual([600]);
  });

  it("recognizes standard font names", () => {
    expect(isStandard14Font("Times-Roman")).toBe(true);
    expect(isStandard14Font("Arial")).toBe(false);
  });

  it("rejects names outside the standard 14", () => {
    expect(() => getStandardFontMetrics("Arial")).toThrow(ConfigurationError);
    expect(() => getStandardFontMetrics("Arial")).toThrow('"Arial" is not a standard 14 font');
  });

  it("rejects standard fonts whose metrics are not bundled", () => {
    expect(() => getStandardFontMetrics("Times-Roman")).toThrow(
      "Metrics for standard font Times-Roman are not included in this build: available: Helvetica, Courier, Courier-Bold, Courier-Oblique, Courier-BoldOblique",
    );
  });
});
