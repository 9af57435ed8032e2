import { create, type Font } from "fontkit";
import { describe, expect, it } from "vitest";
import { buildTrueType, stringToBytes } from "#src/test-utils";
import { FontError } from "./errors";
import { FontkitProgram } from "./fontkit-program";

// .notdef, then A B C D
const advances = [500, 600, 700, 800, 900];

function parse(bytes: Uint8Array): Font {
  const font = create(Buffer.from(bytes));

  if (!("getGlyph" in font)) {
    throw new Error("Expected a single font");
  }

  return font;
}

describe("FontkitProgram", () => {
  it("maps code points to glyphs and reads their advances", () => {
    const program = FontkitProgram.fromBytes(buildTrueType({ advances, firstCodePoint: 0x41 }));

    expect(program.glyphIdForCodePoint(0x41)).toBe(1);
    expect(program.glyphIdForCodePoint(0x44)).toBe(4);
    expect(program.glyphIdForCodePoint(0x45)).toBeUndefined();
    expect(program.advanceWidth(3)).toBe(800);
    expect(program.advanceWidth(5)).toBeUndefined();
    expect(program.advanceWidth(-1)).toBeUndefined();
  });

  it("reads the font metrics", () => {
    const program = FontkitProgram.fromBytes(buildTrueType({ advances, firstCodePoint: 0x41 }));

    expect(program.metrics).toEqual({
      postScriptName: "Embedded",
      unitsPerEm: 1000,
      ascent: 800,
      descent: -200,
      // No OS/2 table: fontkit falls back to the ascent
      capHeight: 800,
      xHeight: 0,
      italicAngle: 0,
      stemV: 0,
      bbox: [0, 0, 500, 700],
      isFixedPitch: false,
    });
    expect(program.outlines).toBe("truetype");
  });

  it("detects CFF outlines from the OTTO tag", () => {
    const program = FontkitProgram.fromBytes(buildTrueType({ advances, firstCodePoint: 0x41, sfntVersion: "OTTO" }));

    expect(program.outlines).toBe("cff");
  });

  it("renumbers subset glyphs in the order given, after .notdef", () => {
    const program = FontkitProgram.fromBytes(buildTrueType({ advances, firstCodePoint: 0x41 }));

    const subset = parse(program.subset([3, 1, 4]));

    expect(subset.numGlyphs).toBe(4);
    expect([0, 1, 2, 3].map(id => subset.getGlyph(id).advanceWidth)).toEqual([500, 800, 600, 900]);
  });

  it("rejects data that is not a font", () => {
    expect(() => FontkitProgram.fromBytes(stringToBytes("not a font"))).toThrow(
      new FontError("Unable to parse font data"),
    );
  });

  it("rejects font collections", () => {
    // ttcf header, version 1.0, no fonts
    const collection = new Uint8Array([0x74, 0x74, 0x63, 0x66, 0, 1, 0, 0, 0, 0, 0, 0]);

    expect(() => FontkitProgram.fromBytes(collection)).toThrow(
      "Font collections are not supported; embed a single font",
    );
  });
});
