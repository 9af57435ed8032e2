import { create, type Font } from "fontkit";

import { FontError } from "./errors";
import type { FontProgram, FontProgramMetrics } from "./font-program";

const OTTO = 0x4f54544f; // 'OTTO', CFF-flavored OpenType

/**
 * FontProgram backed by fontkit.
 */
export class FontkitProgram implements FontProgram {
  readonly metrics: FontProgramMetrics;
  readonly outlines: "truetype" | "cff";

  private constructor(
    readonly data: Uint8Array,
    private readonly font: Font,
  ) {
    const bbox = font.bbox;

    this.metrics = {
      postScriptName: font.postscriptName || "Embedded",
      unitsPerEm: font.unitsPerEm,
      ascent: font.ascent,
      descent: font.descent,
      capHeight: font.capHeight,
      xHeight: font.xHeight,
      italicAngle: font.italicAngle,
      // Not stored in OpenType; readers only use it as a hint
      stemV: 0,
      bbox: [bbox.minX, bbox.minY, bbox.maxX, bbox.maxY],
      isFixedPitch: this.looksMonospaced(),
    };

    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

    this.outlines = data.length >= 4 && view.getUint32(0) === OTTO ? "cff" : "truetype";
  }

  /**
   * Parse a TTF or OTF file.
   *
   * @throws {FontError} if the data is not a single font
   */
  static fromBytes(data: Uint8Array): FontkitProgram {
    let created: ReturnType<typeof create>;

    try {
      created = create(Buffer.from(data.buffer, data.byteOffset, data.byteLength));
    } catch (error) {
      throw new FontError("Unable to parse font data", { cause: error });
    }

    if (!("glyphForCodePoint" in created)) {
      throw new FontError("Font collections are not supported; embed a single font");
    }

    return new FontkitProgram(data, created);
  }

  glyphIdForCodePoint(codePoint: number): number | undefined {
    if (!this.font.hasGlyphForCodePoint(codePoint)) {
      return undefined;
    }

    return this.font.glyphForCodePoint(codePoint).id;
  }

  advanceWidth(glyphId: number): number | undefined {
    if (glyphId < 0 || glyphId >= this.font.numGlyphs) {
      return undefined;
    }

    return this.font.getGlyph(glyphId).advanceWidth;
  }

  subset(glyphIds: readonly number[]): Uint8Array {
    // fontkit puts .notdef first on its own
    const subset = this.font.createSubset();

    for (const glyphId of glyphIds) {
      subset.includeGlyph(this.font.getGlyph(glyphId));
    }

    return subset.encode();
  }

  private looksMonospaced(): boolean {
    const narrow = this.glyphIdForCodePoint(0x69); // i
    const wide = this.glyphIdForCodePoint(0x57); // W

    if (narrow === undefined || wide === undefined) {
      return false;
    }

    return this.advanceWidth(narrow) === this.advanceWidth(wide);
  }
}
