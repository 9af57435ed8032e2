/**
 * CompositeFont - an embedded OpenType/TrueType font drawn through a Type0
 * font with Identity-H encoding.
 *
 * Content streams carry 2-byte CIDs. CIDs are handed out in first-use order
 * starting at 1, and the subset is built with the glyphs in that same order,
 * so CID n is glyph n of the embedded program (CIDToGIDMap /Identity).
 */

import { PdfString } from "#src/objects/pdf-string";
import { FontError, MissingGlyphDataError, UnmappableGlyphError } from "./errors";
import type { FontProgram } from "./font-program";
import type { Glyph } from "./pdf-font";

const MAX_CID = 0xffff;

export class CompositeFont {
  readonly kind = "composite";

  /** Original glyph id → CID */
  private readonly cids = new Map<number, number>();

  /** Original glyph ids in CID order (index 0 is CID 1) */
  private readonly glyphIds: number[] = [];

  /** CID → code points of the text it was drawn for */
  private readonly unicode = new Map<number, number[]>();

  private readonly scale: number;

  constructor(readonly program: FontProgram) {
    this.scale = 1000 / program.metrics.unitsPerEm;
  }

  get baseFontName(): string {
    return this.program.metrics.postScriptName;
  }

  /** Ascender in 1/1000 em */
  get ascent(): number {
    return Math.round(this.program.metrics.ascent * this.scale);
  }

  /** Descender in 1/1000 em (negative) */
  get descent(): number {
    return Math.round(this.program.metrics.descent * this.scale);
  }

  /**
   * @throws {UnmappableGlyphError} if the font's cmap has no glyph for the scalar
   * @throws {MissingGlyphDataError} if the glyph has no advance width
   */
  glyphFor(codePoint: number): Glyph {
    const glyphId = this.program.glyphIdForCodePoint(codePoint);

    if (glyphId === undefined || glyphId === 0) {
      throw new UnmappableGlyphError(codePoint, this.baseFontName);
    }

    return { codePoint, id: glyphId, width: this.widthOfGlyph(glyphId) };
  }

  /**
   * Advance width in 1/1000 em, rounded as it is written to /W.
   *
   * @throws {MissingGlyphDataError}
   */
  widthOfGlyph(glyphId: number): number {
    const advance = this.program.advanceWidth(glyphId);

    if (advance === undefined) {
      throw new MissingGlyphDataError(glyphId, this.baseFontName, "no advance width in hmtx");
    }

    return Math.round(advance * this.scale);
  }

  kerning(_left: Glyph, _right: Glyph): number {
    return 0;
  }

  /**
   * Record a glyph as used and return its CID.
   */
  useGlyph(glyph: Glyph): number {
    const existing = this.cids.get(glyph.id);

    if (existing !== undefined) {
      return existing;
    }

    if (this.glyphIds.length >= MAX_CID) {
      throw new FontError(`Font ${this.baseFontName} uses more than ${MAX_CID} glyphs`);
    }

    this.glyphIds.push(glyph.id);

    const cid = this.glyphIds.length;

    this.cids.set(glyph.id, cid);
    this.unicode.set(cid, [glyph.codePoint]);

    return cid;
  }

  /**
   * Glyph ids to subset, in CID order.
   */
  usedGlyphIds(): readonly number[] {
    return this.glyphIds;
  }

  /**
   * CID → Unicode mapping for the ToUnicode CMap.
   */
  toUnicodeEntries(): ReadonlyMap<number, readonly number[]> {
    return this.unicode;
  }

  /**
   * Encode CIDs as a 2-byte hex string operand.
   */
  encode(cids: readonly number[]): PdfString {
    const bytes = new Uint8Array(cids.length * 2);

    cids.forEach((cid, i) => {
      bytes[i * 2] = cid >> 8;
      bytes[i * 2 + 1] = cid & 0xff;
    });

    return new PdfString(bytes, "hex");
  }
}
