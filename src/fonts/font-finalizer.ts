/**
 * Turns a used font into indirect objects.
 *
 * Each variant of `PdfFont` has its own finalize function; the resource
 * manager picks one by `kind`. The font dictionary is written into the ref
 * that pages already point at, and every supporting object is allocated.
 */

import { latin1Bytes } from "#src/helpers/buffer";
import type { ObjectRegistry } from "#src/document/object-registry";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { PdfString } from "#src/objects/pdf-string";
import type { CompositeFont } from "./composite-font";
import { FontError } from "./errors";
import { buildFontDescriptor, FontFlags } from "./font-descriptor";
import type { SimpleFont } from "./simple-font";
import { buildToUnicodeCMap } from "./to-unicode";

/**
 * Refs of every object a finalized font produced; `font` is the ref pages use.
 */
export interface FinalizedFont {
  font: PdfRef;
  objects: PdfRef[];
  /** Glyphs (simple: codes in range) written for the font */
  glyphCount: number;
}

/**
 * Standard font dictionary with widths for exactly FirstChar..LastChar.
 */
export function finalizeSimpleFont(font: SimpleFont, ref: PdfRef, registry: ObjectRegistry): FinalizedFont {
  const range = font.usedCodeRange();

  const dict = PdfDict.of({
    Type: PdfName.Font,
    Subtype: PdfName.of("Type1"),
    BaseFont: PdfName.of(font.baseFontName),
    Encoding: PdfName.of("WinAnsiEncoding"),
  });

  let glyphCount = 0;

  if (range) {
    const widths: number[] = [];

    for (let code = range.firstChar; code <= range.lastChar; code++) {
      widths.push(font.widthOfCode(code));
    }

    dict.set("FirstChar", PdfNumber.of(range.firstChar));
    dict.set("LastChar", PdfNumber.of(range.lastChar));
    dict.set("Widths", PdfArray.ofNumbers(widths));

    glyphCount = widths.length;
  }

  registry.update(ref, dict);

  return { font: ref, objects: [ref], glyphCount };
}

/**
 * Type0 font with a subset CIDFont descendant and a ToUnicode CMap.
 *
 * Objects, in allocation order: font program, descriptor, CIDFont, ToUnicode.
 */
export function finalizeCompositeFont(
  font: CompositeFont,
  ref: PdfRef,
  registry: ObjectRegistry,
  tag: string,
): FinalizedFont {
  const { program } = font;
  const metrics = program.metrics;
  const scale = 1000 / metrics.unitsPerEm;
  const glyphIds = font.usedGlyphIds();
  const name = `${tag}+${font.baseFontName}`;

  let data: Uint8Array;

  try {
    data = program.subset(glyphIds);
  } catch (error) {
    throw new FontError(`Unable to subset font ${font.baseFontName}`, { cause: error });
  }

  const isCff = program.outlines === "cff";

  const fontFile = isCff
    ? PdfStream.fromDict({ Subtype: PdfName.of("CIDFontType0C") }, data)
    : PdfStream.fromDict({ Length1: PdfNumber.of(data.length) }, data);

  const fontFileRef = registry.allocate(fontFile);

  let flags = FontFlags.Symbolic;

  if (metrics.isFixedPitch) {
    flags |= FontFlags.FixedPitch;
  }

  if (metrics.italicAngle !== 0) {
    flags |= FontFlags.Italic;
  }

  const descriptorRef = registry.allocate(
    buildFontDescriptor({
      fontName: name,
      flags,
      fontBBox: [
        Math.round(metrics.bbox[0] * scale),
        Math.round(metrics.bbox[1] * scale),
        Math.round(metrics.bbox[2] * scale),
        Math.round(metrics.bbox[3] * scale),
      ],
      italicAngle: metrics.italicAngle,
      ascent: font.ascent,
      descent: font.descent,
      capHeight: Math.round(metrics.capHeight * scale),
      xHeight: Math.round(metrics.xHeight * scale),
      stemV: metrics.stemV,
      fontFile: { key: isCff ? "FontFile3" : "FontFile2", ref: fontFileRef },
    }),
  );

  // CID 0 is .notdef, then the used glyphs in CID order
  const widths = [font.widthOfGlyph(0), ...glyphIds.map(glyphId => font.widthOfGlyph(glyphId))];

  const cidFont = PdfDict.of({
    Type: PdfName.Font,
    Subtype: PdfName.of(isCff ? "CIDFontType0" : "CIDFontType2"),
    BaseFont: PdfName.of(name),
    CIDSystemInfo: PdfDict.of({
      Registry: PdfString.fromText("Adobe"),
      Ordering: PdfString.fromText("Identity"),
      Supplement: PdfNumber.of(0),
    }),
    FontDescriptor: descriptorRef,
    W: PdfArray.of(PdfNumber.of(0), PdfArray.ofNumbers(widths)),
    CIDToGIDMap: isCff ? undefined : PdfName.of("Identity"),
  });

  const cidFontRef = registry.allocate(cidFont);

  const toUnicodeRef = registry.allocate(
    new PdfStream(undefined, latin1Bytes(buildToUnicodeCMap(font.toUnicodeEntries()))),
  );

  registry.update(
    ref,
    PdfDict.of({
      Type: PdfName.Font,
      Subtype: PdfName.of("Type0"),
      BaseFont: PdfName.of(name),
      Encoding: PdfName.of("Identity-H"),
      DescendantFonts: PdfArray.of(cidFontRef),
      ToUnicode: toUnicodeRef,
    }),
  );

  return {
    font: ref,
    objects: [ref, fontFileRef, descriptorRef, cidFontRef, toUnicodeRef],
    glyphCount: glyphIds.length,
  };
}
