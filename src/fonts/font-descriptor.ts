import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfRef } from "#src/objects/pdf-ref";

/**
 * Font descriptor flags (PDF 1.7 spec, Table 123).
 */
export const FontFlags = {
  FixedPitch: 1 << 0,
  Serif: 1 << 1,
  Symbolic: 1 << 2,
  Script: 1 << 3,
  Nonsymbolic: 1 << 5,
  Italic: 1 << 6,
} as const;

export interface FontDescriptorOptions {
  fontName: string;
  flags: number;
  /** All metrics in 1/1000 em */
  fontBBox: [number, number, number, number];
  italicAngle: number;
  ascent: number;
  descent: number;
  capHeight: number;
  xHeight: number;
  stemV: number;
  fontFile: { key: "FontFile2" | "FontFile3"; ref: PdfRef };
}

export function buildFontDescriptor(options: FontDescriptorOptions): PdfDict {
  return PdfDict.of({
    Type: PdfName.of("FontDescriptor"),
    FontName: PdfName.of(options.fontName),
    Flags: PdfNumber.of(options.flags),
    FontBBox: PdfArray.ofNumbers(options.fontBBox),
    ItalicAngle: PdfNumber.of(options.italicAngle),
    Ascent: PdfNumber.of(options.ascent),
    Descent: PdfNumber.of(options.descent),
    CapHeight: PdfNumber.of(options.capHeight),
    XHeight: PdfNumber.of(options.xHeight),
    StemV: PdfNumber.of(options.stemV),
    [options.fontFile.key]: options.fontFile.ref,
  });
}
