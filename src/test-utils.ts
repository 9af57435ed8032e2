/**
 * Test utilities for pdfmint
 */

import type { FontProgram, FontProgramMetrics } from "#src/fonts/font-program";
import { latin1Bytes } from "#src/helpers/buffer";
import { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "#src/objects/pdf-object";

/**
 * Convert bytes to a string with one character per byte.
 * Offsets in the string equal byte offsets in the input.
 */
export function toLatin1(bytes: Uint8Array): string {
  let result = "";

  for (let i = 0; i < bytes.length; i += 8192) {
    result += String.fromCharCode(...bytes.subarray(i, i + 8192));
  }

  return result;
}

/**
 * Convert a string to bytes (ASCII/Latin-1 only).
 */
export function stringToBytes(str: string): Uint8Array {
  return latin1Bytes(str);
}

/**
 * PDF syntax of a direct object, one character per byte.
 */
export function serialize(obj: PdfObject): string {
  const writer = new ByteWriter({ initialSize: 256 });

  obj.toBytes(writer);

  return toLatin1(writer.toBytes());
}

/**
 * Byte offset of every `N 0 obj` header in a serialized file.
 */
export function findObjectOffsets(pdf: string): Map<number, number> {
  const offsets = new Map<number, number>();

  for (const match of pdf.matchAll(/^(\d+) 0 obj$/gm)) {
    offsets.set(Number(match[1]), match.index ?? -1);
  }

  return offsets;
}

/**
 * What is written between `N 0 obj` and `endobj`.
 */
export function objectBody(pdf: string, objectNumber: number): string {
  const offset = findObjectOffsets(pdf).get(objectNumber);

  if (offset === undefined) {
    throw new Error(`No object ${objectNumber}`);
  }

  const start = offset + `${objectNumber} 0 obj\n`.length;

  return pdf.slice(start, pdf.indexOf("\nendobj\n", start));
}

/**
 * Data of a serialized stream object.
 */
export function streamData(body: string): string {
  const start = body.indexOf("\nstream\n") + "\nstream\n".length;

  return body.slice(start, body.lastIndexOf("\nendstream"));
}

/**
 * Entries of a classic xref table: object number → [offset, generation, marker].
 */
export function parseXRefTable(pdf: string): Map<number, [number, number, string]> {
  const start = pdf.lastIndexOf("\nxref\n") + 1;
  const end = pdf.indexOf("trailer", start);
  const lines = pdf.slice(start + 5, end).split(/\r\n|\n/);
  const entries = new Map<number, [number, number, string]>();

  let objectNumber = 0;

  for (const line of lines) {
    const header = /^(\d+) (\d+)$/.exec(line);

    if (header) {
      objectNumber = Number(header[1]);
      continue;
    }

    const entry = /^(\d{10}) (\d{5}) ([nf])$/.exec(line);

    if (entry) {
      entries.set(objectNumber++, [Number(entry[1]), Number(entry[2]), entry[3]]);
    }
  }

  return entries;
}

/**
 * The `startxref` value at the end of a file.
 */
export function readStartXRef(pdf: string): number {
  const match = /startxref\n(\d+)\n%%EOF\n$/.exec(pdf);

  if (!match) {
    throw new Error("No startxref footer");
  }

  return Number(match[1]);
}

// ─────────────────────────────────────────────────────────────────────────────
// Fake font program
// ─────────────────────────────────────────────────────────────────────────────

const FAKE_CHARSET = " ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";

export interface FakeFontOptions {
  postScriptName?: string;
  unitsPerEm?: number;
  outlines?: "truetype" | "cff";
  /** Characters the cmap covers (default: space and ASCII letters) */
  charset?: string;
  /** Glyph ids that have no advance width */
  missingAdvance?: number[];
  isFixedPitch?: boolean;
}

/**
 * In-memory FontProgram.
 *
 * The n-th character of the charset maps to glyph n + 1. The space is
 * 250 units wide and every other glyph 500 units, with 1000 units per em
 * unless configured. `subset()` returns `SUBSET:` followed by the glyph ids,
 * and records each call.
 */
export class FakeFontProgram implements FontProgram {
  readonly data: Uint8Array;
  readonly metrics: FontProgramMetrics;
  readonly outlines: "truetype" | "cff";
  readonly subsetCalls: number[][] = [];

  private readonly charset: string;
  private readonly missingAdvance: Set<number>;

  constructor(options: FakeFontOptions = {}) {
    const postScriptName = options.postScriptName ?? "FakeSans-Regular";
    const unitsPerEm = options.unitsPerEm ?? 1000;

    this.charset = options.charset ?? FAKE_CHARSET;
    this.missingAdvance = new Set(options.missingAdvance);
    this.outlines = options.outlines ?? "truetype";
    this.data = stringToBytes(`fake-font:${postScriptName}:${this.charset}`);
    this.metrics = {
      postScriptName,
      unitsPerEm,
      ascent: 0.8 * unitsPerEm,
      descent: -0.2 * unitsPerEm,
      capHeight: 0.7 * unitsPerEm,
      xHeight: 0.5 * unitsPerEm,
      italicAngle: 0,
      stemV: 80,
      bbox: [0, -0.2 * unitsPerEm, unitsPerEm, 0.8 * unitsPerEm],
      isFixedPitch: options.isFixedPitch ?? false,
    };
  }

  glyphIdForCodePoint(codePoint: number): number | undefined {
    const index = this.charset.indexOf(String.fromCodePoint(codePoint));

    return index === -1 ? undefined : index + 1;
  }

  advanceWidth(glyphId: number): number | undefined {
    if (this.missingAdvance.has(glyphId)) {
      return undefined;
    }

    const scale = this.metrics.unitsPerEm / 1000;

    return this.charset[glyphId - 1] === " " ? 250 * scale : 500 * scale;
  }

  subset(glyphIds: readonly number[]): Uint8Array {
    this.subsetCalls.push([...glyphIds]);

    return stringToBytes(`SUBSET:${glyphIds.join(",")}`);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// JPEG headers
// ─────────────────────────────────────────────────────────────────────────────

export interface JpegHeaderOptions {
  width: number;
  height: number;
  components?: 1 | 3 | 4;
  bitsPerComponent?: number;
  /** Add an Adobe APP14 segment before the frame header */
  adobe?: boolean;
}

/**
 * Build the marker segments of a baseline JPEG: SOI, optional APP14,
 * SOF0, an empty SOS and EOI. There is no image data.
 */
export function buildJpeg(options: JpegHeaderOptions): Uint8Array {
  const components = options.components ?? 3;
  const bytes: number[] = [0xff, 0xd8];

  if (options.adobe) {
    // APP14: length 14, "Adobe", version, flags0, flags1, transform
    bytes.push(0xff, 0xee, 0x00, 0x0e, 0x41, 0x64, 0x6f, 0x62, 0x65, 0x00, 0x64, 0x00, 0x00, 0x00, 0x00, 0x02);
  }

  const sofLength = 8 + components * 3;

  bytes.push(0xff, 0xc0, sofLength >> 8, sofLength & 0xff, options.bitsPerComponent ?? 8);
  bytes.push(options.height >> 8, options.height & 0xff, options.width >> 8, options.width & 0xff, components);

  for (let i = 0; i < components; i++) {
    bytes.push(i + 1, 0x11, 0x00);
  }

  bytes.push(0xff, 0xda, 0x00, 0x08, components, 0x01, 0x00, 0x00, 0x3f, 0x00);
  bytes.push(0xff, 0xd9);

  return new Uint8Array(bytes);
}

export interface TrueTypeOptions {
  /** Advance widths in font units, glyph 0 (.notdef) first */
  advances: number[];
  /** Code point mapped to glyph 1; the rest follow in order */
  firstCodePoint: number;
  /** `OTTO` marks CFF outlines. The glyphs are still stored in `glyf`. */
  sfntVersion?: "true" | "OTTO";
}

const u16 = (value: number): number[] => [(value >> 8) & 0xff, value & 0xff];
const u32 = (value: number): number[] => [...u16(value >>> 16), ...u16(value & 0xffff)];
const tag = (name: string): number[] => [...name].map(char => char.charCodeAt(0));

/**
 * Build a TrueType font with 1000 units per em, ascent 800, descent -200
 * and empty outlines: just enough tables for fontkit to map code points,
 * measure glyphs and subset.
 */
export function buildTrueType(options: TrueTypeOptions): Uint8Array {
  const count = options.advances.length;
  const mapped = count - 1;

  // Glyph headers with no contours and a 500 x 700 box
  const glyf = options.advances.flatMap(() => [...u16(0), ...u16(0), ...u16(0), ...u16(500), ...u16(700)]);

  const tables: Array<[string, number[]]> = [
    [
      "cmap",
      [
        ...u16(0),
        ...u16(1),
        // Windows, full Unicode, format 12 with one group
        ...u16(3),
        ...u16(10),
        ...u32(12),
        ...u16(12),
        ...u16(0),
        ...u32(28),
        ...u32(0),
        ...u32(1),
        ...u32(options.firstCodePoint),
        ...u32(options.firstCodePoint + mapped - 1),
        ...u32(1),
      ],
    ],
    ["glyf", glyf],
    [
      "head",
      [
        ...u32(0x00010000),
        ...u32(0),
        ...u32(0),
        ...u32(0x5f0f3cf5),
        ...u16(0),
        ...u16(1000),
        ...u32(0),
        ...u32(0),
        ...u32(0),
        ...u32(0),
        ...u16(0),
        ...u16(0),
        ...u16(500),
        ...u16(700),
        ...u16(0),
        ...u16(8),
        ...u16(2),
        // Long loca offsets
        ...u16(1),
        ...u16(0),
      ],
    ],
    [
      "hhea",
      [
        ...u32(0x00010000),
        ...u16(800),
        ...u16(-200 & 0xffff),
        ...u16(0),
        ...u16(Math.max(...options.advances)),
        ...u16(0),
        ...u16(0),
        ...u16(500),
        ...u16(1),
        ...u16(0),
        ...u16(0),
        ...u32(0),
        ...u32(0),
        ...u16(0),
        ...u16(count),
      ],
    ],
    ["hmtx", options.advances.flatMap(advance => [...u16(advance), ...u16(0)])],
    ["loca", options.advances.flatMap((_, i) => u32(i * 10)).concat(u32(count * 10))],
    ["maxp", [...u32(0x00010000), ...u16(count), ...new Array<number>(26).fill(0)]],
    ["post", [...u32(0x00030000), ...new Array<number>(28).fill(0)]],
  ];

  const directory = [...tag(options.sfntVersion ?? "true"), ...u16(tables.length), ...u16(128), ...u16(3), ...u16(0)];
  const data: number[] = [];
  let offset = 12 + tables.length * 16;

  for (const [name, bytes] of tables) {
    directory.push(...tag(name), ...u32(0), ...u32(offset), ...u32(bytes.length));

    const padded = [...bytes, ...new Array<number>((4 - (bytes.length % 4)) % 4).fill(0)];

    data.push(...padded);
    offset += padded.length;
  }

  return new Uint8Array([...directory, ...data]);
}
