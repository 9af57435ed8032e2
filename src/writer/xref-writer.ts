/**
 * Cross-reference section and trailer writing.
 *
 * Supports both traditional xref tables (PDF 1.0+) and
 * xref streams (PDF 1.5+).
 */

import type { ByteWriter } from "#src/io/byte-writer";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { PdfString } from "#src/objects/pdf-string";

/**
 * Represents an entry in the xref section.
 */
export interface XRefWriteEntry {
  objectNumber: number;
  generation: number;
  type: "inuse" | "free";
  /** Byte offset of `N G obj` for in-use entries, next free object for free ones */
  offset: number;
}

/**
 * Trailer entries, shared by the trailer dictionary and the xref stream.
 */
export interface TrailerOptions {
  /** Byte offset where the xref section starts */
  xrefOffset: number;

  /** Maximum object number + 1 (for /Size) */
  size: number;

  /** Root catalog reference */
  root: PdfRef;

  /** Info dictionary reference (optional) */
  info?: PdfRef;

  /** Document ID array (optional) */
  id?: [Uint8Array, Uint8Array];
}

export interface XRefWriteOptions extends TrailerOptions {
  /** Object entries to include */
  entries: XRefWriteEntry[];
}

/**
 * The free-list head every xref section starts with.
 */
export const FREE_LIST_HEAD: XRefWriteEntry = { objectNumber: 0, generation: 65535, type: "free", offset: 0 };

interface Subsection {
  start: number;
  entries: XRefWriteEntry[];
}

/**
 * Group consecutive object numbers into subsections.
 *
 * For example: [0, 1, 2, 7, 8] → [{start: 0, 3 entries}, {start: 7, 2 entries}]
 */
export function groupIntoSubsections(entries: XRefWriteEntry[]): Subsection[] {
  const sorted = [...entries].sort((a, b) => a.objectNumber - b.objectNumber);

  const subsections: Subsection[] = [];
  let current: Subsection | null = null;

  for (const entry of sorted) {
    if (current !== null && entry.objectNumber === current.start + current.entries.length) {
      current.entries.push(entry);
    } else {
      current = { start: entry.objectNumber, entries: [entry] };
      subsections.push(current);
    }
  }

  return subsections;
}

/**
 * Write a traditional xref table.
 *
 * Format:
 * ```
 * xref
 * 0 3
 * 0000000000 65535 f
 * 0000000015 00000 n
 * 0000000074 00000 n
 * ```
 */
export function writeXRefTable(writer: ByteWriter, entries: XRefWriteEntry[]): void {
  writer.writeAscii("xref\n");

  for (const subsection of groupIntoSubsections(entries)) {
    writer.writeAscii(`${subsection.start} ${subsection.entries.length}\n`);

    for (const entry of subsection.entries) {
      writer.writeAscii(formatXRefTableEntry(entry));
    }
  }
}

/**
 * Write the trailer that follows an xref table, then `startxref`.
 *
 * Format:
 * ```
 * trailer
 * << /Size 3 /Root 1 0 R >>
 * startxref
 * 131
 * %%EOF
 * ```
 */
export function writeTrailer(writer: ByteWriter, options: TrailerOptions): void {
  writer.writeAscii("trailer\n");
  buildTrailerDict(options).toBytes(writer);
  writer.writeAscii("\n");

  writeStartXRef(writer, options.xrefOffset);
}

/**
 * Format a single xref table entry (exactly 20 bytes).
 *
 * Format: "OOOOOOOOOO GGGGG n\r\n" or "OOOOOOOOOO GGGGG f\r\n"
 */
export function formatXRefTableEntry(entry: XRefWriteEntry): string {
  const offset = entry.offset.toString().padStart(10, "0");
  const generation = entry.generation.toString().padStart(5, "0");
  const marker = entry.type === "free" ? "f" : "n";

  return `${offset} ${generation} ${marker}\r\n`;
}

function trailerEntries(options: TrailerOptions): [string, PdfObject][] {
  const entries: [string, PdfObject][] = [["Root", options.root]];

  if (options.info) {
    entries.push(["Info", options.info]);
  }

  if (options.id) {
    const [id1, id2] = options.id;
    entries.push(["ID", PdfArray.of(PdfString.fromBytes(id1), PdfString.fromBytes(id2))]);
  }

  return entries;
}

/**
 * Build the trailer dictionary.
 */
export function buildTrailerDict(options: TrailerOptions): PdfDict {
  return new PdfDict([["Size", PdfNumber.of(options.size)], ...trailerEntries(options)]);
}

/**
 * Write the file footer pointing readers at the xref section.
 */
export function writeStartXRef(writer: ByteWriter, xrefOffset: number): void {
  writer.writeAscii("startxref\n");
  writer.writeAscii(`${xrefOffset}\n`);
  writer.writeAscii("%%EOF\n");
}

/**
 * Calculate field widths for xref stream encoding.
 *
 * Returns [typeWidth, offsetWidth, generationWidth]
 */
export function calculateFieldWidths(entries: XRefWriteEntry[]): [number, number, number] {
  let maxOffset = 0;
  let maxGeneration = 0;

  for (const entry of entries) {
    maxOffset = Math.max(maxOffset, entry.offset);
    maxGeneration = Math.max(maxGeneration, entry.generation);
  }

  return [1, bytesNeeded(maxOffset), bytesNeeded(maxGeneration)];
}

function bytesNeeded(value: number): number {
  let width = 1;

  while (value >= 256 ** width) {
    width++;
  }

  return width;
}

/**
 * Pack entries as big-endian fields of the given widths: type, then
 * offset, then generation.
 */
function encodeXRefStreamData(entries: XRefWriteEntry[], widths: [number, number, number]): Uint8Array {
  const rowLength = widths[0] + widths[1] + widths[2];
  const data = new Uint8Array(entries.length * rowLength);

  entries.forEach((entry, row) => {
    const fields = [entry.type === "free" ? 0 : 1, entry.offset, entry.generation];
    let end = row * rowLength;

    fields.forEach((field, i) => {
      end += widths[i];

      for (let pos = end - 1, rest = field; pos >= end - widths[i]; pos--, rest = Math.floor(rest / 256)) {
        data[pos] = rest % 256;
      }
    });
  });

  return data;
}

/**
 * Build the xref stream object. It carries the trailer entries in its
 * own dictionary.
 */
export function buildXRefStream(options: XRefWriteOptions): PdfStream {
  const subsections = groupIntoSubsections(options.entries);
  const orderedEntries = subsections.flatMap(s => s.entries);
  const widths = calculateFieldWidths(orderedEntries);

  const dictEntries: [string, PdfObject][] = [
    ["Type", PdfName.of("XRef")],
    ["Size", PdfNumber.of(options.size)],
    ["W", PdfArray.ofNumbers(widths)],
    ["Index", PdfArray.ofNumbers(subsections.flatMap(s => [s.start, s.entries.length]))],
    ...trailerEntries(options),
  ];

  return new PdfStream(dictEntries, encodeXRefStreamData(orderedEntries, widths));
}
