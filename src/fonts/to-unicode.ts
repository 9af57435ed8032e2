/**
 * ToUnicode CMap generation (PDF 1.7 spec 9.10.3).
 *
 * Maps the 2-byte codes of a composite font back to the Unicode text they
 * were drawn for, so readers can copy and search the text.
 */

const MAX_ENTRIES_PER_BLOCK = 100;

function hex4(value: number): string {
  return value.toString(16).toUpperCase().padStart(4, "0");
}

/**
 * UTF-16BE hex for a sequence of code points; astral scalars become
 * surrogate pairs.
 */
export function utf16Hex(codePoints: readonly number[]): string {
  let result = "";

  for (const codePoint of codePoints) {
    if (codePoint > 0xffff) {
      const offset = codePoint - 0x10000;

      result += hex4(0xd800 + (offset >> 10)) + hex4(0xdc00 + (offset & 0x3ff));
    } else {
      result += hex4(codePoint);
    }
  }

  return result;
}

/**
 * Build the CMap program text for the given code → Unicode mapping.
 * Entries are written in ascending code order.
 */
export function buildToUnicodeCMap(entries: ReadonlyMap<number, readonly number[]>): string {
  const codes = [...entries.keys()].sort((a, b) => a - b);

  const lines = [
    "/CIDInit /ProcSet findresource begin",
    "12 dict begin",
    "begincmap",
    "/CIDSystemInfo << /Registry (Adobe) /Ordering (UCS) /Supplement 0 >> def",
    "/CMapName /Adobe-Identity-UCS def",
    "/CMapType 2 def",
    "1 begincodespacerange",
    "<0000> <FFFF>",
    "endcodespacerange",
  ];

  for (let start = 0; start < codes.length; start += MAX_ENTRIES_PER_BLOCK) {
    const block = codes.slice(start, start + MAX_ENTRIES_PER_BLOCK);

    lines.push(`${block.length} beginbfchar`);

    for (const code of block) {
      lines.push(`<${hex4(code)}> <${utf16Hex(entries.get(code) ?? [])}>`);
    }

    lines.push("endbfchar");
  }

  lines.push("endcmap", "CMapName currentdict /CMap defineresource pop", "end", "end");

  return `${lines.join("\n")}\n`;
}
