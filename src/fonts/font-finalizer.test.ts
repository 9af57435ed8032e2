import { describe, expect, it } from "vitest";
import { ObjectRegistry } from "#src/document/object-registry";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { type FakeFontOptions, FakeFontProgram, serialize } from "#src/test-utils";
import { CompositeFont } from "./composite-font";
import { FontError } from "./errors";
import { finalizeCompositeFont, finalizeSimpleFont } from "./font-finalizer";
import { glyphsForText, type PdfFont } from "./pdf-font";
import { SimpleFont } from "./simple-font";
import { subsetTag } from "./subset-tag";

function written(registry: ObjectRegistry, objectNumber: number): string {
  const obj: PdfObject | null = registry.getObject(PdfRef.of(objectNumber));

  if (!obj) {
    throw new Error(`Object ${objectNumber} has no value`);
  }

  return serialize(obj);
}

function draw(font: PdfFont, text: string): void {
  for (const glyph of glyphsForText(font, text)) {
    font.useGlyph(glyph);
  }
}

function compositeFixture(options: FakeFontOptions = {}) {
  const program = new FakeFontProgram(options);
  const font = new CompositeFont(program);
  const registry = new ObjectRegistry();
  const ref = registry.reserve();

  draw(font, "Hi");

  return { program, font, registry, ref };
}

describe("subsetTag", () => {
  it("maps the counter's digits to letters", () => {
    expect(subsetTag(0)).toBe("AAAAAA");
    expect(subsetTag(1)).toBe("AAAAAB");
    expect(subsetTag(123456)).toBe("BCDEFG");
  });

  it("wraps after a million", () => {
    expect(subsetTag(1_000_001)).toBe("AAAAAB");
  });
});

describe("finalizeSimpleFont", () => {
  it("writes widths for exactly the used code range", () => {
    const font = SimpleFont.of("Helvetica");
    const registry = new ObjectRegistry();
    const ref = registry.reserve();

    draw(font, "Hi");

    const result = finalizeSimpleFont(font, ref, registry);
    const text = written(registry, 1);

    expect(result.glyphCount).toBe(0x69 - 0x48 + 1);
    expect(result.objects).toEqual([ref]);
    expect(text.startsWith("<<\n/Type /Font\n/Subtype /Type1\n/BaseFont /Helvetica\n/Encoding /WinAnsiEncoding\n")).toBe(
      true,
    );
    expect(text).toContain("/FirstChar 72\n/LastChar 105\n/Widths [722 ");
    expect(text).toContain(" 222]\n>>");
  });

  it("omits the width table for a font that drew nothing", () => {
    const registry = new ObjectRegistry();
    const ref = registry.reserve();

    finalizeSimpleFont(SimpleFont.of("Courier"), ref, registry);

    expect(written(registry, 1)).toBe(
      "<<\n/Type /Font\n/Subtype /Type1\n/BaseFont /Courier\n/Encoding /WinAnsiEncoding\n>>",
    );
  });
});

describe("finalizeCompositeFont", () => {
  it("fills the font ref with a Type0 dictionary", () => {
    const { font, registry, ref } = compositeFixture();

    const result = finalizeCompositeFont(font, ref, registry, "AAAAAA");

    expect(result.objects.map(r => r.objectNumber)).toEqual([1, 2, 3, 4, 5]);
    expect(result.glyphCount).toBe(2);
    expect(written(registry, 1)).toBe(
      "<<\n/Type /Font\n/Subtype /Type0\n/BaseFont /AAAAAA+FakeSans-Regular\n/Encoding /Identity-H\n/DescendantFonts [4 0 R]\n/ToUnicode 5 0 R\n>>",
    );
  });

  it("subsets the program to the used glyphs in CID order", () => {
    const { program, font, registry, ref } = compositeFixture();

    finalizeCompositeFont(font, ref, registry, "AAAAAA");

    expect(program.subsetCalls).toEqual([[9, 36]]);
    expect(written(registry, 2)).toBe("<<\n/Length 11\n/Length1 11\n>>\nstream\nSUBSET:9,36\nendstream");
  });

  it("writes a descriptor with metrics in 1/1000 em", () => {
    const { font, registry, ref } = compositeFixture({ unitsPerEm: 2000 });

    finalizeCompositeFont(font, ref, registry, "AAAAAB");

    expect(written(registry, 3)).toBe(
      [
        "<<",
        "/Type /FontDescriptor",
        "/FontName /AAAAAB+FakeSans-Regular",
        "/Flags 4",
        "/FontBBox [0 -200 1000 800]",
        "/ItalicAngle 0",
        "/Ascent 800",
        "/Descent -200",
        "/CapHeight 700",
        "/XHeight 500",
        "/StemV 80",
        "/FontFile2 2 0 R",
        ">>",
      ].join("\n"),
    );
  });

  it("sets the fixed-pitch flag", () => {
    const { font, registry, ref } = compositeFixture({ isFixedPitch: true });

    finalizeCompositeFont(font, ref, registry, "AAAAAA");

    expect(written(registry, 3)).toContain("/Flags 5\n");
  });

  it("writes widths for CID 0 and each used glyph", () => {
    const { font, registry, ref } = compositeFixture();

    finalizeCompositeFont(font, ref, registry, "AAAAAA");

    const cidFont = written(registry, 4);

    expect(cidFont).toContain("/Subtype /CIDFontType2\n");
    expect(cidFont).toContain(
      "/CIDSystemInfo <<\n/Registry (Adobe)\n/Ordering (Identity)\n/Supplement 0\n>>\n/FontDescriptor 3 0 R\n",
    );
    expect(cidFont).toContain("/W [0 [500 500 500]]\n/CIDToGIDMap /Identity\n");
  });

  it("embeds CFF outlines as FontFile3", () => {
    const { font, registry, ref } = compositeFixture({ outlines: "cff" });

    finalizeCompositeFont(font, ref, registry, "AAAAAA");

    expect(written(registry, 2)).toBe("<<\n/Length 11\n/Subtype /CIDFontType0C\n>>\nstream\nSUBSET:9,36\nendstream");
    expect(written(registry, 3)).toContain("/FontFile3 2 0 R\n");
    expect(written(registry, 4)).toContain("/Subtype /CIDFontType0\n");
    expect(written(registry, 4)).not.toContain("CIDToGIDMap");
  });

  it("maps CIDs back to text", () => {
    const { font, registry, ref } = compositeFixture();

    finalizeCompositeFont(font, ref, registry, "AAAAAA");

    expect(written(registry, 5)).toContain("2 beginbfchar\n<0001> <0048>\n<0002> <0069>\nendbfchar\n");
  });

  it("wraps subsetting failures in FontError", () => {
    class BrokenProgram extends FakeFontProgram {
      override subset(): Uint8Array {
        throw new Error("glyf table is truncated");
      }
    }

    const font = new CompositeFont(new BrokenProgram());
    const registry = new ObjectRegistry();
    const ref = registry.reserve();

    draw(font, "Hi");

    expect(() => finalizeCompositeFont(font, ref, registry, "AAAAAA")).toThrow(FontError);
    expect(() => finalizeCompositeFont(font, ref, registry, "AAAAAA")).toThrow(
      "Unable to subset font FakeSans-Regular",
    );
  });
});
