import { describe, expect, it } from "vitest";
import { CompositeFont } from "#src/fonts/composite-font";
import { UnmappableGlyphError } from "#src/fonts/errors";
import { widthOfTextAtSize } from "#src/fonts/pdf-font";
import { SimpleFont } from "#src/fonts/simple-font";
import { FakeFontProgram } from "#src/test-utils";
import { LayoutError } from "./errors";
import { layoutRuns, layoutText, type LayoutOptions, type TextRun } from "./text-layout";

// Letters are 5pt wide and spaces 2.5pt at this size
const options = (maxWidth: number, extra: Partial<LayoutOptions> = {}): LayoutOptions => ({
  font: new CompositeFont(new FakeFontProgram()),
  fontSize: 10,
  maxWidth,
  ...extra,
});

const texts = (text: string, layout: LayoutOptions) => layoutText(text, layout).map(line => line.text);

describe("layoutText", () => {
  it("keeps text that fits on one line", () => {
    const [line, ...rest] = layoutText("aaa bbb", options(100));

    expect(rest).toEqual([]);
    expect(line.text).toBe("aaa bbb");
    expect(line.width).toBe(32.5);
  });

  it("breaks at the last opportunity that fits", () => {
    const lines = layoutText("aaa bbb ccc", options(40));

    expect(lines.map(line => [line.text, line.width])).toEqual([
      ["aaa bbb", 32.5],
      ["ccc", 15],
    ]);
  });

  it("fits words whose width equals the line width exactly", () => {
    for (const font of [SimpleFont.of("Helvetica"), SimpleFont.of("Courier")]) {
      for (let size = 1; size <= 60; size++) {
        const maxWidth = widthOfTextAtSize(font, "The quick brown", size);

        expect(texts("The quick brown fox jumps", { font, fontSize: size, maxWidth })).toEqual([
          "The quick brown",
          "fox jumps",
        ]);
      }
    }
  });

  it("drops spaces at the end of a line", () => {
    const [line] = layoutText("ab   ", options(100));

    expect(line.text).toBe("ab");
    expect(line.glyphs).toHaveLength(2);
    expect(line.width).toBe(10);
  });

  it("lets trailing spaces hang past the edge", () => {
    // "aaaa" is exactly 20pt; the spaces after it do not force a break
    expect(texts("aaaa   bb", options(20))).toEqual(["aaaa", "bb"]);
  });

  it("ends lines at mandatory breaks", () => {
    expect(texts("ab\ncd", options(100))).toEqual(["ab", "cd"]);
  });

  it("keeps empty lines between consecutive breaks", () => {
    expect(texts("ab\n\ncd", options(100))).toEqual(["ab", "", "cd"]);
  });

  it("splits a run wider than the line between glyphs", () => {
    expect(texts("abcdefgh", options(22))).toEqual(["abcd", "efgh"]);
  });

  it("continues after a split run on the same line", () => {
    expect(texts("abcdef gh", options(23))).toEqual(["abcd", "ef gh"]);
  });

  it("adds character spacing after every glyph", () => {
    const [line] = layoutText("ab", options(100, { characterSpacing: 1 }));

    expect(line.width).toBe(12);
  });

  it("applies kerning and records it on the glyph", () => {
    const [line] = layoutText("AV", options(100, { font: SimpleFont.of("Helvetica") }));

    expect(line.glyphs.map(glyph => glyph.kerning)).toEqual([0, -70]);
    expect(line.width).toBeCloseTo(12.64, 10);
  });

  it("returns no lines for empty text", () => {
    expect(layoutText("", options(100))).toEqual([]);
  });

  it("fails on characters the font cannot show", () => {
    expect(() => layoutText("ab ?", options(100))).toThrow(UnmappableGlyphError);
  });

  it("fails when a single glyph is wider than the line", () => {
    expect(() => layoutText("ab", options(4))).toThrow(LayoutError);
    expect(() => layoutText("ab", options(4))).toThrow("Glyph for U+0061 is wider than the line (4pt)");
  });

  it("rejects a line width that is not positive", () => {
    expect(() => layoutText("ab", options(0))).toThrow("Line width must be positive, got 0");
  });
});

describe("layoutRuns", () => {
  const fake = new CompositeFont(new FakeFontProgram());
  const run = (text: string, fontSize = 10): TextRun => ({ text, font: fake, fontSize });

  it("measures each run at its own size", () => {
    // "bb" at 20pt is 10pt per letter, everything else 5pt
    const lines = layoutRuns([run("aaa "), run("bb", 20), run("b ccc")], 40);

    expect(lines.map(line => [line.text, line.width])).toEqual([
      ["aaa", 15],
      ["bbb", 25],
      ["ccc", 15],
    ]);
    expect(lines[1].glyphs.map(glyph => glyph.run)).toEqual([1, 1, 2]);
  });

  it("keeps a word together across runs", () => {
    const lines = layoutRuns([run("aa "), run("b"), run("b cc")], 22);

    expect(lines.map(line => line.text)).toEqual(["aa", "bb", "cc"]);
    expect(lines[1].glyphs.map(glyph => glyph.run)).toEqual([1, 2]);
  });

  it("does not kern across runs", () => {
    const helvetica = SimpleFont.of("Helvetica");
    const [line] = layoutRuns(
      [
        { text: "A", font: helvetica, fontSize: 10 },
        { text: "V", font: helvetica, fontSize: 10 },
      ],
      100,
    );

    expect(line.glyphs.map(glyph => glyph.kerning)).toEqual([0, 0]);
    expect(line.width).toBeCloseTo(13.34, 10);
  });

  it("ends lines at mandatory breaks inside any run", () => {
    expect(layoutRuns([run("ab\ncd"), run("ef")], 100).map(line => line.text)).toEqual(["ab", "cdef"]);
  });

  it("fails on a character the run's font cannot show", () => {
    expect(() => layoutRuns([run("ab "), run("c?")], 100)).toThrow(UnmappableGlyphError);
  });
});
