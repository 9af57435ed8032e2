import { describe, expect, it } from "vitest";
import { LayoutError } from "./errors";
import { paginate } from "./paginator";
import type { TextLine } from "./text-layout";

const lines = (count: number): TextLine[] =>
  Array.from({ length: count }, (_, i) => ({ text: `line ${i}`, glyphs: [], width: 0 }));

const column = { lineHeight: 10, ascent: 8, top: 100, bottom: 70 };

describe("paginate", () => {
  it("places lines from the top of the column", () => {
    const result = paginate(lines(2), column);

    expect(result.placements.map(p => [p.page, p.baseline])).toEqual([
      [0, 92],
      [0, 82],
    ]);
    expect(result.pagesAdded).toBe(0);
    expect(result.cursor).toBe(80);
  });

  it("fills a page exactly before moving on", () => {
    const result = paginate(lines(4), column);

    expect(result.placements.map(p => [p.page, p.baseline])).toEqual([
      [0, 92],
      [0, 82],
      [0, 72],
      [1, 92],
    ]);
    expect(result.pagesAdded).toBe(1);
    expect(result.cursor).toBe(90);
  });

  it("starts below an existing cursor", () => {
    const result = paginate(lines(2), { ...column, cursor: 85 });

    expect(result.placements.map(p => [p.page, p.baseline])).toEqual([
      [0, 77],
      [1, 92],
    ]);
  });

  it("moves to the next page when the first has no room", () => {
    const result = paginate(lines(1), { ...column, cursor: 75 });

    expect(result.placements[0].page).toBe(1);
    expect(result.pagesAdded).toBe(1);
  });

  it("keeps the cursor for no lines", () => {
    expect(paginate([], { ...column, cursor: 75 })).toEqual({ placements: [], pagesAdded: 0, cursor: 75 });
  });

  it("rejects a line taller than the column", () => {
    const tall = { ...column, lineHeight: 40 };

    expect(() => paginate(lines(1), tall)).toThrow(LayoutError);
    expect(() => paginate(lines(1), tall)).toThrow("Line height 40pt exceeds the content box height 30pt");
  });
});
