/**
 * Line breaking for styled runs of text.
 *
 * Break opportunities are found once over the text of all runs joined
 * together, so a word may continue across a change of font or size. Lines
 * end at the last UAX #14 break opportunity that fits. Spaces at the end of
 * a line hang past the edge and are dropped. A run of text with no break
 * opportunity that is wider than the line is split between glyphs.
 */

import { formatCodePoint } from "#src/fonts/errors";
import { type Glyph, glyphsForText, type PdfFont } from "#src/fonts/pdf-font";
import { LayoutError } from "./errors";
import { findBreakOpportunities, stripMandatoryBreak } from "./line-breaks";

/** Tolerance for accumulated floating point error in widths and positions */
export const EPSILON = 1e-6;

/**
 * Text in one font and size.
 */
export interface TextRun {
  text: string;
  font: PdfFont;
  /** Font size in points */
  fontSize: number;
  /** Extra space after each glyph in points (the Tc operator) */
  characterSpacing?: number;
}

export interface LayoutOptions {
  font: PdfFont;
  /** Font size in points */
  fontSize: number;
  /** Maximum line width in points */
  maxWidth: number;
  /** Extra space after each glyph in points (the Tc operator) */
  characterSpacing?: number;
}

/**
 * A glyph placed on a line.
 */
export interface LineGlyph extends Glyph {
  /** Index of the run the glyph comes from */
  run: number;
  /** Kerning against the previous glyph on the line, in 1/1000 em */
  kerning: number;
}

export interface TextLine {
  text: string;
  glyphs: LineGlyph[];
  /** Width in points, trailing spaces excluded */
  width: number;
}

type RunGlyph = Glyph & { run: number };

const HANGING = new Set([0x20, 0x09, 0x3000]);

class LineBuilder {
  glyphs: LineGlyph[] = [];
  /** Width of all glyphs, hanging spaces included */
  width = 0;
  /** Width of the trailing run of spaces */
  hangingWidth = 0;

  constructor(
    private readonly runs: readonly TextRun[],
    private readonly maxWidth: number,
  ) {}

  get isEmpty(): boolean {
    return this.glyphs.length === 0;
  }

  get last(): LineGlyph | undefined {
    return this.glyphs.at(-1);
  }

  /**
   * Advance of `glyph` in points if appended after `previous`. Kerning only
   * applies between glyphs of the same run.
   */
  advance(glyph: RunGlyph, previous: RunGlyph | undefined): { kerning: number; advance: number } {
    const { font, fontSize, characterSpacing = 0 } = this.runs[glyph.run];
    const kerning = previous?.run === glyph.run ? font.kerning(previous, glyph) : 0;

    return { kerning, advance: ((glyph.width + kerning) * fontSize) / 1000 + characterSpacing };
  }

  /**
   * Whether `glyphs` would push this line past the maximum width.
   */
  overflows(glyphs: readonly RunGlyph[]): boolean {
    let previous: RunGlyph | undefined = this.last;
    let total = this.width;

    for (const glyph of glyphs) {
      total += this.advance(glyph, previous).advance;
      previous = glyph;
    }

    return total > this.maxWidth + EPSILON;
  }

  push(glyph: RunGlyph): void {
    const { kerning, advance } = this.advance(glyph, this.last);

    this.glyphs.push({ ...glyph, kerning });
    this.width += advance;

    if (HANGING.has(glyph.codePoint)) {
      this.hangingWidth += advance;
    } else {
      this.hangingWidth = 0;
    }
  }

  finish(): TextLine {
    let end = this.glyphs.length;

    while (end > 0 && HANGING.has(this.glyphs[end - 1].codePoint)) {
      end--;
    }

    const glyphs = this.glyphs.slice(0, end);

    return {
      text: String.fromCodePoint(...glyphs.map(glyph => glyph.codePoint)),
      glyphs,
      width: this.width - this.hangingWidth,
    };
  }
}

/**
 * Glyphs for the UTF-16 range `[start, end)` of the joined run text.
 */
function glyphsInRange(runs: readonly TextRun[], offsets: readonly number[], start: number, end: number): RunGlyph[] {
  const glyphs: RunGlyph[] = [];

  runs.forEach((run, index) => {
    const from = Math.max(start, offsets[index]);
    const to = Math.min(end, offsets[index] + run.text.length);

    if (from < to) {
      const text = run.text.slice(from - offsets[index], to - offsets[index]);

      for (const glyph of glyphsForText(run.font, text)) {
        glyphs.push({ ...glyph, run: index });
      }
    }
  });

  return glyphs;
}

/**
 * Break styled runs into lines no wider than `maxWidth`.
 *
 * Every glyph is resolved before anything is returned, so an unmappable
 * character fails the whole call.
 *
 * @throws {UnmappableGlyphError} if a run's font cannot show a character
 * @throws {LayoutError} if a single glyph is wider than the line
 */
export function layoutRuns(runs: readonly TextRun[], maxWidth: number): TextLine[] {
  if (!(maxWidth > 0)) {
    throw new LayoutError(`Line width must be positive, got ${maxWidth}`);
  }

  const offsets: number[] = [];
  let text = "";

  for (const run of runs) {
    offsets.push(text.length);
    text += run.text;
  }

  const lines: TextLine[] = [];
  let line = new LineBuilder(runs, maxWidth);

  const newLine = () => {
    lines.push(line.finish());
    line = new LineBuilder(runs, maxWidth);
  };

  let start = 0;

  for (const opportunity of findBreakOpportunities(text)) {
    const segment = stripMandatoryBreak(text.slice(start, opportunity.position));
    const glyphs = glyphsInRange(runs, offsets, start, start + segment.length);

    start = opportunity.position;

    let bodyEnd = glyphs.length;

    while (bodyEnd > 0 && HANGING.has(glyphs[bodyEnd - 1].codePoint)) {
      bodyEnd--;
    }

    const body = glyphs.slice(0, bodyEnd);

    if (!line.isEmpty && line.overflows(body)) {
      newLine();
    }

    if (line.isEmpty && line.overflows(body)) {
      // No break opportunity inside this run: split it between glyphs
      for (const glyph of body) {
        if (!line.isEmpty && line.overflows([glyph])) {
          newLine();
        }

        if (line.isEmpty && line.overflows([glyph])) {
          throw new LayoutError(`Glyph for ${formatCodePoint(glyph.codePoint)} is wider than the line (${maxWidth}pt)`);
        }

        line.push(glyph);
      }
    } else {
      for (const glyph of body) {
        line.push(glyph);
      }
    }

    for (const glyph of glyphs.slice(bodyEnd)) {
      line.push(glyph);
    }

    if (opportunity.required) {
      newLine();
    }
  }

  if (!line.isEmpty) {
    newLine();
  }

  return lines;
}

/**
 * Break text in a single font into lines no wider than `maxWidth`.
 *
 * @throws {UnmappableGlyphError} if the font cannot show a character
 * @throws {LayoutError} if a single glyph is wider than the line
 */
export function layoutText(text: string, options: LayoutOptions): TextLine[] {
  const { font, fontSize, characterSpacing, maxWidth } = options;

  return layoutRuns([{ text, font, fontSize, characterSpacing }], maxWidth);
}
