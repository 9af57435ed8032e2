/**
 * PDFPage - a page under construction.
 *
 * Drawing calls append operators to the page's content stream and register
 * the fonts and images they use under page-local names (`/F1`, `/Im1`).
 * The page dictionary is written into its reserved ref when the page is
 * closed: by the document at finalize, or by a paragraph that continues on
 * a new page.
 */

import { ContentStreamBuilder } from "#src/content/content-stream";
import type { Operator } from "#src/content/operators";
import { DocumentStateError } from "#src/document/errors";
import type { Resource } from "#src/document/resource-manager";
import { type Glyph, glyphsForText, type PdfFont } from "#src/fonts/pdf-font";
import { black, type Color, colorsEqual } from "#src/helpers/colors";
import {
  beginText,
  endText,
  popGraphicsState,
  pushGraphicsState,
  setCharSpacing,
  setFillColor,
  setFont,
  setTextMatrix,
  showText,
  showTextArray,
} from "#src/helpers/operators";
import type { PDFImage } from "#src/images/pdf-image";
import { paginate } from "#src/layout/paginator";
import { layoutRuns } from "#src/layout/text-layout";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import type { PdfRef } from "#src/objects/pdf-ref";
import type { PdfString } from "#src/objects/pdf-string";
import type { Box, ResolvedPageOptions } from "#src/config/options";
import { drawImageOps, drawRectangleOps } from "./drawing/operations";
import type {
  DrawImageOptions,
  DrawParagraphOptions,
  DrawRectangleOptions,
  DrawTextOptions,
  TextSpan,
} from "./drawing/types";
import type { PDFContext } from "./pdf-context";

/** A glyph and the index of the style it is drawn in */
type StyledGlyph = Glyph & { run: number };

/**
 * A line of glyphs positioned on the page.
 */
interface PositionedLine {
  x: number;
  baseline: number;
  glyphs: readonly StyledGlyph[];
}

interface TextStyle {
  font: PdfFont;
  size: number;
  color: Color;
  characterSpacing: number;
}

/**
 * Consecutive glyphs drawn in the same style.
 */
function splitByRun(glyphs: readonly StyledGlyph[]): StyledGlyph[][] {
  const groups: StyledGlyph[][] = [];

  for (const glyph of glyphs) {
    const group = groups.at(-1);

    if (group && group[0].run === glyph.run) {
      group.push(glyph);
    } else {
      groups.push([glyph]);
    }
  }

  return groups;
}

export class PDFPage {
  /** The page reference, reserved when the page was added */
  readonly ref: PdfRef;

  /** The page index (0-based) */
  readonly index: number;

  private readonly ctx: PDFContext;
  private readonly layout: ResolvedPageOptions;
  private readonly content = new ContentStreamBuilder();

  /** Page-local resource names, in first-use order */
  private readonly aliases = new Map<Resource, `/${string}`>();
  private readonly fontResources = new PdfDict();
  private readonly xobjectResources = new PdfDict();

  private _cursor: number;
  private closed = false;

  constructor(ref: PdfRef, index: number, layout: ResolvedPageOptions, ctx: PDFContext) {
    this.ref = ref;
    this.index = index;
    this.layout = layout;
    this.ctx = ctx;
    this._cursor = layout.contentBox.y + layout.contentBox.height;
  }

  get width(): number {
    return this.layout.mediaBox.width;
  }

  get height(): number {
    return this.layout.mediaBox.height;
  }

  getMediaBox(): Box {
    return { ...this.layout.mediaBox };
  }

  /**
   * The area inside the page margins that paragraphs flow through.
   */
  getContentBox(): Box {
    return { ...this.layout.contentBox };
  }

  /**
   * Top of the space not yet used by paragraphs.
   */
  get cursor(): number {
    return this._cursor;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Text Drawing
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Draw text at a position. Lines are separated by newlines only.
   *
   * Kerned fonts are drawn with `TJ`; everything else with `Tj`.
   *
   * @example
   * ```typescript
   * page.drawText("Hello, World!", { x: 72, y: 720, size: 24 });
   *
   * page.drawText("Line 1\nLine 2", { x: 72, y: 600, font: pdf.fonts.standard("Courier") });
   * ```
   *
   * @throws {UnmappableGlyphError} if the font cannot show a character; nothing is drawn
   */
  drawText(text: string, options: DrawTextOptions = {}): void {
    this.assertOpen();

    const style = this.resolveStyle(options);
    const lineHeight = options.lineHeight ?? style.size * 1.2;
    const { contentBox } = this.layout;

    const x = options.x ?? contentBox.x;
    const y = options.y ?? contentBox.y + contentBox.height - (style.font.ascent * style.size) / 1000;

    // Resolve every glyph before anything is recorded
    const lines = text.split(/\r\n|\r|\n/).map((line, i) => ({
      x,
      baseline: y - i * lineHeight,
      glyphs: glyphsForText(style.font, line).map(glyph => ({ ...glyph, run: 0 })),
    }));

    if (lines.every(line => line.glyphs.length === 0)) {
      return;
    }

    this.appendOperators(this.textOps([style], lines));
  }

  /**
   * Flow text through the content box, starting at the page cursor.
   *
   * Lines break at Unicode line break opportunities, found over the text of
   * all spans together. When the content box is full, a new page with the
   * same size, margins and resource names is added to the document and the
   * text continues there. Pages the text moves past are closed.
   *
   * @example
   * ```typescript
   * page.drawParagraph("Plain text in the default style");
   *
   * page.drawParagraph([
   *   { text: "Warning: ", font: bold, color: rgb(0.8, 0, 0) },
   *   { text: "the disk is almost full." },
   * ]);
   * ```
   *
   * @returns the page the last line landed on
   *
   * @throws {UnmappableGlyphError} if a font cannot show a character; nothing is drawn
   * @throws {LayoutError} if a glyph is wider than the line or a line taller than the box
   */
  drawParagraph(content: string | readonly TextSpan[], options: DrawParagraphOptions = {}): PDFPage {
    this.assertOpen();

    const base = this.resolveStyle(options);
    const spans: readonly TextSpan[] = typeof content === "string" ? [{ text: content }] : content;
    const styles: TextStyle[] = spans.map(span => ({
      ...base,
      font: span.font ?? base.font,
      size: span.size ?? base.size,
      color: span.color ?? base.color,
    }));

    const measured = styles.length > 0 ? styles : [base];
    const ascent = Math.max(...measured.map(style => (style.font.ascent * style.size) / 1000));
    const lineHeight = options.lineHeight ?? Math.max(...measured.map(style => style.size)) * 1.2;
    const { contentBox } = this.layout;

    const x = options.x ?? contentBox.x;
    const maxWidth = options.maxWidth ?? contentBox.x + contentBox.width - x;

    const lines = layoutRuns(
      spans.map((span, i) => ({
        text: span.text,
        font: styles[i].font,
        fontSize: styles[i].size,
        characterSpacing: base.characterSpacing,
      })),
      maxWidth,
    );

    const { placements, pagesAdded, cursor } = paginate(lines, {
      lineHeight,
      ascent,
      top: contentBox.y + contentBox.height,
      bottom: contentBox.y,
      cursor: this._cursor,
    });

    const pages: PDFPage[] = [this];

    for (let i = 0; i < pagesAdded; i++) {
      pages.push(this.ctx.addPage(this.layout));
    }

    for (const [i, page] of pages.entries()) {
      if (i > 0) {
        page.inheritResources(pages[i - 1]);
      }

      const pageLines = placements
        .filter(placement => placement.page === i)
        .map(placement => ({ x, baseline: placement.baseline, glyphs: placement.line.glyphs }));

      if (pageLines.length > 0) {
        page.appendOperators(page.textOps(styles, pageLines));
      }
    }

    const last = pages[pages.length - 1];

    last._cursor = cursor;

    for (const page of pages.slice(0, -1)) {
      page.close();
    }

    return last;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Image Drawing
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Draw an image on the page.
   *
   * If only width or height is specified, aspect ratio is preserved.
   * If neither is specified, image is drawn at natural size (one point per pixel).
   *
   * @example
   * ```typescript
   * const image = pdf.embedJpeg(jpegBytes);
   *
   * page.drawImage(image, { x: 50, y: 500 });
   * page.drawImage(image, { x: 50, y: 400, width: 200 });
   * ```
   */
  drawImage(image: PDFImage, options: DrawImageOptions = {}): void {
    this.assertOpen();

    const x = options.x ?? 0;
    const y = options.y ?? 0;

    let width: number;
    let height: number;

    if (options.width !== undefined && options.height !== undefined) {
      // Both specified - use as is (may distort)
      width = options.width;
      height = options.height;
    } else if (options.width !== undefined) {
      width = options.width;
      height = width / image.aspectRatio;
    } else if (options.height !== undefined) {
      height = options.height;
      width = height * image.aspectRatio;
    } else {
      ({ width, height } = image.scale(1));
    }

    const name = this.aliasFor(image);

    this.appendOperators(drawImageOps(name, { x, y, width, height }));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Shape Drawing
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Draw a rectangle on the page.
   *
   * @example
   * ```typescript
   * page.drawRectangle({
   *   x: 50, y: 500, width: 200, height: 100,
   *   color: rgb(0.9, 0.9, 0.9),
   *   borderColor: rgb(0, 0, 0),
   *   borderWidth: 2,
   * });
   * ```
   */
  drawRectangle(options: DrawRectangleOptions): void {
    this.assertOpen();

    this.appendOperators(
      drawRectangleOps({
        x: options.x,
        y: options.y,
        width: options.width,
        height: options.height,
        fillColor: options.color,
        strokeColor: options.borderColor,
        strokeWidth: options.borderWidth,
      }),
    );
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Finalization
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Write the content stream and the page dictionary. Further drawing
   * throws. Closing twice does nothing.
   *
   * @internal Called by the document when it is finalized.
   */
  close(): void {
    if (this.closed) {
      return;
    }

    const { mediaBox } = this.layout;

    const resources = new PdfDict();

    if (this.fontResources.size > 0) {
      resources.set("Font", this.fontResources);
    }

    if (this.xobjectResources.size > 0) {
      resources.set("XObject", this.xobjectResources);
    }

    const contents = this.content.isEmpty ? undefined : this.ctx.register(this.content.toStream());

    this.ctx.registry.update(
      this.ref,
      PdfDict.of({
        Type: PdfName.Page,
        Parent: this.ctx.pages.ref,
        MediaBox: PdfArray.ofNumbers([
          mediaBox.x,
          mediaBox.y,
          mediaBox.x + mediaBox.width,
          mediaBox.y + mediaBox.height,
        ]),
        Resources: resources,
        Contents: contents,
      }),
    );

    this.closed = true;

    this.ctx.logger.debug(
      { page: this.index, ref: this.ref.toString(), operators: this.content.length, resources: this.aliases.size },
      "Closed page",
    );
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internal
  // ─────────────────────────────────────────────────────────────────────────────

  private assertOpen(): void {
    this.ctx.assertOpen();

    if (this.closed) {
      throw new DocumentStateError(`Page ${this.index} is closed`);
    }
  }

  private resolveStyle(options: DrawTextOptions | DrawParagraphOptions): TextStyle {
    return {
      font: options.font ?? this.ctx.resources.standardFont("Helvetica"),
      size: options.size ?? 12,
      color: options.color ?? black,
      characterSpacing: options.characterSpacing ?? 0,
    };
  }

  /**
   * Resource name for a font or image on this page, registered on first use.
   */
  private aliasFor(resource: Resource): `/${string}` {
    const existing = this.aliases.get(resource);

    if (existing) {
      return existing;
    }

    const ref = this.ctx.resources.refFor(resource);

    let alias: string;

    if (resource.kind === "image") {
      alias = `Im${this.xobjectResources.size + 1}`;
      this.xobjectResources.set(alias, ref);
    } else {
      alias = `F${this.fontResources.size + 1}`;
      this.fontResources.set(alias, ref);
    }

    const name: `/${string}` = `/${alias}`;

    this.aliases.set(resource, name);

    return name;
  }

  /**
   * Start using the resource names of `source`, so a paragraph keeps its
   * font names when it continues on this page.
   */
  private inheritResources(source: PDFPage): void {
    for (const [resource, name] of source.aliases) {
      this.aliases.set(resource, name);
    }

    for (const [key, ref] of source.fontResources) {
      this.fontResources.set(key, ref);
    }

    for (const [key, ref] of source.xobjectResources) {
      this.xobjectResources.set(key, ref);
    }
  }

  /**
   * `q color BT Tf [Tc] (Tm (Tj|TJ)+)* ET Q`, with color, `Tf` and `Tc`
   * repeated wherever the style changes. Empty lines are skipped.
   */
  private textOps(styles: readonly TextStyle[], lines: readonly PositionedLine[]): Operator[] {
    const ops: Operator[] = [];
    let current: TextStyle | undefined;

    for (const line of lines) {
      splitByRun(line.glyphs).forEach((glyphs, i) => {
        const style = styles[glyphs[0].run];

        if (!current) {
          ops.push(pushGraphicsState(), setFillColor(style.color), beginText());
          ops.push(setFont(this.aliasFor(style.font), style.size));

          if (style.characterSpacing !== 0) {
            ops.push(setCharSpacing(style.characterSpacing));
          }
        } else {
          if (!colorsEqual(current.color, style.color)) {
            ops.push(setFillColor(style.color));
          }

          if (current.font !== style.font || current.size !== style.size) {
            ops.push(setFont(this.aliasFor(style.font), style.size));
          }

          if (current.characterSpacing !== style.characterSpacing) {
            ops.push(setCharSpacing(style.characterSpacing));
          }
        }

        current = style;

        if (i === 0) {
          ops.push(setTextMatrix(1, 0, 0, 1, line.x, line.baseline));
        }

        ops.push(this.showGlyphs(style.font, glyphs));
      });
    }

    if (current) {
      ops.push(endText(), popGraphicsState());
    }

    return ops;
  }

  /**
   * Record the glyphs as used and show them, splitting the string wherever
   * a kerning adjustment applies.
   */
  private showGlyphs(font: PdfFont, glyphs: readonly Glyph[]): Operator {
    const items: Array<PdfString | number> = [];
    let run: number[] = [];

    for (let i = 0; i < glyphs.length; i++) {
      const code = this.ctx.resources.registerGlyph(font, glyphs[i]);
      const kerning = i > 0 ? font.kerning(glyphs[i - 1], glyphs[i]) : 0;

      if (kerning !== 0 && run.length > 0) {
        // TJ adjustments move the next glyph left, so tighter kerning is positive
        items.push(font.encode(run), -kerning);
        run = [];
      }

      run.push(code);
    }

    if (items.length === 0) {
      return showText(font.encode(run));
    }

    items.push(font.encode(run));

    return showTextArray(items);
  }

  private appendOperators(ops: Operator[]): void {
    this.content.add(...ops);
  }
}
