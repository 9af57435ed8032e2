/**
 * Drawing API option interfaces.
 */

import type { PdfFont } from "#src/fonts/pdf-font";
import type { Color } from "#src/helpers/colors";

// ─────────────────────────────────────────────────────────────────────────────
// Text Options
// ─────────────────────────────────────────────────────────────────────────────

interface TextStyleOptions {
  /** Font to use (default: standard Helvetica) */
  font?: PdfFont;
  /** Font size in points (default: 12) */
  size?: number;
  /** Text color (default: black) */
  color?: Color;
  /** Distance between baselines in points (default: size * 1.2) */
  lineHeight?: number;
  /** Extra space after each glyph in points (default: 0) */
  characterSpacing?: number;
}

/**
 * Options for drawing text at a fixed position.
 *
 * Newlines start a new line `lineHeight` below the previous one; nothing
 * is wrapped.
 */
export interface DrawTextOptions extends TextStyleOptions {
  /** X position of the first baseline (default: left of the content box) */
  x?: number;
  /** Y position of the first baseline (default: one ascent below the top of the content box) */
  y?: number;
}

/**
 * A piece of paragraph text with its own style. Unset fields fall back to
 * the paragraph options.
 */
export interface TextSpan {
  text: string;
  font?: PdfFont;
  /** Font size in points */
  size?: number;
  color?: Color;
}

/**
 * Options for flowing text through the content box.
 *
 * With spans in several sizes, the default line height and the first
 * baseline follow the largest one.
 */
export interface DrawParagraphOptions extends TextStyleOptions {
  /** Left edge of the lines (default: left of the content box) */
  x?: number;
  /** Line width (default: from `x` to the right of the content box) */
  maxWidth?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Image Options
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Options for drawing an image.
 */
export interface DrawImageOptions {
  /** X position (default: 0) */
  x?: number;
  /** Y position (default: 0) */
  y?: number;
  /** Width in points (default: image natural width) */
  width?: number;
  /** Height in points (default: preserves aspect ratio if width set, otherwise natural height) */
  height?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Shape Options
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Options for drawing a rectangle.
 *
 * With neither `color` nor `borderColor` the rectangle is filled black.
 */
export interface DrawRectangleOptions {
  /** X position (left edge) */
  x: number;
  /** Y position (bottom edge) */
  y: number;
  width: number;
  height: number;
  /** Fill color */
  color?: Color;
  /** Border color */
  borderColor?: Color;
  /** Border width in points (default: 1 when a border color is set) */
  borderWidth?: number;
}
