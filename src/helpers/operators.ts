/**
 * Operator factories, one per content stream operator the drawing API uses.
 */

import { Op, Operator } from "#src/content/operators";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfString } from "#src/objects/pdf-string";
import { type Color, colorToArray } from "./colors";

// Graphics state

export const pushGraphicsState = (): Operator => Operator.of(Op.PushGraphicsState);

export const popGraphicsState = (): Operator => Operator.of(Op.PopGraphicsState);

export const concatMatrix = (a: number, b: number, c: number, d: number, e: number, f: number): Operator =>
  Operator.of(Op.ConcatMatrix, a, b, c, d, e, f);

export const setLineWidth = (width: number): Operator => Operator.of(Op.SetLineWidth, width);

// Paths

export const rectangle = (x: number, y: number, width: number, height: number): Operator =>
  Operator.of(Op.Rectangle, x, y, width, height);

export const fill = (): Operator => Operator.of(Op.Fill);

export const stroke = (): Operator => Operator.of(Op.Stroke);

export const fillAndStroke = (): Operator => Operator.of(Op.FillAndStroke);

// Color

export function setFillColor(color: Color): Operator {
  const components = colorToArray(color);

  switch (color.type) {
    case "RGB":
      return Operator.of(Op.SetNonStrokingRGB, ...components);
    case "Grayscale":
      return Operator.of(Op.SetNonStrokingGray, ...components);
    case "CMYK":
      return Operator.of(Op.SetNonStrokingCMYK, ...components);
  }
}

export function setStrokeColor(color: Color): Operator {
  const components = colorToArray(color);

  switch (color.type) {
    case "RGB":
      return Operator.of(Op.SetStrokingRGB, ...components);
    case "Grayscale":
      return Operator.of(Op.SetStrokingGray, ...components);
    case "CMYK":
      return Operator.of(Op.SetStrokingCMYK, ...components);
  }
}

// Text

export const beginText = (): Operator => Operator.of(Op.BeginText);

export const endText = (): Operator => Operator.of(Op.EndText);

export const setFont = (name: `/${string}`, size: number): Operator => Operator.of(Op.SetFont, name, size);

export const setCharSpacing = (spacing: number): Operator => Operator.of(Op.SetCharSpacing, spacing);

export const setTextMatrix = (a: number, b: number, c: number, d: number, e: number, f: number): Operator =>
  Operator.of(Op.SetTextMatrix, a, b, c, d, e, f);

export const showText = (text: PdfString): Operator => Operator.of(Op.ShowText, text);

/**
 * `TJ` with strings and position adjustments in thousandths of a text
 * space unit (positive moves the next glyph left).
 */
export function showTextArray(items: ReadonlyArray<PdfString | number>): Operator {
  const array = new PdfArray(items.map(item => (typeof item === "number" ? PdfNumber.of(item) : item)));

  return Operator.of(Op.ShowTextArray, array);
}

// XObjects

export const drawXObject = (name: `/${string}`): Operator => Operator.of(Op.DrawXObject, name);
