/**
 * Operator sequences for shapes and images, independent of any page.
 */

import type { Operator } from "#src/content/operators";
import { black, type Color } from "#src/helpers/colors";
import {
  concatMatrix,
  drawXObject,
  fill,
  fillAndStroke,
  popGraphicsState,
  pushGraphicsState,
  rectangle,
  setFillColor,
  setLineWidth,
  setStrokeColor,
  stroke,
} from "#src/helpers/operators";

export interface RectangleOpsOptions {
  x: number;
  y: number;
  width: number;
  height: number;
  fillColor?: Color;
  strokeColor?: Color;
  strokeWidth?: number;
}

/**
 * `q [color] re f|S|B Q`
 */
export function drawRectangleOps(options: RectangleOpsOptions): Operator[] {
  const { strokeColor } = options;
  const fillColor = options.fillColor ?? (strokeColor ? undefined : black);

  const ops: Operator[] = [pushGraphicsState()];

  if (fillColor) {
    ops.push(setFillColor(fillColor));
  }

  if (strokeColor) {
    ops.push(setStrokeColor(strokeColor));
    ops.push(setLineWidth(options.strokeWidth ?? 1));
  }

  ops.push(rectangle(options.x, options.y, options.width, options.height));

  if (fillColor && strokeColor) {
    ops.push(fillAndStroke());
  } else if (fillColor) {
    ops.push(fill());
  } else {
    ops.push(stroke());
  }

  ops.push(popGraphicsState());

  return ops;
}

/**
 * `q w 0 0 h x y cm /Name Do Q`: image XObjects are 1x1 unit, so the
 * matrix scales them to the target size.
 */
export function drawImageOps(
  name: `/${string}`,
  box: { x: number; y: number; width: number; height: number },
): Operator[] {
  return [
    pushGraphicsState(),
    concatMatrix(box.width, 0, 0, box.height, box.x, box.y),
    drawXObject(name),
    popGraphicsState(),
  ];
}
