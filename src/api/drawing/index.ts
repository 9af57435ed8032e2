/**
 * Drawing API exports.
 */

// Operations (for advanced users building custom content streams)
export { drawImageOps, drawRectangleOps, type RectangleOpsOptions } from "./operations";

export type {
  DrawImageOptions,
  DrawParagraphOptions,
  DrawRectangleOptions,
  DrawTextOptions,
  TextSpan,
} from "./types";
