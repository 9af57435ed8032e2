/**
 * pdfmint
 *
 * Write-only PDF generation: pages, standard and embedded fonts, JPEG
 * images, paragraph layout, and streamed output.
 */

export { version } from "../package.json";

// ─────────────────────────────────────────────────────────────────────────────
// High-level API
// ─────────────────────────────────────────────────────────────────────────────

export { type FinalizeOptions, type FinalizeResult, PDF } from "./api/pdf";
export { PDFFonts } from "./api/pdf-fonts";
export { PDFPage } from "./api/pdf-page";
export {
  type DrawImageOptions,
  type DrawParagraphOptions,
  type DrawRectangleOptions,
  type DrawTextOptions,
  type TextSpan,
  drawImageOps,
  drawRectangleOps,
} from "./api/drawing";

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

export {
  type Box,
  type DocumentOptions,
  type LogLevel,
  PAGE_SIZES,
  type PageOptions,
  type PageSizePreset,
  type PdfVersion,
} from "./config/options";

// ─────────────────────────────────────────────────────────────────────────────
// Color Helpers
// ─────────────────────────────────────────────────────────────────────────────

export { black, type CMYK, type Color, cmyk, type Grayscale, grayscale, type RGB, rgb } from "./helpers/colors";

// ─────────────────────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────────────────────

export { type ByteSink, MemorySink, WritableSink } from "./io/sink";
export type { EncodedData, Filter } from "./filters/filter";
export { FilterPipeline } from "./filters/filter-pipeline";
export { type DocumentRoots, PDFWriter, type WriteOptions, type WriteResult, type WriterState, writeDocument } from "./writer/pdf-writer";

// ─────────────────────────────────────────────────────────────────────────────
// PDF Objects
// ─────────────────────────────────────────────────────────────────────────────

export { ObjectRegistry } from "./document/object-registry";
export { PdfArray } from "./objects/pdf-array";
export { PdfBool, PdfNull } from "./objects/pdf-keyword";
export { PdfDict } from "./objects/pdf-dict";
export { PdfName } from "./objects/pdf-name";
export { PdfNumber } from "./objects/pdf-number";
export type { PdfObject } from "./objects/pdf-object";
export { PdfRef } from "./objects/pdf-ref";
export { PdfStream } from "./objects/pdf-stream";
export { PdfString } from "./objects/pdf-string";

// ─────────────────────────────────────────────────────────────────────────────
// Fonts
// ─────────────────────────────────────────────────────────────────────────────

export { CompositeFont } from "./fonts/composite-font";
export type { FontProgram, FontProgramMetrics } from "./fonts/font-program";
export { FontkitProgram } from "./fonts/fontkit-program";
export { type Glyph, type PdfFont, widthOfTextAtSize } from "./fonts/pdf-font";
export { SimpleFont } from "./fonts/simple-font";
export { availableStandardFonts, STANDARD_14_FONTS, type Standard14FontName } from "./fonts/standard-14";

// ─────────────────────────────────────────────────────────────────────────────
// Images
// ─────────────────────────────────────────────────────────────────────────────

export { PDFImage } from "./images/pdf-image";

// ─────────────────────────────────────────────────────────────────────────────
// Layout
// ─────────────────────────────────────────────────────────────────────────────

export { type LayoutOptions, layoutRuns, layoutText, type TextLine, type TextRun } from "./layout/text-layout";
export { type Pagination, type PaginationOptions, paginate, type PlacedLine } from "./layout/paginator";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export { ConfigurationError } from "./config/errors";
export {
  DocumentStateError,
  IncompleteObjectGraphError,
  StructuralError,
  UnknownObjectError,
} from "./document/errors";
export { FontError, MissingGlyphDataError, UnmappableGlyphError } from "./fonts/errors";
export { InvalidImageError } from "./images/jpeg";
export { LayoutError } from "./layout/errors";
export { FinalizeAbortedError, IoError, SinkWriteError, WriterStateError } from "./writer/errors";
