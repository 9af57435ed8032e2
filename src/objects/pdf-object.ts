/**
 * PDF object types.
 */
import type { PdfArray } from "./pdf-array";
import type { PdfDict } from "./pdf-dict";
import type { PdfBool, PdfNull } from "./pdf-keyword";
import type { PdfName } from "./pdf-name";
import type { PdfNumber } from "./pdf-number";
import type { PdfRef } from "./pdf-ref";
import type { PdfStream } from "./pdf-stream";
import type { PdfString } from "./pdf-string";

/**
 * Every value an indirect object can hold, discriminated by `type`.
 * Streams also report `type === "stream"` through `PdfDict`, so narrow
 * them with `instanceof PdfStream`.
 */
export type PdfObject =
  | PdfNull
  | PdfBool
  | PdfNumber
  | PdfName
  | PdfString
  | PdfRef
  | PdfArray
  | PdfDict
  | PdfStream;
