/**
 * Option schemas for documents and pages.
 *
 * User-facing option types are the schema inputs; everything downstream works
 * with the parsed output, where defaults are filled in.
 */

import { z } from "zod";

import { ConfigurationError } from "./errors";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const PdfVersionSchema = z.enum(["1.4", "1.5", "1.6", "1.7", "2.0"]);

export type PdfVersion = z.infer<typeof PdfVersionSchema>;

export const DocumentOptionsSchema = z
  .object({
    /** Version written in the file header */
    version: PdfVersionSchema.default("1.7"),
    /** Cross-reference format: classic table or compact stream (PDF 1.5+) */
    xref: z.enum(["table", "stream"]).default("table"),
    /** Encode unfiltered streams (page content, font programs) */
    compress: z.boolean().default(true),
    /** Filter used when `compress` is on */
    filter: z.enum(["FlateDecode", "ASCIIHexDecode"]).default("FlateDecode"),
    /** File identifier for the trailer /ID; random when omitted */
    id: z
      .instanceof(Uint8Array)
      .refine(bytes => bytes.length === 16, "id must be 16 bytes")
      .optional(),
    creationDate: z.date().optional(),
    modificationDate: z.date().optional(),
    producer: z.string().default("pdfmint"),
    title: z.string().optional(),
    author: z.string().optional(),
    subject: z.string().optional(),
    creator: z.string().optional(),
    logLevel: LogLevelSchema.optional(),
  })
  .strict()
  .refine(options => !(options.xref === "stream" && options.version === "1.4"), {
    message: "cross-reference streams require PDF 1.5 or later",
    path: ["xref"],
  });

export type DocumentOptions = z.input<typeof DocumentOptionsSchema>;

export type ResolvedDocumentOptions = z.output<typeof DocumentOptionsSchema>;

/** Standard page sizes in points (1 point = 1/72 inch) */
export const PAGE_SIZES = {
  letter: { width: 612, height: 792 },
  a4: { width: 595.28, height: 841.89 },
  legal: { width: 612, height: 1008 },
} as const;

export type PageSizePreset = keyof typeof PAGE_SIZES;

const length = z.number().finite().nonnegative();

export const MarginsSchema = z.union([
  length,
  z.object({ top: length, right: length, bottom: length, left: length }).strict(),
]);

export const PageOptionsSchema = z
  .object({
    size: z.enum(["letter", "a4", "legal"]).default("letter"),
    orientation: z.enum(["portrait", "landscape"]).default("portrait"),
    /** Explicit width; overrides `size` together with `height` */
    width: z.number().finite().positive().optional(),
    height: z.number().finite().positive().optional(),
    /** Inset of the content box used by paragraph layout */
    margins: MarginsSchema.default(72),
  })
  .strict()
  .refine(options => (options.width === undefined) === (options.height === undefined), {
    message: "width and height must be given together",
    path: ["width"],
  });

export type PageOptions = z.input<typeof PageOptionsSchema>;

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ResolvedPageOptions {
  mediaBox: Box;
  contentBox: Box;
}

/**
 * Parse options with a schema, reporting failures as ConfigurationError.
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    throw new ConfigurationError(
      `Invalid ${what}`,
      result.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }

  return result.data;
}

/**
 * Resolve page options into a media box and the content box inside the margins.
 *
 * @example
 * ```ts
 * resolvePageOptions({}).mediaBox // { x: 0, y: 0, width: 612, height: 792 }
 * resolvePageOptions({ size: "letter", orientation: "landscape" }).mediaBox.width // 792
 * ```
 */
export function resolvePageOptions(input: PageOptions = {}): ResolvedPageOptions {
  const options = parseOptions(PageOptionsSchema, input, "page options");
  const preset = PAGE_SIZES[options.size];

  let width: number = options.width ?? preset.width;
  let height: number = options.height ?? preset.height;

  if (options.width === undefined && options.orientation === "landscape") {
    [width, height] = [height, width];
  }

  const margins =
    typeof options.margins === "number"
      ? { top: options.margins, right: options.margins, bottom: options.margins, left: options.margins }
      : options.margins;

  const contentWidth = width - margins.left - margins.right;
  const contentHeight = height - margins.top - margins.bottom;

  if (contentWidth <= 0 || contentHeight <= 0) {
    throw new ConfigurationError("Invalid page options", ["margins: leave no room for content"]);
  }

  return {
    mediaBox: { x: 0, y: 0, width, height },
    contentBox: { x: margins.left, y: margins.bottom, width: contentWidth, height: contentHeight },
  };
}
