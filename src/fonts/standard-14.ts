/**
 * Metrics for the standard 14 fonts.
 *
 * Only the metric sets bundled under ./metrics are available. They are loaded
 * once when this module is imported and never change afterwards; asking for
 * any other standard font is a configuration error.
 */

import { z } from "zod";

import { ConfigurationError } from "#src/config/errors";
import courierBold from "./metrics/courier-bold.json";
import courierBoldOblique from "./metrics/courier-boldoblique.json";
import courierOblique from "./metrics/courier-oblique.json";
import courier from "./metrics/courier.json";
import helvetica from "./metrics/helvetica.json";

export const STANDARD_14_FONTS = [
  "Helvetica",
  "Helvetica-Bold",
  "Helvetica-Oblique",
  "Helvetica-BoldOblique",
  "Times-Roman",
  "Times-Bold",
  "Times-Italic",
  "Times-BoldItalic",
  "Courier",
  "Courier-Bold",
  "Courier-Oblique",
  "Courier-BoldOblique",
  "Symbol",
  "ZapfDingbats",
] as const;

export type Standard14FontName = (typeof STANDARD_14_FONTS)[number];

export interface StandardFontMetrics {
  fontName: Standard14FontName;
  familyName: string;
  isFixedPitch: boolean;
  isSerif: boolean;
  italicAngle: number;
  fontBBox: [number, number, number, number];
  capHeight: number;
  xHeight: number;
  ascender: number;
  descender: number;
  stemV: number;
  /** Advance widths by WinAnsi code, in 1/1000 em */
  widths: ReadonlyMap<number, number>;
  /** Kerning adjustments keyed by `kerningKey(left, right)` */
  kerning: ReadonlyMap<number, number>;
}

const MetricsFileSchema = z.object({
  fontName: z.enum(STANDARD_14_FONTS),
  familyName: z.string(),
  isFixedPitch: z.boolean(),
  isSerif: z.boolean(),
  italicAngle: z.number(),
  fontBBox: z.tuple([z.number(), z.number(), z.number(), z.number()]),
  capHeight: z.number(),
  xHeight: z.number(),
  ascender: z.number(),
  descender: z.number(),
  stemV: z.number(),
  widths: z.record(z.string().regex(/^\d+$/), z.number().nonnegative()),
  kerning: z.array(z.tuple([z.number().int(), z.number().int(), z.number()])),
});

export function kerningKey(left: number, right: number): number {
  return (left << 8) | right;
}

function loadMetrics(source: unknown): StandardFontMetrics {
  const file = MetricsFileSchema.parse(source);

  return {
    ...file,
    widths: new Map(Object.entries(file.widths).map(([code, width]) => [Number(code), width])),
    kerning: new Map(file.kerning.map(([left, right, value]) => [kerningKey(left, right), value])),
  };
}

const COMPILED_IN: ReadonlyMap<Standard14FontName, StandardFontMetrics> = new Map(
  [helvetica, courier, courierBold, courierOblique, courierBoldOblique]
    .map(loadMetrics)
    .map(metrics => [metrics.fontName, metrics] as const),
);

export function isStandard14Font(name: string): name is Standard14FontName {
  return STANDARD_14_FONTS.some(font => font === name);
}

/**
 * Standard fonts whose metrics are bundled with this build.
 */
export function availableStandardFonts(): Standard14FontName[] {
  return [...COMPILED_IN.keys()];
}

/**
 * @throws {ConfigurationError} if the name is not a standard font or its
 *   metrics are not bundled
 */
export function getStandardFontMetrics(name: string): StandardFontMetrics {
  if (!isStandard14Font(name)) {
    throw new ConfigurationError(`"${name}" is not a standard 14 font`);
  }

  const metrics = COMPILED_IN.get(name);

  if (!metrics) {
    throw new ConfigurationError(
      `Metrics for standard font ${name} are not included in this build`,
      [`available: ${availableStandardFonts().join(", ")}`],
    );
  }

  return metrics;
}
