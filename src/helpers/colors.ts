/**
 * Fill colors for text and shapes.
 *
 * Components are in the 0-1 range, as the PDF color operators expect.
 */

export interface RGB {
  type: "RGB";
  red: number;
  green: number;
  blue: number;
}

/** 0 = black, 1 = white */
export interface Grayscale {
  type: "Grayscale";
  gray: number;
}

export interface CMYK {
  type: "CMYK";
  cyan: number;
  magenta: number;
  yellow: number;
  black: number;
}

export type Color = RGB | Grayscale | CMYK;

function component(value: number, label: string): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new RangeError(`Color component ${label} must be between 0 and 1, got ${value}`);
  }

  return value;
}

/**
 * @example
 * ```typescript
 * const red = rgb(1, 0, 0);
 * ```
 */
export function rgb(r: number, g: number, b: number): RGB {
  return { type: "RGB", red: component(r, "red"), green: component(g, "green"), blue: component(b, "blue") };
}

export function grayscale(gray: number): Grayscale {
  return { type: "Grayscale", gray: component(gray, "gray") };
}

export function cmyk(c: number, m: number, y: number, k: number): CMYK {
  return {
    type: "CMYK",
    cyan: component(c, "cyan"),
    magenta: component(m, "magenta"),
    yellow: component(y, "yellow"),
    black: component(k, "black"),
  };
}

export const black: Grayscale = { type: "Grayscale", gray: 0 };

/**
 * Color components in operator order.
 */
export function colorToArray(color: Color): number[] {
  switch (color.type) {
    case "RGB":
      return [color.red, color.green, color.blue];
    case "Grayscale":
      return [color.gray];
    case "CMYK":
      return [color.cyan, color.magenta, color.yellow, color.black];
  }
}

export function colorsEqual(a: Color, b: Color): boolean {
  const left = colorToArray(a);
  const right = colorToArray(b);

  return a.type === b.type && left.every((value, i) => value === right[i]);
}
