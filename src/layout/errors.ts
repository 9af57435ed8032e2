/**
 * Text cannot be laid out in the space given without overflowing it.
 */
export class LayoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LayoutError";
  }
}
