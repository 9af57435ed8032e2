import { PdfArray } from "#src/objects/pdf-array";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import { PdfStream } from "#src/objects/pdf-stream";
import { parseJpeg } from "./jpeg";

const COLOR_SPACES = {
  1: "DeviceGray",
  3: "DeviceRGB",
  4: "DeviceCMYK",
} as const;

/**
 * An image XObject ready to be placed on pages.
 *
 * Images are immutable; the resource manager allocates the stream the first
 * time a page draws it.
 */
export class PDFImage {
  readonly kind = "image";

  private constructor(
    readonly stream: PdfStream,
    readonly width: number,
    readonly height: number,
  ) {}

  /**
   * Wrap JPEG data as a /DCTDecode image. The data is embedded as-is.
   *
   * @throws {InvalidImageError} if the data is not a readable JPEG
   */
  static fromJpeg(data: Uint8Array): PDFImage {
    const info = parseJpeg(data);

    const stream = PdfStream.fromDict(
      {
        Type: PdfName.XObject,
        Subtype: PdfName.of("Image"),
        Width: PdfNumber.of(info.width),
        Height: PdfNumber.of(info.height),
        ColorSpace: PdfName.of(COLOR_SPACES[info.components]),
        BitsPerComponent: PdfNumber.of(info.bitsPerComponent),
        Decode: info.components === 4 && info.adobe ? PdfArray.ofNumbers([1, 0, 1, 0, 1, 0, 1, 0]) : undefined,
        Filter: PdfName.of("DCTDecode"),
      },
      data,
    );

    return new PDFImage(stream, info.width, info.height);
  }

  get aspectRatio(): number {
    return this.width / this.height;
  }

  /**
   * Dimensions at a scale factor (1 = one point per pixel).
   */
  scale(factor: number): { width: number; height: number } {
    return { width: this.width * factor, height: this.height * factor };
  }
}
