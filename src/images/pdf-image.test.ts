import { describe, expect, it } from "vitest";
import { buildJpeg, serialize } from "#src/test-utils";
import { InvalidImageError, parseJpeg } from "./jpeg";
import { PDFImage } from "./pdf-image";

function dictOf(image: PDFImage): string {
  const text = serialize(image.stream);

  return text.slice(0, text.indexOf("\nstream\n"));
}

describe("parseJpeg", () => {
  it("reads the frame header", () => {
    expect(parseJpeg(buildJpeg({ width: 640, height: 480 }))).toEqual({
      width: 640,
      height: 480,
      bitsPerComponent: 8,
      components: 3,
      adobe: false,
    });
  });

  it("notices an Adobe segment before the frame", () => {
    expect(parseJpeg(buildJpeg({ width: 10, height: 20, components: 4, adobe: true })).adobe).toBe(true);
  });

  it("skips fill bytes before a marker", () => {
    const jpeg = buildJpeg({ width: 3, height: 2 });
    const padded = new Uint8Array([0xff, 0xd8, 0xff, ...jpeg.subarray(2)]);

    expect(parseJpeg(padded).width).toBe(3);
  });

  it("rejects data without a start-of-image marker", () => {
    expect(() => parseJpeg(new Uint8Array([0x89, 0x50, 0x4e, 0x47]))).toThrow(InvalidImageError);
    expect(() => parseJpeg(new Uint8Array([0x89, 0x50, 0x4e, 0x47]))).toThrow(
      "Not a JPEG file (missing SOI marker)",
    );
  });

  it("rejects a file without a frame header", () => {
    expect(() => parseJpeg(new Uint8Array([0xff, 0xd8, 0xff, 0xd9]))).toThrow("JPEG has no frame header");
  });

  it("rejects an empty frame", () => {
    expect(() => parseJpeg(buildJpeg({ width: 0, height: 10 }))).toThrow("JPEG frame has no size");
  });

  it("rejects unsupported component counts", () => {
    const jpeg = buildJpeg({ width: 1, height: 1 });

    // Component count of the SOF0 segment
    jpeg[11] = 2;

    expect(() => parseJpeg(jpeg)).toThrow("Unsupported JPEG component count: 2");
  });
});

describe("PDFImage", () => {
  it("wraps the JPEG as a DCTDecode image XObject", () => {
    const data = buildJpeg({ width: 640, height: 480 });
    const image = PDFImage.fromJpeg(data);

    expect(image.kind).toBe("image");
    expect(image.stream.data).toBe(data);
    expect(dictOf(image)).toBe(
      [
        "<<",
        `/Length ${data.length}`,
        "/Type /XObject",
        "/Subtype /Image",
        "/Width 640",
        "/Height 480",
        "/ColorSpace /DeviceRGB",
        "/BitsPerComponent 8",
        "/Filter /DCTDecode",
        ">>",
      ].join("\n"),
    );
  });

  it("uses DeviceGray for one component", () => {
    expect(dictOf(PDFImage.fromJpeg(buildJpeg({ width: 1, height: 1, components: 1 })))).toContain(
      "/ColorSpace /DeviceGray\n",
    );
  });

  it("inverts Adobe CMYK data with /Decode", () => {
    const image = PDFImage.fromJpeg(buildJpeg({ width: 1, height: 1, components: 4, adobe: true }));

    expect(dictOf(image)).toContain("/ColorSpace /DeviceCMYK\n/BitsPerComponent 8\n/Decode [1 0 1 0 1 0 1 0]\n");
  });

  it("leaves plain CMYK data alone", () => {
    const image = PDFImage.fromJpeg(buildJpeg({ width: 1, height: 1, components: 4 }));

    expect(dictOf(image)).not.toContain("/Decode");
  });

  it("reports size and aspect ratio", () => {
    const image = PDFImage.fromJpeg(buildJpeg({ width: 200, height: 100 }));

    expect(image.aspectRatio).toBe(2);
    expect(image.scale(0.5)).toEqual({ width: 100, height: 50 });
  });
});
