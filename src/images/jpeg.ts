/**
 * Minimal JPEG header reader.
 *
 * Only the frame header (SOFn) and the Adobe APP14 segment are read; the
 * image data is embedded untouched with /DCTDecode.
 */

export class InvalidImageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidImageError";
  }
}

export interface JpegInfo {
  width: number;
  height: number;
  bitsPerComponent: number;
  components: 1 | 3 | 4;
  /** Adobe-written CMYK JPEGs store inverted components */
  adobe: boolean;
}

const MARKER = 0xff;
const SOI = 0xd8;
const SOS = 0xda;
const EOI = 0xd9;
const APP14 = 0xee;

// SOF0-SOF15, excluding DHT (C4), JPG (C8) and DAC (CC)
function isStartOfFrame(marker: number): boolean {
  return marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;
}

// Markers without a length field
function isStandalone(marker: number): boolean {
  return marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7);
}

export function parseJpeg(data: Uint8Array): JpegInfo {
  if (data.length < 4 || data[0] !== MARKER || data[1] !== SOI) {
    throw new InvalidImageError("Not a JPEG file (missing SOI marker)");
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

  let pos = 2;
  let adobe = false;

  while (pos < data.length) {
    if (data[pos] !== MARKER) {
      throw new InvalidImageError(`Expected JPEG marker at offset ${pos}`);
    }

    // Fill bytes may precede a marker
    while (pos < data.length && data[pos] === MARKER) {
      pos++;
    }

    const marker = data[pos];
    pos++;

    if (isStandalone(marker)) {
      continue;
    }

    if (marker === SOS || marker === EOI) {
      break;
    }

    if (pos + 2 > data.length) {
      break;
    }

    const length = view.getUint16(pos);

    if (isStartOfFrame(marker)) {
      if (pos + 8 > data.length) {
        break;
      }

      const components = data[pos + 7];

      if (components !== 1 && components !== 3 && components !== 4) {
        throw new InvalidImageError(`Unsupported JPEG component count: ${components}`);
      }

      const info: JpegInfo = {
        bitsPerComponent: data[pos + 2],
        height: view.getUint16(pos + 3),
        width: view.getUint16(pos + 5),
        components,
        adobe,
      };

      if (info.width === 0 || info.height === 0) {
        throw new InvalidImageError("JPEG frame has no size");
      }

      return info;
    }

    if (marker === APP14 && length >= 7) {
      adobe = String.fromCharCode(...data.subarray(pos + 2, pos + 7)) === "Adobe";
    }

    pos += length;
  }

  throw new InvalidImageError("JPEG has no frame header");
}
