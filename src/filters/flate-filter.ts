import type { Filter } from "./filter";

/**
 * FlateDecode filter - zlib/deflate compression.
 */
export class FlateFilter implements Filter {
  readonly name = "FlateDecode";

  constructor(private readonly level: -1 | 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 = 6) {}

  async encode(data: Uint8Array): Promise<Uint8Array> {
    const pako = await import("pako");

    // zlib format (RFC 1950), which is what FlateDecode expects
    return pako.deflate(data, { level: this.level });
  }
}
