import { inflate } from "pako";
import { describe, expect, it } from "vitest";
import { ASCIIHexFilter } from "./ascii-hex-filter";
import { FilterPipeline } from "./filter-pipeline";
import { FlateFilter } from "./flate-filter";

describe("FilterPipeline", () => {
  describe("registration", () => {
    it("has the built-in filters", () => {
      expect(FilterPipeline.hasFilter("FlateDecode")).toBe(true);
      expect(FilterPipeline.hasFilter("ASCIIHexDecode")).toBe(true);
      expect(FilterPipeline.hasFilter("LZWDecode")).toBe(false);
    });
  });

  describe("encode", () => {
    it("returns encoded data with the filter name", async () => {
      const result = await FilterPipeline.encode(new TextEncoder().encode("Hello"), "ASCIIHexDecode");

      expect(result.filter).toBe("ASCIIHexDecode");
      expect(new TextDecoder().decode(result.data)).toBe("48656C6C6F>");
    });

    it("throws on unknown filter", async () => {
      await expect(FilterPipeline.encode(new Uint8Array(1), "Bogus")).rejects.toThrow(
        "Unknown filter: Bogus",
      );
    });
  });
});

describe("FlateFilter", () => {
  it("produces zlib data that inflates back", async () => {
    const input = new TextEncoder().encode("BT /F1 12 Tf (repeat repeat repeat) Tj ET");
    const encoded = await new FlateFilter().encode(input);

    // zlib header with deflate method
    expect(encoded[0]).toBe(0x78);
    expect(inflate(encoded)).toEqual(input);
  });
});

describe("ASCIIHexFilter", () => {
  it("terminates empty input", async () => {
    const encoded = await new ASCIIHexFilter().encode(new Uint8Array(0));

    expect(new TextDecoder().decode(encoded)).toBe(">");
  });

  it("writes two uppercase digits per byte", async () => {
    const encoded = await new ASCIIHexFilter().encode(new Uint8Array([0x00, 0xab, 0xff]));

    expect(new TextDecoder().decode(encoded)).toBe("00ABFF>");
  });
});
