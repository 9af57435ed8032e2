import { describe, expect, it } from "vitest";
import { serialize } from "#src/test-utils";
import { PdfName } from "./pdf-name";

const write = (name: string) => serialize(PdfName.of(name));

describe("PdfName", () => {
  it("interns names", () => {
    expect(PdfName.of("Type")).toBe(PdfName.of("Type"));
    expect(PdfName.Type).toBe(PdfName.of("Type"));
  });

  it("writes regular names verbatim", () => {
    expect(write("FlateDecode")).toBe("/FlateDecode");
  });

  it("escapes whitespace and the hash sign", () => {
    expect(write("A B#")).toBe("/A#20B#23");
  });

  it("escapes delimiters", () => {
    expect(write("Name(1)")).toBe("/Name#281#29");
    expect(write("a/b")).toBe("/a#2Fb");
  });

  it("escapes non-ASCII characters as UTF-8 bytes", () => {
    expect(write("é")).toBe("/#C3#A9");
  });
});
