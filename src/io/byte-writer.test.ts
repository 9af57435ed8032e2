import { describe, expect, it } from "vitest";
import { stringToBytes, toLatin1 } from "#src/test-utils";
import { ByteWriter } from "./byte-writer";

describe("ByteWriter", () => {
  it("starts empty", () => {
    expect(new ByteWriter().toBytes()).toEqual(new Uint8Array(0));
  });

  it("appends bytes, arrays and ASCII text in order", () => {
    const writer = new ByteWriter();

    writer.writeAscii("1 0 obj");
    writer.writeByte(0x0a);
    writer.writeBytes(new Uint8Array([0x80, 0xff]));

    expect(writer.toBytes()).toEqual(new Uint8Array([...stringToBytes("1 0 obj\n"), 0x80, 0xff]));
  });

  it("accepts an initial size of zero", () => {
    const writer = new ByteWriter({ initialSize: 0 });

    writer.writeAscii("abc");

    expect(toLatin1(writer.toBytes())).toBe("abc");
  });

  it("grows past its initial size one byte at a time", () => {
    const writer = new ByteWriter({ initialSize: 8 });

    for (let i = 0; i < 100; i++) {
      writer.writeByte(i);
    }

    const result = writer.toBytes();

    expect(result.length).toBe(100);
    expect(result[0]).toBe(0);
    expect(result[99]).toBe(99);
  });

  it("grows to fit a chunk larger than twice its capacity", () => {
    const writer = new ByteWriter({ initialSize: 16 });
    const data = new Uint8Array(1000).fill(0x55);

    writer.writeAscii("ab");
    writer.writeBytes(data);

    const result = writer.toBytes();

    expect(result.length).toBe(1002);
    expect(toLatin1(result.subarray(0, 2))).toBe("ab");
    expect(result.subarray(2)).toEqual(data);
  });

  it("returns a copy on each call", () => {
    const writer = new ByteWriter({ initialSize: 1024 });

    writer.writeAscii("test");

    const first = writer.toBytes();

    writer.writeAscii("!");

    expect(toLatin1(first)).toBe("test");
    expect(toLatin1(writer.toBytes())).toBe("test!");
  });
});
