import { describe, expect, it } from "vitest";
import { ContentStreamBuilder } from "#src/content/content-stream";
import type { Operator } from "#src/content/operators";
import { grayscale, rgb } from "#src/helpers/colors";
import { toLatin1 } from "#src/test-utils";
import { drawImageOps, drawRectangleOps } from "./operations";

const write = (ops: Operator[]) => toLatin1(ContentStreamBuilder.from(ops).toBytes()).split("\n");

describe("drawRectangleOps", () => {
  const box = { x: 10, y: 20, width: 100, height: 50 };

  it("fills black by default", () => {
    expect(write(drawRectangleOps(box))).toEqual(["q", "0 g", "10 20 100 50 re", "f", "Q"]);
  });

  it("fills with the given color", () => {
    expect(write(drawRectangleOps({ ...box, fillColor: rgb(1, 0, 0) }))).toEqual([
      "q",
      "1 0 0 rg",
      "10 20 100 50 re",
      "f",
      "Q",
    ]);
  });

  it("strokes only when just a stroke color is given", () => {
    expect(write(drawRectangleOps({ ...box, strokeColor: grayscale(0.5) }))).toEqual([
      "q",
      "0.5 G",
      "1 w",
      "10 20 100 50 re",
      "S",
      "Q",
    ]);
  });

  it("fills and strokes with both colors", () => {
    expect(
      write(drawRectangleOps({ ...box, fillColor: grayscale(1), strokeColor: grayscale(0), strokeWidth: 2.5 })),
    ).toEqual(["q", "1 g", "0 G", "2.5 w", "10 20 100 50 re", "B", "Q"]);
  });
});

describe("drawImageOps", () => {
  it("scales the unit square to the box", () => {
    expect(write(drawImageOps("/Im1", { x: 72, y: 100, width: 200, height: 150 }))).toEqual([
      "q",
      "200 0 0 150 72 100 cm",
      "/Im1 Do",
      "Q",
    ]);
  });
});
