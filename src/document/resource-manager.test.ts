import { describe, expect, it } from "vitest";
import { glyphsForText } from "#src/fonts/pdf-font";
import { createLogger } from "#src/helpers/logger";
import { buildJpeg, FakeFontProgram } from "#src/test-utils";
import { DocumentStateError } from "./errors";
import { ObjectRegistry } from "./object-registry";
import { ResourceManager } from "./resource-manager";

function setup() {
  const registry = new ObjectRegistry();

  return { registry, resources: new ResourceManager(registry, createLogger("silent")) };
}

describe("ResourceManager", () => {
  describe("deduplication", () => {
    it("returns one instance per standard font name", () => {
      const { resources } = setup();

      expect(resources.standardFont("Helvetica")).toBe(resources.standardFont("Helvetica"));
      expect(resources.standardFont("Courier")).not.toBe(resources.standardFont("Helvetica"));
    });

    it("recognizes font programs with identical data", () => {
      const { resources } = setup();

      const first = resources.embedFontProgram(new FakeFontProgram());
      const second = resources.embedFontProgram(new FakeFontProgram());
      const other = resources.embedFontProgram(new FakeFontProgram({ postScriptName: "Other-Regular" }));

      expect(second).toBe(first);
      expect(other).not.toBe(first);
    });

    it("recognizes identical JPEG data", () => {
      const { resources } = setup();

      const first = resources.embedJpeg(buildJpeg({ width: 4, height: 4 }));
      const second = resources.embedJpeg(buildJpeg({ width: 4, height: 4 }));

      expect(second).toBe(first);
    });

    it("allocates nothing until a page uses the resource", () => {
      const { registry, resources } = setup();

      resources.standardFont("Helvetica");
      resources.embedJpeg(buildJpeg({ width: 4, height: 4 }));

      expect(registry.size).toBe(0);
    });
  });

  describe("refFor()", () => {
    it("allocates image streams right away", () => {
      const { registry, resources } = setup();
      const image = resources.embedJpeg(buildJpeg({ width: 4, height: 4 }));

      const ref = resources.refFor(image);

      expect(ref.objectNumber).toBe(1);
      expect(registry.getObject(ref)).toBe(image.stream);
    });

    it("reserves font refs until finalize", () => {
      const { registry, resources } = setup();
      const font = resources.standardFont("Helvetica");

      const ref = resources.refFor(font);

      expect(registry.has(ref)).toBe(false);
      expect(resources.refFor(font)).toBe(ref);
    });

    it("rejects fonts from another document", () => {
      const { resources } = setup();
      const foreign = setup().resources.standardFont("Helvetica");

      expect(() => resources.refFor(foreign)).toThrow(DocumentStateError);
      expect(() => resources.refFor(foreign)).toThrow("Font Helvetica belongs to another document");
    });
  });

  describe("finalize()", () => {
    it("writes every referenced font", () => {
      const { registry, resources } = setup();
      const font = resources.standardFont("Helvetica");
      const ref = resources.refFor(font);

      for (const glyph of glyphsForText(font, "Hi")) {
        resources.registerGlyph(font, glyph);
      }

      resources.finalize();

      expect(registry.has(ref)).toBe(true);
      expect(() => registry.assertComplete()).not.toThrow();
    });

    it("tags composite fonts in first-use order", () => {
      const { registry, resources } = setup();
      const first = resources.embedFontProgram(new FakeFontProgram({ postScriptName: "First-Regular" }));
      const second = resources.embedFontProgram(new FakeFontProgram({ postScriptName: "Second-Regular" }));

      resources.refFor(second);
      resources.refFor(first);
      resources.finalize();

      const baseFonts = [...registry.entries()]
        .map(([, obj]) => (obj.type === "dict" ? obj.getName("BaseFont")?.value : undefined))
        .filter(name => name !== undefined);

      expect(baseFonts).toContain("AAAAAA+Second-Regular");
      expect(baseFonts).toContain("AAAAAB+First-Regular");
    });

    it("skips fonts that were registered but never used", () => {
      const { registry, resources } = setup();

      resources.standardFont("Courier");
      resources.finalize();

      expect(registry.size).toBe(0);
    });

    it("rejects changes afterwards", () => {
      const { resources } = setup();
      const font = resources.standardFont("Helvetica");

      resources.finalize();

      expect(() => resources.standardFont("Courier")).toThrow(DocumentStateError);
      expect(() => resources.refFor(font)).toThrow(
        "Resources are finalized; the document no longer accepts changes",
      );
      expect(() => resources.registerGlyph(font, font.glyphFor(0x41))).toThrow(DocumentStateError);
    });

    it("runs once", () => {
      const { registry, resources } = setup();

      resources.refFor(resources.standardFont("Helvetica"));
      resources.finalize();

      const size = registry.size;

      resources.finalize();

      expect(registry.size).toBe(size);
    });
  });
});
