import { describe, expect, it } from "vitest";
import { ObjectRegistry } from "#src/document/object-registry";
import { PdfDict } from "#src/objects/pdf-dict";
import { serialize } from "#src/test-utils";
import { PDFPageTree } from "./pdf-page-tree";

describe("PDFPageTree", () => {
  it("starts empty", () => {
    const registry = new ObjectRegistry();
    const tree = new PDFPageTree(registry.reserve());

    expect(tree.count).toBe(0);
    expect(tree.getPages()).toEqual([]);
  });

  it("keeps pages in the order they were added", () => {
    const registry = new ObjectRegistry();
    const tree = new PDFPageTree(registry.reserve());
    const first = registry.reserve();
    const second = registry.reserve();

    tree.addPage(first);
    tree.addPage(second);

    expect(tree.count).toBe(2);
    expect(tree.getPages()).toEqual([first, second]);
  });

  it("writes the /Pages node into its reserved ref", () => {
    const registry = new ObjectRegistry();
    const tree = new PDFPageTree(registry.reserve());

    tree.addPage(registry.reserve());
    tree.addPage(registry.reserve());
    tree.finalize(registry);

    const node = registry.getObject(tree.ref);

    expect(node).toBeInstanceOf(PdfDict);

    if (node instanceof PdfDict) {
      expect(serialize(node)).toBe("<<\n/Type /Pages\n/Kids [2 0 R 3 0 R]\n/Count 2\n>>");
    }
  });

  it("writes an empty tree with a zero count", () => {
    const registry = new ObjectRegistry();
    const tree = new PDFPageTree(registry.reserve());

    tree.finalize(registry);

    const node = registry.getObject(tree.ref);

    expect(node instanceof PdfDict && serialize(node)).toBe("<<\n/Type /Pages\n/Kids []\n/Count 0\n>>");
  });

  it("ignores pages added after finalizing", () => {
    const registry = new ObjectRegistry();
    const tree = new PDFPageTree(registry.reserve());

    tree.finalize(registry);
    tree.addPage(registry.reserve());
    tree.finalize(registry);

    const node = registry.getObject(tree.ref);

    expect(node instanceof PdfDict && serialize(node)).toBe("<<\n/Type /Pages\n/Kids []\n/Count 0\n>>");
  });
});
