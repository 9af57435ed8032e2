/**
 * Fonts and images of one document.
 *
 * Resources are deduplicated on registration (standard fonts by name,
 * embedded fonts and images by content hash) and only receive a ref when a
 * page first uses them. Fonts are written last, in `finalize()`, once every
 * glyph they need is known.
 */

import { sha256 } from "@noble/hashes/sha2.js";

import { bytesToHex } from "#src/helpers/buffer";
import type { Logger } from "#src/helpers/logger";
import { CompositeFont } from "#src/fonts/composite-font";
import { type FinalizedFont, finalizeCompositeFont, finalizeSimpleFont } from "#src/fonts/font-finalizer";
import type { FontProgram } from "#src/fonts/font-program";
import { FontkitProgram } from "#src/fonts/fontkit-program";
import type { Glyph, PdfFont } from "#src/fonts/pdf-font";
import { SimpleFont } from "#src/fonts/simple-font";
import { subsetTag } from "#src/fonts/subset-tag";
import { PDFImage } from "#src/images/pdf-image";
import type { PdfRef } from "#src/objects/pdf-ref";
import { DocumentStateError } from "./errors";
import type { ObjectRegistry } from "./object-registry";

export type Resource = PdfFont | PDFImage;

function contentKey(data: Uint8Array): string {
  return bytesToHex(sha256(data));
}

export class ResourceManager {
  private readonly fonts = new Map<string, PdfFont>();
  private readonly images = new Map<string, PDFImage>();
  private readonly owned = new Set<PdfFont>();

  /** Refs handed out to pages, in first-use order */
  private readonly refs = new Map<Resource, PdfRef>();

  private compositeCount = 0;
  private finalized = false;

  constructor(
    private readonly registry: ObjectRegistry,
    private readonly logger: Logger,
  ) {}

  /**
   * Get the standard font with the given name.
   *
   * @throws {ConfigurationError} if its metrics are not bundled
   */
  standardFont(name: string): SimpleFont {
    const key = `standard:${name}`;
    const existing = this.fonts.get(key);

    if (existing?.kind === "simple") {
      return existing;
    }

    return this.addFont(key, SimpleFont.of(name));
  }

  /**
   * Embed a TrueType/OpenType font file. Embedding the same bytes again
   * returns the same font.
   *
   * @throws {FontError} if the data cannot be parsed
   */
  embedFont(data: Uint8Array): CompositeFont {
    const key = `embedded:${contentKey(data)}`;
    const existing = this.fonts.get(key);

    if (existing?.kind === "composite") {
      return existing;
    }

    return this.addFont(key, new CompositeFont(FontkitProgram.fromBytes(data)));
  }

  /**
   * Embed an already parsed font program, deduplicated by its data.
   */
  embedFontProgram(program: FontProgram): CompositeFont {
    const key = `embedded:${contentKey(program.data)}`;
    const existing = this.fonts.get(key);

    if (existing?.kind === "composite") {
      return existing;
    }

    return this.addFont(key, new CompositeFont(program));
  }

  /**
   * Register a JPEG image. The same bytes return the same image.
   *
   * @throws {InvalidImageError} if the data is not a readable JPEG
   */
  embedJpeg(data: Uint8Array): PDFImage {
    const key = contentKey(data);
    const existing = this.images.get(key);

    if (existing) {
      return existing;
    }

    const image = PDFImage.fromJpeg(data);

    this.images.set(key, image);

    return image;
  }

  /**
   * Ref a page should use for a resource, created on first request.
   *
   * Font refs are reserved and filled by `finalize()`; image streams are
   * complete and allocated right away.
   */
  refFor(resource: Resource): PdfRef {
    const existing = this.refs.get(resource);

    if (existing) {
      return existing;
    }

    this.assertOpen();

    let ref: PdfRef;

    if (resource instanceof PDFImage) {
      ref = this.registry.allocate(resource.stream);
    } else {
      if (!this.owned.has(resource)) {
        throw new DocumentStateError(`Font ${resource.baseFontName} belongs to another document`);
      }

      ref = this.registry.reserve();
    }

    this.refs.set(resource, ref);

    return ref;
  }

  /**
   * Record that a glyph was drawn with a font. Returns the code to write
   * in the content stream. Registering a glyph twice has no further effect.
   */
  registerGlyph(font: PdfFont, glyph: Glyph): number {
    this.assertOpen();

    return font.useGlyph(glyph);
  }

  /**
   * Write the objects of one font into its reserved ref.
   */
  finalizeFont(font: PdfFont): FinalizedFont {
    const ref = this.refFor(font);

    switch (font.kind) {
      case "simple":
        return finalizeSimpleFont(font, ref, this.registry);
      case "composite":
        return finalizeCompositeFont(font, ref, this.registry, subsetTag(this.compositeCount++));
    }
  }

  /**
   * Finalize every font a page referenced, in first-use order.
   * Runs once; later calls do nothing.
   */
  finalize(): void {
    if (this.finalized) {
      return;
    }

    for (const resource of this.refs.keys()) {
      if (resource instanceof PDFImage) {
        continue;
      }

      const result = this.finalizeFont(resource);

      this.logger.debug(
        { font: resource.baseFontName, kind: resource.kind, ref: result.font.toString(), glyphs: result.glyphCount },
        "Finalized font",
      );
    }

    this.finalized = true;
  }

  private addFont<T extends PdfFont>(key: string, font: T): T {
    this.assertOpen();
    this.fonts.set(key, font);
    this.owned.add(font);

    return font;
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new DocumentStateError("Resources are finalized; the document no longer accepts changes");
    }
  }
}
