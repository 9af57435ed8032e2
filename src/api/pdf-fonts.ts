/**
 * PDFFonts - High-level API for fonts of a PDF document.
 *
 * Accessed via `pdf.fonts` on a PDF instance.
 *
 * @example
 * ```typescript
 * const pdf = PDF.create();
 *
 * const helvetica = pdf.fonts.standard("Helvetica");
 * const noto = pdf.fonts.embed(await fs.readFile("NotoSans-Regular.ttf"));
 *
 * pdf.addPage().drawText("Hello", { font: noto });
 * ```
 */

import type { CompositeFont } from "#src/fonts/composite-font";
import type { FontProgram } from "#src/fonts/font-program";
import type { SimpleFont } from "#src/fonts/simple-font";
import { availableStandardFonts } from "#src/fonts/standard-14";
import type { PDFContext } from "./pdf-context";

export class PDFFonts {
  private readonly ctx: PDFContext;

  constructor(ctx: PDFContext) {
    this.ctx = ctx;
  }

  /**
   * Get a standard font. Nothing is embedded; the same name returns the
   * same font.
   *
   * @throws {ConfigurationError} if the font's metrics are not bundled
   */
  standard(name: string): SimpleFont {
    this.ctx.assertOpen();

    return this.ctx.resources.standardFont(name);
  }

  /**
   * Embed a TrueType or OpenType font.
   *
   * Only the glyphs drawn with the font are written, as a subset, when the
   * document is finalized. Embedding the same bytes twice returns the same
   * font.
   *
   * @throws {FontError} if the data is not a usable font
   */
  embed(data: Uint8Array): CompositeFont {
    this.ctx.assertOpen();

    return this.ctx.resources.embedFont(data);
  }

  /**
   * Embed a font through a custom {@link FontProgram}.
   */
  embedProgram(program: FontProgram): CompositeFont {
    this.ctx.assertOpen();

    return this.ctx.resources.embedFontProgram(program);
  }

  /**
   * Names accepted by `standard()`.
   */
  get standardNames(): readonly string[] {
    return availableStandardFonts();
  }
}
