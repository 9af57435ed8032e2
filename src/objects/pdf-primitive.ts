import type { ByteWriter } from "#src/io/byte-writer";

/**
 * A PDF value that writes its own byte representation.
 */
export interface PdfPrimitive {
  /** Discriminator used by type guards and switch statements. */
  readonly type: string;

  /**
   * Write this value's PDF syntax. Called recursively for arrays,
   * dictionaries and streams.
   */
  toBytes(writer: ByteWriter): void;
}
