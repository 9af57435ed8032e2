import { ASCIIHexFilter } from "./ascii-hex-filter";
import type { EncodedData, Filter } from "./filter";
import { FlateFilter } from "./flate-filter";

/**
 * Registry of stream encoders, keyed by PDF filter name.
 *
 * Built-in filters are registered when this module loads; the set is not
 * expected to change afterwards.
 *
 * @example
 * ```typescript
 * const { data, filter } = await FilterPipeline.encode(bytes, "FlateDecode");
 * stream.set("Filter", PdfName.of(filter));
 * ```
 */
export class FilterPipeline {
  private static filters = new Map<string, Filter>();

  /**
   * Register a filter implementation.
   */
  static register(filter: Filter): void {
    FilterPipeline.filters.set(filter.name, filter);
  }

  static hasFilter(name: string): boolean {
    return FilterPipeline.filters.has(name);
  }

  /**
   * Encode data with a registered filter.
   *
   * @throws {Error} if the filter is not registered
   */
  static async encode(data: Uint8Array, name: string): Promise<EncodedData> {
    const filter = FilterPipeline.filters.get(name);

    if (!filter) {
      throw new Error(`Unknown filter: ${name}`);
    }

    return { data: await filter.encode(data), filter: filter.name };
  }
}

FilterPipeline.register(new FlateFilter());
FilterPipeline.register(new ASCIIHexFilter());
