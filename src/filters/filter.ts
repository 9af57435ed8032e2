/**
 * A stream encoder registered under its PDF filter name.
 *
 * The name is what ends up in the stream's `/Filter` entry, so readers
 * decode the data with the matching PDF filter.
 */
export interface Filter {
  /** PDF filter name, e.g. "FlateDecode" */
  readonly name: string;

  encode(data: Uint8Array): Promise<Uint8Array>;
}

/**
 * Fully encoded stream data with the name of the filter that produced it.
 */
export interface EncodedData {
  data: Uint8Array;
  filter: string;
}
