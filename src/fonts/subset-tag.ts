/**
 * Six-letter tag that prefixes the name of a subset font, e.g. "AAAAAB+Roboto".
 *
 * Tags come from a per-document counter: the counter's six decimal digits
 * are shifted to the letters A-J, so tags are unique within a document and
 * stable across runs.
 *
 * @example
 * ```ts
 * subsetTag(0) // "AAAAAA"
 * subsetTag(123456) // "BCDEFG"
 * ```
 */
export function subsetTag(index: number): string {
  const digits = (index % 1_000_000).toString().padStart(6, "0");

  let tag = "";

  for (const digit of digits) {
    tag += String.fromCharCode(digit.charCodeAt(0) + 17);
  }

  return tag;
}
