import LineBreaker from "linebreak";

/**
 * A place where a line may (or must) end, per UAX #14.
 */
export interface BreakOpportunity {
  /** UTF-16 index where the next line would start */
  position: number;
  /** Mandatory break (after LF, CR, CRLF, NEL, LS, PS, VT, FF) */
  required: boolean;
}

const MANDATORY_BREAK_AT_END = /(?:\r\n|[\n\r\u000b\u000c\u0085\u2028\u2029])$/;

/**
 * Break opportunities of `text` in order. The last one is always at
 * `text.length`; empty text has none.
 */
export function findBreakOpportunities(text: string): BreakOpportunity[] {
  if (text.length === 0) {
    return [];
  }

  const breaker = new LineBreaker(text);
  const result: BreakOpportunity[] = [];

  let start = 0;
  let next = breaker.nextBreak();

  while (next) {
    const segment = text.slice(start, next.position);

    result.push({
      position: next.position,
      required: next.required || MANDATORY_BREAK_AT_END.test(segment),
    });

    start = next.position;
    next = breaker.nextBreak();
  }

  return result;
}

/**
 * Remove the mandatory break characters ending a segment.
 */
export function stripMandatoryBreak(segment: string): string {
  return segment.replace(MANDATORY_BREAK_AT_END, "");
}
