/**
 * Flow lines down a column, starting new pages as it fills.
 *
 * Pagination only moves forward: once a line has gone to a later page,
 * nothing is placed on an earlier one.
 */

import { LayoutError } from "./errors";
import { EPSILON, type TextLine } from "./text-layout";

export interface PaginationOptions {
  /** Distance between consecutive baselines in points */
  lineHeight: number;
  /** Distance from the top of a line box to its baseline in points */
  ascent: number;
  /** Top of the content box */
  top: number;
  /** Bottom of the content box */
  bottom: number;
  /** Top of the free space on the first page; defaults to `top` */
  cursor?: number;
}

/**
 * A line with its page and baseline.
 */
export interface PlacedLine {
  /** 0 for the page the text starts on, 1 for the next, ... */
  page: number;
  baseline: number;
  line: TextLine;
}

export interface Pagination {
  placements: PlacedLine[];
  /** Number of pages after the first that were started */
  pagesAdded: number;
  /** Top of the free space left on the last page */
  cursor: number;
}

/**
 * @throws {LayoutError} if one line is taller than an empty page
 */
export function paginate(lines: readonly TextLine[], options: PaginationOptions): Pagination {
  const { lineHeight, ascent, top, bottom } = options;

  if (lines.length > 0 && lineHeight > top - bottom + EPSILON) {
    throw new LayoutError(`Line height ${lineHeight}pt exceeds the content box height ${top - bottom}pt`);
  }

  const placements: PlacedLine[] = [];
  let page = 0;
  let cursor = options.cursor ?? top;

  for (const line of lines) {
    if (cursor - lineHeight < bottom - EPSILON) {
      page++;
      cursor = top;
    }

    placements.push({ page, baseline: cursor - ascent, line });
    cursor -= lineHeight;
  }

  return { placements, pagesAdded: page, cursor };
}
