/**
 * PDF formatting utilities.
 */

/**
 * Format a number for PDF output.
 *
 * - Integers are written without decimal point
 * - Reals use minimal precision (no trailing zeros)
 * - PDF spec recommends up to 5 decimal places
 */
export function formatPdfNumber(value: number): string {
  if (Number.isInteger(value)) {
    return value.toString();
  }

  // Use fixed precision, then strip trailing zeros
  let str = value.toFixed(5);

  if (str.includes(".")) {
    str = str.replace(/\.?0+$/, "");
  }

  // toFixed can produce "-0" for tiny negatives
  if (str === "" || str === "-0") {
    return "0";
  }

  return str;
}

/**
 * Format a date as a PDF date string: `D:YYYYMMDDHHmmSS+HH'mm'`.
 *
 * The local offset of the date's environment is used unless `offsetMinutes`
 * is given (east of UTC is positive).
 */
export function formatPdfDate(date: Date, offsetMinutes = -date.getTimezoneOffset()): string {
  const shifted = new Date(date.getTime() + offsetMinutes * 60_000);
  const pad = (n: number, width = 2) => n.toString().padStart(width, "0");

  const stamp =
    pad(shifted.getUTCFullYear(), 4) +
    pad(shifted.getUTCMonth() + 1) +
    pad(shifted.getUTCDate()) +
    pad(shifted.getUTCHours()) +
    pad(shifted.getUTCMinutes()) +
    pad(shifted.getUTCSeconds());

  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);

  return `D:${stamp}${sign}${pad(Math.floor(abs / 60))}'${pad(abs % 60)}'`;
}
