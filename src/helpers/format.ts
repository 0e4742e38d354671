/**
 * PDF number formatting.
 */

/**
 * Format a number for PDF output.
 *
 * - Integers are written without decimal point
 * - Reals use at most 5 decimal places, trailing zeros stripped
 */
export function formatPdfNumber(value: number): string {
  if (Number.isInteger(value)) {
    return value.toString();
  }

  let str = value.toFixed(5);

  str = str.replace(/\.?0+$/, "");

  // toFixed on tiny values can leave "-0" or an empty string behind
  if (str === "" || str === "-" || str === "-0") {
    return "0";
  }

  return str;
}

/**
 * Format a 0-1 color component with exactly three decimals ("0.502").
 */
export function formatColorComponent(value: number): string {
  return value.toFixed(3);
}

/**
 * Format a date as a PDF date string in UTC: "D:YYYYMMDDHHmmSSZ".
 *
 * @example
 * ```ts
 * formatPdfDate(new Date(Date.UTC(2024, 0, 2, 3, 4, 5))) // "D:20240102030405Z"
 * ```
 */
export function formatPdfDate(date: Date): string {
  const pad = (value: number) => value.toString().padStart(2, "0");

  return (
    `D:${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}Z`
  );
}
