/**
 * printf-style column helpers used by the report renderer.
 */

/**
 * Left-justify in a column of `width`, truncating to `width` (like %-W.Ws).
 * Width counts code points, not bytes: a non-ASCII field keeps `width`
 * characters where a byte-counting formatter would cut it shorter.
 */
export function fitColumn(value: string, width: number): string {
  const chars = Array.from(value).slice(0, width);
  return chars.join('') + ' '.repeat(width - chars.length);
}

/**
 * Left-justify without truncating (like %-Ws)
 */
export function padColumn(value: string, width: number): string {
  return value.padEnd(width);
}

/**
 * Zero-pad an integer to `width` characters, sign included (like %0Wd)
 */
export function zeroPad(value: number, width: number): string {
  return zeroPadDigits(Math.trunc(value).toString(), width);
}

/**
 * Fixed-point with zero padding to `width` characters (like %0W.Pf)
 */
export function formatFixed(value: number, width: number, precision: number): string {
  return zeroPadDigits(value.toFixed(precision), width);
}

function zeroPadDigits(text: string, width: number): string {
  if (text.startsWith('-')) {
    return '-' + text.slice(1).padStart(width - 1, '0');
  }
  return text.padStart(width, '0');
}
