/**
 * `inf`, `-inf` or `nan` for non-finite numbers, `undefined` otherwise.
 */
export function nonFiniteName(n: number): string | undefined {
  if (Number.isNaN(n)) return 'nan';
  if (n === Infinity) return 'inf';
  if (n === -Infinity) return '-inf';
  return undefined;
}

/**
 * Fixed-point text with `digits` decimals, without switching to exponent notation
 * for large magnitudes. Non-finite values print as `inf`, `-inf` or `nan`.
 */
export function formatFixed(n: number, digits: number): string {
  const special = nonFiniteName(n);
  if (special !== undefined) return special;
  // toFixed goes exponential from 1e21 up; such doubles are whole numbers
  if (Math.abs(n) >= 1e21) return `${BigInt(n).toString()}${digits > 0 ? '.' + '0'.repeat(digits) : ''}`;
  return n.toFixed(digits);
}

/**
 * JSON-safe form of a double: non-finite values become their names, since
 * `JSON.stringify` would write `null`.
 */
export function doubleToJson(n: number): number | string {
  return nonFiniteName(n) ?? n;
}
