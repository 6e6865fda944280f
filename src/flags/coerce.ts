/**
 * Token coercion for value-bearing flags. Each function returns `undefined` when the
 * token is rejected; the parser turns that into the matching error kind.
 */

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

/** Smallest positive normal double; anything non-zero below it is an underflow. */
const DBL_MIN = 2.2250738585072014e-308;

// space, tab, newline, vertical tab, form feed, carriage return
const LEADING_SPACE = /^[ \t\n\v\f\r]*/;
const INT_RE = /^[+-]?\d+$/;
const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_RE = /^([+-]?)(inf|infinity|nan)$/i;

function stripLeadingSpace(token: string): string {
  return token.replace(LEADING_SPACE, '');
}

/** Exactly one Unicode code point. */
export function coerceChar(token: string): string | undefined {
  return Array.from(token).length === 1 ? token : undefined;
}

/**
 * Base-10 signed integer that fits in 32 bits. The whole token must be digits after an
 * optional sign; leading whitespace is allowed.
 */
export function coerceInt(token: string): number | undefined {
  const body = stripLeadingSpace(token);
  if (!INT_RE.test(body)) return undefined;
  const n = Number(body);
  if (n < INT32_MIN || n > INT32_MAX) return undefined;
  // normalizes -0
  return n | 0;
}

/**
 * Decimal floating point number, or `inf` / `infinity` / `nan` in any case.
 * Results that overflow to infinity or underflow below the normal range are rejected.
 */
export function coerceDouble(token: string): number | undefined {
  const body = stripLeadingSpace(token);

  const special = SPECIAL_RE.exec(body);
  if (special) {
    const negative = special[1] === '-';
    if (special[2].toLowerCase() === 'nan') return NaN;
    return negative ? -Infinity : Infinity;
  }

  const m = DECIMAL_RE.exec(body);
  if (!m) return undefined;

  const n = Number(body);
  if (!Number.isFinite(n)) return undefined;

  const mantissaIsZero = !/[1-9]/.test(m[1]);
  if (!mantissaIsZero && Math.abs(n) < DBL_MIN) return undefined;
  return n;
}
