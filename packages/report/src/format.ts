// Detail-string number rendering. Report consumers paste these cells into a
// spreadsheet and compare them by eye, so the output must be stable.

/**
 * Integer rendering: truncate toward zero, no grouping separators.
 * `123.9` -> `"123"`, `-0.4` -> `"0"`.
 */
export function formatInteger(x: number): string {
  if (!Number.isFinite(x)) return String(x);
  return BigInt(Math.trunc(x)).toString();
}

/**
 * Fixed-point rendering with round-half-even, decided on the exact binary
 * value of `x`. Only a double whose expansion is exactly `...d5` at the first
 * dropped digit is a tie: `0.125` -> `"0.12"`, `0.375` -> `"0.38"`.
 * `0.455` is stored as 0.45500000000000001554..., so it rounds up to `"0.46"`.
 */
export function formatFixedHalfEven(x: number, digits = 2): string {
  if (!Number.isFinite(x) || Math.abs(x) >= 1e21) return String(x);

  // toFixed(100) is the exact expansion for any double in the range above
  // with a short enough binary fraction to be a tie at `digits`.
  const exact = Math.abs(x).toFixed(100);
  const dot = exact.indexOf(".");
  const intPart = exact.slice(0, dot);
  const frac = exact.slice(dot + 1);

  const kept = frac.slice(0, digits);
  const next = frac.charAt(digits);
  const rest = frac.slice(digits + 1);

  const isTie = next === "5" && /^0*$/.test(rest);
  if (!isTie) return x.toFixed(digits);

  const lastDigit = Number((intPart + kept).slice(-1));
  if (lastDigit % 2 === 1) {
    // toFixed resolves ties away from zero, which is the even neighbour here
    return x.toFixed(digits);
  }

  const sign = x < 0 ? "-" : "";
  return digits > 0 ? `${sign}${intPart}.${kept}` : `${sign}${intPart}`;
}

export function formatPercentFraction(x: number): string {
  return formatFixedHalfEven(x, 2);
}
