/**
 * @file User-facing rendering of stored float values
 *
 * - `|v| >= 1e9`: normalized scientific notation, at most 5 fractional
 *   digits, trailing zeros and a dangling point stripped, exponent with a
 *   sign and at least two digits (`1.5e+09`).
 * - otherwise fixed point: one decimal when `v` is integral, else two.
 *   Exact ties round half to even, like printf (`1.125` → `1.12`), and `-0`
 *   keeps its sign.
 */

const SCIENTIFIC_THRESHOLD = 1e9;

function stripFraction(mantissa: string): string {
  if (!mantissa.includes(".")) {
    return mantissa;
  }
  return mantissa.replace(/0+$/, "").replace(/\.$/, "");
}

function padExponent(exponent: string): string {
  const sign = exponent.startsWith("-") ? "-" : "+";
  const digits = exponent.replace(/^[+-]/, "");
  return `${sign}${digits.padStart(2, "0")}`;
}

/**
 * Two-decimal rendering. `toFixed` rounds exact ties away from zero, so those
 * are resolved here. A value sits exactly halfway between two hundredths only
 * when it is an odd multiple of 1/8.
 */
function fixed2(v: number): string {
  const eighths = Math.abs(v) * 8;
  if (!Number.isInteger(eighths) || eighths % 2 === 0) {
    return v.toFixed(2);
  }
  // |v| * 100 === 12.5 * eighths, which lies halfway between `lower` and `lower + 1`
  const lower = (25 * eighths - 1) / 2;
  const cents = lower % 2 === 0 ? lower : lower + 1;
  const sign = v < 0 ? "-" : "";
  return `${sign}${Math.floor(cents / 100)}.${String(cents % 100).padStart(2, "0")}`;
}

/** Render one value for display. */
export function formatValue(v: number): string {
  if (Number.isNaN(v)) {
    return "nan";
  }
  if (!Number.isFinite(v)) {
    return v > 0 ? "inf" : "-inf";
  }
  if (Math.abs(v) >= SCIENTIFIC_THRESHOLD) {
    const [mantissa, exponent] = v.toExponential(5).split("e");
    return `${stripFraction(mantissa)}e${padExponent(exponent)}`;
  }
  if (Object.is(v, -0)) {
    return "-0.0";
  }
  return v === Math.trunc(v) ? v.toFixed(1) : fixed2(v);
}
