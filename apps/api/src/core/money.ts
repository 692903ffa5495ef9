const DECIMAL_AMOUNT = /^(\d+)(?:\.(\d*))?$/;

/**
 * Parses a decimal amount ("450", "450.5", "450.00") into minor units.
 * Digits past the second decimal place round half-up. Returns null when the
 * value is absent or not a plain non-negative decimal.
 */
export function toMinorUnits(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const text = typeof value === "number" ? String(value) : value.trim();
  const match = DECIMAL_AMOUNT.exec(text);
  if (!match) return null;

  const whole = Number(match[1]);
  const fraction = (match[2] ?? "").padEnd(3, "0");
  let minor = whole * 100 + Number(fraction.slice(0, 2));
  if (Number(fraction[2]) >= 5) {
    minor += 1;
  }
  return Number.isSafeInteger(minor) ? minor : null;
}

export function formatMinorUnits(minor: number): string {
  const sign = minor < 0 ? "-" : "";
  const absolute = Math.abs(Math.round(minor));
  const whole = Math.floor(absolute / 100);
  const cents = String(absolute % 100).padStart(2, "0");
  return `${sign}${whole}.${cents}`;
}
