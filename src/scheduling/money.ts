// Amounts are carried as integer cents; NUMERIC(8,2) columns arrive as strings.
const DECIMAL = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;

export function toCents(value: string | number): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new RangeError(`Invalid amount: ${value}`);
    return Math.round(value * 100);
  }
  const match = DECIMAL.exec(value.trim());
  if (!match) throw new RangeError(`Invalid amount: ${value}`);
  const [, sign, whole, frac = ''] = match;
  const cents = Number(whole) * 100 + Number(frac.padEnd(2, '0'));
  return sign ? -cents : cents;
}

/** NUMERIC literal for a cents amount, e.g. 12345 -> "123.45". */
export function formatCents(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  return `${sign}${Math.floor(abs / 100)}.${String(abs % 100).padStart(2, '0')}`;
}

export function centsToAmount(cents: number): number {
  return cents / 100;
}

/** Integer division of non-negative operands, ties to even. */
export function divideHalfEven(numerator: number, denominator: number): number {
  const quotient = Math.floor(numerator / denominator);
  const twiceRemainder = 2 * (numerator - quotient * denominator);
  if (twiceRemainder > denominator) return quotient + 1;
  if (twiceRemainder < denominator) return quotient;
  return quotient % 2 === 0 ? quotient : quotient + 1;
}

/** `cents * percent / 100`, rounded half to even at the cent. */
export function percentOf(cents: number, percent: number): number {
  return divideHalfEven(cents * percent, 100);
}
