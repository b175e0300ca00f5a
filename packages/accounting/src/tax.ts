/**
 * Consumption tax arithmetic.
 *
 * Amounts are integer yen. Any non-zero tax code is taxed at 10%,
 * truncated toward zero.
 */

export const TAX_FREE_CODE = 0;

export function computeVat(amount: number, taxCode: number): number {
  if (taxCode === TAX_FREE_CODE) {
    return 0;
  }
  const vat = Math.trunc(amount / 10);
  return vat === 0 ? 0 : vat; // no -0
}

/** Sum of `amount + vat` over all lines. */
export function totalWithVat(lines: readonly { amount: number; vat: number }[]): number {
  return lines.reduce((sum, line) => sum + line.amount + line.vat, 0);
}
