/**
 * Money is held as integer cents inside the process so totals never drift.
 */

export function toCents(amount: string | number): number {
  const value = typeof amount === 'number' ? amount : parseFloat(amount);
  return Math.round(value * 100);
}

/** 4598 -> "45.98" (the decimal form Postgres numeric columns take) */
export function fromCents(cents: number): string {
  return (cents / 100).toFixed(2);
}

/** 4598 -> "$45.98" */
export function formatMoney(cents: number): string {
  return `$${fromCents(cents)}`;
}
