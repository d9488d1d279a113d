/** Round a money amount to cents. */
export function roundMoney(amount: number): number {
  const rounded = Math.round((Math.abs(amount) + Number.EPSILON) * 100) / 100;
  return amount < 0 ? -rounded : rounded;
}

/** "$1,234.50", "-$20.00" */
export function formatMoney(amount: number): string {
  const text = Math.abs(amount).toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
  return amount < 0 ? `-$${text}` : `$${text}`;
}
