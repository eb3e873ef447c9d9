import { InputValidationError } from './errors';

const AMOUNT_RE = /^\d+(\.\d{1,2})?$/;

/** Parses a dollar amount such as "39.98" or "$20" into integer cents. */
export function parseMoney(input: string): number {
  const cleaned = input.trim().replace(/^\$/, '');
  if (!AMOUNT_RE.test(cleaned)) {
    throw new InputValidationError(`Invalid amount: "${input}"`, 'amount');
  }
  const [whole = '0', fraction = ''] = cleaned.split('.');
  return Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
}

export function formatMoney(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const dollars = Math.floor(abs / 100);
  const rest = String(abs % 100).padStart(2, '0');
  return `${sign}$${dollars}.${rest}`;
}

/** Plain decimal form used in CSV columns ("39.98"). */
export function toDecimal(cents: number): string {
  return formatMoney(cents).replace('$', '');
}

export function percentOf(cents: number, percent: number): number {
  return Math.round((cents * percent) / 100);
}
