import type { NumberUnit } from './types.js';

export const CURRENCY_SYMBOL = '₹';
export const INSUFFICIENT_DATA = 'insufficient data';

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const rounded = Math.round((value + Number.EPSILON * Math.sign(value)) * factor) / factor;
  return Object.is(rounded, -0) ? 0 : rounded;
}

function grouped(value: number, decimals: number): string {
  return value.toLocaleString('en-US', {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  });
}

export function formatValue(value: number | null, unit: NumberUnit, decimals: number): string {
  if (value === null) return INSUFFICIENT_DATA;
  switch (unit) {
    case 'count':
      return grouped(value, 0);
    case 'currency':
      return value < 0
        ? `-${CURRENCY_SYMBOL}${grouped(Math.abs(value), decimals)}`
        : `${CURRENCY_SYMBOL}${grouped(value, decimals)}`;
    case 'percent':
      return `${value.toFixed(decimals)}%`;
    case 'number':
      return grouped(value, decimals);
  }
}

/** Like formatValue, but always prints the sign (used for differences). */
export function formatSigned(value: number | null, unit: NumberUnit, decimals: number): string {
  if (value === null) return INSUFFICIENT_DATA;
  const body = formatValue(Math.abs(value), unit, decimals);
  return value < 0 ? `-${body}` : `+${body}`;
}
