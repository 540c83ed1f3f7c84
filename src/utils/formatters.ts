import type { ValueFormatter } from '../types';

const thousands = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

export const formatMinutes: ValueFormatter = (value) => `${thousands.format(value)}m`;

export const formatDuration: ValueFormatter = (value) => `${thousands.format(value)}s`;

export const FORMATTERS = {
  minutes: formatMinutes,
  duration: formatDuration,
} as const satisfies Record<string, ValueFormatter>;

export type FormatterName = keyof typeof FORMATTERS;

const namesByFormatter = new Map<ValueFormatter, FormatterName>([
  [FORMATTERS.minutes, 'minutes'],
  [FORMATTERS.duration, 'duration'],
]);

export function formatterName(formatter: ValueFormatter): FormatterName | undefined {
  return namesByFormatter.get(formatter);
}

export function formatCell(value: unknown, formatter?: ValueFormatter): string {
  if (value === null || value === undefined) return '';
  if (formatter && typeof value === 'number') return formatter(value);
  return String(value);
}
