/**
 * Epoch-offset arithmetic for the engine's temporal types
 * All offsets count from 2000-01-01T00:00:00Z
 */
export const EPOCH_MS = Date.UTC(2000, 0, 1);
export const MS_PER_DAY = 86_400_000;
export const NS_PER_MS = 1_000_000n;
export const NS_PER_SECOND = 1_000_000_000n;
export const NS_PER_DAY = 86_400n * NS_PER_SECOND;

export function pad(value: number | bigint, width: number): string {
  return value.toString().padStart(width, '0');
}

/**
 * Floor division for bigint (the native operator truncates toward zero)
 */
function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b;
  return a % b !== 0n && (a < 0n) !== (b < 0n) ? q - 1n : q;
}

export interface CivilDate {
  year: number;
  month: number; // 1-12
  day: number;
}

export function daysToCivil(days: number): CivilDate {
  const date = new Date(EPOCH_MS + days * MS_PER_DAY);
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  };
}

export function civilToDays(year: number, month: number, day: number): number {
  return Math.round((Date.UTC(year, month - 1, day) - EPOCH_MS) / MS_PER_DAY);
}

export function formatCivil(days: number, separator: string): string {
  const { year, month, day } = daysToCivil(days);
  return `${pad(year, 4)}${separator}${pad(month, 2)}${separator}${pad(day, 2)}`;
}

/**
 * hh:mm, hh:mm:ss or hh:mm:ss.fff depending on the requested precision
 */
export function formatClock(totalMs: number, precision: 'minute' | 'second' | 'millis'): string {
  const sign = totalMs < 0 ? '-' : '';
  const abs = Math.abs(totalMs);
  const hours = Math.floor(abs / 3_600_000);
  const minutes = Math.floor((abs % 3_600_000) / 60_000);
  const seconds = Math.floor((abs % 60_000) / 1000);
  const millis = abs % 1000;

  let text = `${sign}${pad(hours, 2)}:${pad(minutes, 2)}`;
  if (precision !== 'minute') {
    text += `:${pad(seconds, 2)}`;
  }
  if (precision === 'millis') {
    text += `.${pad(millis, 3)}`;
  }
  return text;
}

/**
 * Parse hh:mm[:ss[.fraction]] into milliseconds, truncating below a millisecond
 */
export function parseClock(text: string): number {
  const [clock, fraction = ''] = text.split('.');
  const [hours = '0', minutes = '0', seconds = '0'] = clock.split(':');
  const millis = fraction ? parseInt(fraction.slice(0, 3).padEnd(3, '0'), 10) : 0;
  return ((parseInt(hours, 10) * 60 + parseInt(minutes, 10)) * 60 + parseInt(seconds, 10)) * 1000 + millis;
}

/**
 * Parse hh:mm:ss.nnnnnnnnn into nanoseconds
 */
export function parseClockNanos(text: string): bigint {
  const [clock, fraction = ''] = text.split('.');
  const [hours = '0', minutes = '0', seconds = '0'] = clock.split(':');
  const nanos = fraction ? BigInt(fraction.slice(0, 9).padEnd(9, '0')) : 0n;
  const wholeSeconds = (BigInt(hours) * 60n + BigInt(minutes)) * 60n + BigInt(seconds);
  return wholeSeconds * NS_PER_SECOND + nanos;
}

export function formatClockNanos(nanos: bigint): string {
  const hours = nanos / (3600n * NS_PER_SECOND);
  const minutes = (nanos / (60n * NS_PER_SECOND)) % 60n;
  const seconds = (nanos / NS_PER_SECOND) % 60n;
  const fraction = nanos % NS_PER_SECOND;
  return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(fraction, 9)}`;
}

/**
 * Split a nanosecond offset into whole days and the nanoseconds into that day
 */
export function splitNanos(nanos: bigint): { days: number; nanosOfDay: bigint } {
  const days = floorDiv(nanos, NS_PER_DAY);
  return { days: Number(days), nanosOfDay: nanos - days * NS_PER_DAY };
}

export function monthsToCivil(months: number): { year: number; month: number } {
  const year = 2000 + Math.floor(months / 12);
  const month = (((months % 12) + 12) % 12) + 1;
  return { year, month };
}
