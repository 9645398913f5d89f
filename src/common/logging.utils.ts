/**
 * Truncate data for logging to avoid huge log entries
 * 64-bit values are written as decimal text
 */
const DEFAULT_TRUNCATE_LENGTH = 100;

function replaceBigInt(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function truncateForLog(data: unknown, maxLength: number = DEFAULT_TRUNCATE_LENGTH): string {
  const str = typeof data === 'string' ? data : (JSON.stringify(data, replaceBigInt) ?? String(data));
  if (str.length <= maxLength) {
    return str;
  }
  return str.substring(0, maxLength) + '...';
}
