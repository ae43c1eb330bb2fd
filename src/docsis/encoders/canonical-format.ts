import {
  SECONDS_PER_DAY,
  SECONDS_PER_HOUR,
  SECONDS_PER_MINUTE,
} from '../normalizers/field-normalizers';

/**
 * Canonical wire text for normalized values.
 *
 * Each formatter is the inverse of its normalizer for every value the
 * normalizer can produce, so decoding the formatted text gives the same
 * value back.
 */

export function formatBool(value: boolean): string {
  return value ? 'true' : 'false';
}

export function formatLinkStatus(value: boolean): string {
  return value ? 'Up' : 'Down';
}

export function formatNumber(value: number | bigint | null): string {
  return value === null ? '' : String(value);
}

export function formatOptionalString(value: string | null): string {
  return value ?? '';
}

export function formatOptionalDashString(value: string | null): string {
  return value ?? '-';
}

export function formatDuration(totalSeconds: number): string {
  const days = Math.trunc(totalSeconds / SECONDS_PER_DAY);
  let rest = totalSeconds % SECONDS_PER_DAY;
  const hours = Math.trunc(rest / SECONDS_PER_HOUR);
  rest %= SECONDS_PER_HOUR;
  const minutes = Math.trunc(rest / SECONDS_PER_MINUTE);
  const seconds = rest % SECONDS_PER_MINUTE;
  return `D: ${days} H: ${hours} M: ${minutes} S: ${seconds}`;
}
