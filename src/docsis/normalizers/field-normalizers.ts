import { isIP } from 'node:net';

/**
 * Field Normalizers
 *
 * Pure conversions from the modem firmware's ad-hoc text encodings to typed
 * values. None of them throw: malformed or sentinel input degrades to the
 * documented default (false, 0, null or a zero duration).
 */

const TRUTHY_TOKENS = new Set([
  '1',
  'true',
  'yes',
  'y',
  'on',
  'success',
  'permitted',
  'enabled',
  'enable',
  // lock state on the OFDM pages
  'locked',
]);

const ABSENT_TOKENS = new Set(['', 'na', 'n/a']);

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Lease durations look like "D: 6 H: 23 M: 59 S: 12". Components the modem
 * doesn't know yet are reported as "-".
 */
const DURATION_PATTERN =
  /^D: (?<days>[0-9-]+) H: (?<hours>[0-9-]+) M: (?<minutes>[0-9-]+) S: (?<seconds>[0-9-]+)$/;

const MAC_PATTERNS = [
  /^([0-9a-f]{2})[:-]([0-9a-f]{2})[:-]([0-9a-f]{2})[:-]([0-9a-f]{2})[:-]([0-9a-f]{2})[:-]([0-9a-f]{2})$/i,
  /^([0-9a-f]{2})([0-9a-f]{2})\.([0-9a-f]{2})([0-9a-f]{2})\.([0-9a-f]{2})([0-9a-f]{2})$/i,
];

export const SECONDS_PER_MINUTE = 60;
export const SECONDS_PER_HOUR = 60 * SECONDS_PER_MINUTE;
export const SECONDS_PER_DAY = 24 * SECONDS_PER_HOUR;

export function toBool(raw: string): boolean {
  return TRUTHY_TOKENS.has(raw.toLowerCase());
}

/**
 * Returns null for "", "NA" and "N/A" (any case, surrounding whitespace
 * ignored). Any other value is returned untouched.
 */
export function toOptionalString(raw: string): string | null {
  if (ABSENT_TOKENS.has(raw.trim().toLowerCase())) {
    return null;
  }
  return raw;
}

export function toIntOrNone(raw: string): number | null {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number.parseInt(trimmed, 10);
  // "-0" parses to -0
  return value === 0 ? 0 : value;
}

export function toIntOrZero(raw: string): number {
  return toIntOrNone(raw) ?? 0;
}

export function toFloatOrNone(raw: string): number | null {
  const trimmed = raw.trim();
  if (!FLOAT_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number.parseFloat(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Evaluate a counter the firmware reports as an accumulation expression,
 * e.g. "1234 + 56 * 4294967296" after a 32-bit rollover.
 *
 * Tokens are whitespace separated: `N (op N)*` with op in {"+", "*"}.
 * Every N is read as a float and truncated before it is combined, and the
 * expression is folded strictly left to right ("10 + 5 * 2" is 30).
 * Integer tokens are taken digit for digit, so counters past 2^53 stay
 * exact. An unknown operator drops its operand. An unreadable number or a
 * dangling operator gives null.
 */
export function toBigInteger(raw: string): bigint | null {
  const tokens = raw.trim().split(/\s+/);
  const first = truncatedToken(tokens[0] ?? '');
  if (first === null) {
    return null;
  }

  let result = first;
  for (let i = 1; i < tokens.length; i += 2) {
    const operator = tokens[i];
    const operand = truncatedToken(tokens[i + 1] ?? '');
    if (operand === null) {
      return null;
    }
    if (operator === '+') {
      result += operand;
    } else if (operator === '*') {
      result *= operand;
    }
  }
  return result;
}

function truncatedToken(token: string): bigint | null {
  if (INTEGER_PATTERN.test(token)) {
    return BigInt(token);
  }
  const value = toFloatOrNone(token);
  return value === null ? null : BigInt(Math.trunc(value));
}

/**
 * Convert a lease duration ("D: 3 H: 2 M: 1 S: 0") to whole seconds.
 * A "-" component counts as zero; text that doesn't match the layout is a
 * zero duration.
 */
export function toDurationSeconds(raw: string): number {
  const match = DURATION_PATTERN.exec(raw);
  if (!match?.groups) {
    return 0;
  }
  const { days, hours, minutes, seconds } = match.groups;
  return (
    toIntOrZero(days) * SECONDS_PER_DAY +
    toIntOrZero(hours) * SECONDS_PER_HOUR +
    toIntOrZero(minutes) * SECONDS_PER_MINUTE +
    toIntOrZero(seconds)
  );
}

/**
 * Parse an IPv4 or IPv6 address. IPv6 text is lower-cased so equal
 * addresses compare equal.
 */
export function toIpAddress(raw: string): string | null {
  const trimmed = raw.trim();
  switch (isIP(trimmed)) {
    case 4:
      return trimmed;
    case 6:
      return trimmed.toLowerCase();
    default:
      return null;
  }
}

/**
 * Accepts "AA:BB:CC:DD:EE:FF", "AA-BB-CC-DD-EE-FF" and "aabb.ccdd.eeff",
 * returning the lower-case colon form.
 */
export function toMacAddress(raw: string): string | null {
  const trimmed = raw.trim();
  for (const pattern of MAC_PATTERNS) {
    const match = pattern.exec(trimmed);
    if (match) {
      return match.slice(1, 7).join(':').toLowerCase();
    }
  }
  return null;
}

export function toLinkStatusBool(raw: string): boolean {
  return raw.toLowerCase() === 'up';
}

export function toOptionalDashString(raw: string): string | null {
  return raw === '-' ? null : raw;
}
