/**
 * Reading types exposed by the modem's diagnostic pages.
 * The names double as identifiers in logs, errors and the REST API.
 */
export const READING_TYPES = [
  'system_info',
  'link_status',
  'docsis_provisioning',
  'docsis_overview',
  'docsis_downstream',
  'docsis_downstream_ofdm',
  'docsis_upstream',
  'docsis_upstream_ofdm',
] as const;

export type ReadingType = (typeof READING_TYPES)[number];

export function isReadingType(value: string): value is ReadingType {
  return READING_TYPES.some((type) => type === value);
}

/**
 * The decoded records of one reading type together with their capture time.
 */
export interface Reading<T> {
  /** Wall-clock capture time in nanoseconds since the Unix epoch. */
  timestamp: bigint;
  data: T[];
}

/**
 * Result of decoding one payload. Records that failed to decode are left out
 * of `reading.data` and reported in `errors`; their siblings are kept.
 */
export interface DecodedReading<T> {
  reading: Reading<T>;
  errors: DecodeError[];
}

/**
 * A required field of one record could not be read.
 *
 * Carries enough of the raw input (reading type, record index, wire field
 * name and raw value) to spot a firmware change.
 */
export class DecodeError extends Error {
  constructor(
    public readonly readingType: ReadingType,
    public readonly recordIndex: number,
    public readonly field: string | null,
    public readonly rawValue: unknown,
    reason: string,
  ) {
    const location = field === null ? 'record' : `field "${field}"`;
    super(
      `[${readingType}] record ${recordIndex}: ${location} ${reason} (raw value: ${JSON.stringify(rawValue) ?? 'undefined'})`,
    );
    this.name = 'DecodeError';
  }
}

/**
 * The payload as a whole doesn't have the shape of any known reading
 * (e.g. an object where an array of records is expected).
 */
export class SchemaMismatchError extends Error {
  constructor(
    public readonly readingType: ReadingType,
    message: string,
    public readonly payload: unknown,
  ) {
    super(`[${readingType}] ${message}`);
    this.name = 'SchemaMismatchError';
  }
}

/**
 * Wall-clock "now" in nanoseconds since the Unix epoch.
 */
export function nowNanoseconds(): bigint {
  return BigInt(Date.now()) * 1_000_000n;
}
