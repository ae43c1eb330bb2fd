import { z } from 'zod';
import {
  DecodeError,
  DecodedReading,
  ReadingType,
  SchemaMismatchError,
} from '../interfaces/reading.interface';
import {
  docsisOverviewSchema,
  docsisProvisioningSchema,
  downstreamChannelSchema,
  downstreamOfdmChannelSchema,
  linkStatusSchema,
  systemInfoSchema,
  upstreamChannelSchema,
  upstreamOfdmChannelSchema,
} from '../schemas/reading-schemas';
import {
  DocsisOverviewRecord,
  DocsisProvisioningRecord,
  DownstreamChannel,
  DownstreamOfdmChannel,
  LinkStatusRecord,
  SystemInfoRecord,
  UpstreamChannel,
  UpstreamOfdmChannel,
} from '../dto/channel-records.dto';

/**
 * Schema of a single record: takes raw JSON, yields the typed record.
 */
export type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const payloadSchema = z.array(z.unknown());

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode one reading type's payload into typed records.
 *
 * The payload must be a JSON array, otherwise a SchemaMismatchError is
 * thrown. Each element is decoded on its own: an element that fails ends up
 * in `errors` and the rest are still returned, in source order.
 */
export function decodeReading<T>(
  readingType: ReadingType,
  schema: RecordSchema<T>,
  payload: unknown,
  timestamp: bigint,
): DecodedReading<T> {
  const envelope = payloadSchema.safeParse(payload);
  if (!envelope.success) {
    throw new SchemaMismatchError(
      readingType,
      `Expected an array of records, got ${describeJsonType(payload)}`,
      payload,
    );
  }

  const data: T[] = [];
  const errors: DecodeError[] = [];

  envelope.data.forEach((raw, index) => {
    const result = schema.safeParse(raw);
    if (result.success) {
      data.push(result.data);
    } else {
      errors.push(toDecodeError(readingType, index, raw, result.error));
    }
  });

  return { reading: { timestamp, data }, errors };
}

function toDecodeError(
  readingType: ReadingType,
  index: number,
  raw: unknown,
  error: z.ZodError,
): DecodeError {
  if (!isRecord(raw)) {
    return new DecodeError(
      readingType,
      index,
      null,
      raw,
      `is ${describeJsonType(raw)}, expected an object`,
    );
  }

  const issue = error.issues[0];
  const field = typeof issue?.path[0] === 'string' ? issue.path[0] : null;
  if (field === null) {
    return new DecodeError(
      readingType,
      index,
      null,
      raw,
      issue?.message ?? 'is invalid',
    );
  }
  if (!(field in raw)) {
    return new DecodeError(readingType, index, field, undefined, 'is missing');
  }
  const rawValue = raw[field];
  const reason =
    issue?.code === z.ZodIssueCode.custom
      ? issue.message
      : 'has an unsupported type';
  return new DecodeError(readingType, index, field, rawValue, reason);
}

function describeJsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value === 'object' ? 'an object' : `a ${typeof value}`;
}

export function decodeSystemInfo(
  payload: unknown,
  timestamp: bigint,
): DecodedReading<SystemInfoRecord> {
  return decodeReading('system_info', systemInfoSchema, payload, timestamp);
}

export function decodeLinkStatus(
  payload: unknown,
  timestamp: bigint,
): DecodedReading<LinkStatusRecord> {
  return decodeReading('link_status', linkStatusSchema, payload, timestamp);
}

export function decodeDocsisProvisioning(
  payload: unknown,
  timestamp: bigint,
): DecodedReading<DocsisProvisioningRecord> {
  return decodeReading(
    'docsis_provisioning',
    docsisProvisioningSchema,
    payload,
    timestamp,
  );
}

export function decodeDocsisOverview(
  payload: unknown,
  timestamp: bigint,
): DecodedReading<DocsisOverviewRecord> {
  return decodeReading(
    'docsis_overview',
    docsisOverviewSchema,
    payload,
    timestamp,
  );
}

export function decodeDownstream(
  payload: unknown,
  timestamp: bigint,
): DecodedReading<DownstreamChannel> {
  return decodeReading(
    'docsis_downstream',
    downstreamChannelSchema,
    payload,
    timestamp,
  );
}

export function decodeDownstreamOfdm(
  payload: unknown,
  timestamp: bigint,
): DecodedReading<DownstreamOfdmChannel> {
  return decodeReading(
    'docsis_downstream_ofdm',
    downstreamOfdmChannelSchema,
    payload,
    timestamp,
  );
}

export function decodeUpstream(
  payload: unknown,
  timestamp: bigint,
): DecodedReading<UpstreamChannel> {
  return decodeReading(
    'docsis_upstream',
    upstreamChannelSchema,
    payload,
    timestamp,
  );
}

export function decodeUpstreamOfdm(
  payload: unknown,
  timestamp: bigint,
): DecodedReading<UpstreamOfdmChannel> {
  return decodeReading(
    'docsis_upstream_ofdm',
    upstreamOfdmChannelSchema,
    payload,
    timestamp,
  );
}
