import {
  DownstreamChannel,
  DownstreamOfdmChannel,
  UpstreamChannel,
  UpstreamOfdmChannel,
} from '../dto/channel-records.dto';
import {
  AggregateResult,
  DownstreamOfdmSummary,
  DownstreamSummary,
  EmptyAggregate,
  UpstreamOfdmSummary,
  UpstreamSummary,
} from '../dto/channel-summaries.dto';
import { Reading, ReadingType } from '../interfaces/reading.interface';

/**
 * Statistics of one numeric field over the channels that report it.
 */
export interface FieldStatistics {
  count: number;
  min: number;
  mean: number;
  max: number;
  total: number;
}

/**
 * Inclusion predicates per channel reading type. SC-QAM channels carry no
 * lock gate; OFDM channels only count once locked.
 */
export const isEligibleDownstream = (_channel: DownstreamChannel): boolean =>
  true;
export const isEligibleDownstreamOfdm = (
  channel: DownstreamOfdmChannel,
): boolean => channel.plcLock;
export const isEligibleUpstream = (_channel: UpstreamChannel): boolean => true;
export const isEligibleUpstreamOfdm = (channel: UpstreamOfdmChannel): boolean =>
  channel.state;

/**
 * Returns null for an empty list: there is no minimum of nothing.
 */
export function summarizeField(
  values: readonly number[],
): FieldStatistics | null {
  if (values.length === 0) {
    return null;
  }

  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  let total = 0;
  for (const value of values) {
    min = Math.min(min, value);
    max = Math.max(max, value);
    total += value;
  }

  return {
    count: values.length,
    min,
    mean: total / values.length,
    max,
    total,
  };
}

/**
 * Non-null values of one field, in channel order.
 */
export function fieldValues<T>(
  channels: readonly T[],
  select: (channel: T) => number | null,
): number[] {
  const values: number[] = [];
  for (const channel of channels) {
    const value = select(channel);
    if (value !== null) {
      values.push(value);
    }
  }
  return values;
}

function totalOf<T>(
  channels: readonly T[],
  select: (channel: T) => number | null,
): number {
  return fieldValues(channels, select).reduce((sum, value) => sum + value, 0);
}

function octetsTotalOf<T>(
  channels: readonly T[],
  select: (channel: T) => bigint | null,
): bigint {
  let total = 0n;
  for (const channel of channels) {
    total += select(channel) ?? 0n;
  }
  return total;
}

/**
 * Statistics of one field, null throughout when no channel reports it.
 */
function statisticsOf<T>(
  channels: readonly T[],
  select: (channel: T) => number | null,
): FieldStatistics | null {
  return summarizeField(fieldValues(channels, select));
}

function noEligibleChannels(
  readingType: ReadingType,
  listed: number,
): EmptyAggregate {
  return {
    kind: 'empty',
    readingType,
    reason: `No eligible channels (${listed} listed)`,
  };
}

export function aggregateDownstream(
  reading: Reading<DownstreamChannel>,
): AggregateResult<DownstreamSummary> {
  const channels = reading.data.filter(isEligibleDownstream);
  if (channels.length === 0) {
    return noEligibleChannels('docsis_downstream', reading.data.length);
  }

  const signalStrength = statisticsOf(channels, (c) => c.signalStrength);
  const snr = statisticsOf(channels, (c) => c.snr);
  const corrected = statisticsOf(channels, (c) => c.corrected);
  const uncorrected = statisticsOf(channels, (c) => c.uncorrected);

  return {
    kind: 'summary',
    summary: {
      timestamp: reading.timestamp,
      numChannels: channels.length,
      signalStrengthMin: signalStrength?.min ?? null,
      signalStrengthMean: signalStrength?.mean ?? null,
      signalStrengthMax: signalStrength?.max ?? null,
      snrMin: snr?.min ?? null,
      snrMean: snr?.mean ?? null,
      snrMax: snr?.max ?? null,
      octetsTotal: octetsTotalOf(channels, (c) => c.octets),
      correctedTotal: totalOf(channels, (c) => c.corrected),
      correctedMin: corrected?.min ?? null,
      correctedMean: corrected ? Math.trunc(corrected.mean) : null,
      correctedMax: corrected?.max ?? null,
      uncorrectedTotal: totalOf(channels, (c) => c.uncorrected),
      uncorrectedMin: uncorrected?.min ?? null,
      uncorrectedMean: uncorrected ? Math.trunc(uncorrected.mean) : null,
      uncorrectedMax: uncorrected?.max ?? null,
    },
  };
}

export function aggregateDownstreamOfdm(
  reading: Reading<DownstreamOfdmChannel>,
): AggregateResult<DownstreamOfdmSummary> {
  const channels = reading.data.filter(isEligibleDownstreamOfdm);
  if (channels.length === 0) {
    return noEligibleChannels('docsis_downstream_ofdm', reading.data.length);
  }

  const plcPower = statisticsOf(channels, (c) => c.plcPower);
  const snr = statisticsOf(channels, (c) => c.snr);
  const corrected = statisticsOf(channels, (c) => c.corrected);
  const uncorrected = statisticsOf(channels, (c) => c.uncorrected);

  return {
    kind: 'summary',
    summary: {
      timestamp: reading.timestamp,
      numChannels: channels.length,
      plcPowerMin: plcPower?.min ?? null,
      plcPowerMean: plcPower?.mean ?? null,
      plcPowerMax: plcPower?.max ?? null,
      snrMin: snr?.min ?? null,
      snrMean: snr?.mean ?? null,
      snrMax: snr?.max ?? null,
      octetsTotal: octetsTotalOf(channels, (c) => c.octets),
      correctedTotal: totalOf(channels, (c) => c.corrected),
      correctedMin: corrected?.min ?? null,
      correctedMean: corrected ? Math.trunc(corrected.mean) : null,
      correctedMax: corrected?.max ?? null,
      uncorrectedTotal: totalOf(channels, (c) => c.uncorrected),
      uncorrectedMin: uncorrected?.min ?? null,
      uncorrectedMean: uncorrected ? Math.trunc(uncorrected.mean) : null,
      uncorrectedMax: uncorrected?.max ?? null,
    },
  };
}

export function aggregateUpstream(
  reading: Reading<UpstreamChannel>,
): AggregateResult<UpstreamSummary> {
  const channels = reading.data.filter(isEligibleUpstream);
  if (channels.length === 0) {
    return noEligibleChannels('docsis_upstream', reading.data.length);
  }

  const signalStrength = statisticsOf(channels, (c) => c.signalStrength);

  return {
    kind: 'summary',
    summary: {
      timestamp: reading.timestamp,
      numChannels: channels.length,
      signalStrengthMin: signalStrength?.min ?? null,
      signalStrengthMean: signalStrength?.mean ?? null,
      signalStrengthMax: signalStrength?.max ?? null,
    },
  };
}

export function aggregateUpstreamOfdm(
  reading: Reading<UpstreamOfdmChannel>,
): AggregateResult<UpstreamOfdmSummary> {
  const channels = reading.data.filter(isEligibleUpstreamOfdm);
  if (channels.length === 0) {
    return noEligibleChannels('docsis_upstream_ofdm', reading.data.length);
  }

  const lineAttenuation = statisticsOf(
    channels,
    (c) => c.lineDigitalAttenuation,
  );
  const attenuation = statisticsOf(channels, (c) => c.digitalAttenuation);
  const reportPower = statisticsOf(channels, (c) => c.reportPower);
  const reportPower1_6 = statisticsOf(channels, (c) => c.reportPower1_6);

  return {
    kind: 'summary',
    summary: {
      timestamp: reading.timestamp,
      numChannels: channels.length,
      lineDigitalAttenuationMin: lineAttenuation?.min ?? null,
      lineDigitalAttenuationMean: lineAttenuation?.mean ?? null,
      lineDigitalAttenuationMax: lineAttenuation?.max ?? null,
      digitalAttenuationMin: attenuation?.min ?? null,
      digitalAttenuationMean: attenuation?.mean ?? null,
      digitalAttenuationMax: attenuation?.max ?? null,
      reportPowerMin: reportPower?.min ?? null,
      reportPowerMean: reportPower?.mean ?? null,
      reportPowerMax: reportPower?.max ?? null,
      reportPower1_6Min: reportPower1_6?.min ?? null,
      reportPower1_6Mean: reportPower1_6?.mean ?? null,
      reportPower1_6Max: reportPower1_6?.max ?? null,
    },
  };
}
