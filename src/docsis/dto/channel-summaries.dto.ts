import { ReadingType } from '../interfaces/reading.interface';

/**
 * Channel Summaries
 *
 * Min/mean/max (and totals for error counters) over the eligible channels of
 * one reading. `numChannels` is the number of eligible channels, not the
 * number the modem listed.
 *
 * A channel missing a value is left out of that field only. A field no
 * eligible channel reports has null statistics; its total is 0.
 */

export interface DownstreamSummary {
  timestamp: bigint;
  numChannels: number;
  signalStrengthMin: number | null;
  signalStrengthMean: number | null;
  signalStrengthMax: number | null;
  snrMin: number | null;
  snrMean: number | null;
  snrMax: number | null;
  octetsTotal: bigint;
  correctedTotal: number;
  correctedMin: number | null;
  /** Truncated to an integer. */
  correctedMean: number | null;
  correctedMax: number | null;
  uncorrectedTotal: number;
  uncorrectedMin: number | null;
  /** Truncated to an integer. */
  uncorrectedMean: number | null;
  uncorrectedMax: number | null;
}

export interface DownstreamOfdmSummary {
  timestamp: bigint;
  numChannels: number;
  plcPowerMin: number | null;
  plcPowerMean: number | null;
  plcPowerMax: number | null;
  snrMin: number | null;
  snrMean: number | null;
  snrMax: number | null;
  octetsTotal: bigint;
  correctedTotal: number;
  correctedMin: number | null;
  correctedMean: number | null;
  correctedMax: number | null;
  uncorrectedTotal: number;
  uncorrectedMin: number | null;
  uncorrectedMean: number | null;
  uncorrectedMax: number | null;
}

export interface UpstreamSummary {
  timestamp: bigint;
  numChannels: number;
  signalStrengthMin: number | null;
  signalStrengthMean: number | null;
  signalStrengthMax: number | null;
}

export interface UpstreamOfdmSummary {
  timestamp: bigint;
  numChannels: number;
  lineDigitalAttenuationMin: number | null;
  lineDigitalAttenuationMean: number | null;
  lineDigitalAttenuationMax: number | null;
  digitalAttenuationMin: number | null;
  digitalAttenuationMean: number | null;
  digitalAttenuationMax: number | null;
  reportPowerMin: number | null;
  reportPowerMean: number | null;
  reportPowerMax: number | null;
  reportPower1_6Min: number | null;
  reportPower1_6Mean: number | null;
  reportPower1_6Max: number | null;
}

/**
 * No eligible channel, e.g. no OFDM receiver has PLC lock. Callers substitute
 * their own fallback rather than report a false zero.
 */
export interface EmptyAggregate {
  kind: 'empty';
  readingType: ReadingType;
  reason: string;
}

export interface ComputedAggregate<S> {
  kind: 'summary';
  summary: S;
}

export type AggregateResult<S> = ComputedAggregate<S> | EmptyAggregate;
