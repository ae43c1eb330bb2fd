import {
  DocsisOverviewRecord,
  DocsisProvisioningRecord,
  DownstreamChannel,
  DownstreamOfdmChannel,
  UpstreamChannel,
  UpstreamOfdmChannel,
} from './channel-records.dto';

/**
 * Full DOCSIS snapshot of one poll.
 *
 * The constituent readings are fetched independently, so their capture times
 * may differ slightly from `timestamp`.
 */
export interface DocsisStatistics {
  timestamp: bigint;
  provisioning: DocsisProvisioningRecord;
  overview: DocsisOverviewRecord;
  downstream: DownstreamChannel[];
  downstreamOfdm: DownstreamOfdmChannel[];
  upstream: UpstreamChannel[];
  upstreamOfdm: UpstreamOfdmChannel[];
}

/**
 * Column order of the flattened row. CSV headers are written from this list,
 * so it must only ever be appended to.
 */
export const FLATTENED_STATISTICS_KEYS = [
  'timestamp',
  'down_signal_min',
  'down_signal_mean',
  'down_signal_max',
  'down_snr_min',
  'down_snr_mean',
  'down_snr_max',
  'down_plc_power',
  'down_octets_total',
  'down_correcteds_total',
  'down_uncorrectables_total',
  'up_signal_mean',
  'up_ofdm_report_power',
] as const;

export type FlattenedStatisticsKey = (typeof FLATTENED_STATISTICS_KEYS)[number];

/**
 * One display/storage row per poll. Signal, SNR and power are fixed
 * three-decimal strings; counters stay integers. The octet total is a bigint
 * and is written out as its decimal digits.
 */
export interface FlattenedStatistics
  extends Record<FlattenedStatisticsKey, string | number | bigint> {
  /** ISO-8601 with local UTC offset, second resolution. */
  timestamp: string;
  down_signal_min: string;
  down_signal_mean: string;
  down_signal_max: string;
  down_snr_min: string;
  down_snr_mean: string;
  down_snr_max: string;
  down_plc_power: string;
  down_octets_total: bigint;
  down_correcteds_total: number;
  down_uncorrectables_total: number;
  up_signal_mean: string;
  up_ofdm_report_power: string;
}
