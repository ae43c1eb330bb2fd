import { formatISO } from 'date-fns';
import {
  DocsisOverviewRecord,
  DocsisProvisioningRecord,
  DownstreamChannel,
  DownstreamOfdmChannel,
  UpstreamChannel,
  UpstreamOfdmChannel,
} from '../dto/channel-records.dto';
import {
  AggregateResult,
  DownstreamOfdmSummary,
  DownstreamSummary,
  UpstreamOfdmSummary,
  UpstreamSummary,
} from '../dto/channel-summaries.dto';
import {
  DocsisStatistics,
  FlattenedStatistics,
} from '../dto/docsis-statistics.dto';
import { Reading, SchemaMismatchError } from '../interfaces/reading.interface';

/**
 * Aggregates of every channel reading type for one poll.
 */
export interface ChannelAggregates {
  downstream: AggregateResult<DownstreamSummary>;
  downstreamOfdm: AggregateResult<DownstreamOfdmSummary>;
  upstream: AggregateResult<UpstreamSummary>;
  upstreamOfdm: AggregateResult<UpstreamOfdmSummary>;
}

export interface DocsisReadings {
  provisioning: Reading<DocsisProvisioningRecord>;
  overview: Reading<DocsisOverviewRecord>;
  downstream: Reading<DownstreamChannel>;
  downstreamOfdm: Reading<DownstreamOfdmChannel>;
  upstream: Reading<UpstreamChannel>;
  upstreamOfdm: Reading<UpstreamOfdmChannel>;
}

const DISPLAY_DECIMALS = 3;

function display(value: number): string {
  return value.toFixed(DISPLAY_DECIMALS);
}

/**
 * Build the flattened row for one poll.
 *
 * Each column falls back on its own when its aggregate is empty or no
 * eligible channel reports the field: 0.0 for signal, SNR and power, 0 for
 * counters. `now` stamps the row (presentation time, not the
 * capture time of any reading).
 */
export function composeFlattenedStatistics(
  aggregates: ChannelAggregates,
  now: Date = new Date(),
): FlattenedStatistics {
  const downstream =
    aggregates.downstream.kind === 'summary'
      ? aggregates.downstream.summary
      : null;
  const downstreamOfdm =
    aggregates.downstreamOfdm.kind === 'summary'
      ? aggregates.downstreamOfdm.summary
      : null;
  const upstream =
    aggregates.upstream.kind === 'summary' ? aggregates.upstream.summary : null;
  const upstreamOfdm =
    aggregates.upstreamOfdm.kind === 'summary'
      ? aggregates.upstreamOfdm.summary
      : null;

  return {
    timestamp: formatISO(now),
    down_signal_min: display(downstream?.signalStrengthMin ?? 0),
    down_signal_mean: display(downstream?.signalStrengthMean ?? 0),
    down_signal_max: display(downstream?.signalStrengthMax ?? 0),
    down_snr_min: display(downstream?.snrMin ?? 0),
    down_snr_mean: display(downstream?.snrMean ?? 0),
    down_snr_max: display(downstream?.snrMax ?? 0),
    down_plc_power: display(downstreamOfdm?.plcPowerMean ?? 0),
    down_octets_total: downstreamOfdm?.octetsTotal ?? 0n,
    down_correcteds_total: downstreamOfdm?.correctedTotal ?? 0,
    down_uncorrectables_total: downstreamOfdm?.uncorrectedTotal ?? 0,
    up_signal_mean: display(upstream?.signalStrengthMean ?? 0),
    up_ofdm_report_power: display(upstreamOfdm?.reportPowerMean ?? 0),
  };
}

/**
 * Bundle the latest provisioning and overview state with every channel list.
 *
 * Provisioning and overview pages hold a single record; an empty one means
 * the page changed shape.
 */
export function composeDocsisStatistics(
  readings: DocsisReadings,
  timestamp: bigint,
): DocsisStatistics {
  const [provisioning] = readings.provisioning.data;
  if (!provisioning) {
    throw new SchemaMismatchError(
      'docsis_provisioning',
      'Expected at least one record',
      readings.provisioning.data,
    );
  }
  const [overview] = readings.overview.data;
  if (!overview) {
    throw new SchemaMismatchError(
      'docsis_overview',
      'Expected at least one record',
      readings.overview.data,
    );
  }

  return {
    timestamp,
    provisioning,
    overview,
    downstream: readings.downstream.data,
    downstreamOfdm: readings.downstreamOfdm.data,
    upstream: readings.upstream.data,
    upstreamOfdm: readings.upstreamOfdm.data,
  };
}
