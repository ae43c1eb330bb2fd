import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  AggregateResult,
  aggregateDownstream,
  aggregateDownstreamOfdm,
  aggregateUpstream,
  aggregateUpstreamOfdm,
  ChannelAggregates,
  composeDocsisStatistics,
  composeFlattenedStatistics,
  DecodedReading,
  DocsisStatistics,
  DownstreamOfdmSummary,
  DownstreamSummary,
  FlattenedStatistics,
  LinkStatusRecord,
  nowNanoseconds,
  Reading,
  ReadingType,
  SystemInfoRecord,
  UpstreamOfdmSummary,
  UpstreamSummary,
} from '../docsis';
import {
  DocsisModemDriver,
  MODEM_DRIVER,
} from './interfaces/modem-driver.interface';

/**
 * Reading types that carry per-channel lists worth summarizing.
 */
export const CHANNEL_READING_TYPES = [
  'docsis_downstream',
  'docsis_downstream_ofdm',
  'docsis_upstream',
  'docsis_upstream_ofdm',
] as const;

export type ChannelReadingType = (typeof CHANNEL_READING_TYPES)[number];

export function isChannelReadingType(
  value: string,
): value is ChannelReadingType {
  return CHANNEL_READING_TYPES.some((type) => type === value);
}

/**
 * ModemService - Feeds driver output through the DOCSIS core
 *
 * Responsibilities:
 * 1. Fetch: one driver call per reading type, concurrent within a snapshot
 * 2. Partial decoding: log records that failed to decode, keep the rest
 * 3. Aggregation: per-channel summaries and the flattened row
 *
 * Nothing is cached; every call polls the modem again.
 */
@Injectable()
export class ModemService {
  private readonly logger = new Logger(ModemService.name);

  constructor(
    @Inject(MODEM_DRIVER) private readonly driver: DocsisModemDriver,
  ) {}

  get address(): string {
    return this.driver.address;
  }

  async getSystemInfo(): Promise<Reading<SystemInfoRecord>> {
    return this.unwrap('system_info', await this.driver.systemInfo());
  }

  async getLinkStatus(): Promise<Reading<LinkStatusRecord>> {
    return this.unwrap('link_status', await this.driver.linkStatus());
  }

  /**
   * Fetch any single reading type.
   */
  async getReading(readingType: ReadingType): Promise<Reading<unknown>> {
    switch (readingType) {
      case 'system_info':
        return this.getSystemInfo();
      case 'link_status':
        return this.getLinkStatus();
      case 'docsis_provisioning':
        return this.unwrap(readingType, await this.driver.docsisProvisioning());
      case 'docsis_overview':
        return this.unwrap(readingType, await this.driver.docsisOverview());
      case 'docsis_downstream':
        return this.unwrap(readingType, await this.driver.docsisDownstream());
      case 'docsis_downstream_ofdm':
        return this.unwrap(
          readingType,
          await this.driver.docsisDownstreamOfdm(),
        );
      case 'docsis_upstream':
        return this.unwrap(readingType, await this.driver.docsisUpstream());
      case 'docsis_upstream_ofdm':
        return this.unwrap(readingType, await this.driver.docsisUpstreamOfdm());
    }
  }

  async getDownstreamSummary(): Promise<AggregateResult<DownstreamSummary>> {
    const reading = this.unwrap(
      'docsis_downstream',
      await this.driver.docsisDownstream(),
    );
    return this.logEmpty(aggregateDownstream(reading));
  }

  async getDownstreamOfdmSummary(): Promise<
    AggregateResult<DownstreamOfdmSummary>
  > {
    const reading = this.unwrap(
      'docsis_downstream_ofdm',
      await this.driver.docsisDownstreamOfdm(),
    );
    return this.logEmpty(aggregateDownstreamOfdm(reading));
  }

  async getUpstreamSummary(): Promise<AggregateResult<UpstreamSummary>> {
    const reading = this.unwrap(
      'docsis_upstream',
      await this.driver.docsisUpstream(),
    );
    return this.logEmpty(aggregateUpstream(reading));
  }

  async getUpstreamOfdmSummary(): Promise<AggregateResult<UpstreamOfdmSummary>> {
    const reading = this.unwrap(
      'docsis_upstream_ofdm',
      await this.driver.docsisUpstreamOfdm(),
    );
    return this.logEmpty(aggregateUpstreamOfdm(reading));
  }

  /**
   * Summary of any channel reading type.
   */
  getChannelSummary(
    readingType: ChannelReadingType,
  ): Promise<AggregateResult<unknown>> {
    switch (readingType) {
      case 'docsis_downstream':
        return this.getDownstreamSummary();
      case 'docsis_downstream_ofdm':
        return this.getDownstreamOfdmSummary();
      case 'docsis_upstream':
        return this.getUpstreamSummary();
      case 'docsis_upstream_ofdm':
        return this.getUpstreamOfdmSummary();
    }
  }

  /**
   * Full DOCSIS snapshot: provisioning, overview and every channel list.
   */
  async getDocsisStatistics(): Promise<DocsisStatistics> {
    const timestamp = nowNanoseconds();
    const [
      provisioning,
      overview,
      downstream,
      downstreamOfdm,
      upstream,
      upstreamOfdm,
    ] = await Promise.all([
      this.driver.docsisProvisioning(),
      this.driver.docsisOverview(),
      this.driver.docsisDownstream(),
      this.driver.docsisDownstreamOfdm(),
      this.driver.docsisUpstream(),
      this.driver.docsisUpstreamOfdm(),
    ]);

    return composeDocsisStatistics(
      {
        provisioning: this.unwrap('docsis_provisioning', provisioning),
        overview: this.unwrap('docsis_overview', overview),
        downstream: this.unwrap('docsis_downstream', downstream),
        downstreamOfdm: this.unwrap('docsis_downstream_ofdm', downstreamOfdm),
        upstream: this.unwrap('docsis_upstream', upstream),
        upstreamOfdm: this.unwrap('docsis_upstream_ofdm', upstreamOfdm),
      },
      timestamp,
    );
  }

  /**
   * One flattened row for display or CSV output.
   */
  async getFlattenedStatistics(): Promise<FlattenedStatistics> {
    const [downstream, downstreamOfdm, upstream, upstreamOfdm] =
      await Promise.all([
        this.getDownstreamSummary(),
        this.getDownstreamOfdmSummary(),
        this.getUpstreamSummary(),
        this.getUpstreamOfdmSummary(),
      ]);

    const aggregates: ChannelAggregates = {
      downstream,
      downstreamOfdm,
      upstream,
      upstreamOfdm,
    };
    return composeFlattenedStatistics(aggregates);
  }

  /**
   * Log records that failed to decode and keep the ones that didn't.
   */
  private unwrap<T>(
    readingType: ReadingType,
    decoded: DecodedReading<T>,
  ): Reading<T> {
    for (const error of decoded.errors) {
      this.logger.warn(error.message);
    }
    if (decoded.errors.length > 0) {
      this.logger.warn(
        `${readingType}: ${decoded.errors.length} record(s) skipped, ${decoded.reading.data.length} decoded`,
      );
    }
    return decoded.reading;
  }

  private logEmpty<S>(result: AggregateResult<S>): AggregateResult<S> {
    if (result.kind === 'empty') {
      this.logger.debug(`${result.readingType}: ${result.reason}`);
    }
    return result;
  }
}
