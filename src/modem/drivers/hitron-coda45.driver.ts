import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isIP } from 'node:net';
import {
  DecodedReading,
  decodeDocsisOverview,
  decodeDocsisProvisioning,
  decodeDownstream,
  decodeDownstreamOfdm,
  decodeLinkStatus,
  decodeSystemInfo,
  decodeUpstream,
  decodeUpstreamOfdm,
  DocsisOverviewRecord,
  DocsisProvisioningRecord,
  DownstreamChannel,
  DownstreamOfdmChannel,
  LinkStatusRecord,
  nowNanoseconds,
  ReadingType,
  SystemInfoRecord,
  UpstreamChannel,
  UpstreamOfdmChannel,
} from '../../docsis';
import {
  DocsisModemDriver,
  ModemRequestError,
} from '../interfaces/modem-driver.interface';

/**
 * Diagnostic pages of the CODA-45 web UI, one per reading type.
 */
export const HITRON_CODA45_PAGES: Record<ReadingType, string> = {
  system_info: '/data/getSysInfo.asp',
  link_status: '/data/getLinkStatus.asp',
  docsis_provisioning: '/data/getCMInit.asp',
  docsis_overview: '/data/getCmDocsisWan.asp',
  docsis_downstream: '/data/dsinfo.asp',
  docsis_downstream_ofdm: '/data/dsofdminfo.asp',
  docsis_upstream: '/data/usinfo.asp',
  docsis_upstream_ofdm: '/data/usofdminfo.asp',
};

type Decoder<T> = (payload: unknown, timestamp: bigint) => DecodedReading<T>;

/**
 * Hitron CODA-45 Driver
 *
 * The modem serves each diagnostic page as a JSON array of string-valued
 * objects. No login is needed on the LAN side. Every request carries a
 * `_=<epoch ms>` cache buster, as the modem's own web UI does.
 */
@Injectable()
export class HitronCoda45Driver implements DocsisModemDriver {
  private readonly logger = new Logger(HitronCoda45Driver.name);

  readonly address: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.address = this.configService.get<string>(
      'MODEM_ADDRESS',
      '192.168.100.1',
    );
    const scheme = this.configService.get<string>('MODEM_SCHEME', 'http');
    this.timeoutMs = this.configService.get<number>('MODEM_TIMEOUT_MS', 10000);

    const host = isIP(this.address) === 6 ? `[${this.address}]` : this.address;
    this.baseUrl = `${scheme}://${host}`;
    this.logger.log(`HitronCoda45Driver configured for ${this.baseUrl}`);
  }

  systemInfo(): Promise<DecodedReading<SystemInfoRecord>> {
    return this.fetchReading('system_info', decodeSystemInfo);
  }

  linkStatus(): Promise<DecodedReading<LinkStatusRecord>> {
    return this.fetchReading('link_status', decodeLinkStatus);
  }

  docsisProvisioning(): Promise<DecodedReading<DocsisProvisioningRecord>> {
    return this.fetchReading('docsis_provisioning', decodeDocsisProvisioning);
  }

  docsisOverview(): Promise<DecodedReading<DocsisOverviewRecord>> {
    return this.fetchReading('docsis_overview', decodeDocsisOverview);
  }

  docsisDownstream(): Promise<DecodedReading<DownstreamChannel>> {
    return this.fetchReading('docsis_downstream', decodeDownstream);
  }

  docsisDownstreamOfdm(): Promise<DecodedReading<DownstreamOfdmChannel>> {
    return this.fetchReading('docsis_downstream_ofdm', decodeDownstreamOfdm);
  }

  docsisUpstream(): Promise<DecodedReading<UpstreamChannel>> {
    return this.fetchReading('docsis_upstream', decodeUpstream);
  }

  docsisUpstreamOfdm(): Promise<DecodedReading<UpstreamOfdmChannel>> {
    return this.fetchReading('docsis_upstream_ofdm', decodeUpstreamOfdm);
  }

  /**
   * Fetch one page and decode it. The capture timestamp is taken before the
   * request goes out.
   */
  private async fetchReading<T>(
    readingType: ReadingType,
    decode: Decoder<T>,
  ): Promise<DecodedReading<T>> {
    const timestamp = nowNanoseconds();
    const payload = await this.getJson(HITRON_CODA45_PAGES[readingType]);
    return decode(payload, timestamp);
  }

  private async getJson(path: string): Promise<unknown> {
    const url = `${this.baseUrl}${path}?_=${Date.now()}`;
    this.logger.debug(`GET ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new ModemRequestError(
        url,
        `Request failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { cause: error },
      );
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new ModemRequestError(
        url,
        `Modem responded with HTTP ${response.status}`,
        response.status,
      );
    }

    try {
      const payload: unknown = await response.json();
      return payload;
    } catch (error) {
      throw new ModemRequestError(
        url,
        'Modem responded with invalid JSON',
        response.status,
        { cause: error },
      );
    }
  }
}
