import {
  DecodedReading,
  DocsisOverviewRecord,
  DocsisProvisioningRecord,
  DownstreamChannel,
  DownstreamOfdmChannel,
  LinkStatusRecord,
  SystemInfoRecord,
  UpstreamChannel,
  UpstreamOfdmChannel,
} from '../../docsis';

/**
 * Injection token for the active modem driver.
 */
export const MODEM_DRIVER = Symbol('MODEM_DRIVER');

/**
 * ModemDriver Interface
 *
 * What any modem driver exposes, whatever the vendor. Each accessor performs
 * one fetch and resolves the decoded reading, including records that failed
 * to decode.
 */
export interface ModemDriver {
  /** Address the driver talks to; used to name output files. */
  readonly address: string;

  systemInfo(): Promise<DecodedReading<SystemInfoRecord>>;

  linkStatus(): Promise<DecodedReading<LinkStatusRecord>>;
}

/**
 * A modem with DOCSIS diagnostics.
 *
 * Implementations own transport concerns (timeouts, retries); the decoded
 * readings they return are plain values.
 */
export interface DocsisModemDriver extends ModemDriver {
  docsisProvisioning(): Promise<DecodedReading<DocsisProvisioningRecord>>;

  docsisOverview(): Promise<DecodedReading<DocsisOverviewRecord>>;

  docsisDownstream(): Promise<DecodedReading<DownstreamChannel>>;

  docsisDownstreamOfdm(): Promise<DecodedReading<DownstreamOfdmChannel>>;

  docsisUpstream(): Promise<DecodedReading<UpstreamChannel>>;

  docsisUpstreamOfdm(): Promise<DecodedReading<UpstreamOfdmChannel>>;
}

/**
 * The modem could not be reached or answered with something other than JSON.
 */
export class ModemRequestError extends Error {
  constructor(
    public readonly url: string,
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(`${message} (${url})`, options);
    this.name = 'ModemRequestError';
  }
}
