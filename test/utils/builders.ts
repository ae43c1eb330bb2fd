import {
  DownstreamChannel,
  DownstreamOfdmChannel,
  Reading,
  UpstreamChannel,
  UpstreamOfdmChannel,
} from '../../src/docsis';
import { TEST_TIMESTAMP } from './fixtures';

/**
 * Typed channel builders with plausible defaults.
 * Only the fields under test need to be spelled out.
 */

export function downstreamChannel(
  overrides: Partial<DownstreamChannel> = {},
): DownstreamChannel {
  return {
    portId: 1,
    frequency: 591000000,
    modulation: 2,
    signalStrength: 3.5,
    snr: 40.0,
    octets: 1000n,
    corrected: 0,
    uncorrected: 0,
    channelId: 1,
    ...overrides,
  };
}

export function downstreamOfdmChannel(
  overrides: Partial<DownstreamOfdmChannel> = {},
): DownstreamOfdmChannel {
  return {
    receiver: 0,
    fftType: '4K',
    subcarrier0Frequency: 275600000,
    plcLock: true,
    ncpLock: true,
    mdc1Lock: true,
    plcPower: 5.0,
    snr: 41.0,
    octets: 1000n,
    corrected: 0,
    uncorrected: 0,
    ...overrides,
  };
}

export function upstreamChannel(
  overrides: Partial<UpstreamChannel> = {},
): UpstreamChannel {
  return {
    portId: 1,
    frequency: 30600000,
    bandwidth: 6400000,
    modulation: '64QAM',
    docsisMode: 'ATDMA',
    signalStrength: 44.0,
    channelId: 1,
    ...overrides,
  };
}

export function upstreamOfdmChannel(
  overrides: Partial<UpstreamOfdmChannel> = {},
): UpstreamOfdmChannel {
  return {
    channelId: 0,
    state: true,
    subcarrier0Frequency: 40400000,
    lineDigitalAttenuation: 2.0,
    digitalAttenuation: 1.0,
    bandwidth: 95.0,
    reportPower: 38.0,
    reportPower1_6: 32.0,
    fftSize: '2K',
    ...overrides,
  };
}

export function reading<T>(
  data: T[],
  timestamp: bigint = TEST_TIMESTAMP,
): Reading<T> {
  return { timestamp, data };
}
