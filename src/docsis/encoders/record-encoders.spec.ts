import {
  encodeDocsisOverview,
  encodeDocsisProvisioning,
  encodeDownstreamChannel,
  encodeDownstreamOfdmChannel,
  encodeLinkStatus,
  encodeSystemInfo,
  encodeUpstreamChannel,
  encodeUpstreamOfdmChannel,
} from './record-encoders';
import { formatDuration } from './canonical-format';
import {
  decodeDocsisOverview,
  decodeDocsisProvisioning,
  decodeDownstream,
  decodeDownstreamOfdm,
  decodeLinkStatus,
  decodeSystemInfo,
  decodeUpstream,
  decodeUpstreamOfdm,
} from '../decoders/reading-decoder';
import { DecodedReading, ReadingType } from '../interfaces/reading.interface';
import { loadPageFixture, TEST_TIMESTAMP } from '../../../test/utils/fixtures';
import {
  downstreamChannel,
  downstreamOfdmChannel,
} from '../../../test/utils/builders';

/**
 * Decode a recorded page, re-encode every record and decode again.
 */
function reencode<T>(
  readingType: ReadingType,
  decode: (payload: unknown, timestamp: bigint) => DecodedReading<T>,
  encode: (record: T) => Record<string, string>,
): { first: T[]; second: T[] } {
  const first = decode(loadPageFixture(readingType), TEST_TIMESTAMP).reading
    .data;
  const second = decode(first.map(encode), TEST_TIMESTAMP).reading.data;
  return { first, second };
}

describe('record encoders', () => {
  describe('round trip over recorded pages', () => {
    it('should preserve system info', () => {
      const { first, second } = reencode(
        'system_info',
        decodeSystemInfo,
        encodeSystemInfo,
      );
      expect(second).toEqual(first);
    });

    it('should preserve link status', () => {
      const { first, second } = reencode(
        'link_status',
        decodeLinkStatus,
        encodeLinkStatus,
      );
      expect(second).toEqual(first);
    });

    it('should preserve provisioning', () => {
      const { first, second } = reencode(
        'docsis_provisioning',
        decodeDocsisProvisioning,
        encodeDocsisProvisioning,
      );
      expect(second).toEqual(first);
    });

    it('should preserve the overview', () => {
      const { first, second } = reencode(
        'docsis_overview',
        decodeDocsisOverview,
        encodeDocsisOverview,
      );
      expect(second).toEqual(first);
    });

    it('should preserve downstream channels', () => {
      const { first, second } = reencode(
        'docsis_downstream',
        decodeDownstream,
        encodeDownstreamChannel,
      );
      expect(second).toEqual(first);
    });

    it('should preserve downstream OFDM channels', () => {
      const { first, second } = reencode(
        'docsis_downstream_ofdm',
        decodeDownstreamOfdm,
        encodeDownstreamOfdmChannel,
      );
      expect(second).toEqual(first);
    });

    it('should preserve upstream channels', () => {
      const { first, second } = reencode(
        'docsis_upstream',
        decodeUpstream,
        encodeUpstreamChannel,
      );
      expect(second).toEqual(first);
    });

    it('should preserve upstream OFDM channels', () => {
      const { first, second } = reencode(
        'docsis_upstream_ofdm',
        decodeUpstreamOfdm,
        encodeUpstreamOfdmChannel,
      );
      expect(second).toEqual(first);
    });
  });

  describe('canonical text', () => {
    it('should write absent numbers as empty strings', () => {
      const wire = encodeDownstreamChannel(
        downstreamChannel({ snr: null, octets: null }),
      );

      expect(wire.snr).toBe('');
      expect(wire.dsoctets).toBe('');
      expect(decodeDownstream([wire], TEST_TIMESTAMP).reading.data[0]).toEqual(
        downstreamChannel({ snr: null, octets: null }),
      );
    });

    it('should write flags as true/false', () => {
      const wire = encodeDownstreamOfdmChannel(
        downstreamOfdmChannel({ plcLock: false, ncpLock: true }),
      );

      expect(wire.plclock).toBe('false');
      expect(wire.ncplock).toBe('true');
    });

    it('should write a dash for absent link speed', () => {
      expect(
        encodeLinkStatus({ status: false, speed: null, duplex: 'Half' }),
      ).toEqual({ LinkStatus: 'Down', LinkSpeed: '-', LinkDuplex: 'Half' });
    });

    it('should split a lease back into its components', () => {
      expect(formatDuration(604752)).toBe('D: 6 H: 23 M: 59 S: 12');
      expect(formatDuration(0)).toBe('D: 0 H: 0 M: 0 S: 0');
    });
  });
});
