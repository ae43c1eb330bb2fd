import {
  aggregateDownstream,
  aggregateDownstreamOfdm,
  aggregateUpstream,
  aggregateUpstreamOfdm,
  fieldValues,
  summarizeField,
} from './channel-aggregator';
import {
  decodeDownstream,
  decodeDownstreamOfdm,
  decodeUpstream,
  decodeUpstreamOfdm,
} from '../decoders/reading-decoder';
import { loadPageFixture, TEST_TIMESTAMP } from '../../../test/utils/fixtures';
import {
  downstreamChannel,
  downstreamOfdmChannel,
  reading,
  upstreamChannel,
  upstreamOfdmChannel,
} from '../../../test/utils/builders';

describe('channel aggregator', () => {
  describe('summarizeField', () => {
    it('should return null for no values', () => {
      expect(summarizeField([])).toBeNull();
    });

    it('should compute count, min, mean, max and total', () => {
      expect(summarizeField([4, 1, 7])).toEqual({
        count: 3,
        min: 1,
        mean: 4,
        max: 7,
        total: 12,
      });
    });
  });

  describe('fieldValues', () => {
    it('should skip nulls and keep order', () => {
      const channels = [
        downstreamChannel({ snr: 38 }),
        downstreamChannel({ snr: null }),
        downstreamChannel({ snr: 36 }),
      ];

      expect(fieldValues(channels, (c) => c.snr)).toEqual([38, 36]);
    });
  });

  describe('aggregateDownstream', () => {
    it('should summarize only channels that report a value', () => {
      const result = aggregateDownstream(
        reading([
          downstreamChannel({ signalStrength: 1.0 }),
          downstreamChannel({ signalStrength: 3.0 }),
          downstreamChannel({ signalStrength: null }),
        ]),
      );

      expect(result.kind).toBe('summary');
      if (result.kind !== 'summary') return;
      expect(result.summary.numChannels).toBe(3);
      expect(result.summary.signalStrengthMin).toBe(1.0);
      expect(result.summary.signalStrengthMean).toBe(2.0);
      expect(result.summary.signalStrengthMax).toBe(3.0);
    });

    it('should summarize the recorded four-channel page', () => {
      const { reading: downstream } = decodeDownstream(
        loadPageFixture('docsis_downstream'),
        TEST_TIMESTAMP,
      );

      const result = aggregateDownstream(downstream);

      expect(result.kind).toBe('summary');
      if (result.kind !== 'summary') return;
      const { summary } = result;
      expect(summary.timestamp).toBe(TEST_TIMESTAMP);
      expect(summary.numChannels).toBe(4);
      expect(summary.signalStrengthMin).toBe(34.8);
      expect(summary.signalStrengthMax).toBe(36.0);
      expect(summary.signalStrengthMean).toBeCloseTo(35.35, 10);
      expect(summary.snrMin).toBe(39.8);
      expect(summary.snrMax).toBe(41.2);
      expect(summary.snrMean).toBeCloseTo(40.375, 10);
      expect(summary.octetsTotal).toBe(8589940692n);
      expect(summary.correctedTotal).toBe(22);
      expect(summary.correctedMin).toBe(0);
      expect(summary.correctedMax).toBe(12);
      expect(summary.correctedMean).toBe(5);
      expect(summary.uncorrectedTotal).toBe(3);
      expect(summary.uncorrectedMin).toBe(0);
      expect(summary.uncorrectedMax).toBe(2);
      expect(summary.uncorrectedMean).toBe(0);
    });

    it('should total octets over the channels that report them', () => {
      const result = aggregateDownstream(
        reading([
          downstreamChannel({ octets: null }),
          downstreamChannel({ octets: 5n }),
        ]),
      );

      expect(result.kind === 'summary' && result.summary.octetsTotal).toBe(5n);
    });

    it('should total octets to 0 when no channel reports them', () => {
      const result = aggregateDownstream(
        reading([downstreamChannel({ octets: null })]),
      );

      expect(result.kind === 'summary' && result.summary.octetsTotal).toBe(0n);
    });

    it('should report an empty aggregate for no channels', () => {
      expect(aggregateDownstream(reading([]))).toEqual({
        kind: 'empty',
        readingType: 'docsis_downstream',
        reason: 'No eligible channels (0 listed)',
      });
    });

    it('should keep the other fields when one field has no values', () => {
      const result = aggregateDownstream(
        reading([
          downstreamChannel({ signalStrength: 35.0, snr: null }),
          downstreamChannel({ signalStrength: 36.0, snr: null }),
        ]),
      );

      expect(result.kind).toBe('summary');
      if (result.kind !== 'summary') return;
      expect(result.summary).toMatchObject({
        numChannels: 2,
        signalStrengthMin: 35.0,
        signalStrengthMean: 35.5,
        signalStrengthMax: 36.0,
        snrMin: null,
        snrMean: null,
        snrMax: null,
      });
    });

    it('should total error counters to 0 when no channel reports them', () => {
      const result = aggregateDownstream(
        reading([
          downstreamChannel({ corrected: null, uncorrected: null }),
          downstreamChannel({ corrected: null, uncorrected: null }),
        ]),
      );

      expect(result.kind).toBe('summary');
      if (result.kind !== 'summary') return;
      expect(result.summary).toMatchObject({
        correctedTotal: 0,
        correctedMin: null,
        correctedMean: null,
        correctedMax: null,
        uncorrectedTotal: 0,
        uncorrectedMin: null,
        uncorrectedMean: null,
        uncorrectedMax: null,
      });
    });
  });

  describe('aggregateDownstreamOfdm', () => {
    it('should only count receivers with PLC lock', () => {
      const { reading: ofdm } = decodeDownstreamOfdm(
        [
          {
            receive: '0',
            plclock: 'disabled',
            ncplock: 'disabled',
            mdc1lock: 'disabled',
            plcpower: '9.9',
            SNR: '30.0',
            dsoctets: '700',
            correcteds: '99',
            uncorrect: '99',
          },
          {
            receive: '1',
            plclock: 'locked',
            ncplock: 'locked',
            mdc1lock: 'locked',
            plcpower: '4.5',
            SNR: '40.2',
            dsoctets: '500',
            correcteds: '10',
            uncorrect: '1',
          },
        ],
        TEST_TIMESTAMP,
      );

      const result = aggregateDownstreamOfdm(ofdm);

      expect(result).toEqual({
        kind: 'summary',
        summary: {
          timestamp: TEST_TIMESTAMP,
          numChannels: 1,
          plcPowerMin: 4.5,
          plcPowerMean: 4.5,
          plcPowerMax: 4.5,
          snrMin: 40.2,
          snrMean: 40.2,
          snrMax: 40.2,
          octetsTotal: 500n,
          correctedTotal: 10,
          correctedMin: 10,
          correctedMean: 10,
          correctedMax: 10,
          uncorrectedTotal: 1,
          uncorrectedMin: 1,
          uncorrectedMean: 1,
          uncorrectedMax: 1,
        },
      });
    });

    it('should keep totals when the PLC power is missing', () => {
      const result = aggregateDownstreamOfdm(
        reading([
          downstreamOfdmChannel({
            plcPower: null,
            octets: 500n,
            corrected: 7,
            uncorrected: 0,
          }),
        ]),
      );

      expect(result.kind).toBe('summary');
      if (result.kind !== 'summary') return;
      expect(result.summary).toMatchObject({
        plcPowerMin: null,
        plcPowerMean: null,
        plcPowerMax: null,
        octetsTotal: 500n,
        correctedTotal: 7,
        uncorrectedTotal: 0,
      });
    });

    it('should truncate counter means', () => {
      const result = aggregateDownstreamOfdm(
        reading([
          downstreamOfdmChannel({ corrected: 1, uncorrected: 3 }),
          downstreamOfdmChannel({ corrected: 2, uncorrected: 4 }),
        ]),
      );

      expect(result.kind).toBe('summary');
      if (result.kind !== 'summary') return;
      expect(result.summary.correctedMean).toBe(1);
      expect(result.summary.uncorrectedMean).toBe(3);
    });

    it('should report an empty aggregate when nothing is locked', () => {
      expect(
        aggregateDownstreamOfdm(
          reading([
            downstreamOfdmChannel({ plcLock: false }),
            downstreamOfdmChannel({ plcLock: false }),
          ]),
        ),
      ).toEqual({
        kind: 'empty',
        readingType: 'docsis_downstream_ofdm',
        reason: 'No eligible channels (2 listed)',
      });
    });
  });

  describe('aggregateUpstream', () => {
    it('should summarize the recorded page', () => {
      const { reading: upstream } = decodeUpstream(
        loadPageFixture('docsis_upstream'),
        TEST_TIMESTAMP,
      );

      expect(aggregateUpstream(upstream)).toEqual({
        kind: 'summary',
        summary: {
          timestamp: TEST_TIMESTAMP,
          numChannels: 3,
          signalStrengthMin: 43.75,
          signalStrengthMean: 44.5,
          signalStrengthMax: 45.5,
        },
      });
    });

    it('should keep channels without a level in the channel count', () => {
      expect(
        aggregateUpstream(
          reading([upstreamChannel({ signalStrength: null })]),
        ),
      ).toEqual({
        kind: 'summary',
        summary: {
          timestamp: TEST_TIMESTAMP,
          numChannels: 1,
          signalStrengthMin: null,
          signalStrengthMean: null,
          signalStrengthMax: null,
        },
      });
    });
  });

  describe('aggregateUpstreamOfdm', () => {
    it('should only count active channels', () => {
      const { reading: ofdm } = decodeUpstreamOfdm(
        loadPageFixture('docsis_upstream_ofdm'),
        TEST_TIMESTAMP,
      );

      expect(aggregateUpstreamOfdm(ofdm)).toEqual({
        kind: 'summary',
        summary: {
          timestamp: TEST_TIMESTAMP,
          numChannels: 1,
          lineDigitalAttenuationMin: 2.5,
          lineDigitalAttenuationMean: 2.5,
          lineDigitalAttenuationMax: 2.5,
          digitalAttenuationMin: 1.5,
          digitalAttenuationMean: 1.5,
          digitalAttenuationMax: 1.5,
          reportPowerMin: 38.5,
          reportPowerMean: 38.5,
          reportPowerMax: 38.5,
          reportPower1_6Min: 32.5,
          reportPower1_6Mean: 32.5,
          reportPower1_6Max: 32.5,
        },
      });
    });

    it('should report an empty aggregate when no channel is active', () => {
      expect(
        aggregateUpstreamOfdm(
          reading([
            upstreamOfdmChannel({ state: false }),
            upstreamOfdmChannel({ channelId: 1, state: false }),
          ]),
        ),
      ).toEqual({
        kind: 'empty',
        readingType: 'docsis_upstream_ofdm',
        reason: 'No eligible channels (2 listed)',
      });
    });
  });
});
