import {
  BadGatewayException,
  BadRequestException,
  Logger,
} from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ModemController } from './modem.controller';
import { ModemService } from './modem.service';
import { ModemRequestError } from './interfaces/modem-driver.interface';
import { SchemaMismatchError } from '../docsis';
import { TEST_TIMESTAMP } from '../../test/utils/fixtures';

describe('ModemController', () => {
  let controller: ModemController;

  const mockModemService = {
    getSystemInfo: jest.fn(),
    getLinkStatus: jest.fn(),
    getReading: jest.fn(),
    getChannelSummary: jest.fn(),
    getDocsisStatistics: jest.fn(),
    getFlattenedStatistics: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [ModemController],
      providers: [{ provide: ModemService, useValue: mockModemService }],
    }).compile();

    controller = module.get<ModemController>(ModemController);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('readings', () => {
    it('should return system info', async () => {
      const reading = { timestamp: TEST_TIMESTAMP, data: [] };
      mockModemService.getSystemInfo.mockResolvedValue(reading);

      await expect(controller.getSystemInfo()).resolves.toBe(reading);
    });

    it('should return link status', async () => {
      const reading = { timestamp: TEST_TIMESTAMP, data: [] };
      mockModemService.getLinkStatus.mockResolvedValue(reading);

      await expect(controller.getLinkStatus()).resolves.toBe(reading);
    });

    it('should fetch a reading by type', async () => {
      mockModemService.getReading.mockResolvedValue({
        timestamp: TEST_TIMESTAMP,
        data: [],
      });

      await controller.getReading('docsis_upstream_ofdm');

      expect(mockModemService.getReading).toHaveBeenCalledWith(
        'docsis_upstream_ofdm',
      );
    });

    it('should reject an unknown reading type', () => {
      expect(() => controller.getReading('docsis_events')).toThrow(
        BadRequestException,
      );
      expect(mockModemService.getReading).not.toHaveBeenCalled();
    });
  });

  describe('getSummary', () => {
    it('should summarize a channel reading', async () => {
      const empty = {
        kind: 'empty',
        readingType: 'docsis_downstream_ofdm',
        reason: 'No eligible channels (2 listed)',
      };
      mockModemService.getChannelSummary.mockResolvedValue(empty);

      await expect(
        controller.getSummary('docsis_downstream_ofdm'),
      ).resolves.toBe(empty);
      expect(mockModemService.getChannelSummary).toHaveBeenCalledWith(
        'docsis_downstream_ofdm',
      );
    });

    it('should reject reading types without channels', () => {
      expect(() => controller.getSummary('system_info')).toThrow(
        'No summary for "system_info". Expected one of: docsis_downstream, docsis_downstream_ofdm, docsis_upstream, docsis_upstream_ofdm',
      );
    });
  });

  describe('statistics', () => {
    it('should return the DOCSIS statistics', async () => {
      const statistics = { timestamp: TEST_TIMESTAMP };
      mockModemService.getDocsisStatistics.mockResolvedValue(statistics);

      await expect(controller.getDocsisStatistics()).resolves.toBe(statistics);
    });

    it('should return the flattened row', async () => {
      const row = { timestamp: '2026-01-04T10:00:00Z' };
      mockModemService.getFlattenedStatistics.mockResolvedValue(row);

      await expect(controller.getFlattenedStatistics()).resolves.toBe(row);
    });
  });

  describe('error mapping', () => {
    it('should answer 502 when the modem cannot be reached', async () => {
      mockModemService.getSystemInfo.mockRejectedValue(
        new ModemRequestError('http://192.0.2.1/data/getSysInfo.asp', 'down'),
      );

      const failure = controller.getSystemInfo();

      await expect(failure).rejects.toThrow(BadGatewayException);
      await expect(failure).rejects.toThrow(
        'down (http://192.0.2.1/data/getSysInfo.asp)',
      );
    });

    it('should answer 502 when the page changed shape', async () => {
      mockModemService.getDocsisStatistics.mockRejectedValue(
        new SchemaMismatchError('docsis_overview', 'Expected an array', {}),
      );

      await expect(controller.getDocsisStatistics()).rejects.toThrow(
        BadGatewayException,
      );
    });

    it('should let other errors through', async () => {
      const error = new Error('unexpected');
      mockModemService.getLinkStatus.mockRejectedValue(error);

      await expect(controller.getLinkStatus()).rejects.toBe(error);
    });
  });
});
