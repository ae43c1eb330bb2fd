import {
  BadGatewayException,
  BadRequestException,
  Controller,
  Get,
  Logger,
  Param,
  UseInterceptors,
} from '@nestjs/common';
import {
  AggregateResult,
  DocsisStatistics,
  FlattenedStatistics,
  isReadingType,
  LinkStatusRecord,
  Reading,
  READING_TYPES,
  ReadingType,
  SchemaMismatchError,
  SystemInfoRecord,
} from '../docsis';
import { BigIntSerializerInterceptor } from '../common/interceptors/bigint-serializer.interceptor';
import { ModemRequestError } from './interfaces/modem-driver.interface';
import {
  CHANNEL_READING_TYPES,
  isChannelReadingType,
  ModemService,
} from './modem.service';

/**
 * ModemController
 *
 * Read-only view of the modem's diagnostics. Every request polls the modem.
 *
 * Endpoints:
 * - GET /modem/system-info - Hardware and firmware details
 * - GET /modem/link-status - Ethernet link state
 * - GET /modem/docsis/statistics - Provisioning, overview and channel lists
 * - GET /modem/docsis/statistics/flattened - One summary row
 * - GET /modem/docsis/:readingType - Any single reading
 * - GET /modem/docsis/:readingType/summary - Aggregate of a channel reading
 *
 * Nanosecond timestamps are returned as decimal strings.
 */
@Controller('modem')
@UseInterceptors(BigIntSerializerInterceptor)
export class ModemController {
  private readonly logger = new Logger(ModemController.name);

  constructor(private readonly modemService: ModemService) {}

  @Get('system-info')
  getSystemInfo(): Promise<Reading<SystemInfoRecord>> {
    return this.relay(() => this.modemService.getSystemInfo());
  }

  @Get('link-status')
  getLinkStatus(): Promise<Reading<LinkStatusRecord>> {
    return this.relay(() => this.modemService.getLinkStatus());
  }

  @Get('docsis/statistics')
  getDocsisStatistics(): Promise<DocsisStatistics> {
    return this.relay(() => this.modemService.getDocsisStatistics());
  }

  /**
   * @example
   * GET /modem/docsis/statistics/flattened
   * Response: { timestamp: "2026-01-05T10:00:00+01:00", down_signal_min: "3.100", ... }
   */
  @Get('docsis/statistics/flattened')
  getFlattenedStatistics(): Promise<FlattenedStatistics> {
    return this.relay(() => this.modemService.getFlattenedStatistics());
  }

  @Get('docsis/:readingType')
  getReading(
    @Param('readingType') readingType: string,
  ): Promise<Reading<unknown>> {
    const type = this.parseReadingType(readingType);
    return this.relay(() => this.modemService.getReading(type));
  }

  /**
   * Aggregate of one channel reading. A reading with no eligible channels
   * answers `{ kind: "empty", reason }` rather than an error.
   */
  @Get('docsis/:readingType/summary')
  getSummary(
    @Param('readingType') readingType: string,
  ): Promise<AggregateResult<unknown>> {
    if (!isChannelReadingType(readingType)) {
      throw new BadRequestException(
        `No summary for "${readingType}". Expected one of: ${CHANNEL_READING_TYPES.join(', ')}`,
      );
    }
    return this.relay(() => this.modemService.getChannelSummary(readingType));
  }

  private parseReadingType(value: string): ReadingType {
    if (!isReadingType(value)) {
      throw new BadRequestException(
        `Unknown reading type "${value}". Expected one of: ${READING_TYPES.join(', ')}`,
      );
    }
    return value;
  }

  /**
   * Map modem-side failures to 502; anything else propagates.
   */
  private async relay<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (
        error instanceof ModemRequestError ||
        error instanceof SchemaMismatchError
      ) {
        this.logger.error(error.message);
        throw new BadGatewayException(error.message, { cause: error });
      }
      throw error;
    }
  }
}
