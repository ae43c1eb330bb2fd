import { Module } from '@nestjs/common';
import { HitronCoda45Driver } from './drivers/hitron-coda45.driver';
import { MODEM_DRIVER } from './interfaces/modem-driver.interface';
import { ModemController } from './modem.controller';
import { ModemService } from './modem.service';

/**
 * ModemModule
 *
 * Components:
 * - HitronCoda45Driver: HTTP client for the CODA-45 diagnostic pages,
 *   bound to the MODEM_DRIVER token
 * - ModemService: decoding, aggregation and composition of readings
 * - ModemController: REST API under /modem
 *
 * Another modem model plugs in by binding its driver to MODEM_DRIVER.
 */
@Module({
  controllers: [ModemController],
  providers: [
    ModemService,
    { provide: MODEM_DRIVER, useClass: HitronCoda45Driver },
  ],
  exports: [ModemService],
})
export class ModemModule {}
