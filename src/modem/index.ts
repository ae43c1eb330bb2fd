// Re-export public API
export { ModemModule } from './modem.module';
export {
  ModemService,
  CHANNEL_READING_TYPES,
  isChannelReadingType,
} from './modem.service';
export type { ChannelReadingType } from './modem.service';
export {
  HitronCoda45Driver,
  HITRON_CODA45_PAGES,
} from './drivers/hitron-coda45.driver';
export {
  MODEM_DRIVER,
  ModemRequestError,
} from './interfaces/modem-driver.interface';
export type {
  ModemDriver,
  DocsisModemDriver,
} from './interfaces/modem-driver.interface';
