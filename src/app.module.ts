import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnvironment } from './config/environment';
import { HealthController } from './health/health.controller';
import { ModemModule } from './modem/modem.module';
import { RecorderModule } from './recorder/recorder.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    ModemModule,
    RecorderModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
