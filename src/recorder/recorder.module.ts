import { Module } from '@nestjs/common';
import { ModemModule } from '../modem/modem.module';
import { RecorderService } from './recorder.service';

@Module({
  imports: [ModemModule],
  providers: [RecorderService],
  exports: [RecorderService],
})
export class RecorderModule {}
