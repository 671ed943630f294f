import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database.module';
import { IdCountersService } from './id-counters.service';

@Module({
  imports: [DatabaseModule],
  providers: [IdCountersService],
  exports: [IdCountersService],
})
export class IdCountersModule {}
