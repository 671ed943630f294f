import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database.module';
import { SchedulingService } from './scheduling.service';

@Module({
  imports: [DatabaseModule],
  providers: [SchedulingService],
  exports: [SchedulingService],
})
export class SchedulingModule {}
