import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database.module';
import { SchedulingModule } from '../scheduling/scheduling.module';
import { IdCountersModule } from '../id-counters/id-counters.module';
import { AircraftController } from './aircraft.controller';
import { AircraftService } from './aircraft.service';

@Module({
  imports: [DatabaseModule, SchedulingModule, IdCountersModule],
  controllers: [AircraftController],
  providers: [AircraftService],
})
export class AircraftModule {}
