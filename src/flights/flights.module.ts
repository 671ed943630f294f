import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database.module';
import { SchedulingModule } from '../scheduling/scheduling.module';
import { IdCountersModule } from '../id-counters/id-counters.module';
import { ReconciliationModule } from '../reconciliation/reconciliation.module';
import { FlightsController } from './flights.controller';
import { FlightsService } from './flights.service';
import { FlightSeatsService } from './flight-seats.service';

@Module({
  imports: [DatabaseModule, SchedulingModule, IdCountersModule, ReconciliationModule],
  controllers: [FlightsController],
  providers: [FlightsService, FlightSeatsService],
  exports: [FlightsService],
})
export class FlightsModule {}
