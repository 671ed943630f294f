import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database.module';
import { SchedulingModule } from '../scheduling/scheduling.module';
import { IdCountersModule } from '../id-counters/id-counters.module';
import { ReconciliationModule } from '../reconciliation/reconciliation.module';
import { BookingController } from './booking.controller';
import { BookingService } from './booking.service';
import { CustomersService } from './customers.service';
import { SeatInventoryService } from './seat-inventory.service';

@Module({
  imports: [DatabaseModule, SchedulingModule, IdCountersModule, ReconciliationModule],
  controllers: [BookingController],
  providers: [BookingService, CustomersService, SeatInventoryService],
  exports: [SeatInventoryService],
})
export class BookingModule {}
