import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database.module';
import { BookingModule } from '../booking/booking.module';
import { ReconciliationModule } from '../reconciliation/reconciliation.module';
import { OrdersService } from './orders.service';
import { OrdersController } from './orders.controller';
import { ManagerOrdersController } from './manager-orders.controller';

@Module({
  imports: [DatabaseModule, BookingModule, ReconciliationModule],
  providers: [OrdersService],
  controllers: [OrdersController, ManagerOrdersController],
})
export class OrdersModule {}
