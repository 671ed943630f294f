import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.validation';
import { PolicyModule } from './config/policy.module';
import { DatabaseModule } from './database.module';
import { AuthModule } from './auth/auth.module';
import { SchedulingModule } from './scheduling/scheduling.module';
import { IdCountersModule } from './id-counters/id-counters.module';
import { ReconciliationModule } from './reconciliation/reconciliation.module';
import { FlightsModule } from './flights/flights.module';
import { CrewModule } from './crew/crew.module';
import { AircraftModule } from './aircraft/aircraft.module';
import { BookingModule } from './booking/booking.module';
import { OrdersModule } from './orders/orders.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnv,
    }),
    PolicyModule,
    DatabaseModule,
    AuthModule,
    SchedulingModule,
    IdCountersModule,
    ReconciliationModule,
    FlightsModule,
    CrewModule,
    AircraftModule,
    BookingModule,
    OrdersModule,
  ],
})
export class AppModule {}
