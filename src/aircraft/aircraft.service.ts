import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { count, eq } from 'drizzle-orm';
import { DRIZLE } from '../database.module';
import * as schema from '../db/schema';
import { SchedulingService } from '../scheduling/scheduling.service';
import { IdCountersService } from '../id-counters/id-counters.service';
import { formatAircraftId, idRange } from '../id-counters/id-format';
import { ConstraintViolationException } from '../common/exceptions/constraint-violation.exception';
import { buildSeatLayout } from './seat-layout';
import { CreateAircraftDto } from './dto/create-aircraft.dto';
import { ConfigureSeatsDto } from './dto/configure-seats.dto';

@Injectable()
export class AircraftService {
  private readonly logger = new Logger(AircraftService.name);

  constructor(
    @Inject(DRIZLE) private readonly db: NodePgDatabase<typeof schema>,
    private readonly scheduling: SchedulingService,
    private readonly idCounters: IdCountersService,
  ) {}

  listFleet() {
    return this.scheduling.listAircraft();
  }

  async createAircraft(dto: CreateAircraftDto) {
    return this.db.transaction(async (tx) => {
      const num = await this.idCounters.reserve('Aircraft', 1, tx);
      const [created] = await tx
        .insert(schema.aircraft)
        .values({
          id: formatAircraftId(dto.manufacturer, num),
          manufacturer: dto.manufacturer,
          model: dto.model,
          size: dto.size,
        })
        .returning();
      this.logger.log(`Registered aircraft ${created.id} (${dto.manufacturer} ${dto.model})`);
      return { ...created, seatCount: 0 };
    });
  }

  /** Replaces the seat template. Only allowed before the aircraft is scheduled. */
  async configureSeats(aircraftId: string, dto: ConfigureSeatsDto) {
    return this.db.transaction(async (tx) => {
      const craft = await this.scheduling.findAircraft(aircraftId, tx, true);
      if (!craft) throw new NotFoundException(`Aircraft ${aircraftId} not found`);

      const [scheduled] = await tx
        .select({ n: count() })
        .from(schema.flights)
        .where(eq(schema.flights.aircraftId, aircraftId));
      if (scheduled && scheduled.n > 0) {
        throw new ConstraintViolationException(
          `Aircraft ${aircraftId} already has flights; its seats are fixed`,
        );
      }

      const layout = buildSeatLayout(craft.size, dto);
      if (!layout.ok) {
        throw new ConstraintViolationException('Invalid seat layout', layout.violations);
      }

      await tx.delete(schema.seats).where(eq(schema.seats.aircraftId, aircraftId));
      const ids = idRange(
        'Seat',
        await this.idCounters.reserve('Seat', layout.seats.length, tx),
        layout.seats.length,
      );
      await tx
        .insert(schema.seats)
        .values(layout.seats.map((seat, i) => ({ id: ids[i], aircraftId, ...seat })));

      const business = layout.seats.filter((s) => s.seatClass === 'Business').length;
      this.logger.log(
        `Configured ${layout.seats.length} seats on ${aircraftId} (${business} business)`,
      );
      return {
        aircraftId,
        seatCount: layout.seats.length,
        business,
        economy: layout.seats.length - business,
      };
    });
  }
}
