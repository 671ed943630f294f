import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { and, asc, eq, inArray, ne } from 'drizzle-orm';
import { DRIZLE } from '../database.module';
import * as schema from '../db/schema';
import { SchedulingService } from '../scheduling/scheduling.service';
import { StatusSyncService } from '../reconciliation/status-sync.service';
import { ConstraintViolationException } from '../common/exceptions/constraint-violation.exception';
import { formatCents, toCents } from '../scheduling/money';
import { UpdateFlightSeatsDto } from './dto/update-flight-seats.dto';

type Db = NodePgDatabase<typeof schema>;

@Injectable()
export class FlightSeatsService {
  private readonly logger = new Logger(FlightSeatsService.name);

  constructor(
    @Inject(DRIZLE) private readonly db: Db,
    private readonly scheduling: SchedulingService,
    private readonly statusSync: StatusSyncService,
  ) {}

  async getSeats(flightId: string, tx: Db = this.db) {
    const flight = await this.scheduling.findFlight(flightId, tx);
    if (!flight) throw new NotFoundException(`Flight ${flightId} not found`);

    const seats = await tx
      .select({
        flightSeatId: schema.flightSeats.id,
        seatId: schema.seats.id,
        row: schema.seats.rowNum,
        col: schema.seats.colNum,
        seatClass: schema.seats.seatClass,
        price: schema.flightSeats.price,
        status: schema.flightSeats.status,
      })
      .from(schema.flightSeats)
      .innerJoin(schema.seats, eq(schema.seats.id, schema.flightSeats.seatId))
      .where(eq(schema.flightSeats.flightId, flightId))
      .orderBy(asc(schema.seats.rowNum), asc(schema.seats.colNum));

    return {
      flightId,
      editable: this.isEditable(flight.status, flight.departure),
      seats: seats.map((s) => ({ ...s, price: s.price === null ? null : Number(s.price) })),
    };
  }

  /** Class prices apply to every unsold seat of the class; status toggles never touch sold seats. */
  async updateSeats(flightId: string, dto: UpdateFlightSeatsDto) {
    return this.db.transaction(async (tx) => {
      const flight = await this.scheduling.findFlight(flightId, tx, true);
      if (!flight) throw new NotFoundException(`Flight ${flightId} not found`);
      if (!this.isEditable(flight.status, flight.departure)) {
        throw new ConstraintViolationException(
          `Seats of flight ${flightId} can no longer be changed`,
        );
      }

      for (const seatClass of schema.seatClassEnum.enumValues) {
        const price = dto.classPrices?.[seatClass];
        if (price === undefined) continue;
        const classSeatIds = tx
          .select({ id: schema.seats.id })
          .from(schema.seats)
          .where(eq(schema.seats.seatClass, seatClass));
        await tx
          .update(schema.flightSeats)
          .set({ price: formatCents(toCents(price)) })
          .where(
            and(
              eq(schema.flightSeats.flightId, flightId),
              ne(schema.flightSeats.status, 'Sold'),
              inArray(schema.flightSeats.seatId, classSeatIds),
            ),
          );
      }

      const changes = dto.seatStatuses ?? [];
      const skipped: string[] = [];
      for (const change of changes) {
        const updated = await tx
          .update(schema.flightSeats)
          .set({ status: change.status })
          .where(
            and(
              eq(schema.flightSeats.id, change.flightSeatId),
              eq(schema.flightSeats.flightId, flightId),
              ne(schema.flightSeats.status, 'Sold'),
            ),
          )
          .returning({ id: schema.flightSeats.id });
        if (updated.length === 0) skipped.push(change.flightSeatId);
      }
      if (skipped.length > 0) {
        throw new ConstraintViolationException(
          'Some seats are sold or do not belong to this flight',
          skipped.map((id) => `Seat ${id} cannot be changed`),
        );
      }

      await this.statusSync.reconcile(tx, flightId);
      this.logger.log(
        `Updated seats of ${flightId}: ${changes.length} status change(s), prices ${JSON.stringify(dto.classPrices ?? {})}`,
      );
      return this.getSeats(flightId, tx);
    });
  }

  private isEditable(status: schema.FlightStatus, departure: Date): boolean {
    return (
      status !== 'Cancelled' &&
      status !== 'Completed' &&
      departure.getTime() > Date.now()
    );
  }
}
