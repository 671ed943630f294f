import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { and, asc, count, eq, gt, gte, inArray, isNotNull, lt, min, SQL } from 'drizzle-orm';
import { DRIZLE } from '../database.module';
import * as schema from '../db/schema';
import type { AuthenticatedUser } from '../typings/express';
import { SchedulingService } from '../scheduling/scheduling.service';
import { IdCountersService } from '../id-counters/id-counters.service';
import { formatId } from '../id-counters/id-format';
import { StatusSyncService } from '../reconciliation/status-sync.service';
import { ConstraintViolationException } from '../common/exceptions/constraint-violation.exception';
import { ConcurrencyConflictException } from '../common/exceptions/concurrency-conflict.exception';
import { centsToAmount, toCents } from '../scheduling/money';
import { computeArrival } from '../scheduling/time-window';
import { parseInstant } from '../flights/flights.service';
import { CustomersService } from './customers.service';
import { SeatInventoryService } from './seat-inventory.service';
import { CreateBookingDto } from './dto/create-booking.dto';
import { SearchFlightsQuery } from './dto/search-flights.query';

type Db = NodePgDatabase<typeof schema>;

const BOOKABLE: schema.FlightStatus[] = ['Active', 'Full-Occupied'];
const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class BookingService {
  private readonly logger = new Logger(BookingService.name);

  constructor(
    @Inject(DRIZLE) private readonly db: Db,
    private readonly scheduling: SchedulingService,
    private readonly customers: CustomersService,
    private readonly inventory: SeatInventoryService,
    private readonly idCounters: IdCountersService,
    private readonly statusSync: StatusSyncService,
  ) {}

  /** Future flights with at least one seat on sale. */
  async search(query: SearchFlightsQuery) {
    await this.statusSync.run();

    const where: SQL[] = [
      inArray(schema.flights.status, BOOKABLE),
      gt(schema.flights.departureAt, new Date()),
    ];
    if (query.origin) {
      where.push(eq(schema.flightRoutes.originCode, query.origin.toUpperCase()));
    }
    if (query.destination) {
      where.push(
        eq(schema.flightRoutes.destinationCode, query.destination.toUpperCase()),
      );
    }
    const day = query.date
      ? parseInstant(`${query.date.slice(0, 10)}T00:00:00Z`, 'date')
      : null;
    const byArrival = query.dateType === 'arr';
    if (day && !byArrival) {
      where.push(gte(schema.flights.departureAt, day));
      where.push(lt(schema.flights.departureAt, new Date(day.getTime() + DAY_MS)));
    }

    const rows = await this.db
      .select({
        id: schema.flights.id,
        status: schema.flights.status,
        departure: schema.flights.departureAt,
        origin: schema.flightRoutes.originCode,
        destination: schema.flightRoutes.destinationCode,
        durationMinutes: schema.flightRoutes.durationMinutes,
        availableSeats: count(schema.flightSeats.id),
        minPrice: min(schema.flightSeats.price),
      })
      .from(schema.flights)
      .innerJoin(schema.flightRoutes, eq(schema.flightRoutes.id, schema.flights.routeId))
      .innerJoin(
        schema.flightSeats,
        and(
          eq(schema.flightSeats.flightId, schema.flights.id),
          eq(schema.flightSeats.status, 'Available'),
          isNotNull(schema.flightSeats.price),
        ),
      )
      .where(and(...where))
      .groupBy(schema.flights.id, schema.flightRoutes.id)
      .orderBy(asc(schema.flights.departureAt));

    return rows
      .map(({ minPrice, ...r }) => ({
        ...r,
        arrival: computeArrival(r.departure, r.durationMinutes),
        minPrice: minPrice === null ? null : centsToAmount(toCents(minPrice)),
      }))
      .filter(
        (r) =>
          !day ||
          !byArrival ||
          (r.arrival >= day && r.arrival.getTime() < day.getTime() + DAY_MS),
      );
  }

  async availableSeats(flightId: string) {
    const flight = await this.scheduling.findFlight(flightId);
    if (!flight) throw new NotFoundException(`Flight ${flightId} not found`);

    const seats = await this.db
      .select({
        flightSeatId: schema.flightSeats.id,
        row: schema.seats.rowNum,
        col: schema.seats.colNum,
        seatClass: schema.seats.seatClass,
        price: schema.flightSeats.price,
      })
      .from(schema.flightSeats)
      .innerJoin(schema.seats, eq(schema.seats.id, schema.flightSeats.seatId))
      .where(
        and(
          eq(schema.flightSeats.flightId, flightId),
          eq(schema.flightSeats.status, 'Available'),
          isNotNull(schema.flightSeats.price),
        ),
      )
      .orderBy(asc(schema.seats.rowNum), asc(schema.seats.colNum));

    return {
      flightId,
      status: flight.status,
      departure: flight.departure,
      arrival: flight.arrival,
      origin: flight.route.origin,
      destination: flight.route.destination,
      seats: seats.map((s) => ({ ...s, price: s.price === null ? null : Number(s.price) })),
    };
  }

  /**
   * Places an order. Seats are claimed compare-and-set before anything else is
   * written, so of two buyers racing for one seat exactly one wins.
   */
  async confirmBooking(dto: CreateBookingDto, user?: AuthenticatedUser) {
    const seatIds = [...new Set(dto.seatIds)];
    if (seatIds.length !== dto.seatIds.length) {
      throw new BadRequestException('Duplicate seats in selection');
    }

    return this.db.transaction(async (tx) => {
      const customer = await this.customers.resolve(dto.guest, user, tx);
      const now = new Date();

      const flight = await this.inventory.lockBookableFlight(dto.flightId, tx);
      if (!flight) throw new NotFoundException(`Flight ${dto.flightId} not found`);
      if (!BOOKABLE.includes(flight.status) || flight.departure <= now) {
        throw new ConstraintViolationException(`Flight ${flight.id} is not open for booking`);
      }

      const claimed = await this.inventory.claimSeats(flight.id, seatIds, tx);
      if (claimed.length !== seatIds.length) {
        this.logger.warn(
          `Seat claim on ${flight.id} got ${claimed.length}/${seatIds.length}; rolling back`,
        );
        throw new ConcurrencyConflictException('SEAT_TAKEN', 'Seat taken, please reselect');
      }

      const orderCode = formatId('Order', await this.idCounters.reserve('Order', 1, tx));
      await this.inventory.createOrder(
        {
          code: orderCode,
          flightId: flight.id,
          customerEmail: customer.email,
          customerType: customer.customerType,
          orderedAt: now,
        },
        claimed,
        tx,
      );
      await this.statusSync.reconcile(tx, flight.id);

      const totalCents = claimed.reduce((sum, s) => sum + toCents(s.price), 0);
      this.logger.log(
        `Order ${orderCode}: ${claimed.length} seat(s) on ${flight.id} for ${customer.email}`,
      );
      return {
        orderCode,
        flightId: flight.id,
        customerEmail: customer.email,
        customerType: customer.customerType,
        seats: claimed.map((s) => ({ flightSeatId: s.flightSeatId, price: Number(s.price) })),
        total: centsToAmount(totalCents),
      };
    });
  }
}
