import { Inject, Injectable } from '@nestjs/common';
import { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { and, eq, inArray, isNotNull } from 'drizzle-orm';
import { DRIZLE } from '../database.module';
import * as schema from '../db/schema';
import { currentClassPriceCents } from '../scheduling/seat-pricing';
import { formatCents, toCents } from '../scheduling/money';

type Db = NodePgDatabase<typeof schema>;

export interface BookableFlight {
  id: string;
  status: schema.FlightStatus;
  departure: Date;
}

export interface ClaimedSeat {
  flightSeatId: string;
  price: string;
}

export interface NewOrder {
  code: string;
  flightId: string;
  customerEmail: string;
  customerType: schema.CustomerType;
  orderedAt: Date;
}

export interface LockedOrder {
  code: string;
  status: schema.OrderStatus;
  flightId: string;
  customerEmail: string;
  departure: Date;
}

export interface OrderTicket {
  flightSeatId: string;
  paidPrice: string;
}

/** Row-level seat and order writes shared by booking and cancellation. */
@Injectable()
export class SeatInventoryService {
  constructor(@Inject(DRIZLE) private readonly db: Db) {}

  async lockBookableFlight(
    flightId: string,
    tx: Db = this.db,
  ): Promise<BookableFlight | null> {
    const [flight] = await tx
      .select({
        id: schema.flights.id,
        status: schema.flights.status,
        departure: schema.flights.departureAt,
      })
      .from(schema.flights)
      .where(eq(schema.flights.id, flightId))
      .for('update');
    return flight ?? null;
  }

  /** Available -> Sold for the seats that are still free; the caller compares counts. */
  async claimSeats(
    flightId: string,
    flightSeatIds: string[],
    tx: Db = this.db,
  ): Promise<ClaimedSeat[]> {
    if (flightSeatIds.length === 0) return [];
    const rows = await tx
      .update(schema.flightSeats)
      .set({ status: 'Sold' })
      .where(
        and(
          eq(schema.flightSeats.flightId, flightId),
          inArray(schema.flightSeats.id, flightSeatIds),
          eq(schema.flightSeats.status, 'Available'),
          isNotNull(schema.flightSeats.price),
        ),
      )
      .returning({ flightSeatId: schema.flightSeats.id, price: schema.flightSeats.price });
    return rows.flatMap((r) =>
      r.price === null ? [] : [{ flightSeatId: r.flightSeatId, price: r.price }],
    );
  }

  async createOrder(order: NewOrder, seats: ClaimedSeat[], tx: Db = this.db): Promise<void> {
    await tx.insert(schema.orders).values({ ...order, status: 'Active' });
    await tx.insert(schema.tickets).values(
      seats.map((s) => ({
        orderCode: order.code,
        flightSeatId: s.flightSeatId,
        paidPrice: s.price,
      })),
    );
  }

  async lockOrder(orderCode: string, tx: Db = this.db): Promise<LockedOrder | null> {
    const [order] = await tx
      .select({
        code: schema.orders.code,
        status: schema.orders.status,
        flightId: schema.orders.flightId,
        customerEmail: schema.orders.customerEmail,
        departure: schema.flights.departureAt,
      })
      .from(schema.orders)
      .innerJoin(schema.flights, eq(schema.flights.id, schema.orders.flightId))
      .where(eq(schema.orders.code, orderCode))
      .for('update', { of: [schema.flights, schema.orders] });
    return order ?? null;
  }

  orderTickets(orderCode: string, tx: Db = this.db): Promise<OrderTicket[]> {
    return tx
      .select({
        flightSeatId: schema.tickets.flightSeatId,
        paidPrice: schema.tickets.paidPrice,
      })
      .from(schema.tickets)
      .where(eq(schema.tickets.orderCode, orderCode));
  }

  /**
   * Puts sold seats back on sale at the current price of their class.
   * Returns how many seats were released.
   */
  async releaseSeats(
    flightId: string,
    flightSeatIds: string[],
    tx: Db = this.db,
  ): Promise<number> {
    if (flightSeatIds.length === 0) return 0;
    const seats = await tx
      .select({
        flightSeatId: schema.flightSeats.id,
        seatClass: schema.seats.seatClass,
        status: schema.flightSeats.status,
        price: schema.flightSeats.price,
      })
      .from(schema.flightSeats)
      .innerJoin(schema.seats, eq(schema.seats.id, schema.flightSeats.seatId))
      .where(eq(schema.flightSeats.flightId, flightId));

    const priced = seats.map((s) => ({
      flightSeatId: s.flightSeatId,
      seatClass: s.seatClass,
      status: s.status,
      priceCents: s.price === null ? null : toCents(s.price),
    }));
    const others = priced.filter((s) => !flightSeatIds.includes(s.flightSeatId));

    let released = 0;
    for (const seat of priced) {
      if (!flightSeatIds.includes(seat.flightSeatId)) continue;
      const cents = currentClassPriceCents(others, seat.seatClass) ?? seat.priceCents;
      const rows = await tx
        .update(schema.flightSeats)
        .set({ status: 'Available', price: cents === null ? null : formatCents(cents) })
        .where(
          and(
            eq(schema.flightSeats.id, seat.flightSeatId),
            eq(schema.flightSeats.status, 'Sold'),
          ),
        )
        .returning({ id: schema.flightSeats.id });
      released += rows.length;
    }
    return released;
  }

  async setOrderStatus(
    orderCode: string,
    status: schema.OrderStatus,
    at: Date,
    tx: Db = this.db,
  ): Promise<void> {
    const cancelled = status === 'Cancelled-Customer' || status === 'Cancelled-System';
    await tx
      .update(schema.orders)
      .set({ status, cancelledAt: cancelled ? at : null })
      .where(eq(schema.orders.code, orderCode));
  }
}
