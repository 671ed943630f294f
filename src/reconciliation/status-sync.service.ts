import { Inject, Injectable, Logger } from '@nestjs/common';
import { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { and, asc, count, eq, inArray, ne } from 'drizzle-orm';
import { DRIZLE } from '../database.module';
import * as schema from '../db/schema';
import { OPERATIONS_POLICY, OperationsPolicy } from '../config/operations-policy';
import type { FlightSnapshot, StatusChanges } from '../scheduling/scheduling.types';
import { countChanges, reconcileFlight } from '../scheduling/status-reconciliation';
import { computeArrival } from '../scheduling/time-window';

type Db = NodePgDatabase<typeof schema>;

function groupBy<T, K>(items: T[], key: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const k = key(item);
    const list = groups.get(k) ?? [];
    list.push(item);
    groups.set(k, list);
  }
  return groups;
}

/**
 * Persists what the reconciler decides. Runs in the caller's transaction so
 * a booking, cancellation or edit and its status fallout commit together.
 */
@Injectable()
export class StatusSyncService {
  private readonly logger = new Logger(StatusSyncService.name);

  constructor(
    @Inject(DRIZLE) private readonly db: Db,
    @Inject(OPERATIONS_POLICY) private readonly policy: OperationsPolicy,
  ) {}

  /** Reconciles one flight, or every flight that may be out of date. Returns the number of changes written. */
  async reconcile(tx: Db = this.db, flightId?: string): Promise<number> {
    const ids = flightId ? [flightId] : await this.flightsNeedingSync(tx);
    return this.reconcileFlights(tx, ids);
  }

  /** Standalone run in its own transaction. */
  async run(flightId?: string): Promise<number> {
    return this.db.transaction((tx) => this.reconcile(tx, flightId));
  }

  async reconcileFlights(tx: Db, flightIds: string[]): Promise<number> {
    const ids = [...new Set(flightIds)];
    if (ids.length === 0) return 0;

    const now = new Date();
    const snapshots = await this.loadSnapshots(tx, ids);
    let total = 0;
    for (const snapshot of snapshots) {
      const changes = reconcileFlight(snapshot, now, this.policy.orderCompletionHours);
      const n = countChanges(changes);
      if (n === 0) continue;
      await this.applyChanges(tx, snapshot, changes);
      total += n;
    }
    if (total > 0) {
      this.logger.log(`Reconciled ${snapshots.length} flight(s): ${total} change(s)`);
    }
    return total;
  }

  private async flightsNeedingSync(tx: Db): Promise<string[]> {
    const open = await tx
      .select({ id: schema.flights.id })
      .from(schema.flights)
      .where(inArray(schema.flights.status, ['Active', 'Full-Occupied']));
    const withActiveOrders = await tx
      .selectDistinct({ id: schema.orders.flightId })
      .from(schema.orders)
      .where(eq(schema.orders.status, 'Active'));
    const cancelledWithPilots = await tx
      .selectDistinct({ id: schema.flightCrewPilots.flightId })
      .from(schema.flightCrewPilots)
      .innerJoin(schema.flights, eq(schema.flights.id, schema.flightCrewPilots.flightId))
      .where(eq(schema.flights.status, 'Cancelled'));
    const cancelledWithAttendants = await tx
      .selectDistinct({ id: schema.flightCrewAttendants.flightId })
      .from(schema.flightCrewAttendants)
      .innerJoin(
        schema.flights,
        eq(schema.flights.id, schema.flightCrewAttendants.flightId),
      )
      .where(eq(schema.flights.status, 'Cancelled'));
    const cancelledWithOpenSeats = await tx
      .selectDistinct({ id: schema.flightSeats.flightId })
      .from(schema.flightSeats)
      .innerJoin(schema.flights, eq(schema.flights.id, schema.flightSeats.flightId))
      .where(
        and(
          eq(schema.flights.status, 'Cancelled'),
          ne(schema.flightSeats.status, 'Blocked'),
        ),
      );

    return [
      ...open,
      ...withActiveOrders,
      ...cancelledWithPilots,
      ...cancelledWithAttendants,
      ...cancelledWithOpenSeats,
    ].map((r) => r.id);
  }

  /** Locks the flight rows first; writers take the flight lock before touching its seats or orders. */
  async loadSnapshots(tx: Db, ids: string[]): Promise<FlightSnapshot[]> {
    const flights = await tx
      .select({
        id: schema.flights.id,
        status: schema.flights.status,
        departure: schema.flights.departureAt,
        durationMinutes: schema.flightRoutes.durationMinutes,
      })
      .from(schema.flights)
      .innerJoin(schema.flightRoutes, eq(schema.flightRoutes.id, schema.flights.routeId))
      .where(inArray(schema.flights.id, ids))
      .orderBy(asc(schema.flights.id))
      .for('update', { of: schema.flights });

    const seats = await tx
      .select({
        id: schema.flightSeats.id,
        flightId: schema.flightSeats.flightId,
        status: schema.flightSeats.status,
      })
      .from(schema.flightSeats)
      .where(inArray(schema.flightSeats.flightId, ids));

    const orders = await tx
      .select({
        code: schema.orders.code,
        flightId: schema.orders.flightId,
        status: schema.orders.status,
        cancelledAt: schema.orders.cancelledAt,
      })
      .from(schema.orders)
      .where(inArray(schema.orders.flightId, ids));

    const tickets = await tx
      .select({
        flightSeatId: schema.tickets.flightSeatId,
        orderCode: schema.tickets.orderCode,
        flightId: schema.flightSeats.flightId,
      })
      .from(schema.tickets)
      .innerJoin(schema.flightSeats, eq(schema.flightSeats.id, schema.tickets.flightSeatId))
      .where(inArray(schema.flightSeats.flightId, ids));

    const pilotCounts = await tx
      .select({ flightId: schema.flightCrewPilots.flightId, n: count() })
      .from(schema.flightCrewPilots)
      .where(inArray(schema.flightCrewPilots.flightId, ids))
      .groupBy(schema.flightCrewPilots.flightId);
    const attendantCounts = await tx
      .select({ flightId: schema.flightCrewAttendants.flightId, n: count() })
      .from(schema.flightCrewAttendants)
      .where(inArray(schema.flightCrewAttendants.flightId, ids))
      .groupBy(schema.flightCrewAttendants.flightId);

    const seatsBy = groupBy(seats, (s) => s.flightId);
    const ordersBy = groupBy(orders, (o) => o.flightId);
    const ticketsBy = groupBy(tickets, (t) => t.flightId);
    const crew = new Map<string, number>();
    for (const c of [...pilotCounts, ...attendantCounts]) {
      crew.set(c.flightId, (crew.get(c.flightId) ?? 0) + c.n);
    }

    return flights.map((f) => ({
      id: f.id,
      status: f.status,
      departure: f.departure,
      arrival: computeArrival(f.departure, f.durationMinutes),
      seats: (seatsBy.get(f.id) ?? []).map(({ id, status }) => ({ id, status })),
      orders: (ordersBy.get(f.id) ?? []).map(({ code, status, cancelledAt }) => ({
        code,
        status,
        cancelledAt,
      })),
      tickets: (ticketsBy.get(f.id) ?? []).map(({ flightSeatId, orderCode }) => ({
        flightSeatId,
        orderCode,
      })),
      crewCount: crew.get(f.id) ?? 0,
    }));
  }

  /**
   * Writes are guarded by the status each row had in the snapshot, so a row
   * another transaction moved in the meantime is left alone.
   */
  private async applyChanges(
    tx: Db,
    snapshot: FlightSnapshot,
    changes: StatusChanges,
  ): Promise<void> {
    const orderWas = new Map(snapshot.orders.map((o) => [o.code, o.status]));
    const orderGroups = groupBy(changes.orders, (o) => `${orderWas.get(o.code)}>${o.status}`);
    for (const orders of orderGroups.values()) {
      const [first] = orders;
      const previous = orderWas.get(first.code);
      if (!previous) continue;
      await tx
        .update(schema.orders)
        .set(
          first.cancelledAt
            ? { status: first.status, cancelledAt: first.cancelledAt }
            : { status: first.status },
        )
        .where(
          and(
            inArray(
              schema.orders.code,
              orders.map((o) => o.code),
            ),
            eq(schema.orders.status, previous),
          ),
        );
    }

    const seatWas = new Map(snapshot.seats.map((s) => [s.id, s.status]));
    const seatGroups = groupBy(changes.seats, (s) => `${seatWas.get(s.id)}>${s.status}`);
    for (const seats of seatGroups.values()) {
      const [first] = seats;
      const previous = seatWas.get(first.id);
      if (!previous) continue;
      await tx
        .update(schema.flightSeats)
        .set({ status: first.status })
        .where(
          and(
            inArray(
              schema.flightSeats.id,
              seats.map((s) => s.id),
            ),
            eq(schema.flightSeats.status, previous),
          ),
        );
    }

    if (changes.flightStatus) {
      await tx
        .update(schema.flights)
        .set({ status: changes.flightStatus })
        .where(
          and(
            eq(schema.flights.id, changes.flightId),
            eq(schema.flights.status, snapshot.status),
          ),
        );
    }

    if (changes.clearCrew) {
      await tx
        .delete(schema.flightCrewPilots)
        .where(eq(schema.flightCrewPilots.flightId, changes.flightId));
      await tx
        .delete(schema.flightCrewAttendants)
        .where(eq(schema.flightCrewAttendants.flightId, changes.flightId));
    }
  }
}
