import type { FlightSeatStatus, FlightStatus, OrderStatus } from '../db/schema';
import type { FlightSnapshot, StatusChanges } from './scheduling.types';
import { hoursUntil } from './time-window';

const LIVE_ORDER_STATUSES: readonly OrderStatus[] = ['Active', 'Completed'];
const TERMINAL_FLIGHT_STATUSES: readonly FlightStatus[] = ['Cancelled', 'Completed'];

/**
 * Brings order, seat and flight statuses of one flight in line with its
 * ticket/order graph. Applying the result and running again yields no changes.
 */
export function reconcileFlight(
  flight: FlightSnapshot,
  now: Date,
  orderCompletionHours: number,
): StatusChanges {
  const changes: StatusChanges = {
    flightId: flight.id,
    seats: [],
    orders: [],
    clearCrew: false,
  };

  // orders
  const orderStatus = new Map<string, OrderStatus>();
  const closeToDeparture = hoursUntil(flight.departure, now) <= orderCompletionHours;
  for (const order of flight.orders) {
    let next = order.status;
    if (order.status === 'Active' && flight.status === 'Cancelled') {
      next = 'Cancelled-System';
      changes.orders.push({ code: order.code, status: next, cancelledAt: now });
    } else if (order.status === 'Active' && closeToDeparture) {
      next = 'Completed';
      changes.orders.push({ code: order.code, status: next });
    }
    orderStatus.set(order.code, next);
  }

  // seats
  const seatStatus = new Map<string, FlightSeatStatus>();
  for (const seat of flight.seats) {
    const held = flight.tickets
      .filter((t) => t.flightSeatId === seat.id)
      .map((t) => orderStatus.get(t.orderCode));
    const live = held.some((s) => s !== undefined && LIVE_ORDER_STATUSES.includes(s));
    const systemCancelled = held.includes('Cancelled-System');

    let next = seat.status;
    if (flight.status === 'Cancelled') {
      next = 'Blocked';
    } else if (seat.status === 'Available' && live) {
      next = 'Sold';
    } else if (seat.status === 'Available' && systemCancelled) {
      next = 'Blocked';
    } else if (seat.status === 'Sold' && !live) {
      next = systemCancelled ? 'Blocked' : 'Available';
    }
    if (next !== seat.status) changes.seats.push({ id: seat.id, status: next });
    seatStatus.set(seat.id, next);
  }

  // flight
  if (!TERMINAL_FLIGHT_STATUSES.includes(flight.status)) {
    let next: FlightStatus;
    if (flight.arrival.getTime() <= now.getTime()) {
      next = 'Completed';
    } else {
      const full =
        flight.seats.length > 0 &&
        ![...seatStatus.values()].includes('Available');
      next = full ? 'Full-Occupied' : 'Active';
    }
    if (next !== flight.status) changes.flightStatus = next;
  }

  changes.clearCrew =
    (changes.flightStatus ?? flight.status) === 'Cancelled' && flight.crewCount > 0;

  return changes;
}

export function countChanges(changes: StatusChanges): number {
  return (
    changes.seats.length +
    changes.orders.length +
    (changes.flightStatus ? 1 : 0) +
    (changes.clearCrew ? 1 : 0)
  );
}

export function applyStatusChanges(
  flight: FlightSnapshot,
  changes: StatusChanges,
): FlightSnapshot {
  const seats = new Map(changes.seats.map((s) => [s.id, s.status]));
  const orders = new Map(changes.orders.map((o) => [o.code, o]));
  return {
    ...flight,
    status: changes.flightStatus ?? flight.status,
    seats: flight.seats.map((s) => ({ ...s, status: seats.get(s.id) ?? s.status })),
    orders: flight.orders.map((o) => {
      const change = orders.get(o.code);
      if (!change) return o;
      return {
        ...o,
        status: change.status,
        cancelledAt: change.cancelledAt ?? o.cancelledAt,
      };
    }),
    crewCount: changes.clearCrew ? 0 : flight.crewCount,
  };
}
