import { applyStatusChanges, countChanges, reconcileFlight } from './status-reconciliation';
import type { FlightSnapshot } from './scheduling.types';
import { at } from './testing/fixtures';

describe('status reconciliation', () => {
  const farOut = at('2030-07-01T00:00:00');

  const snapshot = (overrides: Partial<FlightSnapshot> = {}): FlightSnapshot => ({
    id: 'FT100',
    status: 'Active',
    departure: at('2030-07-10T10:00:00'),
    arrival: at('2030-07-10T14:00:00'),
    seats: [
      { id: 'FS000001', status: 'Available' },
      { id: 'FS000002', status: 'Sold' },
      { id: 'FS000003', status: 'Blocked' },
    ],
    orders: [
      { code: 'O000000001', status: 'Active', cancelledAt: null },
      { code: 'O000000002', status: 'Cancelled-Customer', cancelledAt: at('2030-06-20T00:00:00') },
    ],
    tickets: [
      { flightSeatId: 'FS000001', orderCode: 'O000000001' },
      { flightSeatId: 'FS000002', orderCode: 'O000000002' },
    ],
    crewCount: 5,
    ...overrides,
  });

  it('projects seat status from live tickets', () => {
    const changes = reconcileFlight(snapshot(), farOut, 36);
    expect(changes).toEqual({
      flightId: 'FT100',
      seats: [
        { id: 'FS000001', status: 'Sold' },
        { id: 'FS000002', status: 'Available' },
      ],
      orders: [],
      clearCrew: false,
    });
    expect(countChanges(changes)).toBe(2);
  });

  it('is idempotent', () => {
    const first = snapshot();
    const settled = applyStatusChanges(first, reconcileFlight(first, farOut, 36));
    expect(countChanges(reconcileFlight(settled, farOut, 36))).toBe(0);
  });

  it('marks a flight full when no seat is available and reopens it when one frees up', () => {
    const full = snapshot({
      seats: [
        { id: 'FS000001', status: 'Sold' },
        { id: 'FS000003', status: 'Blocked' },
      ],
    });
    expect(reconcileFlight(full, farOut, 36).flightStatus).toBe('Full-Occupied');

    const reopened = snapshot({ status: 'Full-Occupied' });
    expect(reconcileFlight(reopened, farOut, 36).flightStatus).toBe('Active');
  });

  it('leaves a flight without seats Active', () => {
    const empty = snapshot({ seats: [], orders: [], tickets: [] });
    expect(countChanges(reconcileFlight(empty, farOut, 36))).toBe(0);
  });

  it('cancels active orders, blocks seats and drops crew on a cancelled flight', () => {
    const cancelled = snapshot({ status: 'Cancelled' });
    const changes = reconcileFlight(cancelled, farOut, 36);
    expect(changes).toEqual({
      flightId: 'FT100',
      seats: [
        { id: 'FS000001', status: 'Blocked' },
        { id: 'FS000002', status: 'Blocked' },
      ],
      orders: [{ code: 'O000000001', status: 'Cancelled-System', cancelledAt: farOut }],
      clearCrew: true,
    });
    const settled = applyStatusChanges(cancelled, changes);
    expect(countChanges(reconcileFlight(settled, farOut, 36))).toBe(0);
  });

  it('blocks a sold seat whose only ticket was cancelled by the system', () => {
    const flight = snapshot({
      orders: [{ code: 'O000000002', status: 'Cancelled-System', cancelledAt: farOut }],
      tickets: [{ flightSeatId: 'FS000002', orderCode: 'O000000002' }],
    });
    expect(reconcileFlight(flight, farOut, 36).seats).toEqual([
      { id: 'FS000002', status: 'Blocked' },
    ]);
  });

  it('completes active orders within 36 hours of departure', () => {
    const changes = reconcileFlight(snapshot(), at('2030-07-09T00:00:00'), 36);
    expect(changes.orders).toEqual([{ code: 'O000000001', status: 'Completed' }]);
    expect(changes.seats).toEqual([
      { id: 'FS000001', status: 'Sold' },
      { id: 'FS000002', status: 'Available' },
    ]);
  });

  it('completes a flight once it has landed', () => {
    const changes = reconcileFlight(snapshot(), at('2030-07-10T14:00:00'), 36);
    expect(changes.flightStatus).toBe('Completed');
  });

  it('never changes a completed flight', () => {
    const done = snapshot({ status: 'Completed' });
    expect(reconcileFlight(done, at('2030-07-11T00:00:00'), 36).flightStatus).toBeUndefined();
  });
});
