import { Test } from '@nestjs/testing';
import { DRIZLE } from '../database.module';
import * as schema from '../db/schema';
import { DEFAULT_OPERATIONS_POLICY, OPERATIONS_POLICY } from '../config/operations-policy';
import { at } from '../scheduling/testing/fixtures';
import { QueryRecorder, renderWhere } from '../common/testing/query-recorder';
import { StatusSyncService } from './status-sync.service';

async function setup() {
  const db = new QueryRecorder();
  const moduleRef = await Test.createTestingModule({
    providers: [
      StatusSyncService,
      { provide: DRIZLE, useValue: db },
      { provide: OPERATIONS_POLICY, useValue: DEFAULT_OPERATIONS_POLICY },
    ],
  }).compile();
  return { db, service: moduleRef.get(StatusSyncService) };
}

describe('StatusSyncService', () => {
  it('cancels orders, blocks seats and clears crew of a cancelled flight', async () => {
    const { db, service } = await setup();
    db.onSelect(schema.flights, [
      { id: 'FT020', status: 'Cancelled', departure: at('2030-05-01T08:00:00'), durationMinutes: 120 },
    ])
      .onSelect(schema.flightSeats, [
        { id: 'FS000001', flightId: 'FT020', status: 'Sold' },
        { id: 'FS000002', flightId: 'FT020', status: 'Available' },
      ])
      .onSelect(schema.orders, [
        { code: 'O000000001', flightId: 'FT020', status: 'Active', cancelledAt: null },
      ])
      .onSelect(schema.tickets, [
        { flightSeatId: 'FS000001', orderCode: 'O000000001', flightId: 'FT020' },
      ])
      .onSelect(schema.flightCrewPilots, [{ flightId: 'FT020', n: 2 }])
      .onSelect(schema.flightCrewAttendants, [{ flightId: 'FT020', n: 3 }]);

    await expect(service.run('FT020')).resolves.toBe(4);

    expect(db.locked).toHaveLength(1);
    expect(db.locked[0]).toBe(schema.flights);

    expect(db.writeLog()).toEqual([
      'update orders',
      'update flight_seats',
      'update flight_seats',
      'delete flight_crew_pilots',
      'delete flight_crew_attendants',
    ]);
    const [order, sold, open] = db.writes;
    expect(order.values).toEqual({ status: 'Cancelled-System', cancelledAt: expect.any(Date) });
    expect(renderWhere(order).params).toEqual(['O000000001', 'Active']);
    expect(sold.values).toEqual({ status: 'Blocked' });
    expect(renderWhere(sold).params).toEqual(['FS000001', 'Sold']);
    expect(open.values).toEqual({ status: 'Blocked' });
    expect(renderWhere(open).params).toEqual(['FS000002', 'Available']);
  });

  it('marks a flight full once its last seat is sold, guarded by the status it was read with', async () => {
    const { db, service } = await setup();
    db.onSelect(schema.flights, [
      { id: 'FT021', status: 'Active', departure: at('2030-05-01T08:00:00'), durationMinutes: 120 },
    ])
      .onSelect(schema.flightSeats, [{ id: 'FS000010', flightId: 'FT021', status: 'Available' }])
      .onSelect(schema.orders, [
        { code: 'O000000002', flightId: 'FT021', status: 'Active', cancelledAt: null },
      ])
      .onSelect(schema.tickets, [
        { flightSeatId: 'FS000010', orderCode: 'O000000002', flightId: 'FT021' },
      ]);

    await expect(service.run('FT021')).resolves.toBe(2);

    expect(db.writeLog()).toEqual(['update flight_seats', 'update flights']);
    const [seat, flight] = db.writes;
    expect(seat.values).toEqual({ status: 'Sold' });
    expect(renderWhere(seat).params).toEqual(['FS000010', 'Available']);
    expect(flight.values).toEqual({ status: 'Full-Occupied' });
    expect(renderWhere(flight).params).toEqual(['FT021', 'Active']);
  });

  it('writes nothing for a consistent flight', async () => {
    const { db, service } = await setup();
    db.onSelect(schema.flights, [
      { id: 'FT021', status: 'Full-Occupied', departure: at('2030-05-01T08:00:00'), durationMinutes: 120 },
    ])
      .onSelect(schema.flightSeats, [{ id: 'FS000010', flightId: 'FT021', status: 'Sold' }])
      .onSelect(schema.orders, [
        { code: 'O000000002', flightId: 'FT021', status: 'Active', cancelledAt: null },
      ])
      .onSelect(schema.tickets, [
        { flightSeatId: 'FS000010', orderCode: 'O000000002', flightId: 'FT021' },
      ]);

    await expect(service.run('FT021')).resolves.toBe(0);
    expect(db.writes).toEqual([]);
  });

  it('sweeps open flights, flights with active orders and cancelled flights with leftovers once each', async () => {
    const { db, service } = await setup();
    const load = jest.spyOn(service, 'loadSnapshots').mockResolvedValue([]);
    db.onSelect(schema.flights, [{ id: 'FT001' }, { id: 'FT002' }])
      .onSelect(schema.orders, [{ id: 'FT002' }, { id: 'FT003' }], true)
      .onSelect(schema.flightCrewPilots, [{ id: 'FT004' }], true)
      .onSelect(schema.flightSeats, [{ id: 'FT004' }], true);

    await expect(service.run()).resolves.toBe(0);
    expect(load).toHaveBeenCalledWith(db, ['FT001', 'FT002', 'FT003', 'FT004']);
  });
});
