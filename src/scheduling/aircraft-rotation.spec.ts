import { checkAircraftRotation } from './aircraft-rotation';
import type { RotationCandidate } from './scheduling.types';
import { at, leg } from './testing/fixtures';

describe('aircraft rotation', () => {
  // LAX -> TLV, 2030-06-01 12:00 -> 2030-06-02 03:00
  const candidate: RotationCandidate = {
    aircraftId: 'ACB001',
    size: 'Large',
    seatCount: 10,
    route: { origin: 'LAX', destination: 'TLV', durationMinutes: 900 },
    departure: at('2030-06-01T12:00:00'),
  };

  it('rejects a departure from LAX when the aircraft last landed at JFK', () => {
    const result = checkAircraftRotation(
      candidate,
      [leg('FT001', 'TLV', 'JFK', '2030-06-01T00:00:00', 660)],
      360,
    );
    expect(result.ok).toBe(false);
    expect(result.violations).toEqual([
      'Aircraft ACB001 will be at JFK after flight FT001, not at LAX',
    ]);
  });

  it('accepts a flight that continues the chain in both directions', () => {
    const result = checkAircraftRotation(
      candidate,
      [
        leg('FT001', 'TLV', 'LAX', '2030-06-01T00:00:00', 660),
        leg('FT003', 'TLV', 'ATH', '2030-06-02T03:00:00', 240),
      ],
      360,
    );
    expect(result).toEqual({
      ok: true,
      arrival: at('2030-06-02T03:00:00'),
      longHaul: true,
      violations: [],
    });
  });

  it('rejects when the next flight leaves from another airport', () => {
    const result = checkAircraftRotation(
      candidate,
      [leg('FT003', 'ATH', 'TLV', '2030-06-02T05:00:00', 240)],
      360,
    );
    expect(result.violations).toEqual([
      'Aircraft ACB001 must depart ATH for flight FT003, but this flight lands at TLV',
    ]);
  });

  it('rejects an overlapping flight of the same aircraft', () => {
    const result = checkAircraftRotation(
      candidate,
      [leg('FT002', 'LAX', 'TLV', '2030-06-01T13:00:00', 900)],
      360,
    );
    expect(result.violations).toEqual([
      'Aircraft ACB001 is already flying FT002 (2030-06-01T13:00:00.000Z - 2030-06-02T04:00:00.000Z)',
    ]);
  });

  it('ignores cancelled flights', () => {
    const result = checkAircraftRotation(
      candidate,
      [
        leg('FT001', 'TLV', 'JFK', '2030-06-01T00:00:00', 660, true),
        leg('FT002', 'LAX', 'TLV', '2030-06-01T13:00:00', 900, true),
      ],
      360,
    );
    expect(result.ok).toBe(true);
  });

  it('waives positioning for edits but still checks other flights for overlap', () => {
    const edit = { ...candidate, ignoreFlightId: 'FT005' };
    const history = [
      leg('FT001', 'TLV', 'JFK', '2030-06-01T00:00:00', 660),
      leg('FT005', 'LAX', 'TLV', '2030-06-01T11:00:00', 900),
    ];
    expect(checkAircraftRotation(edit, history, 360).ok).toBe(true);

    const clash = [...history, leg('FT006', 'TLV', 'ATH', '2030-06-01T20:00:00', 240)];
    expect(checkAircraftRotation(edit, clash, 360).violations).toEqual([
      'Aircraft ACB001 is already flying FT006 (2030-06-01T20:00:00.000Z - 2030-06-02T00:00:00.000Z)',
    ]);
  });

  it('keeps Small aircraft and empty aircraft off the schedule', () => {
    const result = checkAircraftRotation(
      { ...candidate, aircraftId: 'ACD001', size: 'Small', seatCount: 0 },
      [],
      360,
    );
    expect(result.violations).toEqual([
      'Aircraft ACD001 has no seat layout',
      'Aircraft ACD001 is Small; long-haul routes require a Large aircraft',
    ]);
  });
});
