import { Test } from '@nestjs/testing';
import { DRIZLE } from '../database.module';
import { SchedulingService, FlightRecord } from '../scheduling/scheduling.service';
import { ConcurrencyConflictException } from '../common/exceptions/concurrency-conflict.exception';
import { ConstraintViolationException } from '../common/exceptions/constraint-violation.exception';
import { eligibleCrew } from '../scheduling/crew-eligibility';
import { at, crew } from '../scheduling/testing/fixtures';
import { CrewService } from './crew.service';

const flight: FlightRecord = {
  id: 'FT020',
  status: 'Active',
  departure: at('2030-05-01T08:00:00'),
  arrival: at('2030-05-01T10:00:00'),
  crewVersion: 0,
  aircraftId: 'ACA001',
  aircraftSize: 'Small',
  route: { id: 'R001', origin: 'TLV', destination: 'ATH', durationMinutes: 120 },
  longHaul: false,
};

const roster = {
  pilots: ['P1', 'P2', 'P3'],
  attendants: ['A1', 'A2', 'A3', 'A4'],
};

function fakeScheduling(attendants = roster.attendants) {
  const window = {
    flightId: flight.id,
    origin: 'TLV',
    destination: 'ATH',
    departure: flight.departure,
    arrival: flight.arrival,
    longHaul: false,
  };
  return {
    findFlight: jest.fn(async () => ({ ...flight })),
    windowFor: () => window,
    pilotPool: async (_tx: unknown, ids: string[]) =>
      ids.filter((id) => roster.pilots.includes(id)).map((id) => crew(id)),
    attendantPool: async (_tx: unknown, ids: string[]) =>
      ids.filter((id) => attendants.includes(id)).map((id) => crew(id)),
    assignedCrew: async () => ({ pilotIds: [], attendantIds: [] }),
    evaluateCrew: async () => ({
      pilots: eligibleCrew(window, 'pilot', roster.pilots.map((id) => crew(id)), 'strict'),
      attendants: eligibleCrew(window, 'attendant', attendants.map((id) => crew(id)), 'strict'),
    }),
  };
}

// Holds the flight's crew version and links; the version bump is a compare-and-set.
function fakeDb() {
  const state: { crewVersion: number; links: Record<string, string>[] } = {
    crewVersion: 0,
    links: [],
  };
  const tx = {
    update: () => ({
      set: (values: { crewVersion: number }) => ({
        where: () => ({
          returning: async () => {
            // yield so concurrent saves interleave before the compare-and-set
            await Promise.resolve();
            if (values.crewVersion !== state.crewVersion + 1) return [];
            state.crewVersion = values.crewVersion;
            return [{ crewVersion: state.crewVersion }];
          },
        }),
      }),
    }),
    delete: () => ({
      where: async () => {
        state.links = [];
      },
    }),
    insert: () => ({
      values: async (rows: Record<string, string>[]) => {
        state.links.push(...rows);
      },
    }),
  };
  return {
    state,
    select: () => ({
      from: () => ({ where: () => ({ orderBy: async () => [] }) }),
    }),
    transaction: <T>(fn: (t: typeof tx) => Promise<T>) => fn(tx),
  };
}

async function setup(attendants?: string[]) {
  const db = fakeDb();
  const moduleRef = await Test.createTestingModule({
    providers: [
      CrewService,
      { provide: DRIZLE, useValue: db },
      { provide: SchedulingService, useValue: fakeScheduling(attendants) },
    ],
  }).compile();
  return { db, service: moduleRef.get(CrewService) };
}

describe('CrewService', () => {
  const selection = { pilotIds: ['P1', 'P2'], attendantIds: ['A1', 'A2', 'A3'] };

  it('saves a valid crew and bumps the version', async () => {
    const { db, service } = await setup();
    await expect(service.saveCrew('FT020', { ...selection, crewVersion: 0 })).resolves.toEqual({
      flightId: 'FT020',
      crewVersion: 1,
      pilotIds: ['P1', 'P2'],
      attendantIds: ['A1', 'A2', 'A3'],
    });
    expect(db.state.links).toEqual([
      { pilotId: 'P1', flightId: 'FT020' },
      { pilotId: 'P2', flightId: 'FT020' },
      { attendantId: 'A1', flightId: 'FT020' },
      { attendantId: 'A2', flightId: 'FT020' },
      { attendantId: 'A3', flightId: 'FT020' },
    ]);
  });

  it('reports a stale version as a crew-changed conflict', async () => {
    const { db, service } = await setup();
    db.state.crewVersion = 3;
    const save = service.saveCrew('FT020', { ...selection, crewVersion: 2 });
    await expect(save).rejects.toBeInstanceOf(ConcurrencyConflictException);
    await expect(save).rejects.toMatchObject({ code: 'CREW_CHANGED' });
    expect(db.state.links).toEqual([]);
  });

  it('accepts exactly one of two saves racing on the same version', async () => {
    const { db, service } = await setup();
    const results = await Promise.allSettled([
      service.saveCrew('FT020', { ...selection, crewVersion: 0 }),
      service.saveCrew('FT020', {
        pilotIds: ['P2', 'P3'],
        attendantIds: ['A2', 'A3', 'A4'],
        crewVersion: 0,
      }),
    ]);
    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
    expect(db.state.crewVersion).toBe(1);
    expect(db.state.links).toHaveLength(5);
  });

  it('refuses a selection with the wrong counts or unknown members', async () => {
    const { service } = await setup();
    const save = service.saveCrew('FT020', {
      pilotIds: ['P1'],
      attendantIds: ['A1', 'A2', 'X9'],
      crewVersion: 0,
    });
    await expect(save).rejects.toBeInstanceOf(ConstraintViolationException);
    await expect(save).rejects.toMatchObject({
      violations: [
        'Exactly 2 pilots required, got 1',
        'Crew member X9 is not available for this flight',
      ],
    });
  });

  it('refuses to offer crew options when attendants are short', async () => {
    const { service } = await setup(['A1', 'A2']);
    await expect(service.getCrewOptions('FT020')).rejects.toMatchObject({
      violations: ['pilots 3/2, attendants 2/3'],
    });
  });

  it('offers options when the roster can staff the flight', async () => {
    const { service } = await setup();
    const options = await service.getCrewOptions('FT020');
    expect(options.crewVersion).toBe(0);
    expect(options.required).toEqual({ pilots: 2, attendants: 3 });
    expect(options.available).toEqual({ pilots: 3, attendants: 4 });
  });
});
