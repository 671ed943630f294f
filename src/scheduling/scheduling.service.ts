import { Inject, Injectable } from '@nestjs/common';
import { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { count, eq, inArray } from 'drizzle-orm';
import { DRIZLE } from '../database.module';
import * as schema from '../db/schema';
import { OPERATIONS_POLICY, OperationsPolicy } from '../config/operations-policy';
import type {
  CrewCandidate,
  CrewEligibility,
  EligibilityMode,
  FlightWindow,
  RotationCandidate,
  RotationResult,
  RouteLeg,
  ScheduledLeg,
} from './scheduling.types';
import { checkAircraftRotation } from './aircraft-rotation';
import { eligibleCrew } from './crew-eligibility';
import { computeArrival, isLongHaul } from './time-window';

type Db = NodePgDatabase<typeof schema>;

export interface RouteRecord extends RouteLeg {
  id: string;
}

export interface AircraftRecord {
  id: string;
  manufacturer: schema.Manufacturer;
  model: string;
  size: schema.AircraftSize;
  seatCount: number;
}

export interface FlightRecord {
  id: string;
  status: schema.FlightStatus;
  departure: Date;
  arrival: Date;
  crewVersion: number;
  aircraftId: string;
  aircraftSize: schema.AircraftSize;
  route: RouteRecord;
  longHaul: boolean;
}

export interface CrewPools {
  pilots: CrewEligibility;
  attendants: CrewEligibility;
}

interface LegRow {
  memberId: string;
  flightId: string;
  departure: Date;
  status: schema.FlightStatus;
  origin: string;
  destination: string;
  durationMinutes: number;
}

function toLeg(row: Omit<LegRow, 'memberId'>): ScheduledLeg {
  return {
    flightId: row.flightId,
    origin: row.origin,
    destination: row.destination,
    departure: row.departure,
    arrival: computeArrival(row.departure, row.durationMinutes),
    cancelled: row.status === 'Cancelled',
  };
}

function groupCandidates(
  members: { id: string; longHaulCertified: boolean }[],
  legs: LegRow[],
): CrewCandidate[] {
  const byMember = new Map<string, ScheduledLeg[]>();
  for (const row of legs) {
    const list = byMember.get(row.memberId) ?? [];
    list.push(toLeg(row));
    byMember.set(row.memberId, list);
  }
  return members.map((m) => ({
    id: m.id,
    longHaulCertified: m.longHaulCertified,
    assignments: byMember.get(m.id) ?? [],
  }));
}

/** Loads what the scheduling rules need and evaluates them. */
@Injectable()
export class SchedulingService {
  constructor(
    @Inject(DRIZLE) private readonly db: Db,
    @Inject(OPERATIONS_POLICY) private readonly policy: OperationsPolicy,
  ) {}

  async findRoute(routeId: string, tx: Db = this.db): Promise<RouteRecord | undefined> {
    const [route] = await tx
      .select({
        id: schema.flightRoutes.id,
        origin: schema.flightRoutes.originCode,
        destination: schema.flightRoutes.destinationCode,
        durationMinutes: schema.flightRoutes.durationMinutes,
      })
      .from(schema.flightRoutes)
      .where(eq(schema.flightRoutes.id, routeId));
    return route;
  }

  /** With `lock`, the aircraft row stays locked so its schedule cannot change underneath. */
  async findAircraft(
    aircraftId: string,
    tx: Db = this.db,
    lock = false,
  ): Promise<AircraftRecord | undefined> {
    const base = tx
      .select({
        id: schema.aircraft.id,
        manufacturer: schema.aircraft.manufacturer,
        model: schema.aircraft.model,
        size: schema.aircraft.size,
      })
      .from(schema.aircraft)
      .where(eq(schema.aircraft.id, aircraftId));
    const [craft] = lock ? await base.for('update') : await base;
    if (!craft) return undefined;
    const [seats] = await tx
      .select({ n: count() })
      .from(schema.seats)
      .where(eq(schema.seats.aircraftId, aircraftId));
    return { ...craft, seatCount: seats?.n ?? 0 };
  }

  async listAircraft(tx: Db = this.db): Promise<AircraftRecord[]> {
    return tx
      .select({
        id: schema.aircraft.id,
        manufacturer: schema.aircraft.manufacturer,
        model: schema.aircraft.model,
        size: schema.aircraft.size,
        seatCount: count(schema.seats.id),
      })
      .from(schema.aircraft)
      .leftJoin(schema.seats, eq(schema.seats.aircraftId, schema.aircraft.id))
      .groupBy(schema.aircraft.id)
      .orderBy(schema.aircraft.id);
  }

  async findFlight(
    flightId: string,
    tx: Db = this.db,
    lock = false,
  ): Promise<FlightRecord | undefined> {
    const base = tx
      .select({
        id: schema.flights.id,
        status: schema.flights.status,
        departure: schema.flights.departureAt,
        crewVersion: schema.flights.crewVersion,
        aircraftId: schema.flights.aircraftId,
        aircraftSize: schema.aircraft.size,
        routeId: schema.flightRoutes.id,
        origin: schema.flightRoutes.originCode,
        destination: schema.flightRoutes.destinationCode,
        durationMinutes: schema.flightRoutes.durationMinutes,
      })
      .from(schema.flights)
      .innerJoin(schema.flightRoutes, eq(schema.flightRoutes.id, schema.flights.routeId))
      .innerJoin(schema.aircraft, eq(schema.aircraft.id, schema.flights.aircraftId))
      .where(eq(schema.flights.id, flightId));
    const [row] = lock ? await base.for('update', { of: schema.flights }) : await base;
    if (!row) return undefined;
    return {
      id: row.id,
      status: row.status,
      departure: row.departure,
      arrival: computeArrival(row.departure, row.durationMinutes),
      crewVersion: row.crewVersion,
      aircraftId: row.aircraftId,
      aircraftSize: row.aircraftSize,
      route: {
        id: row.routeId,
        origin: row.origin,
        destination: row.destination,
        durationMinutes: row.durationMinutes,
      },
      longHaul: isLongHaul(row.durationMinutes, this.policy.longHaulThresholdMinutes),
    };
  }

  windowFor(flight: FlightRecord): FlightWindow {
    return {
      flightId: flight.id,
      origin: flight.route.origin,
      destination: flight.route.destination,
      departure: flight.departure,
      arrival: flight.arrival,
      longHaul: flight.longHaul,
    };
  }

  async aircraftHistory(aircraftId: string, tx: Db = this.db): Promise<ScheduledLeg[]> {
    const rows = await tx
      .select({
        flightId: schema.flights.id,
        departure: schema.flights.departureAt,
        status: schema.flights.status,
        origin: schema.flightRoutes.originCode,
        destination: schema.flightRoutes.destinationCode,
        durationMinutes: schema.flightRoutes.durationMinutes,
      })
      .from(schema.flights)
      .innerJoin(schema.flightRoutes, eq(schema.flightRoutes.id, schema.flights.routeId))
      .where(eq(schema.flights.aircraftId, aircraftId));
    return rows.map(toLeg);
  }

  async checkRotation(
    candidate: RotationCandidate,
    tx: Db = this.db,
  ): Promise<RotationResult> {
    const history = await this.aircraftHistory(candidate.aircraftId, tx);
    return checkAircraftRotation(candidate, history, this.policy.longHaulThresholdMinutes);
  }

  /** Pilots with their assignments; `ids` narrows the pool and locks those rows. */
  async pilotPool(tx: Db = this.db, ids?: string[]): Promise<CrewCandidate[]> {
    if (ids?.length === 0) return [];
    const columns = {
      id: schema.pilots.id,
      longHaulCertified: schema.pilots.longHaulCertified,
    };
    const members = ids
      ? await tx
          .select(columns)
          .from(schema.pilots)
          .where(inArray(schema.pilots.id, ids))
          .for('update')
      : await tx.select(columns).from(schema.pilots);
    if (members.length === 0) return [];
    const legs = await tx
      .select({
        memberId: schema.flightCrewPilots.pilotId,
        flightId: schema.flights.id,
        departure: schema.flights.departureAt,
        status: schema.flights.status,
        origin: schema.flightRoutes.originCode,
        destination: schema.flightRoutes.destinationCode,
        durationMinutes: schema.flightRoutes.durationMinutes,
      })
      .from(schema.flightCrewPilots)
      .innerJoin(schema.flights, eq(schema.flights.id, schema.flightCrewPilots.flightId))
      .innerJoin(schema.flightRoutes, eq(schema.flightRoutes.id, schema.flights.routeId))
      .where(
        inArray(
          schema.flightCrewPilots.pilotId,
          members.map((m) => m.id),
        ),
      );
    return groupCandidates(members, legs);
  }

  async attendantPool(tx: Db = this.db, ids?: string[]): Promise<CrewCandidate[]> {
    if (ids?.length === 0) return [];
    const columns = {
      id: schema.attendants.id,
      longHaulCertified: schema.attendants.longHaulCertified,
    };
    const members = ids
      ? await tx
          .select(columns)
          .from(schema.attendants)
          .where(inArray(schema.attendants.id, ids))
          .for('update')
      : await tx.select(columns).from(schema.attendants);
    if (members.length === 0) return [];
    const legs = await tx
      .select({
        memberId: schema.flightCrewAttendants.attendantId,
        flightId: schema.flights.id,
        departure: schema.flights.departureAt,
        status: schema.flights.status,
        origin: schema.flightRoutes.originCode,
        destination: schema.flightRoutes.destinationCode,
        durationMinutes: schema.flightRoutes.durationMinutes,
      })
      .from(schema.flightCrewAttendants)
      .innerJoin(
        schema.flights,
        eq(schema.flights.id, schema.flightCrewAttendants.flightId),
      )
      .innerJoin(schema.flightRoutes, eq(schema.flightRoutes.id, schema.flights.routeId))
      .where(
        inArray(
          schema.flightCrewAttendants.attendantId,
          members.map((m) => m.id),
        ),
      );
    return groupCandidates(members, legs);
  }

  async evaluateCrew(
    window: FlightWindow,
    mode: EligibilityMode,
    tx: Db = this.db,
  ): Promise<CrewPools> {
    const pilots = await this.pilotPool(tx);
    const attendants = await this.attendantPool(tx);
    return {
      pilots: eligibleCrew(window, 'pilot', pilots, mode),
      attendants: eligibleCrew(window, 'attendant', attendants, mode),
    };
  }

  async assignedCrew(
    flightId: string,
    tx: Db = this.db,
  ): Promise<{ pilotIds: string[]; attendantIds: string[] }> {
    const pilots = await tx
      .select({ id: schema.flightCrewPilots.pilotId })
      .from(schema.flightCrewPilots)
      .where(eq(schema.flightCrewPilots.flightId, flightId));
    const attendants = await tx
      .select({ id: schema.flightCrewAttendants.attendantId })
      .from(schema.flightCrewAttendants)
      .where(eq(schema.flightCrewAttendants.flightId, flightId));
    return {
      pilotIds: pilots.map((p) => p.id),
      attendantIds: attendants.map((a) => a.id),
    };
  }
}
