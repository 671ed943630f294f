import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { and, asc, count, eq, gte, inArray, lte, SQL } from 'drizzle-orm';
import { DRIZLE } from '../database.module';
import * as schema from '../db/schema';
import { OPERATIONS_POLICY, OperationsPolicy } from '../config/operations-policy';
import {
  AircraftRecord,
  FlightRecord,
  SchedulingService,
} from '../scheduling/scheduling.service';
import { IdCountersService } from '../id-counters/id-counters.service';
import { formatId, idRange } from '../id-counters/id-format';
import { StatusSyncService } from '../reconciliation/status-sync.service';
import { ConstraintViolationException } from '../common/exceptions/constraint-violation.exception';
import { CREW_REQUIREMENTS, crewDeficitMessage, hasEnoughCrew } from '../scheduling/crew-selection';
import { defaultSeatPriceCents } from '../scheduling/seat-pricing';
import { formatCents } from '../scheduling/money';
import { managerMayCancelFlight } from '../scheduling/cancellation-policy';
import { computeArrival, isLongHaul } from '../scheduling/time-window';
import { evaluateCrewMember } from '../scheduling/crew-eligibility';
import type { FlightWindow } from '../scheduling/scheduling.types';
import { CreateFlightDto } from './dto/create-flight.dto';
import { UpdateFlightDto } from './dto/update-flight.dto';
import { ListFlightsQuery } from './dto/list-flights.query';

type Db = NodePgDatabase<typeof schema>;

export function parseInstant(value: string, field: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new BadRequestException(`${field} is not a valid date`);
  }
  return date;
}

@Injectable()
export class FlightsService {
  private readonly logger = new Logger(FlightsService.name);

  constructor(
    @Inject(DRIZLE) private readonly db: Db,
    @Inject(OPERATIONS_POLICY) private readonly policy: OperationsPolicy,
    private readonly scheduling: SchedulingService,
    private readonly idCounters: IdCountersService,
    private readonly statusSync: StatusSyncService,
  ) {}

  async listRoutes() {
    const routes = await this.db.query.flightRoutes.findMany({
      with: { originAirport: true, destinationAirport: true },
      orderBy: [asc(schema.flightRoutes.id)],
    });
    return routes.map((r) => ({
      id: r.id,
      durationMinutes: r.durationMinutes,
      longHaul: isLongHaul(r.durationMinutes, this.policy.longHaulThresholdMinutes),
      origin: { code: r.originCode, city: r.originAirport.city },
      destination: { code: r.destinationCode, city: r.destinationAirport.city },
    }));
  }

  async listFlights(filters: ListFlightsQuery) {
    await this.statusSync.run();

    const where: SQL[] = [];
    if (filters.status) where.push(eq(schema.flights.status, filters.status));
    if (filters.from) {
      where.push(gte(schema.flights.departureAt, parseInstant(filters.from, 'from')));
    }
    if (filters.to) {
      where.push(lte(schema.flights.departureAt, parseInstant(filters.to, 'to')));
    }
    if (filters.origin) {
      where.push(eq(schema.flightRoutes.originCode, filters.origin.toUpperCase()));
    }
    if (filters.destination) {
      where.push(
        eq(schema.flightRoutes.destinationCode, filters.destination.toUpperCase()),
      );
    }

    const rows = await this.db
      .select({
        id: schema.flights.id,
        status: schema.flights.status,
        departure: schema.flights.departureAt,
        aircraftId: schema.flights.aircraftId,
        routeId: schema.flightRoutes.id,
        origin: schema.flightRoutes.originCode,
        destination: schema.flightRoutes.destinationCode,
        durationMinutes: schema.flightRoutes.durationMinutes,
      })
      .from(schema.flights)
      .innerJoin(schema.flightRoutes, eq(schema.flightRoutes.id, schema.flights.routeId))
      .where(and(...where))
      .orderBy(asc(schema.flights.departureAt));

    const seatCounts = await this.seatCounts(rows.map((r) => r.id));
    return rows.map((r) => ({
      ...r,
      arrival: computeArrival(r.departure, r.durationMinutes),
      seats: seatCounts.get(r.id) ?? { Available: 0, Sold: 0, Blocked: 0 },
    }));
  }

  async getFlight(flightId: string) {
    const flight = await this.scheduling.findFlight(flightId);
    if (!flight) throw new NotFoundException(`Flight ${flightId} not found`);

    const pilots = await this.db
      .select({
        id: schema.pilots.id,
        firstName: schema.pilots.firstName,
        lastName: schema.pilots.lastName,
      })
      .from(schema.flightCrewPilots)
      .innerJoin(schema.pilots, eq(schema.pilots.id, schema.flightCrewPilots.pilotId))
      .where(eq(schema.flightCrewPilots.flightId, flightId));
    const attendants = await this.db
      .select({
        id: schema.attendants.id,
        firstName: schema.attendants.firstName,
        lastName: schema.attendants.lastName,
      })
      .from(schema.flightCrewAttendants)
      .innerJoin(
        schema.attendants,
        eq(schema.attendants.id, schema.flightCrewAttendants.attendantId),
      )
      .where(eq(schema.flightCrewAttendants.flightId, flightId));
    const seats = await this.seatCounts([flightId]);

    return {
      ...flight,
      crew: { pilots, attendants, required: CREW_REQUIREMENTS[flight.aircraftSize] },
      seats: seats.get(flightId) ?? { Available: 0, Sold: 0, Blocked: 0 },
    };
  }

  /** Aircraft that could fly the route at that time, crew permitting. */
  async candidateAircraft(routeId: string, departureIso: string) {
    const departure = parseInstant(departureIso, 'departure');
    const route = await this.scheduling.findRoute(routeId);
    if (!route) throw new NotFoundException(`Route ${routeId} not found`);

    const window: FlightWindow = {
      origin: route.origin,
      destination: route.destination,
      departure,
      arrival: computeArrival(departure, route.durationMinutes),
      longHaul: isLongHaul(route.durationMinutes, this.policy.longHaulThresholdMinutes),
    };
    const crew = await this.scheduling.evaluateCrew(window, 'strict');
    const available = {
      pilots: crew.pilots.eligibleIds.length,
      attendants: crew.attendants.eligibleIds.length,
    };

    const candidates: AircraftRecord[] = [];
    for (const craft of await this.scheduling.listAircraft()) {
      const rotation = await this.scheduling.checkRotation({
        aircraftId: craft.id,
        size: craft.size,
        seatCount: craft.seatCount,
        route,
        departure,
      });
      if (rotation.ok && hasEnoughCrew(available, CREW_REQUIREMENTS[craft.size])) {
        candidates.push(craft);
      }
    }
    return { routeId, departure, arrival: window.arrival, aircraft: candidates };
  }

  async createFlight(dto: CreateFlightDto) {
    const departure = parseInstant(dto.departure, 'departure');
    if (departure.getTime() <= Date.now()) {
      throw new BadRequestException('Departure must be in the future');
    }

    return this.db.transaction(async (tx) => {
      const route = await this.scheduling.findRoute(dto.routeId, tx);
      if (!route) throw new NotFoundException(`Route ${dto.routeId} not found`);
      const craft = await this.scheduling.findAircraft(dto.aircraftId, tx, true);
      if (!craft) throw new NotFoundException(`Aircraft ${dto.aircraftId} not found`);

      const rotation = await this.scheduling.checkRotation(
        {
          aircraftId: craft.id,
          size: craft.size,
          seatCount: craft.seatCount,
          route,
          departure,
        },
        tx,
      );
      if (!rotation.ok) {
        throw new ConstraintViolationException(
          `Aircraft ${craft.id} cannot fly route ${route.id} at that time`,
          rotation.violations,
        );
      }

      const window: FlightWindow = {
        origin: route.origin,
        destination: route.destination,
        departure,
        arrival: rotation.arrival,
        longHaul: rotation.longHaul,
      };
      await this.assertCrewAvailable(window, craft.size, 'strict', tx);

      const seats = await tx
        .select({ id: schema.seats.id, seatClass: schema.seats.seatClass })
        .from(schema.seats)
        .where(eq(schema.seats.aircraftId, craft.id))
        .orderBy(asc(schema.seats.rowNum), asc(schema.seats.colNum));

      const flightId = formatId('Flight', await this.idCounters.reserve('Flight', 1, tx));
      const seatIds = idRange(
        'FlightSeat',
        await this.idCounters.reserve('FlightSeat', seats.length, tx),
        seats.length,
      );

      await tx.insert(schema.flights).values({
        id: flightId,
        departureAt: departure,
        status: 'Active',
        aircraftId: craft.id,
        routeId: route.id,
      });
      await tx.insert(schema.flightSeats).values(
        seats.map((seat, i) => ({
          id: seatIds[i],
          flightId,
          seatId: seat.id,
          status: 'Available' as const,
          price: formatCents(
            defaultSeatPriceCents(seat.seatClass, craft.size, rotation.longHaul),
          ),
        })),
      );

      this.logger.log(
        `Scheduled ${flightId} ${route.origin}->${route.destination} on ${craft.id} with ${seats.length} seats`,
      );
      return {
        id: flightId,
        routeId: route.id,
        aircraftId: craft.id,
        departure,
        arrival: rotation.arrival,
        status: 'Active' as const,
        seatCount: seats.length,
      };
    });
  }

  async updateFlight(flightId: string, dto: UpdateFlightDto) {
    return this.db.transaction(async (tx) => {
      const flight = await this.scheduling.findFlight(flightId, tx, true);
      if (!flight) throw new NotFoundException(`Flight ${flightId} not found`);
      const now = new Date();

      if (flight.status === 'Cancelled' || flight.status === 'Completed') {
        throw new ConstraintViolationException(`Flight ${flightId} is ${flight.status}`);
      }

      if (dto.departure) {
        if (flight.departure.getTime() <= now.getTime()) {
          throw new ConstraintViolationException('Flight has already departed');
        }
        const departure = parseInstant(dto.departure, 'departure');
        if (departure.getTime() <= now.getTime()) {
          throw new BadRequestException('Departure must be in the future');
        }
        await this.reschedule(flight, departure, tx);
        flight.departure = departure;
        flight.arrival = computeArrival(departure, flight.route.durationMinutes);
      }

      if (dto.status && dto.status !== flight.status) {
        this.assertStatusChange(flight, dto.status, now);
        await tx
          .update(schema.flights)
          .set({ status: dto.status })
          .where(eq(schema.flights.id, flightId));
      }

      await this.statusSync.reconcile(tx, flightId);
      this.logger.log(`Updated flight ${flightId}`);
      return this.scheduling.findFlight(flightId, tx);
    });
  }

  /** Cancels the flight; the reconciler then moves orders, seats and crew. */
  async cancelFlight(flightId: string) {
    return this.db.transaction(async (tx) => {
      const flight = await this.scheduling.findFlight(flightId, tx, true);
      if (!flight) throw new NotFoundException(`Flight ${flightId} not found`);
      if (flight.status === 'Cancelled' || flight.status === 'Completed') {
        throw new ConstraintViolationException(`Flight ${flightId} is already ${flight.status}`);
      }
      if (!managerMayCancelFlight(flight.departure, new Date(), this.policy.managerCancelMinHours)) {
        throw new ConstraintViolationException(
          `Flights can only be cancelled at least ${this.policy.managerCancelMinHours} hours before departure`,
        );
      }

      await tx
        .update(schema.flights)
        .set({ status: 'Cancelled' })
        .where(eq(schema.flights.id, flightId));
      const changes = await this.statusSync.reconcile(tx, flightId);

      this.logger.warn(`Cancelled flight ${flightId} (${changes} dependent change(s))`);
      return { flightId, status: 'Cancelled' as const, changes };
    });
  }

  private async reschedule(flight: FlightRecord, departure: Date, tx: Db) {
    const rotation = await this.scheduling.checkRotation(
      {
        aircraftId: flight.aircraftId,
        size: flight.aircraftSize,
        route: flight.route,
        departure,
        ignoreFlightId: flight.id,
      },
      tx,
    );
    if (!rotation.ok) {
      throw new ConstraintViolationException(
        `Flight ${flight.id} cannot move to ${departure.toISOString()}`,
        rotation.violations,
      );
    }
    const window = { ...this.scheduling.windowFor(flight), departure, arrival: rotation.arrival };
    await this.assertCrewAvailable(window, flight.aircraftSize, 'relaxed', tx);

    const assigned = await this.scheduling.assignedCrew(flight.id, tx);
    const members = [
      ...(await this.scheduling.pilotPool(tx, assigned.pilotIds)),
      ...(await this.scheduling.attendantPool(tx, assigned.attendantIds)),
    ];
    const conflicts = members
      .map((member) => evaluateCrewMember(window, member, 'relaxed'))
      .filter((evaluation) => !evaluation.eligible);
    if (conflicts.length > 0) {
      throw new ConstraintViolationException(
        `Assigned crew cannot fly ${flight.id} at ${departure.toISOString()}`,
        conflicts.map((c) => `Crew member ${c.id} fails ${c.failures.join(', ')}`),
      );
    }

    await tx
      .update(schema.flights)
      .set({ departureAt: departure })
      .where(eq(schema.flights.id, flight.id));
  }

  private assertStatusChange(flight: FlightRecord, next: schema.FlightStatus, now: Date) {
    switch (next) {
      case 'Full-Occupied':
        throw new ConstraintViolationException(
          'Full-Occupied follows from seat availability and cannot be set directly',
        );
      case 'Cancelled':
        throw new ConstraintViolationException('Use the cancel action to cancel a flight');
      case 'Completed':
        if (flight.arrival.getTime() > now.getTime()) {
          throw new ConstraintViolationException('A flight can only be completed after it lands');
        }
        return;
      case 'Active':
        return;
    }
  }

  private async assertCrewAvailable(
    window: FlightWindow,
    size: schema.AircraftSize,
    mode: 'strict' | 'relaxed',
    tx: Db,
  ) {
    const crew = await this.scheduling.evaluateCrew(window, mode, tx);
    const available = {
      pilots: crew.pilots.eligibleIds.length,
      attendants: crew.attendants.eligibleIds.length,
    };
    const required = CREW_REQUIREMENTS[size];
    if (!hasEnoughCrew(available, required)) {
      const deficit = crewDeficitMessage(available, required);
      throw new ConstraintViolationException(`Not enough eligible crew: ${deficit}`, [deficit]);
    }
  }

  private async seatCounts(flightIds: string[]) {
    const result = new Map<string, Record<schema.FlightSeatStatus, number>>();
    if (flightIds.length === 0) return result;
    const rows = await this.db
      .select({
        flightId: schema.flightSeats.flightId,
        status: schema.flightSeats.status,
        n: count(),
      })
      .from(schema.flightSeats)
      .where(inArray(schema.flightSeats.flightId, flightIds))
      .groupBy(schema.flightSeats.flightId, schema.flightSeats.status);
    for (const row of rows) {
      const counts = result.get(row.flightId) ?? { Available: 0, Sold: 0, Blocked: 0 };
      counts[row.status] = row.n;
      result.set(row.flightId, counts);
    }
    return result;
  }
}
