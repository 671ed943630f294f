import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { and, asc, eq, inArray } from 'drizzle-orm';
import { DRIZLE } from '../database.module';
import * as schema from '../db/schema';
import { FlightRecord, SchedulingService } from '../scheduling/scheduling.service';
import { buildCrewOptions, validateCrewSelection } from '../scheduling/crew-selection';
import { eligibleCrew } from '../scheduling/crew-eligibility';
import { ConstraintViolationException } from '../common/exceptions/constraint-violation.exception';
import { ConcurrencyConflictException } from '../common/exceptions/concurrency-conflict.exception';
import type { CrewRole } from '../scheduling/scheduling.types';
import { CreateCrewMemberDto } from './dto/create-crew-member.dto';
import { SaveCrewDto } from './dto/save-crew.dto';

type Db = NodePgDatabase<typeof schema>;

interface CrewName {
  id: string;
  firstName: string;
  lastName: string;
}

@Injectable()
export class CrewService {
  private readonly logger = new Logger(CrewService.name);

  constructor(
    @Inject(DRIZLE) private readonly db: Db,
    private readonly scheduling: SchedulingService,
  ) {}

  async listCrew(role?: CrewRole) {
    const pilots =
      role === 'attendant'
        ? []
        : await this.db.select().from(schema.pilots).orderBy(asc(schema.pilots.lastName));
    const attendants =
      role === 'pilot'
        ? []
        : await this.db
            .select()
            .from(schema.attendants)
            .orderBy(asc(schema.attendants.lastName));
    return { pilots, attendants };
  }

  async createMember(dto: CreateCrewMemberDto) {
    const values = {
      id: dto.id,
      firstName: dto.firstName,
      lastName: dto.lastName,
      city: dto.city,
      street: dto.street,
      houseNumber: dto.houseNumber,
      phone: dto.phone,
      startedAt: dto.startedAt ? new Date(dto.startedAt) : new Date(),
      longHaulCertified: dto.longHaulCertified,
    };
    const inserted =
      dto.role === 'pilot'
        ? await this.db
            .insert(schema.pilots)
            .values(values)
            .onConflictDoNothing()
            .returning({ id: schema.pilots.id })
        : await this.db
            .insert(schema.attendants)
            .values(values)
            .onConflictDoNothing()
            .returning({ id: schema.attendants.id });
    if (inserted.length === 0) {
      throw new ConstraintViolationException(`A ${dto.role} with id ${dto.id} already exists`);
    }
    this.logger.log(`Registered ${dto.role} ${dto.id}`);
    return { role: dto.role, ...values };
  }

  /** Selectable crew for a flight; refused when eligible crew cannot staff it. */
  async getCrewOptions(flightId: string) {
    const flight = await this.openFlight(flightId, this.db, false);
    const pools = await this.scheduling.evaluateCrew(
      this.scheduling.windowFor(flight),
      'strict',
    );
    const assigned = await this.scheduling.assignedCrew(flightId);
    const options = buildCrewOptions({
      size: flight.aircraftSize,
      pilots: pools.pilots,
      attendants: pools.attendants,
      assignedPilotIds: assigned.pilotIds,
      assignedAttendantIds: assigned.attendantIds,
    });
    if (options.deficitMessage) {
      throw new ConstraintViolationException(
        `Not enough eligible crew: ${options.deficitMessage}`,
        [options.deficitMessage],
      );
    }

    const pilotNames = await this.names('pilot', options.selectablePilotIds);
    const attendantNames = await this.names('attendant', options.selectableAttendantIds);
    const describe = (names: CrewName[], assignedIds: string[], grandfathered: string[]) =>
      names.map((n) => ({
        ...n,
        selected: assignedIds.includes(n.id),
        grandfathered: grandfathered.includes(n.id),
      }));

    return {
      flightId,
      crewVersion: flight.crewVersion,
      required: options.required,
      available: options.available,
      pilots: describe(pilotNames, assigned.pilotIds, options.grandfatheredPilotIds),
      attendants: describe(
        attendantNames,
        assigned.attendantIds,
        options.grandfatheredAttendantIds,
      ),
    };
  }

  /**
   * Replaces the flight's crew. `crewVersion` must match the version the
   * operator saw; a concurrent save in between is reported, never overwritten.
   */
  async saveCrew(flightId: string, dto: SaveCrewDto) {
    return this.db.transaction(async (tx) => {
      const flight = await this.openFlight(flightId, tx, true);

      const [bumped] = await tx
        .update(schema.flights)
        .set({ crewVersion: dto.crewVersion + 1 })
        .where(
          and(
            eq(schema.flights.id, flightId),
            eq(schema.flights.crewVersion, dto.crewVersion),
          ),
        )
        .returning({ crewVersion: schema.flights.crewVersion });
      if (!bumped) {
        this.logger.warn(`Stale crew save on ${flightId} (version ${dto.crewVersion})`);
        throw new ConcurrencyConflictException('CREW_CHANGED', 'Crew changed, please retry');
      }

      // selected members are locked and re-evaluated inside this transaction
      const window = this.scheduling.windowFor(flight);
      const pilots = eligibleCrew(
        window,
        'pilot',
        await this.scheduling.pilotPool(tx, [...new Set(dto.pilotIds)]),
        'strict',
      );
      const attendants = eligibleCrew(
        window,
        'attendant',
        await this.scheduling.attendantPool(tx, [...new Set(dto.attendantIds)]),
        'strict',
      );
      const assigned = await this.scheduling.assignedCrew(flightId, tx);
      const options = buildCrewOptions({
        size: flight.aircraftSize,
        pilots,
        attendants,
        assignedPilotIds: assigned.pilotIds,
        assignedAttendantIds: assigned.attendantIds,
      });
      const violations = validateCrewSelection(options, dto.pilotIds, dto.attendantIds);
      if (violations.length > 0) {
        throw new ConstraintViolationException('Crew selection is not valid', violations);
      }

      await tx
        .delete(schema.flightCrewPilots)
        .where(eq(schema.flightCrewPilots.flightId, flightId));
      await tx
        .delete(schema.flightCrewAttendants)
        .where(eq(schema.flightCrewAttendants.flightId, flightId));
      await tx
        .insert(schema.flightCrewPilots)
        .values(dto.pilotIds.map((pilotId) => ({ pilotId, flightId })));
      await tx
        .insert(schema.flightCrewAttendants)
        .values(dto.attendantIds.map((attendantId) => ({ attendantId, flightId })));

      this.logger.log(
        `Crew of ${flightId} saved at version ${bumped.crewVersion}: ${dto.pilotIds.length} pilots, ${dto.attendantIds.length} attendants`,
      );
      return {
        flightId,
        crewVersion: bumped.crewVersion,
        pilotIds: dto.pilotIds,
        attendantIds: dto.attendantIds,
      };
    });
  }

  private async openFlight(flightId: string, tx: Db, lock: boolean): Promise<FlightRecord> {
    const flight = await this.scheduling.findFlight(flightId, tx, lock);
    if (!flight) throw new NotFoundException(`Flight ${flightId} not found`);
    if (flight.status === 'Cancelled' || flight.status === 'Completed') {
      throw new ConstraintViolationException(
        `Crew cannot be assigned to a ${flight.status} flight`,
      );
    }
    return flight;
  }

  private async names(role: CrewRole, ids: string[]): Promise<CrewName[]> {
    if (ids.length === 0) return [];
    if (role === 'pilot') {
      const { id, firstName, lastName } = schema.pilots;
      return this.db
        .select({ id, firstName, lastName })
        .from(schema.pilots)
        .where(inArray(id, ids))
        .orderBy(asc(lastName));
    }
    const { id, firstName, lastName } = schema.attendants;
    return this.db
      .select({ id, firstName, lastName })
      .from(schema.attendants)
      .where(inArray(id, ids))
      .orderBy(asc(lastName));
  }
}
