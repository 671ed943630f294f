import type { AircraftSize } from '../db/schema';
import type { CrewEligibility, CrewRequirement } from './scheduling.types';
import { isGrandfathered } from './crew-eligibility';

export const CREW_REQUIREMENTS: Record<AircraftSize, CrewRequirement> = {
  Small: { pilots: 2, attendants: 3 },
  Large: { pilots: 3, attendants: 6 },
};

export interface CrewOptions {
  required: CrewRequirement;
  available: CrewRequirement;
  selectablePilotIds: string[];
  selectableAttendantIds: string[];
  grandfatheredPilotIds: string[];
  grandfatheredAttendantIds: string[];
  sufficient: boolean;
  deficitMessage: string | null;
}

export function crewDeficitMessage(
  available: CrewRequirement,
  required: CrewRequirement,
): string {
  return `pilots ${available.pilots}/${required.pilots}, attendants ${available.attendants}/${required.attendants}`;
}

export function hasEnoughCrew(
  available: CrewRequirement,
  required: CrewRequirement,
): boolean {
  return (
    available.pilots >= required.pilots &&
    available.attendants >= required.attendants
  );
}

function grandfathered(eligibility: CrewEligibility, assignedIds: string[]): string[] {
  return eligibility.evaluations
    .filter((e) => assignedIds.includes(e.id) && isGrandfathered(e))
    .map((e) => e.id);
}

export function buildCrewOptions(input: {
  size: AircraftSize;
  pilots: CrewEligibility;
  attendants: CrewEligibility;
  assignedPilotIds: string[];
  assignedAttendantIds: string[];
}): CrewOptions {
  const required = CREW_REQUIREMENTS[input.size];
  // grandfathered members are selectable but never counted as available
  const available: CrewRequirement = {
    pilots: input.pilots.eligibleIds.length,
    attendants: input.attendants.eligibleIds.length,
  };
  const grandfatheredPilotIds = grandfathered(input.pilots, input.assignedPilotIds);
  const grandfatheredAttendantIds = grandfathered(
    input.attendants,
    input.assignedAttendantIds,
  );
  const sufficient = hasEnoughCrew(available, required);

  return {
    required,
    available,
    selectablePilotIds: [...input.pilots.eligibleIds, ...grandfatheredPilotIds],
    selectableAttendantIds: [
      ...input.attendants.eligibleIds,
      ...grandfatheredAttendantIds,
    ],
    grandfatheredPilotIds,
    grandfatheredAttendantIds,
    sufficient,
    deficitMessage: sufficient ? null : crewDeficitMessage(available, required),
  };
}

export function validateCrewSelection(
  options: CrewOptions,
  pilotIds: string[],
  attendantIds: string[],
): string[] {
  const violations: string[] = [];
  const check = (
    label: string,
    ids: string[],
    required: number,
    selectable: string[],
  ) => {
    if (new Set(ids).size !== ids.length) {
      violations.push(`Duplicate ${label} in selection`);
    }
    if (ids.length !== required) {
      violations.push(`Exactly ${required} ${label} required, got ${ids.length}`);
    }
    for (const id of ids) {
      if (!selectable.includes(id)) {
        violations.push(`Crew member ${id} is not available for this flight`);
      }
    }
  };

  check('pilots', pilotIds, options.required.pilots, options.selectablePilotIds);
  check(
    'attendants',
    attendantIds,
    options.required.attendants,
    options.selectableAttendantIds,
  );
  return violations;
}
