import type {
  CrewCandidate,
  CrewEligibility,
  CrewEvaluation,
  CrewRole,
  CrewRule,
  EligibilityMode,
  FlightWindow,
} from './scheduling.types';
import { earliestLegFrom, firstOverlap, latestLeg, liveLegs } from './legs';

export const CONTINUITY_RULES: readonly CrewRule[] = ['predecessor', 'successor'];

export function evaluateCrewMember(
  window: FlightWindow,
  member: CrewCandidate,
  mode: EligibilityMode,
): CrewEvaluation {
  const legs = liveLegs(member.assignments, window.flightId);
  const failures: CrewRule[] = [];

  if (firstOverlap(legs, window)) failures.push('overlap');
  if (window.longHaul && !member.longHaulCertified) failures.push('certification');

  if (mode === 'strict') {
    const before = latestLeg(
      legs,
      (l) => l.departure.getTime() < window.departure.getTime(),
    );
    if (before && before.destination !== window.origin) failures.push('predecessor');

    const after = earliestLegFrom(legs, window.arrival);
    if (after && after.origin !== window.destination) failures.push('successor');
  }

  return { id: member.id, eligible: failures.length === 0, failures };
}

export function eligibleCrew(
  window: FlightWindow,
  role: CrewRole,
  pool: CrewCandidate[],
  mode: EligibilityMode,
): CrewEligibility {
  const evaluations = pool.map((m) => evaluateCrewMember(window, m, mode));
  return {
    role,
    eligibleIds: evaluations.filter((e) => e.eligible).map((e) => e.id),
    evaluations,
  };
}

/** Fails only on location continuity; may stay on a flight it is already assigned to. */
export function isGrandfathered(evaluation: CrewEvaluation): boolean {
  return (
    !evaluation.eligible &&
    evaluation.failures.every((f) => CONTINUITY_RULES.includes(f))
  );
}
