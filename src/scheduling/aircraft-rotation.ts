import type { RotationCandidate, RotationResult, ScheduledLeg } from './scheduling.types';
import { computeArrival, formatWindow, isLongHaul } from './time-window';
import { earliestLegFrom, firstOverlap, latestLeg, liveLegs } from './legs';

/**
 * Checks that an aircraft can fly `candidate` given its other flights.
 *
 * New flights must continue the aircraft's airport chain in both directions;
 * edits (`ignoreFlightId`) only need a free time slot.
 */
export function checkAircraftRotation(
  candidate: RotationCandidate,
  history: ScheduledLeg[],
  longHaulThresholdMinutes: number,
): RotationResult {
  const { aircraftId, route, departure } = candidate;
  const arrival = computeArrival(departure, route.durationMinutes);
  const longHaul = isLongHaul(route.durationMinutes, longHaulThresholdMinutes);
  const violations: string[] = [];

  if (!candidate.ignoreFlightId && candidate.seatCount === 0) {
    violations.push(`Aircraft ${aircraftId} has no seat layout`);
  }
  if (longHaul && candidate.size !== 'Large') {
    violations.push(
      `Aircraft ${aircraftId} is ${candidate.size}; long-haul routes require a Large aircraft`,
    );
  }

  const legs = liveLegs(history, candidate.ignoreFlightId);
  const clash = firstOverlap(legs, { departure, arrival });
  if (clash) {
    violations.push(
      `Aircraft ${aircraftId} is already flying ${clash.flightId} (${formatWindow(clash)})`,
    );
  }

  if (!candidate.ignoreFlightId) {
    const previous = latestLeg(
      legs,
      (l) => l.arrival.getTime() <= departure.getTime(),
    );
    if (previous && previous.destination !== route.origin) {
      violations.push(
        `Aircraft ${aircraftId} will be at ${previous.destination} after flight ${previous.flightId}, not at ${route.origin}`,
      );
    }
    const next = earliestLegFrom(legs, arrival);
    if (next && next.origin !== route.destination) {
      violations.push(
        `Aircraft ${aircraftId} must depart ${next.origin} for flight ${next.flightId}, but this flight lands at ${route.destination}`,
      );
    }
  }

  return { ok: violations.length === 0, arrival, longHaul, violations };
}
