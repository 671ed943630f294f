import type { CrewCandidate, FlightWindow, ScheduledLeg } from '../scheduling.types';
import { computeArrival } from '../time-window';

export const at = (iso: string) => new Date(`${iso}Z`);

export function leg(
  flightId: string,
  origin: string,
  destination: string,
  departure: string,
  durationMinutes: number,
  cancelled = false,
): ScheduledLeg {
  const dep = at(departure);
  return {
    flightId,
    origin,
    destination,
    departure: dep,
    arrival: computeArrival(dep, durationMinutes),
    cancelled,
  };
}

export function flightWindow(
  origin: string,
  destination: string,
  departure: string,
  durationMinutes: number,
  extra: Partial<FlightWindow> = {},
): FlightWindow {
  const dep = at(departure);
  return {
    origin,
    destination,
    departure: dep,
    arrival: computeArrival(dep, durationMinutes),
    longHaul: false,
    ...extra,
  };
}

export function crew(
  id: string,
  assignments: ScheduledLeg[] = [],
  longHaulCertified = false,
): CrewCandidate {
  return { id, longHaulCertified, assignments };
}
