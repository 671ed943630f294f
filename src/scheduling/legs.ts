import type { ScheduledLeg, TimeWindow } from './scheduling.types';
import { windowsOverlap } from './time-window';

export function liveLegs(legs: ScheduledLeg[], ignoreFlightId?: string): ScheduledLeg[] {
  return legs.filter((l) => !l.cancelled && l.flightId !== ignoreFlightId);
}

export function firstOverlap(
  legs: ScheduledLeg[],
  window: TimeWindow,
): ScheduledLeg | undefined {
  return legs.find((l) => windowsOverlap(l, window));
}

/** Latest leg matching `qualifies`, ordered by departure. */
export function latestLeg(
  legs: ScheduledLeg[],
  qualifies: (leg: ScheduledLeg) => boolean,
): ScheduledLeg | undefined {
  let best: ScheduledLeg | undefined;
  for (const leg of legs) {
    if (!qualifies(leg)) continue;
    if (!best || leg.departure.getTime() > best.departure.getTime()) best = leg;
  }
  return best;
}

/** Earliest leg departing at or after `from`. */
export function earliestLegFrom(legs: ScheduledLeg[], from: Date): ScheduledLeg | undefined {
  let best: ScheduledLeg | undefined;
  for (const leg of legs) {
    if (leg.departure.getTime() < from.getTime()) continue;
    if (!best || leg.departure.getTime() < best.departure.getTime()) best = leg;
  }
  return best;
}
