import type { TimeWindow } from './scheduling.types';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

export function computeArrival(departure: Date, durationMinutes: number): Date {
  return new Date(departure.getTime() + durationMinutes * MINUTE_MS);
}

/** Half-open [departure, arrival) windows; back-to-back legs do not overlap. */
export function windowsOverlap(a: TimeWindow, b: TimeWindow): boolean {
  return !(
    a.arrival.getTime() <= b.departure.getTime() ||
    a.departure.getTime() >= b.arrival.getTime()
  );
}

export function isLongHaul(durationMinutes: number, thresholdMinutes: number): boolean {
  return durationMinutes > thresholdMinutes;
}

export function hoursUntil(target: Date, now: Date): number {
  return (target.getTime() - now.getTime()) / HOUR_MS;
}

export function formatWindow(w: TimeWindow): string {
  return `${w.departure.toISOString()} - ${w.arrival.toISOString()}`;
}
