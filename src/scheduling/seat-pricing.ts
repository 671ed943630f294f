import type { AircraftSize, SeatClass } from '../db/schema';
import type { PricedSeat } from './scheduling.types';

export function defaultSeatPriceCents(
  seatClass: SeatClass,
  size: AircraftSize,
  longHaul: boolean,
): number {
  if (longHaul) return seatClass === 'Business' ? 120_000 : 40_000;
  if (seatClass === 'Economy') return 20_000;
  return size === 'Large' ? 70_000 : 120_000;
}

/**
 * Price a released seat should go back on sale at: the lowest price among
 * unsold seats of its class, else the lowest price of the class at all.
 * `others` must not include the seats being released.
 */
export function currentClassPriceCents(
  others: PricedSeat[],
  seatClass: SeatClass,
): number | null {
  const priced = others.filter(
    (s): s is PricedSeat & { priceCents: number } =>
      s.seatClass === seatClass && s.priceCents !== null,
  );
  const unsold = priced.filter((s) => s.status !== 'Sold');
  const pool = unsold.length > 0 ? unsold : priced;
  if (pool.length === 0) return null;
  return Math.min(...pool.map((s) => s.priceCents));
}
