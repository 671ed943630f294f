import type { OrderStatus } from '../db/schema';
import { percentOf, toCents } from './money';
import { hoursUntil } from './time-window';

export interface CancellationQuote {
  totalCents: number;
  feeCents: number;
  refundCents: number;
}

export function quoteCancellation(
  paidPrices: Array<string | number>,
  feePercent: number,
): CancellationQuote {
  const totalCents = paidPrices.reduce<number>((sum, p) => sum + toCents(p), 0);
  const feeCents = percentOf(totalCents, feePercent);
  return {
    totalCents,
    feeCents,
    refundCents: Math.max(totalCents - feeCents, 0),
  };
}

export function customerMayCancel(departure: Date, now: Date, minHours: number): boolean {
  return hoursUntil(departure, now) > minHours;
}

export function managerMayCancelFlight(
  departure: Date,
  now: Date,
  minHours: number,
): boolean {
  return hoursUntil(departure, now) >= minHours;
}

/** What an order listing shows as charged: the fee once a customer cancelled, nothing after a system cancel. */
export function chargedAmountCents(
  status: OrderStatus,
  totalCents: number,
  feePercent: number,
): number {
  switch (status) {
    case 'Cancelled-Customer':
      return percentOf(totalCents, feePercent);
    case 'Cancelled-System':
      return 0;
    default:
      return totalCents;
  }
}
