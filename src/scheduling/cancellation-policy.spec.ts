import {
  chargedAmountCents,
  customerMayCancel,
  managerMayCancelFlight,
  quoteCancellation,
} from './cancellation-policy';
import { at } from './testing/fixtures';

describe('cancellation policy', () => {
  const departure = at('2030-08-03T12:00:00');

  it('lets a customer cancel 40 hours out but not 30 hours out', () => {
    expect(customerMayCancel(departure, at('2030-08-01T20:00:00'), 36)).toBe(true);
    expect(customerMayCancel(departure, at('2030-08-02T06:00:00'), 36)).toBe(false);
  });

  it('refuses a customer cancellation at exactly 36 hours', () => {
    expect(customerMayCancel(departure, at('2030-08-02T00:00:00'), 36)).toBe(false);
  });

  it('lets a manager cancel a flight from 72 hours out', () => {
    expect(managerMayCancelFlight(departure, at('2030-07-31T12:00:00'), 72)).toBe(true);
    expect(managerMayCancelFlight(departure, at('2030-07-31T12:00:01'), 72)).toBe(false);
  });

  it('keeps a 5% fee on the paid total', () => {
    // 37.525 rounds to 37.52
    expect(quoteCancellation(['400.00', '350.50'], 5)).toEqual({
      totalCents: 75050,
      feeCents: 3752,
      refundCents: 71298,
    });
  });

  it('rounds the fee half to even', () => {
    // 5% of 0.30 = 0.015
    expect(quoteCancellation(['0.30'], 5)).toEqual({
      totalCents: 30,
      feeCents: 2,
      refundCents: 28,
    });
  });

  it('quotes an empty order as zero', () => {
    expect(quoteCancellation([], 5)).toEqual({ totalCents: 0, feeCents: 0, refundCents: 0 });
  });

  it('shows the fee for customer cancellations and nothing for system ones', () => {
    expect(chargedAmountCents('Active', 40000, 5)).toBe(40000);
    expect(chargedAmountCents('Cancelled-Customer', 40000, 5)).toBe(2000);
    expect(chargedAmountCents('Cancelled-System', 40000, 5)).toBe(0);
  });
});
