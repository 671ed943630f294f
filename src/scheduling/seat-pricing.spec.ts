import { currentClassPriceCents, defaultSeatPriceCents } from './seat-pricing';

describe('seat pricing', () => {
  it('prices by class, size and haul', () => {
    expect(defaultSeatPriceCents('Business', 'Large', true)).toBe(120_000);
    expect(defaultSeatPriceCents('Economy', 'Large', true)).toBe(40_000);
    expect(defaultSeatPriceCents('Business', 'Large', false)).toBe(70_000);
    expect(defaultSeatPriceCents('Economy', 'Small', false)).toBe(20_000);
  });

  it('re-prices a released seat at the cheapest unsold seat of its class', () => {
    expect(
      currentClassPriceCents(
        [
          { flightSeatId: 'FS000001', seatClass: 'Economy', status: 'Available', priceCents: 25_000 },
          { flightSeatId: 'FS000002', seatClass: 'Economy', status: 'Blocked', priceCents: 22_000 },
          { flightSeatId: 'FS000003', seatClass: 'Economy', status: 'Sold', priceCents: 18_000 },
          { flightSeatId: 'FS000004', seatClass: 'Business', status: 'Available', priceCents: 9_000 },
        ],
        'Economy',
      ),
    ).toBe(22_000);
  });

  it('falls back to sold seats, then to nothing', () => {
    const sold = [
      { flightSeatId: 'FS000003', seatClass: 'Economy' as const, status: 'Sold' as const, priceCents: 18_000 },
    ];
    expect(currentClassPriceCents(sold, 'Economy')).toBe(18_000);
    expect(currentClassPriceCents(sold, 'Business')).toBeNull();
  });
});
