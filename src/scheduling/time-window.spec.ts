import { computeArrival, hoursUntil, isLongHaul, windowsOverlap } from './time-window';
import { at } from './testing/fixtures';

describe('time windows', () => {
  it('derives arrival from departure and duration', () => {
    expect(computeArrival(at('2030-01-01T22:30:00'), 150).toISOString()).toBe(
      '2030-01-02T01:00:00.000Z',
    );
  });

  it('treats back-to-back windows as free', () => {
    const a = { departure: at('2030-01-01T08:00:00'), arrival: at('2030-01-01T10:00:00') };
    const b = { departure: at('2030-01-01T10:00:00'), arrival: at('2030-01-01T12:00:00') };
    expect(windowsOverlap(a, b)).toBe(false);
    expect(windowsOverlap(b, a)).toBe(false);
  });

  it('detects partial and contained overlaps', () => {
    const a = { departure: at('2030-01-01T08:00:00'), arrival: at('2030-01-01T10:00:00') };
    expect(
      windowsOverlap(a, { departure: at('2030-01-01T09:59:00'), arrival: at('2030-01-01T11:00:00') }),
    ).toBe(true);
    expect(
      windowsOverlap(a, { departure: at('2030-01-01T08:30:00'), arrival: at('2030-01-01T09:00:00') }),
    ).toBe(true);
  });

  it('uses a strict long-haul threshold', () => {
    expect(isLongHaul(360, 360)).toBe(false);
    expect(isLongHaul(361, 360)).toBe(true);
  });

  it('measures hours to departure', () => {
    expect(hoursUntil(at('2030-01-02T16:00:00'), at('2030-01-01T00:00:00'))).toBe(40);
  });
});
