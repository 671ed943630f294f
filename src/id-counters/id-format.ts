import type { Manufacturer } from '../db/schema';

export type CounterName = 'Flight' | 'FlightSeat' | 'Order' | 'Seat' | 'Aircraft';

const FORMATS: Record<CounterName, { prefix: string; width: number }> = {
  Flight: { prefix: 'FT', width: 3 },
  FlightSeat: { prefix: 'FS', width: 6 },
  Order: { prefix: 'O', width: 9 },
  Seat: { prefix: 'S', width: 3 },
  Aircraft: { prefix: 'AC', width: 3 },
};

export function formatId(name: Exclude<CounterName, 'Aircraft'>, num: number): string {
  const { prefix, width } = FORMATS[name];
  return `${prefix}${String(num).padStart(width, '0')}`;
}

// ACB001, ACA002, ACD003: one running number across manufacturers
export function formatAircraftId(manufacturer: Manufacturer, num: number): string {
  const { prefix, width } = FORMATS.Aircraft;
  return `${prefix}${manufacturer.charAt(0)}${String(num).padStart(width, '0')}`;
}

/** Consecutive ids starting at `first`. */
export function idRange(
  name: Exclude<CounterName, 'Aircraft'>,
  first: number,
  count: number,
): string[] {
  return Array.from({ length: count }, (_, i) => formatId(name, first + i));
}
