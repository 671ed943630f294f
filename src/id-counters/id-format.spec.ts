import { formatAircraftId, formatId, idRange } from './id-format';

describe('id formats', () => {
  it('pads each sequence to its width', () => {
    expect(formatId('Flight', 7)).toBe('FT007');
    expect(formatId('FlightSeat', 42)).toBe('FS000042');
    expect(formatId('Order', 1)).toBe('O000000001');
    expect(formatId('Seat', 120)).toBe('S120');
  });

  it('does not truncate past the width', () => {
    expect(formatId('Flight', 1234)).toBe('FT1234');
  });

  it('prefixes aircraft with the manufacturer initial', () => {
    expect(formatAircraftId('Boeing', 1)).toBe('ACB001');
    expect(formatAircraftId('Dasso', 12)).toBe('ACD012');
  });

  it('expands a reserved block', () => {
    expect(idRange('FlightSeat', 99, 3)).toEqual(['FS000099', 'FS000100', 'FS000101']);
  });
});
