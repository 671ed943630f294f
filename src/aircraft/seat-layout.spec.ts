import { buildSeatLayout } from './seat-layout';

describe('buildSeatLayout', () => {
  it('numbers economy rows after business rows on Large aircraft', () => {
    const result = buildSeatLayout('Large', {
      businessRows: 1,
      businessCols: 2,
      economyRows: 2,
      economyCols: 1,
    });
    expect(result).toEqual({
      ok: true,
      seats: [
        { rowNum: 1, colNum: 1, seatClass: 'Business' },
        { rowNum: 1, colNum: 2, seatClass: 'Business' },
        { rowNum: 2, colNum: 1, seatClass: 'Economy' },
        { rowNum: 3, colNum: 1, seatClass: 'Economy' },
      ],
    });
  });

  it('lays out Small aircraft in economy from row 1', () => {
    const result = buildSeatLayout('Small', { economyRows: 2, economyCols: 3 });
    expect(result.ok && result.seats).toHaveLength(6);
    expect(result.ok && result.seats[0]).toEqual({ rowNum: 1, colNum: 1, seatClass: 'Economy' });
  });

  it('rejects business seats on Small aircraft', () => {
    expect(
      buildSeatLayout('Small', { businessRows: 1, businessCols: 2, economyRows: 2, economyCols: 3 }),
    ).toEqual({ ok: false, violations: ['Small aircraft carry economy seats only'] });
  });

  it('requires a business cabin and positive economy on Large aircraft', () => {
    expect(buildSeatLayout('Large', { economyRows: 0, economyCols: 4 })).toEqual({
      ok: false,
      violations: [
        'Large aircraft need at least one business row and column',
        'Economy rows and columns must be positive',
      ],
    });
  });
});
