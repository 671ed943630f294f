import { buildCrewOptions, validateCrewSelection } from './crew-selection';
import { eligibleCrew } from './crew-eligibility';
import { crew, flightWindow, leg } from './testing/fixtures';

describe('crew selection', () => {
  const window = flightWindow('TLV', 'ATH', '2030-05-01T08:00:00', 120, { flightId: 'FT020' });
  const pilots = [crew('P1'), crew('P2')];
  const attendants = [crew('A1'), crew('A2'), crew('A3')];

  const options = (attendantPool = attendants, assignedAttendantIds: string[] = []) =>
    buildCrewOptions({
      size: 'Small',
      pilots: eligibleCrew(window, 'pilot', pilots, 'strict'),
      attendants: eligibleCrew(window, 'attendant', attendantPool, 'strict'),
      assignedPilotIds: [],
      assignedAttendantIds,
    });

  it('passes with exactly the crew a Small aircraft needs', () => {
    const result = options();
    expect(result.sufficient).toBe(true);
    expect(result.required).toEqual({ pilots: 2, attendants: 3 });
    expect(result.deficitMessage).toBeNull();
  });

  it('refuses with a deficit message when one attendant is missing', () => {
    const result = options(attendants.slice(0, 2));
    expect(result.sufficient).toBe(false);
    expect(result.deficitMessage).toBe('pilots 2/2, attendants 2/3');
  });

  it('keeps an assigned member who only breaks continuity selectable but uncounted', () => {
    const displaced = crew('A3', [leg('FT019', 'LCA', 'ROM', '2030-05-01T04:00:00', 60)]);
    const result = options([attendants[0], attendants[1], displaced], ['A3']);
    expect(result.grandfatheredAttendantIds).toEqual(['A3']);
    expect(result.selectableAttendantIds).toEqual(['A1', 'A2', 'A3']);
    expect(result.available.attendants).toBe(2);
    expect(result.deficitMessage).toBe('pilots 2/2, attendants 2/3');
  });

  it('does not grandfather a member who is not currently assigned', () => {
    const displaced = crew('A3', [leg('FT019', 'LCA', 'ROM', '2030-05-01T04:00:00', 60)]);
    const result = options([attendants[0], attendants[1], displaced]);
    expect(result.selectableAttendantIds).toEqual(['A1', 'A2']);
  });

  it('validates exact counts and membership', () => {
    const result = options();
    expect(validateCrewSelection(result, ['P1', 'P2'], ['A1', 'A2', 'A3'])).toEqual([]);
    expect(validateCrewSelection(result, ['P1'], ['A1', 'A2', 'A9'])).toEqual([
      'Exactly 2 pilots required, got 1',
      'Crew member A9 is not available for this flight',
    ]);
    expect(validateCrewSelection(result, ['P1', 'P1'], ['A1', 'A2', 'A3'])).toEqual([
      'Duplicate pilots in selection',
    ]);
  });
});
