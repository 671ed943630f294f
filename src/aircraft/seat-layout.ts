import type { AircraftSize, SeatClass } from '../db/schema';

export interface SeatLayoutRequest {
  businessRows?: number;
  businessCols?: number;
  economyRows: number;
  economyCols: number;
}

export interface SeatPosition {
  rowNum: number;
  colNum: number;
  seatClass: SeatClass;
}

export type SeatLayoutResult =
  | { ok: true; seats: SeatPosition[] }
  | { ok: false; violations: string[] };

function block(firstRow: number, rows: number, cols: number, seatClass: SeatClass) {
  const seats: SeatPosition[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 1; c <= cols; c++) {
      seats.push({ rowNum: firstRow + r, colNum: c, seatClass });
    }
  }
  return seats;
}

/** Large aircraft: business rows first, economy continues the row numbering. Small: economy only. */
export function buildSeatLayout(size: AircraftSize, req: SeatLayoutRequest): SeatLayoutResult {
  const businessRows = req.businessRows ?? 0;
  const businessCols = req.businessCols ?? 0;
  const violations: string[] = [];

  if (size === 'Small' && (businessRows > 0 || businessCols > 0)) {
    violations.push('Small aircraft carry economy seats only');
  }
  if (size === 'Large' && (businessRows < 1 || businessCols < 1)) {
    violations.push('Large aircraft need at least one business row and column');
  }
  if (req.economyRows < 1 || req.economyCols < 1) {
    violations.push('Economy rows and columns must be positive');
  }
  if (violations.length > 0) return { ok: false, violations };

  const business = size === 'Large' ? block(1, businessRows, businessCols, 'Business') : [];
  const firstEconomyRow = size === 'Large' ? businessRows + 1 : 1;
  return {
    ok: true,
    seats: [...business, ...block(firstEconomyRow, req.economyRows, req.economyCols, 'Economy')],
  };
}
