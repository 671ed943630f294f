import type {
  AircraftSize,
  FlightSeatStatus,
  FlightStatus,
  OrderStatus,
  SeatClass,
} from '../db/schema';

export type CrewRole = 'pilot' | 'attendant';

// strict: new flights and crew assignment. relaxed: edits of a scheduled flight.
export type EligibilityMode = 'strict' | 'relaxed';

export interface TimeWindow {
  departure: Date;
  arrival: Date;
}

export interface FlightWindow extends TimeWindow {
  /** Set when the window belongs to an existing flight; its own history rows are ignored. */
  flightId?: string;
  origin: string;
  destination: string;
  longHaul: boolean;
}

/** One leg in a crew member's or an aircraft's history. */
export interface ScheduledLeg extends TimeWindow {
  flightId: string;
  origin: string;
  destination: string;
  cancelled: boolean;
}

export interface CrewCandidate {
  id: string;
  longHaulCertified: boolean;
  assignments: ScheduledLeg[];
}

export type CrewRule = 'overlap' | 'certification' | 'predecessor' | 'successor';

export interface CrewEvaluation {
  id: string;
  eligible: boolean;
  failures: CrewRule[];
}

export interface CrewEligibility {
  role: CrewRole;
  eligibleIds: string[];
  evaluations: CrewEvaluation[];
}

export interface CrewRequirement {
  pilots: number;
  attendants: number;
}

export interface RouteLeg {
  origin: string;
  destination: string;
  durationMinutes: number;
}

export interface RotationCandidate {
  aircraftId: string;
  size: AircraftSize;
  /** Seats in the aircraft's layout; only checked for new flights. */
  seatCount?: number;
  route: RouteLeg;
  departure: Date;
  /** Present for edits: positioning and layout checks are waived and this flight is left out of the overlap check. */
  ignoreFlightId?: string;
}

export interface RotationResult {
  ok: boolean;
  arrival: Date;
  longHaul: boolean;
  violations: string[];
}

export interface SeatSnapshot {
  id: string;
  status: FlightSeatStatus;
}

export interface OrderSnapshot {
  code: string;
  status: OrderStatus;
  cancelledAt: Date | null;
}

export interface TicketSnapshot {
  flightSeatId: string;
  orderCode: string;
}

export interface FlightSnapshot extends TimeWindow {
  id: string;
  status: FlightStatus;
  seats: SeatSnapshot[];
  orders: OrderSnapshot[];
  tickets: TicketSnapshot[];
  crewCount: number;
}

export interface StatusChanges {
  flightId: string;
  flightStatus?: FlightStatus;
  seats: { id: string; status: FlightSeatStatus }[];
  orders: { code: string; status: OrderStatus; cancelledAt?: Date }[];
  clearCrew: boolean;
}

export interface PricedSeat {
  flightSeatId: string;
  seatClass: SeatClass;
  status: FlightSeatStatus;
  priceCents: number | null;
}
