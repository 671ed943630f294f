import { relations } from 'drizzle-orm';
import {
  pgEnum,
  pgTable,
  varchar,
  integer,
  bigint,
  timestamp,
  boolean,
  numeric,
  primaryKey,
  serial,
  index,
  unique,
} from 'drizzle-orm/pg-core';

/* ──────────────────────────────── ENUMS ──────────────────────────────── */
// Values are persisted verbatim; existing data depends on these spellings.
export const flightStatusEnum = pgEnum('flight_status', [
  'Active',
  'Full-Occupied',
  'Completed',
  'Cancelled',
]);

export const flightSeatStatusEnum = pgEnum('flight_seat_status', [
  'Available',
  'Sold',
  'Blocked',
]);

export const orderStatusEnum = pgEnum('order_status', [
  'Active',
  'Completed',
  'Cancelled-Customer',
  'Cancelled-System',
]);

export const aircraftSizeEnum = pgEnum('aircraft_size', ['Small', 'Large']);

export const seatClassEnum = pgEnum('seat_class', ['Business', 'Economy']);

export const manufacturerEnum = pgEnum('manufacturer', [
  'Boeing',
  'Airbus',
  'Dasso',
]);

export const customerTypeEnum = pgEnum('customer_type', ['Register', 'Guest']);

export type FlightStatus = (typeof flightStatusEnum.enumValues)[number];
export type FlightSeatStatus = (typeof flightSeatStatusEnum.enumValues)[number];
export type OrderStatus = (typeof orderStatusEnum.enumValues)[number];
export type AircraftSize = (typeof aircraftSizeEnum.enumValues)[number];
export type SeatClass = (typeof seatClassEnum.enumValues)[number];
export type Manufacturer = (typeof manufacturerEnum.enumValues)[number];
export type CustomerType = (typeof customerTypeEnum.enumValues)[number];

/* ─────────────────────────────── NETWORK ─────────────────────────────── */
export const airports = pgTable('airports', {
  code: varchar('code', { length: 10 }).primaryKey(),
  name: varchar('name', { length: 60 }).notNull(),
  city: varchar('city', { length: 60 }).notNull(),
  country: varchar('country', { length: 60 }).notNull(),
});

export const flightRoutes = pgTable(
  'flight_routes',
  {
    id: varchar('id', { length: 10 }).primaryKey(),
    durationMinutes: integer('duration_minutes').notNull(),
    originCode: varchar('origin_code', { length: 10 })
      .notNull()
      .references(() => airports.code, { onDelete: 'restrict' }),
    destinationCode: varchar('destination_code', { length: 10 })
      .notNull()
      .references(() => airports.code, { onDelete: 'restrict' }),
  },
  (t) => [unique('flight_routes_origin_dest_uq').on(t.originCode, t.destinationCode)],
);

/* ──────────────────────────────── FLEET ──────────────────────────────── */
export const aircraft = pgTable('aircraft', {
  id: varchar('id', { length: 10 }).primaryKey(),
  manufacturer: manufacturerEnum('manufacturer').notNull(),
  model: varchar('model', { length: 40 }).notNull(),
  size: aircraftSizeEnum('size').notNull(),
  purchasedAt: timestamp('purchased_at').notNull().defaultNow(),
});

// Seat template, shared by every flight the aircraft operates.
export const seats = pgTable(
  'seats',
  {
    id: varchar('id', { length: 10 }).primaryKey(),
    aircraftId: varchar('aircraft_id', { length: 10 })
      .notNull()
      .references(() => aircraft.id, { onDelete: 'restrict' }),
    rowNum: integer('row_num').notNull(),
    colNum: integer('col_num').notNull(),
    seatClass: seatClassEnum('seat_class').notNull(),
  },
  (t) => [unique('seats_aircraft_row_col_uq').on(t.aircraftId, t.rowNum, t.colNum)],
);

/* ─────────────────────────────── FLIGHTS ─────────────────────────────── */
// Arrival is never stored: departure + route duration.
export const flights = pgTable(
  'flights',
  {
    id: varchar('id', { length: 10 }).primaryKey(),
    departureAt: timestamp('departure_at').notNull(),
    status: flightStatusEnum('status').notNull().default('Active'),
    aircraftId: varchar('aircraft_id', { length: 10 })
      .notNull()
      .references(() => aircraft.id, { onDelete: 'restrict' }),
    routeId: varchar('route_id', { length: 10 })
      .notNull()
      .references(() => flightRoutes.id, { onDelete: 'restrict' }),
    crewVersion: integer('crew_version').notNull().default(0),
  },
  (t) => [
    index('flights_aircraft_departure_idx').on(t.aircraftId, t.departureAt),
    index('flights_status_idx').on(t.status),
  ],
);

export const flightSeats = pgTable(
  'flight_seats',
  {
    id: varchar('id', { length: 10 }).primaryKey(),
    flightId: varchar('flight_id', { length: 10 })
      .notNull()
      .references(() => flights.id, { onDelete: 'restrict' }),
    seatId: varchar('seat_id', { length: 10 })
      .notNull()
      .references(() => seats.id, { onDelete: 'restrict' }),
    price: numeric('price', { precision: 8, scale: 2 }),
    status: flightSeatStatusEnum('status').notNull().default('Available'),
  },
  (t) => [
    unique('flight_seats_flight_seat_uq').on(t.flightId, t.seatId),
    index('flight_seats_flight_idx').on(t.flightId),
  ],
);

/* ────────────────────────────── CUSTOMERS ────────────────────────────── */
export const registeredCustomers = pgTable('registered_customers', {
  email: varchar('email', { length: 80 }).primaryKey(),
  firstName: varchar('first_name', { length: 40 }).notNull(),
  lastName: varchar('last_name', { length: 40 }).notNull(),
  passportNo: varchar('passport_no', { length: 8 }).notNull().unique(),
  registeredAt: timestamp('registered_at').notNull().defaultNow(),
  birthDate: timestamp('birth_date').notNull(),
});

export const registeredCustomerPhones = pgTable(
  'registered_customer_phones',
  {
    email: varchar('email', { length: 80 })
      .notNull()
      .references(() => registeredCustomers.email, { onDelete: 'cascade' }),
    phone: varchar('phone', { length: 20 }).notNull(),
  },
  (t) => [primaryKey({ columns: [t.email, t.phone] })],
);

export const guestCustomers = pgTable('guest_customers', {
  email: varchar('email', { length: 80 }).primaryKey(),
  firstName: varchar('first_name', { length: 40 }).notNull(),
  lastName: varchar('last_name', { length: 40 }).notNull(),
});

export const guestCustomerPhones = pgTable(
  'guest_customer_phones',
  {
    email: varchar('email', { length: 80 })
      .notNull()
      .references(() => guestCustomers.email, { onDelete: 'cascade' }),
    phone: varchar('phone', { length: 20 }).notNull(),
  },
  (t) => [primaryKey({ columns: [t.email, t.phone] })],
);

/* ───────────────────────────── ORDERS ────────────────────────────────── */
export const orders = pgTable(
  'orders',
  {
    code: varchar('code', { length: 10 }).primaryKey(),
    orderedAt: timestamp('ordered_at').notNull().defaultNow(),
    status: orderStatusEnum('status').notNull().default('Active'),
    cancelledAt: timestamp('cancelled_at'),
    flightId: varchar('flight_id', { length: 10 })
      .notNull()
      .references(() => flights.id, { onDelete: 'restrict' }),
    customerEmail: varchar('customer_email', { length: 80 }).notNull(),
    customerType: customerTypeEnum('customer_type').notNull(),
  },
  (t) => [
    index('orders_flight_idx').on(t.flightId),
    index('orders_customer_idx').on(t.customerEmail),
  ],
);

// Paid price is the historical purchase amount; never rewritten.
export const tickets = pgTable(
  'tickets',
  {
    id: serial('id').primaryKey(),
    flightSeatId: varchar('flight_seat_id', { length: 10 })
      .notNull()
      .references(() => flightSeats.id, { onDelete: 'restrict' }),
    orderCode: varchar('order_code', { length: 10 })
      .notNull()
      .references(() => orders.code, { onDelete: 'restrict' }),
    paidPrice: numeric('paid_price', { precision: 8, scale: 2 }).notNull(),
  },
  (t) => [
    index('tickets_flight_seat_idx').on(t.flightSeatId),
    index('tickets_order_idx').on(t.orderCode),
  ],
);

/* ──────────────────────────────── CREW ───────────────────────────────── */
export const pilots = pgTable('pilots', {
  id: varchar('id', { length: 9 }).primaryKey(),
  firstName: varchar('first_name', { length: 40 }).notNull(),
  lastName: varchar('last_name', { length: 40 }).notNull(),
  city: varchar('city', { length: 60 }).notNull(),
  street: varchar('street', { length: 60 }).notNull(),
  houseNumber: integer('house_number').notNull(),
  phone: varchar('phone', { length: 20 }).notNull(),
  startedAt: timestamp('started_at').notNull().defaultNow(),
  longHaulCertified: boolean('long_haul_certified').notNull().default(false),
});

export const attendants = pgTable('attendants', {
  id: varchar('id', { length: 9 }).primaryKey(),
  firstName: varchar('first_name', { length: 40 }).notNull(),
  lastName: varchar('last_name', { length: 40 }).notNull(),
  city: varchar('city', { length: 60 }).notNull(),
  street: varchar('street', { length: 60 }).notNull(),
  houseNumber: integer('house_number').notNull(),
  phone: varchar('phone', { length: 20 }).notNull(),
  startedAt: timestamp('started_at').notNull().defaultNow(),
  longHaulCertified: boolean('long_haul_certified').notNull().default(false),
});

export const flightCrewPilots = pgTable(
  'flight_crew_pilots',
  {
    pilotId: varchar('pilot_id', { length: 9 })
      .notNull()
      .references(() => pilots.id, { onDelete: 'restrict' }),
    flightId: varchar('flight_id', { length: 10 })
      .notNull()
      .references(() => flights.id, { onDelete: 'cascade' }),
  },
  (t) => [primaryKey({ columns: [t.pilotId, t.flightId] })],
);

export const flightCrewAttendants = pgTable(
  'flight_crew_attendants',
  {
    attendantId: varchar('attendant_id', { length: 9 })
      .notNull()
      .references(() => attendants.id, { onDelete: 'restrict' }),
    flightId: varchar('flight_id', { length: 10 })
      .notNull()
      .references(() => flights.id, { onDelete: 'cascade' }),
  },
  (t) => [primaryKey({ columns: [t.attendantId, t.flightId] })],
);

/* ───────────────────────────── ID COUNTERS ───────────────────────────── */
export const idCounters = pgTable('id_counters', {
  name: varchar('name', { length: 50 }).primaryKey(),
  nextNum: bigint('next_num', { mode: 'number' }).notNull(),
});

/* ────────────────────────────── RELATIONS ────────────────────────────── */
export const airportsRelations = relations(airports, ({ many }) => ({
  originRoutes: many(flightRoutes, { relationName: 'originAirport' }),
  destinationRoutes: many(flightRoutes, { relationName: 'destinationAirport' }),
}));

export const flightRoutesRelations = relations(flightRoutes, ({ one, many }) => ({
  originAirport: one(airports, {
    fields: [flightRoutes.originCode],
    references: [airports.code],
    relationName: 'originAirport',
  }),
  destinationAirport: one(airports, {
    fields: [flightRoutes.destinationCode],
    references: [airports.code],
    relationName: 'destinationAirport',
  }),
  flights: many(flights),
}));

export const aircraftRelations = relations(aircraft, ({ many }) => ({
  seats: many(seats),
  flights: many(flights),
}));

export const seatsRelations = relations(seats, ({ one, many }) => ({
  aircraft: one(aircraft, {
    fields: [seats.aircraftId],
    references: [aircraft.id],
  }),
  flightSeats: many(flightSeats),
}));

export const flightsRelations = relations(flights, ({ one, many }) => ({
  route: one(flightRoutes, {
    fields: [flights.routeId],
    references: [flightRoutes.id],
  }),
  aircraft: one(aircraft, {
    fields: [flights.aircraftId],
    references: [aircraft.id],
  }),
  flightSeats: many(flightSeats),
  orders: many(orders),
  crewPilots: many(flightCrewPilots),
  crewAttendants: many(flightCrewAttendants),
}));

export const flightSeatsRelations = relations(flightSeats, ({ one, many }) => ({
  flight: one(flights, {
    fields: [flightSeats.flightId],
    references: [flights.id],
  }),
  seat: one(seats, {
    fields: [flightSeats.seatId],
    references: [seats.id],
  }),
  tickets: many(tickets),
}));

export const ordersRelations = relations(orders, ({ one, many }) => ({
  flight: one(flights, {
    fields: [orders.flightId],
    references: [flights.id],
  }),
  tickets: many(tickets),
}));

export const ticketsRelations = relations(tickets, ({ one }) => ({
  flightSeat: one(flightSeats, {
    fields: [tickets.flightSeatId],
    references: [flightSeats.id],
  }),
  order: one(orders, {
    fields: [tickets.orderCode],
    references: [orders.code],
  }),
}));

export const registeredCustomersRelations = relations(
  registeredCustomers,
  ({ many }) => ({
    phones: many(registeredCustomerPhones),
  }),
);

export const registeredCustomerPhonesRelations = relations(
  registeredCustomerPhones,
  ({ one }) => ({
    customer: one(registeredCustomers, {
      fields: [registeredCustomerPhones.email],
      references: [registeredCustomers.email],
    }),
  }),
);

export const guestCustomersRelations = relations(guestCustomers, ({ many }) => ({
  phones: many(guestCustomerPhones),
}));

export const guestCustomerPhonesRelations = relations(
  guestCustomerPhones,
  ({ one }) => ({
    customer: one(guestCustomers, {
      fields: [guestCustomerPhones.email],
      references: [guestCustomers.email],
    }),
  }),
);

export const pilotsRelations = relations(pilots, ({ many }) => ({
  assignments: many(flightCrewPilots),
}));

export const attendantsRelations = relations(attendants, ({ many }) => ({
  assignments: many(flightCrewAttendants),
}));

export const flightCrewPilotsRelations = relations(flightCrewPilots, ({ one }) => ({
  pilot: one(pilots, {
    fields: [flightCrewPilots.pilotId],
    references: [pilots.id],
  }),
  flight: one(flights, {
    fields: [flightCrewPilots.flightId],
    references: [flights.id],
  }),
}));

export const flightCrewAttendantsRelations = relations(
  flightCrewAttendants,
  ({ one }) => ({
    attendant: one(attendants, {
      fields: [flightCrewAttendants.attendantId],
      references: [attendants.id],
    }),
    flight: one(flights, {
      fields: [flightCrewAttendants.flightId],
      references: [flights.id],
    }),
  }),
);
