import { Inject, Injectable, Logger } from '@nestjs/common';
import { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { eq, sql } from 'drizzle-orm';
import { DatabaseError } from 'pg';
import { DRIZLE } from '../database.module';
import * as schema from '../db/schema';
import type { CounterName } from './id-format';

const UNDEFINED_TABLE = '42P01';

// Table scanned to seed a counter, or in place of one when id_counters is missing
const NUMBERED = {
  Flight: { table: schema.flights, id: schema.flights.id },
  FlightSeat: { table: schema.flightSeats, id: schema.flightSeats.id },
  Order: { table: schema.orders, id: schema.orders.code },
  Seat: { table: schema.seats, id: schema.seats.id },
  Aircraft: { table: schema.aircraft, id: schema.aircraft.id },
} satisfies Record<CounterName, unknown>;

const isUndefinedTable = (err: unknown) =>
  err instanceof DatabaseError && err.code === UNDEFINED_TABLE;

@Injectable()
export class IdCountersService {
  private readonly logger = new Logger(IdCountersService.name);

  constructor(@Inject(DRIZLE) private readonly db: NodePgDatabase<typeof schema>) {}

  /**
   * Reserves `amount` consecutive numbers and returns the first one.
   * Must run inside the transaction that inserts the numbered rows.
   */
  async reserve(
    name: CounterName,
    amount = 1,
    tx: NodePgDatabase<typeof schema> = this.db,
  ): Promise<number> {
    if (!Number.isInteger(amount) || amount < 1) {
      throw new RangeError(`Cannot reserve ${amount} ids`);
    }
    try {
      // savepoint: a missing table must not abort the caller's transaction
      return await tx.transaction((sp) => this.takeFromCounter(sp, name, amount));
    } catch (err) {
      if (!isUndefinedTable(err)) throw err;
      this.logger.warn(
        `id_counters table missing; deriving ${name} ids from MAX()+1, not safe under concurrent writers`,
      );
      return (await this.maxExisting(tx, name)) + 1;
    }
  }

  private async takeFromCounter(
    tx: NodePgDatabase<typeof schema>,
    name: CounterName,
    amount: number,
  ): Promise<number> {
    let next = await this.lockCounter(tx, name);
    if (next === undefined) {
      const seed = (await this.maxExisting(tx, name)) + 1;
      await tx
        .insert(schema.idCounters)
        .values({ name, nextNum: seed })
        .onConflictDoNothing();
      next = await this.lockCounter(tx, name);
      if (next === undefined) {
        throw new Error(`Counter ${name} could not be initialised`);
      }
      this.logger.log(`Seeded counter ${name} at ${next}`);
    }

    await tx
      .update(schema.idCounters)
      .set({ nextNum: next + amount })
      .where(eq(schema.idCounters.name, name));
    return next;
  }

  private async lockCounter(
    tx: NodePgDatabase<typeof schema>,
    name: CounterName,
  ): Promise<number | undefined> {
    const [row] = await tx
      .select({ nextNum: schema.idCounters.nextNum })
      .from(schema.idCounters)
      .where(eq(schema.idCounters.name, name))
      .for('update');
    return row?.nextNum;
  }

  private async maxExisting(
    tx: NodePgDatabase<typeof schema>,
    name: CounterName,
  ): Promise<number> {
    const { table, id } = NUMBERED[name];
    const [row] = await tx
      .select({
        value: sql<string | null>`max(cast(substring(${id} from '[0-9]+$') as bigint))`,
      })
      .from(table);
    return row?.value ? Number(row.value) : 0;
  }
}
