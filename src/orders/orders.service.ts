import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { and, count, desc, eq, SQL, sum } from 'drizzle-orm';
import { DRIZLE } from '../database.module';
import * as schema from '../db/schema';
import { OPERATIONS_POLICY, OperationsPolicy } from '../config/operations-policy';
import { StatusSyncService } from '../reconciliation/status-sync.service';
import { SeatInventoryService } from '../booking/seat-inventory.service';
import { ConstraintViolationException } from '../common/exceptions/constraint-violation.exception';
import {
  chargedAmountCents,
  customerMayCancel,
  quoteCancellation,
} from '../scheduling/cancellation-policy';
import { centsToAmount, toCents } from '../scheduling/money';
import { computeArrival } from '../scheduling/time-window';
import { ManagerOrdersQuery } from './dto/list-orders.query';

type Db = NodePgDatabase<typeof schema>;

export interface CancellationResult {
  orderCode: string;
  total: number;
  fee: number;
  refund: number;
}

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);

  constructor(
    @Inject(DRIZLE) private readonly db: Db,
    @Inject(OPERATIONS_POLICY) private readonly policy: OperationsPolicy,
    private readonly inventory: SeatInventoryService,
    private readonly statusSync: StatusSyncService,
  ) {}

  async listCustomerOrders(email: string, status?: schema.OrderStatus) {
    const owner = email.toLowerCase();
    const flights = await this.db
      .selectDistinct({ id: schema.orders.flightId })
      .from(schema.orders)
      .where(and(eq(schema.orders.customerEmail, owner), eq(schema.orders.status, 'Active')));
    await this.db.transaction((tx) =>
      this.statusSync.reconcileFlights(
        tx,
        flights.map((f) => f.id),
      ),
    );

    const where = [eq(schema.orders.customerEmail, owner)];
    if (status) where.push(eq(schema.orders.status, status));
    return this.orderSummaries(and(...where));
  }

  async guestLookup(email: string, orderCode: string) {
    const owner = email.toLowerCase();
    const [order] = await this.db
      .select({ flightId: schema.orders.flightId, email: schema.orders.customerEmail })
      .from(schema.orders)
      .where(eq(schema.orders.code, orderCode));
    if (!order || order.email !== owner) {
      throw new NotFoundException(`Order ${orderCode} not found`);
    }
    await this.statusSync.run(order.flightId);

    const [summary] = await this.orderSummaries(eq(schema.orders.code, orderCode));
    if (!summary) throw new NotFoundException(`Order ${orderCode} not found`);
    return summary;
  }

  async managerList(filters: ManagerOrdersQuery) {
    const where: SQL[] = [];
    if (filters.status) where.push(eq(schema.orders.status, filters.status));
    if (filters.flightId) where.push(eq(schema.orders.flightId, filters.flightId));
    if (filters.email) {
      where.push(eq(schema.orders.customerEmail, filters.email.toLowerCase()));
    }
    return this.orderSummaries(and(...where));
  }

  /**
   * Customer cancellation. The fee is charged on what was paid; released
   * seats go back on sale at the class's current price.
   */
  async cancelOrder(
    orderCode: string,
    ownerEmail: string,
    now: Date = new Date(),
  ): Promise<CancellationResult> {
    return this.db.transaction(async (tx) => {
      const order = await this.inventory.lockOrder(orderCode, tx);
      if (!order || order.customerEmail !== ownerEmail.toLowerCase()) {
        throw new NotFoundException(`Order ${orderCode} not found`);
      }
      if (order.status === 'Cancelled-Customer' || order.status === 'Cancelled-System') {
        throw new ConstraintViolationException(`Order ${orderCode} is already cancelled`);
      }
      if (order.status === 'Completed') {
        throw new ConstraintViolationException(
          `Order ${orderCode} is completed and can no longer be cancelled`,
        );
      }
      if (!customerMayCancel(order.departure, now, this.policy.customerCancelMinHours)) {
        throw new ConstraintViolationException(
          `Orders can be cancelled only more than ${this.policy.customerCancelMinHours} hours before departure`,
        );
      }

      const tickets = await this.inventory.orderTickets(orderCode, tx);
      const quote = quoteCancellation(
        tickets.map((t) => t.paidPrice),
        this.policy.cancellationFeePercent,
      );
      const released = await this.inventory.releaseSeats(
        order.flightId,
        tickets.map((t) => t.flightSeatId),
        tx,
      );
      await this.inventory.setOrderStatus(orderCode, 'Cancelled-Customer', now, tx);
      await this.statusSync.reconcile(tx, order.flightId);

      this.logger.log(
        `Order ${orderCode} cancelled by customer: ${released} seat(s) released, fee ${quote.feeCents}c`,
      );
      return {
        orderCode,
        total: centsToAmount(quote.totalCents),
        fee: centsToAmount(quote.feeCents),
        refund: centsToAmount(quote.refundCents),
      };
    });
  }

  private async orderSummaries(where: SQL | undefined) {
    const rows = await this.db
      .select({
        orderCode: schema.orders.code,
        status: schema.orders.status,
        orderedAt: schema.orders.orderedAt,
        cancelledAt: schema.orders.cancelledAt,
        customerEmail: schema.orders.customerEmail,
        customerType: schema.orders.customerType,
        flightId: schema.flights.id,
        departure: schema.flights.departureAt,
        origin: schema.flightRoutes.originCode,
        destination: schema.flightRoutes.destinationCode,
        durationMinutes: schema.flightRoutes.durationMinutes,
        tickets: count(schema.tickets.id),
        total: sum(schema.tickets.paidPrice),
      })
      .from(schema.orders)
      .innerJoin(schema.flights, eq(schema.flights.id, schema.orders.flightId))
      .innerJoin(schema.flightRoutes, eq(schema.flightRoutes.id, schema.flights.routeId))
      .leftJoin(schema.tickets, eq(schema.tickets.orderCode, schema.orders.code))
      .where(where)
      .groupBy(schema.orders.code, schema.flights.id, schema.flightRoutes.id)
      .orderBy(desc(schema.orders.orderedAt));

    return rows.map((r) => {
      const totalCents = r.total === null ? 0 : toCents(r.total);
      return {
        orderCode: r.orderCode,
        status: r.status,
        orderedAt: r.orderedAt,
        cancelledAt: r.cancelledAt,
        customerEmail: r.customerEmail,
        customerType: r.customerType,
        flight: {
          id: r.flightId,
          origin: r.origin,
          destination: r.destination,
          departure: r.departure,
          arrival: computeArrival(r.departure, r.durationMinutes),
        },
        tickets: r.tickets,
        total: centsToAmount(totalCents),
        chargedAmount: centsToAmount(
          chargedAmountCents(r.status, totalCents, this.policy.cancellationFeePercent),
        ),
      };
    });
  }
}
