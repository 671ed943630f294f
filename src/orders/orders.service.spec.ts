import { NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { DRIZLE } from '../database.module';
import { DEFAULT_OPERATIONS_POLICY, OPERATIONS_POLICY } from '../config/operations-policy';
import { SchedulingService } from '../scheduling/scheduling.service';
import { IdCountersService } from '../id-counters/id-counters.service';
import { StatusSyncService } from '../reconciliation/status-sync.service';
import { ConstraintViolationException } from '../common/exceptions/constraint-violation.exception';
import { BookingService } from '../booking/booking.service';
import { CustomersService } from '../booking/customers.service';
import { SeatInventoryService } from '../booking/seat-inventory.service';
import { InMemorySeatInventory } from '../booking/testing/in-memory-seat-inventory';
import { OrdersService } from './orders.service';

const HOUR = 3_600_000;
const departure = new Date(Date.now() + 100 * HOUR);
const hoursBefore = (h: number) => new Date(departure.getTime() - h * HOUR);

const guest = {
  firstName: 'Dana',
  lastName: 'Levi',
  email: 'dana@example.com',
  phones: ['0501234567'],
};

describe('OrdersService.cancelOrder', () => {
  let orders: OrdersService;
  let booking: BookingService;
  let inventory: InMemorySeatInventory;
  let reconcile: jest.Mock;

  const book = (...seatIds: string[]) =>
    booking.confirmBooking({ flightId: 'FT001', seatIds, guest });

  beforeEach(async () => {
    inventory = new InMemorySeatInventory();
    inventory.addFlight({ id: 'FT001', status: 'Active', departure }, [
      { flightSeatId: 'FS000001', seatClass: 'Economy', status: 'Available', price: '400.00' },
      { flightSeatId: 'FS000002', seatClass: 'Economy', status: 'Available', price: '350.50' },
      { flightSeatId: 'FS000003', seatClass: 'Business', status: 'Available', price: '700.00' },
    ]);
    reconcile = jest.fn().mockResolvedValue(0);
    let orderNum = 0;

    const moduleRef = await Test.createTestingModule({
      providers: [
        OrdersService,
        BookingService,
        {
          provide: DRIZLE,
          useValue: { transaction: <T>(fn: (tx: object) => Promise<T>) => fn({}) },
        },
        { provide: OPERATIONS_POLICY, useValue: DEFAULT_OPERATIONS_POLICY },
        { provide: SchedulingService, useValue: {} },
        {
          provide: CustomersService,
          useValue: {
            resolve: jest.fn(async () => ({ email: guest.email, customerType: 'Guest' })),
          },
        },
        { provide: SeatInventoryService, useValue: inventory },
        { provide: IdCountersService, useValue: { reserve: jest.fn(async () => ++orderNum) } },
        { provide: StatusSyncService, useValue: { reconcile } },
      ],
    }).compile();

    orders = moduleRef.get(OrdersService);
    booking = moduleRef.get(BookingService);
  });

  it('releases the seat at the current class price and charges the fee', async () => {
    const { orderCode } = await book('FS000001');
    const now = hoursBefore(40);

    const result = await orders.cancelOrder(orderCode, 'Dana@Example.com', now);

    expect(result).toEqual({ orderCode: 'O000000001', total: 400, fee: 20, refund: 380 });
    expect(inventory.seats.get('FS000001')).toMatchObject({
      status: 'Available',
      price: '350.50',
    });
    expect(inventory.orders.get(orderCode)).toMatchObject({
      status: 'Cancelled-Customer',
      cancelledAt: now,
    });
    expect(reconcile).toHaveBeenLastCalledWith(expect.anything(), 'FT001');
  });

  it('rounds the fee half to even at the cent', async () => {
    const { orderCode } = await book('FS000001', 'FS000002');

    const result = await orders.cancelOrder(orderCode, guest.email, hoursBefore(40));

    expect(result).toEqual({ orderCode, total: 750.5, fee: 37.52, refund: 712.98 });
    // no other economy seat is priced, so the released seats keep their price
    expect(inventory.seats.get('FS000001')?.price).toBe('400.00');
    expect(inventory.seats.get('FS000002')?.price).toBe('350.50');
  });

  it('allows cancelling 40 hours out but not 30', async () => {
    const late = await book('FS000002');
    const early = await book('FS000001');

    await expect(
      orders.cancelOrder(late.orderCode, guest.email, hoursBefore(30)),
    ).rejects.toThrow('Orders can be cancelled only more than 36 hours before departure');
    await expect(
      orders.cancelOrder(early.orderCode, guest.email, hoursBefore(40)),
    ).resolves.toMatchObject({ orderCode: early.orderCode });
    expect(inventory.orders.get(late.orderCode)?.status).toBe('Active');
    expect(inventory.seats.get('FS000002')?.status).toBe('Sold');
  });

  it('hides orders that belong to someone else', async () => {
    const { orderCode } = await book('FS000003');

    await expect(
      orders.cancelOrder(orderCode, 'someone@example.com', hoursBefore(40)),
    ).rejects.toBeInstanceOf(NotFoundException);
    await expect(
      orders.cancelOrder('O999999999', guest.email, hoursBefore(40)),
    ).rejects.toBeInstanceOf(NotFoundException);
  });

  it('refuses orders that are already cancelled or completed', async () => {
    const first = await book('FS000001');
    const second = await book('FS000002');
    await orders.cancelOrder(first.orderCode, guest.email, hoursBefore(40));
    await inventory.setOrderStatus(second.orderCode, 'Completed', hoursBefore(30));

    await expect(
      orders.cancelOrder(first.orderCode, guest.email, hoursBefore(39)),
    ).rejects.toThrow(`Order ${first.orderCode} is already cancelled`);
    await expect(
      orders.cancelOrder(second.orderCode, guest.email, hoursBefore(39)),
    ).rejects.toBeInstanceOf(ConstraintViolationException);
  });
});
