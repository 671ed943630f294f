import {
  BadRequestException,
  ForbiddenException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { eq } from 'drizzle-orm';
import { DRIZLE } from '../database.module';
import * as schema from '../db/schema';
import type { AuthenticatedUser } from '../typings/express';
import { GuestDetailsDto } from './dto/create-booking.dto';

type Db = NodePgDatabase<typeof schema>;

export interface OrderingCustomer {
  email: string;
  customerType: schema.CustomerType;
}

@Injectable()
export class CustomersService {
  private readonly logger = new Logger(CustomersService.name);

  constructor(@Inject(DRIZLE) private readonly db: Db) {}

  /**
   * Who an order is placed for. A guest whose email is already registered is
   * booked as that customer and their phones join the registered record.
   */
  async resolve(
    guest: GuestDetailsDto | undefined,
    user: AuthenticatedUser | undefined,
    tx: Db = this.db,
  ): Promise<OrderingCustomer> {
    if (user?.role === 'manager') {
      throw new ForbiddenException('Managers cannot place orders');
    }
    if (user) return { email: user.email, customerType: 'Register' };
    if (!guest) {
      throw new BadRequestException('Guest details are required without a login');
    }

    const email = guest.email.toLowerCase();
    const phones = [...new Set(guest.phones)];
    const registered = await tx.query.registeredCustomers.findFirst({
      where: eq(schema.registeredCustomers.email, email),
      columns: { email: true },
    });

    if (registered) {
      await tx
        .insert(schema.registeredCustomerPhones)
        .values(phones.map((phone) => ({ email, phone })))
        .onConflictDoNothing();
      this.logger.log(`Guest checkout for registered customer ${email}`);
      return { email, customerType: 'Register' };
    }

    await tx
      .insert(schema.guestCustomers)
      .values({ email, firstName: guest.firstName, lastName: guest.lastName })
      .onConflictDoUpdate({
        target: schema.guestCustomers.email,
        set: { firstName: guest.firstName, lastName: guest.lastName },
      });
    await tx
      .insert(schema.guestCustomerPhones)
      .values(phones.map((phone) => ({ email, phone })))
      .onConflictDoNothing();
    return { email, customerType: 'Guest' };
  }
}
