import { Inject, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { eq } from 'drizzle-orm';
import { DRIZLE } from '../../database.module';
import * as schema from '../../db/schema';
import { USER_ROLES, UserRole } from '../../common/decorators/roles.decorator';
import type { AuthenticatedUser } from '../../typings/express';

const isRole = (value: unknown): value is UserRole =>
  typeof value === 'string' && USER_ROLES.some((r) => r === value);

export function parseTokenPayload(payload: unknown): AuthenticatedUser | null {
  if (typeof payload !== 'object' || payload === null) return null;
  const sub: unknown = Reflect.get(payload, 'sub');
  const email: unknown = Reflect.get(payload, 'email');
  const role: unknown = Reflect.get(payload, 'role');
  if (typeof sub !== 'string' || typeof email !== 'string' || !isRole(role)) {
    return null;
  }
  return { sub, email: email.toLowerCase(), role };
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor(
    configService: ConfigService,
    @Inject(DRIZLE) private readonly db: NodePgDatabase<typeof schema>,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.getOrThrow<string>('JWT_SECRET'),
    });
  }

  async validate(payload: unknown): Promise<AuthenticatedUser> {
    const user = parseTokenPayload(payload);
    if (!user) {
      throw new UnauthorizedException('Malformed token payload');
    }

    // Customer tokens must still map to a registered account
    if (user.role === 'customer') {
      const customer = await this.db.query.registeredCustomers.findFirst({
        where: eq(schema.registeredCustomers.email, user.email),
        columns: { email: true },
      });
      if (!customer) {
        this.logger.warn(`Token for unknown customer ${user.email}`);
        throw new UnauthorizedException('Customer not found');
      }
    }

    return user;
  }
}
