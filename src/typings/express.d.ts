// src/typings/express.d.ts
import type { UserRole } from '../common/decorators/roles.decorator';

// Attached to the request by the JWT strategy
export interface AuthenticatedUser {
  sub: string;
  email: string;
  role: UserRole;
}

declare global {
  namespace Express {
    // eslint-disable-next-line @typescript-eslint/no-empty-interface
    interface User extends AuthenticatedUser {}

    interface Request {
      user?: User;
    }
  }
}
