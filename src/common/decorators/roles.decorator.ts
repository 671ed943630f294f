import { SetMetadata } from '@nestjs/common';

export type UserRole = 'manager' | 'customer';

export const USER_ROLES: readonly UserRole[] = ['manager', 'customer'];

export const ROLES_KEY = 'roles';

export const Roles = (...roles: UserRole[]) => SetMetadata(ROLES_KEY, roles);
