import type { Role } from '../../users/enums/role.enum';

/**
 * Identity resolved from a validated session token. Every protected
 * operation receives one of these instead of reading the request directly.
 */
export interface Caller {
  userId: string;
  role: Role;
}
