import { ForbiddenException } from '@nestjs/common';
import { Role } from '../users/enums/role.enum';
import type { Caller } from '../auth/types/caller.type';

export enum Operation {
  BOOK_APPOINTMENT = 'BookAppointment',
  LIST_APPOINTMENTS = 'ListAppointments',
  VIEW_APPOINTMENT = 'ViewAppointment',
  MODIFY_APPOINTMENT = 'ModifyAppointment',
  CANCEL_APPOINTMENT = 'CancelAppointment',
  VIEW_PROFILE = 'ViewProfile',
  UPDATE_PROFILE = 'UpdateProfile',
  ASK_ASSISTANT = 'AskAssistant',
}

export type AccessDecision = 'allow' | 'deny';

const ANY_ROLE: readonly Role[] = [Role.CLIENT, Role.DENTIST, Role.STAFF];
const PRACTITIONERS: readonly Role[] = [Role.DENTIST, Role.STAFF];

const POLICY: Record<Operation, readonly Role[]> = {
  [Operation.BOOK_APPOINTMENT]: [Role.CLIENT],
  [Operation.LIST_APPOINTMENTS]: ANY_ROLE,
  [Operation.VIEW_APPOINTMENT]: ANY_ROLE,
  [Operation.MODIFY_APPOINTMENT]: PRACTITIONERS,
  [Operation.CANCEL_APPOINTMENT]: PRACTITIONERS,
  [Operation.VIEW_PROFILE]: ANY_ROLE,
  [Operation.UPDATE_PROFILE]: ANY_ROLE,
  [Operation.ASK_ASSISTANT]: ANY_ROLE,
};

const DENIAL_MESSAGES: Partial<Record<Operation, string>> = {
  [Operation.BOOK_APPOINTMENT]: 'Only clients can book appointments.',
};

export function authorize(role: Role, operation: Operation): AccessDecision {
  return POLICY[operation].includes(role) ? 'allow' : 'deny';
}

/**
 * Throws before any query or mutation is issued, so a denied caller never
 * causes partial work.
 */
export function assertAuthorized(caller: Caller, operation: Operation): void {
  if (authorize(caller.role, operation) === 'deny') {
    throw new ForbiddenException(
      DENIAL_MESSAGES[operation] ?? 'Permission denied.',
    );
  }
}
