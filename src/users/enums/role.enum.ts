export enum Role {
  CLIENT = 'client',
  DENTIST = 'dentist',
  STAFF = 'staff',
}

export const ROLES: readonly Role[] = Object.values(Role);

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.some((role) => role === value);
}
