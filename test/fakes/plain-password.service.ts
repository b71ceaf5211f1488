import type { PasswordService } from '../../src/auth/password.service';

/** Reversible stand-in so tests do not pay bcrypt's cost on every call. */
export const plainPasswordService: Pick<PasswordService, 'hash' | 'verify'> = {
  hash: async (password: string) => `hashed:${password}`,
  verify: async (password: string, hash: string) =>
    hash === `hashed:${password}`,
};
