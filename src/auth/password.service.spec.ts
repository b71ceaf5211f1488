import { PasswordService, PASSWORD_HASH_ROUNDS } from './password.service';

// Real bcrypt at full cost; each hash takes a noticeable fraction of a second.
jest.setTimeout(30_000);

describe('PasswordService', () => {
  const service = new PasswordService();

  it('verifies the password it hashed and nothing else', async () => {
    const hash = await service.hash('correct-horse');

    expect(hash).not.toContain('correct-horse');
    await expect(service.verify('correct-horse', hash)).resolves.toBe(true);
    await expect(service.verify('Correct-horse', hash)).resolves.toBe(false);
  });

  it('salts every hash and records the cost factor', async () => {
    const first = await service.hash('same-password');
    const second = await service.hash('same-password');

    expect(first).not.toBe(second);
    expect(first).toMatch(new RegExp(`^\\$2[ab]\\$${PASSWORD_HASH_ROUNDS}\\$`));
  });
});
