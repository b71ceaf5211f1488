import { ConflictException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { QueryFailedError } from 'typeorm';
import { UserAdapter } from './user.adapter';
import { User } from './entities/user.entity';
import { Role } from './enums/role.enum';

const newUser = {
  fullName: 'Ana Client',
  email: 'ana@example.test',
  passwordHash: 'hashed:password-1',
  role: Role.CLIENT,
  phone: null,
};

function driverError(code: string): Error {
  return Object.assign(new Error(`driver error ${code}`), { code });
}

describe('UserAdapter', () => {
  const repository = {
    findOneBy: jest.fn(),
    create: jest.fn(),
    save: jest.fn(),
    update: jest.fn(),
  };
  let adapter: UserAdapter;

  beforeEach(async () => {
    Object.values(repository).forEach((mock) => mock.mockReset());
    repository.create.mockImplementation((values: typeof newUser) => ({
      ...values,
    }));

    const moduleRef = await Test.createTestingModule({
      providers: [
        UserAdapter,
        { provide: getRepositoryToken(User), useValue: repository },
      ],
    }).compile();

    adapter = moduleRef.get(UserAdapter);
  });

  it('returns the saved user without the relation', async () => {
    repository.save.mockResolvedValue(
      Object.assign(new User(), {
        ...newUser,
        id: '3b2f6c1e-8d4a-4f7b-9c2e-5a1d7e9f0b13',
        createdAt: new Date('2024-01-01T00:00:00Z'),
        appointments: [],
      }),
    );

    await expect(adapter.create(newUser)).resolves.toEqual({
      ...newUser,
      id: '3b2f6c1e-8d4a-4f7b-9c2e-5a1d7e9f0b13',
      createdAt: new Date('2024-01-01T00:00:00Z'),
    });
  });

  it('maps a unique violation on insert to a conflict', async () => {
    repository.save.mockRejectedValue(
      new QueryFailedError('INSERT INTO "users"', [], driverError('23505')),
    );

    await expect(adapter.create(newUser)).rejects.toThrow(
      new ConflictException('An account with this email already exists'),
    );
  });

  it('rethrows other database errors untouched', async () => {
    const failure = new QueryFailedError(
      'INSERT INTO "users"',
      [],
      driverError('08006'),
    );
    repository.save.mockRejectedValue(failure);

    await expect(adapter.create(newUser)).rejects.toBe(failure);
  });

  it('returns null when renaming a user that does not exist', async () => {
    repository.update.mockResolvedValue({ affected: 0, raw: [], generatedMaps: [] });

    await expect(
      adapter.updateFullName('3b2f6c1e-8d4a-4f7b-9c2e-5a1d7e9f0b13', 'Ana'),
    ).resolves.toBeNull();
    expect(repository.findOneBy).not.toHaveBeenCalled();
  });
});
