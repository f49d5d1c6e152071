import { UserService } from '../../src/users/application/UserService';
import {
  PermissionDenied,
  RecordNotFoundError,
  UniqueConstraintViolation,
} from '../../src/shared/errors/DomainErrors';
import { fakePasswordHasher } from '../support/fakePasswordHasher';
import { InMemoryUserRepository } from '../support/inMemoryUserRepository';

describe('UserService', () => {
  let repository: InMemoryUserRepository;
  let service: UserService;

  beforeEach(() => {
    repository = new InMemoryUserRepository();
    service = new UserService(repository, fakePasswordHasher);
  });

  it('should store a hash, never the plain password', async () => {
    const user = await service.register({ username: 'alice', email: 'alice@example.com', password: 'password-1' });

    expect(repository.rows[0].passwordHash).toBe('hashed:password-1');
    expect(user).not.toHaveProperty('passwordHash');
    expect(user).toMatchObject({ username: 'alice', email: 'alice@example.com', bio: null });
  });

  it('should surface duplicate usernames as a unique violation', async () => {
    await service.register({ username: 'alice', email: 'alice@example.com', password: 'password-1' });

    await expect(
      service.register({ username: 'alice', email: 'other@example.com', password: 'password-1' }),
    ).rejects.toBeInstanceOf(UniqueConstraintViolation);
  });

  it('should page through users newest first', async () => {
    for (const name of ['ann', 'ben', 'cat', 'dan', 'eve']) {
      await service.register({ username: name, email: `${name}@example.com`, password: 'password-1' });
    }

    const second = await service.listUsers({ page: 2, pageSize: 2 });

    expect(second.total).toBe(5);
    expect(second.items.map((u) => u.username)).toEqual(['cat', 'ben']);
  });

  it('should return an empty page past the end', async () => {
    await service.register({ username: 'ann', email: 'ann@example.com', password: 'password-1' });

    expect(await service.listUsers({ page: 3, pageSize: 20 })).toEqual({ items: [], total: 1 });
  });

  it('should reject unknown ids', async () => {
    await expect(service.getUser('000000000000000000000999')).rejects.toBeInstanceOf(RecordNotFoundError);
  });

  it('should let users update their own profile', async () => {
    const user = await service.register({ username: 'alice', email: 'alice@example.com', password: 'password-1' });

    const updated = await service.updateProfile(user.id, user.id, { bio: 'Hi', avatarUrl: 'https://example.com/a.png' });

    expect(updated).toMatchObject({ username: 'alice', bio: 'Hi', avatarUrl: 'https://example.com/a.png' });
  });

  it('should refuse updates to another profile without touching the store', async () => {
    const alice = await service.register({ username: 'alice', email: 'alice@example.com', password: 'password-1' });
    const bob = await service.register({ username: 'bob', email: 'bob@example.com', password: 'password-2' });
    const updateProfile = jest.spyOn(repository, 'updateProfile');

    await expect(service.updateProfile(alice.id, bob.id, { bio: 'x' })).rejects.toBeInstanceOf(PermissionDenied);
    expect(updateProfile).not.toHaveBeenCalled();
  });
});
