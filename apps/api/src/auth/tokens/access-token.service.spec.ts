import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import { AccessToken, User } from '@taskapi/database';
import { AccessTokenService, hashToken } from './access-token.service';
import {
  createAccessTokenRepository,
  createUserRepository,
} from '../../../test/support/repositories';
import type { InMemoryRepository } from '../../../test/support/in-memory-repository';

describe('AccessTokenService', () => {
  let tokens: InMemoryRepository<AccessToken>;
  let users: InMemoryRepository<User>;
  let alice: User;

  async function createService(env: Record<string, string> = {}): Promise<AccessTokenService> {
    const moduleRef = await Test.createTestingModule({
      providers: [
        AccessTokenService,
        { provide: getRepositoryToken(AccessToken), useValue: tokens },
        { provide: getRepositoryToken(User), useValue: users },
        { provide: ConfigService, useValue: new ConfigService(env) },
      ],
    }).compile();
    return moduleRef.get(AccessTokenService);
  }

  beforeEach(async () => {
    tokens = createAccessTokenRepository();
    users = createUserRepository();
    alice = await users.save(
      users.create({ name: 'alice', email: 'alice@example.com', passwordHash: 'x', avatarPath: null }),
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('stores the digest of the issued token, never the token itself', async () => {
    const service = await createService();

    const issued = await service.issue(alice);

    expect(issued.expiresIn).toBeNull();
    const [stored] = tokens.all();
    expect(stored.tokenHash).toBe(hashToken(issued.plainTextToken));
    expect(stored.tokenHash).not.toBe(issued.plainTextToken);
    expect(stored.expiresAt).toBeNull();
    expect(stored.userId).toBe(alice.id);
  });

  it('issues a different token every time', async () => {
    const service = await createService();

    const first = await service.issue(alice);
    const second = await service.issue(alice);

    expect(first.plainTextToken).not.toBe(second.plainTextToken);
  });

  it('resolves a valid token to its owner and records the use', async () => {
    const service = await createService();
    const issued = await service.issue(alice);

    const result = await service.validate(issued.plainTextToken);

    expect(result?.user.id).toBe(alice.id);
    expect(result?.token.id).toBe(issued.token.id);
    expect(tokens.all()[0].lastUsedAt).toBeInstanceOf(Date);
  });

  it('returns null for unknown, empty and revoked tokens', async () => {
    const service = await createService();
    const issued = await service.issue(alice);

    expect(await service.validate('made-up-token')).toBeNull();
    expect(await service.validate('')).toBeNull();

    await service.revoke(issued.token.id);
    await service.revoke(issued.token.id);

    expect(await service.validate(issued.plainTextToken)).toBeNull();
  });

  it('expires tokens when a lifetime is configured', async () => {
    const service = await createService({ TOKEN_TTL_SECONDS: '60' });
    const start = Date.parse('2026-03-01T12:00:00.000Z');
    const clock = jest.spyOn(Date, 'now').mockReturnValue(start);

    const issued = await service.issue(alice);
    expect(issued.expiresIn).toBe(60);

    clock.mockReturnValue(start + 59_000);
    expect(await service.validate(issued.plainTextToken)).not.toBeNull();

    clock.mockReturnValue(start + 60_000);
    expect(await service.validate(issued.plainTextToken)).toBeNull();
    expect(tokens.all()).toHaveLength(0);
  });

  it('rejects a token whose user is gone', async () => {
    const service = await createService();
    const issued = await service.issue(alice);
    await users.delete({ id: alice.id });

    expect(await service.validate(issued.plainTextToken)).toBeNull();
  });

  it('revokes all tokens of a user except the one in use', async () => {
    const service = await createService();
    const current = await service.issue(alice);
    await service.issue(alice);
    await service.issue(alice);

    const revoked = await service.revokeAllForUser(alice.id, current.token.id);

    expect(revoked).toBe(2);
    expect(tokens.all().map((token) => token.id)).toEqual([current.token.id]);
  });
});
