import request from 'supertest';
import {
  createTestApp,
  registerAndLogin,
  RegisteredUser,
  TestApp,
  TEST_PASSWORD,
} from './support/create-test-app';

const PNG_HEADER = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

function pngOfSize(bytes: number): Buffer {
  return Buffer.concat([PNG_HEADER, Buffer.alloc(bytes - PNG_HEADER.length)]);
}

describe('User profile (e2e)', () => {
  let ctx: TestApp;
  let alice: RegisteredUser;

  beforeEach(async () => {
    ctx = await createTestApp();
    alice = await registerAndLogin(ctx.app, 'alice');
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  const authed = (token: string) => {
    const server = ctx.app.getHttpServer();
    return {
      get: () => request(server).get('/api/user').set('Authorization', `Bearer ${token}`),
      put: () => request(server).put('/api/user').set('Authorization', `Bearer ${token}`),
      patch: () => request(server).patch('/api/user').set('Authorization', `Bearer ${token}`),
    };
  };

  describe('GET /api/user', () => {
    it("returns the caller's profile", async () => {
      const res = await authed(alice.token).get().expect(200);

      expect(res.body).toMatchObject({
        id: alice.id,
        name: 'alice',
        email: 'alice@example.com',
        avatarPath: null,
      });
      expect(res.body).not.toHaveProperty('passwordHash');
    });

    it('rejects an unknown token', async () => {
      await authed('not-a-real-token').get().expect(401);
    });

    it('takes the token only from the Authorization header', async () => {
      const server = ctx.app.getHttpServer();

      const res = await request(server).get(`/api/user?access_token=${alice.token}`).expect(401);
      expect(res.body.message).toBe('Authentication token is missing');

      await request(server).get('/api/user').send({ access_token: alice.token }).expect(401);
    });
  });

  describe('PUT /api/user', () => {
    it('replaces name and email', async () => {
      const res = await authed(alice.token)
        .put()
        .send({ name: 'alice2', email: 'Alice2@Example.com' })
        .expect(200);

      expect(res.body.message).toBe('Profile updated');
      expect(res.body.user).toMatchObject({ name: 'alice2', email: 'alice2@example.com' });
    });

    it('does not count the caller as a clash for their own name and email', async () => {
      await authed(alice.token)
        .put()
        .send({ name: 'alice', email: 'alice@example.com' })
        .expect(200);
    });

    it("rejects another user's email", async () => {
      await registerAndLogin(ctx.app, 'bob');

      const res = await authed(alice.token)
        .put()
        .send({ name: 'alice', email: 'bob@example.com' })
        .expect(422);

      expect(res.body.errors).toEqual({ email: ['The email has already been taken.'] });
    });

    it('requires both name and email', async () => {
      const res = await authed(alice.token).put().send({ name: 'alice' }).expect(422);

      expect(Object.keys(res.body.errors)).toEqual(['email']);
    });

    it('replaces the avatar and removes the previous image', async () => {
      const first = await authed(alice.token)
        .put()
        .field('name', 'alice')
        .field('email', 'alice@example.com')
        .attach('avatar', pngOfSize(64), { filename: 'me.png', contentType: 'image/png' })
        .expect(200);
      expect(first.body.user.avatarPath).toBe('avatars/1-me.png');

      const second = await authed(alice.token)
        .put()
        .field('name', 'alice')
        .field('email', 'alice@example.com')
        .attach('avatar', pngOfSize(64), { filename: 'new.png', contentType: 'image/png' })
        .expect(200);
      expect(second.body.user.avatarPath).toBe('avatars/2-new.png');

      expect([...ctx.storage.objects.keys()]).toEqual(['avatars/2-new.png']);
    });

    it('keeps the current avatar when no file is sent', async () => {
      await authed(alice.token)
        .put()
        .field('name', 'alice')
        .field('email', 'alice@example.com')
        .attach('avatar', pngOfSize(64), { filename: 'me.png', contentType: 'image/png' })
        .expect(200);

      const res = await authed(alice.token)
        .put()
        .send({ name: 'alice', email: 'alice@example.com' })
        .expect(200);

      expect(res.body.user.avatarPath).toBe('avatars/1-me.png');
    });
  });

  describe('PATCH /api/user', () => {
    it('changes the password and signs out other sessions', async () => {
      const otherSession = await request(ctx.app.getHttpServer())
        .post('/api/auth/login')
        .send({ email: 'alice@example.com', password: TEST_PASSWORD })
        .expect(200);

      const res = await authed(alice.token).patch().send({ password: 'new-secret' }).expect(200);
      expect(res.body).toEqual({ message: 'Password updated successfully' });

      await authed(otherSession.body.accessToken).get().expect(401);
      await authed(alice.token).get().expect(200);

      await request(ctx.app.getHttpServer())
        .post('/api/auth/login')
        .send({ email: 'alice@example.com', password: TEST_PASSWORD })
        .expect(401);
      await request(ctx.app.getHttpServer())
        .post('/api/auth/login')
        .send({ email: 'alice@example.com', password: 'new-secret' })
        .expect(200);
    });

    it('enforces the minimum length', async () => {
      const res = await authed(alice.token).patch().send({ password: '123' }).expect(422);

      expect(res.body.errors).toEqual({
        password: ['The password field must be at least 6 characters.'],
      });
    });
  });
});

describe('Avatar size limit (e2e)', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await createTestApp({ AVATAR_MAX_SIZE_KB: '1' });
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  it('refuses an upload larger than the limit with 413', async () => {
    const alice = await registerAndLogin(ctx.app, 'alice');

    await request(ctx.app.getHttpServer())
      .put('/api/user')
      .set('Authorization', `Bearer ${alice.token}`)
      .field('name', 'alice')
      .field('email', 'alice@example.com')
      .attach('avatar', pngOfSize(2048), { filename: 'big.png', contentType: 'image/png' })
      .expect(413);

    expect(ctx.storage.objects.size).toBe(0);
  });
});
