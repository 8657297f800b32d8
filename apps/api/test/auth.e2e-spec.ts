import request from 'supertest';
import { createTestApp, registerAndLogin, TestApp, TEST_PASSWORD } from './support/create-test-app';

describe('Auth (e2e)', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  const http = () => request(ctx.app.getHttpServer());

  describe('POST /api/auth/register', () => {
    it('creates the account and returns the public profile', async () => {
      const res = await http()
        .post('/api/auth/register')
        .send({ name: 'alice', email: 'Alice@Example.com', password: TEST_PASSWORD })
        .expect(201);

      expect(res.body.message).toBe('User registered successfully');
      expect(res.body.user).toMatchObject({
        name: 'alice',
        email: 'alice@example.com',
        avatarPath: null,
      });
      expect(res.body.user).not.toHaveProperty('passwordHash');

      const [stored] = ctx.users.all();
      expect(stored.passwordHash).not.toBe(TEST_PASSWORD);
      expect(stored.passwordHash.startsWith('$2b$04$')).toBe(true);
    });

    it('reports every invalid field at once', async () => {
      const res = await http()
        .post('/api/auth/register')
        .send({ name: '', email: 'not-an-email', password: '123' })
        .expect(422);

      expect(res.body).toEqual({
        statusCode: 422,
        error: 'Unprocessable Entity',
        message: 'The given data was invalid.',
        errors: {
          name: ['The name field is required.'],
          email: ['The email field must be a valid email address.'],
          password: ['The password field must be at least 6 characters.'],
        },
      });
      expect(ctx.users.all()).toHaveLength(0);
    });

    it('rejects a taken name and email', async () => {
      await registerAndLogin(ctx.app, 'alice');

      const res = await http()
        .post('/api/auth/register')
        .send({ name: 'alice', email: 'ALICE@example.com', password: TEST_PASSWORD })
        .expect(422);

      expect(res.body.errors).toEqual({
        name: ['The name has already been taken.'],
        email: ['The email has already been taken.'],
      });
      expect(ctx.users.all()).toHaveLength(1);
    });

    it('rejects fields that are not part of the form', async () => {
      const res = await http()
        .post('/api/auth/register')
        .send({ name: 'alice', email: 'alice@example.com', password: TEST_PASSWORD, role: 'admin' })
        .expect(422);

      expect(res.body.errors).toEqual({ role: ['property role should not exist'] });
    });

    it('rejects a name that is not a string instead of converting it', async () => {
      const res = await http()
        .post('/api/auth/register')
        .send({ name: 42, email: 'alice@example.com', password: TEST_PASSWORD })
        .expect(422);

      expect(res.body.errors.name).toContain('The name field must be a string.');
      expect(ctx.users.all()).toHaveLength(0);
    });

    it('requires a password', async () => {
      const res = await http()
        .post('/api/auth/register')
        .send({ name: 'alice', email: 'alice@example.com' })
        .expect(422);

      expect(res.body.errors.password).toContain('The password field is required.');
    });

    it('measures the password limit in bytes', async () => {
      const res = await http()
        .post('/api/auth/register')
        .send({ name: 'alice', email: 'alice@example.com', password: 'é'.repeat(37) })
        .expect(422);

      expect(res.body.errors).toEqual({
        password: ['The password field must not be greater than 72 bytes.'],
      });
    });

    it('rejects an SVG avatar', async () => {
      const res = await http()
        .post('/api/auth/register')
        .field('name', 'alice')
        .field('email', 'alice@example.com')
        .field('password', TEST_PASSWORD)
        .attach('avatar', Buffer.from('<svg xmlns="http://www.w3.org/2000/svg"></svg>'), {
          filename: 'me.svg',
          contentType: 'image/svg+xml',
        })
        .expect(422);

      expect(res.body.errors).toEqual({ avatar: ['The avatar field must be an image.'] });
      expect(ctx.storage.objects.size).toBe(0);
    });

    it('stores an avatar sent as multipart', async () => {
      const png = Buffer.concat([
        Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
        Buffer.alloc(32),
      ]);

      const res = await http()
        .post('/api/auth/register')
        .field('name', 'alice')
        .field('email', 'alice@example.com')
        .field('password', TEST_PASSWORD)
        .attach('avatar', png, { filename: 'me.png', contentType: 'image/png' })
        .expect(201);

      expect(res.body.user.avatarPath).toBe('avatars/1-me.png');
      expect(ctx.storage.objects.get('avatars/1-me.png')?.contentType).toBe('image/png');
    });

    it('rejects an avatar that is not an image and stores nothing', async () => {
      const res = await http()
        .post('/api/auth/register')
        .field('name', 'alice')
        .field('email', 'alice@example.com')
        .field('password', TEST_PASSWORD)
        .attach('avatar', Buffer.from('just some text'), {
          filename: 'notes.txt',
          contentType: 'text/plain',
        })
        .expect(422);

      expect(res.body.errors).toEqual({ avatar: ['The avatar field must be an image.'] });
      expect(ctx.storage.objects.size).toBe(0);
      expect(ctx.users.all()).toHaveLength(0);
    });
  });

  describe('POST /api/auth/login', () => {
    beforeEach(async () => {
      await http()
        .post('/api/auth/register')
        .send({ name: 'alice', email: 'alice@example.com', password: TEST_PASSWORD })
        .expect(201);
    });

    it('issues an opaque bearer token and stores only its digest', async () => {
      const res = await http()
        .post('/api/auth/login')
        .send({ email: 'alice@example.com', password: TEST_PASSWORD })
        .expect(200);

      expect(res.body).toEqual({
        message: 'Login successful',
        accessToken: expect.stringMatching(/^[A-Za-z0-9_-]{54}$/),
        tokenType: 'Bearer',
        expiresIn: null,
      });

      const [token] = ctx.tokens.all();
      expect(token.name).toBe('auth_token');
      expect(token.tokenHash).toMatch(/^[0-9a-f]{64}$/);
      expect(token.tokenHash).not.toBe(res.body.accessToken);
    });

    it('matches the email case-insensitively', async () => {
      await http()
        .post('/api/auth/login')
        .send({ email: 'ALICE@example.com', password: TEST_PASSWORD })
        .expect(200);
    });

    it('gives the same answer for a wrong password and an unknown email', async () => {
      const wrongPassword = await http()
        .post('/api/auth/login')
        .send({ email: 'alice@example.com', password: 'not-the-password' })
        .expect(401);
      const unknownEmail = await http()
        .post('/api/auth/login')
        .send({ email: 'nobody@example.com', password: TEST_PASSWORD })
        .expect(401);

      expect(wrongPassword.body).toEqual({
        statusCode: 401,
        error: 'Unauthorized',
        message: 'Invalid credentials',
      });
      expect(unknownEmail.body).toEqual(wrongPassword.body);
      expect(ctx.tokens.all()).toHaveLength(0);
    });

    it('requires both fields', async () => {
      const res = await http().post('/api/auth/login').send({ email: 'alice@example.com' }).expect(422);

      expect(Object.keys(res.body.errors)).toEqual(['password']);
    });
  });

  describe('GET /api/auth/logout', () => {
    it('revokes the token used for the request and only that one', async () => {
      const alice = await registerAndLogin(ctx.app, 'alice');
      const other = await http()
        .post('/api/auth/login')
        .send({ email: 'alice@example.com', password: TEST_PASSWORD })
        .expect(200);

      const res = await http()
        .get('/api/auth/logout')
        .set('Authorization', `Bearer ${alice.token}`)
        .expect(200);
      expect(res.body).toEqual({ message: 'Successfully logged out. Token revoked.' });

      const rejected = await http()
        .get('/api/user')
        .set('Authorization', `Bearer ${alice.token}`)
        .expect(401);
      expect(rejected.body.message).toBe('Invalid or revoked authentication token');

      await http()
        .get('/api/user')
        .set('Authorization', `Bearer ${other.body.accessToken}`)
        .expect(200);
    });

    it('requires a token', async () => {
      const res = await http().get('/api/auth/logout').expect(401);

      expect(res.body.message).toBe('Authentication token is missing');
    });
  });
});

describe('Auth rate limiting (e2e)', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await createTestApp({ THROTTLE_AUTH_LIMIT: '5', THROTTLE_AUTH_TTL_SECONDS: '60' });
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  const attemptLogin = () =>
    request(ctx.app.getHttpServer())
      .post('/api/auth/login')
      .send({ email: 'nobody@example.com', password: 'wrong-password' });

  it('rejects the sixth attempt in a window with 429 and Retry-After', async () => {
    for (let attempt = 1; attempt <= 5; attempt++) {
      const res = await attemptLogin().expect(401);
      expect(res.headers['x-ratelimit-limit']).toBe('5');
      expect(res.headers['x-ratelimit-remaining']).toBe(String(5 - attempt));
    }

    ctx.clock.advance(15_000);
    const limited = await attemptLogin().expect(429);

    expect(limited.headers['retry-after']).toBe('45');
    expect(limited.headers['x-ratelimit-remaining']).toBe('0');
    expect(limited.body).toEqual({
      statusCode: 429,
      error: 'Too Many Requests',
      message: 'Too many requests. Retry after 45 seconds.',
      retryAfter: 45,
    });
  });

  it('admits requests again once the window has passed', async () => {
    for (let attempt = 1; attempt <= 5; attempt++) {
      await attemptLogin().expect(401);
    }
    await attemptLogin().expect(429);

    ctx.clock.advance(60_000);

    const res = await attemptLogin().expect(401);
    expect(res.headers['x-ratelimit-remaining']).toBe('4');
  });

  it('counts registrations and logins against the same budget', async () => {
    for (let attempt = 1; attempt <= 5; attempt++) {
      await request(ctx.app.getHttpServer())
        .post('/api/auth/register')
        .send({ name: '', email: '', password: '' })
        .expect(422);
    }

    await attemptLogin().expect(429);
  });
});
