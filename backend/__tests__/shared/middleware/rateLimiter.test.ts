import { describe, it, expect, vi } from 'vitest';
import express from 'express';
import request from 'supertest';
import { anonymousCaller, User, type SessionCapable } from '../../../src/shared/db/entities/User.js';

// test/setup.ts replaces the limiters globally; the key function is tested for real here
const { getClientIdentifier } = await vi.importActual<typeof import('../../../src/shared/middleware/rateLimiter.js')>(
  '../../../src/shared/middleware/rateLimiter.js'
);

function appAs(caller: SessionCapable | undefined): express.Express {
  const app = express();
  app.get('/key', (req, res) => {
    req.caller = caller;
    res.json({ key: getClientIdentifier(req) });
  });
  return app;
}

describe('getClientIdentifier', () => {
  it('keys authenticated callers by their session key', async () => {
    const user = new User();
    user.id = 7;

    const response = await request(appAs(user)).get('/key');

    expect(response.body.key).toBe('user:7');
  });

  it('keys anonymous callers by address', async () => {
    const response = await request(appAs(anonymousCaller)).get('/key');

    expect(response.body.key).toMatch(/^ip:.*127\.0\.0\.1$/);
  });

  it('keys requests without a resolved caller by address', async () => {
    const response = await request(appAs(undefined)).get('/key');

    expect(response.body.key).toMatch(/^ip:.*127\.0\.0\.1$/);
  });
});
