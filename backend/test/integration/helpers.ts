import request from 'supertest';
import { vi } from 'vitest';
import type express from 'express';
import { config, type Config } from '@shared/config/index.js';
import { createServices, setServices, type Services } from '@shared/services/index.js';
import type { MailMessage, MailTransport } from '@shared/services/email/transports.js';
import { createApp } from '../../src/app.js';
import { resetDatabase } from '../utils/db.js';

export interface TestContext {
  app: express.Express;
  services: Services;
  outbox: MailMessage[];
}

/**
 * Fresh database, services wired to an in-memory outbox, and an app without rate limiting
 */
export async function setupApi(settings: Partial<Config> = {}): Promise<TestContext> {
  await resetDatabase();
  const outbox: MailMessage[] = [];
  const transport: MailTransport = {
    name: 'smtp',
    deliver: vi.fn(async (message: MailMessage) => {
      outbox.push(message);
      return { success: true };
    }),
  };
  const services = createServices({ ...config, ...settings }, { transport });
  setServices(services);
  return { app: createApp({ includeRateLimiting: false }), services, outbox };
}

export async function register(app: express.Express, username: string, password = 'test-password'): Promise<void> {
  const response = await request(app)
    .post('/api/auth/register')
    .send({ username, email: `${username}@example.com`, password, password2: password });
  if (response.status !== 201) {
    throw new Error(`register ${username} failed with ${response.status}`);
  }
}

/**
 * Register and log in; returns the bearer token
 */
export async function signUp(app: express.Express, username: string, password = 'test-password'): Promise<string> {
  await register(app, username, password);
  const response = await request(app).post('/api/auth/login').send({ username, password });
  const token: unknown = response.body.accessToken;
  if (typeof token !== 'string') {
    throw new Error(`login ${username} failed with ${response.status}`);
  }
  return token;
}

export function bearer(token: string): { Authorization: string } {
  return { Authorization: `Bearer ${token}` };
}
