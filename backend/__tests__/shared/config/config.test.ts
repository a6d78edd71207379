import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../../../src/shared/config/index.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const cfg = loadConfig({ NODE_ENV: 'test', SECRET_KEY: 'test-secret-key-0123456789' });

    expect(cfg).toMatchObject({
      port: 8787,
      databaseType: 'sqlite',
      sqlitePath: 'microblog.db',
      accessTokenExpires: 3600,
      resetTokenExpires: 600,
      bcryptRounds: 10,
      postsPerPage: 25,
      mailPort: 25,
      mailUseTls: false,
      admins: ['admin@example.com'],
      nodeEnv: 'test',
    });
  });

  it('reads mail settings and the admin list', () => {
    const cfg = loadConfig({
      NODE_ENV: 'test',
      SECRET_KEY: 'test-secret-key-0123456789',
      MAIL_SERVER: 'smtp.example.com',
      MAIL_PORT: '587',
      MAIL_USE_TLS: '1',
      ADMINS: 'ops@example.com, dev@example.com',
      POSTS_PER_PAGE: '3',
    });

    expect(cfg.mailServer).toBe('smtp.example.com');
    expect(cfg.mailPort).toBe(587);
    expect(cfg.mailUseTls).toBe(true);
    expect(cfg.admins).toEqual(['ops@example.com', 'dev@example.com']);
    expect(cfg.postsPerPage).toBe(3);
  });

  it('generates a secret outside production', () => {
    const cfg = loadConfig({ NODE_ENV: 'development' });

    expect(cfg.secretKey).toHaveLength(64);
  });

  it('requires a secret in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow(ZodError);
  });

  it('rejects a short secret', () => {
    expect(() => loadConfig({ NODE_ENV: 'test', SECRET_KEY: 'short' })).toThrow(ZodError);
  });
});
