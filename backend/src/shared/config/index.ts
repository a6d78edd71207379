import { z } from 'zod';
import dotenv from 'dotenv';
import crypto from 'crypto';

// Load .env file FIRST before reading any environment variables
dotenv.config();

/**
 * Application configuration with validation
 * Validates environment variables on startup and provides type-safe access
 */

const nodeEnvSchema = z.enum(['development', 'production', 'test']);

const configSchema = z.object({
  // Server configuration
  port: z.number().int().positive().default(8787),
  trustProxy: z.union([z.boolean(), z.number().int().nonnegative()]).default(false),

  // Database configuration
  databaseType: z.enum(['postgres', 'sqlite']).default('sqlite'),

  // PostgreSQL configuration (when databaseType=postgres)
  postgresHost: z.string().optional(),
  postgresPort: z.number().int().positive().default(5432),
  postgresUser: z.string().optional(),
  postgresPassword: z.string().optional(),
  postgresDatabase: z.string().optional(),
  postgresSsl: z.boolean().default(false),

  // SQLite configuration (when databaseType=sqlite)
  sqlitePath: z.string().min(1).default('microblog.db'),

  // Signing key for session and password reset tokens
  secretKey: z.string().min(16),
  accessTokenExpires: z.number().int().positive().default(3600), // 1 hour in seconds
  resetTokenExpires: z.number().int().nonnegative().default(600), // 10 minutes in seconds
  bcryptRounds: z.number().int().min(4).max(15).default(10),

  // Feed configuration
  postsPerPage: z.number().int().positive().max(100).default(25),

  // Mail configuration (SMTP via nodemailer, or Resend)
  mailServer: z.string().optional(),
  mailPort: z.number().int().positive().default(25),
  mailUseTls: z.boolean().default(false),
  mailUsername: z.string().optional(),
  mailPassword: z.string().optional(),
  resendApiKey: z.string().optional(),
  admins: z.array(z.string().email()).default(['admin@example.com']),
  notificationConcurrency: z.number().int().positive().default(2),
  frontendUrl: z.string().url().default('http://localhost:5173'),

  // Environment
  nodeEnv: nodeEnvSchema.default('development'),
});

export type Config = z.infer<typeof configSchema>;

function optionalNumber(value: string | undefined): number | undefined {
  return value ? Number(value) : undefined;
}

function parseTrustProxy(value: string | undefined): boolean | number | undefined {
  if (!value) return undefined;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return Number(value);
}

function parseAdmins(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value.split(',').map((entry) => entry.trim()).filter(Boolean);
}

/**
 * Build configuration from an environment map.
 * Exported so tests can build isolated configs without touching process.env.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsedNodeEnv = nodeEnvSchema.safeParse(env.NODE_ENV);
  const inferredNodeEnv = parsedNodeEnv.success ? parsedNodeEnv.data : 'development';
  const generatedSecret = inferredNodeEnv === 'production'
    ? undefined
    : crypto.randomBytes(32).toString('hex');

  const raw = {
    port: optionalNumber(env.API_PORT),
    trustProxy: parseTrustProxy(env.TRUST_PROXY),
    databaseType: env.DATABASE_TYPE,
    postgresHost: env.POSTGRES_HOST,
    postgresPort: optionalNumber(env.POSTGRES_PORT),
    postgresUser: env.POSTGRES_USER,
    postgresPassword: env.POSTGRES_PASSWORD,
    postgresDatabase: env.POSTGRES_DATABASE,
    postgresSsl: env.POSTGRES_SSL === 'true',
    sqlitePath: env.SQLITE_PATH,
    secretKey: env.SECRET_KEY || generatedSecret,
    accessTokenExpires: optionalNumber(env.ACCESS_TOKEN_EXPIRES),
    resetTokenExpires: optionalNumber(env.RESET_TOKEN_EXPIRES),
    bcryptRounds: optionalNumber(env.BCRYPT_ROUNDS),
    postsPerPage: optionalNumber(env.POSTS_PER_PAGE),
    mailServer: env.MAIL_SERVER,
    mailPort: optionalNumber(env.MAIL_PORT),
    mailUseTls: env.MAIL_USE_TLS !== undefined,
    mailUsername: env.MAIL_USERNAME,
    mailPassword: env.MAIL_PASSWORD,
    resendApiKey: env.RESEND_API_KEY,
    admins: parseAdmins(env.ADMINS),
    notificationConcurrency: optionalNumber(env.NOTIFICATION_CONCURRENCY),
    frontendUrl: env.FRONTEND_URL,
    nodeEnv: inferredNodeEnv,
  };

  return configSchema.parse(raw);
}

function loadConfigOrExit(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Configuration validation failed:');
      error.errors.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      process.exit(1);
    }
    throw error;
  }
}

// Singleton config instance
export const config = loadConfigOrExit();

export function logConfigSummary(target: Config = config): void {
  // Excludes secrets
  console.log('✅ Configuration loaded:');
  console.log(`  - Port: ${target.port}`);
  console.log(`  - Database Type: ${target.databaseType}`);
  if (target.databaseType === 'postgres') {
    console.log(`  - PostgreSQL Host: ${target.postgresHost}`);
    console.log(`  - PostgreSQL Database: ${target.postgresDatabase}`);
  } else {
    console.log(`  - SQLite Path: ${target.sqlitePath}`);
  }
  console.log(`  - Posts per page: ${target.postsPerPage}`);
  console.log(`  - Environment: ${target.nodeEnv}`);
  if (target.nodeEnv === 'development' && !process.env.SECRET_KEY) {
    console.warn('⚠️  SECRET_KEY not set. Using a generated key (tokens will be invalid after restart).');
  }
  if (!target.mailServer && !target.resendApiKey) {
    console.warn('⚠️  No mail transport configured. Password reset emails are disabled.');
  }
}
