/**
 * Credential Service
 * Password hashing plus signed, self-contained access and reset tokens.
 * Nothing here touches the database; callers persist identity changes.
 */

import { z } from 'zod';
import type { User } from '@shared/db/entities/User.js';
import { hashPassword, verifyPassword, DEFAULT_SALT_ROUNDS } from '@shared/utils/password.js';
import { signToken, verifyToken, toEpochSeconds } from '@shared/utils/jwt.js';
import { systemClock, type Clock } from '@shared/utils/clock.js';
import { logger } from '@shared/utils/logger.js';

export interface CredentialOptions {
  secretKey: string;
  accessTokenExpires: number;
  resetTokenExpires: number;
  saltRounds?: number;
  clock?: Clock;
}

type PasswordHolder = Pick<User, 'passwordHash'>;
type TokenSubject = Pick<User, 'id'>;

const subjectId = z.coerce.number().int().positive();

const resetClaims = z.object({ reset_password: subjectId });
const accessClaims = z.object({ sub: subjectId, type: z.literal('access') });

export class CredentialService {
  private readonly secretKey: string;
  private readonly accessTokenExpires: number;
  private readonly resetTokenExpires: number;
  private readonly saltRounds: number;
  private readonly clock: Clock;

  constructor(options: CredentialOptions) {
    this.secretKey = options.secretKey;
    this.accessTokenExpires = options.accessTokenExpires;
    this.resetTokenExpires = options.resetTokenExpires;
    this.saltRounds = options.saltRounds ?? DEFAULT_SALT_ROUNDS;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Replace the stored hash with a fresh salted hash of plaintext
   */
  async setPassword(identity: PasswordHolder, plaintext: string): Promise<void> {
    identity.passwordHash = await hashPassword(plaintext, this.saltRounds);
  }

  /**
   * True iff plaintext matches the stored hash. Never throws.
   */
  async checkPassword(identity: PasswordHolder, plaintext: string): Promise<boolean> {
    if (!identity.passwordHash) return false;
    try {
      return await verifyPassword(plaintext, identity.passwordHash);
    } catch (error) {
      logger.warn('Stored password hash could not be verified:', error instanceof Error ? error.message : error);
      return false;
    }
  }

  issueResetToken(identity: TokenSubject, ttlSeconds = this.resetTokenExpires): string {
    return this.sign({ reset_password: identity.id }, ttlSeconds);
  }

  /**
   * Subject id of a valid, unexpired reset token; null otherwise
   */
  verifyResetToken(token: string): number | null {
    const parsed = resetClaims.safeParse(this.verify(token));
    return parsed.success ? parsed.data.reset_password : null;
  }

  issueAccessToken(identity: TokenSubject): string {
    return this.sign({ sub: String(identity.id), type: 'access' }, this.accessTokenExpires);
  }

  verifyAccessToken(token: string): number | null {
    const parsed = accessClaims.safeParse(this.verify(token));
    return parsed.success ? parsed.data.sub : null;
  }

  get accessTokenLifetime(): number {
    return this.accessTokenExpires;
  }

  private sign(claims: Record<string, string | number>, ttlSeconds: number): string {
    const issuedAt = toEpochSeconds(this.clock());
    return signToken(claims, {
      secret: this.secretKey,
      issuedAt,
      expiresAt: issuedAt + ttlSeconds,
    });
  }

  private verify(token: string): unknown {
    return verifyToken(token, this.secretKey, toEpochSeconds(this.clock()));
  }
}
