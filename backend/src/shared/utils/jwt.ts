import jwt, { type JwtPayload } from 'jsonwebtoken';

/**
 * JWT helpers
 * All tokens are HS256; the secret is passed in by the caller, never read from globals
 */

export interface SignOptions {
  secret: string;
  /** Absolute expiry, seconds since the epoch */
  expiresAt: number;
  /** Issued-at, seconds since the epoch */
  issuedAt: number;
}

export function signToken(claims: Record<string, string | number>, options: SignOptions): string {
  return jwt.sign(
    { ...claims, iat: options.issuedAt, exp: options.expiresAt },
    options.secret,
    { algorithm: 'HS256' }
  );
}

/**
 * Verify signature and expiry. Returns the claims, or null for any malformed,
 * forged or expired token.
 */
export function verifyToken(token: string, secret: string, nowSeconds: number): JwtPayload | null {
  try {
    const payload = jwt.verify(token, secret, {
      algorithms: ['HS256'],
      clockTimestamp: nowSeconds,
    });
    return typeof payload === 'string' ? null : payload;
  } catch (error) {
    if (error instanceof jwt.JsonWebTokenError) {
      return null;
    }
    throw error;
  }
}

export function toEpochSeconds(millis: number): number {
  return Math.floor(millis / 1000);
}
