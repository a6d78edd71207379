import bcrypt from 'bcryptjs';
import { createHash } from 'crypto';

/**
 * Password utility functions
 * Handles hashing and verification
 */

export const DEFAULT_SALT_ROUNDS = 10;

/**
 * bcrypt reads only the first 72 bytes of its input, so the plaintext is
 * reduced to a fixed-length digest first. Every password maps to 44 ASCII bytes.
 */
function prehash(password: string): string {
  return createHash('sha256').update(password, 'utf8').digest('base64');
}

/**
 * Hash a password using bcrypt
 */
export async function hashPassword(password: string, saltRounds = DEFAULT_SALT_ROUNDS): Promise<string> {
  return bcrypt.hash(prehash(password), saltRounds);
}

/**
 * Verify a password against a hash
 */
export async function verifyPassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(prehash(password), hash);
}
