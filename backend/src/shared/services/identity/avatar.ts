import { createHash } from 'crypto';

const AVATAR_BASE_URL = 'https://www.gravatar.com/avatar';

/**
 * Gravatar-style avatar URL. Depends only on the trimmed, lower-cased email and the size.
 */
export function avatarUrl(email: string, size: number): string {
  const digest = createHash('md5').update(email.trim().toLowerCase(), 'utf8').digest('hex');
  return `${AVATAR_BASE_URL}/${digest}?d=monsterid&s=${size}`;
}
