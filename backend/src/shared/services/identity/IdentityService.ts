/**
 * Identity Service
 * Registration, lookup and profile edits for user identities.
 */

import { QueryFailedError, type EntityManager } from 'typeorm';
import { User, ABOUT_ME_MAX_LENGTH, USERNAME_MAX_LENGTH } from '@shared/db/entities/User.js';
import { Post } from '@shared/db/entities/Post.js';
import { Follow } from '@shared/db/entities/Follow.js';
import { Errors } from '@shared/middleware/errorHandler.js';
import { withStore, isUniqueViolation } from '@shared/services/store.js';
import type { CredentialService } from '@shared/services/credentials/CredentialService.js';
import { systemClock, type Clock } from '@shared/utils/clock.js';
import { logger } from '@shared/utils/logger.js';
import { avatarUrl } from './avatar.js';

export interface ProfileChanges {
  username?: string;
  aboutMe?: string | null;
}

export interface IdentityOptions {
  credentials: CredentialService;
  clock?: Clock;
}

const log = logger.child('identity');

function codePointLength(value: string): number {
  return Array.from(value).length;
}

function assertUsername(username: string): void {
  if (username.trim().length === 0 || codePointLength(username) > USERNAME_MAX_LENGTH) {
    throw Errors.validation(`username must be between 1 and ${USERNAME_MAX_LENGTH} characters`);
  }
}

/**
 * Which unique index a failed insert ran into. Both drivers name the column
 * or the index in the message.
 */
function violatedColumn(error: unknown): 'username' | 'email' | null {
  if (!(error instanceof QueryFailedError)) return null;
  if (/username/i.test(error.message)) return 'username';
  if (/email/i.test(error.message)) return 'email';
  return null;
}

function mapDuplicate(error: unknown, attempted: { username: string; email: string }): unknown {
  if (!isUniqueViolation(error)) return error;
  return violatedColumn(error) === 'email'
    ? Errors.duplicateEmail(attempted.email)
    : Errors.duplicateUsername(attempted.username);
}

export class IdentityService {
  private readonly credentials: CredentialService;
  private readonly clock: Clock;

  constructor(options: IdentityOptions) {
    this.credentials = options.credentials;
    this.clock = options.clock ?? systemClock;
  }

  async create(username: string, email: string, plaintextPassword: string): Promise<User> {
    assertUsername(username);

    const user = await withStore(async (dataSource) => {
      try {
        return await dataSource.transaction(async (manager) => {
          const repo = manager.getRepository(User);
          if (await repo.existsBy({ username })) {
            throw Errors.duplicateUsername(username);
          }
          if (await repo.existsBy({ email })) {
            throw Errors.duplicateEmail(email);
          }

          const now = this.clock();
          const identity = repo.create({
            username,
            email,
            passwordHash: null,
            aboutMe: null,
            lastSeen: now,
            createdAt: now,
          });
          await this.credentials.setPassword(identity, plaintextPassword);
          return await repo.save(identity);
        });
      } catch (error) {
        // A concurrent registration can pass the checks above and still lose on the unique index
        throw mapDuplicate(error, { username, email });
      }
    });
    log.info(`Registered ${user.username} (${user.id})`);
    return user;
  }

  findByUsername(username: string): Promise<User | null> {
    return withStore((dataSource) => dataSource.getRepository(User).findOneBy({ username }));
  }

  findByEmail(email: string): Promise<User | null> {
    return withStore((dataSource) => dataSource.getRepository(User).findOneBy({ email }));
  }

  findById(id: number): Promise<User | null> {
    return withStore((dataSource) => dataSource.getRepository(User).findOneBy({ id }));
  }

  /**
   * Apply username and about-me edits. Concurrent edits are last-writer-wins.
   */
  async updateProfile(identity: User, changes: ProfileChanges): Promise<User> {
    const { username, aboutMe } = changes;
    if (username !== undefined) assertUsername(username);
    if (aboutMe !== undefined && aboutMe !== null && codePointLength(aboutMe) > ABOUT_ME_MAX_LENGTH) {
      throw Errors.invalidAboutMe(ABOUT_ME_MAX_LENGTH);
    }

    const patch: Partial<Pick<User, 'username' | 'aboutMe'>> = {};
    if (username !== undefined && username !== identity.username) patch.username = username;
    if (aboutMe !== undefined) patch.aboutMe = aboutMe;
    if (Object.keys(patch).length === 0) return identity;

    const updated = await withStore(async (dataSource) => {
      try {
        return await dataSource.transaction(async (manager) => {
          const repo = manager.getRepository(User);
          if (patch.username !== undefined) {
            const holder = await repo.findOneBy({ username: patch.username });
            if (holder && holder.id !== identity.id) {
              throw Errors.usernameUnavailable(patch.username);
            }
          }
          await repo.update({ id: identity.id }, patch);
          return await repo.findOneBy({ id: identity.id });
        });
      } catch (error) {
        if (patch.username !== undefined && isUniqueViolation(error)) {
          throw Errors.usernameUnavailable(patch.username);
        }
        throw error;
      }
    });
    if (!updated) throw Errors.identityNotFound(identity.id);
    Object.assign(identity, patch);
    return updated;
  }

  avatarRef(identity: Pick<User, 'email'>, size: number): string {
    return avatarUrl(identity.email, size);
  }

  async touchLastSeen(identity: User): Promise<void> {
    const lastSeen = this.clock();
    await withStore((dataSource) => dataSource.getRepository(User).update({ id: identity.id }, { lastSeen }));
    identity.lastSeen = lastSeen;
  }

  async setPasswordFor(identity: User, plaintext: string): Promise<void> {
    await this.credentials.setPassword(identity, plaintext);
    const { passwordHash } = identity;
    await withStore((dataSource) => dataSource.getRepository(User).update({ id: identity.id }, { passwordHash }));
    log.info(`Password changed for ${identity.username} (${identity.id})`);
  }

  /**
   * Delete an identity together with its posts and follow edges
   */
  async remove(identity: User): Promise<void> {
    await withStore((dataSource) =>
      dataSource.transaction(async (manager: EntityManager) => {
        await manager.delete(Follow, { followerId: identity.id });
        await manager.delete(Follow, { followedId: identity.id });
        await manager.delete(Post, { userId: identity.id });
        await manager.delete(User, { id: identity.id });
      })
    );
    log.info(`Removed ${identity.username} (${identity.id})`);
  }

  /**
   * The identity a reset token was issued for, or null when the token is
   * invalid or its subject no longer exists
   */
  async resolveResetToken(token: string): Promise<User | null> {
    const subjectId = this.credentials.verifyResetToken(token);
    if (subjectId === null) return null;
    return this.findById(subjectId);
  }
}
