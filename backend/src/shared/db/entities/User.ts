import { Entity, Column, Index } from 'typeorm';
import { AppBaseEntity, epochMillis } from './BaseEntity.js';

export const USERNAME_MAX_LENGTH = 64;
export const EMAIL_MAX_LENGTH = 120;
export const ABOUT_ME_MAX_LENGTH = 140;

/**
 * Capability bundle the session layer needs from whoever is calling
 */
export interface SessionCapable {
  readonly isAuthenticated: boolean;
  readonly isAnonymous: boolean;
  readonly sessionKey: string;
}

@Entity({ name: 'users' })
@Index('idx_users_username', ['username'], { unique: true })
@Index('idx_users_email', ['email'], { unique: true })
export class User extends AppBaseEntity implements SessionCapable {
  @Column({ type: 'varchar', length: USERNAME_MAX_LENGTH })
  username!: string;

  @Column({ type: 'varchar', length: EMAIL_MAX_LENGTH })
  email!: string;

  @Column({ name: 'password_hash', type: 'varchar', length: 128, nullable: true })
  passwordHash!: string | null;

  @Column({ name: 'about_me', type: 'varchar', length: ABOUT_ME_MAX_LENGTH, nullable: true })
  aboutMe!: string | null;

  @Column({ name: 'last_seen', type: 'bigint', transformer: epochMillis })
  lastSeen!: number;

  @Column({ name: 'created_at', type: 'bigint', transformer: epochMillis })
  createdAt!: number;

  get isAuthenticated(): boolean {
    return true;
  }

  get isAnonymous(): boolean {
    return false;
  }

  get sessionKey(): string {
    return String(this.id);
  }
}

export const anonymousCaller: SessionCapable = Object.freeze({
  isAuthenticated: false,
  isAnonymous: true,
  sessionKey: '',
});
