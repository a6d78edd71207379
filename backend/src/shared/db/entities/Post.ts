import { Entity, Column, Index, ManyToOne, JoinColumn } from 'typeorm';
import { AppBaseEntity, epochMillis } from './BaseEntity.js';
import { User } from './User.js';

export const POST_MAX_LENGTH = 140;

@Entity({ name: 'posts' })
@Index('idx_posts_timestamp', ['timestamp'])
@Index('idx_posts_user', ['userId'])
export class Post extends AppBaseEntity {
  @Column({ type: 'varchar', length: POST_MAX_LENGTH })
  body!: string;

  @Column({ type: 'bigint', transformer: epochMillis })
  timestamp!: number;

  @Column({ name: 'user_id', type: 'integer' })
  userId!: number;

  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  author!: User;
}
