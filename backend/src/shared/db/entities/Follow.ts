import { Entity, PrimaryColumn, ManyToOne, JoinColumn, Index } from 'typeorm';
import { User } from './User.js';

/**
 * Directed follow edge. The composite primary key is the uniqueness constraint on the pair.
 */
@Entity({ name: 'followers' })
@Index('idx_followers_followed', ['followedId'])
export class Follow {
  @PrimaryColumn({ name: 'follower_id', type: 'integer' })
  followerId!: number;

  @PrimaryColumn({ name: 'followed_id', type: 'integer' })
  followedId!: number;

  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'follower_id' })
  follower!: User;

  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'followed_id' })
  followed!: User;
}
