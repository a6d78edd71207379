/**
 * Social Graph Service
 * Directed follow edges between identities. Edge lists are read lazily in batches.
 */

import { User } from '@shared/db/entities/User.js';
import { Follow } from '@shared/db/entities/Follow.js';
import { withStore } from '@shared/services/store.js';
import { logger } from '@shared/utils/logger.js';

type Member = Pick<User, 'id'>;

const DEFAULT_BATCH_SIZE = 100;

const log = logger.child('social-graph');

export class SocialGraphService {
  constructor(private readonly batchSize: number = DEFAULT_BATCH_SIZE) {}

  /**
   * Idempotent. The composite key on (follower, followed) absorbs repeats.
   */
  async follow(follower: Member, followee: Member): Promise<void> {
    await withStore((dataSource) =>
      dataSource.transaction((manager) =>
        manager
          .createQueryBuilder()
          .insert()
          .into(Follow)
          .values({ followerId: follower.id, followedId: followee.id })
          .orIgnore()
          .execute()
      )
    );
    log.debug(`${follower.id} follows ${followee.id}`);
  }

  async unfollow(follower: Member, followee: Member): Promise<void> {
    await withStore((dataSource) =>
      dataSource.transaction((manager) =>
        manager.delete(Follow, { followerId: follower.id, followedId: followee.id })
      )
    );
    log.debug(`${follower.id} unfollowed ${followee.id}`);
  }

  isFollowing(follower: Member, followee: Member): Promise<boolean> {
    return withStore((dataSource) =>
      dataSource.getRepository(Follow).existsBy({ followerId: follower.id, followedId: followee.id })
    );
  }

  /** Identities following `identity`, ascending by id */
  followersOf(identity: Member): AsyncGenerator<User> {
    return this.walk('f.followerId = u.id', 'f.followedId = :memberId', identity.id);
  }

  /** Identities `identity` follows, ascending by id */
  followedBy(identity: Member): AsyncGenerator<User> {
    return this.walk('f.followedId = u.id', 'f.followerId = :memberId', identity.id);
  }

  followerCount(identity: Member): Promise<number> {
    return withStore((dataSource) => dataSource.getRepository(Follow).countBy({ followedId: identity.id }));
  }

  followedCount(identity: Member): Promise<number> {
    return withStore((dataSource) => dataSource.getRepository(Follow).countBy({ followerId: identity.id }));
  }

  private async *walk(joinOn: string, edgeFilter: string, memberId: number): AsyncGenerator<User> {
    let afterId = 0;
    for (;;) {
      const batch = await withStore((dataSource) =>
        dataSource
          .getRepository(User)
          .createQueryBuilder('u')
          .innerJoin(Follow, 'f', joinOn)
          .where(edgeFilter, { memberId })
          .andWhere('u.id > :afterId', { afterId })
          .orderBy('u.id', 'ASC')
          .limit(this.batchSize)
          .getMany()
      );
      yield* batch;

      const last = batch.at(-1);
      if (!last || batch.length < this.batchSize) return;
      afterId = last.id;
    }
  }
}
