/**
 * Feed Service
 * Personalised timelines: an identity's own posts plus those of everyone it follows.
 */

import type { User } from '@shared/db/entities/User.js';
import { Follow } from '@shared/db/entities/Follow.js';
import type { Post } from '@shared/db/entities/Post.js';
import { withStore } from '@shared/services/store.js';
import { paginate, type Page } from '@shared/services/pagination.js';
import { newestFirst } from '@shared/services/content/ContentService.js';

export class FeedService {
  constructor(private readonly postsPerPage: number) {}

  /**
   * One query over "me OR someone I follow", so an author is never counted twice
   * even when a self-follow edge exists
   */
  feedFor(identity: Pick<User, 'id'>, page: number, pageSize: number = this.postsPerPage): Promise<Page<Post>> {
    return withStore((dataSource) => {
      const query = newestFirst(dataSource);
      const followed = query
        .subQuery()
        .select('f.followedId')
        .from(Follow, 'f')
        .where('f.followerId = :userId')
        .getQuery();
      query.where(`(p.userId = :userId OR p.userId IN ${followed})`, { userId: identity.id });
      return paginate(query, page, pageSize);
    });
  }

  explore(page: number, pageSize: number = this.postsPerPage): Promise<Page<Post>> {
    return withStore((dataSource) => paginate(newestFirst(dataSource), page, pageSize));
  }
}
