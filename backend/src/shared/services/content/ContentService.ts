/**
 * Content Service
 * Creating posts and listing an author's posts, newest first.
 */

import type { DataSource, SelectQueryBuilder } from 'typeorm';
import { Post, POST_MAX_LENGTH } from '@shared/db/entities/Post.js';
import type { User } from '@shared/db/entities/User.js';
import { Errors } from '@shared/middleware/errorHandler.js';
import { withStore } from '@shared/services/store.js';
import { paginate, type Page } from '@shared/services/pagination.js';
import { systemClock, type Clock } from '@shared/utils/clock.js';

type Author = Pick<User, 'id'>;

export interface ContentOptions {
  clock?: Clock;
  batchSize?: number;
}

/**
 * Posts with their authors, newest first. Ties on timestamp fall back to id.
 */
export function newestFirst(dataSource: DataSource): SelectQueryBuilder<Post> {
  return dataSource
    .getRepository(Post)
    .createQueryBuilder('p')
    .innerJoinAndSelect('p.author', 'author')
    .orderBy('p.timestamp', 'DESC')
    .addOrderBy('p.id', 'DESC');
}

export class ContentService {
  private readonly clock: Clock;
  private readonly batchSize: number;

  constructor(options: ContentOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.batchSize = options.batchSize ?? 100;
  }

  /**
   * The body is stored trimmed and must be 1 to 140 characters after trimming
   */
  async createPost(author: Author, body: string): Promise<Post> {
    const text = body.trim();
    const length = Array.from(text).length;
    if (length === 0 || length > POST_MAX_LENGTH) {
      throw Errors.invalidBody(`Post body must be between 1 and ${POST_MAX_LENGTH} characters`);
    }

    return withStore((dataSource) =>
      dataSource.transaction(async (manager) => {
        const repo = manager.getRepository(Post);
        const saved = await repo.save(repo.create({ body: text, userId: author.id, timestamp: this.clock() }));
        const created = await repo.findOne({ where: { id: saved.id }, relations: { author: true } });
        return created ?? saved;
      })
    );
  }

  /**
   * Every post by `author`, read lazily with keyset paging
   */
  async *postsBy(author: Author): AsyncGenerator<Post> {
    let cursor: { timestamp: number; id: number } | null = null;
    for (;;) {
      const after = cursor;
      const batch = await withStore((dataSource) => {
        const query = newestFirst(dataSource).where('p.userId = :authorId', { authorId: author.id });
        if (after) {
          query.andWhere('(p.timestamp < :ts OR (p.timestamp = :ts AND p.id < :id))', {
            ts: after.timestamp,
            id: after.id,
          });
        }
        return query.limit(this.batchSize).getMany();
      });
      yield* batch;

      const last = batch.at(-1);
      if (!last || batch.length < this.batchSize) return;
      cursor = { timestamp: last.timestamp, id: last.id };
    }
  }

  pageOfPostsBy(author: Author, page: number, pageSize: number): Promise<Page<Post>> {
    return withStore((dataSource) =>
      paginate(newestFirst(dataSource).where('p.userId = :authorId', { authorId: author.id }), page, pageSize)
    );
  }
}
