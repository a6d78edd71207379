import request from 'supertest';
import { describe, it, expect, beforeEach } from 'vitest';
import { bearer, setupApi, signUp, type TestContext } from './helpers.js';

interface BodyItem {
  body: string;
}

function bodies(items: BodyItem[]): string[] {
  return items.map((item) => item.body);
}

describe('social API', () => {
  let ctx: TestContext;
  let john: string;
  let susan: string;

  beforeEach(async () => {
    ctx = await setupApi();
    john = await signUp(ctx.app, 'john');
    susan = await signUp(ctx.app, 'susan');
  });

  describe('POST /api/posts', () => {
    it('creates a post for the caller', async () => {
      const response = await request(ctx.app).post('/api/posts').set(bearer(john)).send({ body: ' hello world ' });

      expect(response.status).toBe(201);
      expect(response.body).toMatchObject({
        body: 'hello world',
        author: {
          username: 'john',
          avatar: 'https://www.gravatar.com/avatar/d4c74594d841139328695756648b6bd6?d=monsterid&s=36',
        },
      });
    });

    it('rejects an empty body with InvalidBody', async () => {
      const response = await request(ctx.app).post('/api/posts').set(bearer(john)).send({ body: '   ' });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('InvalidBody');
    });

    it('requires authentication', async () => {
      const response = await request(ctx.app).post('/api/posts').send({ body: 'hello' });

      expect(response.status).toBe(401);
    });
  });

  describe('following', () => {
    it('returns 404 for an unknown user', async () => {
      const response = await request(ctx.app).post('/api/users/nobody/follow').set(bearer(john));

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'IdentityNotFound', message: 'User nobody not found' });
    });

    it('refuses to follow yourself', async () => {
      const response = await request(ctx.app).post('/api/users/john/follow').set(bearer(john));

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'SelfFollow', message: 'You cannot follow yourself' });
    });

    it('refuses to unfollow yourself', async () => {
      const response = await request(ctx.app).post('/api/users/john/unfollow').set(bearer(john));

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('SelfFollow');
    });

    it('follows, shows up on the profile and the lists, and unfollows', async () => {
      const followed = await request(ctx.app).post('/api/users/susan/follow').set(bearer(john));
      expect(followed.status).toBe(200);
      expect(followed.body).toEqual({ following: true, message: 'You are following susan!' });

      const profile = await request(ctx.app).get('/api/users/susan').set(bearer(john));
      expect(profile.body).toMatchObject({ username: 'susan', followers: 1, following: 0, isFollowing: true, isSelf: false });

      const followers = await request(ctx.app).get('/api/users/susan/followers');
      expect(followers.body.items).toHaveLength(1);
      expect(followers.body.items[0].username).toBe('john');

      const following = await request(ctx.app).get('/api/users/john/following');
      expect(following.body.items[0].username).toBe('susan');

      const unfollowed = await request(ctx.app).post('/api/users/susan/unfollow').set(bearer(john));
      expect(unfollowed.body).toEqual({ following: false, message: 'You are not following susan.' });

      const after = await request(ctx.app).get('/api/users/susan').set(bearer(john));
      expect(after.body).toMatchObject({ followers: 0, isFollowing: false });

      const followersAfter = await request(ctx.app).get('/api/users/susan/followers');
      const followingAfter = await request(ctx.app).get('/api/users/john/following');
      expect(followersAfter.body).toEqual({ items: [] });
      expect(followingAfter.body).toEqual({ items: [] });
    });
  });

  describe('GET /api/users/:username', () => {
    it('shows the profile to anonymous callers', async () => {
      await request(ctx.app).post('/api/posts').set(bearer(susan)).send({ body: 'first' });
      await request(ctx.app).post('/api/posts').set(bearer(susan)).send({ body: 'second' });

      const response = await request(ctx.app).get('/api/users/susan');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ username: 'susan', isFollowing: false, isSelf: false });
      expect(bodies(response.body.posts.items)).toEqual(['second', 'first']);
      expect(response.body.posts).toMatchObject({ page: 1, total: 2, hasNext: false, hasPrev: false });
    });

    it('treats an invalid token as an anonymous caller', async () => {
      await request(ctx.app).post('/api/users/susan/follow').set(bearer(john));

      const response = await request(ctx.app).get('/api/users/susan').set(bearer('not-a-token'));

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ followers: 1, isFollowing: false, isSelf: false });
    });

    it('reports whether an authenticated caller follows the user', async () => {
      await request(ctx.app).post('/api/users/susan/follow').set(bearer(john));

      const asJohn = await request(ctx.app).get('/api/users/susan').set(bearer(john));
      const asSusan = await request(ctx.app).get('/api/users/john').set(bearer(susan));

      expect(asJohn.body).toMatchObject({ isFollowing: true, isSelf: false });
      expect(asSusan.body).toMatchObject({ isFollowing: false, isSelf: false });
    });

    it('marks your own profile', async () => {
      const response = await request(ctx.app).get('/api/users/john').set(bearer(john));

      expect(response.body.isSelf).toBe(true);
    });

    it('returns 404 for an unknown user', async () => {
      const response = await request(ctx.app).get('/api/users/nobody');

      expect(response.status).toBe(404);
      expect(response.body.error).toBe('IdentityNotFound');
    });
  });

  describe('PATCH /api/users/me', () => {
    it('updates username and about me', async () => {
      const response = await request(ctx.app)
        .patch('/api/users/me')
        .set(bearer(john))
        .send({ username: 'johnny', aboutMe: 'I post things' });

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ username: 'johnny', aboutMe: 'I post things' });
    });

    it('rejects a username held by someone else', async () => {
      const response = await request(ctx.app).patch('/api/users/me').set(bearer(john)).send({ username: 'susan' });

      expect(response.status).toBe(409);
      expect(response.body.error).toBe('UsernameUnavailable');
    });

    it('rejects an about me over 140 characters', async () => {
      const response = await request(ctx.app)
        .patch('/api/users/me')
        .set(bearer(john))
        .send({ aboutMe: 'x'.repeat(141) });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'InvalidAboutMe', message: 'About me must be at most 140 characters' });
    });
  });

  describe('timelines', () => {
    beforeEach(async () => {
      await request(ctx.app).post('/api/posts').set(bearer(john)).send({ body: 'john says hi' });
      await request(ctx.app).post('/api/posts').set(bearer(susan)).send({ body: 'susan says hi' });
    });

    it('shows only your own posts before following anyone', async () => {
      const response = await request(ctx.app).get('/api/feed').set(bearer(john));

      expect(response.status).toBe(200);
      expect(bodies(response.body.items)).toEqual(['john says hi']);
    });

    it('includes followed users', async () => {
      await request(ctx.app).post('/api/users/susan/follow').set(bearer(john));

      const response = await request(ctx.app).get('/api/feed').set(bearer(john));

      expect(bodies(response.body.items)).toEqual(['susan says hi', 'john says hi']);
      expect(response.body).toMatchObject({ page: 1, pageSize: 25, total: 2, hasNext: false, hasPrev: false });
    });

    it('ignores a client-supplied page size', async () => {
      const response = await request(ctx.app).get('/api/feed?perPage=1').set(bearer(john));

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ pageSize: 25, total: 1 });
      expect(response.body.items).toHaveLength(1);
    });

    it('returns empty items past the last page', async () => {
      const response = await request(ctx.app).get('/api/feed?page=5').set(bearer(john));

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ items: [], page: 5, total: 1, hasNext: false, hasPrev: true });
    });

    it('explores every post', async () => {
      const response = await request(ctx.app).get('/api/explore').set(bearer(john));

      expect(bodies(response.body.items)).toEqual(['susan says hi', 'john says hi']);
    });

    it('rejects a non-numeric page', async () => {
      const response = await request(ctx.app).get('/api/feed?page=abc').set(bearer(john));

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('ValidationError');
    });
  });

  describe('with one post per page', () => {
    let paged: TestContext;
    let alice: string;

    beforeEach(async () => {
      paged = await setupApi({ postsPerPage: 1 });
      alice = await signUp(paged.app, 'alice');
      for (const body of ['one', 'two', 'three']) {
        await request(paged.app).post('/api/posts').set(bearer(alice)).send({ body });
      }
    });

    it('pages through the feed with the configured size', async () => {
      const first = await request(paged.app).get('/api/feed').set(bearer(alice));
      const second = await request(paged.app).get('/api/feed?page=2').set(bearer(alice));
      const third = await request(paged.app).get('/api/feed?page=3').set(bearer(alice));
      const fourth = await request(paged.app).get('/api/feed?page=4').set(bearer(alice));

      expect(bodies(first.body.items)).toEqual(['three']);
      expect(first.body).toMatchObject({ pageSize: 1, total: 3, hasNext: true, hasPrev: false });
      expect(bodies(second.body.items)).toEqual(['two']);
      expect(second.body).toMatchObject({ hasNext: true, hasPrev: true });
      expect(bodies(third.body.items)).toEqual(['one']);
      expect(third.body).toMatchObject({ hasNext: false, hasPrev: true });
      expect(fourth.body).toMatchObject({ items: [], hasNext: false, hasPrev: true });
    });

    it('pages profile posts with the configured size', async () => {
      const response = await request(paged.app).get('/api/users/alice?page=2');

      expect(bodies(response.body.posts.items)).toEqual(['two']);
      expect(response.body.posts).toMatchObject({ page: 2, pageSize: 1, total: 3 });
    });
  });
});
