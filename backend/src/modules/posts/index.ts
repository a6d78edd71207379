import postsRoute from './routes/posts.js';
import feedRoute from './routes/feed.js';

export { postsRoute, feedRoute };
