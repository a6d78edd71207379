import usersRoute from './routes/users.js';
import followRoute from './routes/follow.js';

export { usersRoute, followRoute };
