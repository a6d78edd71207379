/**
 * Authentication routes
 * Registration, login and logout, the current identity, and password reset
 */

import registerRoute from './register.js';
import loginRoute from './login.js';
import logoutRoute from './logout.js';
import meRoute from './me.js';
import forgotPasswordRoute from './forgot-password.js';

export {
  registerRoute,
  loginRoute,
  logoutRoute,
  meRoute,
  forgotPasswordRoute,
};
