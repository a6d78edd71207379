export {
  registerRoute,
  loginRoute,
  logoutRoute,
  meRoute,
  forgotPasswordRoute,
} from './routes/index.js';
