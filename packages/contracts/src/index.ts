export type * from './auth.js';
export type * from './social.js';
export type * from './errors.js';
