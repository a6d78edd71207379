/**
 * Common Zod validation schemas for reuse across routes
 */
import { z } from 'zod';
import { USERNAME_MAX_LENGTH, EMAIL_MAX_LENGTH } from '@shared/db/entities/User.js';

// === Field Schemas ===
export const usernameSchema = z.string().trim().min(1, 'Username is required').max(USERNAME_MAX_LENGTH);
export const emailSchema = z.string().trim().email().max(EMAIL_MAX_LENGTH);
export const passwordSchema = z.string().min(1, 'Password is required').max(1024);

// === Param Schemas ===
export const usernameParamSchema = z.object({ username: z.string().min(1) });
export const tokenParamSchema = z.object({ token: z.string().min(1) });

// === Pagination Schemas ===
// Any integer page is accepted; pages outside the result are empty
export const pageQuerySchema = z.object({
  page: z.coerce.number().int().default(1),
});

// === Request Body Schemas ===
export const registerBodySchema = z
  .object({
    username: usernameSchema,
    email: emailSchema,
    password: passwordSchema,
    password2: z.string(),
  })
  .refine((body) => body.password === body.password2, {
    message: 'Passwords must match',
    path: ['password2'],
  });

export const loginBodySchema = z.object({
  username: z.string().trim().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
  rememberMe: z.boolean().optional().default(false),
});

export const emailBodySchema = z.object({ email: emailSchema });

export const resetPasswordBodySchema = z
  .object({
    password: passwordSchema,
    password2: z.string(),
  })
  .refine((body) => body.password === body.password2, {
    message: 'Passwords must match',
    path: ['password2'],
  });

export const verifyTokenQuerySchema = z.object({ token: z.string().min(1) });

export const updateProfileBodySchema = z
  .object({
    username: usernameSchema.optional(),
    aboutMe: z.string().nullable().optional(),
  })
  .refine((body) => body.username !== undefined || body.aboutMe !== undefined, {
    message: 'Nothing to update',
  });

// Body and about-me lengths are checked by the services (InvalidBody, InvalidAboutMe)
export const createPostBodySchema = z.object({ body: z.string() });
