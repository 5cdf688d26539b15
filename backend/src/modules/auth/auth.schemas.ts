/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Password rules: 8+ chars on register.
 * - Email normalized to lowercase in service, not here.
 * - Login uses the OAuth2 password-flow field names: `username` carries the email.
 */

import { z } from 'zod';

export const registerSchema = z.object({
  email: z.string().email('Invalid email address').max(320),
  password: z.string().min(8, 'Password must be at least 8 characters').max(128),
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const loginSchema = z.object({
  username: z.string().email('Invalid email address'),
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof loginSchema>;
