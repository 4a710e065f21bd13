/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 *
 * RULES:
 * - Authentication-key values are NOT validated here. They pass through as-is
 *   and the identities core sanitizes them (normalize, don't reject).
 *   Which keys count is per identity kind, so the body is passthrough.
 * - Only the password shape is enforced. Token requests carry the kind's
 *   reset / confirmation keys, so their body is any JSON object.
 */

import { z } from 'zod';

export const signInSchema = z
  .object({
    password: z.string().min(1, 'Password is required'),
  })
  .passthrough();

export type SignInInput = z.infer<typeof signInSchema>;

export const tokenRequestSchema = z.object({}).passthrough();

export type TokenRequestInput = z.infer<typeof tokenRequestSchema>;
