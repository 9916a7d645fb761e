/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Request body validation for the auth endpoints.
 *
 * RULES:
 * - Shape only. Password strength is a flow concern (it must produce
 *   WEAK_PASSWORD with reasons, not a generic validation error).
 * - Email is normalized in the flow, not here.
 * - Max lengths bound the work a request can cause (bcrypt reads 72 bytes anyway).
 */

import { z } from 'zod';

const email = z.string().trim().email('Invalid email address').max(320);
const password = z.string().min(1, 'Password is required').max(256);

export const registerSchema = z.object({
  email,
  password,
  passwordConfirmation: z.string().max(256),
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const loginSchema = z.object({
  email,
  password,
});

export type LoginInput = z.infer<typeof loginSchema>;

export const forgotPasswordSchema = z.object({
  email,
});

export type ForgotPasswordInput = z.infer<typeof forgotPasswordSchema>;

export const resetPasswordSchema = z.object({
  email,
  code: z.string().min(1, 'Code is required').max(64),
  newPassword: password,
  newPasswordConfirmation: z.string().max(256),
});

export type ResetPasswordInput = z.infer<typeof resetPasswordSchema>;
