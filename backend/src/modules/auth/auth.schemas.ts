/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Password rules: 8+ chars, confirmation must match.
 * - Email normalized to lowercase in the DAL, not here.
 * - Register: companyId (join) wins over companyName (create) when both are sent.
 */

import { z } from 'zod';

const password = z
  .string()
  .min(8, 'Password must be at least 8 characters')
  .max(128, 'Password is too long');

const personName = z.string().trim().max(150);

export const registerSchema = z
  .object({
    email: z.string().email('Invalid email address'),
    password,
    passwordConfirm: z.string(),
    firstName: personName.optional().default(''),
    lastName: personName.optional().default(''),
    companyName: z.string().trim().min(1).max(200).optional(),
    companyId: z.string().uuid('Invalid company id').optional(),
  })
  .refine((v) => v.password === v.passwordConfirm, {
    message: 'Passwords do not match.',
    path: ['passwordConfirm'],
  })
  .refine((v) => v.companyName !== undefined || v.companyId !== undefined, {
    message: 'Either companyName or companyId must be provided.',
    path: ['company'],
  });

export type RegisterInput = z.infer<typeof registerSchema>;

export const loginSchema = z.object({
  email: z.string().email('Invalid email address'),
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof loginSchema>;

export const refreshSchema = z.object({
  refresh: z.string().min(1, 'Refresh token is required'),
});

export const logoutSchema = refreshSchema;

export const updateProfileSchema = z
  .object({
    firstName: personName.optional(),
    lastName: personName.optional(),
  })
  .strict();

export type UpdateProfileInput = z.infer<typeof updateProfileSchema>;

export const changePasswordSchema = z
  .object({
    oldPassword: z.string().min(1, 'Old password is required'),
    newPassword: password,
    newPasswordConfirm: z.string(),
  })
  .refine((v) => v.newPassword === v.newPasswordConfirm, {
    message: 'Passwords do not match.',
    path: ['newPasswordConfirm'],
  });

export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;
