import { z } from 'zod';
import { commonSchemas } from '../middleware/validation.js';

/**
 * Auth Validation Schemas
 */

const username = z
  .string()
  .trim()
  .min(3, 'Username must be at least 3 characters')
  .max(150)
  .regex(/^[\w.@+-]+$/, 'Username may only contain letters, digits and @ . + - _');

const email = z.string().trim().toLowerCase().email('Invalid email address').max(254);

const nickname = z
  .string()
  .trim()
  .min(1, 'Nickname is required')
  .max(50)
  .regex(/^[\w-]+$/, 'Nickname may only contain letters, digits, - and _');

export const registerSchema = z.object({
  username,
  email,
  nickname,
  password: z.string().min(8, 'Password must be at least 8 characters').max(128),
});

/**
 * `login` is a username or an email address
 */
export const loginSchema = z.object({
  login: commonSchemas.nonEmptyString,
  password: z.string().min(1, 'Password is required'),
});

export const updateAccountSchema = z
  .object({
    email: email.optional(),
    nickname: nickname.optional(),
  })
  .refine(data => data.email !== undefined || data.nickname !== undefined, {
    message: 'At least one of email or nickname is required',
  });
