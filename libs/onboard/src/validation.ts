/**
 * Account form validation
 */

import { z } from 'zod';

export interface UserForm {
  username: string;
  password: string;
  confirm: string;
}

export function userFormSchema(minPasswordLength: number) {
  return z
    .object({
      username: z
        .string()
        .min(1, 'Username is required')
        .regex(/^[\p{L}\p{N}_-]*$/u, 'Username can only contain letters, numbers, underscore, and dash')
        .refine((name) => Buffer.byteLength(name, 'utf8') <= 32, 'Username must be 32 bytes or less'),
      password: z
        .string()
        .min(1, 'Password is required')
        .min(minPasswordLength, `Password must be at least ${minPasswordLength} characters`),
      confirm: z.string(),
    })
    .refine((form) => form.password === form.confirm, { message: 'Passwords do not match', path: ['confirm'] });
}

/**
 * First validation error of the form, or null when it is valid.
 */
export function validateUserForm(form: UserForm, minPasswordLength: number): string | null {
  const result = userFormSchema(minPasswordLength).safeParse(form);
  if (result.success) {
    return null;
  }
  return result.error.issues[0]?.message ?? 'Invalid form';
}
