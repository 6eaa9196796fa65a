/**
 * Zod schemas for greetd frames
 */

import { z } from 'zod';

export const GreetdResponseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('success') }),
  z.object({
    type: z.literal('auth_message'),
    auth_message_type: z.enum(['visible', 'secret', 'info', 'error']),
    auth_message: z.string(),
  }),
  z.object({
    type: z.literal('error'),
    error_type: z.enum(['auth_error', 'error']),
    description: z.string(),
  }),
]);

export const GreetdRequestSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('create_session'), username: z.string() }),
  z.object({ type: z.literal('post_auth_message_response'), response: z.string().nullable() }),
  z.object({ type: z.literal('start_session'), cmd: z.array(z.string()), env: z.array(z.string()) }),
  z.object({ type: z.literal('cancel_session') }),
]);
