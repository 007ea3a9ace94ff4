import { z } from 'zod';
import type { EventInput } from '../domain/index.js';

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Zod schema for a single inbound event on the HTTP surface.
 *
 * - `id` is optional; the register derives one from `source_tag` and the payload bytes.
 * - `payload` is text, or base64 when `encoding` says so.
 * - `created_at` must be an ISO-8601 datetime with offset.
 */
export const eventSchema = z
  .object({
    id: z.string().trim().min(1).max(255).optional(),
    source_tag: z.string().trim().min(1).max(255),
    payload: z.string().min(1, 'Payload must not be empty'),
    encoding: z.enum(['utf8', 'base64']).default('utf8'),
    created_at: z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' }).optional(),
  })
  .superRefine((body, ctx) => {
    if (body.encoding === 'base64' && (body.payload.length % 4 !== 0 || !BASE64.test(body.payload))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['payload'], message: 'Must be base64' });
    }
  });

export type EventBody = z.infer<typeof eventSchema>;

/** Converts a validated body into register input. */
export function toEventInput(body: EventBody): EventInput {
  return {
    id: body.id,
    source_tag: body.source_tag,
    payload: body.encoding === 'base64' ? Buffer.from(body.payload, 'base64') : body.payload,
    created_at: body.created_at,
  };
}
