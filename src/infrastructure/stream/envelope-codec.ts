import { createHash } from 'node:crypto';
import { z } from 'zod';
import { DecodeError } from '../../domain/index.js';
import type { QuarantineReason, RelayEvent } from '../../domain/index.js';

export const ENVELOPE_VERSION = '1';
export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/** ISO-8601 datetime with offset, as carried in `created_at`. */
export const createdAtSchema = z.string().datetime({ offset: true });

/**
 * Wire shape of one stream entry. Stream values are strings, so the
 * payload travels base64-encoded and counters as decimal text.
 */
const envelopeSchema = z.object({
  envelope_version: z.literal(ENVELOPE_VERSION),
  event_id: z.string().min(1),
  source_tag: z.string().min(1),
  created_at: createdAtSchema,
  attempt_count: z.string().regex(/^\d+$/, 'Must be a non-negative integer'),
  content_type: z.string().min(1),
  payload: z
    .string()
    .min(1)
    .refine((value) => value.length % 4 === 0 && BASE64.test(value), 'Must be base64'),
});

export type DecodeResult =
  | { ok: true; event: RelayEvent; content_type: string }
  | { ok: false; error: DecodeError };

export interface DeadLetterMeta {
  reason: QuarantineReason;
  original_stream: string;
  original_entry_id: string;
  detail?: string;
  quarantined_at?: string;
}

/**
 * Parses a flat [field, value, ...] list into a map. Later duplicates
 * win, a trailing field without a value is ignored.
 */
export function fieldsToMap(fields: readonly string[]): Map<string, string> {
  const map = new Map<string, string>();
  for (let i = 0; i + 1 < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      map.set(key, value);
    }
  }
  return map;
}

export function encodeEnvelope(event: RelayEvent, contentType: string = DEFAULT_CONTENT_TYPE): string[] {
  return [
    'envelope_version', ENVELOPE_VERSION,
    'event_id', event.id,
    'source_tag', event.source_tag,
    'created_at', event.created_at,
    'attempt_count', String(event.attempt_count),
    'content_type', contentType,
    'payload', event.payload.toString('base64'),
  ];
}

export function decodeEnvelope(fields: readonly string[]): DecodeResult {
  const parsed = envelopeSchema.safeParse(Object.fromEntries(fieldsToMap(fields)));
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'envelope'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error: new DecodeError(`Malformed envelope (${detail})`) };
  }

  const envelope = parsed.data;
  return {
    ok: true,
    content_type: envelope.content_type,
    event: {
      id: envelope.event_id,
      source_tag: envelope.source_tag,
      created_at: envelope.created_at,
      attempt_count: Number(envelope.attempt_count),
      payload: Buffer.from(envelope.payload, 'base64'),
    },
  };
}

/**
 * Content-derived id for events published without one: SHA-256 over the
 * source tag and the payload, so re-publishing the same bytes from the same
 * producer is deduplicated.
 */
export function deriveEventId(sourceTag: string, payload: Buffer): string {
  return createHash('sha256').update(sourceTag).update('\u0000').update(payload).digest('hex');
}

export function withAttempt(event: RelayEvent, attemptCount: number): RelayEvent {
  return { ...event, attempt_count: attemptCount };
}

/** Original fields plus the quarantine metadata, for the dead-letter stream. */
export function toDeadLetterFields(fields: readonly string[], meta: DeadLetterMeta): string[] {
  return [
    ...fields,
    'dead_letter_reason', meta.reason,
    'dead_letter_detail', meta.detail ?? '',
    'original_stream', meta.original_stream,
    'original_entry_id', meta.original_entry_id,
    'quarantined_at', meta.quarantined_at ?? new Date().toISOString(),
  ];
}
