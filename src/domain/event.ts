/**
 * Core domain types for the relay event model.
 *
 * These types define the canonical shape of an event as it moves from a
 * producer, through the broker, to a consumer callback. They carry no
 * framework dependencies.
 */

/**
 * Canonical relay event.
 *
 * `id` is stable across every redelivery of the same logical event and is
 * the deduplication key on both the publish and the consume side.
 * `payload` is opaque to the register.
 */
export interface RelayEvent {
  readonly id: string;
  readonly payload: Buffer;
  readonly created_at: string; // ISO-8601
  readonly attempt_count: number;
  readonly source_tag: string;
}

/**
 * What a producer hands to `registerEvent`.
 *
 * `id` is derived from `source_tag` and `payload` when absent.
 * String payloads are UTF-8 encoded.
 */
export interface EventInput {
  readonly id?: string | undefined;
  readonly payload: Buffer | string;
  readonly source_tag: string;
  readonly created_at?: string | undefined;
}

/** Broker confirmation returned by a successful `registerEvent`. */
export interface PublishAck {
  readonly event_id: string;
  readonly entry_id: string;
  readonly stream: string;
  readonly enqueued_at: string;
  /** True when the id was already enqueued within the retention window. */
  readonly duplicate: boolean;
}
