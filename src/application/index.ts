export { eventSchema, toEventInput } from './event-schema.js';
export type { EventBody } from './event-schema.js';
export { registerEvent } from './register-event.js';
export type { RegisterEventResult } from './register-event.js';
export {
  backoffCeiling,
  backoffDelay,
  hasAttemptsLeft,
  abortableSleep,
  retryWithBackoff,
} from './retry-policy.js';
export type { BackoffPolicy, RetryOptions } from './retry-policy.js';
