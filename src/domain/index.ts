export type { RelayEvent, EventInput, PublishAck } from './event.js';
export { ConsumeOutcome, Delivery, isConsumeOutcome } from './delivery.js';
export type { DeliveryState, QuarantineReason } from './delivery.js';
export type {
  EventCallback,
  EventRegister,
  Subscription,
  SubscriptionState,
  SubscriptionStats,
} from './register.js';
export {
  RelayError,
  ConnectionError,
  PoolError,
  PublishError,
  DecodeError,
  InvalidEventError,
  SubscriptionError,
  TransportError,
  BrokerReplyError,
  ConfigError,
  isTransportFailure,
  errorMessage,
} from './errors.js';
export type { RelayErrorCode, PublishErrorKind } from './errors.js';
