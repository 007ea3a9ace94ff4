export { ConnectionManager } from './connection-manager.js';
export type { ConnectionState, ConnectionManagerOptions } from './connection-manager.js';
export { Channel, ChannelPool } from './channel-pool.js';
export type { ChannelPurpose, ChannelPoolOptions } from './channel-pool.js';
export {
  ENVELOPE_VERSION,
  DEFAULT_CONTENT_TYPE,
  encodeEnvelope,
  decodeEnvelope,
  deriveEventId,
  fieldsToMap,
  toDeadLetterFields,
  withAttempt,
} from './envelope-codec.js';
export type { DecodeResult, DeadLetterMeta } from './envelope-codec.js';
export { EventPublisher, buildEvent } from './event-publisher.js';
export type { PublisherOptions, PublisherDeps } from './event-publisher.js';
export { EventReader, StreamSubscription } from './event-reader.js';
export type { ReaderOptions, ReaderDeps } from './event-reader.js';
export { StreamRelayRegister, createRelayRegister } from './relay-register.js';
export type { RelayRegisterDeps, CreateRelayRegisterOptions } from './relay-register.js';
export { default as relayPlugin } from './relay-plugin.js';
export type { RelayPluginOptions } from './relay-plugin.js';
export { entryTimestamp } from './stream-client.js';
export type {
  StreamClient,
  StreamClientFactory,
  StreamEntry,
  ClientEvent,
  ClientOptions,
  PublishOnceRequest,
  PublishOnceReply,
  ReadGroupRequest,
  ClaimIdleRequest,
  MoveEntryRequest,
} from './stream-client.js';
