export { Connection, connect } from './client';
export type { ConnectionOptions } from './client';

// Channels
export { Channel } from './channel';
export type { ChannelParams, PushOutcome } from './channel';

// Config
export { buildEndpointUrl, checkDelay, resolveConfig } from './config';
export type { ConnectConfig, ParamValue, ResolvedConfig } from './config';

// Connection actor
export { ConnectionActor } from './connection';
export type { ActorOptions, ConnectionState } from './connection';

// Errors
export {
  ChannelError,
  ConfigError,
  ConnectError,
  ConnectionClosedError,
  ProtocolError,
  TerminatedError,
  TransportError,
} from './errors';
export type { ChannelErrorCode } from './errors';

// Protocol
export {
  Defaults,
  Events,
  HEARTBEAT_TOPIC,
  PROTOCOL_VSN,
  heartbeatEnvelope,
  jsonCodec,
  parseReplyPayload,
} from './protocol';
export type { Codec, Envelope, Ref, ReplyPayload } from './protocol';

// Routing
export { Mailbox, MailboxClosedError } from './mailbox';
export type { Polled } from './mailbox';
export { SubscriptionRegistry, replyKey, topicKey } from './registry';
export type { Delivery, Subscription, SubscriptionDescriptor } from './registry';

// Transport
export { WebSocketTransport } from './websocket-transport';
export type { Frame, OutboundFrame, Transport, TransportConnection, TransportOptions } from './transport';

export type { Logger } from './logger';
