import { Channel, type ChannelParams } from './channel';
import { z } from 'zod';
import { delaySchema, formatIssues, resolveConfig, type ConnectConfig } from './config';
import { ConnectionActor, type ConnectionState } from './connection';
import { ConfigError } from './errors';
import { defaultLogger, type Logger } from './logger';
import { Defaults, jsonCodec, type Codec } from './protocol';
import type { Transport } from './transport';
import { WebSocketTransport } from './websocket-transport';

/**
 * Options for a {@link Connection}
 *
 * @example
 * ```typescript
 * const options: ConnectionOptions = {
 *   timeout: 10000,
 *   logger: pinoLikeLogger,
 * };
 * ```
 */
export interface ConnectionOptions {
  /**
   * Transport used to open the stream
   * @default WebSocketTransport
   */
  transport?: Transport;
  /**
   * Wire codec
   * @default jsonCodec
   */
  codec?: Codec;
  /**
   * Diagnostics sink
   * @default console
   */
  logger?: Logger;
  /**
   * Default reply timeout for join, leave and pushAndReceive in milliseconds
   * @default 5000
   */
  timeout?: number;
  /**
   * Hard ceiling on a single request/reply exchange in milliseconds
   * @default 60000
   */
  maxTimeout?: number;
  /**
   * Pause after a receive error in milliseconds
   * @default 100
   */
  errorBackoff?: number;
}

const timingSchema = z.object({
  timeout: delaySchema.default(Defaults.TIMEOUT),
  maxTimeout: delaySchema.positive().default(Defaults.MAX_TIMEOUT),
  errorBackoff: delaySchema.default(Defaults.ERROR_BACKOFF),
});

/**
 * A Phoenix socket: one connection shared by any number of channels.
 *
 * @example
 * ```typescript
 * import { connect } from '@phx-channels/client';
 *
 * const connection = await connect({
 *   host: 'localhost',
 *   port: 4000,
 *   path: '/socket/websocket',
 *   params: { token: 'test-token' },
 * });
 *
 * const channel = connection.channel('room:public', { name: 'Ryo' });
 * const joined = await channel.join();
 *
 * // After a close delivery, reconnect and join again
 * await connection.reconnect();
 * await channel.join();
 * ```
 */
export class Connection {
  /** @internal Command loop that owns the connection state */
  readonly actor: ConnectionActor;

  readonly codec: Codec;

  /** Default reply timeout (ms) */
  readonly timeout: number;

  /** Hard ceiling on one exchange (ms) */
  readonly maxTimeout: number;

  /**
   * @throws ConfigError when a timing option is not a whole number of ms within timer range
   */
  constructor(options: ConnectionOptions = {}) {
    const timing = timingSchema.safeParse({
      timeout: options.timeout,
      maxTimeout: options.maxTimeout,
      errorBackoff: options.errorBackoff,
    });
    if (!timing.success) {
      throw new ConfigError(`Invalid connection options: ${formatIssues(timing.error)}`, { cause: timing.error });
    }

    this.codec = options.codec ?? jsonCodec;
    this.timeout = timing.data.timeout;
    this.maxTimeout = timing.data.maxTimeout;
    this.actor = new ConnectionActor({
      transport: options.transport ?? new WebSocketTransport(),
      codec: this.codec,
      logger: options.logger ?? defaultLogger,
      errorBackoff: timing.data.errorBackoff,
    });
  }

  /**
   * Current connection state
   */
  get state(): ConnectionState {
    return this.actor.state;
  }

  /**
   * Whether currently connected
   */
  get isConnected(): boolean {
    return this.actor.state === 'connected';
  }

  /**
   * Open the socket, replacing any previous one.
   *
   * @throws ConfigError when the config is invalid
   * @throws ConnectError when the transport cannot be opened
   */
  async connect(config: ConnectConfig): Promise<this> {
    const resolved = resolveConfig(config);
    await this.actor.connect(resolved);
    return this;
  }

  /**
   * Open the socket again with the config of the last `connect`.
   * Channels are not re-joined automatically.
   */
  reconnect(): Promise<void> {
    return this.actor.reconnect();
  }

  channel(topic: string, params: ChannelParams = {}): Channel {
    return new Channel(this, topic, params);
  }

  /**
   * Abort the socket and stop the connection for good
   */
  close(): Promise<void> {
    return this.actor.terminate();
  }
}

/**
 * Create a connection and open it.
 *
 * The connection is stopped again if the first connect fails.
 */
export async function connect(config: ConnectConfig, options: ConnectionOptions = {}): Promise<Connection> {
  const connection = new Connection(options);
  try {
    await connection.connect(config);
  } catch (e) {
    await connection.close();
    throw e;
  }
  return connection;
}
