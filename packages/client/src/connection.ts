/**
 * Connection actor.
 *
 * Owns the transport connection, the reference counter, the subscription registry,
 * the receive worker and the heartbeat timer. Every change to that state happens
 * inside one command loop that reads an ordered mailbox, so producers (callers,
 * the receive worker, timers) never touch the state directly.
 *
 * Callers reach the loop in two ways:
 * - `call`: posts a command carrying a reply slot and waits for it
 * - `cast`: posts a command and returns immediately
 */

import type { ResolvedConfig } from './config';
import { buildEndpointUrl } from './config';
import {
  ConnectError,
  TerminatedError,
  errorMessage,
  type ChannelError,
} from './errors';
import type { Logger } from './logger';
import { Mailbox } from './mailbox';
import { heartbeatEnvelope, type Codec, type Envelope } from './protocol';
import { ReceiveWorker, type ReceiveSink } from './receive-worker';
import { SubscriptionRegistry, type Subscription } from './registry';
import type { Transport, TransportConnection, TransportOptions } from './transport';

// ============================================================================
// Types
// ============================================================================

/**
 * Connection state
 */
export type ConnectionState = 'idle' | 'connecting' | 'connected' | 'disconnected' | 'terminated';

export interface ActorOptions {
  transport: Transport;
  codec: Codec;
  logger: Logger;
  /** Receive worker pause after an error (ms) */
  errorBackoff: number;
}

interface Reply<T> {
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

/** What `reconnect` reuses */
interface ConnectionSettings {
  url: string;
  transportOptions: TransportOptions;
  heartbeatInterval: number;
}

type Command =
  | { type: 'connect'; settings: ConnectionSettings; reply: Reply<void> }
  | { type: 'reconnect'; reply: Reply<void> }
  | { type: 'next-ref'; reply: Reply<number> }
  | { type: 'current-transport'; reply: Reply<TransportConnection | null> }
  | { type: 'subscription-keys'; reply: Reply<string[]> }
  | { type: 'terminate'; reply: Reply<void> }
  | { type: 'subscribe'; subscription: Subscription }
  | { type: 'unsubscribe'; key: string }
  | { type: 'inbound'; epoch: number; envelope: Envelope }
  | { type: 'closed'; epoch: number; code: number | undefined; reason: string }
  | { type: 'failed'; epoch: number; error: ChannelError }
  | { type: 'heartbeat'; epoch: number };

function settingsFrom(config: ResolvedConfig): ConnectionSettings {
  return {
    url: buildEndpointUrl(config),
    transportOptions: {
      headers: config.headers,
      handshakeTimeout: config.handshakeTimeout,
    },
    heartbeatInterval: config.heartbeatInterval,
  };
}

// ============================================================================
// Actor
// ============================================================================

export class ConnectionActor {
  private readonly mailbox = new Mailbox<Command>();
  private readonly registry = new SubscriptionRegistry();
  private readonly loop: Promise<void>;

  private currentState: ConnectionState = 'idle';
  private settings: ConnectionSettings | null = null;
  private connection: TransportConnection | null = null;
  private worker: ReceiveWorker | null = null;
  private heartbeatTimer: ReturnType<typeof setTimeout> | null = null;
  private refCounter = 0;
  /** Bumped on every teardown; notifications from older epochs are dropped */
  private epoch = 0;

  constructor(private readonly options: ActorOptions) {
    this.loop = this.run();
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /**
   * Settles once the command loop has exited (after `terminate`)
   */
  get stopped(): Promise<void> {
    return this.loop;
  }

  // --------------------------------------------------------------------------
  // Entry points
  // --------------------------------------------------------------------------

  /**
   * Tear down the current connection (if any) and open a new one.
   *
   * @throws ConnectError
   */
  connect(config: ResolvedConfig): Promise<void> {
    const settings = settingsFrom(config);
    return this.call<void>((reply) => ({ type: 'connect', settings, reply }));
  }

  /**
   * Connect again with the settings of the last `connect`.
   *
   * @throws ConnectError with code `NOT_CONFIGURED` when `connect` was never called
   */
  reconnect(): Promise<void> {
    return this.call<void>((reply) => ({ type: 'reconnect', reply }));
  }

  /**
   * Next correlation reference. Starts at 0 and is never reset.
   */
  nextRef(): Promise<number> {
    return this.call<number>((reply) => ({ type: 'next-ref', reply }));
  }

  currentTransport(): Promise<TransportConnection | null> {
    return this.call<TransportConnection | null>((reply) => ({ type: 'current-transport', reply }));
  }

  subscriptionKeys(): Promise<string[]> {
    return this.call<string[]>((reply) => ({ type: 'subscription-keys', reply }));
  }

  subscribe(subscription: Subscription): void {
    this.cast({ type: 'subscribe', subscription });
  }

  unsubscribe(key: string): void {
    this.cast({ type: 'unsubscribe', key });
  }

  /**
   * Stop the actor: tear down the connection and reject every queued call.
   */
  async terminate(): Promise<void> {
    if (this.mailbox.isClosed) return this.loop;
    try {
      await this.call<void>((reply) => ({ type: 'terminate', reply }));
    } catch (e) {
      // A terminate queued behind another one is rejected by the first.
      if (!(e instanceof TerminatedError)) throw e;
    }
    return this.loop;
  }

  private call<T>(build: (reply: Reply<T>) => Command): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (!this.mailbox.post(build({ resolve, reject }))) {
        reject(new TerminatedError());
      }
    });
  }

  private cast(command: Command): void {
    if (!this.mailbox.post(command)) {
      this.options.logger.debug(`[channels] dropped "${command.type}" after terminate`);
    }
  }

  // --------------------------------------------------------------------------
  // Command loop
  // --------------------------------------------------------------------------

  private async run(): Promise<void> {
    while (true) {
      let command: Command;
      try {
        command = await this.mailbox.take();
      } catch (e) {
        // The mailbox only closes on terminate.
        this.options.logger.debug(`[channels] command loop stopped: ${errorMessage(e)}`);
        return;
      }
      await this.dispatch(command);
    }
  }

  private async dispatch(command: Command): Promise<void> {
    switch (command.type) {
      case 'connect': {
        const { settings } = command;
        return this.settle(command.reply, () => this.open(settings));
      }

      case 'reconnect':
        return this.settle(command.reply, () => {
          if (!this.settings) {
            throw new ConnectError('Cannot reconnect before connect', 'NOT_CONFIGURED');
          }
          return this.open(this.settings);
        });

      case 'next-ref':
        command.reply.resolve(this.refCounter++);
        return;

      case 'current-transport':
        command.reply.resolve(this.connection);
        return;

      case 'subscription-keys':
        command.reply.resolve(this.registry.keys());
        return;

      case 'subscribe':
        this.registry.put(command.subscription);
        return;

      case 'unsubscribe':
        this.registry.delete(command.key);
        return;

      case 'inbound':
        if (command.epoch !== this.epoch) return;
        this.registry.route(command.envelope);
        return;

      case 'closed':
        if (command.epoch !== this.epoch) return;
        this.handleClosed(command.code, command.reason);
        return;

      case 'failed':
        if (command.epoch !== this.epoch) return;
        this.registry.broadcast({ type: 'error', error: command.error });
        return;

      case 'heartbeat':
        if (command.epoch !== this.epoch) return;
        this.sendHeartbeat();
        return;

      case 'terminate':
        this.shutdown();
        command.reply.resolve();
        return;
    }
  }

  private async settle<T>(reply: Reply<T>, work: () => T | Promise<T>): Promise<void> {
    try {
      reply.resolve(await work());
    } catch (e) {
      reply.reject(e);
    }
  }

  // --------------------------------------------------------------------------
  // State transitions (only called from the loop)
  // --------------------------------------------------------------------------

  private async open(settings: ConnectionSettings): Promise<void> {
    this.teardown();
    const previous = this.connection;
    this.connection = null;
    previous?.close();

    this.settings = settings;
    this.currentState = 'connecting';

    let connection: TransportConnection;
    try {
      connection = await this.options.transport.open(settings.url, settings.transportOptions);
    } catch (e) {
      this.currentState = 'disconnected';
      if (e instanceof ConnectError) throw e;
      throw new ConnectError(`Failed to connect to ${settings.url}: ${errorMessage(e)}`, 'CONNECT_FAILED', {
        cause: e,
      });
    }

    const epoch = this.epoch;
    this.connection = connection;
    this.worker = new ReceiveWorker(connection, this.sinkFor(epoch), {
      codec: this.options.codec,
      logger: this.options.logger,
      errorBackoff: this.options.errorBackoff,
    });
    this.worker.start();
    this.scheduleHeartbeat(epoch, settings.heartbeatInterval);
    this.currentState = 'connected';
    this.options.logger.debug(`[channels] connected to ${settings.url}`);
  }

  /**
   * Stop the receive worker and heartbeat of the current epoch.
   */
  private teardown(): void {
    this.epoch++;
    if (this.heartbeatTimer !== null) {
      clearTimeout(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    if (this.worker) {
      this.worker.stop();
      this.worker = null;
    }
  }

  private handleClosed(code: number | undefined, reason: string): void {
    this.teardown();
    const connection = this.connection;
    this.connection = null;
    connection?.close();
    this.currentState = 'disconnected';
    this.options.logger.debug(`[channels] connection closed${code === undefined ? '' : ` (${code})`}`);
    this.registry.broadcast({ type: 'close', code, reason });
  }

  private shutdown(): void {
    this.teardown();
    const connection = this.connection;
    this.connection = null;
    connection?.abort();
    this.currentState = 'terminated';
    this.registry.broadcast({ type: 'close', reason: 'terminated' });
    this.registry.closeAll(new TerminatedError());

    this.mailbox.close(new TerminatedError());
    for (const pending of this.mailbox.drain()) {
      if ('reply' in pending) pending.reply.reject(new TerminatedError());
    }
  }

  private scheduleHeartbeat(epoch: number, interval: number): void {
    this.heartbeatTimer = setTimeout(() => this.cast({ type: 'heartbeat', epoch }), interval);
  }

  private sendHeartbeat(): void {
    this.heartbeatTimer = null;
    const connection = this.connection;
    const settings = this.settings;
    if (!connection || !settings) return;

    // Not awaited: a stalled write must not hold up the command loop
    connection
      .send({ type: 'text', data: this.options.codec.encode(heartbeatEnvelope()) })
      .catch((e: unknown) => {
        this.options.logger.warn(`[channels] heartbeat failed: ${errorMessage(e)}`);
      });
    this.scheduleHeartbeat(this.epoch, settings.heartbeatInterval);
  }

  private sinkFor(epoch: number): ReceiveSink {
    return {
      inbound: (envelope) => this.cast({ type: 'inbound', epoch, envelope }),
      closed: (code, reason) => this.cast({ type: 'closed', epoch, code, reason }),
      failed: (error) => this.cast({ type: 'failed', epoch, error }),
    };
  }
}
