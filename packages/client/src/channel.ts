/**
 * Channel handle and request/reply correlation.
 *
 * A channel is a topic on a connection plus the params sent when joining. It
 * holds no network resources of its own: joining registers a route in the
 * connection's registry that feeds {@link Channel.inbox}, and every
 * request/reply exchange registers a short-lived route keyed by its reference.
 *
 * @example
 * ```typescript
 * const channel = connection.channel('room:public', { name: 'Ryo' });
 *
 * const joined = await channel.join();
 * if (joined.status !== 'ok') throw new Error(`join failed: ${joined.status}`);
 *
 * const search = await channel.pushAndReceive('search', { query: 'shoes' }, 100);
 * if (search.status === 'ok') console.log(search.response);
 *
 * for await (const delivery of channel) {
 *   if (delivery.type === 'message' && delivery.event === 'new_msg') console.log(delivery.payload);
 *   if (delivery.type === 'close') break;
 * }
 *
 * await channel.leave();
 * ```
 */

import type { Connection } from './client';
import { checkDelay } from './config';
import {
  ChannelError,
  ConnectionClosedError,
  ProtocolError,
  TransportError,
  toTransportError,
} from './errors';
import { Mailbox } from './mailbox';
import { Events, parseReplyPayload, type ReplyPayload } from './protocol';
import { replyKey, topicKey, type Delivery } from './registry';

// ============================================================================
// Types
// ============================================================================

/**
 * Outcome of an exchange that waits for a reply
 */
export type PushOutcome =
  /** Server replied with status "ok" */
  | { status: 'ok'; response: unknown }
  /** Server replied with status "error" */
  | { status: 'error'; response: unknown }
  /** No reply within the timeout */
  | { status: 'timeout' }
  /** Send failed, the connection failed, or the reply was malformed */
  | { status: 'exception'; error: ChannelError };

export type ChannelParams = Record<string, unknown>;

function interpret(delivery: Delivery): PushOutcome {
  switch (delivery.type) {
    case 'reply': {
      let reply: ReplyPayload;
      try {
        reply = parseReplyPayload(delivery.payload);
      } catch (e) {
        return { status: 'exception', error: toTransportError(e) };
      }
      return reply.status === 'ok'
        ? { status: 'ok', response: reply.response }
        : { status: 'error', response: reply.response };
    }
    case 'close':
      return { status: 'exception', error: new ConnectionClosedError(delivery.code, delivery.reason) };
    case 'error':
      return { status: 'exception', error: delivery.error };
    case 'message':
      return {
        status: 'exception',
        error: new ProtocolError(`Expected a reply, got "${delivery.event}"`),
      };
  }
}

// ============================================================================
// Channel
// ============================================================================

export class Channel {
  /** Deliveries for this topic once joined, plus close and error notifications */
  readonly inbox = new Mailbox<Delivery>();

  constructor(
    readonly connection: Connection,
    readonly topic: string,
    readonly params: ChannelParams = {},
  ) {}

  /**
   * Join the topic.
   *
   * Routes every envelope on the topic to {@link Channel.inbox}, then sends
   * `phx_join` with the channel params. The route is removed again when the join
   * times out.
   *
   * @throws ConfigError when `timeout` is not a valid delay
   */
  async join(timeout: number = this.connection.timeout): Promise<PushOutcome> {
    checkDelay('timeout', timeout);
    const { actor } = this.connection;
    const key = topicKey(this.topic);

    actor.subscribe({ key, owner: this.inbox, descriptor: { kind: 'topic', topic: this.topic } });
    const outcome = await this.pushAndReceive(Events.JOIN, this.params, timeout);
    if (outcome.status === 'timeout') {
      actor.unsubscribe(key);
    }
    return outcome;
  }

  /**
   * Stop routing the topic to the inbox and send `phx_leave`.
   *
   * @throws ConfigError when `timeout` is not a valid delay
   */
  async leave(timeout: number = this.connection.timeout): Promise<PushOutcome> {
    checkDelay('timeout', timeout);
    this.connection.actor.unsubscribe(topicKey(this.topic));
    return this.pushAndReceive(Events.LEAVE, {}, timeout);
  }

  /**
   * Send an event without waiting for a reply.
   *
   * @throws TransportError when not connected or the send fails
   */
  async push(event: string, payload: unknown): Promise<void> {
    const ref = await this.connection.actor.nextRef();
    await this.send(event, payload, ref);
  }

  /**
   * Send an event and wait up to `timeout` ms for its `phx_reply`.
   *
   * The reply route is removed before this resolves, whatever the outcome. The
   * whole exchange is also bounded by the connection's `maxTimeout`.
   *
   * @throws ConfigError when `timeout` is not a whole number of ms within timer
   * range; nothing is sent in that case
   */
  async pushAndReceive(
    event: string,
    payload: unknown,
    timeout: number = this.connection.timeout,
  ): Promise<PushOutcome> {
    checkDelay('timeout', timeout);
    const { actor, maxTimeout } = this.connection;
    const replies = new Mailbox<Delivery>();
    const route: { key: string | null } = { key: null };

    let ceilingTimer: ReturnType<typeof setTimeout> | undefined;
    const ceiling = new Promise<PushOutcome>((resolve) => {
      ceilingTimer = setTimeout(
        () =>
          resolve({
            status: 'exception',
            error: new ChannelError(`No outcome for "${event}" within ${maxTimeout}ms`, 'CEILING_EXCEEDED'),
          }),
        maxTimeout,
      );
    });

    const exchange = async (): Promise<PushOutcome> => {
      let ref: number;
      try {
        ref = await actor.nextRef();
      } catch (e) {
        return { status: 'exception', error: toTransportError(e) };
      }
      // The ceiling already settled this call
      if (replies.isClosed) return { status: 'timeout' };

      const key = replyKey(ref);
      route.key = key;
      actor.subscribe({ key, owner: replies, descriptor: { kind: 'reply', topic: this.topic, ref } });

      try {
        await this.send(event, payload, ref);
      } catch (e) {
        return { status: 'exception', error: toTransportError(e) };
      }

      const polled = await replies.poll(timeout);
      if (polled.status === 'timeout') return { status: 'timeout' };
      return interpret(polled.message);
    };

    try {
      return await Promise.race([exchange(), ceiling]);
    } finally {
      clearTimeout(ceilingTimer);
      if (route.key !== null) actor.unsubscribe(route.key);
      replies.close();
    }
  }

  /**
   * Next delivery from the inbox, or null after `timeout` ms.
   * Waits indefinitely when no timeout is given.
   */
  async receive(timeout?: number): Promise<Delivery | null> {
    if (timeout === undefined) return this.inbox.take();
    const polled = await this.inbox.poll(checkDelay('timeout', timeout));
    return polled.status === 'message' ? polled.message : null;
  }

  [Symbol.asyncIterator](): AsyncIterator<Delivery> {
    return this.inbox[Symbol.asyncIterator]();
  }

  private async send(event: string, payload: unknown, ref: number): Promise<void> {
    const transport = await this.connection.actor.currentTransport();
    if (!transport) {
      throw new TransportError(`Cannot push "${event}" to ${this.topic}: not connected`, 'NOT_CONNECTED');
    }
    await transport.send({
      type: 'text',
      data: this.connection.codec.encode({ topic: this.topic, event, payload, ref }),
    });
  }
}
