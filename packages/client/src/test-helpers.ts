/**
 * In-memory transport for tests. Frames are scripted with `deliver*` and every
 * sent frame is recorded.
 */

import { ChannelError, TransportError } from './errors';
import type { Logger } from './logger';
import { Mailbox } from './mailbox';
import { jsonCodec, type Envelope } from './protocol';
import type { Frame, OutboundFrame, Transport, TransportConnection, TransportOptions } from './transport';

export type Responder = (envelope: Envelope, connection: FakeConnection) => void;

export class FakeConnection implements TransportConnection {
  readonly sent: OutboundFrame[] = [];
  closed = false;
  aborted = false;
  /** Reads currently waiting in `receive` */
  pendingReceives = 0;
  /** When set, every send rejects with this error */
  sendError: ChannelError | null = null;
  /** When set, sends are recorded but never settle */
  stallSends = false;

  private readonly frames = new Mailbox<Frame | ChannelError>();

  constructor(private readonly responder?: Responder) {}

  async send(frame: OutboundFrame): Promise<void> {
    if (this.sendError) throw this.sendError;
    if (this.closed || this.aborted) throw new TransportError('Connection is not open', 'NOT_CONNECTED');
    this.sent.push(frame);
    if (this.stallSends) return new Promise<void>(() => undefined);
    if (frame.type === 'text' && this.responder) {
      this.responder(jsonCodec.decode(frame.data), this);
    }
  }

  async receive(signal?: AbortSignal): Promise<Frame> {
    this.pendingReceives++;
    try {
      const next = await this.frames.take(signal);
      if (next instanceof ChannelError) throw next;
      return next;
    } finally {
      this.pendingReceives--;
    }
  }

  close(): void {
    this.closed = true;
  }

  abort(): void {
    this.aborted = true;
  }

  deliver(frame: Frame): void {
    this.frames.post(frame);
  }

  deliverEnvelope(envelope: Envelope): void {
    this.deliver({ type: 'text', data: jsonCodec.encode(envelope) });
  }

  /** Make the next read fail */
  fail(error: ChannelError): void {
    this.frames.post(error);
  }

  /** Decoded text frames sent so far */
  sentEnvelopes(): Envelope[] {
    return this.sent.flatMap((frame) => (frame.type === 'text' ? [jsonCodec.decode(frame.data)] : []));
  }
}

export class FakeTransport implements Transport {
  readonly connections: FakeConnection[] = [];
  readonly opened: { url: string; options: TransportOptions }[] = [];
  /** When set, the next open rejects with this error */
  openError: unknown = null;

  constructor(private readonly responder?: Responder) {}

  async open(url: string, options: TransportOptions): Promise<TransportConnection> {
    this.opened.push({ url, options });
    if (this.openError !== null) {
      const error = this.openError;
      this.openError = null;
      throw error;
    }
    const connection = new FakeConnection(this.responder);
    this.connections.push(connection);
    return connection;
  }

  /** Most recently opened connection */
  get current(): FakeConnection {
    const connection = this.connections[this.connections.length - 1];
    if (!connection) throw new Error('No connection was opened');
    return connection;
  }
}

/**
 * Replies to every pushed envelope (except heartbeats) with the given status
 */
export function replyWith(status: 'ok' | 'error', response: unknown): Responder {
  return (envelope, connection) => {
    if (envelope.topic === 'phoenix') return;
    connection.deliverEnvelope({
      topic: envelope.topic,
      event: 'phx_reply',
      payload: { status, response },
      ref: envelope.ref,
    });
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Let pending promise chains settle (real timers only)
 */
export function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
