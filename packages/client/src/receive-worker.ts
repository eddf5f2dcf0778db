import { ProtocolError, errorMessage, toTransportError, type ChannelError } from './errors';
import type { Logger } from './logger';
import type { Codec, Envelope } from './protocol';
import type { Frame, TransportConnection } from './transport';

/**
 * Where the worker reports what it reads
 */
export interface ReceiveSink {
  inbound(envelope: Envelope): void;
  closed(code: number | undefined, reason: string): void;
  failed(error: ChannelError): void;
}

export interface ReceiveWorkerOptions {
  codec: Codec;
  logger: Logger;
  /** Pause after an error before reading again (ms) */
  errorBackoff: number;
}

/**
 * Resolves after `ms`, or early (without throwing) when the signal aborts.
 */
function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Reads frames from one transport connection for the lifetime of a connection
 * epoch and reports them to the actor.
 *
 * - text: decoded and forwarded
 * - ping: answered with a pong
 * - pong: ignored
 * - close: reported, then the worker exits
 * - errors: reported, followed by a short pause
 *
 * The worker never reconnects. It is stopped with {@link ReceiveWorker.stop},
 * which aborts a pending read instead of waiting for it.
 */
export class ReceiveWorker {
  private readonly controller = new AbortController();
  private loop: Promise<void> | null = null;

  constructor(
    private readonly connection: TransportConnection,
    private readonly sink: ReceiveSink,
    private readonly options: ReceiveWorkerOptions,
  ) {}

  get running(): boolean {
    return this.loop !== null && !this.controller.signal.aborted;
  }

  /**
   * Settles when the loop has exited
   */
  get done(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  start(): void {
    if (this.loop) return;
    this.loop = this.run()
      .catch((e: unknown) => {
        const error = toTransportError(e);
        this.options.logger.error(`[channels] receive worker crashed: ${error.message}`);
        this.sink.failed(error);
      })
      .finally(() => {
        if (!this.controller.signal.aborted) this.controller.abort();
      });
  }

  stop(): void {
    this.controller.abort();
  }

  private async run(): Promise<void> {
    const { signal } = this.controller;

    while (!signal.aborted) {
      let frame: Frame;
      try {
        frame = await this.connection.receive(signal);
      } catch (e) {
        if (signal.aborted) return;
        const error = toTransportError(e);
        this.options.logger.warn(`[channels] receive failed: ${error.message}`);
        this.sink.failed(error);
        await pause(this.options.errorBackoff, signal);
        continue;
      }

      switch (frame.type) {
        case 'text': {
          let envelope: Envelope;
          try {
            envelope = this.options.codec.decode(frame.data);
          } catch (e) {
            const error =
              e instanceof ProtocolError ? e : new ProtocolError(errorMessage(e), { cause: e });
            this.options.logger.warn(`[channels] dropped undecodable frame: ${error.message}`);
            this.sink.failed(error);
            await pause(this.options.errorBackoff, signal);
            continue;
          }
          this.sink.inbound(envelope);
          break;
        }

        case 'ping':
          try {
            await this.connection.send({ type: 'pong', data: frame.data });
          } catch (e) {
            if (signal.aborted) return;
            const error = toTransportError(e);
            this.options.logger.warn(`[channels] pong failed: ${error.message}`);
            this.sink.failed(error);
            await pause(this.options.errorBackoff, signal);
          }
          break;

        case 'pong':
          break;

        case 'close':
          this.sink.closed(frame.code, frame.reason);
          return;
      }
    }
  }
}
