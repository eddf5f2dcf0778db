/**
 * Transport boundary.
 *
 * The connection actor only talks to the network through these interfaces, so a
 * transport can be swapped for an in-memory one in tests.
 */

export type Frame =
  | { type: 'text'; data: string }
  | { type: 'ping'; data: Uint8Array }
  | { type: 'pong'; data: Uint8Array }
  | { type: 'close'; code?: number; reason: string };

/** Frames a client may send */
export type OutboundFrame = Extract<Frame, { type: 'text' | 'ping' | 'pong' }>;

export interface TransportOptions {
  /** Extra handshake headers */
  headers?: Record<string, string>;
  /** Handshake timeout in milliseconds */
  handshakeTimeout?: number;
}

/**
 * One open stream (one connection epoch)
 */
export interface TransportConnection {
  /**
   * Send a frame
   * @throws TransportError
   */
  send(frame: OutboundFrame): Promise<void>;
  /**
   * Wait for the next frame. Rejects with a TransportError on failure and with
   * `signal.reason` when the signal aborts.
   */
  receive(signal?: AbortSignal): Promise<Frame>;
  /** Graceful close */
  close(): void;
  /** Drop the stream without a closing handshake */
  abort(): void;
}

export interface Transport {
  /**
   * Open a stream to `url`
   * @throws ConnectError
   */
  open(url: string, options: TransportOptions): Promise<TransportConnection>;
}
