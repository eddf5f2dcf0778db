import WebSocket from 'ws';
import { ConnectError, TransportError, errorMessage } from './errors';
import { Mailbox } from './mailbox';
import type { Frame, OutboundFrame, Transport, TransportConnection, TransportOptions } from './transport';

type Inbound = { kind: 'frame'; frame: Frame } | { kind: 'failure'; error: TransportError };

function rawToText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * A live `ws` socket exposed as a pull-based stream of frames.
 */
class WebSocketConnection implements TransportConnection {
  private readonly inbound = new Mailbox<Inbound>();

  constructor(private readonly socket: WebSocket) {
    // Binary frames are read as UTF-8 text; the JSON serializer only sends text.
    socket.on('message', (data) => {
      this.inbound.post({ kind: 'frame', frame: { type: 'text', data: rawToText(data) } });
    });
    socket.on('ping', (data) => {
      this.inbound.post({ kind: 'frame', frame: { type: 'ping', data } });
    });
    socket.on('pong', (data) => {
      this.inbound.post({ kind: 'frame', frame: { type: 'pong', data } });
    });
    socket.on('error', (error) => {
      this.inbound.post({
        kind: 'failure',
        error: new TransportError(`WebSocket error: ${error.message}`, 'TRANSPORT_ERROR', {
          cause: error,
        }),
      });
    });
    socket.on('close', (code, reason) => {
      this.inbound.post({
        kind: 'frame',
        frame: { type: 'close', code, reason: reason.toString('utf8') },
      });
      this.inbound.close(new TransportError('Connection is closed', 'NOT_CONNECTED'));
    });
  }

  send(frame: OutboundFrame): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TransportError('Connection is not open', 'NOT_CONNECTED'));
    }

    return new Promise<void>((resolve, reject) => {
      const done = (error?: Error) => {
        if (error) {
          reject(new TransportError(`Send failed: ${error.message}`, 'TRANSPORT_ERROR', { cause: error }));
        } else {
          resolve();
        }
      };

      try {
        switch (frame.type) {
          case 'text':
            this.socket.send(frame.data, done);
            break;
          case 'ping':
            this.socket.ping(frame.data, undefined, done);
            break;
          case 'pong':
            this.socket.pong(frame.data, undefined, done);
            break;
        }
      } catch (e) {
        reject(new TransportError(`Send failed: ${errorMessage(e)}`, 'TRANSPORT_ERROR', { cause: e }));
      }
    });
  }

  async receive(signal?: AbortSignal): Promise<Frame> {
    const next = await this.inbound.take(signal);
    if (next.kind === 'failure') throw next.error;
    return next.frame;
  }

  close(): void {
    this.socket.close(1000);
  }

  abort(): void {
    this.socket.terminate();
    this.inbound.close(new TransportError('Connection was aborted', 'NOT_CONNECTED'));
  }
}

/**
 * Transport backed by the `ws` package.
 *
 * Automatic pongs are disabled: the receive worker answers pings itself.
 */
export class WebSocketTransport implements Transport {
  open(url: string, options: TransportOptions = {}): Promise<TransportConnection> {
    return new Promise((resolve, reject) => {
      let socket: WebSocket;
      try {
        socket = new WebSocket(url, {
          headers: options.headers,
          handshakeTimeout: options.handshakeTimeout,
          autoPong: false,
        });
      } catch (e) {
        reject(new ConnectError(`Failed to connect to ${url}: ${errorMessage(e)}`, 'CONNECT_FAILED', { cause: e }));
        return;
      }

      const onOpen = () => {
        cleanup();
        resolve(new WebSocketConnection(socket));
      };
      const onError = (error: Error) => {
        cleanup();
        socket.terminate();
        reject(new ConnectError(`Failed to connect to ${url}: ${error.message}`, 'CONNECT_FAILED', { cause: error }));
      };
      const onClose = (code: number) => {
        cleanup();
        reject(new ConnectError(`Connection to ${url} closed during handshake (${code})`));
      };
      const cleanup = () => {
        socket.off('open', onOpen);
        socket.off('error', onError);
        socket.off('close', onClose);
      };

      socket.on('open', onOpen);
      socket.on('error', onError);
      socket.on('close', onClose);
    });
  }
}
