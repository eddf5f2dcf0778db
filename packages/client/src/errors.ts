/**
 * Error taxonomy for the channels client.
 *
 * Every error raised or delivered by the client is a {@link ChannelError} with a
 * stable `code`. A reply timeout is not an error: it is reported as a
 * `{ status: 'timeout' }` outcome.
 */

export type ChannelErrorCode =
  | 'CONNECT_FAILED'
  | 'NOT_CONFIGURED'
  | 'NOT_CONNECTED'
  | 'TRANSPORT_ERROR'
  | 'PROTOCOL_ERROR'
  | 'CONNECTION_CLOSED'
  | 'INVALID_CONFIG'
  | 'TERMINATED'
  | 'CEILING_EXCEEDED';

/**
 * Channel error with code
 */
export class ChannelError extends Error {
  code: ChannelErrorCode;

  constructor(message: string, code: ChannelErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChannelError';
    this.code = code;
  }
}

/**
 * The transport could not be opened, or a reconnect was requested before any connect.
 */
export class ConnectError extends ChannelError {
  constructor(
    message: string,
    code: 'CONNECT_FAILED' | 'NOT_CONFIGURED' = 'CONNECT_FAILED',
    options?: { cause?: unknown },
  ) {
    super(message, code, options);
    this.name = 'ConnectError';
  }
}

/**
 * Send or receive failed on an established connection.
 */
export class TransportError extends ChannelError {
  constructor(
    message: string,
    code: 'TRANSPORT_ERROR' | 'NOT_CONNECTED' = 'TRANSPORT_ERROR',
    options?: { cause?: unknown },
  ) {
    super(message, code, options);
    this.name = 'TransportError';
  }
}

/**
 * An inbound frame or reply payload that does not fit the wire protocol.
 */
export class ProtocolError extends ChannelError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PROTOCOL_ERROR', options);
    this.name = 'ProtocolError';
  }
}

/**
 * The peer closed the connection.
 */
export class ConnectionClosedError extends ChannelError {
  readonly closeCode: number | undefined;
  readonly reason: string;

  constructor(closeCode: number | undefined, reason: string) {
    super(
      closeCode === undefined
        ? 'Connection closed'
        : `Connection closed (${closeCode}${reason ? `: ${reason}` : ''})`,
      'CONNECTION_CLOSED',
    );
    this.name = 'ConnectionClosedError';
    this.closeCode = closeCode;
    this.reason = reason;
  }
}

export class ConfigError extends ChannelError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INVALID_CONFIG', options);
    this.name = 'ConfigError';
  }
}

export class TerminatedError extends ChannelError {
  constructor() {
    super('Connection has been terminated', 'TERMINATED');
    this.name = 'TerminatedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown failure from the transport layer.
 */
export function toTransportError(error: unknown): ChannelError {
  if (error instanceof ChannelError) return error;
  return new TransportError(`Transport failure: ${errorMessage(error)}`, 'TRANSPORT_ERROR', {
    cause: error,
  });
}
