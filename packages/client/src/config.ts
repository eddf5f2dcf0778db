/**
 * Connection configuration.
 *
 * @example
 * ```typescript
 * const config: ConnectConfig = {
 *   host: 'localhost',
 *   port: 4000,
 *   path: '/socket/websocket',
 *   params: { token: 'test-token' },
 * };
 *
 * buildEndpointUrl(resolveConfig(config));
 * // 'ws://localhost:4000/socket/websocket?token=test-token&vsn=1.0.0'
 * ```
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import { Defaults, PROTOCOL_VSN } from './protocol';

export type ParamValue = string | number | boolean;

/**
 * Options accepted by `connect`
 */
export interface ConnectConfig {
  /** Server host name */
  host: string;
  /** Server port, omitted from the URL when not given */
  port?: number;
  /**
   * Socket path
   * @default '/'
   */
  path?: string;
  /** Query params sent with the handshake; `vsn` is always added */
  params?: Record<string, ParamValue>;
  /**
   * Use `wss://`
   * @default false
   */
  secure?: boolean;
  /**
   * Heartbeat interval in milliseconds
   * @default 30000
   */
  heartbeatInterval?: number;
  /** Extra headers for the WebSocket handshake */
  headers?: Record<string, string>;
  /** Handshake timeout in milliseconds */
  handshakeTimeout?: number;
}

/**
 * A delay that `setTimeout` honours: a whole number of ms up to {@link Defaults.MAX_DELAY}
 */
export const delaySchema = z.number().int().nonnegative().max(Defaults.MAX_DELAY);

const configSchema = z.object({
  host: z.string().min(1, 'host is required'),
  port: z.number().int().min(1).max(65535).optional(),
  path: z
    .string()
    .default(Defaults.PATH)
    .transform((p) => (p.startsWith('/') ? p : `/${p}`)),
  params: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
  secure: z.boolean().default(false),
  heartbeatInterval: delaySchema.positive().default(Defaults.HEARTBEAT_INTERVAL),
  headers: z.record(z.string()).default({}),
  handshakeTimeout: delaySchema.positive().optional(),
});

export type ResolvedConfig = z.output<typeof configSchema>;

/**
 * Validate a config and fill in defaults.
 *
 * @throws ConfigError
 */
export function resolveConfig(config: ConnectConfig): ResolvedConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(`Invalid connection config: ${formatIssues(result.error)}`, { cause: result.error });
  }
  return result.data;
}

/**
 * Validate a delay passed to a single call.
 *
 * @throws ConfigError
 */
export function checkDelay(name: string, value: number): number {
  const result = delaySchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid ${name} ${value}: ${formatIssues(result.error)}`, { cause: result.error });
  }
  return result.data;
}

/** `path: message` pairs joined with `; ` */
export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`).join('; ');
}

/**
 * Build the socket URL: `ws[s]://host[:port]path?params&vsn=1.0.0`
 */
export function buildEndpointUrl(config: ResolvedConfig): string {
  const scheme = config.secure ? 'wss' : 'ws';
  const authority = config.port === undefined ? config.host : `${config.host}:${config.port}`;

  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(config.params)) {
    if (key === 'vsn') continue;
    query.set(key, String(value));
  }
  query.set('vsn', PROTOCOL_VSN);

  return `${scheme}://${authority}${config.path}?${query.toString()}`;
}
