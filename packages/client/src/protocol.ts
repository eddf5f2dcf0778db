/**
 * Phoenix Channels wire protocol (serializer version 1.0.0).
 *
 * Every frame is a JSON object:
 *
 * ```json
 * { "topic": "room:public", "event": "new_msg", "payload": { "text": "hi" }, "ref": 3 }
 * ```
 *
 * `ref` is present on correlated messages and `null` on broadcasts.
 */

import { z } from 'zod';
import { ProtocolError, errorMessage } from './errors';

// ============================================================================
// Constants
// ============================================================================

/** Serializer version sent as `vsn` in the connection URL */
export const PROTOCOL_VSN = '1.0.0';

/** Topic reserved for connection-level messages */
export const HEARTBEAT_TOPIC = 'phoenix';

/**
 * Reserved channel events
 */
export const Events = {
  /** Join a topic */
  JOIN: 'phx_join',
  /** Server reply to a pushed message */
  REPLY: 'phx_reply',
  /** Leave a topic */
  LEAVE: 'phx_leave',
  /** Connection keep-alive */
  HEARTBEAT: 'heartbeat',
} as const;

/**
 * Client defaults
 */
export const Defaults = {
  /** Reply timeout for join, leave and pushAndReceive (ms) */
  TIMEOUT: 5000,
  /** Hard ceiling on any single request/reply exchange (ms) */
  MAX_TIMEOUT: 60_000,
  /** Interval between heartbeats (ms) */
  HEARTBEAT_INTERVAL: 30_000,
  /** Socket path */
  PATH: '/',
  /** Pause after a receive error before reading again (ms) */
  ERROR_BACKOFF: 100,
  /** Largest delay a Node timer accepts; longer ones fire after 1 ms (ms) */
  MAX_DELAY: 2_147_483_647,
} as const;

// ============================================================================
// Types
// ============================================================================

export type Ref = string | number;

/**
 * Wire message
 */
export interface Envelope<P = unknown> {
  topic: string;
  event: string;
  payload: P;
  /** Correlation reference, null for broadcasts */
  ref: Ref | null;
}

/**
 * Converts envelopes to and from transport text
 */
export interface Codec {
  encode(envelope: Envelope): string;
  decode(text: string): Envelope;
}

const envelopeSchema = z.object({
  topic: z.string(),
  event: z.string(),
  payload: z.unknown(),
  ref: z.union([z.string(), z.number()]).nullish(),
});

const replyPayloadSchema = z.object({
  status: z.enum(['ok', 'error']),
  response: z.unknown(),
});

export type ReplyPayload = z.infer<typeof replyPayloadSchema>;

// ============================================================================
// JSON codec
// ============================================================================

export const jsonCodec: Codec = {
  encode(envelope: Envelope): string {
    return JSON.stringify({
      topic: envelope.topic,
      event: envelope.event,
      payload: envelope.payload,
      ref: envelope.ref,
    });
  },

  decode(text: string): Envelope {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e) {
      throw new ProtocolError(`Failed to parse frame: ${errorMessage(e)}`, { cause: e });
    }

    const result = envelopeSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
      throw new ProtocolError(`Malformed envelope${where}: ${issue?.message ?? 'invalid'}`);
    }

    return {
      topic: result.data.topic,
      event: result.data.event,
      payload: result.data.payload,
      ref: result.data.ref ?? null,
    };
  },
};

/**
 * Heartbeat sent on the connection-level topic
 */
export function heartbeatEnvelope(): Envelope<Record<string, never>> {
  return { topic: HEARTBEAT_TOPIC, event: Events.HEARTBEAT, payload: {}, ref: null };
}

/**
 * Interpret a `phx_reply` payload (`{ status, response }`).
 */
export function parseReplyPayload(payload: unknown): ReplyPayload {
  const result = replyPayloadSchema.safeParse(payload);
  if (!result.success) {
    throw new ProtocolError('Reply payload must carry status "ok" or "error" and a response');
  }
  return result.data;
}

/**
 * References may come back as strings or numbers depending on the server.
 */
export function sameRef(a: Ref | null, b: Ref | null): boolean {
  if (a === null || b === null) return false;
  return String(a) === String(b);
}
