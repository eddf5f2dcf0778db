import { describe, it, expect } from 'vitest';
import { ProtocolError } from './errors';
import {
  Events,
  heartbeatEnvelope,
  jsonCodec,
  parseReplyPayload,
  sameRef,
  type Envelope,
} from './protocol';

describe('jsonCodec', () => {
  const envelope: Envelope = {
    topic: 'room:public',
    event: 'new_msg',
    payload: { text: 'hi' },
    ref: 3,
  };

  it('should encode the four wire fields', () => {
    expect(jsonCodec.encode(envelope)).toBe(
      '{"topic":"room:public","event":"new_msg","payload":{"text":"hi"},"ref":3}',
    );
  });

  it('should decode what it encodes', () => {
    expect(jsonCodec.decode(jsonCodec.encode(envelope))).toEqual(envelope);
  });

  it('should encode a broadcast with a null ref', () => {
    expect(jsonCodec.encode({ topic: 't', event: 'e', payload: {}, ref: null })).toBe(
      '{"topic":"t","event":"e","payload":{},"ref":null}',
    );
  });

  it('should decode a missing ref as null', () => {
    const decoded = jsonCodec.decode('{"topic":"room:lobby","event":"presence","payload":[]}');
    expect(decoded).toEqual({ topic: 'room:lobby', event: 'presence', payload: [], ref: null });
  });

  it('should keep string refs', () => {
    const decoded = jsonCodec.decode('{"topic":"a","event":"phx_reply","payload":{},"ref":"12"}');
    expect(decoded.ref).toBe('12');
  });

  it('should reject text that is not JSON', () => {
    expect(() => jsonCodec.decode('not json')).toThrow(ProtocolError);
    expect(() => jsonCodec.decode('not json')).toThrow(/^Failed to parse frame/);
  });

  it('should reject an envelope without a topic', () => {
    expect(() => jsonCodec.decode('{"event":"e","payload":{}}')).toThrow(
      /^Malformed envelope at "topic"/,
    );
  });

  it('should reject a ref that is neither string nor number', () => {
    expect(() => jsonCodec.decode('{"topic":"t","event":"e","payload":{},"ref":true}')).toThrow(
      ProtocolError,
    );
  });
});

describe('heartbeatEnvelope', () => {
  it('should target the phoenix topic without a ref', () => {
    expect(heartbeatEnvelope()).toEqual({
      topic: 'phoenix',
      event: Events.HEARTBEAT,
      payload: {},
      ref: null,
    });
  });
});

describe('parseReplyPayload', () => {
  it('should read ok and error replies', () => {
    expect(parseReplyPayload({ status: 'ok', response: { id: 1 } })).toEqual({
      status: 'ok',
      response: { id: 1 },
    });
    expect(parseReplyPayload({ status: 'error', response: { reason: 'denied' } })).toEqual({
      status: 'error',
      response: { reason: 'denied' },
    });
  });

  it('should reject an unknown status', () => {
    expect(() => parseReplyPayload({ status: 'maybe', response: {} })).toThrow(ProtocolError);
  });

  it('should reject a payload that is not an object', () => {
    expect(() => parseReplyPayload('ok')).toThrow(ProtocolError);
  });
});

describe('sameRef', () => {
  it('should compare numeric and string refs by value', () => {
    expect(sameRef(7, 7)).toBe(true);
    expect(sameRef('7', 7)).toBe(true);
    expect(sameRef(7, 8)).toBe(false);
  });

  it('should never match a missing ref', () => {
    expect(sameRef(null, 0)).toBe(false);
    expect(sameRef(null, null)).toBe(false);
  });
});
