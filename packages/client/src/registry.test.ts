import { describe, it, expect } from 'vitest';
import { TransportError } from './errors';
import { Mailbox } from './mailbox';
import type { Envelope } from './protocol';
import {
  SubscriptionRegistry,
  matches,
  project,
  replyKey,
  topicKey,
  type Delivery,
} from './registry';

function envelope(overrides: Partial<Envelope> = {}): Envelope {
  return { topic: 'room:a', event: 'new_msg', payload: { text: 'hi' }, ref: null, ...overrides };
}

describe('subscription keys', () => {
  it('should namespace topic and reply keys', () => {
    expect(topicKey('room:a')).toBe('channel_room:a');
    expect(replyKey(4)).toBe('reply_4');
  });
});

describe('matches', () => {
  it('should match any event on a topic', () => {
    const descriptor = { kind: 'topic', topic: 'room:a' } as const;

    expect(matches(descriptor, envelope())).toBe(true);
    expect(matches(descriptor, envelope({ event: 'phx_reply', ref: 1 }))).toBe(true);
    expect(matches(descriptor, envelope({ topic: 'room:b' }))).toBe(false);
  });

  it('should match only the reply carrying its ref', () => {
    const descriptor = { kind: 'reply', topic: 'room:a', ref: 5 } as const;

    expect(matches(descriptor, envelope({ event: 'phx_reply', ref: 5 }))).toBe(true);
    expect(matches(descriptor, envelope({ event: 'phx_reply', ref: '5' }))).toBe(true);
    expect(matches(descriptor, envelope({ event: 'phx_reply', ref: 6 }))).toBe(false);
    expect(matches(descriptor, envelope({ event: 'new_msg', ref: 5 }))).toBe(false);
    expect(matches(descriptor, envelope({ topic: 'room:b', event: 'phx_reply', ref: 5 }))).toBe(false);
  });
});

describe('project', () => {
  it('should deliver event and payload to topic subscribers', () => {
    expect(project({ kind: 'topic', topic: 'room:a' }, envelope())).toEqual({
      type: 'message',
      event: 'new_msg',
      payload: { text: 'hi' },
      ref: null,
    });
  });

  it('should deliver the payload to reply subscribers', () => {
    const reply = envelope({ event: 'phx_reply', payload: { status: 'ok', response: {} }, ref: 1 });

    expect(project({ kind: 'reply', topic: 'room:a', ref: 1 }, reply)).toEqual({
      type: 'reply',
      payload: { status: 'ok', response: {} },
    });
  });
});

describe('SubscriptionRegistry', () => {
  it('should route an envelope only to its topic owner', () => {
    const registry = new SubscriptionRegistry();
    const ownerA = new Mailbox<Delivery>();
    const ownerB = new Mailbox<Delivery>();
    registry.put({ key: topicKey('room:a'), owner: ownerA, descriptor: { kind: 'topic', topic: 'room:a' } });
    registry.put({ key: topicKey('room:b'), owner: ownerB, descriptor: { kind: 'topic', topic: 'room:b' } });

    expect(registry.route(envelope({ topic: 'room:a' }))).toBe(1);

    expect(ownerA.drain()).toEqual([
      { type: 'message', event: 'new_msg', payload: { text: 'hi' }, ref: null },
    ]);
    expect(ownerB.size).toBe(0);
  });

  it('should deliver in routing order', () => {
    const registry = new SubscriptionRegistry();
    const owner = new Mailbox<Delivery>();
    registry.put({ key: topicKey('room:a'), owner, descriptor: { kind: 'topic', topic: 'room:a' } });

    registry.route(envelope({ event: 'first' }));
    registry.route(envelope({ event: 'second' }));

    const events = owner.drain().map((d) => (d.type === 'message' ? d.event : d.type));
    expect(events).toEqual(['first', 'second']);
  });

  it('should replace a subscription registered under the same key', () => {
    const registry = new SubscriptionRegistry();
    const first = new Mailbox<Delivery>();
    const second = new Mailbox<Delivery>();
    const descriptor = { kind: 'topic', topic: 'room:a' } as const;

    registry.put({ key: topicKey('room:a'), owner: first, descriptor });
    registry.put({ key: topicKey('room:a'), owner: second, descriptor });
    registry.route(envelope());

    expect(registry.size).toBe(1);
    expect(first.size).toBe(0);
    expect(second.size).toBe(1);
  });

  it('should stop routing after delete', () => {
    const registry = new SubscriptionRegistry();
    const owner = new Mailbox<Delivery>();
    registry.put({ key: replyKey(0), owner, descriptor: { kind: 'reply', topic: 'room:a', ref: 0 } });

    expect(registry.delete(replyKey(0))).toBe(true);
    expect(registry.delete(replyKey(0))).toBe(false);
    expect(registry.route(envelope({ event: 'phx_reply', ref: 0 }))).toBe(0);
    expect(owner.size).toBe(0);
  });

  it('should broadcast to every owner', () => {
    const registry = new SubscriptionRegistry();
    const ownerA = new Mailbox<Delivery>();
    const ownerB = new Mailbox<Delivery>();
    registry.put({ key: topicKey('room:a'), owner: ownerA, descriptor: { kind: 'topic', topic: 'room:a' } });
    registry.put({ key: replyKey(2), owner: ownerB, descriptor: { kind: 'reply', topic: 'room:b', ref: 2 } });
    const error = new TransportError('boom');

    expect(registry.broadcast({ type: 'error', error })).toBe(2);
    expect(ownerA.drain()).toEqual([{ type: 'error', error }]);
    expect(ownerB.drain()).toEqual([{ type: 'error', error }]);
  });

  it('should skip closed owners', () => {
    const registry = new SubscriptionRegistry();
    const owner = new Mailbox<Delivery>();
    registry.put({ key: topicKey('room:a'), owner, descriptor: { kind: 'topic', topic: 'room:a' } });
    owner.close();

    expect(registry.route(envelope())).toBe(0);
  });

  it('should list keys', () => {
    const registry = new SubscriptionRegistry();
    const owner = new Mailbox<Delivery>();
    registry.put({ key: topicKey('room:a'), owner, descriptor: { kind: 'topic', topic: 'room:a' } });
    registry.put({ key: replyKey(9), owner, descriptor: { kind: 'reply', topic: 'room:a', ref: 9 } });

    expect(registry.keys()).toEqual(['channel_room:a', 'reply_9']);
    expect(registry.has('reply_9')).toBe(true);
    registry.clear();
    expect(registry.size).toBe(0);
  });

  it('should close every owner and keep buffered deliveries readable', async () => {
    const registry = new SubscriptionRegistry();
    const a = new Mailbox<Delivery>();
    const b = new Mailbox<Delivery>();
    registry.put({ key: topicKey('room:a'), owner: a, descriptor: { kind: 'topic', topic: 'room:a' } });
    registry.put({ key: topicKey('room:b'), owner: b, descriptor: { kind: 'topic', topic: 'room:b' } });
    registry.broadcast({ type: 'close', reason: 'terminated' });
    const reason = new TransportError('gone', 'NOT_CONNECTED');

    registry.closeAll(reason);

    expect(registry.size).toBe(0);
    expect(a.isClosed && b.isClosed).toBe(true);
    expect(await a.take()).toEqual({ type: 'close', reason: 'terminated' });
    await expect(a.take()).rejects.toBe(reason);
  });
});
