/**
 * Subscription registry.
 *
 * Routes decoded envelopes to the mailboxes that asked for them. A subscription
 * is described by data (topic, and for replies the reference) rather than by a
 * callback, so routing is plain comparison.
 */

import type { ChannelError } from './errors';
import type { Mailbox } from './mailbox';
import { Events, type Envelope, type Ref, sameRef } from './protocol';

// ============================================================================
// Types
// ============================================================================

/**
 * What a subscription listens for
 */
export type SubscriptionDescriptor =
  /** Every envelope on a joined topic */
  | { kind: 'topic'; topic: string }
  /** The single `phx_reply` to one pushed message */
  | { kind: 'reply'; topic: string; ref: Ref };

/**
 * Message posted to a subscription owner
 */
export type Delivery =
  | { type: 'message'; event: string; payload: unknown; ref: Ref | null }
  | { type: 'reply'; payload: unknown }
  | { type: 'close'; code?: number; reason: string }
  | { type: 'error'; error: ChannelError };

export interface Subscription {
  /** Unique within the registry; a second subscription with the same key replaces the first */
  key: string;
  owner: Mailbox<Delivery>;
  descriptor: SubscriptionDescriptor;
}

// ============================================================================
// Keys and matching
// ============================================================================

/** Key of the durable subscription of a joined topic */
export function topicKey(topic: string): string {
  return `channel_${topic}`;
}

/** Key of the ephemeral subscription waiting for one reply */
export function replyKey(ref: Ref): string {
  return `reply_${ref}`;
}

export function matches(descriptor: SubscriptionDescriptor, envelope: Envelope): boolean {
  switch (descriptor.kind) {
    case 'topic':
      return envelope.topic === descriptor.topic;
    case 'reply':
      return (
        envelope.topic === descriptor.topic &&
        envelope.event === Events.REPLY &&
        sameRef(envelope.ref, descriptor.ref)
      );
  }
}

/**
 * Shape an envelope into the delivery for a matching subscription
 */
export function project(descriptor: SubscriptionDescriptor, envelope: Envelope): Delivery {
  switch (descriptor.kind) {
    case 'topic':
      return { type: 'message', event: envelope.event, payload: envelope.payload, ref: envelope.ref };
    case 'reply':
      return { type: 'reply', payload: envelope.payload };
  }
}

// ============================================================================
// Registry
// ============================================================================

export class SubscriptionRegistry {
  private readonly subscriptions = new Map<string, Subscription>();

  get size(): number {
    return this.subscriptions.size;
  }

  /**
   * Insert a subscription, replacing any existing one with the same key
   */
  put(subscription: Subscription): void {
    this.subscriptions.set(subscription.key, subscription);
  }

  delete(key: string): boolean {
    return this.subscriptions.delete(key);
  }

  has(key: string): boolean {
    return this.subscriptions.has(key);
  }

  get(key: string): Subscription | undefined {
    return this.subscriptions.get(key);
  }

  keys(): string[] {
    return [...this.subscriptions.keys()];
  }

  /**
   * Post the envelope to every matching owner. Returns the number of deliveries.
   */
  route(envelope: Envelope): number {
    let delivered = 0;
    for (const { descriptor, owner } of this.subscriptions.values()) {
      if (!matches(descriptor, envelope)) continue;
      if (owner.post(project(descriptor, envelope))) delivered++;
    }
    return delivered;
  }

  /**
   * Post the same delivery to every owner (connection closed or failed).
   */
  broadcast(delivery: Delivery): number {
    let delivered = 0;
    for (const { owner } of this.subscriptions.values()) {
      if (owner.post(delivery)) delivered++;
    }
    return delivered;
  }

  clear(): void {
    this.subscriptions.clear();
  }

  /**
   * Close every owner's mailbox with `reason` and drop all subscriptions.
   * Buffered deliveries stay readable.
   */
  closeAll(reason: unknown): void {
    for (const { owner } of this.subscriptions.values()) {
      owner.close(reason);
    }
    this.subscriptions.clear();
  }
}
