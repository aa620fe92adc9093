import type { MessageHandle, ResponderIdentity } from '../types.js';
import type { EventCallback, EventPredicate, SubscriptionHandle } from './listeners.js';

export type ConnectionState = 'uninitialized' | 'connecting' | 'ready' | 'disconnected';

/**
 * The process-wide messaging session. Started once at boot and shared by every
 * request; requests only send and (un)subscribe, they never reconfigure it.
 */
export interface ChannelConnection {
  readonly state: ConnectionState;
  /** @throws AuthenticationRequired when no authorized session is stored. */
  start(): Promise<void>;
  /** @throws ChannelUnavailable when not ready, SendRejected when the network refuses. */
  send(destination: ResponderIdentity, text: string): Promise<MessageHandle>;
  subscribe(predicate: EventPredicate, callback: EventCallback): SubscriptionHandle;
  /** Safe to call repeatedly and after the listener already fired. */
  unsubscribe(handle: SubscriptionHandle): void;
  stop(): Promise<void>;
}
