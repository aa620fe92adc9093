import { ChannelUnavailable, type SidecarError } from '../errors.js';
import type { InboundEvent, MessageHandle, ResponderIdentity } from '../types.js';
import type { ChannelConnection, ConnectionState } from './connection.js';
import { ListenerRegistry, type EventCallback, type EventPredicate, type SubscriptionHandle } from './listeners.js';

export interface SentMessage {
  destination: ResponderIdentity;
  text: string;
}

/**
 * In-process connection for tests: records outbound messages and lets the
 * caller inject inbound traffic with `emit`.
 */
export class MemoryConnection implements ChannelConnection {
  readonly sent: SentMessage[] = [];
  /** Thrown by the next sends while set. */
  sendFailure: SidecarError | null = null;
  /** Runs synchronously inside `send`, before it resolves; lets a test play the bot. */
  onSend: ((message: SentMessage) => void) | null = null;

  private registry = new ListenerRegistry();
  private currentState: ConnectionState = 'uninitialized';
  private nextMessageId = 1;

  get state() {
    return this.currentState;
  }

  get listenerCount() {
    return this.registry.size;
  }

  async start() {
    this.currentState = 'ready';
  }

  async send(destination: ResponderIdentity, text: string): Promise<MessageHandle> {
    if (this.currentState !== 'ready') throw new ChannelUnavailable(`connection is ${this.currentState}`);
    if (this.sendFailure) throw this.sendFailure;

    const message = { destination, text };
    this.sent.push(message);
    const handle = { id: this.nextMessageId++, date: Math.floor(Date.now() / 1000) };
    this.onSend?.(message);
    return handle;
  }

  subscribe(predicate: EventPredicate, callback: EventCallback): SubscriptionHandle {
    return this.registry.add(predicate, callback);
  }

  unsubscribe(handle: SubscriptionHandle) {
    this.registry.remove(handle);
  }

  /** Without `chatId` the message arrives in the private dialog with the sender. */
  emit(senderId: string, text: string, chatId: string = senderId) {
    const event: InboundEvent = {
      sender: { id: senderId },
      chatId,
      text,
      timestamp: Date.now(),
      messageId: this.nextMessageId++
    };
    return this.registry.dispatch(event);
  }

  async stop() {
    this.currentState = 'disconnected';
  }
}
