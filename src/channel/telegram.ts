import { readFile } from 'node:fs/promises';
import bigInt from 'big-integer';
import { TelegramClient, errors } from 'telegram';
import { NewMessage, type NewMessageEvent } from 'telegram/events/index.js';
import { StringSession } from 'telegram/sessions/index.js';
import { AuthenticationRequired, ChannelUnavailable, SendRejected, SidecarError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { InboundEvent, MessageHandle, ResponderIdentity } from '../types.js';
import type { ChannelConnection, ConnectionState } from './connection.js';
import { ListenerRegistry, type EventCallback, type EventPredicate, type SubscriptionHandle } from './listeners.js';

const log = createLogger('telegram');

export interface TelegramConnectionOptions {
  apiId: number;
  apiHash: string;
  sessionFile: string;
  connectTimeoutSeconds: number;
  requestTimeoutSeconds: number;
}

async function readSession(path: string) {
  try {
    return (await readFile(path, 'utf8')).trim();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return '';
    throw error;
  }
}

async function withTimeout<T>(task: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([task, expired]);
  } finally {
    clearTimeout(timer);
  }
}

export function toInboundEvent(event: NewMessageEvent): InboundEvent | null {
  const { message } = event;
  if (!message.senderId) return null;
  const senderId = message.senderId.toString();
  return {
    sender: { id: senderId },
    chatId: message.chatId?.toString() ?? senderId,
    text: message.message ?? '',
    timestamp: message.date * 1000,
    messageId: message.id
  };
}

export function toSendRejected(error: unknown): SidecarError {
  if (error instanceof SidecarError) return error;
  if (error instanceof errors.FloodWaitError) {
    return new SendRejected(`flood wait: ${error.seconds}s`, error.seconds);
  }
  if (error instanceof errors.RPCError) return new SendRejected(error.errorMessage);
  return new SendRejected(error instanceof Error ? error.message : String(error));
}

export class TelegramConnection implements ChannelConnection {
  private client: TelegramClient | null = null;
  private currentState: ConnectionState = 'uninitialized';
  private readonly registry = new ListenerRegistry();
  private readonly incoming = new NewMessage({ incoming: true });

  private readonly onMessage = (event: NewMessageEvent) => {
    const inbound = toInboundEvent(event);
    if (!inbound) return;
    const delivered = this.registry.dispatch(inbound);
    log.debug({ senderId: inbound.sender.id, messageId: inbound.messageId, delivered }, 'inbound message');
  };

  constructor(private readonly options: TelegramConnectionOptions) {}

  get state() {
    return this.currentState;
  }

  /** The underlying client, for lookups that are not sends. */
  get telegram(): TelegramClient {
    if (!this.client || this.currentState !== 'ready') {
      throw new ChannelUnavailable(`telegram connection is ${this.currentState}`);
    }
    return this.client;
  }

  async start() {
    if (this.currentState === 'ready') return;

    const saved = await readSession(this.options.sessionFile);
    if (!saved) {
      throw new AuthenticationRequired(`no session at ${this.options.sessionFile}; run the init-session script first`);
    }

    this.currentState = 'connecting';
    const client = new TelegramClient(new StringSession(saved), this.options.apiId, this.options.apiHash, {
      connectionRetries: 5,
      requestRetries: 5,
      autoReconnect: true,
      timeout: this.options.requestTimeoutSeconds
    });

    try {
      await withTimeout(
        client.connect(),
        this.options.connectTimeoutSeconds * 1000,
        () => new ChannelUnavailable(`connect timed out after ${this.options.connectTimeoutSeconds}s`)
      );
      if (!(await client.checkAuthorization())) {
        throw new AuthenticationRequired('session not authorized; initialize the session first');
      }
    } catch (error) {
      this.currentState = 'disconnected';
      await client.disconnect().catch((err: unknown) => log.warn({ err: String(err) }, 'disconnect after failed start'));
      if (error instanceof SidecarError) throw error;
      throw new ChannelUnavailable(error instanceof Error ? error.message : String(error));
    }

    client.addEventHandler(this.onMessage, this.incoming);
    this.client = client;
    this.currentState = 'ready';
    log.info({ sessionFile: this.options.sessionFile }, 'telegram session ready');
  }

  async send(destination: ResponderIdentity, text: string): Promise<MessageHandle> {
    const client = this.telegram;
    const peer = destination.username ?? bigInt(destination.id);
    try {
      const message = await client.sendMessage(peer, { message: text });
      return { id: message.id, date: message.date };
    } catch (error) {
      throw toSendRejected(error);
    }
  }

  subscribe(predicate: EventPredicate, callback: EventCallback): SubscriptionHandle {
    return this.registry.add(predicate, callback);
  }

  unsubscribe(handle: SubscriptionHandle) {
    this.registry.remove(handle);
  }

  async stop() {
    const { client } = this;
    this.client = null;
    this.currentState = 'disconnected';
    if (!client) return;
    client.removeEventHandler(this.onMessage, this.incoming);
    await client.disconnect();
    log.info('telegram session closed');
  }
}
