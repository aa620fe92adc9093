import type { ChannelConnection } from './channel/connection.js';
import { SendRejected, SidecarError } from './errors.js';
import { createLogger } from './logger.js';
import type { InboundEvent, ReplyResult, ResponderIdentity } from './types.js';

const log = createLogger('correlator');

type WaitState = 'pending' | 'fulfilled' | 'expired';

/**
 * Write-once slot for the reply to one outbound message. The first
 * `fulfill` wins; later events and a late deadline are ignored.
 */
export class PendingWait {
  readonly deadline: number;
  private state: WaitState = 'pending';
  private timer: NodeJS.Timeout | null = null;
  private finish: (outcome: InboundEvent | null) => void = () => {};
  private readonly outcome: Promise<InboundEvent | null>;

  constructor(readonly target: ResponderIdentity, timeoutMs: number) {
    this.deadline = Date.now() + Math.max(0, timeoutMs);
    this.outcome = new Promise((resolve) => {
      this.finish = resolve;
    });
  }

  get settled() {
    return this.state !== 'pending';
  }

  fulfill(event: InboundEvent) {
    if (this.state !== 'pending') return false;
    this.state = 'fulfilled';
    this.clearTimer();
    this.finish(event);
    return true;
  }

  /** Resolves with the matched event, or null once the deadline passes. */
  wait() {
    if (this.state === 'pending' && !this.timer) {
      this.timer = setTimeout(() => this.expire(), Math.max(0, this.deadline - Date.now()));
    }
    return this.outcome;
  }

  dispose() {
    this.expire();
  }

  private expire() {
    this.clearTimer();
    if (this.state !== 'pending') return;
    this.state = 'expired';
    this.finish(null);
  }

  private clearTimer() {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }
}

function settle(result: ReplyResult): ReplyResult {
  return Object.freeze(result);
}

function toSendFailure(error: unknown): SidecarError {
  if (error instanceof SidecarError) return error;
  return new SendRejected(error instanceof Error ? error.message : String(error));
}

export class ReplyCorrelator {
  constructor(private readonly connection: ChannelConnection) {}

  /**
   * Sends `text` to `destination` and waits up to `timeoutSeconds` for the
   * first message that destination sends back in its private dialog. The listener is registered
   * before the send so an immediate reply cannot be missed, and is removed on
   * every exit path.
   */
  async sendAndAwaitReply(destination: ResponderIdentity, text: string, timeoutSeconds: number): Promise<ReplyResult> {
    const pending = new PendingWait(destination, timeoutSeconds * 1000);
    const subscription = this.connection.subscribe(
      (event) => event.sender.id === destination.id && event.chatId === destination.id,
      (event) => {
        if (pending.fulfill(event)) {
          log.debug({ destination: destination.id, messageId: event.messageId }, 'reply matched');
        }
      }
    );

    try {
      try {
        await this.connection.send(destination, text);
      } catch (error) {
        const failure = toSendFailure(error);
        log.warn({ destination: destination.id, code: failure.code, err: failure.message }, 'send failed');
        return settle({ sent: false, error: failure });
      }

      if (timeoutSeconds <= 0) return settle({ sent: true });

      const event = await pending.wait();
      if (!event) {
        log.info({ destination: destination.id, timeoutSeconds }, 'no reply before deadline');
        return settle({ sent: true });
      }
      return settle({ sent: true, reply: event.text });
    } finally {
      this.connection.unsubscribe(subscription);
      pending.dispose();
    }
  }
}
