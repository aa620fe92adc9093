import type { ReplyCorrelator } from './correlator.js';
import { toSidecarError, type SidecarError } from './errors.js';
import { normalizePhone, type IdentityResolver } from './identity.js';
import { createLogger } from './logger.js';
import { renderTemplate } from './template.js';
import type { ResolvedUser, SearchResult, SendToBotResult } from './types.js';

const log = createLogger('service');

export interface BotSearchOptions {
  defaultBot: string;
  defaultWaitSeconds: number;
  maxWaitSeconds: number;
}

export const DEFAULT_TEMPLATE = '{phone}';

/** A search result together with the error behind an `ok: false`. */
export interface SearchOutcome {
  result: SearchResult;
  failure?: SidecarError;
}

export class BotSearchService {
  constructor(
    private readonly resolver: IdentityResolver,
    private readonly correlator: ReplyCorrelator,
    private readonly options: BotSearchOptions
  ) {}

  resolvePhone(phone: string): Promise<ResolvedUser> {
    return this.resolver.resolvePhone(phone);
  }

  /** @throws SidecarError when the bot cannot be resolved or the send fails. */
  async sendToBot(botHandle: string | undefined, text: string, waitSeconds?: number): Promise<SendToBotResult> {
    const bot = await this.resolver.resolve(this.botFor(botHandle));
    const result = await this.correlator.sendAndAwaitReply(bot, text, this.waitFor(waitSeconds));
    if (!result.sent) throw result.error;
    return result.reply === undefined ? { sent: true } : { sent: true, reply: result.reply };
  }

  /** Never throws: every failure comes back as `ok: false` with the error code. */
  async searchByPhoneViaBot(
    phone: string,
    botHandle?: string,
    template: string = DEFAULT_TEMPLATE,
    waitSeconds?: number
  ): Promise<SearchResult> {
    const { result } = await this.search(phone, botHandle, template, waitSeconds);
    return result;
  }

  async search(
    phone: string,
    botHandle?: string,
    template: string = DEFAULT_TEMPLATE,
    waitSeconds?: number
  ): Promise<SearchOutcome> {
    const query = normalizePhone(phone);
    try {
      const bot = await this.resolver.resolve(this.botFor(botHandle));
      const text = renderTemplate(template, { phone: query });
      await this.primeContact(query);

      const result = await this.correlator.sendAndAwaitReply(bot, text, this.waitFor(waitSeconds));
      if (!result.sent) {
        return { result: { ok: false, query, error: result.error.code }, failure: result.error };
      }
      return { result: result.reply === undefined ? { ok: true, query } : { ok: true, query, reply: result.reply } };
    } catch (error) {
      const failure = toSidecarError(error);
      log.warn({ query, code: failure.code, err: failure.message }, 'search via bot failed');
      return { result: { ok: false, query, error: failure.code }, failure };
    }
  }

  // best-effort; a failed lookup does not stop the search
  private async primeContact(phone: string) {
    try {
      await this.resolver.resolvePhone(phone);
    } catch (error) {
      log.debug({ phone, err: String(error) }, 'phone lookup before search failed');
    }
  }

  // a blank handle means the configured bot
  private botFor(handle: string | undefined) {
    return handle?.trim() || this.options.defaultBot;
  }

  private waitFor(requested: number | undefined) {
    const seconds = requested ?? this.options.defaultWaitSeconds;
    return Math.min(Math.max(0, seconds), this.options.maxWaitSeconds);
  }
}
