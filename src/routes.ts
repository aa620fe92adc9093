import type { Express, NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import { SendRejected, SidecarError } from './errors.js';
import { createLogger } from './logger.js';
import { DEFAULT_TEMPLATE, type BotSearchService } from './service.js';

const log = createLogger('routes');

const waitSeconds = z.number().int().nonnegative().optional();

const ResolvePhoneSchema = z.object({
  phone: z.string().min(1)
});

const SendBotSchema = z.object({
  bot_username: z.string().optional(),
  text: z.string().min(1),
  wait_seconds: waitSeconds
});

const SearchViaBotSchema = z.object({
  phone: z.string().min(1),
  bot_username: z.string().optional(),
  message_template: z.string().default(DEFAULT_TEMPLATE),
  wait_seconds: waitSeconds
});

export function requireToken(authToken: string): RequestHandler {
  return (req, res, next) => {
    const header = req.header('authorization');
    if (!header || !header.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Missing Bearer token' });
      return;
    }
    if (header.slice('Bearer '.length).trim() !== authToken) {
      res.status(403).json({ error: 'Invalid token' });
      return;
    }
    next();
  };
}

function retryAfter(error: SidecarError) {
  return error instanceof SendRejected && error.retryAfterSeconds !== undefined
    ? { retry_after: error.retryAfterSeconds }
    : {};
}

export function sendError(res: Response, error: unknown) {
  if (error instanceof SidecarError) {
    return res.status(error.status).json({ error: error.code, detail: error.message, ...retryAfter(error) });
  }
  log.error({ err: String(error) }, 'unhandled request error');
  return res.status(500).json({ error: 'Unexpected', detail: 'internal error' });
}

function isBodyParseError(error: unknown) {
  return error instanceof Error && 'type' in error && error.type === 'entity.parse.failed';
}

export function errorHandler(error: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (isBodyParseError(error)) {
    res.status(400).json({ error: 'invalid JSON body' });
    return;
  }
  sendError(res, error);
}

export function registerBotRoutes(app: Express, service: BotSearchService) {
  app.post('/resolve_phone', async (req, res) => {
    const parsed = ResolvePhoneSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.flatten());

    try {
      const user = await service.resolvePhone(parsed.data.phone);
      res.json({
        id: user.id,
        username: user.username,
        first_name: user.firstName,
        last_name: user.lastName,
        phone: user.phone
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/bot/send', async (req, res) => {
    const parsed = SendBotSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.flatten());

    try {
      const { bot_username, text, wait_seconds } = parsed.data;
      const result = await service.sendToBot(bot_username, text, wait_seconds);
      res.json({ sent: result.sent, reply: result.reply ?? null });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/search_phone_via_bot', async (req, res) => {
    const parsed = SearchViaBotSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.flatten());

    const { phone, bot_username, message_template, wait_seconds } = parsed.data;
    const { result, failure } = await service.search(phone, bot_username, message_template, wait_seconds);
    res
      .status(failure?.status ?? 200)
      .json({ ...result, reply: result.reply ?? null, ...(failure ? retryAfter(failure) : {}) });
  });
}
