import 'dotenv/config';
import pino from 'pino';

export function logLevelFor(env: NodeJS.ProcessEnv) {
  if (env.NODE_ENV === 'test' || env.VITEST !== undefined) return 'silent';
  return env.LOG_LEVEL ?? 'info';
}

const level = logLevelFor(process.env);

export const log =
  level === 'silent' ? pino({ level }) : pino({ level, transport: { target: 'pino-pretty' } });

export function createLogger(module: string) {
  return log.child({ module });
}
