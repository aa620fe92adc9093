import 'dotenv/config';
import { join } from 'node:path';
import { z } from 'zod';

const seconds = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const SettingsSchema = z
  .object({
    API_ID: z.coerce.number().int().nonnegative().default(0),
    API_HASH: z.string().default(''),
    SESSION_NAME: z.string().min(1).default('f_session'),
    SESSION_DIR: z.string().min(1).default('/data/session'),
    BOT_USERNAME: z.string().default('@a_bot'),
    AUTH_TOKEN: z.string().min(1).default('change-me'),
    CONNECT_TIMEOUT: seconds(20),
    READ_TIMEOUT: seconds(20),
    OVERALL_TIMEOUT: seconds(60),
    WAIT_AFTER_SEND: seconds(12),
    PORT: z.coerce.number().int().min(1).max(65_535).default(8000)
  })
  .transform((env) => ({
    apiId: env.API_ID,
    apiHash: env.API_HASH,
    sessionName: env.SESSION_NAME,
    sessionDir: env.SESSION_DIR,
    botUsername: env.BOT_USERNAME,
    authToken: env.AUTH_TOKEN,
    connectTimeout: env.CONNECT_TIMEOUT,
    readTimeout: env.READ_TIMEOUT,
    overallTimeout: env.OVERALL_TIMEOUT,
    waitAfterSend: env.WAIT_AFTER_SEND,
    port: env.PORT
  }));

export type Settings = z.output<typeof SettingsSchema>;

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`invalid configuration: ${issues}`);
  }
  return parsed.data;
}

/** Where the login script stores the session string and where the connection reads it back. */
export function sessionFilePath(settings: Pick<Settings, 'sessionDir' | 'sessionName'>) {
  return join(settings.sessionDir, `${settings.sessionName}.session`);
}
