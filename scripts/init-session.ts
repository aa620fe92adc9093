import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createInterface } from 'node:readline/promises';
import { Api, TelegramClient } from 'telegram';
import { StringSession } from 'telegram/sessions/index.js';
import { loadSettings, sessionFilePath } from '../src/config.js';
import { log } from '../src/logger.js';

const settings = loadSettings();
const sessionFile = sessionFilePath(settings);
const session = new StringSession('');
const client = new TelegramClient(session, settings.apiId, settings.apiHash, { connectionRetries: 5 });
const rl = createInterface({ input: process.stdin, output: process.stdout });

log.info({ sessionFile }, 'starting telegram login flow');

try {
  await client.start({
    phoneNumber: () => rl.question('Phone number: '),
    phoneCode: () => rl.question('Login code: '),
    password: () => rl.question('Two-step password (blank if none): '),
    onError: (error) => {
      log.error({ err: error.message }, 'login step failed');
    }
  });

  const me = await client.getMe();
  const who = me instanceof Api.User ? (me.username ?? me.id.toString()) : 'unknown';

  await mkdir(dirname(sessionFile), { recursive: true });
  await writeFile(sessionFile, session.save(), { mode: 0o600 });
  log.info({ account: who, sessionFile }, 'session authorized and saved');
} finally {
  rl.close();
  await client.disconnect();
}
