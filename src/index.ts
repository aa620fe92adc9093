import { createApp } from './app.js';
import { TelegramConnection } from './channel/telegram.js';
import { TelegramIdentityResolver } from './channel/telegramResolver.js';
import { loadSettings, sessionFilePath } from './config.js';
import { ReplyCorrelator } from './correlator.js';
import { log } from './logger.js';
import { BotSearchService } from './service.js';

async function main() {
  const settings = loadSettings();

  const connection = new TelegramConnection({
    apiId: settings.apiId,
    apiHash: settings.apiHash,
    sessionFile: sessionFilePath(settings),
    connectTimeoutSeconds: settings.connectTimeout,
    requestTimeoutSeconds: settings.readTimeout
  });
  await connection.start();

  const service = new BotSearchService(new TelegramIdentityResolver(connection), new ReplyCorrelator(connection), {
    defaultBot: settings.botUsername,
    defaultWaitSeconds: settings.waitAfterSend,
    maxWaitSeconds: settings.overallTimeout
  });

  const app = createApp({ service, connection, authToken: settings.authToken });
  const server = app.listen(settings.port, () => log.info({ port: settings.port }, 'bot reply sidecar running'));

  const shutdown = (signal: string) => {
    log.info({ signal }, 'shutting down');
    server.close();
    void connection
      .stop()
      .catch((error: unknown) => log.error({ err: String(error) }, 'disconnect failed'))
      .finally(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  log.fatal({ err: error instanceof Error ? error.message : String(error) }, 'startup failed');
  process.exit(1);
});
