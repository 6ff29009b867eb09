import 'dotenv/config';
import { loadConfig } from './config/load-config';
import { createLogger } from './observability';
import { createPool } from './db/connection';
import { PostgresEventStore } from './db/repositories';
import { Dispatcher, TelegramClient, formatStartupNotification } from './notifications';
import { GitHubIssueEnricher, passthroughEnricher } from './github/issue-enricher';
import { IssueWebhookHandler } from './api/webhooks';
import { HealthCheck } from './api/health';
import { NotifierServer } from './api/server';

/**
 * Main entry point: builds every component once, wires them by hand and
 * owns their lifetime until shutdown.
 */
async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  logger.info(
    {
      repositories: config.repositories.length,
      batchSize: config.dispatch.batchSize,
      sendDelayMs: config.dispatch.sendDelayMs,
      enrichment: Boolean(config.githubToken),
    },
    'Configuration loaded'
  );

  // 1. Dedup store; unreachable at boot is fatal
  const pool = createPool(config.databaseUrl, logger.child({ component: 'db' }));
  const store = new PostgresEventStore(pool);
  const applied = await store.migrate();
  logger.info({ migrations: applied }, 'Dedup store ready');

  // 2. Outbound delivery
  const transport = new TelegramClient(config.telegramBotToken);
  const dispatcher = new Dispatcher(
    transport,
    { chatId: config.telegramChatId, ...config.dispatch },
    logger.child({ component: 'dispatcher' })
  );

  // 3. Intake
  const enricher = config.githubToken
    ? new GitHubIssueEnricher(config.githubToken, logger.child({ component: 'enricher' }))
    : passthroughEnricher;

  const webhooks = new IssueWebhookHandler({
    secret: config.webhookSecret,
    repositories: config.repositories,
    store,
    dispatcher,
    enricher,
    logger: logger.child({ component: 'webhook' }),
  });

  const health = new HealthCheck(store, dispatcher, config.health);
  const server = new NotifierServer(webhooks, health, { logger: logger.child({ component: 'http' }) });

  dispatcher.notifyStartup(
    formatStartupNotification({ repositories: config.repositories, store: 'PostgreSQL' })
  );

  await server.start(config.port, config.host);
  logger.info({ port: config.port }, 'Issue notifier ready');

  // Handle graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down gracefully');

    try {
      await server.stop();
      const result = await dispatcher.shutdown(config.shutdownGraceMs);
      logger.info(result, 'Dispatcher stopped');
      await pool.end();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

// Run the application
main().catch((error) => {
  console.error('Fatal error starting application:', error);
  process.exit(1);
});
