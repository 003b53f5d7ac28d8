import 'dotenv/config';
import { createApplication, seedKnowledgeBase } from '@/app.js';
import { loadConfig } from '@/config/index.js';
import { createLogger } from '@/observability/index.js';

async function start(): Promise<void> {
  const configResult = await loadConfig();
  if (!configResult.ok) {
    createLogger({ name: 'hr-triage' }).fatal('Invalid configuration', {
      component: 'main',
      error: configResult.error.message,
      ...configResult.error.context,
    });
    process.exit(1);
  }

  const config = configResult.value;
  const logger = createLogger({ level: config.logging.level });

  try {
    const app = await createApplication(config, { logger });

    const seeded = await seedKnowledgeBase(app, config.knowledge.faqPath, logger);
    if (seeded > 0) {
      logger.info('Knowledge base seeded', { component: 'main', entries: seeded });
    }

    // Graceful shutdown
    let closing = false;
    const shutdown = async (): Promise<void> => {
      if (closing) return;
      closing = true;
      logger.info('Shutting down...', { component: 'main' });
      await app.close();
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());

    const { port, host } = config.server;
    await app.server.listen({ port, host });
    logger.info(`Server listening on ${host}:${port.toString()}`, { component: 'main' });
  } catch (error: unknown) {
    logger.fatal('Failed to start server', {
      component: 'main',
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

void start();
