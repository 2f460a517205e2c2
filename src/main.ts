/**
 * Server entry point.
 */

import { loadConfig } from './config';
import { logger, setLogLevel } from './logger';
import { createApp, createAppContext, seedDemoData } from './server';

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);

  const context = createAppContext({ config });
  if (config.seedDemo) {
    await seedDemoData(context);
  }

  const app = createApp(context);
  const server = app.listen(config.port, () => {
    logger.info('Server listening', { port: config.port, ddnsEnabled: config.ddnsEnabled });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    context.close();
    server.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

process.on('unhandledRejection', (reason) => {
  logger.critical('Unhandled rejection', {
    error: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
});

main().catch((err: unknown) => {
  logger.critical('Startup failed', { error: err instanceof Error ? err.message : String(err) });
  process.exitCode = 1;
});
