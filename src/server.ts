import { serve } from '@hono/node-server';
import { ConfigError, loadServerConfig } from './config';
import { createApp } from './index';
import { createLogger } from './logger';

function main() {
  const config = loadServerConfig(process.env);
  const logger = createLogger('cdn-rewriter', { level: config.logLevel });
  const app = createApp({
    settings: config.settings,
    originUrl: config.originUrl,
    siteUrl: config.siteUrl,
    logger,
  });

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info('Listening', {
      port: info.port,
      origin: config.originUrl,
      cdnEnabled: config.settings.enabled,
    });
  });
}

try {
  main();
} catch (err) {
  const logger = createLogger('cdn-rewriter');
  if (err instanceof ConfigError) {
    logger.error(err.message, { issues: err.issues });
  } else {
    logger.error('Startup failed', { error: err instanceof Error ? err.message : String(err) });
  }
  process.exitCode = 1;
}
