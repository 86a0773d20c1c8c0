// Load environment variables FIRST; modules below read process.env when they load
import 'dotenv/config';

import { loadAppConfig } from '@/config/app.config';
import { createPipelineDeps } from '@/services/pipeline-deps';
import { createApp } from '@/app';
import { logger } from '@/services/logger';
import { errorMessage } from '@/utils/errors';
import {
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';

async function startServer(): Promise<void> {
  const config = loadAppConfig();

  setupUnhandledRejectionHandler(config.NODE_ENV);
  setupUncaughtExceptionHandler();
  setupGracefulShutdown();

  // Models are warmed here; a failure to load any candidate aborts startup
  const deps = await createPipelineDeps(config);
  const app = createApp(deps, config);

  const server = app.listen(config.PORT, () => {
    logger.info('server:listening', {
      port: config.PORT,
      env: config.NODE_ENV,
      backend: deps.vectorStore.backend,
      models: deps.models.describe(),
    });
  });
  setServerInstance(server, () => deps.close());
}

startServer().catch((err: unknown) => {
  logger.fatal('server:start_failed', { error: errorMessage(err) });
  process.exit(1);
});
