// node/src/app.ts — express app wiring; no listening here so tests can mount it on an ephemeral port
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import rateLimit from 'express-rate-limit';

import type { AppConfig } from '@/config/app.config';
import type { PipelineDeps } from '@/services/pipeline-deps';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorHandler } from '@/middleware/errorHandler';
import { notFoundHandler } from '@/middleware/notFoundHandler';
import { createAnswerRouter } from '@/routes/answer';
import { createSearchRouter } from '@/routes/search';
import { createHealthRouter } from '@/routes/health';
import { createDebugRouter } from '@/routes/debug';
import { logger } from '@/services/logger';

export type AppSettings = Pick<AppConfig, 'NODE_ENV' | 'CORS_ORIGIN' | 'REQUEST_TIMEOUT_MS'>;

export function createApp(deps: PipelineDeps, settings: AppSettings): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: settings.CORS_ORIGIN.split(','), credentials: true }));

  // Rate limiting is off in dev and under test
  if (settings.NODE_ENV === 'production') {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        max: 100,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  app.use(attachCorrelationId);
  app.use(express.json({ limit: '1mb' }));
  app.use(compression());

  if (settings.NODE_ENV !== 'test') {
    app.use(
      morgan(settings.NODE_ENV === 'development' ? 'dev' : 'combined', {
        stream: { write: (line: string) => logger.info(line.trim()) },
      }),
    );
  }

  app.use('/answer', createAnswerRouter(deps, { requestTimeoutMs: settings.REQUEST_TIMEOUT_MS }));
  app.use('/search', createSearchRouter(deps.vectorStore));
  app.use('/health', createHealthRouter(deps.vectorStore));
  app.use('/debug', createDebugRouter(deps.vectorStore, deps.models));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
