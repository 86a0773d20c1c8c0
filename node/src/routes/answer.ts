// node/src/routes/answer.ts — GET /answer: full parse → retrieve → rerank → summarize pipeline
import express, { type Request, type Response, type NextFunction } from 'express';
import { runRetrieval, type OrchestratorDeps } from '@/services/orchestrator';
import { createErrorResponse } from '@/utils/errorResponse';
import { logger } from '@/services/logger';
import { correlationIdOf } from '@/middleware/correlation';
import { formatIssues, searchParamsSchema } from './query-params';

const answerParams = searchParamsSchema(5);

export function createAnswerRouter(deps: OrchestratorDeps, options: { requestTimeoutMs: number }) {
  const router = express.Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = answerParams.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json(createErrorResponse('BAD_REQUEST', 'q is required', formatIssues(parsed.error)));
      return;
    }
    const { q, k } = parsed.data;

    try {
      const result = await runRetrieval(q, k, deps, options);
      logger.info('answer:served', {
        correlationId: correlationIdOf(res),
        traceId: result.trace.traceId,
        cached: result.cached,
        results: result.candidates.length,
      });
      res.json({
        answer: result.summary,
        rewritten_query: result.rewrittenQuery,
        filters: result.filters,
        results: result.candidates,
        warnings: result.warnings,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
