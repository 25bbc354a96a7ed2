import express, { Request, Response } from 'express';
import {
  analyzeHandler,
  ApiContext,
  ApiResult,
  compareHandler,
  createEvaluationHandler,
  createPromptHandler,
  deleteEvaluationHandler,
  listEvaluationsHandler,
  listPromptsHandler,
  listTemplatesHandler,
  renderTemplateHandler,
  runHandler,
  samplesHandler,
  statsHandler,
  updateEvaluationHandler,
  updatePromptHandler,
  variationHandler,
} from './api-handlers.js';

/** Creates the Express app serving the JSON API. */
export function createAppServer(ctx: ApiContext): express.Express {
  const app = express();

  app.use(express.json());

  app.get('/api/templates', route(() => listTemplatesHandler()));
  app.post(
    '/api/templates/:id/render',
    route((req) => renderTemplateHandler(req.params['id'], req.body))
  );
  app.post('/api/analyze', route((req) => analyzeHandler(req.body)));
  app.post('/api/compare', route((req) => compareHandler(req.body)));

  app.get(
    '/api/prompts',
    route((req) => listPromptsHandler(ctx, req.query['filter']))
  );
  app.post('/api/prompts', route((req) => createPromptHandler(ctx, req.body)));
  app.patch(
    '/api/prompts/:id',
    route((req) => updatePromptHandler(ctx, req.params['id'], req.body))
  );

  app.get('/api/evaluations', route(() => listEvaluationsHandler(ctx)));
  app.post(
    '/api/evaluations',
    route((req) => createEvaluationHandler(ctx, req.body))
  );
  app.patch(
    '/api/evaluations/:id',
    route((req) => updateEvaluationHandler(ctx, req.params['id'], req.body))
  );
  app.delete(
    '/api/evaluations/:id',
    route((req) => deleteEvaluationHandler(ctx, req.params['id']))
  );

  app.get('/api/stats', route(() => statsHandler(ctx)));
  app.get('/api/samples', route(() => samplesHandler()));
  app.post(
    '/api/samples/variation',
    route((req) => variationHandler(req.body))
  );

  return app;
}

/** Starts listening and resolves once the server accepts connections. */
export function startAppServer(ctx: ApiContext, port: number): Promise<void> {
  const app = createAppServer(ctx);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      console.log(`Server listening on port: ${port}`);
      resolve();
    });
    server.on('error', reject);
  });
}

function route(
  handler: (req: Request) => ApiResult | Promise<ApiResult>
): (req: Request, res: Response) => Promise<void> {
  return async (req, res) => {
    const result = await runHandler(() => handler(req));

    if (result.body === null) {
      res.status(result.status).end();
    } else {
      res.status(result.status).json(result.body);
    }
  };
}
