import express from 'express';
import type { RequestHandler } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { InstructionInterpreter } from './ai/interpreter.js';
import { createFlowchartRouter } from './routes/flowchart.js';
import type { SessionRepository } from './session/database.js';
import type { SessionStore } from './session/store.js';
import type { FileTemplateCatalog } from './templates/catalog.js';

export interface AppDependencies {
  store: SessionStore;
  repository: SessionRepository;
  interpreter: InstructionInterpreter;
  templates: Pick<FileTemplateCatalog, 'list'>;
  corsOrigin: string;
  /** Rate limiter for the interpreter endpoints; omitted in tests. */
  instructionLimiter?: RequestHandler;
}

/**
 * Build the Express app: security headers, CORS, JSON bodies, health
 * check and the flowchart routes. Listening is left to the caller.
 */
export function createApp(deps: AppDependencies): ReturnType<typeof express> {
  const app: ReturnType<typeof express> = express();

  app.use(helmet());
  app.use(
    cors({
      origin: deps.corsOrigin,
      credentials: true,
    }),
  );
  app.use(express.json({ limit: '100kb' }));

  app.get('/api/health', (_req, res) => {
    const checks: { sqlite: string } = { sqlite: 'ok' };

    // Verify SQLite is readable
    let storedSessions = 0;
    try {
      storedSessions = deps.repository.count();
    } catch (err: unknown) {
      checks.sqlite = err instanceof Error ? err.message : 'unreachable';
    }

    const healthy = checks.sqlite === 'ok';

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'unhealthy',
      checks,
      storedSessions,
      activeSessions: deps.store.size,
    });
  });

  app.use(
    '/api/flowchart',
    createFlowchartRouter({
      store: deps.store,
      interpreter: deps.interpreter,
      templates: deps.templates,
      ...(deps.instructionLimiter ? { instructionLimiter: deps.instructionLimiter } : {}),
    }),
  );

  return app;
}
