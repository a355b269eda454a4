import { Router } from 'express';
import type { Request, RequestHandler, Response } from 'express';
import type { FlowchartErrorTag, FlowchartResponse, StoreFailure } from '@flowscribe/shared';
import { MAX_INSTRUCTION_LENGTH, generateId, logger, sessionKeyFor } from '@flowscribe/shared';
import type { InstructionInterpreter, InterpretContext } from '../ai/interpreter.js';
import { InterpreterError } from '../ai/interpreter.js';
import type { GraphView } from '../graph/model.js';
import { serialize } from '../graph/serializer.js';
import type { Session, SessionStore } from '../session/store.js';
import type { FileTemplateCatalog } from '../templates/catalog.js';

const log = logger('http');

const SESSION_ID_RE = /^[A-Za-z0-9_-]{1,64}$/;

/** HTTP status for each failure tag the store can return. */
export const STATUS_BY_TAG: Record<FlowchartErrorTag, number> = {
  DeltaSchemaError: 422,
  InvalidBranchError: 422,
  ParseError: 422,
  SessionNotFoundError: 404,
  TemplateNotFoundError: 404,
  NothingToUndoError: 409,
  GraphIntegrityError: 500,
};

export interface FlowchartRouterOptions {
  store: SessionStore;
  interpreter: InstructionInterpreter;
  templates: Pick<FileTemplateCatalog, 'list'>;
  /** Applied to the endpoints that call the interpreter. */
  instructionLimiter?: RequestHandler;
}

/** Frontier node labels, in creation order. */
function frontierLabels(graph: GraphView): string[] {
  return graph.frontier.flatMap((id) => {
    const node = graph.getNode(id);
    return node ? [node.label] : [];
  });
}

function interpretContext(graph: GraphView): InterpretContext {
  return { graphText: serialize(graph), frontier: frontierLabels(graph) };
}

function toResponse(
  userEmail: string,
  sessionId: string,
  message: string,
  session: Session,
): FlowchartResponse {
  return {
    status: 'success',
    userEmail,
    sessionId,
    message,
    graph: serialize(session.graph),
    history: session.history,
    frontier: frontierLabels(session.graph),
  };
}

function sendFailure(res: Response, failure: StoreFailure): void {
  const message =
    failure.error === 'DeltaSchemaError' ? 'Could not understand instruction' : failure.message;
  res.status(STATUS_BY_TAG[failure.error]).json({
    error: message,
    code: failure.error,
    ...(failure.error === 'DeltaSchemaError' ? { details: failure.message } : {}),
  });
}

function sendUnexpected(res: Response, err: unknown): void {
  if (err instanceof InterpreterError) {
    log.warn('interpreter failed', { error: err.message });
    res.status(502).json({ error: 'Instruction interpreter unavailable', code: 'InterpreterError' });
    return;
  }
  log.error('request failed', { error: err instanceof Error ? err.message : String(err) });
  res.status(500).json({ error: 'Internal server error' });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requestBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

/** Non-empty trimmed string, or `null`. */
function readString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

/**
 * Wrap an async route body so every rejection ends in a JSON error
 * response instead of an unhandled rejection.
 */
function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res): void => {
    void handler(req, res).catch((err: unknown) => {
      sendUnexpected(res, err);
    });
  };
}

/**
 * Session-scoped flowchart endpoints, mounted at `/api/flowchart`.
 *
 * Every session is addressed by `userEmail` plus `sessionId`; the two
 * are combined into the store key with {@link sessionKeyFor}.
 *
 * @example
 * app.use('/api/flowchart', createFlowchartRouter({ store, interpreter, templates }));
 */
export function createFlowchartRouter(options: FlowchartRouterOptions): Router {
  const { store, interpreter, templates } = options;
  const limiter: RequestHandler = options.instructionLimiter ?? ((_req, _res, next) => next());
  const router = Router();

  /** Read and check the prompt; sends a 400 and returns `null` on failure. */
  function readPrompt(body: Record<string, unknown>, res: Response): string | null {
    const prompt = readString(body['prompt']);
    if (!prompt) {
      res.status(400).json({ error: 'Missing userEmail or prompt' });
      return null;
    }
    if (prompt.length > MAX_INSTRUCTION_LENGTH) {
      res
        .status(400)
        .json({ error: `Prompt exceeds ${String(MAX_INSTRUCTION_LENGTH)} characters` });
      return null;
    }
    return prompt;
  }

  function readSessionId(value: unknown, res: Response): string | null {
    const sessionId = readString(value);
    if (!sessionId || !SESSION_ID_RE.test(sessionId)) {
      res.status(400).json({ error: 'Missing or invalid sessionId' });
      return null;
    }
    return sessionId;
  }

  // GET /api/flowchart/templates — list predefined flowcharts
  router.get('/templates', (_req, res) => {
    res.json({ templates: templates.list() });
  });

  // POST /api/flowchart/load_template — new session seeded from a template
  router.post(
    '/load_template',
    route(async (req, res) => {
      const body = requestBody(req);
      const userEmail = readString(body['userEmail']);
      const templateId = readString(body['templateId']);
      if (!userEmail || !templateId) {
        res.status(400).json({ error: 'Missing userEmail or templateId' });
        return;
      }

      const sessionId = generateId();
      const key = sessionKeyFor(userEmail, sessionId);
      const loaded = await store.loadTemplate(key, templateId);
      if (!loaded.success) {
        sendFailure(res, loaded);
        return;
      }
      const session = store.getSession(key);
      if (!session.success) {
        sendFailure(res, session);
        return;
      }
      res
        .status(201)
        .json(toResponse(userEmail, sessionId, `Loaded template "${templateId}"`, session.data));
    }),
  );

  // POST /api/flowchart/create — new session from a first instruction
  router.post(
    '/create',
    limiter,
    route(async (req, res) => {
      const body = requestBody(req);
      const userEmail = readString(body['userEmail']);
      if (!userEmail) {
        res.status(400).json({ error: 'Missing userEmail or prompt' });
        return;
      }
      const prompt = readPrompt(body, res);
      if (!prompt) return;

      const sessionId = generateId();
      const key = sessionKeyFor(userEmail, sessionId);
      const empty = store.getOrCreate(key);

      let rawDelta: unknown;
      try {
        rawDelta = await interpreter.interpret(prompt, interpretContext(empty.graph));
      } catch (err: unknown) {
        await store.delete(key);
        throw err;
      }

      const applied = await store.applyInstruction(key, prompt, rawDelta);
      if (!applied.success) {
        // The caller never sees this session id.
        await store.delete(key);
        sendFailure(res, applied);
        return;
      }
      const session = store.getSession(key);
      if (!session.success) {
        sendFailure(res, session);
        return;
      }
      res.status(201).json(toResponse(userEmail, sessionId, 'Flowchart created', session.data));
    }),
  );

  // POST /api/flowchart/add — apply one instruction to an existing session
  router.post(
    '/add',
    limiter,
    route(async (req, res) => {
      const body = requestBody(req);
      const userEmail = readString(body['userEmail']);
      if (!userEmail) {
        res.status(400).json({ error: 'Missing userEmail or prompt' });
        return;
      }
      const sessionId = readSessionId(body['sessionId'], res);
      if (!sessionId) return;
      const prompt = readPrompt(body, res);
      if (!prompt) return;

      const key = sessionKeyFor(userEmail, sessionId);
      const current = store.getSession(key);
      if (!current.success) {
        sendFailure(res, current);
        return;
      }

      const rawDelta = await interpreter.interpret(prompt, interpretContext(current.data.graph));
      const applied = await store.applyInstruction(key, prompt, rawDelta);
      if (!applied.success) {
        sendFailure(res, applied);
        return;
      }
      const session = store.getSession(key);
      if (!session.success) {
        sendFailure(res, session);
        return;
      }
      res.json(toResponse(userEmail, sessionId, 'Instruction applied', session.data));
    }),
  );

  // POST /api/flowchart/undo — revert the last applied instruction
  router.post(
    '/undo',
    route(async (req, res) => {
      const body = requestBody(req);
      const userEmail = readString(body['userEmail']);
      if (!userEmail) {
        res.status(400).json({ error: 'Missing userEmail or sessionId' });
        return;
      }
      const sessionId = readSessionId(body['sessionId'], res);
      if (!sessionId) return;

      const key = sessionKeyFor(userEmail, sessionId);
      const undone = await store.undo(key);
      if (!undone.success) {
        sendFailure(res, undone);
        return;
      }
      const session = store.getSession(key);
      if (!session.success) {
        sendFailure(res, session);
        return;
      }
      res.json(toResponse(userEmail, sessionId, 'Last instruction undone', session.data));
    }),
  );

  // GET /api/flowchart/:sessionId/graph.dot — raw DOT text
  router.get('/:sessionId/graph.dot', (req, res) => {
    const userEmail = readString(req.query['userEmail']);
    if (!userEmail) {
      res.status(400).json({ error: 'Missing userEmail' });
      return;
    }
    const sessionId = readSessionId(req.params['sessionId'], res);
    if (!sessionId) return;

    const result = store.get(sessionKeyFor(userEmail, sessionId));
    if (!result.success) {
      sendFailure(res, result);
      return;
    }
    res.type('text/vnd.graphviz').send(serialize(result.data));
  });

  // GET /api/flowchart/:sessionId — graph text, history and open ends
  router.get('/:sessionId', (req, res) => {
    const userEmail = readString(req.query['userEmail']);
    if (!userEmail) {
      res.status(400).json({ error: 'Missing userEmail' });
      return;
    }
    const sessionId = readSessionId(req.params['sessionId'], res);
    if (!sessionId) return;

    const result = store.getSession(sessionKeyFor(userEmail, sessionId));
    if (!result.success) {
      sendFailure(res, result);
      return;
    }
    res.json(toResponse(userEmail, sessionId, 'Session loaded', result.data));
  });

  // DELETE /api/flowchart/:sessionId — drop a session
  router.delete(
    '/:sessionId',
    route(async (req, res) => {
      const userEmail = readString(req.query['userEmail']);
      if (!userEmail) {
        res.status(400).json({ error: 'Missing userEmail' });
        return;
      }
      const sessionId = readSessionId(req.params['sessionId'], res);
      if (!sessionId) return;

      const result = await store.delete(sessionKeyFor(userEmail, sessionId));
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.status(204).send();
    }),
  );

  return router;
}
