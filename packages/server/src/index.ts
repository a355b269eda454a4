import 'dotenv/config';
import { createServer } from 'node:http';
import Anthropic from '@anthropic-ai/sdk';
import { logger } from '@flowscribe/shared';
import { AnthropicInterpreter, anthropicCompletionClient } from './ai/interpreter.js';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createRateLimiter } from './middleware/rateLimit.js';
import { SqliteSessionRepository, setupDatabase } from './session/database.js';
import { SessionStore } from './session/store.js';
import { FileTemplateCatalog } from './templates/catalog.js';

const log = logger('server');
const config = loadConfig();

// Initialize SQLite database for persistence
const db = setupDatabase(config.dbPath);
const repository = new SqliteSessionRepository(db);
const templates = new FileTemplateCatalog(config.templateDir);
const store = new SessionStore({ repository, templates });
const interpreter = new AnthropicInterpreter(
  anthropicCompletionClient(new Anthropic(), config.anthropicModel),
);

const app = createApp({
  store,
  repository,
  interpreter,
  templates,
  corsOrigin: config.corsOrigin,
  instructionLimiter: createRateLimiter(),
});

const httpServer = createServer(app);

httpServer.listen(config.port, () => {
  log.info(`HTTP server running on port ${String(config.port)}`, {
    templates: templates.list().length,
    model: config.anthropicModel,
  });
});

// ── Graceful shutdown ────────────────────────────────────────────────
let shuttingDown = false;

/**
 * Shut down in response to a POSIX signal: stop accepting connections,
 * let in-flight requests finish, close SQLite, exit.
 *
 * A 10-second hard-exit timer guarantees the process terminates even if
 * a request hangs. Only the first signal starts the sequence.
 */
function shutdown(signal: string): void {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info(`${signal} received, shutting down`);

  httpServer.close((err) => {
    if (err) {
      log.error('HTTP server close error', { error: err.message });
    } else {
      log.info('HTTP server closed');
    }
    db.close();
    log.info('Database closed');
    process.exit(err ? 1 : 0);
  });

  // Hard exit if graceful shutdown takes too long
  setTimeout(() => {
    log.error('Forced exit after timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export { app };
