import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { DEFAULT_INTERPRETER_MODEL } from '@flowscribe/shared';

/** Templates shipped with the server package. */
export const BUNDLED_TEMPLATE_DIR = fileURLToPath(new URL('../templates', import.meta.url));

export interface ServerConfig {
  port: number;
  corsOrigin: string;
  dbPath: string;
  templateDir: string;
  anthropicModel: string;
}

/**
 * Read server settings from the environment (after `dotenv/config`).
 *
 * | Variable          | Default                          |
 * |-------------------|----------------------------------|
 * | `PORT`            | `3001`                           |
 * | `CORS_ORIGIN`     | `http://localhost:5173`          |
 * | `DB_PATH`         | `<cwd>/flowscribe.sqlite`        |
 * | `TEMPLATE_DIR`    | `packages/server/templates`      |
 * | `ANTHROPIC_MODEL` | `claude-haiku-4-5-20251001`      |
 *
 * @throws {Error} if `PORT` is not an integer between 1 and 65535.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const rawPort = env['PORT'] ?? '3001';
  const port = Number(rawPort);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid PORT "${rawPort}"`);
  }

  return {
    port,
    corsOrigin: env['CORS_ORIGIN'] ?? 'http://localhost:5173',
    dbPath: env['DB_PATH'] ?? path.join(process.cwd(), 'flowscribe.sqlite'),
    templateDir: env['TEMPLATE_DIR'] ?? BUNDLED_TEMPLATE_DIR,
    anthropicModel: env['ANTHROPIC_MODEL'] ?? DEFAULT_INTERPRETER_MODEL,
  };
}
