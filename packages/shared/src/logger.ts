// ─── Logger ─────────────────────────────────────────────────────────
//
// Console logger with a namespace prefix per call site:
//
//   const log = logger('merge');
//   log.debug('reused node', { id, label });   // [merge] reused node { ... }
//
// info, warn and error always print. Debug output is filtered by
// FLOWSCRIBE_DEBUG, read on every call:
//
//   unset or ''         every namespace
//   false | 0           none
//   true | 1 | *        every namespace
//   merge,session       only the listed namespaces

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogFn = (message: string, data?: Record<string, unknown>) => void;

export type Logger = Record<LogLevel, LogFn>;

type DebugFilter =
  | { mode: 'all' }
  | { mode: 'none' }
  | { mode: 'only'; namespaces: Set<string> };

function readDebugFilter(): DebugFilter {
  const raw = (process.env['FLOWSCRIBE_DEBUG'] ?? '').trim();
  switch (raw) {
    case '':
    case 'true':
    case '1':
    case '*':
      return { mode: 'all' };
    case 'false':
    case '0':
      return { mode: 'none' };
    default:
      return {
        mode: 'only',
        namespaces: new Set(raw.split(',').map((name) => name.trim())),
      };
  }
}

function debugEnabled(namespace: string): boolean {
  const filter = readDebugFilter();
  if (filter.mode === 'only') return filter.namespaces.has(namespace);
  return filter.mode === 'all';
}

function emitter(
  level: LogLevel,
  namespace: string,
  write: (...args: unknown[]) => void,
): LogFn {
  const prefix = `[${namespace}]`;
  return (message, data) => {
    if (level === 'debug' && !debugEnabled(namespace)) return;
    if (data === undefined) {
      write(prefix, message);
    } else {
      write(prefix, message, data);
    }
  };
}

/**
 * Namespaced logger. Debug lines go to `console.log`, the other levels
 * to the console method of the same name.
 *
 * @example
 * const log = logger('session');
 * log.warn('merge rejected', { key, error: 'InvalidBranchError' });
 */
export function logger(namespace: string): Logger {
  return {
    debug: emitter('debug', namespace, console.log.bind(console)),
    info: emitter('info', namespace, console.info.bind(console)),
    warn: emitter('warn', namespace, console.warn.bind(console)),
    error: emitter('error', namespace, console.error.bind(console)),
  };
}
