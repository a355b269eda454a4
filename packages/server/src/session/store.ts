import type { SessionRecord, StoreFailure, StoreResult } from '@flowscribe/shared';
import { logger } from '@flowscribe/shared';
import { adaptDelta } from '../graph/adapter.js';
import { NothingToUndoError, SessionNotFoundError, isFlowchartError } from '../graph/errors.js';
import { mergeDelta } from '../graph/merger.js';
import { GraphModel } from '../graph/model.js';
import { deserialize, serialize } from '../graph/serializer.js';
import type { SessionRepository } from './database.js';
import { KeyedLock } from './keyedLock.js';

const log = logger('session');

/**
 * One user's flowchart and the instructions that built it.
 *
 * Values handed out by {@link SessionStore} are copies; changing them
 * never reaches the stored session.
 */
export interface Session {
  key: string;
  graph: GraphModel;
  history: string[];
  templateName: string | null;
  createdAt: number;
  updatedAt: number;
}

/** Source of predefined graphs for {@link SessionStore.loadTemplate}. */
export interface TemplateSource {
  /**
   * @throws {TemplateNotFoundError} if no template has this name.
   * @throws {ParseError} if the template text is malformed.
   */
  load(name: string): GraphModel;
}

/** An already-parsed graph to seed a new session with. */
export interface SessionTemplate {
  name: string;
  graph: GraphModel;
}

export interface SessionStoreOptions {
  repository: SessionRepository;
  templates: TemplateSource;
  /** Awaited while the session lock is held, right before each merge. */
  beforeMerge?: (sessionKey: string) => Promise<void> | void;
  /** Clock for `createdAt` / `updatedAt`. Defaults to `Date.now`. */
  now?: () => number;
}

/** State before the last merge, kept for a single-level undo. */
interface Checkpoint {
  graph: GraphModel;
  history: string[];
}

function copySession(session: Session): Session {
  return { ...session, graph: session.graph.clone(), history: [...session.history] };
}

/**
 * Keyed, lockable storage of one flowchart graph per session.
 *
 * Every operation that changes a session runs under that session's
 * lock (see {@link KeyedLock}) and follows the same order: compute the
 * next state, persist it, then swap it in. A failure at any step leaves
 * the session at its last committed state.
 *
 * Core errors come back as a failed {@link StoreResult}; anything else
 * (e.g. a database failure) is rethrown.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly checkpoints = new Map<string, Checkpoint>();
  private readonly locks = new KeyedLock();
  private readonly repository: SessionRepository;
  private readonly templates: TemplateSource;
  private readonly beforeMerge: ((sessionKey: string) => Promise<void> | void) | undefined;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.repository = options.repository;
    this.templates = options.templates;
    this.beforeMerge = options.beforeMerge;
    this.now = options.now ?? Date.now;
  }

  /** Number of sessions currently held in memory. */
  get size(): number {
    return this.sessions.size;
  }

  /**
   * Return the session for `sessionKey`, creating it when neither memory
   * nor the repository has it.
   *
   * A new session starts from a clone of `template.graph`, or empty.
   * An existing session is returned unchanged, whatever `template` says.
   */
  getOrCreate(sessionKey: string, template?: SessionTemplate): Session {
    const existing = this.lookup(sessionKey);
    if (existing) return copySession(existing);

    const now = this.now();
    const session: Session = {
      key: sessionKey,
      graph: template ? template.graph.clone() : new GraphModel(),
      history: [],
      templateName: template?.name ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.commit(session);
    log.info('session created', { key: sessionKey, template: session.templateName });
    return copySession(session);
  }

  /** Current graph of `sessionKey`. */
  get(sessionKey: string): StoreResult<GraphModel> {
    const result = this.getSession(sessionKey);
    return result.success ? { success: true, data: result.data.graph } : result;
  }

  /** Full session (graph, history, template) of `sessionKey`. */
  getSession(sessionKey: string): StoreResult<Session> {
    try {
      const session = this.lookup(sessionKey);
      if (!session) throw new SessionNotFoundError(sessionKey);
      return { success: true, data: copySession(session) };
    } catch (error: unknown) {
      return this.fail(sessionKey, 'get', error);
    }
  }

  /**
   * Validate `rawDelta`, merge it into the session's graph, append
   * `instruction` to the history and persist, all under the session lock.
   *
   * Calls for the same key are applied in call order.
   */
  applyInstruction(
    sessionKey: string,
    instruction: string,
    rawDelta: unknown,
  ): Promise<StoreResult<GraphModel>> {
    return this.locks.run<StoreResult<GraphModel>>(sessionKey, async () => {
      try {
        await this.beforeMerge?.(sessionKey);
        const session = this.require(sessionKey);
        const delta = adaptDelta(rawDelta, session.graph);
        const { graph, created, reused } = mergeDelta(session.graph, delta);

        this.commit({
          ...session,
          graph,
          history: [...session.history, instruction],
          updatedAt: this.now(),
        });
        this.checkpoints.set(sessionKey, { graph: session.graph, history: session.history });

        log.info('instruction applied', {
          key: sessionKey,
          created: created.length,
          reused: reused.length,
          nodes: graph.size,
        });
        return { success: true, data: graph.clone() };
      } catch (error: unknown) {
        return this.fail(sessionKey, 'applyInstruction', error);
      }
    });
  }

  /**
   * Replace the session's graph with the named template and clear its
   * history. Creates the session if it does not exist yet.
   */
  loadTemplate(sessionKey: string, templateName: string): Promise<StoreResult<GraphModel>> {
    return this.locks.run<StoreResult<GraphModel>>(sessionKey, () => {
      try {
        const graph = this.templates.load(templateName);
        const existing = this.lookup(sessionKey);
        const now = this.now();

        this.commit({
          key: sessionKey,
          graph,
          history: [],
          templateName,
          createdAt: existing?.createdAt ?? now,
          updatedAt: now,
        });
        this.checkpoints.delete(sessionKey);

        log.info('template loaded', { key: sessionKey, template: templateName, nodes: graph.size });
        return { success: true, data: graph.clone() };
      } catch (error: unknown) {
        return this.fail(sessionKey, 'loadTemplate', error);
      }
    });
  }

  /** Revert the last successful merge. Only one level is kept. */
  undo(sessionKey: string): Promise<StoreResult<GraphModel>> {
    return this.locks.run<StoreResult<GraphModel>>(sessionKey, () => {
      try {
        const session = this.require(sessionKey);
        const checkpoint = this.checkpoints.get(sessionKey);
        if (!checkpoint) throw new NothingToUndoError(sessionKey);

        // Ids handed out by the undone merge stay retired.
        const graph = checkpoint.graph.clone();
        graph.reserveNodeSeq(session.graph.nextNodeSeq);

        this.commit({
          ...session,
          graph,
          history: checkpoint.history,
          updatedAt: this.now(),
        });
        this.checkpoints.delete(sessionKey);

        log.info('merge undone', { key: sessionKey, nodes: graph.size });
        return { success: true, data: graph.clone() };
      } catch (error: unknown) {
        return this.fail(sessionKey, 'undo', error);
      }
    });
  }

  /** Remove the session from memory and from the repository. */
  delete(sessionKey: string): Promise<StoreResult<{ key: string }>> {
    return this.locks.run<StoreResult<{ key: string }>>(sessionKey, () => {
      try {
        this.require(sessionKey);
        this.repository.delete(sessionKey);
        this.sessions.delete(sessionKey);
        this.checkpoints.delete(sessionKey);
        log.info('session deleted', { key: sessionKey });
        return { success: true, data: { key: sessionKey } };
      } catch (error: unknown) {
        return this.fail(sessionKey, 'delete', error);
      }
    });
  }

  // ── Internals ─────────────────────────────────────────────────────

  /** In-memory session, rehydrated from the repository on first access. */
  private lookup(sessionKey: string): Session | null {
    const cached = this.sessions.get(sessionKey);
    if (cached) return cached;

    const record = this.repository.load(sessionKey);
    if (!record) return null;

    const session: Session = {
      key: record.key,
      graph: deserialize(record.graphText),
      history: record.history,
      templateName: record.templateName,
      createdAt: record.createdAt,
      updatedAt: record.updatedAt,
    };
    this.sessions.set(sessionKey, session);
    log.debug('session rehydrated', { key: sessionKey, nodes: session.graph.size });
    return session;
  }

  private require(sessionKey: string): Session {
    const session = this.lookup(sessionKey);
    if (!session) throw new SessionNotFoundError(sessionKey);
    return session;
  }

  /** Persist first, then swap in, so memory never runs ahead of storage. */
  private commit(session: Session): void {
    const record: SessionRecord = {
      key: session.key,
      graphText: serialize(session.graph),
      history: session.history,
      templateName: session.templateName,
      createdAt: session.createdAt,
      updatedAt: session.updatedAt,
    };
    this.repository.save(record);
    this.sessions.set(session.key, session);
  }

  private fail(sessionKey: string, operation: string, error: unknown): StoreFailure {
    if (!isFlowchartError(error)) {
      log.error(`${operation} failed`, {
        key: sessionKey,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
    const level = error.tag === 'GraphIntegrityError' ? 'error' : 'warn';
    log[level](`${operation} rejected`, { key: sessionKey, error: error.tag, reason: error.message });
    return { success: false, error: error.tag, message: error.message };
  }
}
