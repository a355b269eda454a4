import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type BetterSqlite3 from 'better-sqlite3';
import type { RawDelta, SessionRecord } from '@flowscribe/shared';
import { BUNDLED_TEMPLATE_DIR } from '../config.js';
import { serialize } from '../graph/serializer.js';
import { FileTemplateCatalog } from '../templates/catalog.js';
import type { SessionRepository } from './database.js';
import { SqliteSessionRepository, setupDatabase } from './database.js';
import { SessionStore } from './store.js';

// ─── Test helpers ────────────────────────────────────────────────────

const KEY = 'ada_example_com:s1';
const templates = new FileTemplateCatalog(BUNDLED_TEMPLATE_DIR);

let db: BetterSqlite3.Database;
let repository: SqliteSessionRepository;

function step(label: string, kind: RawDelta['newSteps'][number]['kind'] = 'process'): RawDelta {
  return { newSteps: [{ label, kind }] };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** In-memory repository whose saves can be made to fail. */
class FlakyRepository implements SessionRepository {
  readonly records = new Map<string, SessionRecord>();
  failSaves = false;

  load(key: string): SessionRecord | null {
    return this.records.get(key) ?? null;
  }
  save(record: SessionRecord): void {
    if (this.failSaves) throw new Error('disk full');
    this.records.set(record.key, { ...record, history: [...record.history] });
  }
  delete(key: string): void {
    this.records.delete(key);
  }
  count(): number {
    return this.records.size;
  }
}

beforeEach(() => {
  db = setupDatabase(':memory:');
  repository = new SqliteSessionRepository(db);
});

afterEach(() => {
  db.close();
});

// ─── Lifecycle ──────────────────────────────────────────────────────

describe('SessionStore — getOrCreate and get', () => {
  it('creates an empty session and persists it', () => {
    const store = new SessionStore({ repository, templates, now: () => 42 });
    const session = store.getOrCreate(KEY);

    expect(session.graph.isEmpty()).toBe(true);
    expect(session.history).toEqual([]);
    expect(session.templateName).toBeNull();
    expect(repository.load(KEY)).toEqual({
      key: KEY,
      graphText: 'digraph flowchart {\n  rankdir="TB";\n}\n',
      history: [],
      templateName: null,
      createdAt: 42,
      updatedAt: 42,
    });
  });

  it('returns the existing session on a second call', async () => {
    const store = new SessionStore({ repository, templates });
    store.getOrCreate(KEY);
    await store.applyInstruction(KEY, 'start', step('Begin', 'start'));

    const again = store.getOrCreate(KEY, { name: 'simple_process', graph: templates.load('simple_process') });
    expect(again.templateName).toBeNull();
    expect(again.history).toEqual(['start']);
  });

  it('seeds a new session from a template graph', () => {
    const store = new SessionStore({ repository, templates });
    const session = store.getOrCreate(KEY, {
      name: 'simple_process',
      graph: templates.load('simple_process'),
    });
    expect(session.templateName).toBe('simple_process');
    expect(session.graph.size).toBe(3);
  });

  it('hands out copies', () => {
    const store = new SessionStore({ repository, templates });
    const session = store.getOrCreate(KEY);
    session.graph.addNode('Stray', 'start');
    session.history.push('not recorded');

    const current = store.getSession(KEY);
    expect(current.success && current.data.graph.size).toBe(0);
    expect(current.success && current.data.history).toEqual([]);
  });

  it('reports an unknown session', () => {
    const store = new SessionStore({ repository, templates });
    expect(store.get('nobody:s1')).toEqual({
      success: false,
      error: 'SessionNotFoundError',
      message: 'Session "nobody:s1" not found',
    });
  });

  it('rehydrates a session written by another store', async () => {
    const first = new SessionStore({ repository, templates });
    first.getOrCreate(KEY);
    await first.applyInstruction(KEY, 'start', step('Begin', 'start'));
    await first.applyInstruction(KEY, 'then work', step('Work'));

    const second = new SessionStore({ repository, templates });
    const result = second.getSession(KEY);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.history).toEqual(['start', 'then work']);
    expect(result.data.graph.toSnapshot().nodes.map((node) => node.label)).toEqual(['Begin', 'Work']);
  });
});

// ─── applyInstruction ───────────────────────────────────────────────

describe('SessionStore — applyInstruction', () => {
  it('merges the delta and records the instruction', async () => {
    const store = new SessionStore({ repository, templates, now: () => 7 });
    store.getOrCreate(KEY);

    const result = await store.applyInstruction(KEY, 'start with receiving an order', step('Receive Order', 'start'));
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.frontier).toEqual(['n1']);

    const stored = repository.load(KEY);
    expect(stored?.history).toEqual(['start with receiving an order']);
    expect(stored?.graphText).toBe(serialize(result.data));
  });

  it('rejects an unknown session', async () => {
    const store = new SessionStore({ repository, templates });
    const result = await store.applyInstruction('nobody:s1', 'start', step('Begin', 'start'));
    expect(result).toEqual({
      success: false,
      error: 'SessionNotFoundError',
      message: 'Session "nobody:s1" not found',
    });
  });

  it('leaves the session untouched when the delta is invalid', async () => {
    const store = new SessionStore({ repository, templates });
    store.getOrCreate(KEY);
    await store.applyInstruction(KEY, 'start', step('Begin', 'start'));

    const result = await store.applyInstruction(KEY, 'gibberish', { newSteps: [] });
    expect(result).toEqual({
      success: false,
      error: 'DeltaSchemaError',
      message: 'Delta does not match schema: /newSteps must NOT have fewer than 1 items',
    });

    const session = store.getSession(KEY);
    expect(session.success && session.data.history).toEqual(['start']);
    expect(session.success && session.data.graph.size).toBe(1);
  });

  it('reports a branch that cannot attach', async () => {
    const store = new SessionStore({ repository, templates });
    store.getOrCreate(KEY);
    await store.applyInstruction(KEY, 'start', step('Begin', 'start'));

    const result = await store.applyInstruction(KEY, 'if yes pay', {
      newSteps: [{ label: 'Pay', kind: 'process', branchLabel: 'Yes' }],
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBe('InvalidBranchError');
  });

  it('serializes concurrent instructions for one session in call order', async () => {
    let active = 0;
    let maxActive = 0;
    const store = new SessionStore({
      repository,
      templates,
      beforeMerge: async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await sleep(5);
        active--;
      },
    });
    store.getOrCreate(KEY);

    const instructions = ['step 1', 'step 2', 'step 3', 'step 4', 'step 5'];
    const results = await Promise.all(
      instructions.map((instruction, i) =>
        store.applyInstruction(KEY, instruction, step(`Step ${String(i + 1)}`)),
      ),
    );

    expect(results.every((result) => result.success)).toBe(true);
    expect(maxActive).toBe(1);
    const session = store.getSession(KEY);
    expect(session.success && session.data.history).toEqual(instructions);
    expect(session.success && session.data.graph.edges.map(({ from, to }) => `${from}->${to}`)).toEqual([
      'n1->n2',
      'n2->n3',
      'n3->n4',
      'n4->n5',
    ]);
  });

  it('never makes one session wait for another', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const store = new SessionStore({
      repository,
      templates,
      beforeMerge: (key) => (key === 'slow:s1' ? gate : undefined),
    });
    store.getOrCreate('slow:s1');
    store.getOrCreate('fast:s1');

    const slow = store.applyInstruction('slow:s1', 'start', step('Begin', 'start'));
    const fast = await store.applyInstruction('fast:s1', 'start', step('Begin', 'start'));
    expect(fast.success).toBe(true);

    release();
    expect((await slow).success).toBe(true);
  });

  it('rethrows storage failures and keeps the last committed state', async () => {
    const flaky = new FlakyRepository();
    const store = new SessionStore({ repository: flaky, templates });
    store.getOrCreate(KEY);
    await store.applyInstruction(KEY, 'start', step('Begin', 'start'));

    flaky.failSaves = true;
    await expect(store.applyInstruction(KEY, 'then work', step('Work'))).rejects.toThrow('disk full');

    const session = store.getSession(KEY);
    expect(session.success && session.data.history).toEqual(['start']);

    flaky.failSaves = false;
    const retried = await store.applyInstruction(KEY, 'then work', step('Work'));
    expect(retried.success).toBe(true);
    expect(flaky.records.get(KEY)?.history).toEqual(['start', 'then work']);
  });
});

// ─── Templates, undo and delete ─────────────────────────────────────

describe('SessionStore — loadTemplate', () => {
  it('creates a session from a template with an empty history', async () => {
    const store = new SessionStore({ repository, templates });
    const result = await store.loadTemplate(KEY, 'order_fulfillment');

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.size).toBe(6);
    expect(repository.load(KEY)?.templateName).toBe('order_fulfillment');
    expect(repository.load(KEY)?.history).toEqual([]);
  });

  it('replaces the graph of an existing session and clears its history', async () => {
    const store = new SessionStore({ repository, templates });
    store.getOrCreate(KEY);
    await store.applyInstruction(KEY, 'start', step('Begin', 'start'));

    await store.loadTemplate(KEY, 'support_ticket');
    const session = store.getSession(KEY);
    expect(session.success && session.data.history).toEqual([]);
    expect(session.success && session.data.graph.getNode('n1')?.label).toBe('Ticket Opened');
  });

  it('reports an unknown template', async () => {
    const store = new SessionStore({ repository, templates });
    expect(await store.loadTemplate(KEY, 'nope')).toEqual({
      success: false,
      error: 'TemplateNotFoundError',
      message: 'Template "nope" not found',
    });
    expect(repository.count()).toBe(0);
  });
});

describe('SessionStore — undo', () => {
  it('restores the graph and history before the last merge, once', async () => {
    const store = new SessionStore({ repository, templates });
    store.getOrCreate(KEY);
    await store.applyInstruction(KEY, 'start', step('Begin', 'start'));
    await store.applyInstruction(KEY, 'then work', step('Work'));

    const undone = await store.undo(KEY);
    expect(undone.success && undone.data.size).toBe(1);
    expect(repository.load(KEY)?.history).toEqual(['start']);

    expect(await store.undo(KEY)).toEqual({
      success: false,
      error: 'NothingToUndoError',
      message: `Session "${KEY}" has no merge to undo`,
    });
  });

  it('never hands out the id of an undone node again', async () => {
    const store = new SessionStore({ repository, templates });
    store.getOrCreate(KEY);
    await store.applyInstruction(KEY, 'start', step('Begin', 'start'));
    await store.applyInstruction(KEY, 'then work', step('Work'));
    await store.undo(KEY);

    const result = await store.applyInstruction(KEY, 'then review', step('Review'));
    expect(result.success && result.data.frontier).toEqual(['n3']);
  });

  it('keeps the ids of undone nodes retired, also after a restart', async () => {
    const store = new SessionStore({ repository, templates });
    store.getOrCreate(KEY);
    await store.applyInstruction(KEY, 'start', step('Begin', 'start'));
    await store.applyInstruction(KEY, 'then work', step('Work'));
    await store.undo(KEY);

    expect(repository.load(KEY)?.graphText).toContain('  next_node_seq=3;\n');

    const restarted = new SessionStore({ repository, templates });
    const result = await restarted.applyInstruction(KEY, 'then review', step('Review'));
    expect(result.success && result.data.frontier).toEqual(['n3']);
  });

  it('has nothing to undo right after a template load', async () => {
    const store = new SessionStore({ repository, templates });
    store.getOrCreate(KEY);
    await store.applyInstruction(KEY, 'start', step('Begin', 'start'));
    await store.loadTemplate(KEY, 'simple_process');

    const result = await store.undo(KEY);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBe('NothingToUndoError');
  });
});

describe('SessionStore — delete', () => {
  it('removes the session from memory and storage', async () => {
    const store = new SessionStore({ repository, templates });
    store.getOrCreate(KEY);

    expect(await store.delete(KEY)).toEqual({ success: true, data: { key: KEY } });
    expect(store.size).toBe(0);
    expect(repository.count()).toBe(0);
    expect(store.get(KEY).success).toBe(false);
  });

  it('reports an unknown session', async () => {
    const store = new SessionStore({ repository, templates });
    const result = await store.delete('nobody:s1');
    expect(result.success).toBe(false);
  });
});
