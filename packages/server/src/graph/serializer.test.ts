import { readFileSync } from 'node:fs';
import { describe, expect, it } from 'vitest';
import { ParseError } from './errors.js';
import { GraphModel } from './model.js';
import { deserialize, serialize } from './serializer.js';

function parseError(text: string): ParseError {
  try {
    deserialize(text);
  } catch (err: unknown) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error('expected a ParseError');
}

// ─── serialize ──────────────────────────────────────────────────────

describe('serialize', () => {
  it('writes an empty graph as header and closing brace', () => {
    expect(serialize(new GraphModel())).toBe('digraph flowchart {\n  rankdir="TB";\n}\n');
  });

  it('writes nodes then edges, one statement per line', () => {
    const graph = GraphModel.fromSnapshot({
      nodes: [
        { id: 'n1', label: 'Begin', kind: 'start' },
        { id: 'n2', label: 'Approved?', kind: 'decision' },
        { id: 'n3', label: 'Done', kind: 'end' },
      ],
      edges: [
        { from: 'n1', to: 'n2' },
        { from: 'n2', to: 'n3', label: 'Yes' },
      ],
    });
    expect(serialize(graph)).toBe(
      [
        'digraph flowchart {',
        '  rankdir="TB";',
        '  n1 [label="Begin", shape=ellipse, style=filled, fillcolor="#4CAF50"];',
        '  n2 [label="Approved?", shape=diamond, style=filled, fillcolor="#FF9800"];',
        '  n3 [label="Done", shape=octagon, style=filled, fillcolor="#E91E63"];',
        '  n1 -> n2;',
        '  n2 -> n3 [label="Yes"];',
        '}',
        '',
      ].join('\n'),
    );
  });

  it('escapes quotes, backslashes and newlines in labels', () => {
    const graph = GraphModel.fromSnapshot({
      nodes: [{ id: 'n1', label: 'Say "hi"\nto C:\\temp', kind: 'process' }],
      edges: [],
    });
    expect(serialize(graph)).toContain(
      '  n1 [label="Say \\"hi\\"\\nto C:\\\\temp", shape=box, style=filled, fillcolor="#2196F3"];',
    );
  });

  it('quotes ids that are not plain identifiers', () => {
    const graph = GraphModel.fromSnapshot({
      nodes: [
        { id: 'step-1', label: 'Begin', kind: 'start' },
        { id: 'step 2', label: 'Work', kind: 'process' },
      ],
      edges: [{ from: 'step-1', to: 'step 2' }],
    });
    const text = serialize(graph);
    expect(text).toContain('  "step-1" -> "step 2";');
    expect(deserialize(text).toSnapshot()).toEqual(graph.toSnapshot());
  });

  it('quotes ids that spell a DOT keyword in any case', () => {
    const text = [
      'digraph flowchart {',
      '  "node" [label="Start", shape=ellipse];',
      '  "Graph" [label="Work", shape=box];',
      '  x [label="Done", shape=octagon];',
      '  "node" -> "Graph";',
      '  "Graph" -> x;',
      '}',
    ].join('\n');
    const written = serialize(deserialize(text));

    expect(written).toContain(
      '  "node" [label="Start", shape=ellipse, style=filled, fillcolor="#4CAF50"];',
    );
    expect(written).toContain('  "node" -> "Graph";\n  "Graph" -> x;\n');
    expect(serialize(deserialize(written))).toBe(written);
  });

  it('writes the id counter once nodes have been removed', () => {
    const graph = new GraphModel();
    graph.transact((draft) => {
      draft.addEdge(draft.addNode('A', 'start'), draft.addNode('B', 'process'));
    });
    graph.removeNode('n2');

    const text = serialize(graph);
    expect(text).toBe(
      [
        'digraph flowchart {',
        '  rankdir="TB";',
        '  next_node_seq=3;',
        '  n1 [label="A", shape=ellipse, style=filled, fillcolor="#4CAF50"];',
        '}',
        '',
      ].join('\n'),
    );

    const restored = deserialize(text);
    expect(serialize(restored)).toBe(text);
    const id = restored.transact((draft) => {
      const next = draft.addNode('C', 'process');
      draft.addEdge('n1', next);
      return next;
    });
    expect(id).toBe('n3');
  });
});

// ─── deserialize ────────────────────────────────────────────────────

describe('deserialize', () => {
  it.each(['order_fulfillment', 'simple_process', 'support_ticket'])(
    'reads the %s template back to identical text',
    (name) => {
      const text = readFileSync(new URL(`../../templates/${name}.dot`, import.meta.url), 'utf8');
      expect(serialize(deserialize(text))).toBe(text);
    },
  );

  it('round-trips escaped labels', () => {
    const graph = GraphModel.fromSnapshot({
      nodes: [
        { id: 'n1', label: 'Say "hi"\nto C:\\temp', kind: 'start' },
        { id: 'n2', label: 'Is it 5 o\'clock?', kind: 'decision' },
        { id: 'n3', label: 'Go home', kind: 'end' },
      ],
      edges: [
        { from: 'n1', to: 'n2' },
        { from: 'n2', to: 'n3', label: 'Yes, "finally"' },
      ],
    });
    expect(deserialize(serialize(graph)).toSnapshot()).toEqual(graph.toSnapshot());
  });

  it('accepts comments, defaults, graph attributes and edge chains', () => {
    const graph = deserialize(
      [
        '// drawn by hand',
        'strict digraph "Support" {',
        '  node [shape=box];',
        '  rankdir=LR;',
        '  /* entry */',
        '  open [shape=oval, label="Open"];',
        '  triage;',
        '# line comment',
        '  open -> triage -> done;',
        '  done [shape=doublecircle];',
        '}',
      ].join('\n'),
    );
    expect(graph.toSnapshot()).toEqual({
      nodes: [
        { id: 'open', label: 'Open', kind: 'start' },
        { id: 'triage', label: 'triage', kind: 'process' },
        { id: 'done', label: 'done', kind: 'end' },
      ],
      edges: [
        { from: 'open', to: 'triage' },
        { from: 'triage', to: 'done' },
      ],
    });
  });

  it('resumes node numbering after parsed ids', () => {
    const graph = deserialize(
      readFileSync(new URL('../../templates/support_ticket.dot', import.meta.url), 'utf8'),
    );
    const id = graph.transact((draft) => {
      const next = draft.addNode('Survey', 'process');
      draft.addEdge(next, next);
      return next;
    });
    expect(id).toBe('n7');
  });
});

describe('deserialize — errors', () => {
  it('rejects an id counter that is not a positive integer', () => {
    const err = parseError('digraph {\n  next_node_seq=0;\n}');
    expect(err.line).toBe(2);
    expect(err.reason).toBe('next_node_seq must be a positive integer, found "0"');
  });

  it('reports an edge to an undeclared node on the edge line', () => {
    const err = parseError('digraph {\n  a [shape=box];\n  a -> b;\n}');
    expect(err.line).toBe(3);
    expect(err.message).toBe('Parse error on line 3: edge references undeclared node "b"');
  });

  it('rejects an undirected graph header', () => {
    expect(parseError('graph G {\n}').message).toBe(
      'Parse error on line 1: expected "digraph", found "graph"',
    );
  });

  it('rejects undirected edges', () => {
    expect(parseError('digraph {\n  a;\n  b;\n  a -- b;\n}').line).toBe(4);
  });

  it('rejects an unterminated string on the line it starts', () => {
    expect(parseError('digraph {\n  a [label="oops];\n}').message).toBe(
      'Parse error on line 2: unterminated string',
    );
  });

  it('rejects a missing closing brace', () => {
    expect(parseError('digraph {\n  a;\n').message).toBe(
      'Parse error on line 2: unexpected end of input, expected "}"',
    );
  });

  it('rejects shapes with no node kind', () => {
    expect(parseError('digraph {\n  a [shape=star];\n}').message).toBe(
      'Parse error on line 2: unsupported shape "star" on node "a"',
    );
  });

  it('rejects a node declared twice', () => {
    expect(parseError('digraph {\n  a;\n  a [label="Again"];\n}').message).toBe(
      'Parse error on line 3: node "a" is declared twice',
    );
  });

  it('rejects subgraphs and HTML labels', () => {
    expect(parseError('digraph {\n  subgraph cluster_a { a; }\n}').message).toBe(
      'Parse error on line 2: subgraphs are not supported',
    );
    expect(parseError('digraph {\n  a [label=<b>x</b>];\n}').message).toBe(
      'Parse error on line 2: HTML labels are not supported',
    );
  });

  it('rejects text after the closing brace', () => {
    expect(parseError('digraph {\n  a;\n}\nextra').message).toBe(
      'Parse error on line 4: unexpected "extra" after closing brace',
    );
  });
});
