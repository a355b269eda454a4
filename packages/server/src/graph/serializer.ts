// ─── Canonical DOT serializer ───────────────────────────────────────
//
// serialize() writes one statement per line: graph attributes, then
// nodes in creation order, then edges in insertion order. The output
// is stable for an unchanged graph, so session rows diff cleanly and
// Graphviz renders it as-is.
//
// When nodes have been removed, the id counter is written as the
// `next_node_seq` graph attribute (Graphviz ignores it) so retired ids
// stay retired across a round trip.
//
// deserialize() reads the subset of DOT that templates and stored
// sessions use: a single digraph with node statements, edge chains,
// graph attributes and default-attribute statements.

import type { FlowNode, GraphSnapshot, NodeKind } from '@flowscribe/shared';
import { FLOWCHART_NODE_COLORS, FLOWCHART_NODE_SHAPES, FLOWCHART_RANKDIR } from '@flowscribe/shared';
import { ParseError } from './errors.js';
import type { GraphView } from './model.js';
import { GraphModel, nodeSeqAfter } from './model.js';

// ─── Serialization ──────────────────────────────────────────────────

const BARE_ID_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
const KEYWORDS = new Set(['node', 'edge', 'graph', 'digraph', 'subgraph', 'strict']);
const NEXT_NODE_SEQ_ATTR = 'next_node_seq';

function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n');
  return `"${escaped}"`;
}

function formatId(id: string): string {
  return BARE_ID_RE.test(id) && !KEYWORDS.has(id.toLowerCase()) ? id : quote(id);
}

/**
 * Serialize `graph` to canonical DOT text.
 *
 * @example
 * serialize(graph);
 * // digraph flowchart {
 * //   rankdir="TB";
 * //   n1 [label="Receive Order", shape=ellipse, style=filled, fillcolor="#4CAF50"];
 * // }
 */
export function serialize(graph: GraphView): string {
  const lines = ['digraph flowchart {', `  rankdir=${quote(FLOWCHART_RANKDIR)};`];
  if (graph.nextNodeSeq > nodeSeqAfter(graph.nodes.map((node) => node.id))) {
    lines.push(`  ${NEXT_NODE_SEQ_ATTR}=${String(graph.nextNodeSeq)};`);
  }

  for (const node of graph.nodes) {
    const attrs = [
      `label=${quote(node.label)}`,
      `shape=${FLOWCHART_NODE_SHAPES[node.kind]}`,
      'style=filled',
      `fillcolor=${quote(FLOWCHART_NODE_COLORS[node.kind])}`,
    ];
    lines.push(`  ${formatId(node.id)} [${attrs.join(', ')}];`);
  }

  for (const edge of graph.edges) {
    const arrow = `${formatId(edge.from)} -> ${formatId(edge.to)}`;
    lines.push(
      edge.label === undefined ? `  ${arrow};` : `  ${arrow} [label=${quote(edge.label)}];`,
    );
  }

  lines.push('}');
  return `${lines.join('\n')}\n`;
}

// ─── Tokenizer ──────────────────────────────────────────────────────

type TokenType = 'id' | 'string' | 'punct' | 'arrow';

interface Token {
  type: TokenType;
  value: string;
  line: number;
}

const PUNCTUATION = new Set(['{', '}', '[', ']', '=', ';', ',']);
const ID_CHAR_RE = /[A-Za-z0-9_.]/;

function readQuoted(text: string, start: number, line: number): { value: string; end: number; lines: number } {
  let value = '';
  let i = start + 1;
  let lines = 0;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === '"') {
      return { value, end: i + 1, lines };
    }
    if (ch === '\\' && i + 1 < text.length) {
      const next = text.charAt(i + 1);
      if (next === '\n') {
        // line continuation
        lines++;
      } else if (next === 'n') {
        value += '\n';
      } else if (next === '"' || next === '\\') {
        value += next;
      } else {
        value += ch + next;
      }
      i += 2;
      continue;
    }
    if (ch === '\n') lines++;
    value += ch;
    i++;
  }
  throw new ParseError(line, 'unterminated string');
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let line = 1;
  let i = 0;
  let lineStart = true;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (ch === '\n') {
      line++;
      i++;
      lineStart = true;
      continue;
    }
    if (ch === ' ' || ch === '\t' || ch === '\r') {
      i++;
      continue;
    }

    // Comments: `//` and `/* */` anywhere, `#` only at the start of a line
    if ((ch === '/' && text.charAt(i + 1) === '/') || (ch === '#' && lineStart)) {
      while (i < text.length && text.charAt(i) !== '\n') i++;
      continue;
    }
    if (ch === '/' && text.charAt(i + 1) === '*') {
      const close = text.indexOf('*/', i + 2);
      if (close === -1) throw new ParseError(line, 'unterminated comment');
      for (let j = i; j < close; j++) {
        if (text.charAt(j) === '\n') line++;
      }
      i = close + 2;
      continue;
    }

    lineStart = false;

    if (ch === '-' && text.charAt(i + 1) === '>') {
      tokens.push({ type: 'arrow', value: '->', line });
      i += 2;
      continue;
    }
    if (ch === '-' && text.charAt(i + 1) === '-') {
      throw new ParseError(line, 'undirected edges ("--") are not allowed in a digraph');
    }
    if (PUNCTUATION.has(ch)) {
      tokens.push({ type: 'punct', value: ch, line });
      i++;
      continue;
    }
    if (ch === '"') {
      const { value, end, lines } = readQuoted(text, i, line);
      tokens.push({ type: 'string', value, line });
      line += lines;
      i = end;
      continue;
    }
    if (ch === '<') {
      throw new ParseError(line, 'HTML labels are not supported');
    }
    if (ID_CHAR_RE.test(ch) || ch === '-') {
      let end = i + 1;
      while (end < text.length && ID_CHAR_RE.test(text.charAt(end))) end++;
      tokens.push({ type: 'id', value: text.slice(i, end), line });
      i = end;
      continue;
    }
    throw new ParseError(line, `unexpected character "${ch}"`);
  }

  return tokens;
}

// ─── Parser ─────────────────────────────────────────────────────────

type Attributes = Map<string, string>;

interface PendingEdge {
  from: string;
  to: string;
  label?: string;
  line: number;
}

/** Shape names accepted on input, beyond the canonical ones. */
const SHAPE_KINDS: Record<string, NodeKind> = {
  ellipse: 'start',
  oval: 'start',
  circle: 'start',
  box: 'process',
  rect: 'process',
  rectangle: 'process',
  square: 'process',
  diamond: 'decision',
  octagon: 'end',
  doublecircle: 'end',
  doubleoctagon: 'end',
  msquare: 'end',
};

class DotParser {
  private pos = 0;
  private readonly nodeDefaults: Attributes = new Map();
  private readonly nodes = new Map<string, FlowNode>();
  private readonly edges: PendingEdge[] = [];
  private nextNodeSeq = 1;

  constructor(private readonly tokens: Token[]) {}

  parse(): { snapshot: GraphSnapshot; nextNodeSeq: number } {
    this.parseHeader();
    while (!this.atPunct('}')) {
      if (!this.peek()) {
        throw new ParseError(this.lastLine(), 'unexpected end of input, expected "}"');
      }
      this.parseStatement();
    }
    this.expectPunct('}');
    const trailing = this.peek();
    if (trailing) {
      throw new ParseError(trailing.line, `unexpected "${trailing.value}" after closing brace`);
    }

    for (const edge of this.edges) {
      for (const end of [edge.from, edge.to]) {
        if (!this.nodes.has(end)) {
          throw new ParseError(edge.line, `edge references undeclared node "${end}"`);
        }
      }
    }

    return {
      snapshot: {
        nodes: [...this.nodes.values()],
        edges: this.edges.map(({ from, to, label }) =>
          label === undefined ? { from, to } : { from, to, label },
        ),
      },
      nextNodeSeq: this.nextNodeSeq,
    };
  }

  private parseHeader(): void {
    let token = this.next('"digraph"');
    if (token.type === 'id' && token.value.toLowerCase() === 'strict') {
      token = this.next('"digraph"');
    }
    if (token.type !== 'id' || token.value.toLowerCase() !== 'digraph') {
      throw new ParseError(token.line, `expected "digraph", found "${token.value}"`);
    }
    const name = this.peek();
    if (name && (name.type === 'id' || name.type === 'string')) {
      this.pos++;
    }
    this.expectPunct('{');
  }

  private parseStatement(): void {
    const first = this.next('a statement');
    if (first.type === 'punct' && first.value === ';') return;
    if (first.type !== 'id' && first.type !== 'string') {
      throw new ParseError(first.line, `unexpected "${first.value}"`);
    }

    const keyword = first.type === 'id' ? first.value.toLowerCase() : '';
    if (keyword === 'subgraph') {
      throw new ParseError(first.line, 'subgraphs are not supported');
    }
    if (keyword === 'graph' || keyword === 'node' || keyword === 'edge') {
      const attrs = this.parseAttributes();
      if (keyword === 'node') {
        for (const [key, value] of attrs) this.nodeDefaults.set(key, value);
      }
      const seq = keyword === 'graph' ? attrs.get(NEXT_NODE_SEQ_ATTR) : undefined;
      if (seq !== undefined) this.setNextNodeSeq(seq, first.line);
      this.skipPunct(';');
      return;
    }

    if (this.atPunct('=')) {
      // graph attribute, e.g. rankdir="TB"
      this.pos++;
      const value = this.expectValue();
      if (first.value.toLowerCase() === NEXT_NODE_SEQ_ATTR) {
        this.setNextNodeSeq(value.value, value.line);
      }
      this.skipPunct(';');
      return;
    }

    if (this.peek()?.type === 'arrow') {
      const chain = [first.value];
      while (this.peek()?.type === 'arrow') {
        this.pos++;
        chain.push(this.expectValue().value);
      }
      const attrs = this.parseAttributes();
      const label = attrs.get('label');
      for (let i = 0; i + 1 < chain.length; i++) {
        const from = chain[i];
        const to = chain[i + 1];
        if (from === undefined || to === undefined) break;
        const line = first.line;
        this.edges.push(label === undefined ? { from, to, line } : { from, to, label, line });
      }
      this.skipPunct(';');
      return;
    }

    this.declareNode(first, this.parseAttributes());
    this.skipPunct(';');
  }

  private setNextNodeSeq(value: string, line: number): void {
    if (!/^[1-9]\d*$/.test(value)) {
      throw new ParseError(line, `${NEXT_NODE_SEQ_ATTR} must be a positive integer, found "${value}"`);
    }
    this.nextNodeSeq = Number(value);
  }

  private declareNode(idToken: Token, attrs: Attributes): void {
    const id = idToken.value;
    if (this.nodes.has(id)) {
      throw new ParseError(idToken.line, `node "${id}" is declared twice`);
    }
    const label = attrs.get('label') ?? this.nodeDefaults.get('label') ?? id;
    const shape = (attrs.get('shape') ?? this.nodeDefaults.get('shape') ?? 'box').toLowerCase();
    const kind = SHAPE_KINDS[shape];
    if (!kind) {
      throw new ParseError(idToken.line, `unsupported shape "${shape}" on node "${id}"`);
    }
    this.nodes.set(id, { id, label, kind });
  }

  private parseAttributes(): Attributes {
    const attrs: Attributes = new Map();
    while (this.atPunct('[')) {
      this.pos++;
      while (!this.atPunct(']')) {
        const key = this.expectValue();
        this.expectPunct('=');
        attrs.set(key.value.toLowerCase(), this.expectValue().value);
        if (this.atPunct(',') || this.atPunct(';')) this.pos++;
      }
      this.pos++;
    }
    return attrs;
  }

  // ── Token helpers ─────────────────────────────────────────────────

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private lastLine(): number {
    return this.tokens.at(-1)?.line ?? 1;
  }

  private next(expected: string): Token {
    const token = this.tokens[this.pos];
    if (!token) {
      throw new ParseError(this.lastLine(), `unexpected end of input, expected ${expected}`);
    }
    this.pos++;
    return token;
  }

  private atPunct(value: string): boolean {
    const token = this.peek();
    return token?.type === 'punct' && token.value === value;
  }

  private skipPunct(value: string): void {
    const token = this.peek();
    if (token?.type === 'punct' && token.value === value) this.pos++;
  }

  private expectPunct(value: string): void {
    const token = this.next(`"${value}"`);
    if (token.type !== 'punct' || token.value !== value) {
      throw new ParseError(token.line, `expected "${value}", found "${token.value}"`);
    }
  }

  private expectValue(): Token {
    const token = this.next('an identifier');
    if (token.type !== 'id' && token.type !== 'string') {
      throw new ParseError(token.line, `expected an identifier, found "${token.value}"`);
    }
    return token;
  }
}

/**
 * Parse canonical DOT text into a graph model.
 *
 * @throws {ParseError} on malformed syntax or an edge naming an undeclared node.
 * @throws {GraphIntegrityError} if the parsed graph breaks a graph invariant.
 */
export function deserialize(text: string): GraphModel {
  const { snapshot, nextNodeSeq } = new DotParser(tokenize(text)).parse();
  return GraphModel.fromSnapshot(snapshot, nextNodeSeq);
}
