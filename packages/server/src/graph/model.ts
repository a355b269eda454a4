// ─── Flowchart graph model ──────────────────────────────────────────
//
// In-memory representation of one flowchart. Reads go through
// GraphView; writes only happen inside a transaction, which mutates a
// scratch copy (GraphDraft), validates it, and swaps it in. A failed
// transaction leaves the model exactly as it was.

import type { EdgeId, FlowEdge, FlowNode, GraphSnapshot, NodeId, NodeKind } from '@flowscribe/shared';
import { MAX_NODES_PER_GRAPH } from '@flowscribe/shared';
import { GraphIntegrityError } from './errors.js';

export interface GraphState {
  /** Insertion order doubles as creation order. */
  nodes: Map<NodeId, FlowNode>;
  edges: FlowEdge[];
  nextNodeSeq: number;
  nextEdgeSeq: number;
}

const NODE_ID_RE = /^n(\d+)$/;

function emptyState(): GraphState {
  return { nodes: new Map(), edges: [], nextNodeSeq: 1, nextEdgeSeq: 1 };
}

function cloneState(state: GraphState): GraphState {
  return {
    nodes: new Map([...state.nodes].map(([id, node]) => [id, { ...node }])),
    edges: state.edges.map((edge) => ({ ...edge })),
    nextNodeSeq: state.nextNodeSeq,
    nextEdgeSeq: state.nextEdgeSeq,
  };
}

/** Lowest node counter that cannot produce any `n<number>` id in `ids`. */
export function nodeSeqAfter(ids: Iterable<NodeId>): number {
  let seq = 1;
  for (const id of ids) {
    const match = NODE_ID_RE.exec(id);
    if (match?.[1]) seq = Math.max(seq, Number(match[1]) + 1);
  }
  return seq;
}

/** Case-insensitive, whitespace-trimmed form used to compare labels. */
export function labelKey(label: string): string {
  return label.trim().toLowerCase();
}

/**
 * Check every graph invariant against `state`.
 *
 * @throws {GraphIntegrityError} naming the first violated invariant.
 */
function assertValid(state: GraphState): void {
  if (state.nodes.size > MAX_NODES_PER_GRAPH) {
    throw new GraphIntegrityError(
      `graph has ${String(state.nodes.size)} nodes, limit is ${String(MAX_NODES_PER_GRAPH)}`,
    );
  }

  for (const [id, node] of state.nodes) {
    if (node.id !== id) {
      throw new GraphIntegrityError(`node "${node.id}" is stored under id "${id}"`);
    }
    if (!node.label.trim()) {
      throw new GraphIntegrityError(`node "${id}" has an empty label`);
    }
  }

  const inDegree = new Map<NodeId, number>();
  const outgoing = new Map<NodeId, FlowEdge[]>();
  const edgeIds = new Set<EdgeId>();

  for (const edge of state.edges) {
    if (edgeIds.has(edge.id)) {
      throw new GraphIntegrityError(`duplicate edge id "${edge.id}"`);
    }
    edgeIds.add(edge.id);
    if (!state.nodes.has(edge.from) || !state.nodes.has(edge.to)) {
      throw new GraphIntegrityError(
        `edge ${edge.from} -> ${edge.to} references a node that does not exist`,
      );
    }
    inDegree.set(edge.to, (inDegree.get(edge.to) ?? 0) + 1);
    const list = outgoing.get(edge.from) ?? [];
    list.push(edge);
    outgoing.set(edge.from, list);
  }

  if (state.nodes.size > 0) {
    const entries = [...state.nodes.keys()].filter((id) => !inDegree.has(id));
    if (entries.length !== 1) {
      throw new GraphIntegrityError(
        `expected exactly one entry node, found ${String(entries.length)}` +
          (entries.length > 0 ? ` (${entries.join(', ')})` : ''),
      );
    }
  }

  for (const [id, edges] of outgoing) {
    const node = state.nodes.get(id);
    if (!node) continue;
    if (node.kind !== 'decision') {
      if (edges.length > 1) {
        throw new GraphIntegrityError(
          `${node.kind} node "${id}" has ${String(edges.length)} outgoing edges`,
        );
      }
      continue;
    }
    const seen = new Set<string>();
    for (const edge of edges) {
      const key = labelKey(edge.label ?? '');
      if (!key) {
        throw new GraphIntegrityError(`decision node "${id}" has an unlabeled branch`);
      }
      if (seen.has(key)) {
        throw new GraphIntegrityError(
          `decision node "${id}" has two branches labeled "${edge.label ?? ''}"`,
        );
      }
      seen.add(key);
    }
  }
}

/** Read-only queries shared by the committed model and its drafts. */
export class GraphView {
  protected state: GraphState;

  constructor(state: GraphState) {
    this.state = state;
  }

  /** Nodes in creation order. */
  get nodes(): readonly FlowNode[] {
    return [...this.state.nodes.values()];
  }

  /** Edges in insertion order. */
  get edges(): readonly FlowEdge[] {
    return this.state.edges;
  }

  get size(): number {
    return this.state.nodes.size;
  }

  /** Counter behind the next generated node id. Never moves backwards. */
  get nextNodeSeq(): number {
    return this.state.nextNodeSeq;
  }

  isEmpty(): boolean {
    return this.state.nodes.size === 0;
  }

  getNode(id: NodeId): FlowNode | undefined {
    return this.state.nodes.get(id);
  }

  hasNode(id: NodeId): boolean {
    return this.state.nodes.has(id);
  }

  /** Position of `id` in creation order, or -1 when absent. */
  creationIndex(id: NodeId): number {
    return [...this.state.nodes.keys()].indexOf(id);
  }

  outgoing(id: NodeId): FlowEdge[] {
    return this.state.edges.filter((edge) => edge.from === id);
  }

  incoming(id: NodeId): FlowEdge[] {
    return this.state.edges.filter((edge) => edge.to === id);
  }

  successors(id: NodeId): NodeId[] {
    return this.outgoing(id).map((edge) => edge.to);
  }

  predecessors(id: NodeId): NodeId[] {
    return this.incoming(id).map((edge) => edge.from);
  }

  hasEdge(from: NodeId, to: NodeId): boolean {
    return this.state.edges.some((edge) => edge.from === from && edge.to === to);
  }

  /** The single node without incoming edges, or `null` for an empty graph. */
  get entry(): NodeId | null {
    const targets = new Set(this.state.edges.map((edge) => edge.to));
    for (const id of this.state.nodes.keys()) {
      if (!targets.has(id)) return id;
    }
    return null;
  }

  /** Nodes with no outgoing edge, in creation order. */
  computeFrontier(): NodeId[] {
    const sources = new Set(this.state.edges.map((edge) => edge.from));
    return [...this.state.nodes.keys()].filter((id) => !sources.has(id));
  }

  get frontier(): NodeId[] {
    return this.computeFrontier();
  }

  /** Nodes whose label matches case-insensitively, most recently created first. */
  findNodesByLabel(label: string): FlowNode[] {
    const key = labelKey(label);
    return this.nodes.filter((node) => labelKey(node.label) === key).reverse();
  }

  toSnapshot(): GraphSnapshot {
    return {
      nodes: this.nodes.map((node) => ({ ...node })),
      edges: this.state.edges.map(({ from, to, label }) =>
        label === undefined ? { from, to } : { from, to, label },
      ),
    };
  }
}

/**
 * Mutable scratch copy handed to {@link GraphModel.transact} callbacks.
 *
 * Mutators do not check invariants; the transaction validates once the
 * callback returns.
 */
export class GraphDraft extends GraphView {
  addNode(label: string, kind: NodeKind): NodeId {
    let id: NodeId;
    do {
      id = `n${String(this.state.nextNodeSeq++)}`;
    } while (this.state.nodes.has(id));
    this.state.nodes.set(id, { id, label, kind });
    return id;
  }

  addEdge(from: NodeId, to: NodeId, label?: string): EdgeId {
    const id = `e${String(this.state.nextEdgeSeq++)}`;
    this.state.edges.push(label === undefined ? { id, from, to } : { id, from, to, label });
    return id;
  }

  /** Remove a node and every edge touching it. */
  removeNode(id: NodeId): void {
    if (!this.state.nodes.delete(id)) {
      throw new GraphIntegrityError(`cannot remove unknown node "${id}"`);
    }
    this.state.edges = this.state.edges.filter((edge) => edge.from !== id && edge.to !== id);
  }

  /** Hand the draft's state over to a committed model. */
  commitState(): GraphState {
    return this.state;
  }
}

/**
 * A flowchart graph whose invariants hold between every call.
 *
 * @example
 * const graph = new GraphModel();
 * const start = graph.addNode('Receive Order', 'start');
 * graph.transact((draft) => {
 *   const check = draft.addNode('Check Stock', 'decision');
 *   draft.addEdge(start, check);
 * });
 */
export class GraphModel extends GraphView {
  constructor() {
    super(emptyState());
  }

  /**
   * Build a model from a structural snapshot, keeping the given node ids.
   *
   * The id counter resumes at `nextNodeSeq` when given, and never below
   * the highest `n<number>` id, so ids of removed nodes stay retired and
   * fresh nodes never collide with restored ones.
   *
   * @throws {GraphIntegrityError} if the snapshot breaks an invariant.
   */
  static fromSnapshot(snapshot: GraphSnapshot, nextNodeSeq = 1): GraphModel {
    const state = emptyState();
    for (const node of snapshot.nodes) {
      if (state.nodes.has(node.id)) {
        throw new GraphIntegrityError(`duplicate node id "${node.id}"`);
      }
      state.nodes.set(node.id, { id: node.id, label: node.label, kind: node.kind });
    }
    state.nextNodeSeq = Math.max(nextNodeSeq, nodeSeqAfter(state.nodes.keys()));
    for (const { from, to, label } of snapshot.edges) {
      const id = `e${String(state.nextEdgeSeq++)}`;
      state.edges.push(label === undefined ? { id, from, to } : { id, from, to, label });
    }
    assertValid(state);
    const model = new GraphModel();
    model.state = state;
    return model;
  }

  /** Independent copy; changes to either side never reach the other. */
  clone(): GraphModel {
    const copy = new GraphModel();
    copy.state = cloneState(this.state);
    return copy;
  }

  /** Move the node id counter forward to at least `seq`. */
  reserveNodeSeq(seq: number): void {
    this.state.nextNodeSeq = Math.max(this.state.nextNodeSeq, seq);
  }

  /**
   * Run `mutate` against a scratch copy, validate, then commit.
   *
   * Any error thrown by `mutate` or by validation propagates and the
   * model keeps its previous state.
   */
  transact<T>(mutate: (draft: GraphDraft) => T): T {
    const draft = new GraphDraft(cloneState(this.state));
    const result = mutate(draft);
    const next = draft.commitState();
    assertValid(next);
    this.state = next;
    return result;
  }

  addNode(label: string, kind: NodeKind): NodeId {
    return this.transact((draft) => draft.addNode(label, kind));
  }

  addEdge(from: NodeId, to: NodeId, label?: string): EdgeId {
    return this.transact((draft) => draft.addEdge(from, to, label));
  }

  removeNode(id: NodeId): void {
    this.transact((draft) => draft.removeNode(id));
  }

  /** @throws {GraphIntegrityError} if any invariant is violated. */
  validate(): void {
    assertValid(this.state);
  }
}
