// ─── Flowchart Graph Types, Delta Schema & Rendering Constants ──────
//
// A flowchart is built incrementally: every instruction is turned into
// a *delta* (new steps, optional attach hint) which the server merges
// into the session's graph. These types are the contract between the
// interpreter, the merge engine and API consumers.

import { MAX_BRANCH_LABEL_LENGTH, MAX_LABEL_LENGTH, MAX_STEPS_PER_DELTA } from './constants.js';

// ─── Graph types ────────────────────────────────────────────────────

/** Every node kind a flowchart can contain. */
export const NODE_KINDS = ['start', 'process', 'decision', 'end'] as const;

export type NodeKind = (typeof NODE_KINDS)[number];

export type NodeId = string;
export type EdgeId = string;

/** A node in the flowchart graph. */
export interface FlowNode {
  /** Assigned by the graph model; never reused within a model. */
  id: NodeId;
  /** Display text. Also the de-duplication key during merges. */
  label: string;
  kind: NodeKind;
}

/** A directed edge between two nodes of the same graph. */
export interface FlowEdge {
  id: EdgeId;
  from: NodeId;
  to: NodeId;
  /** Branch condition, e.g. "Yes" / "No" on decision edges. */
  label?: string;
}

/**
 * Structural view of a graph: the fields that take part in equality.
 *
 * Edge ids are positional and therefore left out.
 */
export interface GraphSnapshot {
  nodes: FlowNode[];
  edges: Omit<FlowEdge, 'id'>[];
}

// ─── Delta types ────────────────────────────────────────────────────

/**
 * One step as the interpreter proposes it, before validation.
 *
 * `branchLabel` marks the step as an alternative outgoing edge of the
 * current decision node.
 */
export interface RawDeltaStep {
  label: string;
  kind: NodeKind;
  branchLabel?: string;
}

/** The interpreter's output for one instruction. */
export interface RawDelta {
  newSteps: RawDeltaStep[];
  /** Node id or label hint naming where the steps should attach. */
  attachTo?: string;
}

// ─── JSON Schema ────────────────────────────────────────────────────

export const FLOWCHART_DELTA_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  title: 'FlowchartDelta',
  type: 'object',
  additionalProperties: false,
  required: ['newSteps'],
  properties: {
    newSteps: {
      type: 'array',
      minItems: 1,
      maxItems: MAX_STEPS_PER_DELTA,
      items: { $ref: '#/definitions/step' },
    },
    attachTo: { type: 'string', maxLength: MAX_LABEL_LENGTH },
  },
  definitions: {
    step: {
      type: 'object',
      additionalProperties: false,
      required: ['label', 'kind'],
      properties: {
        label: { type: 'string', minLength: 1, maxLength: MAX_LABEL_LENGTH },
        kind: { enum: NODE_KINDS },
        branchLabel: { type: 'string', maxLength: MAX_BRANCH_LABEL_LENGTH },
      },
    },
  },
} as const;

// ─── Rendering constants ────────────────────────────────────────────

/**
 * Graphviz shape per node kind in the canonical DOT output.
 *
 * Each kind gets a distinct shape so the kind survives a round trip
 * through the text format.
 */
export const FLOWCHART_NODE_SHAPES: Record<NodeKind, string> = {
  start: 'ellipse',
  process: 'box',
  decision: 'diamond',
  end: 'octagon',
};

/** Fill colour per node kind. */
export const FLOWCHART_NODE_COLORS: Record<NodeKind, string> = {
  start: '#4CAF50',    // green
  end: '#E91E63',      // pink
  process: '#2196F3',  // blue
  decision: '#FF9800', // orange
};

/** Layout direction written into every canonical graph. */
export const FLOWCHART_RANKDIR = 'TB';

