// ─── Delta adapter ──────────────────────────────────────────────────
//
// Boundary between the instruction interpreter and the merge engine.
// Raw interpreter output is checked against FLOWCHART_DELTA_SCHEMA with
// Ajv, normalized into a tagged step union, and its attach hint is
// resolved against the graph the delta will be merged into.

import Ajv from 'ajv';
import type { NodeId, RawDelta } from '@flowscribe/shared';
import { FLOWCHART_DELTA_SCHEMA } from '@flowscribe/shared';
import { DeltaSchemaError } from './errors.js';
import type { GraphView } from './model.js';
import { labelKey } from './model.js';

const ajv = new Ajv({ allErrors: true });
const validateDelta = ajv.compile<RawDelta>(FLOWCHART_DELTA_SCHEMA);

// ─── Step variants ──────────────────────────────────────────────────

interface StepBase {
  label: string;
  /** Present when the step is an alternative branch of the current decision. */
  branchLabel?: string;
}

export interface StartStep extends StepBase {
  kind: 'start';
}

export interface ProcessStep extends StepBase {
  kind: 'process';
}

export interface DecisionStep extends StepBase {
  kind: 'decision';
}

export interface EndStep extends StepBase {
  kind: 'end';
}

export type DeltaStep = StartStep | ProcessStep | DecisionStep | EndStep;

/** A delta that passed validation and knows where it attaches. */
export interface ResolvedDelta {
  steps: DeltaStep[];
  /** Attach points in the target graph; empty only when the graph is empty. */
  attachPoints: NodeId[];
  /** `false` when there was no hint or it matched nothing and the frontier was used. */
  hintResolved: boolean;
}

/**
 * Result of a schema check that does not throw.
 *
 * Used by the interpreter to retry before a delta ever reaches the store.
 */
export type SchemaCheck = { valid: true; delta: RawDelta } | { valid: false; errors: string };

// ─── Validation ─────────────────────────────────────────────────────

function describeErrors(): string {
  return (validateDelta.errors ?? [])
    .map((err) => `${err.instancePath || '(root)'} ${err.message ?? 'is invalid'}`)
    .join('; ');
}

/** Check `raw` against the delta schema without normalizing it. */
export function checkDeltaSchema(raw: unknown): SchemaCheck {
  if (validateDelta(raw)) {
    return { valid: true, delta: raw };
  }
  return { valid: false, errors: describeErrors() };
}

function toStep(raw: RawDelta['newSteps'][number], index: number): DeltaStep {
  const label = raw.label.trim();
  if (!label) {
    throw new DeltaSchemaError(`Step ${String(index + 1)} has no label`);
  }

  let branchLabel: string | undefined;
  if (raw.branchLabel !== undefined) {
    branchLabel = raw.branchLabel.trim();
    if (!branchLabel) {
      throw new DeltaSchemaError(`Step ${String(index + 1)} ("${label}") has an empty branch label`);
    }
  }

  const base: StepBase = branchLabel === undefined ? { label } : { label, branchLabel };
  switch (raw.kind) {
    case 'start':
      return { ...base, kind: 'start' };
    case 'process':
      return { ...base, kind: 'process' };
    case 'decision':
      return { ...base, kind: 'decision' };
    case 'end':
      return { ...base, kind: 'end' };
    default: {
      const unreachable: never = raw.kind;
      throw new DeltaSchemaError(`Unknown step kind "${String(unreachable)}"`);
    }
  }
}

// ─── Attach resolution ──────────────────────────────────────────────

/**
 * Resolve an attach hint to node ids in `graph`.
 *
 * First match wins: exact node id, then a case-insensitive label among
 * frontier nodes, then a case-insensitive label anywhere (most recently
 * created). Returns `null` when the hint matches nothing.
 */
export function resolveAttachHint(graph: GraphView, hint: string): NodeId[] | null {
  const trimmed = hint.trim();
  if (!trimmed) return null;

  if (graph.hasNode(trimmed)) {
    return [trimmed];
  }

  const key = labelKey(trimmed);
  const frontierMatches = graph.frontier.filter((id) => {
    const node = graph.getNode(id);
    return node !== undefined && labelKey(node.label) === key;
  });
  const lastFrontierMatch = frontierMatches.at(-1);
  if (lastFrontierMatch !== undefined) {
    return [lastFrontierMatch];
  }

  const [newest] = graph.findNodesByLabel(trimmed);
  return newest ? [newest.id] : null;
}

/**
 * Validate raw interpreter output and resolve it against `graph`.
 *
 * @throws {DeltaSchemaError} if `raw` does not match the schema, a step
 *   has a blank label or unknown kind, or a branch label is blank.
 */
export function adaptDelta(raw: unknown, graph: GraphView): ResolvedDelta {
  const check = checkDeltaSchema(raw);
  if (!check.valid) {
    throw new DeltaSchemaError(`Delta does not match schema: ${check.errors}`);
  }

  const steps = check.delta.newSteps.map(toStep);

  if (check.delta.attachTo !== undefined) {
    const resolved = resolveAttachHint(graph, check.delta.attachTo);
    if (resolved) {
      return { steps, attachPoints: resolved, hintResolved: true };
    }
  }
  return { steps, attachPoints: graph.frontier, hintResolved: false };
}
