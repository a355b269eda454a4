// ─── Delta merger ───────────────────────────────────────────────────
//
// Applies a resolved delta to a graph and returns the next graph. The
// input graph is never touched: the merge runs inside a transaction on
// a clone, so a rejected merge simply discards the clone.
//
// Step handling, in order:
//   1. Re-use an existing node with the same label within one hop of
//      the current attach points (no new node, no new edge).
//   2. Failing that, a run of sequential steps whose labels already
//      form a path ending at or shortly before an attach point re-uses
//      that whole path, so re-applying a delta adds nothing.
//   3. Otherwise chain a sequential step from every attach point, or
//      hang a branch step off the current decision node.
//   4. Validate the whole result once all steps are applied.

import type { NodeId } from '@flowscribe/shared';
import { logger } from '@flowscribe/shared';
import type { DeltaStep, ResolvedDelta } from './adapter.js';
import { InvalidBranchError } from './errors.js';
import type { GraphDraft, GraphModel } from './model.js';
import { labelKey } from './model.js';

const log = logger('merge');

export interface MergeResult {
  graph: GraphModel;
  /** Nodes the delta added, in creation order. */
  created: NodeId[];
  /** Existing nodes the delta matched instead of duplicating. */
  reused: NodeId[];
}

interface Candidate {
  id: NodeId;
  hops: number;
  order: number;
}

/**
 * Find the node a step should re-use instead of creating a new one.
 *
 * Looks at each source node, its direct successors and its direct
 * predecessors. Fewest hops wins, then the most recently created. A
 * `start` step also matches the entry node wherever it is.
 */
function findDuplicate(draft: GraphDraft, sources: NodeId[], step: DeltaStep): NodeId | null {
  const key = labelKey(step.label);
  const candidates: Candidate[] = [];
  for (const source of sources) {
    candidates.push({ id: source, hops: 0, order: draft.creationIndex(source) });
    for (const id of [...draft.successors(source), ...draft.predecessors(source)]) {
      candidates.push({ id, hops: 1, order: draft.creationIndex(id) });
    }
  }

  let best: Candidate | undefined;
  for (const candidate of candidates) {
    const node = draft.getNode(candidate.id);
    if (!node || labelKey(node.label) !== key) continue;
    if (
      !best ||
      candidate.hops < best.hops ||
      (candidate.hops === best.hops && candidate.order > best.order)
    ) {
      best = candidate;
    }
  }
  if (best) return best.id;

  if (step.kind === 'start') {
    const entry = draft.entry;
    const entryNode = entry === null ? undefined : draft.getNode(entry);
    if (entry !== null && entryNode && labelKey(entryNode.label) === key) {
      return entry;
    }
  }
  return null;
}

/** Follow successors from `start` whose labels spell out `run`, or `null`. */
function followLabels(draft: GraphDraft, start: NodeId, run: DeltaStep[]): NodeId[] | null {
  const labelOf = (id: NodeId): string => labelKey(draft.getNode(id)?.label ?? '');
  const [first, ...rest] = run;
  if (!first || labelOf(start) !== labelKey(first.label)) return null;

  const path = [start];
  let current = start;
  for (const step of rest) {
    const key = labelKey(step.label);
    const next = draft.successors(current).find((id) => labelOf(id) === key);
    if (next === undefined) return null;
    path.push(next);
    current = next;
  }
  return path;
}

/**
 * Find an existing path whose labels match the sequential `run`, starting
 * at most `run.length` hops behind one of the sources. Fewest hops wins,
 * then the most recently created start node.
 */
function findExistingPath(draft: GraphDraft, sources: NodeId[], run: DeltaStep[]): NodeId[] | null {
  let best: { path: NodeId[]; hops: number; order: number } | undefined;
  for (const source of sources) {
    const seen = new Set<NodeId>([source]);
    let ring = [source];
    for (let hops = 0; hops <= run.length && ring.length > 0; hops++) {
      for (const start of ring) {
        const path = followLabels(draft, start, run);
        if (!path) continue;
        const order = draft.creationIndex(start);
        if (!best || hops < best.hops || (hops === best.hops && order > best.order)) {
          best = { path, hops, order };
        }
      }
      ring = ring.flatMap((id) => draft.predecessors(id)).filter((id) => {
        if (seen.has(id)) return false;
        seen.add(id);
        return true;
      });
    }
  }
  return best?.path ?? null;
}

/** Consecutive sequential steps starting at `from`. */
function sequentialRun(steps: DeltaStep[], from: number): DeltaStep[] {
  const run: DeltaStep[] = [];
  for (const step of steps.slice(from)) {
    if (step.branchLabel !== undefined) break;
    run.push(step);
  }
  return run;
}

function describe(draft: GraphDraft, id: NodeId): string {
  return `"${draft.getNode(id)?.label ?? id}"`;
}

function attachSequential(draft: GraphDraft, sources: NodeId[], step: DeltaStep): NodeId {
  if (sources.length === 0 && !draft.isEmpty()) {
    throw new InvalidBranchError(
      `The flowchart has no open ends to continue from; name the step "${step.label}" should follow`,
    );
  }
  for (const source of sources) {
    const node = draft.getNode(source);
    if (node?.kind === 'decision') {
      throw new InvalidBranchError(
        `"${step.label}" follows decision ${describe(draft, source)} and needs a branch label`,
      );
    }
    const [existing] = draft.outgoing(source);
    if (existing) {
      throw new InvalidBranchError(
        `${describe(draft, source)} already continues to ${describe(draft, existing.to)}; only decision nodes can branch`,
      );
    }
  }

  const id = draft.addNode(step.label, step.kind);
  for (const source of sources) {
    draft.addEdge(source, id);
  }
  return id;
}

function attachBranch(
  draft: GraphDraft,
  anchors: NodeId[],
  step: DeltaStep,
  branchLabel: string,
): NodeId {
  if (anchors.length === 0) {
    throw new InvalidBranchError(`Branch "${branchLabel}" has no decision node to attach to`);
  }
  const branchKey = labelKey(branchLabel);
  for (const anchor of anchors) {
    const node = draft.getNode(anchor);
    if (node?.kind !== 'decision') {
      throw new InvalidBranchError(
        `Branch "${branchLabel}" can only attach to a decision node, not ${describe(draft, anchor)}`,
      );
    }
    if (draft.outgoing(anchor).some((edge) => labelKey(edge.label ?? '') === branchKey)) {
      throw new InvalidBranchError(
        `Decision ${describe(draft, anchor)} already has a "${branchLabel}" branch`,
      );
    }
  }

  const id = draft.addNode(step.label, step.kind);
  for (const anchor of anchors) {
    draft.addEdge(anchor, id, branchLabel);
  }
  return id;
}

/**
 * Merge a resolved delta into `graph`, producing the next graph.
 *
 * Sequential steps advance both the attach points and the branch
 * anchor; branch steps only advance the attach points, so consecutive
 * branch steps all hang off the same decision.
 *
 * @throws {InvalidBranchError} if a step cannot attach where it must.
 * @throws {GraphIntegrityError} if the merged graph breaks an invariant.
 */
export function mergeDelta(graph: GraphModel, delta: ResolvedDelta): MergeResult {
  const next = graph.clone();

  const { created, reused } = next.transact((draft) => {
    const created: NodeId[] = [];
    const reused: NodeId[] = [];
    let attach = [...delta.attachPoints];
    let anchor = attach;

    for (let i = 0; i < delta.steps.length; i++) {
      const step = delta.steps[i];
      if (!step) break;
      const isBranch = step.branchLabel !== undefined;
      const sources = isBranch ? anchor : attach;

      const duplicate = findDuplicate(draft, sources, step);
      if (duplicate !== null) {
        log.debug('reused node', { id: duplicate, label: step.label });
        reused.push(duplicate);
        attach = [duplicate];
        if (!isBranch) anchor = attach;
        continue;
      }

      const run = isBranch ? [] : sequentialRun(delta.steps, i);
      const path = run.length > 1 ? findExistingPath(draft, sources, run) : null;
      const last = path?.at(-1);
      if (path && last !== undefined) {
        log.debug('reused path', { ids: path });
        reused.push(...path);
        attach = [last];
        anchor = attach;
        i += path.length - 1;
        continue;
      }

      const id =
        step.branchLabel === undefined
          ? attachSequential(draft, sources, step)
          : attachBranch(draft, sources, step, step.branchLabel);
      created.push(id);
      attach = [id];
      if (!isBranch) anchor = attach;
    }

    return { created, reused };
  });

  return { graph: next, created, reused };
}
