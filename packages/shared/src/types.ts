// ─── Error tags ──────────────────────────────────────────────────────
//
// Every failure the flowchart core can report carries one of these
// tags. The server's error classes expose it as `error.tag`, and the
// session store returns it inside a failed {@link StoreResult}.

export type FlowchartErrorTag =
  | 'DeltaSchemaError'
  | 'InvalidBranchError'
  | 'GraphIntegrityError'
  | 'ParseError'
  | 'SessionNotFoundError'
  | 'TemplateNotFoundError'
  | 'NothingToUndoError';

/**
 * Outcome of a session store operation.
 *
 * Core errors never escape the store as exceptions; callers switch on
 * `success` and, on failure, on `error`.
 */
export type StoreResult<T> = { success: true; data: T } | StoreFailure;

/** Failed {@link StoreResult}; assignable to a result of any data type. */
export interface StoreFailure {
  success: false;
  error: FlowchartErrorTag;
  /** Human-readable reason. */
  message: string;
}

// ─── Session records ─────────────────────────────────────────────────

/**
 * Durable form of a session: one row per session key.
 *
 * @property key - Stable identifier derived from the user's email and session id.
 * @property graphText - Canonical DOT text of the session's graph.
 * @property history - Instructions applied since the session (or its template) started, oldest first.
 * @property templateName - Template the session was seeded from, or `null`.
 * @property createdAt - Unix epoch milliseconds.
 * @property updatedAt - Unix epoch milliseconds of the last committed change.
 */
export interface SessionRecord {
  key: string;
  graphText: string;
  history: string[];
  templateName: string | null;
  createdAt: number;
  updatedAt: number;
}

// ─── API payloads ────────────────────────────────────────────────────

/** Entry in the template listing (`GET /api/flowchart/templates`). */
export interface TemplateSummary {
  /** File stem, e.g. `order_fulfillment`. */
  id: string;
  /** Display name, e.g. `Order Fulfillment`. */
  name: string;
}

/** Body returned by every endpoint that changes or reads a session. */
export interface FlowchartResponse {
  status: 'success';
  userEmail: string;
  sessionId: string;
  message: string;
  /** Canonical DOT text, ready for Graphviz. */
  graph: string;
  history: string[];
  frontier: string[];
}
