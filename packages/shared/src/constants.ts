// ─── Graph limits ────────────────────────────────────────────────────

/** Maximum length of a node label, enforced by the delta schema. */
export const MAX_LABEL_LENGTH = 120;

/** Maximum length of a decision branch label. */
export const MAX_BRANCH_LABEL_LENGTH = 30;

/** Maximum number of steps a single delta may propose. */
export const MAX_STEPS_PER_DELTA = 25;

/** Hard cap on nodes per graph, checked whenever a graph is validated. */
export const MAX_NODES_PER_GRAPH = 500;

// ─── Instruction limits ──────────────────────────────────────────────

/** Maximum length of a single natural-language instruction. */
export const MAX_INSTRUCTION_LENGTH = 2000;

// ─── AI interpreter limits ───────────────────────────────────────────

/** Maximum instruction requests per IP per minute (enforced by `express-rate-limit`). */
export const AI_RATE_LIMIT_PER_MINUTE = 10;

/** Maximum interpretation attempts before giving up (initial + 1 retry). */
export const AI_MAX_INTERPRET_ATTEMPTS = 2;

/** Default Anthropic model used by the instruction interpreter. */
export const DEFAULT_INTERPRETER_MODEL = 'claude-haiku-4-5-20251001';
