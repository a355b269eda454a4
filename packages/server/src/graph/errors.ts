import type { FlowchartErrorTag } from '@flowscribe/shared';

/**
 * Base class for every failure the flowchart core reports.
 *
 * `tag` is what crosses the session-store boundary; the HTTP layer maps
 * it to a status code and a user-facing message.
 */
export abstract class FlowchartError extends Error {
  abstract readonly tag: FlowchartErrorTag;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The interpreter's output does not match the delta schema. */
export class DeltaSchemaError extends FlowchartError {
  readonly tag = 'DeltaSchemaError' as const;
}

/** A branch was attached to a node that cannot take another outgoing edge. */
export class InvalidBranchError extends FlowchartError {
  readonly tag = 'InvalidBranchError' as const;
}

/** A graph invariant does not hold. Indicates a merge bug, not bad input. */
export class GraphIntegrityError extends FlowchartError {
  readonly tag = 'GraphIntegrityError' as const;

  constructor(readonly reason: string) {
    super(`Graph integrity violated: ${reason}`);
  }
}

/** Canonical graph text could not be parsed. */
export class ParseError extends FlowchartError {
  readonly tag = 'ParseError' as const;

  constructor(
    readonly line: number,
    readonly reason: string,
  ) {
    super(`Parse error on line ${String(line)}: ${reason}`);
  }
}

export class SessionNotFoundError extends FlowchartError {
  readonly tag = 'SessionNotFoundError' as const;

  constructor(readonly sessionKey: string) {
    super(`Session "${sessionKey}" not found`);
  }
}

export class TemplateNotFoundError extends FlowchartError {
  readonly tag = 'TemplateNotFoundError' as const;

  constructor(readonly templateName: string) {
    super(`Template "${templateName}" not found`);
  }
}

/** The session has no recorded merge to revert. */
export class NothingToUndoError extends FlowchartError {
  readonly tag = 'NothingToUndoError' as const;

  constructor(readonly sessionKey: string) {
    super(`Session "${sessionKey}" has no merge to undo`);
  }
}

export function isFlowchartError(error: unknown): error is FlowchartError {
  return error instanceof FlowchartError;
}
