// ─── Instruction interpreter ────────────────────────────────────────
//
// Turns one natural-language instruction into a raw flowchart delta:
//   1. Send the interpreter prompt plus the current graph to the model.
//   2. Extract JSON from the reply and check it against the delta schema.
//   3. On failure, retry once with the errors fed back.
//
// The interpreter runs before the session lock is taken; the store
// validates the delta again when it merges it.

import type Anthropic from '@anthropic-ai/sdk';
import { traceable } from 'langsmith/traceable';
import type { RawDelta } from '@flowscribe/shared';
import { AI_MAX_INTERPRET_ATTEMPTS, logger } from '@flowscribe/shared';
import { checkDeltaSchema } from '../graph/adapter.js';
import { INTERPRETER_PROMPT } from './prompt.js';

const log = logger('ai');

/** What the interpreter knows about the flowchart being extended. */
export interface InterpretContext {
  /** Canonical DOT text of the current graph. */
  graphText: string;
  /** Labels of the current open ends, in creation order. */
  frontier: string[];
}

export interface InstructionInterpreter {
  /**
   * @throws {InterpreterError} if no schema-valid delta could be produced.
   */
  interpret(instruction: string, context: InterpretContext): Promise<RawDelta>;
}

/** Minimal text-completion seam, so tests never reach the network. */
export interface CompletionClient {
  complete(request: { system: string; user: string }): Promise<string>;
}

/** The model could not be reached or never produced a valid delta. */
export class InterpreterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InterpreterError';
  }
}

/**
 * {@link CompletionClient} backed by the Anthropic Messages API.
 *
 * @param client - Anthropic SDK client (reads `ANTHROPIC_API_KEY`).
 * @param model - Model id, e.g. `claude-haiku-4-5-20251001`.
 */
export function anthropicCompletionClient(client: Anthropic, model: string): CompletionClient {
  return {
    async complete({ system, user }) {
      const response = await client.messages.create({
        model,
        max_tokens: 2048,
        system,
        messages: [{ role: 'user', content: user }],
      });
      return response.content
        .filter((b): b is Anthropic.TextBlock => b.type === 'text')
        .map((b) => b.text)
        .join('');
    },
  };
}

/**
 * Extract a JSON object from a model response that may contain markdown
 * code fences or surrounding whitespace.
 */
export function extractJSON(text: string): string {
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/.exec(text);
  if (fenced?.[1]) return fenced[1].trim();
  return text.trim();
}

/** Build the user message: current graph, open ends, then the instruction. */
export function buildUserMessage(instruction: string, context: InterpretContext): string {
  const openEnds =
    context.frontier.length > 0
      ? context.frontier.map((label) => `"${label}"`).join(', ')
      : '(none: the flowchart is empty)';
  return [
    'Current flowchart:',
    '```dot',
    context.graphText.trimEnd(),
    '```',
    `Current open ends: ${openEnds}`,
    '',
    `Instruction: "${instruction}"`,
  ].join('\n');
}

const interpretWithRetries = traceable(
  async function interpretWithRetries(
    client: CompletionClient,
    instruction: string,
    context: InterpretContext,
    maxAttempts: number,
  ): Promise<RawDelta> {
    const baseMessage = buildUserMessage(instruction, context);
    let lastError = '';

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const user =
        attempt === 0
          ? baseMessage
          : `${baseMessage}\n\nYour previous response was not valid JSON matching the FlowchartDelta schema.\nErrors: ${lastError}\nPlease try again.`;

      let text: string;
      try {
        text = await client.complete({ system: INTERPRETER_PROMPT, user });
      } catch (error: unknown) {
        throw new InterpreterError('Instruction interpreter request failed', { cause: error });
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(extractJSON(text));
      } catch {
        lastError = 'Response was not valid JSON';
        log.warn('interpreter returned non-JSON output', { attempt });
        continue;
      }

      const check = checkDeltaSchema(parsed);
      if (!check.valid) {
        lastError = check.errors;
        log.warn('interpreter output failed schema', { attempt, errors: check.errors });
        continue;
      }
      return check.delta;
    }

    throw new InterpreterError(
      `Failed to interpret instruction after ${String(maxAttempts)} attempts. Last error: ${lastError}`,
    );
  },
  { name: 'interpret-instruction', metadata: { service: 'flowscribe' } },
);

/** Model-backed {@link InstructionInterpreter}. */
export class AnthropicInterpreter implements InstructionInterpreter {
  constructor(
    private readonly client: CompletionClient,
    private readonly maxAttempts: number = AI_MAX_INTERPRET_ATTEMPTS,
  ) {}

  interpret(instruction: string, context: InterpretContext): Promise<RawDelta> {
    return interpretWithRetries(this.client, instruction, context, this.maxAttempts);
  }
}
