/**
 * Extraction State Machine
 *
 * RENDER → CALL → PARSE → VALIDATE → { SUCCESS | REPAIR → CALL | EXHAUSTED }
 *
 * transition() is pure: the next state depends only on the current state, the
 * outcome of the step just run and the remaining retry budget. The
 * orchestrator performs the side effects and applies the budget bookkeeping
 * the transition asks for.
 */

import type { FailureReason, Metadata, ParseFailure, ParsedPayload, SchemaViolation } from '../types';

export interface RenderedPrompt {
  system: string;
  user: string;
}

/** What went wrong with a response that reached the model and came back */
export type RepairProblem =
  | { kind: 'parse'; failure: ParseFailure }
  | { kind: 'validation'; violations: SchemaViolation[] };

export type AttemptProblem = RepairProblem | { kind: 'provider'; message: string };

export type ExtractionState =
  | { name: 'RENDER' }
  | { name: 'CALL'; original: RenderedPrompt; prompt: RenderedPrompt }
  | { name: 'PARSE'; original: RenderedPrompt; response: string }
  | { name: 'VALIDATE'; original: RenderedPrompt; response: string; payload: ParsedPayload }
  | { name: 'REPAIR'; original: RenderedPrompt; response: string; problem: RepairProblem }
  | { name: 'SUCCESS'; metadata: Metadata }
  | { name: 'EXHAUSTED'; reason: FailureReason; detail: string; problem?: AttemptProblem };

export type TerminalState = Extract<ExtractionState, { name: 'SUCCESS' | 'EXHAUSTED' }>;

export type StepOutcome =
  | { type: 'rendered'; prompt: RenderedPrompt }
  | { type: 'configuration-error'; message: string }
  | { type: 'cancelled' }
  | { type: 'responded'; response: string }
  | { type: 'transient-error'; message: string }
  | { type: 'fatal-error'; message: string }
  | { type: 'parsed'; payload: ParsedPayload }
  | { type: 'parse-failed'; failure: ParseFailure }
  | { type: 'valid'; metadata: Metadata }
  | { type: 'invalid'; violations: SchemaViolation[] };

export interface Transition {
  next: ExtractionState;
  /** Decrement the retry budget by one */
  consumesBudget: boolean;
  /** Wait the retry delay before running `next` */
  backoff: boolean;
}

export function isTerminal(state: ExtractionState): state is TerminalState {
  return state.name === 'SUCCESS' || state.name === 'EXHAUSTED';
}

function move(next: ExtractionState, consumesBudget = false, backoff = false): Transition {
  return { next, consumesBudget, backoff };
}

function exhausted(problem: AttemptProblem, detail: string): Transition {
  return move({ name: 'EXHAUSTED', reason: 'max-retries-exceeded', detail, problem });
}

function illegal(state: ExtractionState, outcome: StepOutcome): never {
  throw new Error(`Illegal extraction transition: ${state.name} on ${outcome.type}`);
}

export function transition(
  state: ExtractionState,
  outcome: StepOutcome,
  remainingBudget: number
): Transition {
  if (isTerminal(state)) {
    return illegal(state, outcome);
  }

  if (outcome.type === 'cancelled') {
    return move({ name: 'EXHAUSTED', reason: 'cancelled', detail: 'Extraction cancelled before completion' });
  }

  if (outcome.type === 'configuration-error' && (state.name === 'RENDER' || state.name === 'REPAIR')) {
    return move({ name: 'EXHAUSTED', reason: 'configuration-error', detail: outcome.message });
  }

  switch (state.name) {
    case 'RENDER':
      if (outcome.type === 'rendered') {
        return move({ name: 'CALL', original: outcome.prompt, prompt: outcome.prompt });
      }
      break;

    case 'REPAIR':
      if (outcome.type === 'rendered') {
        return move({ name: 'CALL', original: state.original, prompt: outcome.prompt });
      }
      break;

    case 'CALL':
      if (outcome.type === 'responded') {
        return move({ name: 'PARSE', original: state.original, response: outcome.response });
      }
      if (outcome.type === 'fatal-error') {
        return move({ name: 'EXHAUSTED', reason: 'fatal-provider-error', detail: outcome.message });
      }
      if (outcome.type === 'transient-error') {
        if (remainingBudget > 0) {
          return move(state, true, true);
        }
        return exhausted({ kind: 'provider', message: outcome.message }, outcome.message);
      }
      break;

    case 'PARSE':
      if (outcome.type === 'parsed') {
        return move({ name: 'VALIDATE', original: state.original, response: state.response, payload: outcome.payload });
      }
      if (outcome.type === 'parse-failed') {
        const problem: RepairProblem = { kind: 'parse', failure: outcome.failure };
        if (remainingBudget > 0) {
          return move({ name: 'REPAIR', original: state.original, response: state.response, problem }, true);
        }
        return exhausted(problem, outcome.failure.message);
      }
      break;

    case 'VALIDATE':
      if (outcome.type === 'valid') {
        return move({ name: 'SUCCESS', metadata: outcome.metadata });
      }
      if (outcome.type === 'invalid') {
        const problem: RepairProblem = { kind: 'validation', violations: outcome.violations };
        if (remainingBudget > 0) {
          return move({ name: 'REPAIR', original: state.original, response: state.response, problem }, true);
        }
        return exhausted(problem, `${outcome.violations.length} schema violation(s)`);
      }
      break;
  }

  return illegal(state, outcome);
}
