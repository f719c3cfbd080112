import type { ChatMessage } from './types.js';

import { errorMessage } from './utils.js';

// The model endpoint failed; fatal to the current conversation only
export class GenerationError extends Error {
  readonly iteration: number;

  constructor(iteration: number, cause: unknown) {
    super(`generation failed at iteration ${String(iteration)}: ${errorMessage(cause)}`, { cause });
    this.name = 'GenerationError';
    this.iteration = iteration;
  }
}

export class IterationsExceededError extends Error {
  readonly maxIterations: number;
  readonly transcript: readonly ChatMessage[];

  constructor(maxIterations: number, transcript: readonly ChatMessage[]) {
    super(`no final answer after ${String(maxIterations)} iterations`);
    this.name = 'IterationsExceededError';
    this.maxIterations = maxIterations;
    this.transcript = transcript;
  }
}

export class ConversationTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`conversation timed out after ${String(timeoutMs)}ms`);
    this.name = 'ConversationTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export type ConversationError = GenerationError | IterationsExceededError | ConversationTimeoutError;

export const isConversationError = (value: unknown): value is ConversationError =>
  value instanceof GenerationError || value instanceof IterationsExceededError || value instanceof ConversationTimeoutError;
