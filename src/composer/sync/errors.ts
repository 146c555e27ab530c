import type { ComposerIntent } from "./intents";

/** The engine threw while handling an operation. */
export class EngineFaultError extends Error {
  readonly operation: string;
  readonly intent: ComposerIntent | null;

  constructor(
    operation: string,
    cause: unknown,
    intent: ComposerIntent | null = null,
  ) {
    super(`Engine fault during ${operation}: ${describeCause(cause)}`, {
      cause,
    });
    this.name = "EngineFaultError";
    this.operation = operation;
    this.intent = intent;
  }
}

export class ReentrantDispatchError extends Error {
  constructor(operation: string) {
    super(`Cannot run ${operation} while another update is being applied`);
    this.name = "ReentrantDispatchError";
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
