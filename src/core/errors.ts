export type EngineErrorCode =
  | 'INFRASTRUCTURE'
  | 'COMMAND_FAILED'
  | 'GENERATION'
  | 'NO_VIABLE_CANDIDATE'
  | 'INVALID_TRANSITION'
  | 'CANCELLED'
  | 'SESSION_NOT_FOUND'
  | 'INVALID_PATH'
  | 'CHECKPOINT';

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Sandbox backend unreachable or transport fault, after retries were exhausted. */
export class InfrastructureError extends EngineError {
  readonly code = 'INFRASTRUCTURE';
  readonly operation: string;
  readonly attempts: number;

  constructor(operation: string, attempts: number, cause: unknown) {
    super(`sandbox ${operation} failed after ${attempts} attempt(s): ${describeError(cause)}`, { cause });
    this.operation = operation;
    this.attempts = attempts;
  }
}

/** A validation stage exited non-zero (or timed out). Never retried. */
export class CommandFailedError extends EngineError {
  readonly code = 'COMMAND_FAILED';
  readonly stage: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(stage: string, exitCode: number, stderr: string) {
    super(`stage '${stage}' exited with code ${exitCode}`);
    this.stage = stage;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/** Malformed model output (or a failed completion call) after the bounded retries. */
export class GenerationError extends EngineError {
  readonly code = 'GENERATION';
  readonly attempts: number;

  constructor(message: string, attempts = 1, options?: { cause?: unknown }) {
    super(message, options);
    this.attempts = attempts;
  }
}

export class NoViableCandidateError extends EngineError {
  readonly code = 'NO_VIABLE_CANDIDATE';
  readonly depth: number;
  readonly rejected: number;

  constructor(depth: number, rejected: number) {
    super(`all ${rejected} candidate(s) at depth ${depth} failed validation`);
    this.depth = depth;
    this.rejected = rejected;
  }
}

export class InvalidTransitionError extends EngineError {
  readonly code = 'INVALID_TRANSITION';
  readonly action: string;
  readonly state: string;

  constructor(action: string, state: string) {
    super(`'${action}' is not allowed in state '${state}'`);
    this.action = action;
    this.state = state;
  }
}

export class CancelledError extends EngineError {
  readonly code = 'CANCELLED';

  constructor(reason = 'cancelled') {
    super(reason);
  }
}

export class SessionNotFoundError extends EngineError {
  readonly code = 'SESSION_NOT_FOUND';
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`unknown session '${sessionId}'`);
    this.sessionId = sessionId;
  }
}

/** A file path that is absolute, escapes its root or names a reserved entry. */
export class InvalidPathError extends EngineError {
  readonly code = 'INVALID_PATH';
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`${reason}: '${path}'`);
    this.path = path;
  }
}

/** A session checkpoint that is missing, malformed or does not fit the session's phases. */
export class CheckpointError extends EngineError {
  readonly code = 'CHECKPOINT';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** An error read back from a checkpoint; only its code and message survive. */
export class RecordedError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RecordedError';
    this.code = code;
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Normalizes an abort reason (or anything thrown after an abort) into a CancelledError. */
export function toCancelled(signal: AbortSignal): CancelledError {
  const reason: unknown = signal.reason;
  if (reason instanceof CancelledError) return reason;
  return new CancelledError(reason === undefined ? 'cancelled' : describeError(reason));
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw toCancelled(signal);
}
