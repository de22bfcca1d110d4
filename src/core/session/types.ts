import type { FileSet } from '../candidate/types.js';
import type { PhaseSpecInput } from '../../config/settings.js';
import type { PromptBuilder } from '../generator/types.js';

export interface SessionHandle {
  readonly id: string;
  readonly startedAtIso: string;
}

export type SessionAction = 'confirm' | 'apply_feedback' | 'diff' | 'get_error' | 'wait';

export interface ErrorSummary {
  code: string;
  message: string;
}

export type SessionOutput =
  | { kind: 'processing'; phase: string | null }
  | { kind: 'review'; phase: string; files: Record<string, string> }
  | { kind: 'application'; files: Record<string, string> }
  | { kind: 'error'; error: ErrorSummary };

export interface SessionStatus {
  sessionId: string;
  state: string;
  output: SessionOutput;
  availableActions: SessionAction[];
  isCompleted: boolean;
  error: ErrorSummary | null;
}

/** Per-session overrides of the manager's settings. */
export interface SessionOptions {
  phases?: PhaseSpecInput[];
  /** Files present before the first phase runs (templates, scaffolding). */
  initialFiles?: FileSet;
  /** Keyed by `phase` or `phase/sibling`; the more specific key wins. */
  promptBuilders?: Readonly<Record<string, PromptBuilder>>;
}
