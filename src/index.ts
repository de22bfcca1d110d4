export { SessionManager, type SessionManagerOptions } from './core/session/manager.js';
export type { SessionAction, SessionHandle, SessionOptions, SessionOutput, SessionStatus, ErrorSummary } from './core/session/types.js';
export { TRUNCATED_PLACEHOLDER, SessionStatusSnapshotV1Schema, type SessionStatusSnapshotV1 } from './core/session/status.js';
export {
  CHECKPOINT_FILE,
  SessionCheckpointV1Schema,
  readSessionCheckpoint,
  type SessionCheckpointV1
} from './core/session/checkpoint.js';
export { createActorFactory, type ActorFactoryDeps } from './core/session/actor-factory.js';

export { PhaseStateMachine, type MachineAction, type PhaseStateMachineOptions, type TransitionEvent } from './core/phase/state-machine.js';
export { MachineCheckpointV1Schema, type MachineCheckpointV1 } from './core/phase/checkpoint.js';
export { PhaseRunner } from './core/phase/actor.js';
export { runFanOut, join as joinSiblingOutputs } from './core/phase/fan-out.js';
export { searchWithRetries } from './core/phase/search.js';
export { stateLabel, type ActorFactory, type MachineState, type PhaseOutput, type SearchScope } from './core/phase/types.js';

export { BeamSearchActor, type BeamSearchActorOptions } from './core/beam/search.js';
export { compareEntries, rankEntries } from './core/beam/rank.js';
export type { BeamConfig, BeamEntry, BeamObserver, ChildOutcome, SearchResult } from './core/beam/types.js';

export { CandidateTree } from './core/candidate/tree.js';
export type { CandidateId, CandidateNode, FileSet, Provenance } from './core/candidate/types.js';

export { Generator, type GeneratorOptions } from './core/generator/generator.js';
export { extractFileBlocks, normalizeGeneratedPath } from './core/generator/extract.js';
export { defaultPromptBuilder, renderProjectContext } from './core/generator/prompt.js';
export { verifyScope, PROTECTED_PATH_PATTERNS, type ScopeViolation } from './core/generator/scope.js';
export type * from './core/generator/types.js';

export { Sandbox, DEFAULT_EXEC_TIMEOUT_MS } from './core/sandbox/sandbox.js';
export { runValidationPipeline, type StageResult, type ValidationReport, type ValidationStage } from './core/sandbox/pipeline.js';
export { SandboxValidator, type CandidateValidator } from './core/sandbox/validator.js';
export { withInfraRetry, backoffDelay, type RetryHooks } from './core/sandbox/retry.js';
export { DEFAULT_RETRY_POLICY } from './core/sandbox/types.js';
export type { BackendHandle, ExecRequest, ExecResult, RetryPolicy, SandboxBackend } from './core/sandbox/types.js';
export * from './core/sandbox/backends/index.js';

export * from './core/errors.js';

export { LedgerWriter } from './core/ledger/writer.js';
export { LedgerReader } from './core/ledger/reader.js';
export type { LedgerEntry, LedgerEventType } from './core/ledger/types.js';
export { EvidenceCollector, evidencePaths } from './core/evidence/collector.js';

export { diffFileSets } from './git/file-set-diff.js';
export type { DiffFile, DiffResult } from './git/diff-parser.js';

export { loadSettings, parseSettings, type Settings, type SettingsInput, type PhaseSpec, type PhaseSpecInput } from './config/settings.js';
export { Logger, silentLogger, type LogLevel, type LoggerOptions } from './utils/logger.js';
