import { z } from 'zod';

import { isErrnoException, readYaml } from '../utils/fs.js';

export const PathPattern = z.string().min(1);

export const ValidationStageSpec = z.object({
  name: z.string().min(1),
  command: z.array(z.string()).min(1),
  cwd: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
  env: z.record(z.string()).optional(),
  required: z.boolean().default(true),
  weight: z.number().nonnegative().default(1)
});

export const SiblingSpec = z.object({
  name: z.string().min(1),
  /** Empty: inherit the phase's allowed paths. */
  allowedPaths: z.array(PathPattern).default([]),
  /** Absent: inherit the phase's stages. */
  stages: z.array(ValidationStageSpec).optional(),
  baseEnvironment: z.string().min(1).optional()
});

export const PhaseSpec = z.object({
  name: z.string().min(1).regex(/^[A-Za-z0-9_-]+$/, 'phase names are identifiers'),
  beamWidth: z.number().int().min(1).default(3),
  maxDepth: z.number().int().min(0).default(3),
  acceptFirst: z.boolean().default(true),
  /** Extra attempts after a NoViableCandidateError, from the same frontier. */
  expansionRetries: z.number().int().min(0).default(1),
  /** Absent: the previous phase (none for the first). */
  dependsOn: z.array(z.string().min(1)).optional(),
  allowedPaths: z.array(PathPattern).default([]),
  stages: z.array(ValidationStageSpec).default([]),
  baseEnvironment: z.string().min(1).optional(),
  siblings: z.array(SiblingSpec).optional()
});

export const PhaseList = z
  .array(PhaseSpec)
  .min(1)
  .superRefine((phases, ctx) => {
    const seen = new Set<string>();
    for (const [i, phase] of phases.entries()) {
      if (seen.has(phase.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'name'], message: `duplicate phase '${phase.name}'` });
      }
      for (const dep of phase.dependsOn ?? []) {
        if (!seen.has(dep)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [i, 'dependsOn'],
            message: `phase '${phase.name}' depends on '${dep}', which is not declared before it`
          });
        }
      }
      const siblingNames = (phase.siblings ?? []).map((s) => s.name);
      if (new Set(siblingNames).size !== siblingNames.length) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'siblings'], message: `duplicate sibling in phase '${phase.name}'` });
      }
      seen.add(phase.name);
    }
  });

export const RetrySpec = z.object({
  maxAttempts: z.number().int().min(1).default(4),
  baseDelayMs: z.number().int().nonnegative().default(500),
  maxDelayMs: z.number().int().nonnegative().default(8_000),
  jitter: z.number().min(0).max(1).default(0.5)
});

export const SandboxBackendKind = z.enum(['docker', 'local']);

export const SandboxSpec = z.object({
  backend: SandboxBackendKind.default('docker'),
  baseEnvironment: z.string().min(1).default('node:20-bookworm'),
  workdir: z.string().min(1).default('/workspace'),
  execTimeoutMs: z.number().int().positive().default(600_000),
  retry: RetrySpec.default({}),
  docker: z
    .object({
      cpus: z.number().positive().optional(),
      memoryMb: z.number().int().positive().optional(),
      pidsLimit: z.number().int().positive().optional()
    })
    .default({})
});

export const GenerationSpec = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  maxTokens: z.number().int().positive().optional()
});

export const LogLevelSpec = z.enum(['debug', 'info', 'warn', 'error']);

export const Settings = z.object({
  stateDir: z.string().min(1).default('.beamforge'),
  logLevel: LogLevelSpec.default('info'),
  logJson: z.boolean().default(false),
  /** Review output replaces file contents longer than this. */
  reviewMaxChars: z.number().int().positive().default(256),
  sandbox: SandboxSpec.default({}),
  generation: GenerationSpec.default({}),
  phases: PhaseList.default([
    { name: 'data_model', allowedPaths: [] },
    { name: 'logic', allowedPaths: [] },
    { name: 'ui', allowedPaths: [] }
  ])
});

export type ValidationStageSpec = z.infer<typeof ValidationStageSpec>;
export type SiblingSpec = z.infer<typeof SiblingSpec>;
export type PhaseSpec = z.infer<typeof PhaseSpec>;
export type PhaseSpecInput = z.input<typeof PhaseSpec>;
export type RetrySpec = z.infer<typeof RetrySpec>;
export type Settings = z.infer<typeof Settings>;
export type SettingsInput = z.input<typeof Settings>;

export const MIN_EXEC_TIMEOUT_MS = 1_000;

export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Settings from an optional YAML file, then `BEAMFORGE_*` environment
 * overrides, validated as a whole.
 */
export async function loadSettings(path?: string, env: EnvSource = process.env): Promise<Settings> {
  const fromFile = path ? await readSettingsFile(path) : {};
  return Settings.parse(applyEnvOverrides(fromFile, env));
}

export function parseSettings(input: unknown, env: EnvSource = {}): Settings {
  return Settings.parse(applyEnvOverrides(input ?? {}, env));
}

async function readSettingsFile(path: string): Promise<unknown> {
  try {
    return (await readYaml(path)) ?? {};
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new Error(`Settings file not found: ${path}`, { cause: err });
    }
    throw err;
  }
}

function applyEnvOverrides(input: unknown, env: EnvSource): unknown {
  if (!isPlainObject(input)) return input;
  const out: Record<string, unknown> = { ...input };

  const stateDir = env.BEAMFORGE_STATE_DIR?.trim();
  if (stateDir) out.stateDir = stateDir;

  const logLevel = env.BEAMFORGE_LOG_LEVEL?.trim();
  if (logLevel) out.logLevel = logLevel;

  const sandbox: Record<string, unknown> = isPlainObject(out.sandbox) ? { ...out.sandbox } : {};
  const backend = env.BEAMFORGE_SANDBOX_BACKEND?.trim();
  if (backend) sandbox.backend = backend;
  const timeout = resolveExecTimeoutMs(env.BEAMFORGE_EXEC_TIMEOUT_MS);
  if (timeout !== null) sandbox.execTimeoutMs = timeout;
  out.sandbox = sandbox;

  return out;
}

/** Null when unset or not a number; otherwise floored and clamped to MIN_EXEC_TIMEOUT_MS. */
export function resolveExecTimeoutMs(raw: string | undefined): number | null {
  if (!raw || !raw.trim()) return null;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return null;
  return Math.max(MIN_EXEC_TIMEOUT_MS, Math.floor(parsed));
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}
