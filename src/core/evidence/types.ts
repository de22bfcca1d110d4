import { z } from 'zod';

export const EvidenceMeta = z.object({
  subject: z.string(),
  timestamp: z.string(),
  seq: z.number().int().positive()
});

export const StageEvidenceMeta = EvidenceMeta.extend({
  stage: z.string(),
  exitCode: z.number().int(),
  timedOut: z.boolean(),
  durationMs: z.number().int().nonnegative(),
  stdoutFile: z.string(),
  stderrFile: z.string()
});

export type EvidenceMeta = z.infer<typeof EvidenceMeta>;
export type StageEvidenceMeta = z.infer<typeof StageEvidenceMeta>;
