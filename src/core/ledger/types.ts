import { z } from 'zod';

export const TimestampIso = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'timestamp must be ISO datetime' });

export const LedgerEnvelope = z.object({
  seq: z.number().int().positive(),
  timestamp: TimestampIso,
  type: z.string(),
  data: z.unknown()
});

// Canonical event types. This list can grow over time.
export const LedgerEventType = z.enum([
  'session_created',
  'session_completed',
  'session_failed',
  'session_cancelled',
  'session_resumed',
  'phase_transition',
  'generation_attempt',
  'generation_failed',
  'candidate_validated',
  'stage_executed',
  'infra_retry',
  'frontier_ranked',
  'feedback_applied',
  'diff_computed'
]);

export type LedgerEventType = z.infer<typeof LedgerEventType>;

const entryBase = {
  seq: z.number().int().positive(),
  timestamp: TimestampIso
};

export const SessionCreatedEvent = z.object({
  ...entryBase,
  type: z.literal('session_created'),
  data: z.object({
    sessionId: z.string(),
    goal: z.string(),
    phases: z.array(z.string())
  })
});

export const PhaseTransitionEvent = z.object({
  ...entryBase,
  type: z.literal('phase_transition'),
  data: z.object({
    from: z.string(),
    to: z.string(),
    action: z.string(),
    error: z.object({ code: z.string(), message: z.string() }).optional()
  })
});

export const CandidateValidatedEvent = z.object({
  ...entryBase,
  type: z.literal('candidate_validated'),
  data: z.object({
    phase: z.string(),
    sibling: z.string().optional(),
    candidate: z.number().int().nonnegative(),
    depth: z.number().int().nonnegative(),
    passed: z.boolean(),
    score: z.number(),
    failedStage: z.string().optional()
  })
});

// Typed events for the entries readers look at; anything else keeps the generic envelope.
export const LedgerEntrySchema = z.union([SessionCreatedEvent, PhaseTransitionEvent, CandidateValidatedEvent, LedgerEnvelope]);

export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;

export interface LedgerEntryInput {
  type: LedgerEventType;
  data: unknown;
}
