import { z } from 'zod';
import { Lifecycle } from '../events/types.js';

/** Precedence tiers, highest first. */
export enum Tier {
  Completed = 'completed',
  Cancelled = 'cancelled',
  Active = 'active',
  External = 'external',
  Open = 'open',
}

/** Stage labels of the default table. */
export enum Stage {
  Proposed = 'proposed',
  Planned = 'planned',
  Suspended = 'suspended',
  External = 'external',
  InProgress = 'in_progress',
  Active = 'active',
  Completed = 'completed',
  Cancelled = 'cancelled',
}

/**
 * The stored and derived facts classification reads. Never persisted.
 */
export interface TaskFacts {
  lifecycle: Lifecycle;
  timerOn: boolean;
  waiting: boolean;
  queued: boolean;
  /** At least one work session exists. */
  history: boolean;
}

export const StageRuleSchema = z.object({
  tier: z.nativeEnum(Tier),
  queued: z.boolean().nullable(),
  history: z.boolean().nullable(),
  stage: z.string().min(1).max(64),
  sortOrder: z.number().int(),
  color: z.string().min(1).max(32),
});

/**
 * One row of a stage table. `queued` and `history` of null match either
 * value.
 */
export type StageRule = z.infer<typeof StageRuleSchema>;

export const DEFAULT_STAGE_RULES: readonly StageRule[] = [
  { tier: Tier.Completed, queued: null, history: null, stage: Stage.Completed, sortOrder: 6, color: 'gray' },
  { tier: Tier.Cancelled, queued: null, history: null, stage: Stage.Cancelled, sortOrder: 7, color: 'gray' },
  { tier: Tier.Active, queued: null, history: null, stage: Stage.Active, sortOrder: 5, color: 'green' },
  { tier: Tier.External, queued: null, history: null, stage: Stage.External, sortOrder: 3, color: 'magenta' },
  { tier: Tier.Open, queued: false, history: false, stage: Stage.Proposed, sortOrder: 0, color: 'gray' },
  { tier: Tier.Open, queued: true, history: false, stage: Stage.Planned, sortOrder: 1, color: 'blue' },
  { tier: Tier.Open, queued: true, history: true, stage: Stage.InProgress, sortOrder: 4, color: 'cyan' },
  { tier: Tier.Open, queued: false, history: true, stage: Stage.Suspended, sortOrder: 2, color: 'yellow' },
];

export function tierOf(facts: TaskFacts): Tier {
  if (facts.lifecycle === Lifecycle.Closed) return Tier.Completed;
  if (facts.lifecycle === Lifecycle.Cancelled) return Tier.Cancelled;
  if (facts.timerOn) return Tier.Active;
  if (facts.waiting) return Tier.External;
  return Tier.Open;
}
