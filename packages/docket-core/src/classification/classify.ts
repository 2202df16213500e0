import { DEFAULT_STAGE_RULES, type StageRule, type TaskFacts, type Tier, tierOf } from './stages.js';

function matches(rule: StageRule, tier: Tier, facts: TaskFacts): boolean {
  return (
    rule.tier === tier &&
    (rule.queued === null || rule.queued === facts.queued) &&
    (rule.history === null || rule.history === facts.history)
  );
}

function specificity(rule: StageRule): number {
  return (rule.queued === null ? 0 : 1) + (rule.history === null ? 0 : 1);
}

function mostSpecific(rules: readonly StageRule[], tier: Tier, facts: TaskFacts): StageRule | undefined {
  let best: StageRule | undefined;
  for (const rule of rules) {
    // Later rows win ties
    if (matches(rule, tier, facts) && (!best || specificity(rule) >= specificity(best))) {
      best = rule;
    }
  }
  return best;
}

/**
 * A stage lookup table: user rows first, the default table behind them.
 * Every fact combination resolves, because the default rows cover all of
 * them.
 */
export class StageTable {
  private readonly overrides: readonly StageRule[];

  constructor(overrides: readonly StageRule[] = []) {
    this.overrides = [...overrides];
  }

  resolve(facts: TaskFacts): StageRule {
    const tier = tierOf(facts);
    const rule = mostSpecific(this.overrides, tier, facts) ?? mostSpecific(DEFAULT_STAGE_RULES, tier, facts);
    if (!rule) {
      throw new Error(`No stage rule for tier ${tier}`);
    }
    return rule;
  }

  /** The effective rows: defaults replaced by overrides with the same key. */
  rules(): StageRule[] {
    const byKey = new Map<string, StageRule>();
    for (const rule of [...DEFAULT_STAGE_RULES, ...this.overrides]) {
      byKey.set(`${rule.tier}/${String(rule.queued)}/${String(rule.history)}`, rule);
    }
    return [...byKey.values()].sort((a, b) => a.sortOrder - b.sortOrder);
  }
}

export const DEFAULT_STAGE_TABLE = new StageTable();

export function classify(facts: TaskFacts, table: StageTable = DEFAULT_STAGE_TABLE): string {
  return table.resolve(facts).stage;
}
