import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { Lifecycle } from '../events/types.js';
import { classify, StageTable } from './classify.js';
import { DEFAULT_STAGE_RULES, Stage, StageRuleSchema, Tier, tierOf, type TaskFacts } from './stages.js';

function facts(partial: Partial<TaskFacts>): TaskFacts {
  return {
    lifecycle: Lifecycle.Open,
    timerOn: false,
    waiting: false,
    queued: false,
    history: false,
    ...partial,
  };
}

const factsArb = fc.record({
  lifecycle: fc.constantFrom(Lifecycle.Open, Lifecycle.Closed, Lifecycle.Cancelled),
  timerOn: fc.boolean(),
  waiting: fc.boolean(),
  queued: fc.boolean(),
  history: fc.boolean(),
});

describe('tierOf', () => {
  it('applies precedence from lifecycle down to open', () => {
    const everything = facts({ timerOn: true, waiting: true, queued: true, history: true });
    expect(tierOf({ ...everything, lifecycle: Lifecycle.Closed })).toBe(Tier.Completed);
    expect(tierOf({ ...everything, lifecycle: Lifecycle.Cancelled })).toBe(Tier.Cancelled);
    expect(tierOf(everything)).toBe(Tier.Active);
    expect(tierOf({ ...everything, timerOn: false })).toBe(Tier.External);
    expect(tierOf({ ...everything, timerOn: false, waiting: false })).toBe(Tier.Open);
  });
});

describe('classify with the default table', () => {
  it.each([
    [facts({}), Stage.Proposed],
    [facts({ queued: true }), Stage.Planned],
    [facts({ queued: true, history: true }), Stage.InProgress],
    [facts({ history: true }), Stage.Suspended],
    [facts({ waiting: true, history: true }), Stage.External],
    [facts({ timerOn: true, queued: true, waiting: true }), Stage.Active],
    [facts({ lifecycle: Lifecycle.Closed, queued: true }), Stage.Completed],
    [facts({ lifecycle: Lifecycle.Cancelled, history: true }), Stage.Cancelled],
  ])('classifies %o as %s', (input, expected) => {
    expect(classify(input)).toBe(expected);
  });

  it('is defined for every fact combination', () => {
    fc.assert(
      fc.property(factsArb, input => {
        const stage = classify(input);
        return Object.values(Stage).some(s => s === stage);
      })
    );
  });
});

describe('StageTable', () => {
  it('prefers an override with the same key', () => {
    const table = new StageTable([
      { tier: Tier.Open, queued: true, history: true, stage: 'doing', sortOrder: 4, color: 'white' },
    ]);

    expect(classify(facts({ queued: true, history: true }), table)).toBe('doing');
    expect(classify(facts({ queued: true }), table)).toBe(Stage.Planned);
  });

  it('lets a wildcard override cover a whole tier', () => {
    const table = new StageTable([
      { tier: Tier.Open, queued: null, history: null, stage: 'todo', sortOrder: 0, color: 'white' },
    ]);

    expect(classify(facts({}), table)).toBe('todo');
    expect(classify(facts({ queued: true, history: true }), table)).toBe('todo');
    expect(classify(facts({ waiting: true }), table)).toBe(Stage.External);
  });

  it('picks the most specific override', () => {
    const table = new StageTable([
      { tier: Tier.Open, queued: true, history: null, stage: 'queued', sortOrder: 1, color: 'blue' },
      { tier: Tier.Open, queued: null, history: null, stage: 'todo', sortOrder: 0, color: 'white' },
    ]);

    expect(classify(facts({ queued: true }), table)).toBe('queued');
    expect(classify(facts({}), table)).toBe('todo');
  });

  it('stays total with any set of overrides', () => {
    fc.assert(
      fc.property(
        fc.array(
          fc.record({
            tier: fc.constantFrom(...Object.values(Tier)),
            queued: fc.constantFrom(true, false, null),
            history: fc.constantFrom(true, false, null),
            stage: fc.constantFrom('x', 'y', 'z'),
            sortOrder: fc.integer({ min: 0, max: 9 }),
            color: fc.constant('gray'),
          }),
          { maxLength: 6 }
        ),
        factsArb,
        (overrides, input) => {
          const table = new StageTable(overrides);
          return typeof table.resolve(input).stage === 'string';
        }
      )
    );
  });

  it('lists the effective rows by sort order', () => {
    const table = new StageTable([
      { tier: Tier.Active, queued: null, history: null, stage: 'now', sortOrder: 9, color: 'red' },
    ]);

    const rules = table.rules();
    expect(rules).toHaveLength(DEFAULT_STAGE_RULES.length);
    expect(rules.map(r => r.stage)).toEqual([
      'proposed',
      'planned',
      'suspended',
      'external',
      'in_progress',
      'completed',
      'cancelled',
      'now',
    ]);
  });
});

describe('StageRuleSchema', () => {
  it('accepts a wildcard row and rejects an unknown tier', () => {
    expect(
      StageRuleSchema.safeParse({ tier: 'open', queued: null, history: true, stage: 'x', sortOrder: 1, color: 'red' }).success
    ).toBe(true);
    expect(
      StageRuleSchema.safeParse({ tier: 'someday', queued: null, history: null, stage: 'x', sortOrder: 1, color: 'red' }).success
    ).toBe(false);
  });
});
