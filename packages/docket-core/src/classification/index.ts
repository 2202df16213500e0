export {
  Tier,
  Stage,
  StageRuleSchema,
  DEFAULT_STAGE_RULES,
  tierOf,
  type StageRule,
  type TaskFacts,
} from './stages.js';
export { StageTable, DEFAULT_STAGE_TABLE, classify } from './classify.js';
