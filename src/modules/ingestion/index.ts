export {
  BatchIngestionDriver,
  partitionIntoBatches,
} from "./pipeline";
export type { BatchIngestionDeps, Sleep } from "./pipeline";
export {
  DIMENSION_PROBE_TEXT,
  IndexCompatibilityGuard,
} from "./compatibility-guard";
export { RateGovernor } from "./rate-governor";
export type { DailyBudgetCheck } from "./rate-governor";
