/**
 * Ingestion module barrel exports
 */

export {
  startRun,
  finishRun,
  withRun,
  createScanAccumulator,
} from "./runLifecycle";

export { createRunBudget, budgetExhausted } from "./runBudget";

export { processCandidate } from "./processCandidate";
export type { CandidatePipelineDeps, CandidatePipelineOptions } from "./processCandidate";

export { scanChannel } from "./scanChannel";
export type { ChannelScanDeps, ScanSettings } from "./scanChannel";
