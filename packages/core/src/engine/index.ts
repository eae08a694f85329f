export { AllocationEngine } from './allocation-engine.js';
export type { AllocationEngineOptions } from './allocation-engine.js';
export { allocateTrial } from './trial-runner.js';
export type { TrialOverrides, TrialRun, TrialRunError } from './trial-runner.js';
export {
  dealRoundRobin,
  partitionBlocks,
  partitionVariedBlocks,
  shuffleBlocks,
  mergeAllocation,
} from './dealing.js';
