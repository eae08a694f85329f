export type {
  ParticipantId,
  GroupName,
  CovariateScalar,
  CovariateValue,
  CovariateMap,
  MemberLists,
  Allocation,
  BalanceReport,
  PermutedBlockLayout,
  PermutedBlockOptions,
  IntegrityViolations,
} from './types/index.js';

export { ConfigurationError, AllocationLookupError, DataIntegrityError } from './types/index.js';

export type { RandomSource, Seed } from './random/index.js';
export { BaseRandomSource, SeededRandomSource, FixedRandomSource } from './random/index.js';

export type { AllocationEngineOptions, TrialOverrides, TrialRun, TrialRunError } from './engine/index.js';
export {
  AllocationEngine,
  allocateTrial,
  dealRoundRobin,
  partitionBlocks,
  partitionVariedBlocks,
  shuffleBlocks,
  mergeAllocation,
} from './engine/index.js';

export type { CovariateBalance, ReportListener, VerifyOptions } from './report/index.js';
export {
  BalanceReporter,
  covariateBalance,
  covariateKey,
  formatGroupSizes,
  sizeSpread,
  verifyAllocation,
} from './report/index.js';

export {
  loadTrialConfig,
  parseTrialConfig,
  TrialConfigError,
  formatZodErrors,
  DEFAULT_TRIAL_FILE,
  STRATEGY_TYPES,
} from './config/trial-config.js';
export type { TrialConfig, StrategyConfig, StrategyType } from './config/trial-config.js';
export {
  allocationToRecord,
  parseAllocationJSON,
  preservesGroupOrder,
  serializeAllocation,
} from './config/allocation-file.js';
