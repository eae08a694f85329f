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
} from './allocation.js';
export type { IntegrityViolations } from './errors.js';
export { ConfigurationError, AllocationLookupError, DataIntegrityError } from './errors.js';
