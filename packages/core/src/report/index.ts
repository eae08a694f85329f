export {
  BalanceReporter,
  covariateBalance,
  covariateKey,
  formatGroupSizes,
  sizeSpread,
  verifyAllocation,
} from './balance-reporter.js';
export type { CovariateBalance, ReportListener, VerifyOptions } from './balance-reporter.js';
