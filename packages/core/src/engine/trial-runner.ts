import { ok, err, type Result } from 'neverthrow';
import type { Allocation, BalanceReport, ParticipantId } from '../types/allocation.js';
import type { AllocationLookupError, ConfigurationError } from '../types/errors.js';
import type { Seed } from '../random/random-source.js';
import type { ReportListener } from '../report/balance-reporter.js';
import type { TrialConfig } from '../config/trial-config.js';
import { AllocationEngine, type AllocationEngineOptions } from './allocation-engine.js';

export interface TrialOverrides {
  /** Replaces the seed from the trial file. */
  seed?: Seed;
  onReport?: ReportListener;
}

export interface TrialRun {
  config: TrialConfig;
  /** Seed the engine ran with, after overrides. */
  seed: Seed | undefined;
  allocation: Allocation;
  report: BalanceReport;
  /** Stored participant order after the strategy ran. */
  participantOrder: ParticipantId[];
  /** How many times each participant is expected in `allocation`. */
  copies: number;
}

export type TrialRunError = ConfigurationError | AllocationLookupError;

function runStrategy(engine: AllocationEngine, config: TrialConfig): Result<Allocation, TrialRunError> {
  const { strategy } = config;
  switch (strategy.type) {
    case 'simple':
      return ok(engine.simpleRandomization());
    case 'block':
      return engine.blockRandomization(strategy.blockSize);
    case 'stratified':
      return engine.stratifiedRandomization(strategy.strata);
    case 'minimization':
      return engine.minimization(strategy.covariates);
    case 'covariate-adaptive':
      return engine.covariateAdaptiveRandomization(strategy.covariates);
    case 'permuted-block':
      return engine.permutedBlockRandomization(strategy.blockSizes, { layout: strategy.layout });
    case 'cluster':
      return engine.clusterRandomization(strategy.clusters);
  }
}

/**
 * Build an engine from a trial definition, run its strategy and report
 * group sizes.
 */
export function allocateTrial(
  config: TrialConfig,
  overrides: TrialOverrides = {},
): Result<TrialRun, TrialRunError> {
  const options: AllocationEngineOptions = { shuffleInPlace: config.shuffleInPlace };
  const seed = overrides.seed ?? config.seed;
  if (seed !== undefined) options.seed = seed;
  if (overrides.onReport) options.onReport = overrides.onReport;

  const engineResult = AllocationEngine.create(config.participants, config.groups, options);
  if (engineResult.isErr()) {
    return err(engineResult.error);
  }
  const engine = engineResult.value;

  const allocationResult = runStrategy(engine, config);
  if (allocationResult.isErr()) {
    return err(allocationResult.error);
  }

  const { strategy } = config;
  const copies =
    strategy.type === 'permuted-block' && strategy.layout === 'per-size' ? strategy.blockSizes.length : 1;

  return ok({
    config,
    seed,
    allocation: allocationResult.value,
    report: engine.randomizationCheck(allocationResult.value),
    participantOrder: [...engine.participants],
    copies,
  });
}
