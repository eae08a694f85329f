import { ok, err, type Result } from 'neverthrow';
import type {
  Allocation,
  BalanceReport,
  CovariateMap,
  CovariateValue,
  GroupName,
  ParticipantId,
} from '../types/allocation.js';
import { AllocationLookupError, DataIntegrityError } from '../types/errors.js';

/**
 * Receives every report produced by `BalanceReporter.check`, together with
 * its one-line summary.
 */
export type ReportListener = (report: BalanceReport, summary: string) => void;

/** Per group, the number of members holding each covariate value. */
export type CovariateBalance = Map<GroupName, Map<string, number>>;

export interface VerifyOptions {
  /**
   * Number of times each participant is expected to appear. Permuted block
   * allocations in `per-size` layout repeat every participant once per size.
   */
  copies?: number;
}

/** Stable key for comparing covariate values, arrays included. */
export function covariateKey(value: CovariateValue): string {
  return JSON.stringify(value);
}

/**
 * Render a report as `Group sizes: {Treatment: 4, Control: 4}`.
 */
export function formatGroupSizes(report: BalanceReport): string {
  const entries = [...report].map(([group, size]) => `${group}: ${size}`);
  return `Group sizes: {${entries.join(', ')}}`;
}

/** Difference between the largest and the smallest group; 0 when empty. */
export function sizeSpread(report: BalanceReport): number {
  const sizes = [...report.values()];
  if (sizes.length === 0) return 0;
  return Math.max(...sizes) - Math.min(...sizes);
}

/**
 * Count, per group, how many members carry each covariate value.
 * Value keys come from `covariateKey`.
 */
export function covariateBalance(
  allocation: Allocation,
  covariates: CovariateMap,
): Result<CovariateBalance, AllocationLookupError> {
  const balance: CovariateBalance = new Map();

  for (const [group, members] of allocation) {
    const counts = new Map<string, number>();
    for (const participant of members) {
      const value = covariates.get(participant);
      if (value === undefined) {
        return err(
          new AllocationLookupError(`No covariate value for participant ${String(participant)}`, participant),
        );
      }
      const key = covariateKey(value);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    balance.set(group, counts);
  }

  return ok(balance);
}

/**
 * Check that an allocation holds every participant exactly `copies` times
 * and nothing else.
 */
export function verifyAllocation(
  allocation: Allocation,
  participants: readonly ParticipantId[],
  options: VerifyOptions = {},
): Result<void, DataIntegrityError> {
  const copies = options.copies ?? 1;
  const seen = new Map<ParticipantId, number>(participants.map((p) => [p, 0]));
  const unknown: ParticipantId[] = [];

  for (const members of allocation.values()) {
    for (const participant of members) {
      const count = seen.get(participant);
      if (count === undefined) {
        if (!unknown.includes(participant)) unknown.push(participant);
        continue;
      }
      seen.set(participant, count + 1);
    }
  }

  const missing: ParticipantId[] = [];
  const duplicated: ParticipantId[] = [];
  for (const [participant, count] of seen) {
    if (count < copies) missing.push(participant);
    if (count > copies) duplicated.push(participant);
  }

  if (missing.length === 0 && duplicated.length === 0 && unknown.length === 0) {
    return ok(undefined);
  }

  const problems: string[] = [];
  if (missing.length > 0) problems.push(`missing ${missing.join(', ')}`);
  if (duplicated.length > 0) problems.push(`duplicated ${duplicated.join(', ')}`);
  if (unknown.length > 0) problems.push(`unknown ${unknown.join(', ')}`);

  return err(
    new DataIntegrityError(`Allocation integrity check failed: ${problems.join('; ')}`, {
      missing,
      duplicated,
      unknown,
    }),
  );
}

export class BalanceReporter {
  private readonly listener: ReportListener | undefined;

  constructor(listener?: ReportListener) {
    this.listener = listener;
  }

  /**
   * Compute group sizes for an allocation and emit them to the listener.
   */
  check(allocation: Allocation): BalanceReport {
    const report: BalanceReport = new Map();
    for (const [group, members] of allocation) {
      report.set(group, members.length);
    }
    this.listener?.(report, formatGroupSizes(report));
    return report;
  }
}
