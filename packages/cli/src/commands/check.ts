import { Command } from 'commander';
import chalk from 'chalk';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import {
  BalanceReporter,
  TrialConfigError,
  covariateBalance,
  formatGroupSizes,
  loadTrialConfig,
  parseAllocationJSON,
  sizeSpread,
  verifyAllocation,
  type AllocationLookupError,
  type BalanceReport,
  type CovariateBalance,
  type DataIntegrityError,
} from '@rct-allocate/core';

export interface CheckResult {
  report: BalanceReport;
  spread: number;
  /** Present when a trial file was given. */
  integrity?: DataIntegrityError | null;
  /** Present when the trial's strategy balances on covariates. */
  covariates?: CovariateBalance;
}

export interface CheckOptions {
  trial?: string;
  json?: boolean;
}

/**
 * Read an allocation JSON file and summarize it. With a trial file, also
 * verify participant coverage and covariate balance against the trial.
 */
export async function runCheck(
  allocationPath: string,
  trialPath?: string,
): Promise<Result<CheckResult, TrialConfigError | AllocationLookupError>> {
  let source: string;
  try {
    source = await readFile(allocationPath, 'utf-8');
  } catch {
    return err(new TrialConfigError(`Allocation file not found: ${allocationPath}`));
  }

  const allocationResult = parseAllocationJSON(source);
  if (allocationResult.isErr()) {
    return err(allocationResult.error);
  }
  const allocation = allocationResult.value;

  const report = new BalanceReporter().check(allocation);
  const result: CheckResult = { report, spread: sizeSpread(report) };

  if (trialPath === undefined) {
    return ok(result);
  }

  const configResult = await loadTrialConfig(trialPath);
  if (configResult.isErr()) {
    return err(configResult.error);
  }
  const { participants, strategy } = configResult.value;

  const copies = strategy.type === 'permuted-block' && strategy.layout === 'per-size' ? strategy.blockSizes.length : 1;
  const integrity = verifyAllocation(allocation, participants, { copies });
  result.integrity = integrity.isErr() ? integrity.error : null;

  if (strategy.type === 'minimization' || strategy.type === 'covariate-adaptive') {
    const balance = covariateBalance(allocation, strategy.covariates);
    if (balance.isErr()) {
      return err(balance.error);
    }
    result.covariates = balance.value;
  }

  return ok(result);
}

/**
 * Format a check result for terminal display.
 */
export function formatCheckResult(result: CheckResult): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Allocation Check'));
  lines.push('');
  lines.push(formatGroupSizes(result.report));
  const spreadColor = result.spread <= 1 ? chalk.green : chalk.yellow;
  lines.push(`Size spread: ${spreadColor(String(result.spread))}`);

  if (result.integrity !== undefined) {
    lines.push(
      result.integrity === null
        ? `Integrity:   ${chalk.green('ok')}`
        : `Integrity:   ${chalk.red(result.integrity.message)}`,
    );
  }

  if (result.covariates) {
    lines.push('');
    lines.push(chalk.bold('Covariate balance'));
    for (const [group, counts] of result.covariates) {
      const entries = [...counts].map(([value, count]) => `${value}=${count}`);
      lines.push(`  ${group}: ${entries.length > 0 ? entries.join(', ') : chalk.dim('none')}`);
    }
  }

  return lines.join('\n');
}

/**
 * Format a check result as JSON.
 */
export function formatCheckResultJSON(result: CheckResult): string {
  const output: Record<string, unknown> = {
    groups: [...result.report.keys()],
    groupSizes: Object.fromEntries(result.report),
    spread: result.spread,
  };
  if (result.integrity !== undefined) {
    output['integrity'] =
      result.integrity === null
        ? { ok: true }
        : {
            ok: false,
            missing: result.integrity.missing,
            duplicated: result.integrity.duplicated,
            unknown: result.integrity.unknown,
          };
  }
  if (result.covariates) {
    output['covariates'] = Object.fromEntries(
      [...result.covariates].map(([group, counts]) => [group, Object.fromEntries(counts)]),
    );
  }
  return JSON.stringify(output, null, 2);
}

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Report group sizes of an allocation JSON file')
    .argument('<allocation>', 'Allocation JSON file ({ "group": [ids] } or [["group", [ids]], ...])')
    .option('--trial <file>', 'Trial file to verify coverage and covariate balance against')
    .option('--json', 'Output in JSON format')
    .action(async (allocationFile: string, options: CheckOptions) => {
      try {
        const rootDir = process.cwd();
        const trialPath = options.trial === undefined ? undefined : resolve(rootDir, options.trial);
        const result = await runCheck(resolve(rootDir, allocationFile), trialPath);
        if (result.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('Check failed:'), result.error.message);
          process.exit(1);
        }

        // eslint-disable-next-line no-console
        console.log(options.json ? formatCheckResultJSON(result.value) : formatCheckResult(result.value));

        if (result.value.integrity) {
          process.exit(1);
        }
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Check failed:'), message);
        process.exit(1);
      }
    });
}
