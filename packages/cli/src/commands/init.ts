import { Command } from 'commander';
import chalk from 'chalk';
import { writeFile, access } from 'node:fs/promises';
import { join } from 'node:path';
import { stringify } from 'yaml';
import { DEFAULT_TRIAL_FILE, STRATEGY_TYPES, type StrategyType } from '@rct-allocate/core';

const SAMPLE_PARTICIPANTS = ['P1', 'P2', 'P3', 'P4', 'P5', 'P6', 'P7', 'P8'];

export function isStrategyType(value: string): value is StrategyType {
  return STRATEGY_TYPES.some((type) => type === value);
}

/**
 * Strategy block for a sample trial, with parameters filled in for the
 * sample participants.
 */
function buildSampleStrategy(type: StrategyType): Record<string, unknown> {
  switch (type) {
    case 'simple':
      return { type };
    case 'block':
      return { type, blockSize: 4 };
    case 'stratified':
      return {
        type,
        strata: {
          young: ['P1', 'P2', 'P3', 'P4'],
          old: ['P5', 'P6', 'P7', 'P8'],
        },
      };
    case 'minimization':
    case 'covariate-adaptive':
      return {
        type,
        covariates: Object.fromEntries(SAMPLE_PARTICIPANTS.map((p, i) => [p, i % 2 === 0 ? 'A' : 'B'])),
      };
    case 'permuted-block':
      return { type, blockSizes: [2, 4], layout: 'varied' };
    case 'cluster':
      return {
        type,
        clusters: {
          cluster1: ['P1', 'P2'],
          cluster2: ['P3', 'P4'],
          cluster3: ['P5', 'P6'],
          cluster4: ['P7', 'P8'],
        },
      };
  }
}

/**
 * Build the sample trial definition written by `init`.
 */
export function buildSampleTrial(type: StrategyType): Record<string, unknown> {
  return {
    version: '1',
    name: 'sample-trial',
    participants: SAMPLE_PARTICIPANTS,
    groups: ['Treatment', 'Control'],
    seed: 42,
    shuffleInPlace: true,
    strategy: buildSampleStrategy(type),
  };
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description(`Write a sample ${DEFAULT_TRIAL_FILE} in the current directory`)
    .option('--strategy <type>', `Allocation strategy (${STRATEGY_TYPES.join(', ')})`, 'simple')
    .option('--force', 'Overwrite an existing trial file')
    .action(async (options: { strategy: string; force?: boolean }) => {
      try {
        if (!isStrategyType(options.strategy)) {
          // eslint-disable-next-line no-console
          console.error(chalk.red(`Unknown strategy "${options.strategy}".`), `Use one of: ${STRATEGY_TYPES.join(', ')}`);
          process.exit(1);
        }

        const trialPath = join(process.cwd(), DEFAULT_TRIAL_FILE);
        if (!options.force) {
          try {
            await access(trialPath);
            // eslint-disable-next-line no-console
            console.error(chalk.red(`${DEFAULT_TRIAL_FILE} already exists.`), 'Use --force to overwrite.');
            process.exit(1);
          } catch {
            // File doesn't exist, proceed
          }
        }

        await writeFile(trialPath, stringify(buildSampleTrial(options.strategy)), 'utf-8');
        // eslint-disable-next-line no-console
        console.log(chalk.green('Created'), trialPath);
        // eslint-disable-next-line no-console
        console.log(chalk.dim('Run "rct-allocate allocate" to allocate the sample participants.'));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Init failed:'), message);
        process.exit(1);
      }
    });
}
