import { readFile } from 'node:fs/promises';
import { ok, err, type Result } from 'neverthrow';
import { parse } from 'yaml';
import { z } from 'zod';
import type {
  CovariateMap,
  CovariateValue,
  MemberLists,
  ParticipantId,
  PermutedBlockLayout,
} from '../types/allocation.js';

export class TrialConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TrialConfigError';
  }
}

export const DEFAULT_TRIAL_FILE = 'trial.yaml';

export const STRATEGY_TYPES = [
  'simple',
  'block',
  'stratified',
  'minimization',
  'covariate-adaptive',
  'permuted-block',
  'cluster',
] as const;

export type StrategyType = (typeof STRATEGY_TYPES)[number];

// --- Zod Schemas ---

const participantIdSchema = z.union([
  z.string().min(1, 'Participant id must not be empty'),
  z.number().int('Numeric participant ids must be integers'),
]);

const covariateScalarSchema = z.union([z.string(), z.number(), z.boolean()]);
const covariateValueSchema = z.union([covariateScalarSchema, z.array(covariateScalarSchema).min(1)]);

const memberListsSchema = z.record(z.string(), z.array(participantIdSchema));

const blockSizeSchema = z
  .number()
  .int('Block size must be an integer')
  .positive('Block size must be positive');

const strategySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('simple') }),
  z.object({ type: z.literal('block'), blockSize: blockSizeSchema }),
  z.object({ type: z.literal('stratified'), strata: memberListsSchema }),
  z.object({ type: z.literal('minimization'), covariates: z.record(z.string(), covariateValueSchema) }),
  z.object({ type: z.literal('covariate-adaptive'), covariates: z.record(z.string(), covariateValueSchema) }),
  z.object({
    type: z.literal('permuted-block'),
    blockSizes: z.array(blockSizeSchema).min(1, 'At least one block size is required'),
    layout: z.enum(['per-size', 'varied']).optional(),
  }),
  z.object({ type: z.literal('cluster'), clusters: memberListsSchema }),
]);

const trialConfigSchema = z.object({
  version: z.string().min(1, 'Version must not be empty'),
  name: z.string().min(1, 'Trial name must not be empty'),
  participants: z.array(participantIdSchema).min(1, 'At least one participant is required'),
  groups: z.array(z.string().min(1, 'Group names must not be empty')).min(2, 'At least 2 groups are required'),
  seed: z.union([z.number().int('Seed must be an integer'), z.string().min(1)]).optional(),
  shuffleInPlace: z.boolean().optional(),
  strategy: strategySchema,
});

type TrialConfigInput = z.infer<typeof trialConfigSchema>;
type StrategyInput = z.infer<typeof strategySchema>;

// --- Parsed config ---

export type StrategyConfig =
  | { type: 'simple' }
  | { type: 'block'; blockSize: number }
  | { type: 'stratified'; strata: MemberLists }
  | { type: 'minimization' | 'covariate-adaptive'; covariates: CovariateMap }
  | { type: 'permuted-block'; blockSizes: number[]; layout: PermutedBlockLayout }
  | { type: 'cluster'; clusters: MemberLists };

export interface TrialConfig {
  version: string;
  name: string;
  participants: ParticipantId[];
  groups: string[];
  seed?: number | string;
  shuffleInPlace: boolean;
  strategy: StrategyConfig;
}

const DEFAULTS = {
  version: '1',
  name: 'unnamed-trial',
  strategy: { type: 'simple' },
} as const;

// --- Helpers ---

/** Render zod issues as `path: message; ...`, using `root` for the top level. */
export function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

function applyDefaults(partial: Record<string, unknown>): Record<string, unknown> {
  return {
    ...partial,
    version: partial['version'] ?? DEFAULTS.version,
    name: partial['name'] ?? DEFAULTS.name,
    strategy: partial['strategy'] ?? DEFAULTS.strategy,
  };
}

/**
 * YAML mapping keys are always strings, so covariate keys are matched to
 * participants through their string form.
 */
function toCovariateMap(
  raw: Record<string, CovariateValue>,
  participants: readonly ParticipantId[],
): CovariateMap {
  const byKey = new Map<string, ParticipantId>(participants.map((p) => [String(p), p]));
  const covariates = new Map<ParticipantId, CovariateValue>();
  for (const [key, value] of Object.entries(raw)) {
    covariates.set(byKey.get(key) ?? key, value);
  }
  return covariates;
}

function toStrategyConfig(strategy: StrategyInput, participants: readonly ParticipantId[]): StrategyConfig {
  switch (strategy.type) {
    case 'minimization':
    case 'covariate-adaptive':
      return { type: strategy.type, covariates: toCovariateMap(strategy.covariates, participants) };
    case 'permuted-block':
      return { type: 'permuted-block', blockSizes: strategy.blockSizes, layout: strategy.layout ?? 'per-size' };
    default:
      return strategy;
  }
}

function toTrialConfig(input: TrialConfigInput): TrialConfig {
  const config: TrialConfig = {
    version: input.version,
    name: input.name,
    participants: input.participants,
    groups: input.groups,
    shuffleInPlace: input.shuffleInPlace ?? true,
    strategy: toStrategyConfig(input.strategy, input.participants),
  };
  if (input.seed !== undefined) config.seed = input.seed;
  return config;
}

// --- Public API ---

/**
 * Parse and validate a YAML trial definition.
 */
export function parseTrialConfig(source: string): Result<TrialConfig, TrialConfigError> {
  let parsed: unknown;
  try {
    parsed = parse(source);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new TrialConfigError(`Invalid YAML in trial file: ${message}`));
  }

  if (parsed === null || parsed === undefined || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return err(new TrialConfigError('Trial file is empty or not a valid YAML object'));
  }

  const withDefaults = applyDefaults({ ...parsed });

  const validationResult = trialConfigSchema.safeParse(withDefaults);
  if (!validationResult.success) {
    return err(new TrialConfigError(`Trial validation failed: ${formatZodErrors(validationResult.error)}`));
  }

  return ok(toTrialConfig(validationResult.data));
}

/**
 * Read and validate the trial definition at `filePath`.
 */
export async function loadTrialConfig(filePath: string): Promise<Result<TrialConfig, TrialConfigError>> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch {
    return err(new TrialConfigError(`Trial file not found: ${filePath}`));
  }
  return parseTrialConfig(content);
}
