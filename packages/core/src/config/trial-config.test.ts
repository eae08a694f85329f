import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { z } from 'zod';
import { formatZodErrors, loadTrialConfig, parseTrialConfig, TrialConfigError } from './trial-config.js';

describe('parseTrialConfig', () => {
  it('should parse a complete block trial', () => {
    const source = `
version: "1"
name: pilot
participants: [P1, P2, P3, P4, P5, P6, P7, P8]
groups: [Treatment, Control]
seed: 42
shuffleInPlace: false
strategy:
  type: block
  blockSize: 4
`;
    const result = parseTrialConfig(source);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.name).toBe('pilot');
      expect(result.value.participants).toHaveLength(8);
      expect(result.value.groups).toEqual(['Treatment', 'Control']);
      expect(result.value.seed).toBe(42);
      expect(result.value.shuffleInPlace).toBe(false);
      expect(result.value.strategy).toEqual({ type: 'block', blockSize: 4 });
    }
  });

  it('should apply defaults for missing fields', () => {
    const result = parseTrialConfig('participants: [a, b]\ngroups: [x, y]\n');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.version).toBe('1');
      expect(result.value.name).toBe('unnamed-trial');
      expect(result.value.shuffleInPlace).toBe(true);
      expect(result.value.strategy).toEqual({ type: 'simple' });
      expect(result.value.seed).toBeUndefined();
    }
  });

  it('should default the permuted block layout to per-size', () => {
    const result = parseTrialConfig(`
participants: [a, b, c, d]
groups: [x, y]
strategy:
  type: permuted-block
  blockSizes: [2, 4]
`);

    expect(result._unsafeUnwrap().strategy).toEqual({ type: 'permuted-block', blockSizes: [2, 4], layout: 'per-size' });
  });

  it('should keep strata and clusters as member lists', () => {
    const stratified = parseTrialConfig(`
participants: [a, b, c, d]
groups: [x, y]
strategy:
  type: stratified
  strata:
    young: [a, b]
    old: [c, d]
`);

    expect(stratified._unsafeUnwrap().strategy).toEqual({
      type: 'stratified',
      strata: { young: ['a', 'b'], old: ['c', 'd'] },
    });
  });

  it('should map covariate keys onto numeric participant ids', () => {
    const result = parseTrialConfig(`
participants: [1, 2, 3]
groups: [x, y]
strategy:
  type: minimization
  covariates:
    "1": A
    "2": B
    "3": [A, 65]
`);

    const strategy = result._unsafeUnwrap().strategy;
    expect(strategy.type).toBe('minimization');
    if (strategy.type === 'minimization') {
      expect(strategy.covariates.get(1)).toBe('A');
      expect(strategy.covariates.get(2)).toBe('B');
      expect(strategy.covariates.get(3)).toEqual(['A', 65]);
      expect(strategy.covariates.has('1')).toBe(false);
    }
  });

  it('should keep covariate keys that match no participant as strings', () => {
    const result = parseTrialConfig(`
participants: [a, b]
groups: [x, y]
strategy:
  type: covariate-adaptive
  covariates:
    a: low
    z: high
`);

    const strategy = result._unsafeUnwrap().strategy;
    expect(strategy.type).toBe('covariate-adaptive');
    if (strategy.type === 'covariate-adaptive') {
      expect([...strategy.covariates.keys()]).toEqual(['a', 'z']);
    }
  });

  it('should reject invalid YAML', () => {
    const result = parseTrialConfig('participants: [a, b\n');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(TrialConfigError);
      expect(result.error.message).toMatch(/^Invalid YAML in trial file: /);
    }
  });

  it('should reject an empty document', () => {
    const result = parseTrialConfig('');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Trial file is empty or not a valid YAML object');
    }
  });

  it('should reject a top-level list', () => {
    const result = parseTrialConfig('- a\n- b\n');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Trial file is empty or not a valid YAML object');
    }
  });

  it('should report schema violations with their paths', () => {
    const result = parseTrialConfig('participants: [a, b]\ngroups: [only]\n');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Trial validation failed: groups: At least 2 groups are required');
    }
  });

  it('should reject a non-positive block size', () => {
    const result = parseTrialConfig(`
participants: [a, b]
groups: [x, y]
strategy:
  type: block
  blockSize: 0
`);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Trial validation failed: strategy.blockSize: Block size must be positive');
    }
  });

  it('should reject a missing participant list', () => {
    const result = parseTrialConfig('groups: [x, y]\n');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Trial validation failed: participants: Required');
    }
  });

  it('should reject an unknown strategy type', () => {
    const result = parseTrialConfig('participants: [a, b]\ngroups: [x, y]\nstrategy:\n  type: coin-flip\n');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toMatch(/^Trial validation failed: strategy\.type: /);
    }
  });
});

describe('formatZodErrors', () => {
  it('should join issue paths and messages', () => {
    const schema = z.object({ name: z.string(), sizes: z.array(z.number()) });
    const result = schema.safeParse({ name: 1, sizes: [2, 'x'] });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toBe(
        'name: Expected string, received number; sizes.1: Expected number, received string',
      );
    }
  });

  it('should label top-level issues as root', () => {
    const result = z.object({}).safeParse('text');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toBe('root: Expected object, received string');
    }
  });
});

describe('loadTrialConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'rct-allocate-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load a trial file from disk', async () => {
    const filePath = join(tempDir, 'trial.yaml');
    writeFileSync(filePath, 'name: disk-trial\nparticipants: [a, b, c]\ngroups: [x, y]\n');

    const result = await loadTrialConfig(filePath);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.name).toBe('disk-trial');
    }
  });

  it('should return an error for a missing file', async () => {
    const filePath = join(tempDir, 'missing.yaml');
    const result = await loadTrialConfig(filePath);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(TrialConfigError);
      expect(result.error.message).toBe(`Trial file not found: ${filePath}`);
    }
  });
});
