import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { TrialRun } from '@rct-allocate/core';
import { formatTrialRun, formatTrialRunJSON, parseSeedOption, runAllocate } from './allocate.js';

const TRIAL_YAML = `
name: pilot
participants: [P1, P2, P3, P4, P5, P6]
groups: [Treatment, Control]
seed: 42
strategy:
  type: block
  blockSize: 2
`;

function makeRun(overrides: Partial<TrialRun> = {}): TrialRun {
  return {
    config: {
      version: '1',
      name: 'demo',
      participants: ['P1', 'P2', 'P3'],
      groups: ['Treatment', 'Control'],
      seed: 42,
      shuffleInPlace: true,
      strategy: { type: 'simple' },
    },
    seed: 42,
    allocation: new Map([
      ['Treatment', ['P1', 'P3']],
      ['Control', ['P2']],
    ]),
    report: new Map([
      ['Treatment', 2],
      ['Control', 1],
    ]),
    participantOrder: ['P1', 'P2', 'P3'],
    copies: 1,
    ...overrides,
  };
}

beforeAll(() => {
  chalk.level = 0;
});

describe('parseSeedOption', () => {
  it('should turn integer text into a number', () => {
    expect(parseSeedOption('42')).toBe(42);
    expect(parseSeedOption('-3')).toBe(-3);
  });

  it('should keep other text as a string seed', () => {
    expect(parseSeedOption('pilot-2024')).toBe('pilot-2024');
    expect(parseSeedOption('4.2')).toBe('4.2');
  });
});

describe('formatTrialRun', () => {
  it('should list the trial header, every group and the size summary', () => {
    expect(formatTrialRun(makeRun()).split('\n')).toEqual([
      'Trial: demo',
      '  Strategy:     simple',
      '  Participants: 3',
      '  Seed:         42',
      '',
      'Treatment (2)',
      '  P1, P3',
      'Control (1)',
      '  P2',
      '',
      'Group sizes: {Treatment: 2, Control: 1}',
      'Size spread: 1',
    ]);
  });

  it('should mark a run without a seed', () => {
    expect(formatTrialRun(makeRun({ seed: undefined }))).toContain('  Seed:         none');
  });

  it('should mark empty groups', () => {
    const output = formatTrialRun(
      makeRun({
        allocation: new Map([
          ['Treatment', ['P1', 'P2', 'P3']],
          ['Control', []],
        ]),
        report: new Map([
          ['Treatment', 3],
          ['Control', 0],
        ]),
      }),
    );
    expect(output.split('\n')).toContain('  no participants');
    expect(output.split('\n')).toContain('Size spread: 3');
  });

  it('should note repeated participants', () => {
    const lines = formatTrialRun(makeRun({ copies: 2 })).split('\n');
    expect(lines[lines.length - 1]).toBe('Each participant appears 2 times (one partition per block size).');
  });
});

describe('formatTrialRunJSON', () => {
  it('should emit allocation, sizes and spread', () => {
    expect(JSON.parse(formatTrialRunJSON(makeRun()))).toEqual({
      name: 'demo',
      strategy: 'simple',
      seed: 42,
      groups: ['Treatment', 'Control'],
      allocation: { Treatment: ['P1', 'P3'], Control: ['P2'] },
      groupSizes: { Treatment: 2, Control: 1 },
      spread: 1,
    });
  });

  it('should list integer-like group names in declared order', () => {
    const output = JSON.parse(
      formatTrialRunJSON(
        makeRun({
          allocation: new Map([
            ['2', ['P1', 'P3']],
            ['1', ['P2']],
          ]),
          report: new Map([
            ['2', 2],
            ['1', 1],
          ]),
        }),
      ),
    );

    expect(output.groups).toEqual(['2', '1']);
  });

  it('should emit a null seed when none was used', () => {
    expect(JSON.parse(formatTrialRunJSON(makeRun({ seed: undefined }))).seed).toBeNull();
  });
});

describe('runAllocate', () => {
  let tempDir: string;
  let trialPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'rct-allocate-test-'));
    trialPath = join(tempDir, 'trial.yaml');
    await writeFile(trialPath, TRIAL_YAML, 'utf-8');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should allocate every participant once', async () => {
    const result = await runAllocate(trialPath, {});

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      const members = [...result.value.allocation.values()].flat();
      expect([...members].sort()).toEqual(['P1', 'P2', 'P3', 'P4', 'P5', 'P6']);
      expect(result.value.report).toEqual(
        new Map([
          ['Treatment', 3],
          ['Control', 3],
        ]),
      );
      expect(result.value.seed).toBe(42);
    }
  });

  it('should reproduce the same allocation from the same file', async () => {
    const first = (await runAllocate(trialPath, {}))._unsafeUnwrap();
    const second = (await runAllocate(trialPath, {}))._unsafeUnwrap();

    expect(second.allocation).toEqual(first.allocation);
  });

  it('should use the seed option instead of the file seed', async () => {
    const overridden = (await runAllocate(trialPath, { seed: '7' }))._unsafeUnwrap();

    expect(overridden.seed).toBe(7);
    expect(overridden.config.seed).toBe(42);
  });

  it('should return an error for a missing trial file', async () => {
    const missing = join(tempDir, 'absent.yaml');
    const result = await runAllocate(missing, {});

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(`Trial file not found: ${missing}`);
    }
  });

  it('should return the engine error for an invalid strategy', async () => {
    await writeFile(
      trialPath,
      'participants: [P1, P2]\ngroups: [A, B]\nstrategy:\n  type: stratified\n  strata:\n    s1: [P1, P9]\n',
      'utf-8',
    );
    const result = await runAllocate(trialPath, {});

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Stratum "s1" references unknown participant P9');
    }
  });
});
