import { ok, err, type Result } from 'neverthrow';
import type {
  Allocation,
  BalanceReport,
  CovariateMap,
  GroupName,
  MemberLists,
  ParticipantId,
  PermutedBlockOptions,
} from '../types/allocation.js';
import { AllocationLookupError, ConfigurationError } from '../types/errors.js';
import { SeededRandomSource, type RandomSource, type Seed } from '../random/random-source.js';
import { BalanceReporter, covariateKey, type ReportListener } from '../report/balance-reporter.js';
import {
  dealRoundRobin,
  mergeAllocation,
  partitionBlocks,
  partitionVariedBlocks,
  shuffleBlocks,
} from './dealing.js';

export interface AllocationEngineOptions {
  /** Seeds an engine-owned random source. Omit for non-deterministic draws. */
  seed?: Seed;
  /** Injected random source; takes precedence over `seed`. */
  random?: RandomSource;
  /**
   * When true (the default), simple randomization reorders the stored
   * participant order and later strategies see the shuffled order. When false,
   * strategies never change the stored order.
   */
  shuffleInPlace?: boolean;
  /** Called with every balance report produced by `randomizationCheck`. */
  onReport?: ReportListener;
}

function validateBlockSize(blockSize: number, label: string): ConfigurationError | undefined {
  if (!Number.isInteger(blockSize) || blockSize < 1) {
    return new ConfigurationError(`${label} must be an integer >= 1, got ${String(blockSize)}`);
  }
  return undefined;
}

/**
 * Allocates a fixed participant universe to a fixed, ordered list of groups.
 *
 * Each strategy returns a fresh `Allocation`; the engine keeps no allocation
 * state between calls. It does keep the participant order as mutable state:
 * with `shuffleInPlace` on, `simpleRandomization` leaves the order shuffled,
 * and block, permuted block and minimization strategies consume the stored
 * order as it stands. Use one engine per caller when call order must not leak
 * between callers.
 */
export class AllocationEngine {
  private readonly order: ParticipantId[];
  private readonly universe: ReadonlySet<ParticipantId>;
  private readonly groupNames: readonly GroupName[];
  private readonly random: RandomSource;
  private readonly shuffleInPlace: boolean;
  private readonly reporter: BalanceReporter;

  private constructor(
    participants: readonly ParticipantId[],
    groups: readonly GroupName[],
    random: RandomSource,
    options: AllocationEngineOptions,
  ) {
    this.order = [...participants];
    this.universe = new Set(participants);
    this.groupNames = [...groups];
    this.random = random;
    this.shuffleInPlace = options.shuffleInPlace ?? true;
    this.reporter = new BalanceReporter(options.onReport);
  }

  /**
   * Validate the universe and build an engine.
   *
   * Participants must be non-empty and unique; groups must number at least
   * two, with unique non-empty names.
   */
  static create(
    participants: readonly ParticipantId[],
    groups: readonly GroupName[],
    options: AllocationEngineOptions = {},
  ): Result<AllocationEngine, ConfigurationError> {
    if (participants.length === 0) {
      return err(new ConfigurationError('At least one participant is required'));
    }
    const duplicateParticipant = participants.find((p, i) => participants.indexOf(p) !== i);
    if (duplicateParticipant !== undefined) {
      return err(new ConfigurationError(`Duplicate participant: ${String(duplicateParticipant)}`));
    }

    if (groups.length === 0) {
      return err(new ConfigurationError('Group list must not be empty'));
    }
    if (groups.length < 2) {
      return err(new ConfigurationError(`At least 2 groups are required, got ${groups.length}`));
    }
    if (groups.some((g) => g.trim().length === 0)) {
      return err(new ConfigurationError('Group names must not be empty'));
    }
    const duplicateGroup = groups.find((g, i) => groups.indexOf(g) !== i);
    if (duplicateGroup !== undefined) {
      return err(new ConfigurationError(`Duplicate group name: ${duplicateGroup}`));
    }

    const { seed } = options;
    if (typeof seed === 'number' && !Number.isFinite(seed)) {
      return err(new ConfigurationError(`Seed must be a finite number, got ${seed}`));
    }
    if (typeof seed === 'string' && seed.length === 0) {
      return err(new ConfigurationError('Seed must not be an empty string'));
    }

    const random = options.random ?? SeededRandomSource.fromSeed(seed);
    return ok(new AllocationEngine(participants, groups, random, options));
  }

  /** Current stored participant order. */
  get participants(): readonly ParticipantId[] {
    return this.order;
  }

  get groups(): readonly GroupName[] {
    return this.groupNames;
  }

  /**
   * Shuffle all participants and deal them round-robin in group order.
   */
  simpleRandomization(): Allocation {
    const sequence = this.shuffleInPlace ? this.order : [...this.order];
    this.random.shuffle(sequence);
    return dealRoundRobin(sequence, this.groupNames);
  }

  /**
   * Shuffle consecutive blocks of `blockSize` participants independently,
   * keep the blocks in their original order, then deal round-robin.
   */
  blockRandomization(blockSize: number): Result<Allocation, ConfigurationError> {
    const invalid = validateBlockSize(blockSize, 'Block size');
    if (invalid) return err(invalid);

    const sequence = shuffleBlocks(partitionBlocks(this.order, blockSize), this.random);
    return ok(dealRoundRobin(sequence, this.groupNames));
  }

  /**
   * Randomize each stratum on its own and concatenate the per-group results
   * in stratum order. Participants outside every stratum are left out.
   *
   * Strata are not checked for overlap: a participant listed in two strata
   * is allocated once per stratum and may land in two groups.
   */
  stratifiedRandomization(strata: MemberLists): Result<Allocation, AllocationLookupError> {
    const allocation: Allocation = dealRoundRobin<ParticipantId>([], this.groupNames);

    for (const [stratum, members] of Object.entries(strata)) {
      const unknown = this.findUnknown(members);
      if (unknown !== undefined) {
        return err(
          new AllocationLookupError(
            `Stratum "${stratum}" references unknown participant ${String(unknown)}`,
            unknown,
          ),
        );
      }

      const shuffled = [...members];
      this.random.shuffle(shuffled);
      mergeAllocation(allocation, dealRoundRobin(shuffled, this.groupNames));
    }

    return ok(allocation);
  }

  /**
   * Greedy minimization over a single covariate. Each participant, taken in
   * stored order, joins the group holding the fewest members with the same
   * covariate value; ties go to the earliest declared group.
   */
  minimization(covariates: CovariateMap): Result<Allocation, AllocationLookupError> {
    const allocation: Allocation = dealRoundRobin<ParticipantId>([], this.groupNames);
    const countsByGroup = new Map<GroupName, Map<string, number>>(
      this.groupNames.map((group) => [group, new Map()]),
    );

    for (const participant of this.order) {
      const value = covariates.get(participant);
      if (value === undefined) {
        return err(
          new AllocationLookupError(`No covariate value for participant ${String(participant)}`, participant),
        );
      }
      const key = covariateKey(value);

      let chosen = this.groupNames[0] as GroupName;
      let lowest = Number.POSITIVE_INFINITY;
      for (const group of this.groupNames) {
        const score = countsByGroup.get(group)?.get(key) ?? 0;
        if (score < lowest) {
          lowest = score;
          chosen = group;
        }
      }

      allocation.get(chosen)?.push(participant);
      const counts = countsByGroup.get(chosen);
      counts?.set(key, (counts.get(key) ?? 0) + 1);
    }

    return ok(allocation);
  }

  /** Alias of `minimization`. */
  covariateAdaptiveRandomization(covariates: CovariateMap): Result<Allocation, AllocationLookupError> {
    return this.minimization(covariates);
  }

  /**
   * Permuted block randomization over several block sizes.
   *
   * In the default `per-size` layout the whole stored order is partitioned
   * once for every size and all resulting blocks are shuffled and dealt, so
   * each participant is assigned `blockSizes.length` times. The `varied`
   * layout partitions the order once, drawing each block's size at random.
   */
  permutedBlockRandomization(
    blockSizes: readonly number[],
    options: PermutedBlockOptions = {},
  ): Result<Allocation, ConfigurationError> {
    if (blockSizes.length === 0) {
      return err(new ConfigurationError('At least one block size is required'));
    }
    for (const size of blockSizes) {
      const invalid = validateBlockSize(size, 'Every block size');
      if (invalid) return err(invalid);
    }

    const layout = options.layout ?? 'per-size';
    const blocks =
      layout === 'varied'
        ? partitionVariedBlocks(this.order, blockSizes, this.random)
        : blockSizes.flatMap((size) => partitionBlocks(this.order, size));

    return ok(dealRoundRobin(shuffleBlocks(blocks, this.random), this.groupNames));
  }

  /**
   * Shuffle cluster names, deal clusters round-robin, then expand each
   * cluster into its members in assignment order.
   *
   * Clusters are not checked for overlap: a participant listed in two
   * clusters appears once per cluster, possibly in two groups. Keeping
   * clusters disjoint is up to the caller.
   */
  clusterRandomization(clusters: MemberLists): Result<Allocation, AllocationLookupError> {
    for (const [cluster, members] of Object.entries(clusters)) {
      const unknown = this.findUnknown(members);
      if (unknown !== undefined) {
        return err(
          new AllocationLookupError(
            `Cluster "${cluster}" references unknown participant ${String(unknown)}`,
            unknown,
          ),
        );
      }
    }

    const names = Object.keys(clusters);
    this.random.shuffle(names);

    const allocation: Allocation = new Map();
    for (const [group, assigned] of dealRoundRobin(names, this.groupNames)) {
      allocation.set(
        group,
        assigned.flatMap((name) => [...(clusters[name] ?? [])]),
      );
    }
    return ok(allocation);
  }

  /** Group sizes of `allocation`, also emitted to the `onReport` listener. */
  randomizationCheck(allocation: Allocation): BalanceReport {
    return this.reporter.check(allocation);
  }

  private findUnknown(members: readonly ParticipantId[]): ParticipantId | undefined {
    return members.find((p) => !this.universe.has(p));
  }
}
