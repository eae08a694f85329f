import type { GroupName } from '../types/allocation.js';
import type { RandomSource } from '../random/random-source.js';

/**
 * Deal items into groups in repeating cyclic order: group `i` receives
 * positions `i, i + G, i + 2G, ...`. Sizes differ by at most one and the
 * first `items.length % G` groups receive the extra item.
 */
export function dealRoundRobin<T>(
  items: readonly T[],
  groups: readonly GroupName[],
): Map<GroupName, T[]> {
  const dealt = new Map<GroupName, T[]>(groups.map((group) => [group, []]));
  if (groups.length === 0) return dealt;

  items.forEach((item, position) => {
    const group = groups[position % groups.length] as GroupName;
    dealt.get(group)?.push(item);
  });
  return dealt;
}

/**
 * Split `items` into consecutive copies of `blockSize` elements. The final
 * block holds the remainder and may be shorter.
 */
export function partitionBlocks<T>(items: readonly T[], blockSize: number): T[][] {
  const blocks: T[][] = [];
  for (let start = 0; start < items.length; start += blockSize) {
    blocks.push(items.slice(start, start + blockSize));
  }
  return blocks;
}

/**
 * Split `items` once into consecutive blocks whose sizes are drawn uniformly
 * from `blockSizes`. The final block may be shorter than its drawn size.
 */
export function partitionVariedBlocks<T>(
  items: readonly T[],
  blockSizes: readonly number[],
  random: RandomSource,
): T[][] {
  const blocks: T[][] = [];
  let start = 0;
  while (start < items.length) {
    const size = random.choice(blockSizes);
    blocks.push(items.slice(start, start + size));
    start += size;
  }
  return blocks;
}

/** Shuffle every block in place and flatten them in block order. */
export function shuffleBlocks<T>(blocks: T[][], random: RandomSource): T[] {
  const sequence: T[] = [];
  for (const block of blocks) {
    random.shuffle(block);
    sequence.push(...block);
  }
  return sequence;
}

/** Append every group's members from `source` onto `target`. */
export function mergeAllocation<T>(target: Map<GroupName, T[]>, source: ReadonlyMap<GroupName, readonly T[]>): void {
  for (const [group, members] of source) {
    const existing = target.get(group);
    if (existing) {
      existing.push(...members);
    } else {
      target.set(group, [...members]);
    }
  }
}
