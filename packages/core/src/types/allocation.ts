/** Opaque participant identifier, unique within an engine's universe. */
export type ParticipantId = string | number;

/** Name of a treatment or control arm. */
export type GroupName = string;

export type CovariateScalar = string | number | boolean;

/**
 * A covariate value used by the balancing strategies. Arrays are treated as a
 * single composite value and compared element by element.
 */
export type CovariateValue = CovariateScalar | readonly CovariateScalar[];

export type CovariateMap = ReadonlyMap<ParticipantId, CovariateValue>;

/** Named member lists, used for both strata and clusters. */
export type MemberLists = Readonly<Record<string, readonly ParticipantId[]>>;

/**
 * Group to ordered participant sequence. Keys follow the declared group order
 * and every declared group is present, possibly with no members.
 */
export type Allocation = Map<GroupName, ParticipantId[]>;

/** Group to number of assigned participants. */
export type BalanceReport = Map<GroupName, number>;

export type PermutedBlockLayout = 'per-size' | 'varied';

export interface PermutedBlockOptions {
  /**
   * `per-size` partitions the whole participant order once per block size and
   * accumulates every partition, so each participant appears once per size.
   * `varied` walks the order once, drawing each block's size from the list.
   */
  layout?: PermutedBlockLayout;
}
