/**
 * Report data model shared by the aggregator, fetchers, and formatter
 */

/** Opaque token naming one smart group (or search) in Jamf Pro */
export type GroupIdentifier = string | number;

export interface GroupResult {
  name: string;
  /** Non-negative member count */
  count: number;
}

export interface FetchSuccess {
  success: true;
  result: GroupResult;
}

/**
 * A fetch that produced nothing usable. The aggregator skips these; `reason`
 * is only carried for diagnostics.
 */
export interface FetchFailure {
  success: false;
  identifier: GroupIdentifier;
  reason: string;
}

export type FetchOutcome = FetchSuccess | FetchFailure;

/**
 * Resolves one identifier. Resolves to a failure for per-group problems and
 * rejects only for systemic ones (configuration, authentication).
 */
export type GroupFetcher = (identifier: GroupIdentifier) => Promise<FetchOutcome>;

export interface GroupReport {
  readonly results: readonly GroupResult[];
  /** Sum of every included count */
  readonly total: number;
}
