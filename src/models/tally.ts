export const METRIC_KINDS = ["gift", "like", "comment"] as const;

export type MetricKind = (typeof METRIC_KINDS)[number];

// handle -> running count, in first-seen order
export type Tally = Map<string, number>;

export type MetricTallies = Record<MetricKind, Tally>;

export type RankedEntry = {
  handle: string
  score: number
}

export type DisplayRow = {
  name: string
  score: number
}

export function emptyTallies(): MetricTallies {
  return { gift: new Map(), like: new Map(), comment: new Map() };
}

export function cloneTallies(source: MetricTallies): MetricTallies {
  return {
    gift: new Map(source.gift),
    like: new Map(source.like),
    comment: new Map(source.comment),
  };
}

export function addToTally(tally: Tally, handle: string, amount: number) {
  tally.set(handle, (tally.get(handle) ?? 0) + amount);
}

/**
 * Orders a tally by score, highest first. Array.prototype.sort is stable, so
 * equal scores keep the order in which the handles were first seen.
 */
export function rankTally(tally: Tally): RankedEntry[] {
  return Array.from(tally.entries())
    .map(([handle, score]) => ({ handle, score }))
    .sort((a, b) => b.score - a.score);
}
