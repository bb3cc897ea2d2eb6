export interface FreshnessThreshold {
  /** Evidence older than this many months receives `penalty`. */
  months: number;
  penalty: number;
}

export interface FreshnessPolicy {
  thresholds: readonly FreshnessThreshold[];
}

export const DEFAULT_FRESHNESS_POLICY: FreshnessPolicy = {
  thresholds: [
    { months: 24, penalty: 0.1 },
    { months: 36, penalty: 0.2 },
    { months: 48, penalty: 0.3 },
  ],
};

const DAY_MS = 24 * 60 * 60 * 1000;

/** Whole days divided by 30; undefined for missing or unparseable dates. */
export function ageInMonths(publishedAt: string | undefined, now: Date): number | undefined {
  if (!publishedAt) return undefined;
  const published = Date.parse(publishedAt);
  if (Number.isNaN(published)) return undefined;
  const days = Math.floor((now.getTime() - published) / DAY_MS);
  return Math.max(0, days) / 30;
}

/** Penalty of the largest threshold the age exceeds; 0 when fresh or undated. */
export function freshnessPenalty(ageMonths: number | undefined, policy: FreshnessPolicy = DEFAULT_FRESHNESS_POLICY): number {
  if (ageMonths === undefined) return 0;
  let penalty = 0;
  for (const threshold of policy.thresholds) {
    if (ageMonths > threshold.months) {
      penalty = Math.max(penalty, threshold.penalty);
    }
  }
  return penalty;
}
