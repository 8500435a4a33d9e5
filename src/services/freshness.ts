import type { FreshnessStatus, Snapshot } from '@/types';

export type FreshnessVerdict = 'baseline' | 'unchanged' | 'changed';

export interface FreshnessResult {
  verdict: FreshnessVerdict;
  changed: boolean;
}

export const DEFAULT_STALE_AFTER_MINUTES = 30;

/**
 * Identity comparison only: stats move on every capture and are refreshed
 * separately, so they never gate the image swap. A missing id (null) differs
 * from every concrete id.
 */
export function hasSnapshotChanged(prev: Snapshot, next: Snapshot): boolean {
  return prev.latestItemId !== next.latestItemId;
}

export class FreshnessComparator {
  private baseline: Snapshot | null = null;

  public compare(next: Snapshot): FreshnessResult {
    const prev = this.baseline;
    this.baseline = next;

    if (!prev) return { verdict: 'baseline', changed: false };
    const changed = hasSnapshotChanged(prev, next);
    return { verdict: changed ? 'changed' : 'unchanged', changed };
  }

  public getBaseline(): Snapshot | null {
    return this.baseline;
  }
}

export function classifyFreshness(
  lastUpdateAgo: number | null,
  staleAfterMinutes = DEFAULT_STALE_AFTER_MINUTES,
): FreshnessStatus {
  if (lastUpdateAgo === null) {
    return { level: 'stale', label: 'Stale · no data' };
  }
  const minutes = Math.max(0, Math.floor(lastUpdateAgo));
  return lastUpdateAgo < staleAfterMinutes
    ? { level: 'live', label: `Live · ${minutes} min ago` }
    : { level: 'stale', label: `Stale · ${minutes} min ago` };
}
