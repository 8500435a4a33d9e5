export interface SnapshotStats {
  lastUpdate: string;
  totalImages: number;
  /** Minutes since the newest capture; null when the server has no data. */
  lastUpdateAgo: number | null;
}

export interface Snapshot {
  /** null marks a response without a usable identity. */
  latestItemId: string | null;
  stats: SnapshotStats;
}

export type FreshnessLevel = 'live' | 'stale';

export interface FreshnessStatus {
  level: FreshnessLevel;
  label: string;
}

export type ImageResolver = (itemId: string) => string;

export interface ViewModel {
  imageRef: string | null;
  imageUrl: string | null;
  stats: SnapshotStats | null;
  freshness: FreshnessStatus | null;
}
