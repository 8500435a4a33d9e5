import type { Snapshot, SnapshotStats } from '@/types';

export type NetworkFailureReason = 'rejected' | 'http-status' | 'malformed-body';

export class NetworkFailure extends Error {
  readonly reason: NetworkFailureReason;
  readonly status?: number;

  constructor(reason: NetworkFailureReason, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'NetworkFailure';
    this.reason = reason;
    if (options?.status !== undefined) this.status = options.status;
  }
}

export function isNetworkFailure(err: unknown): err is NetworkFailure {
  return err instanceof NetworkFailure;
}

export interface StatusRequestOptions {
  url: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

const NO_DATA_LABEL = '—';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readItemId(body: Record<string, unknown>): string | null {
  // Older servers publish the newest image path as `latest_radar`.
  const raw = body.latest_item_id !== undefined ? body.latest_item_id : body.latest_radar;
  return typeof raw === 'string' && raw.length > 0 ? raw : null;
}

function readStats(raw: Record<string, unknown>): SnapshotStats {
  const { last_update, total_images, last_update_ago } = raw;
  return {
    lastUpdate: typeof last_update === 'string' && last_update ? last_update : NO_DATA_LABEL,
    totalImages: typeof total_images === 'number' && Number.isFinite(total_images) ? total_images : 0,
    lastUpdateAgo: typeof last_update_ago === 'number' && Number.isFinite(last_update_ago) ? last_update_ago : null,
  };
}

export function parseSnapshot(body: unknown): Snapshot {
  if (!isRecord(body)) {
    throw new NetworkFailure('malformed-body', 'Status body is not an object');
  }
  if (!isRecord(body.stats)) {
    throw new NetworkFailure('malformed-body', 'Status body has no stats');
  }
  return {
    latestItemId: readItemId(body),
    stats: readStats(body.stats),
  };
}

export async function fetchStatusSnapshot(options: StatusRequestOptions): Promise<Snapshot> {
  const fetchImpl = options.fetchImpl ?? fetch;

  let res: Response;
  try {
    res = await fetchImpl(options.url, {
      headers: { Accept: 'application/json' },
      cache: 'no-store',
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (err) {
    throw new NetworkFailure('rejected', `Status request failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  if (!res.ok) {
    throw new NetworkFailure('http-status', `Status request returned ${res.status}`, { status: res.status });
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (err) {
    throw new NetworkFailure('malformed-body', 'Status body is not valid JSON', { cause: err });
  }
  return parseSnapshot(body);
}
