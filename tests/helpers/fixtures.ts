export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export interface SnapshotBody {
  latest_item_id?: unknown;
  latest_radar?: unknown;
  stats?: unknown;
}

export function snapshotBody(id: string | null, lastUpdateAgo = 4): SnapshotBody {
  return {
    latest_item_id: id,
    stats: { last_update: '10:15 CET', total_images: 42, last_update_ago: lastUpdateAgo },
  };
}
