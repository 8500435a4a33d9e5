import type { ImageResolver } from '@/types';

export interface DashboardConfig {
  statusUrl: string;
  pollIntervalMs: number;
  pollCooldownMs: number;
  pollWarmupMs: number;
  statusTimeoutMs: number;
  imageBasePath: string;
  frameIntervalMs: number;
  autoplayDelayMs: number;
  staleAfterMinutes: number;
}

export type DashboardEnv = Partial<Record<string, string | boolean | undefined>>;

export const DEFAULT_DASHBOARD_CONFIG: Readonly<DashboardConfig> = {
  statusUrl: '/api/status',
  pollIntervalMs: 5 * 60 * 1000,
  pollCooldownMs: 5 * 60 * 1000,
  pollWarmupMs: 30 * 1000,
  statusTimeoutMs: 10 * 1000,
  imageBasePath: '/radar',
  frameIntervalMs: 800,
  autoplayDelayMs: 1000,
  staleAfterMinutes: 30,
};

function readString(env: DashboardEnv, key: string, fallback: string): string {
  const raw = env[key];
  return typeof raw === 'string' && raw.trim() ? raw.trim() : fallback;
}

function readPositive(env: DashboardEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (typeof raw !== 'string' || !raw.trim()) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    console.warn(`[Config] Ignoring ${key}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

export function resolveDashboardConfig(env: DashboardEnv = {}): DashboardConfig {
  const defaults = DEFAULT_DASHBOARD_CONFIG;
  const pollIntervalMs = readPositive(env, 'VITE_POLL_INTERVAL_MS', defaults.pollIntervalMs);
  let pollCooldownMs = readPositive(env, 'VITE_POLL_COOLDOWN_MS', pollIntervalMs);
  if (pollCooldownMs > pollIntervalMs) {
    console.warn(`[Config] Poll cooldown ${pollCooldownMs}ms exceeds interval, clamping to ${pollIntervalMs}ms`);
    pollCooldownMs = pollIntervalMs;
  }

  return {
    statusUrl: readString(env, 'VITE_STATUS_URL', defaults.statusUrl),
    pollIntervalMs,
    pollCooldownMs,
    pollWarmupMs: readPositive(env, 'VITE_POLL_WARMUP_MS', defaults.pollWarmupMs),
    statusTimeoutMs: readPositive(env, 'VITE_STATUS_TIMEOUT_MS', defaults.statusTimeoutMs),
    imageBasePath: readString(env, 'VITE_IMAGE_BASE_PATH', defaults.imageBasePath).replace(/\/+$/, ''),
    frameIntervalMs: readPositive(env, 'VITE_FRAME_INTERVAL_MS', defaults.frameIntervalMs),
    autoplayDelayMs: readPositive(env, 'VITE_AUTOPLAY_DELAY_MS', defaults.autoplayDelayMs),
    staleAfterMinutes: readPositive(env, 'VITE_STALE_AFTER_MINUTES', defaults.staleAfterMinutes),
  };
}

export function createImageResolver(basePath: string): ImageResolver {
  return (itemId) => `${basePath}/${itemId.replace(/^\/+/, '').split('/').map(encodeURIComponent).join('/')}`;
}
