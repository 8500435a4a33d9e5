/// <reference types="vite/client" />

declare const __APP_VERSION__: string;

interface ImportMetaEnv {
  readonly VITE_SENTRY_DSN?: string;
  readonly VITE_STATUS_URL?: string;
  readonly VITE_POLL_INTERVAL_MS?: string;
  readonly VITE_POLL_COOLDOWN_MS?: string;
  readonly VITE_POLL_WARMUP_MS?: string;
  readonly VITE_STATUS_TIMEOUT_MS?: string;
  readonly VITE_IMAGE_BASE_PATH?: string;
  readonly VITE_FRAME_INTERVAL_MS?: string;
  readonly VITE_AUTOPLAY_DELAY_MS?: string;
  readonly VITE_STALE_AFTER_MINUTES?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
