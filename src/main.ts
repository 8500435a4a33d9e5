import './styles/main.css';
import * as Sentry from '@sentry/browser';
import { inject } from '@vercel/analytics';
import { App } from './App';
import { resolveDashboardConfig } from '@/config';

Sentry.init({
  dsn: import.meta.env.VITE_SENTRY_DSN,
  release: `radar-dashboard@${__APP_VERSION__}`,
  environment: import.meta.env.MODE,
  enabled: Boolean(import.meta.env.VITE_SENTRY_DSN) && !location.hostname.startsWith('localhost'),
  tracesSampleRate: 0.1,
  ignoreErrors: [
    /^TypeError: Load failed$/,
    /^TypeError: Failed to fetch$/,
    /^TypeError: NetworkError/,
    /^AbortError/,
    /^TimeoutError/,
    /ResizeObserver loop/,
  ],
});

inject();

function start(): void {
  const app = new App({
    config: resolveDashboardConfig(import.meta.env),
    reportError: (err) => Sentry.captureException(err),
  });
  window.addEventListener('pagehide', () => app.destroy(), { once: true });
  app.init().catch((err: unknown) => {
    console.error('[App] Init failed:', err);
    Sentry.captureException(err);
  });
}

if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', start, { once: true });
} else {
  start();
}
