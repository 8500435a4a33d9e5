import type { FreshnessStatus } from '@/types';

// Sinks accept updates whether or not the page has the matching element.
// An unbound sink drops every update.

export interface TextSink {
  readonly bound: boolean;
  setText(text: string): void;
}

export interface StatusSink {
  readonly bound: boolean;
  setStatus(status: FreshnessStatus): void;
}

export interface ImageSink {
  readonly bound: boolean;
  /** Swaps to url once it has loaded; the current image stays on error. */
  show(url: string, onShown?: () => void): void;
}

const STATUS_CLASSES: Record<FreshnessStatus['level'], string> = {
  live: 'status-online',
  stale: 'status-warning',
};

export function textSink(el: Element | null): TextSink {
  return {
    bound: el !== null,
    setText(text) {
      if (el) el.textContent = text;
    },
  };
}

export function statusSink(el: Element | null): StatusSink {
  return {
    bound: el !== null,
    setStatus(status) {
      if (!el) return;
      el.textContent = status.label;
      el.classList.toggle(STATUS_CLASSES.live, status.level === 'live');
      el.classList.toggle(STATUS_CLASSES.stale, status.level === 'stale');
    },
  };
}

export type ImagePreloader = (url: string, done: (loaded: boolean) => void) => void;

export function domPreloader(doc: Document): ImagePreloader {
  return (url, done) => {
    const probe = doc.createElement('img');
    probe.addEventListener('load', () => done(true), { once: true });
    probe.addEventListener('error', () => done(false), { once: true });
    probe.src = url;
  };
}

export function imageSink(el: HTMLImageElement | null, preload?: ImagePreloader): ImageSink {
  const load = preload ?? (el ? domPreloader(el.ownerDocument) : null);
  let requested: string | null = null;
  return {
    bound: el !== null,
    show(url, onShown) {
      if (!el || !load) return;
      requested = url;
      load(url, (loaded) => {
        // A slower, older preload must not overwrite a newer image.
        if (requested !== url) return;
        requested = null;
        if (loaded) {
          el.src = url;
          onShown?.();
        } else {
          console.warn('[ViewUpdater] Image failed to load, keeping previous:', url);
        }
      });
    },
  };
}

export interface DashboardSinks {
  image: ImageSink;
  lastUpdate: TextSink;
  totalImages: TextSink;
  status: StatusSink;
}

export function bindDashboardSinks(doc: Document, preload?: ImagePreloader): DashboardSinks {
  return {
    image: imageSink(doc.querySelector<HTMLImageElement>('img#latestRadar'), preload),
    lastUpdate: textSink(doc.getElementById('lastUpdate')),
    totalImages: textSink(doc.getElementById('totalImages')),
    status: statusSink(doc.getElementById('radarStatus')),
  };
}
