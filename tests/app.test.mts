import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { JSDOM } from 'jsdom';
import { App } from '../src/App.ts';
import { resolveDashboardConfig } from '../src/config/index.ts';
import { VirtualClock, flushPromises } from './helpers/virtual-clock.ts';
import { jsonResponse, snapshotBody } from './helpers/fixtures.ts';
import { DASHBOARD_MARKUP } from './helpers/dom.ts';

async function settle(): Promise<void> {
  for (let i = 0; i < 10; i++) await flushPromises();
}

function setup(bodies: unknown[]) {
  const dom = new JSDOM(`<!doctype html><html><body>${DASHBOARD_MARKUP}</body></html>`, { pretendToBeVisual: true });
  const doc = dom.window.document;
  const clock = new VirtualClock(0);
  let fetches = 0;
  const fetchImpl: typeof fetch = async () => {
    fetches++;
    const body = bodies.shift();
    if (body === undefined) throw new TypeError('Failed to fetch');
    return jsonResponse(body);
  };
  const preloads: Array<{ url: string; done: (loaded: boolean) => void }> = [];
  const app = new App({
    config: resolveDashboardConfig({}),
    document: doc,
    timers: clock,
    fetchImpl,
    preloadImage: (url, done) => { preloads.push({ url, done }); },
  });
  return { dom, doc, clock, app, preloads, fetchCount: () => fetches };
}

beforeEach(() => {
  mock.method(console, 'log', () => {});
  mock.method(console, 'warn', () => {});
});

afterEach(() => {
  mock.restoreAll();
});

describe('App', () => {
  it('runs the warm-up, the interval polls and the image swap end to end', async () => {
    const { dom, doc, clock, app, preloads, fetchCount } = setup([
      snapshotBody('enhanced/radar_ba_20240611_101500.gif', 2),
      snapshotBody('enhanced/radar_ba_20240611_101500.gif', 7),
      snapshotBody('enhanced/radar_ba_20240611_102000.gif', 1),
    ]);
    await app.init();

    clock.advance(1_000);
    assert.strictEqual(app.player.isPlaying, true);

    clock.advance(29_000);
    await settle();
    assert.strictEqual(fetchCount(), 1);
    assert.strictEqual(doc.getElementById('radarStatus')?.textContent, 'Live · 2 min ago');
    assert.strictEqual(preloads.length, 0);

    doc.dispatchEvent(new dom.window.Event('visibilitychange'));
    await settle();
    assert.strictEqual(fetchCount(), 1);
    assert.strictEqual(app.scheduler.getPhase(), 'blocked');

    clock.advance(300_000);
    await settle();
    assert.strictEqual(fetchCount(), 2);
    assert.strictEqual(doc.getElementById('radarStatus')?.textContent, 'Live · 7 min ago');
    assert.strictEqual(preloads.length, 0);

    clock.advance(300_000);
    await settle();
    assert.strictEqual(fetchCount(), 3);
    assert.deepStrictEqual(preloads.map(p => p.url), ['/radar/enhanced/radar_ba_20240611_102000.gif']);

    preloads[0]?.done(true);
    assert.strictEqual(doc.getElementById('latestRadar')?.getAttribute('src'), '/radar/enhanced/radar_ba_20240611_102000.gif');

    app.destroy();
    assert.strictEqual(clock.pendingCount, 0);
  });

  it('keeps the last good values through failed polls', async () => {
    const { doc, clock, app, fetchCount } = setup([snapshotBody('enhanced/a.gif', 3)]);
    await app.init();

    clock.advance(30_000);
    await settle();
    clock.advance(300_000);
    await settle();

    assert.strictEqual(fetchCount(), 2);
    assert.strictEqual(doc.getElementById('radarStatus')?.textContent, 'Live · 3 min ago');
    assert.strictEqual(doc.getElementById('totalImages')?.textContent, '42');
    assert.strictEqual(app.scheduler.getPhase(), 'idle');
    app.destroy();
  });

  it('opens the detail overlay from a clicked thumbnail', async () => {
    const { dom, doc, app } = setup([]);
    await app.init();

    const thumb = doc.querySelector('.hourly-radar');
    assert.ok(thumb);
    thumb.dispatchEvent(new dom.window.MouseEvent('click', { bubbles: true }));
    assert.strictEqual(app.overlay.isOpen, true);

    app.destroy();
    assert.strictEqual(app.overlay.isOpen, false);
  });
});
