import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DetailOverlay } from '../src/components/DetailOverlay.ts';
import { click, createDom, pressKey } from './helpers/dom.ts';

function setup(markup?: string) {
  const dom = createDom(markup);
  const doc = dom.window.document;
  const overlay = new DetailOverlay(doc);
  overlay.init();
  return { dom, doc, overlay, modal: doc.getElementById('imageModal') };
}

describe('DetailOverlay', () => {
  it('opens with the given image and locks background scroll', () => {
    const { doc, overlay, modal } = setup();
    doc.body.style.overflow = 'auto';

    overlay.open('/radar/enhanced/radar_ba_20240611_101500.gif');

    assert.strictEqual(overlay.isOpen, true);
    assert.strictEqual(modal?.style.display, 'block');
    assert.strictEqual(doc.getElementById('modalImage')?.getAttribute('src'), '/radar/enhanced/radar_ba_20240611_101500.gif');
    assert.strictEqual(doc.body.style.overflow, 'hidden');

    overlay.close();
    assert.strictEqual(modal?.style.display, 'none');
    assert.strictEqual(doc.body.style.overflow, 'auto');
  });

  it('can be closed twice without error', () => {
    const { overlay, modal } = setup();
    overlay.open('/radar/a.gif');
    overlay.close();
    assert.doesNotThrow(() => overlay.close());
    assert.strictEqual(overlay.isOpen, false);
    assert.strictEqual(modal?.style.display, 'none');
  });

  it('restores the scroll style from before the first open when reopened', () => {
    const { doc, overlay } = setup();
    overlay.open('/radar/a.gif');
    overlay.open('/radar/b.gif');
    overlay.close();
    assert.strictEqual(doc.body.style.overflow, '');
  });

  it('opens from trigger elements, preferring data-src', () => {
    const { dom, doc, overlay } = setup();
    const hourly = doc.querySelector('.hourly-radar');
    assert.ok(hourly);
    click(dom, hourly);
    assert.strictEqual(overlay.isOpen, true);
    assert.strictEqual(doc.getElementById('modalImage')?.getAttribute('src'), '/radar/enhanced/hour09.gif');
  });

  it('falls back to src when the trigger has no data-src', () => {
    const { dom, doc } = setup();
    const latest = doc.getElementById('latestRadar');
    assert.ok(latest);
    click(dom, latest);
    assert.strictEqual(doc.getElementById('modalImage')?.getAttribute('src'), '/radar/enhanced/radar_ba_20240611_100000.gif');
  });

  it('ignores clicks on other elements', () => {
    const { dom, doc, overlay } = setup();
    const label = doc.getElementById('lastUpdate');
    assert.ok(label);
    click(dom, label);
    assert.strictEqual(overlay.isOpen, false);
  });

  it('closes on the backdrop but not on its content', () => {
    const { dom, doc, overlay, modal } = setup();
    overlay.open('/radar/a.gif');

    const caption = doc.querySelector('.modal-caption');
    assert.ok(caption);
    click(dom, caption);
    assert.strictEqual(overlay.isOpen, true);

    assert.ok(modal);
    click(dom, modal);
    assert.strictEqual(overlay.isOpen, false);
  });

  it('closes from the close button', () => {
    const { dom, doc, overlay } = setup();
    overlay.open('/radar/a.gif');
    const closeBtn = doc.querySelector('#imageModal .close');
    assert.ok(closeBtn);
    click(dom, closeBtn);
    assert.strictEqual(overlay.isOpen, false);
  });

  it('closes on Escape only', () => {
    const { dom, overlay } = setup();
    overlay.open('/radar/a.gif');
    pressKey(dom, 'Enter');
    assert.strictEqual(overlay.isOpen, true);
    pressKey(dom, 'Escape');
    assert.strictEqual(overlay.isOpen, false);
  });

  it('is a no-op on a page without the overlay markup', () => {
    const { doc, overlay } = setup('<img class="clickable-image" src="/radar/a.gif">');
    overlay.open('/radar/a.gif');
    assert.strictEqual(overlay.isOpen, false);
    assert.strictEqual(doc.body.style.overflow, '');
  });

  it('stops listening after destroy', () => {
    const { dom, doc, overlay } = setup();
    overlay.destroy();
    const hourly = doc.querySelector('.hourly-radar');
    assert.ok(hourly);
    click(dom, hourly);
    assert.strictEqual(overlay.isOpen, false);
  });

  it('supports independent instances', () => {
    const first = setup();
    const second = setup();
    first.overlay.open('/radar/a.gif');
    assert.strictEqual(second.overlay.isOpen, false);
  });
});
