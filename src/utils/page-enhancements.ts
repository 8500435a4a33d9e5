import { isElement } from '@/utils/dom-utils';

const LOADING_OPACITY = '0.5';
const FAILED_OPACITY = '0.3';

/** Dims images until they load; failed images stay faded with a fallback alt. */
export function installImageLoadingStates(root: ParentNode): () => void {
  const cleanups: Array<() => void> = [];

  for (const img of Array.from(root.querySelectorAll('img'))) {
    if (img.complete) continue;
    img.style.opacity = LOADING_OPACITY;
    const onLoad = () => {
      img.style.opacity = '1';
    };
    const onError = () => {
      img.style.opacity = FAILED_OPACITY;
      img.alt = 'Failed to load image';
    };
    img.addEventListener('load', onLoad, { once: true });
    img.addEventListener('error', onError, { once: true });
    cleanups.push(() => {
      img.removeEventListener('load', onLoad);
      img.removeEventListener('error', onError);
    });
  }

  return () => cleanups.forEach(fn => fn());
}

export function installSmoothAnchors(doc: Document): () => void {
  const onClick = (e: MouseEvent) => {
    if (!isElement(e.target)) return;
    const anchor = e.target.closest('a[href^="#"]');
    const hash = anchor?.getAttribute('href');
    if (!hash || hash === '#') return;

    const dest = doc.getElementById(hash.slice(1));
    if (!dest) return;
    e.preventDefault();
    dest.scrollIntoView({ behavior: 'smooth', block: 'start' });
  };

  doc.addEventListener('click', onClick);
  return () => doc.removeEventListener('click', onClick);
}
