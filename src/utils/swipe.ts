export type SwipeDirection = 'left' | 'right';

export interface Point {
  x: number;
  y: number;
}

export const SWIPE_THRESHOLD_PX = 50;

export function detectSwipe(start: Point, end: Point, threshold = SWIPE_THRESHOLD_PX): SwipeDirection | null {
  const dx = start.x - end.x;
  const dy = start.y - end.y;
  if (Math.abs(dx) <= Math.abs(dy) || Math.abs(dx) <= threshold) return null;
  return dx > 0 ? 'left' : 'right';
}

export function installSwipeHandler(doc: Document, onSwipe: (direction: SwipeDirection) => void): () => void {
  let start: Point | null = null;

  const onTouchStart = (e: TouchEvent) => {
    const touch = e.touches[0];
    start = touch ? { x: touch.clientX, y: touch.clientY } : null;
  };
  const onTouchEnd = (e: TouchEvent) => {
    const touch = e.changedTouches[0];
    if (start && touch) {
      const direction = detectSwipe(start, { x: touch.clientX, y: touch.clientY });
      if (direction) onSwipe(direction);
    }
    start = null;
  };

  doc.addEventListener('touchstart', onTouchStart, { passive: true });
  doc.addEventListener('touchend', onTouchEnd);
  return () => {
    doc.removeEventListener('touchstart', onTouchStart);
    doc.removeEventListener('touchend', onTouchEnd);
  };
}
