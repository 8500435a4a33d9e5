import type { AppContext, AppModule } from '@/app/app-context';
import { installImageLoadingStates, installSmoothAnchors } from '@/utils/page-enhancements';
import { installSwipeHandler } from '@/utils/swipe';

export interface EventHandlerCallbacks {
  requestFreshnessCheck: () => void;
  stepAnimation: (delta: number) => void;
}

export class EventHandlerManager implements AppModule {
  private ctx: AppContext;
  private callbacks: EventHandlerCallbacks;

  private boundVisibilityHandler: (() => void) | null = null;
  private teardowns: Array<() => void> = [];

  constructor(ctx: AppContext, callbacks: EventHandlerCallbacks) {
    this.ctx = ctx;
    this.callbacks = callbacks;
  }

  init(): void {
    const doc = this.ctx.document;

    this.boundVisibilityHandler = () => {
      if (doc.visibilityState === 'visible' && !this.ctx.isDestroyed) {
        this.callbacks.requestFreshnessCheck();
      }
    };
    doc.addEventListener('visibilitychange', this.boundVisibilityHandler);

    this.teardowns.push(
      installSwipeHandler(doc, (direction) => {
        this.callbacks.stepAnimation(direction === 'left' ? 1 : -1);
      }),
      installSmoothAnchors(doc),
      installImageLoadingStates(doc),
    );
  }

  destroy(): void {
    if (this.boundVisibilityHandler) {
      this.ctx.document.removeEventListener('visibilitychange', this.boundVisibilityHandler);
      this.boundVisibilityHandler = null;
    }
    for (const teardown of this.teardowns) teardown();
    this.teardowns = [];
  }
}
