import type { AppModule } from '@/app/app-context';
import { isElement } from '@/utils/dom-utils';

export interface DetailOverlayOptions {
  overlayId?: string;
  imageId?: string;
  closeSelector?: string;
  triggerSelector?: string;
}

const DEFAULT_TRIGGERS = '.clickable-image, .hourly-radar';

/**
 * Full-screen view of a single image. Opened by clicking any trigger
 * element; closed by the backdrop, the close button or Escape.
 */
export class DetailOverlay implements AppModule {
  private readonly doc: Document;
  private readonly overlay: HTMLElement | null;
  private readonly image: HTMLImageElement | null;
  private readonly closeBtn: Element | null;
  private readonly triggerSelector: string;

  private opened = false;
  private savedOverflow = '';

  private readonly onDocumentClick = (e: Event) => {
    if (!isElement(e.target)) return;
    const trigger = e.target.closest(this.triggerSelector);
    if (!trigger) return;
    const ref = trigger.getAttribute('data-src') || trigger.getAttribute('src');
    if (ref) this.open(ref);
  };

  private readonly onBackdropClick = (e: Event) => {
    if (e.target === this.overlay) this.close();
  };

  private readonly onCloseClick = () => this.close();

  private readonly onKeydown = (e: KeyboardEvent) => {
    if (e.key === 'Escape' && this.opened) this.close();
  };

  constructor(doc: Document, options: DetailOverlayOptions = {}) {
    this.doc = doc;
    this.overlay = doc.getElementById(options.overlayId ?? 'imageModal');
    this.image = doc.querySelector<HTMLImageElement>(`img#${options.imageId ?? 'modalImage'}`);
    this.closeBtn = this.overlay?.querySelector(options.closeSelector ?? '.close') ?? null;
    this.triggerSelector = options.triggerSelector ?? DEFAULT_TRIGGERS;
  }

  public get isOpen(): boolean {
    return this.opened;
  }

  public init(): void {
    if (!this.overlay) return;
    this.doc.addEventListener('click', this.onDocumentClick);
    this.doc.addEventListener('keydown', this.onKeydown);
    this.overlay.addEventListener('click', this.onBackdropClick);
    this.closeBtn?.addEventListener('click', this.onCloseClick);
  }

  public destroy(): void {
    this.close();
    this.doc.removeEventListener('click', this.onDocumentClick);
    this.doc.removeEventListener('keydown', this.onKeydown);
    this.overlay?.removeEventListener('click', this.onBackdropClick);
    this.closeBtn?.removeEventListener('click', this.onCloseClick);
  }

  public open(ref: string): void {
    if (!this.overlay || !this.image) return;
    this.image.src = ref;
    this.overlay.style.display = 'block';
    if (!this.opened) {
      this.savedOverflow = this.doc.body.style.overflow;
      this.doc.body.style.overflow = 'hidden';
    }
    this.opened = true;
  }

  public close(): void {
    if (!this.opened || !this.overlay) return;
    this.overlay.style.display = 'none';
    this.doc.body.style.overflow = this.savedOverflow;
    this.opened = false;
  }
}
