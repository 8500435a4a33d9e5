import type { ImageResolver, Snapshot, ViewModel } from '@/types';
import type { FreshnessResult } from '@/services/freshness';
import { classifyFreshness, DEFAULT_STALE_AFTER_MINUTES } from '@/services/freshness';
import type { DashboardSinks } from '@/utils/dom-sinks';

export interface ViewUpdaterOptions {
  resolveImage: ImageResolver;
  staleAfterMinutes?: number;
}

export class ViewUpdater {
  private readonly sinks: DashboardSinks;
  private readonly resolveImage: ImageResolver;
  private readonly staleAfterMinutes: number;
  private model: ViewModel = { imageRef: null, imageUrl: null, stats: null, freshness: null };

  constructor(sinks: DashboardSinks, options: ViewUpdaterOptions) {
    this.sinks = sinks;
    this.resolveImage = options.resolveImage;
    this.staleAfterMinutes = options.staleAfterMinutes ?? DEFAULT_STALE_AFTER_MINUTES;
  }

  public getViewModel(): Readonly<ViewModel> {
    return this.model;
  }

  /** Stats refresh on every accepted fetch; the image only on a confirmed change. */
  public apply(snapshot: Snapshot, result: FreshnessResult): void {
    const freshness = classifyFreshness(snapshot.stats.lastUpdateAgo, this.staleAfterMinutes);
    this.sinks.lastUpdate.setText(snapshot.stats.lastUpdate);
    this.sinks.totalImages.setText(String(snapshot.stats.totalImages));
    this.sinks.status.setStatus(freshness);
    this.model = { ...this.model, stats: snapshot.stats, freshness };

    if (!result.changed || snapshot.latestItemId === null) return;

    const imageRef = snapshot.latestItemId;
    const imageUrl = this.resolveImage(imageRef);
    console.log(`[ViewUpdater] New radar image: ${imageRef}`);
    // The model follows the image on screen, not the requested one.
    this.sinks.image.show(imageUrl, () => {
      this.model = { ...this.model, imageRef, imageUrl };
    });
  }
}
