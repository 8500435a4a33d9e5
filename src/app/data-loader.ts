import type { AppContext, AppModule } from '@/app/app-context';
import type { ViewUpdater } from '@/app/view-updater';
import { FreshnessComparator, type FreshnessResult } from '@/services/freshness';
import { fetchStatusSnapshot } from '@/services/radar-status';

export interface DataLoaderDeps {
  viewUpdater: ViewUpdater;
  comparator?: FreshnessComparator;
  fetchImpl?: typeof fetch;
}

export class DataLoaderManager implements AppModule {
  private ctx: AppContext;
  private viewUpdater: ViewUpdater;
  private comparator: FreshnessComparator;
  private fetchImpl?: typeof fetch;
  private lastResult: FreshnessResult | null = null;

  constructor(ctx: AppContext, deps: DataLoaderDeps) {
    this.ctx = ctx;
    this.viewUpdater = deps.viewUpdater;
    this.comparator = deps.comparator ?? new FreshnessComparator();
    this.fetchImpl = deps.fetchImpl;
  }

  init(): void {}

  destroy(): void {}

  getLastResult(): FreshnessResult | null {
    return this.lastResult;
  }

  /**
   * Fetches the status feed and reconciles the page against it. Failures
   * propagate to the scheduler untouched, before anything is compared.
   */
  async loadStatus(): Promise<boolean> {
    const snapshot = await fetchStatusSnapshot({
      url: this.ctx.config.statusUrl,
      timeoutMs: this.ctx.config.statusTimeoutMs,
      fetchImpl: this.fetchImpl,
    });
    // Responses that land after teardown are dropped.
    if (this.ctx.isDestroyed) return false;

    const result = this.comparator.compare(snapshot);
    this.lastResult = result;
    if (result.verdict === 'baseline') {
      console.log(`[DataLoader] Baseline radar image: ${snapshot.latestItemId ?? '(none)'}`);
    }
    this.viewUpdater.apply(snapshot, result);
    return result.changed;
  }
}
