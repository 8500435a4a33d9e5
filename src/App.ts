import type { AppContext, AppModule } from '@/app/app-context';
import { createImageResolver, type DashboardConfig } from '@/config';
import { browserScheduling, type SchedulingPort } from '@/app/scheduling';
import { PollingScheduler } from '@/app/polling-scheduler';
import { ViewUpdater } from '@/app/view-updater';
import { DataLoaderManager } from '@/app/data-loader';
import { EventHandlerManager } from '@/app/event-handlers';
import { AnimationPlayer, bindAnimationPlayer } from '@/components/AnimationPlayer';
import { DetailOverlay } from '@/components/DetailOverlay';
import { bindDashboardSinks, type ImagePreloader } from '@/utils/dom-sinks';
import type { ImageResolver } from '@/types';

export interface AppOptions {
  config: DashboardConfig;
  document?: Document;
  timers?: SchedulingPort;
  fetchImpl?: typeof fetch;
  resolveImage?: ImageResolver;
  preloadImage?: ImagePreloader;
  reportError?: (err: unknown) => void;
}

export class App {
  private state: AppContext;

  private readonly pollingScheduler: PollingScheduler;
  private readonly dataLoader: DataLoaderManager;
  private readonly eventHandlers: EventHandlerManager;
  private readonly detailOverlay: DetailOverlay;
  private readonly animation: { player: AnimationPlayer; unbind: () => void };

  private modules: AppModule[] = [];

  constructor(options: AppOptions) {
    const doc = options.document ?? document;
    const timers = options.timers ?? browserScheduling;
    const { config } = options;

    this.state = { config, document: doc, isDestroyed: false };

    const viewUpdater = new ViewUpdater(bindDashboardSinks(doc, options.preloadImage), {
      resolveImage: options.resolveImage ?? createImageResolver(config.imageBasePath),
      staleAfterMinutes: config.staleAfterMinutes,
    });
    this.dataLoader = new DataLoaderManager(this.state, { viewUpdater, fetchImpl: options.fetchImpl });

    this.pollingScheduler = new PollingScheduler(() => this.dataLoader.loadStatus(), timers, {
      intervalMs: config.pollIntervalMs,
      cooldownMs: config.pollCooldownMs,
      warmupMs: config.pollWarmupMs,
      onUnexpectedError: options.reportError,
    });

    this.animation = bindAnimationPlayer(doc, timers, {
      frameIntervalMs: config.frameIntervalMs,
      autoplayDelayMs: config.autoplayDelayMs,
    });
    this.detailOverlay = new DetailOverlay(doc);

    this.eventHandlers = new EventHandlerManager(this.state, {
      requestFreshnessCheck: () => void this.pollingScheduler.requestCheck('visibility'),
      stepAnimation: (delta) => this.animation.player.step(delta),
    });

    // Destroyed in reverse order
    this.modules = [
      this.dataLoader,
      this.pollingScheduler,
      this.animation.player,
      this.detailOverlay,
      this.eventHandlers,
    ];
  }

  public get scheduler(): PollingScheduler {
    return this.pollingScheduler;
  }

  public get player(): AnimationPlayer {
    return this.animation.player;
  }

  public get overlay(): DetailOverlay {
    return this.detailOverlay;
  }

  public async init(): Promise<void> {
    for (const module of this.modules) {
      await module.init();
    }
    console.log(`[App] Radar dashboard initialized (${this.animation.player.size} animation frames)`);
  }

  public destroy(): void {
    if (this.state.isDestroyed) return;
    this.state.isDestroyed = true;

    for (let i = this.modules.length - 1; i >= 0; i--) {
      this.modules[i]?.destroy();
    }
    this.animation.unbind();
  }
}
