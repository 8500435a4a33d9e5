import type { DashboardConfig } from '@/config';

export interface AppModule {
  init(): void | Promise<void>;
  destroy(): void;
}

export interface AppContext {
  readonly config: DashboardConfig;
  readonly document: Document;
  isDestroyed: boolean;
}
