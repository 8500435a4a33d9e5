import type { AppModule } from '@/app/app-context';
import type { SchedulingPort, TimerHandle } from '@/app/scheduling';

export interface FrameView {
  setFrameActive(index: number, active: boolean): void;
  /** position is 1-based. */
  setCounter(position: number, total: number): void;
  setPlaying(playing: boolean): void;
}

export interface AnimationPlayerOptions {
  frameIntervalMs?: number;
  autoplayDelayMs?: number;
}

const NOOP_VIEW: FrameView = {
  setFrameActive: () => {},
  setCounter: () => {},
  setPlaying: () => {},
};

export class AnimationPlayer implements AppModule {
  public readonly frames: readonly string[];
  private readonly timers: SchedulingPort;
  private readonly view: FrameView;
  private readonly frameIntervalMs: number;
  private readonly autoplayDelayMs: number;

  private index = 0;
  private tick: TimerHandle | null = null;
  private autoplay: TimerHandle | null = null;

  constructor(frames: readonly string[], timers: SchedulingPort, view: FrameView = NOOP_VIEW, options: AnimationPlayerOptions = {}) {
    this.frames = Object.freeze([...frames]);
    this.timers = timers;
    this.view = view;
    this.frameIntervalMs = options.frameIntervalMs ?? 800;
    this.autoplayDelayMs = options.autoplayDelayMs ?? 1000;
  }

  public get size(): number {
    return this.frames.length;
  }

  public get currentIndex(): number {
    return this.index;
  }

  public get isPlaying(): boolean {
    return this.tick !== null;
  }

  public init(): void {
    if (this.size === 0) return;
    this.view.setFrameActive(this.index, true);
    this.view.setCounter(this.index + 1, this.size);
    this.view.setPlaying(false);
    this.autoplay?.cancel();
    this.autoplay = this.timers.delay(() => {
      this.autoplay = null;
      this.play();
    }, this.autoplayDelayMs);
  }

  public destroy(): void {
    this.autoplay?.cancel();
    this.autoplay = null;
    this.stopTick();
  }

  public play(): void {
    if (this.size === 0 || this.tick) return;
    this.tick = this.timers.repeat(() => this.advance(), this.frameIntervalMs);
    this.view.setPlaying(true);
  }

  public pause(): void {
    if (this.size === 0) return;
    this.stopTick();
    this.view.setPlaying(false);
  }

  public advance(): void {
    this.step(1);
  }

  public step(delta: number): void {
    const n = this.size;
    if (n === 0 || !Number.isInteger(delta)) return;
    const next = (((this.index + delta) % n) + n) % n;
    if (next === this.index) return;
    this.view.setFrameActive(this.index, false);
    this.index = next;
    this.view.setFrameActive(this.index, true);
    this.view.setCounter(this.index + 1, n);
  }

  private stopTick(): void {
    this.tick?.cancel();
    this.tick = null;
  }
}

/** Reads the server-rendered frame strip and its controls. */
export function bindAnimationPlayer(
  doc: Document,
  timers: SchedulingPort,
  options: AnimationPlayerOptions = {},
): { player: AnimationPlayer; unbind: () => void } {
  const frameEls = Array.from(doc.querySelectorAll<HTMLElement>('.animation-frame'));
  const playBtn = doc.getElementById('playBtn');
  const pauseBtn = doc.getElementById('pauseBtn');
  const currentFrame = doc.getElementById('currentFrame');
  const totalFrames = doc.getElementById('totalFrames');

  const showControls = frameEls.length >= 2;
  const view: FrameView = {
    setFrameActive(index, active) {
      frameEls[index]?.classList.toggle('active', active);
    },
    setCounter(position, total) {
      if (currentFrame) currentFrame.textContent = String(position);
      if (totalFrames) totalFrames.textContent = String(total);
    },
    setPlaying(playing) {
      if (playBtn) playBtn.style.display = showControls && !playing ? 'inline-block' : 'none';
      if (pauseBtn) pauseBtn.style.display = showControls && playing ? 'inline-block' : 'none';
    },
  };

  const refs = frameEls.map(el => el.dataset.src ?? el.getAttribute('src') ?? '');
  const player = new AnimationPlayer(refs, timers, view, options);

  const onPlay = () => player.play();
  const onPause = () => player.pause();
  playBtn?.addEventListener('click', onPlay);
  pauseBtn?.addEventListener('click', onPause);

  return {
    player,
    unbind: () => {
      playBtn?.removeEventListener('click', onPlay);
      pauseBtn?.removeEventListener('click', onPause);
      player.destroy();
    },
  };
}
