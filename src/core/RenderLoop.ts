import { renderLogError } from "./renderLog.js";

/** Source of display ticks. The browser's requestAnimationFrame in production. */
export interface FrameScheduler {
  request(cb: () => void): number;
  cancel(handle: number): void;
}

export const animationFrameScheduler: FrameScheduler = {
  request: (cb) => requestAnimationFrame(() => cb()),
  cancel: (handle) => cancelAnimationFrame(handle),
};

export interface RenderLoopCallbacks {
  render(): void;
}

/**
 * Display-tick loop: one render() per tick, never two at once.
 *
 * A frame that throws is logged and the loop keeps going; the next tick
 * redraws everything from fresh state anyway.
 */
export class RenderLoop {
  private running = false;
  private rendering = false;
  private handle = 0;
  /** Frames completed without throwing. */
  framesRendered = 0;

  constructor(
    private readonly callbacks: RenderLoopCallbacks,
    private readonly scheduler: FrameScheduler = animationFrameScheduler,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.handle = this.scheduler.request(this.tick);
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.scheduler.cancel(this.handle);
  }

  /**
   * Render one frame from an external tick source.
   * Call stop() first so the scheduler doesn't tick as well.
   */
  externalTick(): void {
    this.runFrame();
  }

  private runFrame(): void {
    if (this.rendering) return;
    this.rendering = true;
    try {
      this.callbacks.render();
      this.framesRendered++;
    } catch (err) {
      renderLogError("frame failed", err);
    } finally {
      this.rendering = false;
    }
  }

  private tick = (): void => {
    if (!this.running) return;
    this.runFrame();
    if (this.running) this.handle = this.scheduler.request(this.tick);
  };
}
