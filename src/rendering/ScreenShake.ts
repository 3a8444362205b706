import {
  SHAKE_FREQUENCY,
  SHAKE_Y_ATTENUATION,
  SHAKE_Y_FREQUENCY_RATIO,
  SHAKE_Y_PHASE,
} from "../config/constants.js";
import type { Clock } from "../core/Clock.js";

export interface ShakeState {
  intensity: number;
  startTime: number;
  endTime: number;
}

export interface ShakeOffset {
  dx: number;
  dy: number;
}

const NO_SHAKE: ShakeOffset = { dx: 0, dy: 0 };

/**
 * Camera shake with linear decay. A new request only takes over when it is
 * stronger than what is left of the current one, so chip damage can't cut
 * an explosion short.
 */
export class ScreenShake {
  private state: ShakeState | null = null;

  constructor(private readonly clock: Clock) {}

  /** Current shake parameters, or null when none was ever accepted. */
  get current(): Readonly<ShakeState> | null {
    return this.state;
  }

  /** Intensity left at `now` after linear decay; 0 outside the window. */
  remainingIntensity(now = this.clock.now()): number {
    const s = this.state;
    if (!s || now >= s.endTime) return 0;
    const progress = (now - s.startTime) / (s.endTime - s.startTime);
    return s.intensity * (1 - progress);
  }

  /** Returns true when the request replaced the active shake. */
  trigger(intensity: number, durationMs: number): boolean {
    if (!(intensity > 0) || !(durationMs > 0)) return false;
    const now = this.clock.now();
    if (intensity <= this.remainingIntensity(now)) return false;
    this.state = { intensity, startTime: now, endTime: now + durationMs };
    return true;
  }

  offset(): ShakeOffset {
    const s = this.state;
    if (!s) return NO_SHAKE;
    const now = this.clock.now();
    if (now >= s.endTime) return NO_SHAKE;
    const elapsed = now - s.startTime;
    const decay = 1 - elapsed / (s.endTime - s.startTime);
    const amplitude = s.intensity * decay;
    const t = elapsed * 0.001 * SHAKE_FREQUENCY;
    return {
      dx: Math.sin(t) * amplitude,
      dy: Math.sin(t * SHAKE_Y_FREQUENCY_RATIO + SHAKE_Y_PHASE) * amplitude * SHAKE_Y_ATTENUATION,
    };
  }

  reset(): void {
    this.state = null;
  }
}
