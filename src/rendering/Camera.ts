import { CAMERA_ZOOM } from "../config/constants.js";
import type { Clock } from "../core/Clock.js";
import {
  type ScreenOffset,
  type ScreenPoint,
  screenToWorldZoomed,
  type WorldPoint,
  worldToScreen,
  ZERO_OFFSET,
} from "./Projection.js";
import { type ShakeOffset, ScreenShake } from "./ScreenShake.js";
import type { VisualPoint } from "./VisualPositions.js";

/**
 * Frames the local player's visual position at the center of the viewport.
 *
 * All frame math happens in virtual pixels (real size / zoom); the backend
 * scales the surface by `zoom` once, so nothing downstream knows about zoom.
 * worldToScreen/screenToWorld speak real pixels for input handling.
 */
export class Camera {
  /** Real (device) viewport size. */
  viewportWidth = 0;
  viewportHeight = 0;
  zoom: number;
  shakeEnabled = true;

  readonly shake: ScreenShake;

  private _offset: ScreenOffset = { ox: 0, oy: 0 };

  constructor(clock: Clock, zoom = CAMERA_ZOOM) {
    this.shake = new ScreenShake(clock);
    this.zoom = zoom;
  }

  setViewport(width: number, height: number): void {
    this.viewportWidth = width;
    this.viewportHeight = height;
  }

  get virtualWidth(): number {
    return this.viewportWidth / this.zoom;
  }

  get virtualHeight(): number {
    return this.viewportHeight / this.zoom;
  }

  /** Offset computed by the last update(), in virtual pixels. */
  get offset(): ScreenOffset {
    return this._offset;
  }

  /** Recompute the frame offset so `focus` sits at the viewport center. */
  update(focus: VisualPoint): ScreenOffset {
    const shake = this.currentShakeOffset();
    const projected = worldToScreen(focus.x, focus.y, ZERO_OFFSET);
    this._offset = {
      ox: this.virtualWidth / 2 - projected.sx + shake.dx,
      oy: this.virtualHeight / 2 - projected.sy + shake.dy,
    };
    return this._offset;
  }

  triggerShake(intensity: number, durationMs: number): boolean {
    return this.shake.trigger(intensity, durationMs);
  }

  currentShakeOffset(): ShakeOffset {
    if (!this.shakeEnabled) return { dx: 0, dy: 0 };
    return this.shake.offset();
  }

  /** World tile coordinates to real screen pixels. */
  worldToScreen(wx: number, wy: number): ScreenPoint {
    const v = worldToScreen(wx, wy, this._offset);
    return { sx: v.sx * this.zoom, sy: v.sy * this.zoom };
  }

  /** Real screen pixels to world tile coordinates. */
  screenToWorld(sx: number, sy: number): WorldPoint {
    return screenToWorldZoomed(sx, sy, this._offset, this.zoom);
  }
}
