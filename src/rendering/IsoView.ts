import { AIM_MIN_DISTANCE } from "../config/constants.js";
import { CVarRegistry } from "../console/CVarRegistry.js";
import { type RenderCVars, registerRenderCVars } from "../console/renderCVars.js";
import { type Clock, systemClock } from "../core/Clock.js";
import type { RenderLoopCallbacks } from "../core/RenderLoop.js";
import type { TransientEffects } from "../effects/TransientEffects.js";
import type { FrameSource } from "../world/types.js";
import { Canvas2DRenderer, type DrawProviders, type DrawSurface } from "./Canvas2DRenderer.js";
import { composeFrame } from "./composeFrame.js";
import type { Frame } from "./DrawCommand.js";
import type { ScreenPoint, WorldPoint } from "./Projection.js";
import { createRenderState, type RenderState } from "./RenderState.js";

export interface IsoViewOptions<TImage> {
  source: FrameSource;
  surface: DrawSurface<TImage>;
  providers: DrawProviders<TImage>;
  clock?: Clock;
  /** Registry the r_* cvars are added to (e.g. the host console's). A private one when absent. */
  cvars?: CVarRegistry;
}

/** Unit world-space direction. */
export interface AimDirection {
  dx: number;
  dy: number;
}

/**
 * The isometric view: composes a frame from the source's snapshot and draws
 * it. Drive render() from a RenderLoop; network handlers write into
 * `effects` and call resetVisualPosition() on respawn or world change.
 */
export class IsoView<TImage> implements RenderLoopCallbacks {
  readonly state: RenderState;
  readonly cvars: RenderCVars;
  private readonly renderer: Canvas2DRenderer<TImage>;
  private readonly source: FrameSource;
  private readonly clock: Clock;
  private readonly unsubscribers: Array<() => void> = [];

  constructor(options: IsoViewOptions<TImage>) {
    this.source = options.source;
    this.clock = options.clock ?? systemClock;
    this.state = createRenderState(this.clock, options.providers.tileFrameCount ?? 1);
    this.renderer = new Canvas2DRenderer(options.surface, options.providers);
    this.cvars = registerRenderCVars(options.cvars ?? new CVarRegistry());

    const { r_zoom, r_cullmargin, r_visual_lerp, r_shake } = this.cvars;
    const { camera, visuals } = this.state;
    camera.zoom = r_zoom.get();
    this.state.cullMargin = Math.floor(r_cullmargin.get());
    visuals.setLerp(r_visual_lerp.get());
    camera.shakeEnabled = r_shake.get();
    this.unsubscribers.push(
      r_zoom.onChange((v) => {
        camera.zoom = v;
      }),
      r_cullmargin.onChange((v) => {
        this.state.cullMargin = Math.floor(v);
      }),
      r_visual_lerp.onChange((v) => visuals.setLerp(v)),
      r_shake.onChange((v) => {
        camera.shakeEnabled = v;
      }),
    );
  }

  /** Registries the network layer writes hit/death/teleport/explosion events into. */
  get effects(): TransientEffects {
    return this.state.effects;
  }

  /** Real canvas size in device pixels. */
  setViewport(width: number, height: number): void {
    this.state.camera.setViewport(width, height);
  }

  /** Compose and draw one frame. Returns what was drawn. */
  render(): Frame {
    const camera = this.state.camera;
    const frame = composeFrame(this.state, this.source.snapshot(), this.clock.now());
    this.renderer.draw(frame, camera.viewportWidth, camera.viewportHeight);
    return frame;
  }

  /** Forget smoothed positions so the next frame snaps instead of sliding. */
  resetVisualPosition(): void {
    this.state.visuals.resetAll();
    this.state.motion.clear();
  }

  triggerShake(intensity: number, durationMs: number): boolean {
    return this.state.camera.triggerShake(intensity, durationMs);
  }

  /** World tiles to real screen pixels, as of the last frame. */
  worldToScreen(wx: number, wy: number): ScreenPoint {
    return this.state.camera.worldToScreen(wx, wy);
  }

  /** Real screen pixels (e.g. a pointer) to world tiles, as of the last frame. */
  screenToWorld(sx: number, sy: number): WorldPoint {
    return this.state.camera.screenToWorld(sx, sy);
  }

  /**
   * Normalized world direction from the local player to a pointer at real
   * pixels (px, py). Null before the first frame or when the pointer is on
   * the player.
   */
  aimDirection(px: number, py: number): AimDirection | null {
    const origin = this.state.visuals.localPosition;
    if (!origin) return null;
    const target = this.screenToWorld(px, py);
    const dx = target.wx - origin.x;
    const dy = target.wy - origin.y;
    const len = Math.sqrt(dx * dx + dy * dy);
    if (!(len >= AIM_MIN_DISTANCE)) return null;
    return { dx: dx / len, dy: dy / len };
  }

  /** Detach from the cvars. The view keeps its last settings. */
  dispose(): void {
    for (const off of this.unsubscribers) off();
    this.unsubscribers.length = 0;
  }
}
