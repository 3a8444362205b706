import { CULL_MARGIN_TILES } from "../config/constants.js";
import type { Clock } from "../core/Clock.js";
import { TransientEffects } from "../effects/TransientEffects.js";
import { Camera } from "./Camera.js";
import { RemoteMotion } from "./RemoteMotion.js";
import { VisualPositions } from "./VisualPositions.js";

/**
 * Everything the renderer carries from one frame to the next. Passed
 * explicitly into composeFrame so a view can be built and stepped in tests
 * without a display.
 */
export interface RenderState {
  /** Incremented once per frame; drives walk cycles and tile animation. */
  tick: number;
  readonly camera: Camera;
  readonly visuals: VisualPositions;
  readonly motion: RemoteMotion;
  readonly effects: TransientEffects;
  /** Frames per tile animation cycle, as reported by the tile provider. */
  tileFrameCount: number;
  cullMargin: number;
}

export function createRenderState(clock: Clock, tileFrameCount = 1): RenderState {
  return {
    tick: 0,
    camera: new Camera(clock),
    visuals: new VisualPositions(),
    motion: new RemoteMotion(),
    effects: new TransientEffects(),
    tileFrameCount: Math.max(1, Math.floor(tileFrameCount)),
    cullMargin: CULL_MARGIN_TILES,
  };
}
