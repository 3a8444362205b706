export type { AnyCVar, CVar, CVarCategory } from "./console/CVar.js";
export { CVarRegistry } from "./console/CVarRegistry.js";
export { type RenderCVars, registerRenderCVars } from "./console/renderCVars.js";
export { type Clock, ManualClock, systemClock } from "./core/Clock.js";
export {
  animationFrameScheduler,
  type FrameScheduler,
  RenderLoop,
  type RenderLoopCallbacks,
} from "./core/RenderLoop.js";
export {
  type RenderLogLevel,
  type RenderLogSink,
  renderLog,
  renderLogError,
  renderWarn,
  setRenderLogSink,
} from "./core/renderLog.js";
export { EffectRegistry, type LiveEffect, type TransientEvent } from "./effects/EffectRegistry.js";
export {
  type DeathEvent,
  type ExplosionEvent,
  type HitEvent,
  type TeleportEvent,
  TransientEffects,
} from "./effects/TransientEffects.js";
export { Camera } from "./rendering/Camera.js";
export {
  Canvas2DRenderer,
  type DrawProviders,
  type DrawSurface,
  type StatusEffect,
} from "./rendering/Canvas2DRenderer.js";
export { composeFrame } from "./rendering/composeFrame.js";
export type { DrawCommand, EntityCommand, Frame } from "./rendering/DrawCommand.js";
export { type AimDirection, IsoView, type IsoViewOptions } from "./rendering/IsoView.js";
export {
  type ScreenOffset,
  type ScreenPoint,
  screenToWorld,
  screenToWorldZoomed,
  tileDrawOrigin,
  type WorldPoint,
  worldToScreen,
} from "./rendering/Projection.js";
export { createRenderState, type RenderState } from "./rendering/RenderState.js";
export { ScreenShake } from "./rendering/ScreenShake.js";
export { computeVisibleTileRange, type TileRange } from "./rendering/VisibleRange.js";
export { VisualPositions } from "./rendering/VisualPositions.js";
export type * from "./world/types.js";
export {
  BACKGROUNDS,
  type BackgroundKind,
  type ItemShape,
  lookupBackground,
  lookupItemShape,
  lookupProjectileStyle,
  type ProjectileStyle,
} from "./world/visualKeys.js";
