import {
  AIM_MIN_DISTANCE,
  DEATH_ANIMATION_MS,
  DEFAULT_BLAST_RADIUS,
  EXPLOSION_SHAKE_MS,
  EXPLOSION_SHAKE_PER_TILE,
  ISO_HALF_H,
  ISO_HALF_W,
  TELEPORT_ANIMATION_MS,
  TELEPORT_ARRIVAL_DELAY_MS,
  TILE_ANIM_SPEED,
} from "../config/constants.js";
import type { FrameSnapshot, LocalSession } from "../world/types.js";
import { lookupBackground } from "../world/visualKeys.js";
import { collectEntities } from "./collectEntities.js";
import type { AimCommand, DrawCommand, Frame } from "./DrawCommand.js";
import { type ScreenOffset, tileDrawOrigin, worldToScreen } from "./Projection.js";
import type { RenderState } from "./RenderState.js";
import { computeVisibleTileRange } from "./VisibleRange.js";
import type { VisualPoint } from "./VisualPositions.js";

/** Progress of the local death burst at `now`, or null when it isn't playing. */
export function localDeathProgress(local: LocalSession, now: number): number | null {
  if (!local.dead || local.deathTime === null) return null;
  const elapsed = now - local.deathTime;
  if (elapsed < 0 || elapsed >= DEATH_ANIMATION_MS) return null;
  return elapsed / DEATH_ANIMATION_MS;
}

/** Fixed per-position variant so ground doesn't animate. */
export function groundTileFrame(x: number, y: number, frameCount: number): number {
  return ((x * 7 + y * 13) & 0x7fffffff) % frameCount;
}

export function elevatedTileFrame(x: number, y: number, tick: number, frameCount: number): number {
  const animFrame = Math.floor(tick / TILE_ANIM_SPEED);
  return ((animFrame + x * 7 + y * 13) & 0x7fffffff) % frameCount;
}

/** Aim decal from the local visual position toward the pointer, or null when degenerate. */
function aimCommand(
  local: LocalSession,
  visual: VisualPoint,
  offset: ScreenOffset,
): AimCommand | null {
  const aim = local.aim;
  if (!aim || local.dead || local.chargeLevel <= 0) return null;
  const dx = aim.targetX - local.x;
  const dy = aim.targetY - local.y;
  const dist = Math.sqrt(dx * dx + dy * dy);
  if (!(dist >= AIM_MIN_DISTANCE)) return null;
  const pct = Math.min(100, local.chargeLevel) / 100;
  const length = 1 + aim.minRange + pct * (aim.maxRange - aim.minRange);
  const origin = worldToScreen(visual.x, visual.y, offset);
  const tip = worldToScreen(
    visual.x + (dx / dist) * length,
    visual.y + (dy / dist) * length,
    offset,
  );
  return {
    kind: "aim",
    sx: origin.sx,
    sy: origin.sy,
    tipSx: tip.sx,
    tipSy: tip.sy,
    color: local.color,
    chargeLevel: local.chargeLevel,
  };
}

/**
 * Compose one frame: advance per-frame state and emit draw commands in
 * painter's order.
 *
 * Isometric depth without a depth buffer:
 * 1. ground (walkable) tiles, row-major: they never occlude anything
 * 2. ground decals (aim indicator)
 * 3. row-major again: each elevated tile, then every entity bucketed in that
 *    cell. An entity one row north of a wall is emitted before the wall, one
 *    row south after it.
 * 4. buckets whose cell fell outside the tile range, so nothing spilling in
 *    from off-screen is dropped
 * 5. transient overlays (death, teleport, explosion), then the HUD
 */
export function composeFrame(state: RenderState, snapshot: FrameSnapshot, now: number): Frame {
  state.tick++;
  const { camera, effects } = state;
  const { world, local } = snapshot;

  const deathProgress = localDeathProgress(local, now);
  if (local.dead && deathProgress === null && !local.respawning) {
    effects.prune(now);
    return {
      width: camera.virtualWidth,
      height: camera.virtualHeight,
      zoom: camera.zoom,
      offset: camera.offset,
      commands: [{ kind: "gameOver" }],
    };
  }

  const visual = state.visuals.updateLocal(local.x, local.y);
  const offset = camera.update(visual);
  const range = computeVisibleTileRange(
    camera.virtualWidth,
    camera.virtualHeight,
    offset,
    world.width,
    world.height,
    state.cullMargin,
  );

  const commands: DrawCommand[] = [
    {
      kind: "background",
      background: lookupBackground(world.background),
      tick: state.tick,
      offset,
    },
  ];

  const hitProgress = new Map<string, number>();
  for (const hit of effects.hits.collect(now)) hitProgress.set(hit.id, hit.progress);

  const buckets = collectEntities(snapshot, state, {
    offset,
    now,
    localVisual: visual,
    localDeathProgress: deathProgress,
    hitProgress,
  });

  const frames = state.tileFrameCount;

  // Pass 1: ground
  for (let ty = range.minY; ty <= range.maxY; ty++) {
    for (let tx = range.minX; tx <= range.maxX; tx++) {
      const tile = world.getTile(tx, ty);
      if (!tile.walkable) continue;
      const o = tileDrawOrigin(tx, ty, offset);
      commands.push({
        kind: "tile",
        layer: "ground",
        tx,
        ty,
        sx: o.sx,
        sy: o.sy,
        visualId: tile.visualId,
        frame: groundTileFrame(tx, ty, frames),
      });
    }
  }

  const aim = aimCommand(local, visual, offset);
  if (aim) commands.push(aim);

  // Pass 2: elevated tiles interleaved with entities
  for (let ty = range.minY; ty <= range.maxY; ty++) {
    for (let tx = range.minX; tx <= range.maxX; tx++) {
      const tile = world.getTile(tx, ty);
      if (!tile.walkable) {
        const o = tileDrawOrigin(tx, ty, offset);
        commands.push({
          kind: "tile",
          layer: "elevated",
          tx,
          ty,
          sx: o.sx,
          sy: o.sy,
          visualId: tile.visualId,
          frame: elevatedTileFrame(tx, ty, state.tick, frames),
        });
      }
      for (const entity of buckets.take(tx, ty)) commands.push(entity);
    }
  }

  for (const entity of buckets.drain()) commands.push(entity);

  // Overlays
  for (const { id, event, progress } of effects.deaths.collect(now)) {
    const s = worldToScreen(event.x, event.y, offset);
    commands.push({ kind: "deathBurst", id, sx: s.sx, sy: s.sy, color: event.color, progress });
  }

  const arrivalSpan = TELEPORT_ANIMATION_MS - TELEPORT_ARRIVAL_DELAY_MS;
  for (const { id, event, elapsed, progress } of effects.teleports.collect(now)) {
    const from = worldToScreen(event.fromX, event.fromY, offset);
    commands.push({
      kind: "teleport",
      id,
      phase: "depart",
      sx: from.sx,
      sy: from.sy,
      color: event.color,
      progress,
    });
    if (elapsed >= TELEPORT_ARRIVAL_DELAY_MS) {
      const to = worldToScreen(event.toX, event.toY, offset);
      commands.push({
        kind: "teleport",
        id,
        phase: "arrive",
        sx: to.sx,
        sy: to.sy,
        color: event.color,
        progress: (elapsed - TELEPORT_ARRIVAL_DELAY_MS) / arrivalSpan,
      });
    }
  }

  const explosions = effects.explosions.collect(now);
  for (const { id, event, progress } of explosions) {
    const s = worldToScreen(event.x, event.y, offset);
    const radius = event.blastRadius ?? DEFAULT_BLAST_RADIUS;
    commands.push({
      kind: "explosion",
      id,
      sx: s.sx,
      sy: s.sy,
      radiusX: radius * ISO_HALF_W,
      radiusY: radius * ISO_HALF_H,
      color: event.color,
      progress,
    });
  }
  for (const event of effects.claimExplosionShakes(explosions)) {
    const radius = event.blastRadius ?? DEFAULT_BLAST_RADIUS;
    camera.triggerShake(radius * EXPLOSION_SHAKE_PER_TILE, EXPLOSION_SHAKE_MS);
  }

  commands.push({ kind: "hud" });

  return {
    width: camera.virtualWidth,
    height: camera.virtualHeight,
    zoom: camera.zoom,
    offset,
    commands,
  };
}
