import {
  CHARGE_WALK_SLOWDOWN,
  WALK_FRAME_COUNT,
  WALK_FRAME_TICKS,
} from "../config/constants.js";
import type { FrameSnapshot, PlayerStatus } from "../world/types.js";
import { lookupItemShape, lookupProjectileStyle } from "../world/visualKeys.js";
import { CellBuckets } from "./CellBuckets.js";
import type { EntityCommand } from "./DrawCommand.js";
import { type ScreenOffset, worldToScreen } from "./Projection.js";
import type { RenderState } from "./RenderState.js";
import type { VisualPoint } from "./VisualPositions.js";

const NO_STATUS: PlayerStatus = { shield: false, gemBoost: false, frozen: false, phased: false };

export interface EntityPassContext {
  offset: ScreenOffset;
  now: number;
  /** Smoothed local position (already advanced this frame). */
  localVisual: VisualPoint;
  /** Progress of the local death burst while it plays, else null. */
  localDeathProgress: number | null;
  /** Player id → active hit flash progress. */
  hitProgress: ReadonlyMap<string, number>;
}

/** Walk-cycle frame: idle is frame 0; the stride slows from 5 to 25 ticks as charge builds. */
export function walkFrame(tick: number, moving: boolean, chargeLevel: number): number {
  if (!moving) return 0;
  const ticksPerFrame =
    chargeLevel > 0
      ? Math.floor(WALK_FRAME_TICKS * (1 + (chargeLevel / 100) * CHARGE_WALK_SLOWDOWN))
      : WALK_FRAME_TICKS;
  return Math.floor(tick / ticksPerFrame) % WALK_FRAME_COUNT;
}

/**
 * Bucket every dynamic entity by the grid cell it occupies.
 *
 * Insertion order is the tie-break inside a cell: items, projectiles, remote
 * players, then the local player. That order only keeps co-located entities
 * stable frame to frame; it is not an occlusion rule.
 *
 * Side effect: advances remote visual positions and motion timers, and
 * forgets players that left.
 */
export function collectEntities(
  snapshot: FrameSnapshot,
  state: RenderState,
  ctx: EntityPassContext,
): CellBuckets<EntityCommand> {
  const buckets = new CellBuckets<EntityCommand>();
  const { offset } = ctx;

  for (const item of snapshot.items) {
    const s = worldToScreen(item.cellX, item.cellY, offset);
    buckets.add(item.cellX, item.cellY, {
      kind: "item",
      id: item.id,
      cellX: item.cellX,
      cellY: item.cellY,
      sx: s.sx,
      sy: s.sy,
      shape: lookupItemShape(item.kind),
      color: item.color,
    });
  }

  for (const proj of snapshot.projectiles) {
    if (!Number.isFinite(proj.x) || !Number.isFinite(proj.y)) continue;
    const cellX = Math.round(proj.x);
    const cellY = Math.round(proj.y);
    const style = lookupProjectileStyle(proj.kind);
    const tail = worldToScreen(proj.x, proj.y, offset);
    let tip = tail;
    if (style.kind === "beam" && Number.isFinite(proj.dx) && Number.isFinite(proj.dy)) {
      tip = worldToScreen(
        proj.x + proj.dx * style.lengthTiles,
        proj.y + proj.dy * style.lengthTiles,
        offset,
      );
    }
    buckets.add(cellX, cellY, {
      kind: "projectile",
      id: proj.id,
      cellX,
      cellY,
      sx: tail.sx,
      sy: tail.sy,
      tipSx: tip.sx,
      tipSy: tip.sy,
      style,
      color: proj.color,
      phase: (state.tick + proj.id * 37) * 0.3,
    });
  }

  const present = new Set<string>();
  for (const player of snapshot.players) {
    present.add(player.id);
    if (player.dead) continue;
    if (!Number.isFinite(player.x) || !Number.isFinite(player.y)) continue;
    const visual = state.visuals.updateRemote(player.id, player.x, player.y);
    const moving = state.motion.observe(player.id, player.x, player.y, ctx.now);
    const cellX = Math.round(player.x);
    const cellY = Math.round(player.y);
    const s = worldToScreen(visual.x, visual.y, offset);
    buckets.add(cellX, cellY, {
      kind: "player",
      role: "remote",
      id: player.id,
      cellX,
      cellY,
      sx: s.sx,
      sy: s.sy,
      direction: player.direction,
      frame: walkFrame(state.tick, moving, player.chargeLevel),
      color: player.color,
      characterId: player.characterId,
      health: player.health,
      chargeLevel: player.chargeLevel,
      hitProgress: ctx.hitProgress.get(player.id) ?? null,
      status: player.status ?? NO_STATUS,
      animTick: state.tick,
    });
  }
  state.visuals.retainRemote((id) => present.has(id));
  state.motion.retain((id) => present.has(id));

  const local = snapshot.local;
  const localCellX = Math.round(local.x);
  const localCellY = Math.round(local.y);
  const ls = worldToScreen(ctx.localVisual.x, ctx.localVisual.y, offset);
  if (ctx.localDeathProgress !== null) {
    buckets.add(localCellX, localCellY, {
      kind: "localDeath",
      id: local.playerId,
      cellX: localCellX,
      cellY: localCellY,
      sx: ls.sx,
      sy: ls.sy,
      color: local.color,
      progress: ctx.localDeathProgress,
    });
  } else if (!local.dead) {
    buckets.add(localCellX, localCellY, {
      kind: "player",
      role: "local",
      id: local.playerId,
      cellX: localCellX,
      cellY: localCellY,
      sx: ls.sx,
      sy: ls.sy,
      direction: local.direction,
      frame: walkFrame(state.tick, local.moving, local.chargeLevel),
      color: local.color,
      characterId: local.characterId,
      health: local.health,
      chargeLevel: local.chargeLevel,
      hitProgress: ctx.hitProgress.get(local.playerId) ?? null,
      status: local.status ?? NO_STATUS,
      animTick: state.tick,
    });
  }

  return buckets;
}
