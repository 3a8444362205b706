/**
 * Discriminated union of everything a frame draws, in draw order.
 * Screen positions are virtual pixels (before zoom); the backend applies
 * zoom once for the whole world layer.
 */

import type { ArgbColor, Direction, PlayerStatus } from "../world/types.js";
import type { BackgroundKind, ItemShape, ProjectileStyle } from "../world/visualKeys.js";
import type { ScreenOffset } from "./Projection.js";

export type DrawCommand =
  | BackgroundCommand
  | TileCommand
  | AimCommand
  | EntityCommand
  | DeathBurstCommand
  | TeleportCommand
  | ExplosionCommand
  | GameOverCommand
  | HudCommand;

/** Commands that live in a cell bucket and interleave with elevated tiles. */
export type EntityCommand = ItemCommand | ProjectileCommand | PlayerCommand | LocalDeathCommand;

export interface BackgroundCommand {
  kind: "background";
  background: BackgroundKind;
  tick: number;
  offset: ScreenOffset;
}

export interface TileCommand {
  kind: "tile";
  /** "ground" tiles are drawn in pass 1, "elevated" ones interleaved in pass 2. */
  layer: "ground" | "elevated";
  tx: number;
  ty: number;
  /** Top-left of the tile image. */
  sx: number;
  sy: number;
  visualId: number;
  frame: number;
}

/** Ground decal from the local player toward the pointer while charging. */
export interface AimCommand {
  kind: "aim";
  sx: number;
  sy: number;
  tipSx: number;
  tipSy: number;
  color: ArgbColor;
  /** 0-100. */
  chargeLevel: number;
}

export interface ItemCommand {
  kind: "item";
  id: number;
  cellX: number;
  cellY: number;
  /** Center of the item's tile. */
  sx: number;
  sy: number;
  shape: ItemShape;
  color: ArgbColor;
}

export interface ProjectileCommand {
  kind: "projectile";
  id: number;
  cellX: number;
  cellY: number;
  /** Tail (current position). */
  sx: number;
  sy: number;
  /** Tip of the beam; equals the tail for particle-style projectiles. */
  tipSx: number;
  tipSy: number;
  style: ProjectileStyle;
  color: ArgbColor;
  /** Animation phase for pulse/flicker. */
  phase: number;
}

export interface PlayerCommand {
  kind: "player";
  role: "remote" | "local";
  id: string;
  cellX: number;
  cellY: number;
  /** Screen position of the smoothed visual position (feet). */
  sx: number;
  sy: number;
  direction: Direction;
  /** Walk frame 0-3. */
  frame: number;
  color: ArgbColor;
  characterId: number;
  health: number;
  chargeLevel: number;
  /** Progress of an active hit flash, or null. */
  hitProgress: number | null;
  status: PlayerStatus;
  /** Render tick, for pulsing status effects. */
  animTick: number;
}

/** The local player's own death burst, drawn in its cell while it plays. */
export interface LocalDeathCommand {
  kind: "localDeath";
  id: string;
  cellX: number;
  cellY: number;
  sx: number;
  sy: number;
  color: ArgbColor;
  progress: number;
}

export interface DeathBurstCommand {
  kind: "deathBurst";
  id: string;
  sx: number;
  sy: number;
  color: ArgbColor;
  progress: number;
}

export interface TeleportCommand {
  kind: "teleport";
  id: string;
  phase: "depart" | "arrive";
  sx: number;
  sy: number;
  color: ArgbColor;
  progress: number;
}

export interface ExplosionCommand {
  kind: "explosion";
  id: string;
  sx: number;
  sy: number;
  /** Screen-space blast radii (isometric: twice as wide as tall). */
  radiusX: number;
  radiusY: number;
  color: ArgbColor;
  progress: number;
}

/** Full-screen state after the local death animation; nothing else is drawn. */
export interface GameOverCommand {
  kind: "gameOver";
}

/** HUD overlay, drawn in real pixels after the world layer. */
export interface HudCommand {
  kind: "hud";
}

/** One composited frame. */
export interface Frame {
  /** Virtual canvas size (real size / zoom). */
  width: number;
  height: number;
  zoom: number;
  offset: ScreenOffset;
  commands: DrawCommand[];
}
