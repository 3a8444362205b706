/** One grid cell of the arena. `walkable` decides which compositing pass draws it. */
export interface Tile {
  readonly walkable: boolean;
  readonly visualId: number;
}

/** Read-only view of the arena map. */
export interface WorldSnapshot {
  readonly width: number;
  readonly height: number;
  /** Background theme key ("sky", "space", ...). */
  readonly background: string;
  getTile(x: number, y: number): Tile;
}

export type Direction = "down" | "up" | "left" | "right";

/** ARGB packed color, as sent by the game server. */
export type ArgbColor = number;

export interface ItemSnapshot {
  readonly id: number;
  readonly cellX: number;
  readonly cellY: number;
  /** Item type key ("gem", "heart", ...). */
  readonly kind: string;
  readonly color: ArgbColor;
}

export interface ProjectileSnapshot {
  readonly id: number;
  readonly x: number;
  readonly y: number;
  /** Unit-ish travel direction in world tiles. */
  readonly dx: number;
  readonly dy: number;
  /** Projectile type key ("normal", "fireball", ...). */
  readonly kind: string;
  readonly color: ArgbColor;
}

/** Status flags the server sends with each player. */
export interface PlayerStatus {
  readonly shield: boolean;
  readonly gemBoost: boolean;
  readonly frozen: boolean;
  /** Drawn translucent, with no shield, gem or charge effects. */
  readonly phased: boolean;
}

export interface PlayerSnapshot {
  readonly id: string;
  readonly x: number;
  readonly y: number;
  readonly direction: Direction;
  readonly color: ArgbColor;
  readonly characterId: number;
  readonly health: number;
  readonly dead: boolean;
  /** 0 when not charging, up to 100. */
  readonly chargeLevel: number;
  /** No status effects when absent. */
  readonly status?: PlayerStatus;
}

/** Aim indicator shown on the ground while charging an aimed shot. */
export interface AimState {
  /** Pointer position in world tiles. */
  readonly targetX: number;
  readonly targetY: number;
  /** Indicator length at zero and full charge, in tiles. */
  readonly minRange: number;
  readonly maxRange: number;
}

/** State of the locally controlled player. */
export interface LocalSession {
  readonly playerId: string;
  readonly x: number;
  readonly y: number;
  readonly direction: Direction;
  readonly color: ArgbColor;
  readonly characterId: number;
  readonly health: number;
  readonly moving: boolean;
  readonly dead: boolean;
  readonly respawning: boolean;
  /** Wall-clock ms of the local death, or null. */
  readonly deathTime: number | null;
  readonly chargeLevel: number;
  /** Present while charging a shot whose range scales with charge. */
  readonly aim: AimState | null;
  readonly status?: PlayerStatus;
}

/** Everything one frame reads, captured at frame start. */
export interface FrameSnapshot {
  readonly world: WorldSnapshot;
  readonly items: readonly ItemSnapshot[];
  readonly projectiles: readonly ProjectileSnapshot[];
  /** Remote players; the local player is in `local`. */
  readonly players: readonly PlayerSnapshot[];
  readonly local: LocalSession;
}

/**
 * Game/network state as the renderer sees it. snapshot() is called once at
 * the start of every frame; the returned collections must not change while
 * the frame draws.
 */
export interface FrameSource {
  snapshot(): FrameSnapshot;
}
