import {
  DEATH_ANIMATION_MS,
  EXPLOSION_ANIMATION_MS,
  EXPLOSION_SHAKE_WINDOW_MS,
  HIT_ANIMATION_MS,
  TELEPORT_ANIMATION_MS,
} from "../config/constants.js";
import type { ArgbColor } from "../world/types.js";
import { EffectRegistry, type LiveEffect, type TransientEvent } from "./EffectRegistry.js";

/** Damage flash on a player's sprite. Keyed by player id. */
export type HitEvent = TransientEvent;

export interface DeathEvent extends TransientEvent {
  readonly x: number;
  readonly y: number;
  readonly color: ArgbColor;
}

export interface TeleportEvent extends TransientEvent {
  readonly fromX: number;
  readonly fromY: number;
  readonly toX: number;
  readonly toY: number;
  readonly color: ArgbColor;
}

export interface ExplosionEvent extends TransientEvent {
  readonly x: number;
  readonly y: number;
  readonly color: ArgbColor;
  /** Tiles; DEFAULT_BLAST_RADIUS when absent. */
  readonly blastRadius?: number;
}

/** The four registries the network layer writes into. */
export class TransientEffects {
  readonly hits = new EffectRegistry<HitEvent>("hit", HIT_ANIMATION_MS);
  readonly deaths = new EffectRegistry<DeathEvent>("death", DEATH_ANIMATION_MS);
  readonly teleports = new EffectRegistry<TeleportEvent>("teleport", TELEPORT_ANIMATION_MS);
  readonly explosions = new EffectRegistry<ExplosionEvent>("explosion", EXPLOSION_ANIMATION_MS);

  /** Explosion events that already requested their shake. */
  private readonly shaken = new WeakSet<object>();

  /**
   * Explosions that should shake the camera this frame: seen while younger
   * than the shake window, and not shaken before.
   */
  claimExplosionShakes(live: readonly LiveEffect<ExplosionEvent>[]): Readonly<ExplosionEvent>[] {
    const fresh: Readonly<ExplosionEvent>[] = [];
    for (const { event, elapsed } of live) {
      if (elapsed >= EXPLOSION_SHAKE_WINDOW_MS || this.shaken.has(event)) continue;
      this.shaken.add(event);
      fresh.push(event);
    }
    return fresh;
  }

  /** Evict expired events from every registry without drawing anything. */
  prune(now: number): void {
    this.hits.collect(now);
    this.deaths.collect(now);
    this.teleports.collect(now);
    this.explosions.collect(now);
  }

  clear(): void {
    this.hits.clear();
    this.deaths.clear();
    this.teleports.clear();
    this.explosions.clear();
  }
}
