import alea from "alea";
import { createNoise2D, type NoiseFunction2D } from "simplex-noise";
import {
  ISO_TILE_WIDTH,
  ITEM_SIZE_PX,
  PLAYER_DISPLAY_SIZE_PX,
  PROJECTILE_SCREEN_MARGIN,
  TILE_CELL_HEIGHT,
} from "../config/constants.js";
import { renderLogError, renderWarnOnce } from "../core/renderLog.js";
import type { ArgbColor, Direction } from "../world/types.js";
import type { BackgroundKind, ItemShape } from "../world/visualKeys.js";
import { argbToCss, lighten } from "./color.js";
import type {
  AimCommand,
  DrawCommand,
  ExplosionCommand,
  Frame,
  ItemCommand,
  PlayerCommand,
  ProjectileCommand,
  TeleportCommand,
  TileCommand,
} from "./DrawCommand.js";
import type { ScreenOffset } from "./Projection.js";

/**
 * The slice of CanvasRenderingContext2D the renderer uses. A real 2D context
 * satisfies it with TImage = CanvasImageSource; tests pass a recorder.
 */
export interface DrawSurface<TImage> {
  globalAlpha: number;
  fillStyle: string | CanvasGradient | CanvasPattern;
  strokeStyle: string | CanvasGradient | CanvasPattern;
  lineWidth: number;
  font: string;
  textAlign: CanvasTextAlign;
  textBaseline: CanvasTextBaseline;
  save(): void;
  restore(): void;
  scale(x: number, y: number): void;
  translate(x: number, y: number): void;
  rotate(angle: number): void;
  clearRect(x: number, y: number, w: number, h: number): void;
  fillRect(x: number, y: number, w: number, h: number): void;
  strokeRect(x: number, y: number, w: number, h: number): void;
  beginPath(): void;
  closePath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number): void;
  ellipse(
    x: number,
    y: number,
    radiusX: number,
    radiusY: number,
    rotation: number,
    startAngle: number,
    endAngle: number,
  ): void;
  fill(): void;
  stroke(): void;
  fillText(text: string, x: number, y: number): void;
  drawImage(image: TImage, dx: number, dy: number, dw: number, dh: number): void;
}

/** Player status effects drawn around the sprite. */
export type StatusEffect = "shieldBubble" | "gemGlow" | "chargeAura" | "phaseShimmer" | "frozen";

/** Artwork the host supplies. Absent images are skipped with a one-time warning. */
export interface DrawProviders<TImage> {
  /** Frames per animated tile cycle; 1 when absent. */
  readonly tileFrameCount?: number;
  tileImage(visualId: number, frame: number): TImage | undefined;
  spriteImage(
    color: ArgbColor,
    direction: Direction,
    frame: number,
    characterId: number,
  ): TImage | undefined;
  /** Paints the virtual viewport behind the world. A flat fill is used when absent. */
  drawBackground?(
    surface: DrawSurface<TImage>,
    background: BackgroundKind,
    tick: number,
    offset: ScreenOffset,
    width: number,
    height: number,
  ): void;
  /**
   * Particle projectiles by effect key, and player status effects by
   * StatusEffect key centered on the sprite (phase is then the render tick).
   * `strength` is the charge fraction for "chargeAura", 1 otherwise.
   * Returns true when it drew the effect; otherwise a default is drawn.
   */
  drawParticleEffect?(
    surface: DrawSurface<TImage>,
    effect: string,
    sx: number,
    sy: number,
    phase: number,
    color: ArgbColor,
    strength: number,
  ): boolean;
  /** Drawn last, in real pixels. */
  drawHud?(surface: DrawSurface<TImage>, width: number, height: number): void;
}

const BACKGROUND_FILL: Record<BackgroundKind, string> = {
  sky: "#87ceeb",
  cityscape: "#2b2d42",
  space: "#05051a",
  desert: "#e4c590",
  ocean: "#1d5f8a",
};

const TAU = Math.PI * 2;
const DEATH_SHARDS = 12;
const EXPLOSION_EDGE_POINTS = 24;
/** Fraction of an explosion spent growing to full radius. */
const EXPLOSION_GROW = 0.3;
const HEALTH_BAR_W = 30;
const HEALTH_BAR_H = 4;
const PHASED_SPRITE_ALPHA = 0.4;

/** Executes composed frames on a 2D surface. */
export class Canvas2DRenderer<TImage> {
  /** Per-explosion edge noise, dropped once the explosion is gone. */
  private readonly explosionNoise = new Map<string, NoiseFunction2D>();
  private readonly particleNoise: NoiseFunction2D = createNoise2D(alea("particle-edge"));

  constructor(
    private readonly surface: DrawSurface<TImage>,
    private readonly providers: DrawProviders<TImage>,
  ) {}

  /**
   * Draw one frame. World commands are in virtual pixels under a single
   * zoom scale; the game-over screen and HUD use real pixels.
   */
  draw(frame: Frame, realWidth: number, realHeight: number): void {
    const ctx = this.surface;
    ctx.clearRect(0, 0, realWidth, realHeight);

    if (frame.commands[0]?.kind === "gameOver") {
      this.drawGameOver(realWidth, realHeight);
      return;
    }

    const liveExplosions = new Set<string>();
    let hud = false;
    ctx.save();
    ctx.scale(frame.zoom, frame.zoom);
    for (const cmd of frame.commands) {
      if (cmd.kind === "hud") {
        hud = true;
        continue;
      }
      if (cmd.kind === "explosion") liveExplosions.add(cmd.id);
      this.drawCommand(cmd, frame);
    }
    ctx.restore();

    for (const id of [...this.explosionNoise.keys()]) {
      if (!liveExplosions.has(id)) this.explosionNoise.delete(id);
    }

    if (hud && this.providers.drawHud) {
      try {
        this.providers.drawHud(ctx, realWidth, realHeight);
      } catch (err) {
        renderLogError("draw hud failed", err);
      }
    }
  }

  /** One command; a failure is logged and the rest of the frame still draws. */
  private drawCommand(cmd: DrawCommand, frame: Frame): void {
    if (cmd.kind === "tile") {
      try {
        this.drawTile(cmd);
      } catch (err) {
        renderLogError(`draw tile ${cmd.tx},${cmd.ty} failed`, err);
      }
      return;
    }
    const ctx = this.surface;
    ctx.save();
    try {
      switch (cmd.kind) {
        case "background":
          this.drawBackground(cmd.background, cmd.tick, cmd.offset, frame);
          break;
        case "aim":
          this.drawAim(cmd);
          break;
        case "item":
          this.drawItem(cmd);
          break;
        case "projectile":
          this.drawProjectile(cmd, frame);
          break;
        case "player":
          this.drawPlayer(cmd);
          break;
        case "localDeath":
        case "deathBurst":
          this.drawDeathBurst(cmd.id, cmd.sx, cmd.sy, cmd.color, cmd.progress);
          break;
        case "teleport":
          this.drawTeleport(cmd);
          break;
        case "explosion":
          this.drawExplosion(cmd);
          break;
        case "gameOver":
          break;
      }
    } catch (err) {
      renderLogError(`draw ${cmd.kind} failed`, err);
    } finally {
      ctx.restore();
    }
  }

  private drawBackground(
    background: BackgroundKind,
    tick: number,
    offset: ScreenOffset,
    frame: Frame,
  ): void {
    if (this.providers.drawBackground) {
      const { width, height } = frame;
      this.providers.drawBackground(this.surface, background, tick, offset, width, height);
      return;
    }
    this.surface.fillStyle = BACKGROUND_FILL[background];
    this.surface.fillRect(0, 0, frame.width, frame.height);
  }

  private drawTile(cmd: TileCommand): void {
    const image = this.providers.tileImage(cmd.visualId, cmd.frame);
    if (image === undefined) {
      renderWarnOnce(
        `tile:${cmd.visualId}:${cmd.frame}`,
        `no image for tile ${cmd.visualId} frame ${cmd.frame}`,
      );
      return;
    }
    this.surface.drawImage(image, cmd.sx, cmd.sy, ISO_TILE_WIDTH, TILE_CELL_HEIGHT);
  }

  private drawAim(cmd: AimCommand): void {
    const ctx = this.surface;
    ctx.globalAlpha = 0.35 + 0.4 * (Math.min(100, cmd.chargeLevel) / 100);
    ctx.strokeStyle = argbToCss(cmd.color);
    ctx.lineWidth = 2;
    ctx.beginPath();
    ctx.moveTo(cmd.sx, cmd.sy);
    ctx.lineTo(cmd.tipSx, cmd.tipSy);
    ctx.stroke();
    ctx.beginPath();
    ctx.ellipse(cmd.tipSx, cmd.tipSy, 6, 3, 0, 0, TAU);
    ctx.stroke();
  }

  private drawItem(cmd: ItemCommand): void {
    const ctx = this.surface;
    const r = ITEM_SIZE_PX / 2;
    ctx.fillStyle = "rgba(0, 0, 0, 0.25)";
    ctx.beginPath();
    ctx.ellipse(cmd.sx, cmd.sy, r * 0.6, r * 0.3, 0, 0, TAU);
    ctx.fill();

    ctx.beginPath();
    traceItemShape(ctx, cmd.shape, cmd.sx, cmd.sy - r, r);
    ctx.fillStyle = argbToCss(cmd.color);
    ctx.fill();
    ctx.strokeStyle = "rgba(0, 0, 0, 0.6)";
    ctx.lineWidth = 1;
    ctx.stroke();
  }

  private drawProjectile(cmd: ProjectileCommand, frame: Frame): void {
    const m = PROJECTILE_SCREEN_MARGIN;
    const offscreen = (x: number, y: number) =>
      x < -m || x > frame.width + m || y < -m || y > frame.height + m;
    if (offscreen(cmd.sx, cmd.sy) && offscreen(cmd.tipSx, cmd.tipSy)) return;

    const ctx = this.surface;
    if (cmd.style.kind === "particle") {
      const drawn = this.providers.drawParticleEffect?.(
        ctx,
        cmd.style.effect,
        cmd.sx,
        cmd.sy,
        cmd.phase,
        cmd.color,
        1,
      );
      if (!drawn) this.drawParticleBlob(cmd);
      return;
    }

    ctx.globalAlpha = 0.75 + 0.25 * Math.sin(cmd.phase);
    ctx.strokeStyle = argbToCss(cmd.color);
    ctx.lineWidth = 3;
    ctx.beginPath();
    ctx.moveTo(cmd.sx, cmd.sy);
    ctx.lineTo(cmd.tipSx, cmd.tipSy);
    ctx.stroke();
    ctx.strokeStyle = argbToCss(lighten(cmd.color, 0.7));
    ctx.lineWidth = 1;
    ctx.stroke();
  }

  /** Noise-edged glowing blob for particle projectiles the host doesn't draw. */
  private drawParticleBlob(cmd: ProjectileCommand): void {
    const ctx = this.surface;
    const points = 12;
    ctx.fillStyle = argbToCss(cmd.color);
    ctx.beginPath();
    for (let i = 0; i < points; i++) {
      const a = (i / points) * TAU;
      const r = 6 + 2 * this.particleNoise(Math.cos(a) + cmd.phase * 0.1, Math.sin(a));
      const x = cmd.sx + Math.cos(a) * r;
      const y = cmd.sy + Math.sin(a) * r * 0.6;
      if (i === 0) ctx.moveTo(x, y);
      else ctx.lineTo(x, y);
    }
    ctx.closePath();
    ctx.fill();
  }

  private drawPlayer(cmd: PlayerCommand): void {
    const ctx = this.surface;
    const size = PLAYER_DISPLAY_SIZE_PX;
    const left = cmd.sx - size / 2;
    const top = cmd.sy - size;
    const { status } = cmd;

    if (status.phased) {
      this.drawStatusEffect("phaseShimmer", cmd, 1);
    } else {
      if (status.shield) this.drawStatusEffect("shieldBubble", cmd, 1);
      if (status.gemBoost) this.drawStatusEffect("gemGlow", cmd, 1);
      if (cmd.chargeLevel > 0) {
        this.drawStatusEffect("chargeAura", cmd, Math.min(100, cmd.chargeLevel) / 100);
      }
    }

    ctx.fillStyle = "rgba(0, 0, 0, 0.3)";
    ctx.beginPath();
    ctx.ellipse(cmd.sx, cmd.sy, 12, 5, 0, 0, TAU);
    ctx.fill();

    const image = this.providers.spriteImage(cmd.color, cmd.direction, cmd.frame, cmd.characterId);
    if (image === undefined) {
      renderWarnOnce(
        `sprite:${cmd.characterId}:${cmd.direction}:${cmd.frame}`,
        `no sprite for character ${cmd.characterId} ${cmd.direction} frame ${cmd.frame}`,
      );
    } else {
      if (status.phased) ctx.globalAlpha = PHASED_SPRITE_ALPHA;
      ctx.drawImage(image, left, top, size, size);
      ctx.globalAlpha = 1;
    }

    if (status.frozen) this.drawStatusEffect("frozen", cmd, 1);

    if (cmd.hitProgress !== null) {
      ctx.globalAlpha = 0.6 * (1 - cmd.hitProgress);
      ctx.fillStyle = "rgba(255, 64, 64, 1)";
      ctx.beginPath();
      ctx.ellipse(cmd.sx, cmd.sy - size / 2, size / 3, size / 2, 0, 0, TAU);
      ctx.fill();
      ctx.globalAlpha = 1;
    }

    const barX = cmd.sx - HEALTH_BAR_W / 2;
    const barY = top - 8;
    const health = Math.max(0, Math.min(1, cmd.health / 100));
    ctx.fillStyle = "#400";
    ctx.fillRect(barX, barY, HEALTH_BAR_W, HEALTH_BAR_H);
    ctx.fillStyle = "#3c3";
    ctx.fillRect(barX, barY, HEALTH_BAR_W * health, HEALTH_BAR_H);

    if (cmd.chargeLevel > 0) {
      const charge = Math.min(100, cmd.chargeLevel) / 100;
      ctx.fillStyle = argbToCss(lighten(cmd.color, 0.4));
      ctx.fillRect(barX, barY + HEALTH_BAR_H + 1, HEALTH_BAR_W * charge, 2);
    }
  }

  /** Provider artwork for a status effect, or the built-in one, centered on the sprite. */
  private drawStatusEffect(effect: StatusEffect, cmd: PlayerCommand, strength: number): void {
    const ctx = this.surface;
    const cy = cmd.sy - PLAYER_DISPLAY_SIZE_PX / 2;
    ctx.save();
    try {
      const drawn = this.providers.drawParticleEffect?.(
        ctx,
        effect,
        cmd.sx,
        cy,
        cmd.animTick,
        cmd.color,
        strength,
      );
      if (!drawn) paintStatusEffect(ctx, effect, cmd.sx, cy, cmd.animTick, strength);
    } finally {
      ctx.restore();
    }
  }

  /** Shards flung outward; layout is seeded by the event id so it doesn't flicker. */
  private drawDeathBurst(
    id: string,
    sx: number,
    sy: number,
    color: ArgbColor,
    progress: number,
  ): void {
    const ctx = this.surface;
    const rng = alea(`death:${id}`);
    const cy = sy - PLAYER_DISPLAY_SIZE_PX / 3;
    const dist = 6 + progress * 42;
    ctx.globalAlpha = 1 - progress;
    ctx.fillStyle = argbToCss(color);
    for (let i = 0; i < DEATH_SHARDS; i++) {
      const angle = rng() * TAU;
      const speed = 0.6 + rng() * 0.4;
      const size = 2 + rng() * 3;
      const x = sx + Math.cos(angle) * dist * speed;
      const y = cy + Math.sin(angle) * dist * speed * 0.5 + progress * progress * 20;
      ctx.fillRect(x - size / 2, y - size / 2, size, size);
    }
    if (progress < 0.25) {
      const flash = progress * 4;
      ctx.globalAlpha = 1 - flash;
      ctx.strokeStyle = "#fff";
      ctx.lineWidth = 2;
      ctx.beginPath();
      ctx.ellipse(sx, cy, 4 + flash * 20, 2 + flash * 10, 0, 0, TAU);
      ctx.stroke();
    }
  }

  private drawTeleport(cmd: TeleportCommand): void {
    const ctx = this.surface;
    const open = cmd.phase === "depart" ? 1 - cmd.progress : cmd.progress;
    const r = 18 * open;
    ctx.globalAlpha = 1 - cmd.progress;
    ctx.strokeStyle = argbToCss(cmd.color);
    ctx.lineWidth = 2;
    ctx.beginPath();
    ctx.ellipse(cmd.sx, cmd.sy, r, r / 2, 0, 0, TAU);
    ctx.stroke();
    const column = PLAYER_DISPLAY_SIZE_PX * 1.25 * open;
    ctx.fillStyle = argbToCss(lighten(cmd.color, 0.6));
    ctx.fillRect(cmd.sx - 3, cmd.sy - column, 6, column);
  }

  private drawExplosion(cmd: ExplosionCommand): void {
    const ctx = this.surface;
    const noise = this.noiseFor(cmd.id);
    const grow = Math.min(1, cmd.progress / EXPLOSION_GROW);
    const fade =
      cmd.progress < EXPLOSION_GROW
        ? 1
        : 1 - (cmd.progress - EXPLOSION_GROW) / (1 - EXPLOSION_GROW);
    const rx = cmd.radiusX * grow;
    const ry = cmd.radiusY * grow;
    if (rx <= 0 || ry <= 0) return;

    ctx.globalAlpha = Math.max(0, fade);
    ctx.fillStyle = argbToCss(cmd.color);
    ctx.beginPath();
    for (let i = 0; i < EXPLOSION_EDGE_POINTS; i++) {
      const a = (i / EXPLOSION_EDGE_POINTS) * TAU;
      const wobble = 1 + 0.18 * noise(Math.cos(a) * 1.5, Math.sin(a) * 1.5 + cmd.progress * 3);
      const x = cmd.sx + Math.cos(a) * rx * wobble;
      const y = cmd.sy + Math.sin(a) * ry * wobble;
      if (i === 0) ctx.moveTo(x, y);
      else ctx.lineTo(x, y);
    }
    ctx.closePath();
    ctx.fill();

    ctx.fillStyle = argbToCss(lighten(cmd.color, 0.6));
    ctx.beginPath();
    ctx.ellipse(cmd.sx, cmd.sy, rx * 0.5, ry * 0.5, 0, 0, TAU);
    ctx.fill();
  }

  private noiseFor(id: string): NoiseFunction2D {
    let noise = this.explosionNoise.get(id);
    if (!noise) {
      noise = createNoise2D(alea(`explosion:${id}`));
      this.explosionNoise.set(id, noise);
    }
    return noise;
  }

  private drawGameOver(width: number, height: number): void {
    const ctx = this.surface;
    ctx.fillStyle = "#000";
    ctx.fillRect(0, 0, width, height);
    ctx.fillStyle = "#fff";
    ctx.font = "bold 48px sans-serif";
    ctx.textAlign = "center";
    ctx.textBaseline = "middle";
    ctx.fillText("GAME OVER", width / 2, height / 2);
  }
}

/** Built-in status artwork: translucent ellipses pulsing with the render tick. */
function paintStatusEffect<TImage>(
  ctx: DrawSurface<TImage>,
  effect: StatusEffect,
  cx: number,
  cy: number,
  tick: number,
  strength: number,
): void {
  switch (effect) {
    case "shieldBubble":
      ctx.globalAlpha = 0.7 + 0.3 * Math.sin(tick * 0.1);
      ctx.fillStyle = "rgba(77, 153, 255, 0.15)";
      ctx.strokeStyle = "rgba(102, 179, 255, 0.5)";
      ctx.lineWidth = 1.5;
      ctx.beginPath();
      ctx.ellipse(cx, cy, 22, 18, 0, 0, TAU);
      ctx.fill();
      ctx.stroke();
      break;
    case "gemGlow":
      ctx.globalAlpha = 0.7 + 0.3 * Math.sin(tick * 0.08);
      ctx.fillStyle = "rgba(0, 230, 204, 0.25)";
      ctx.beginPath();
      ctx.ellipse(cx, cy, 18, 14, 0, 0, TAU);
      ctx.fill();
      break;
    case "chargeAura": {
      // yellow toward orange as charge builds
      const r = 12 + strength * 8;
      ctx.globalAlpha = strength * (0.8 + 0.2 * Math.sin(tick * 0.15));
      ctx.fillStyle = `rgba(255, ${Math.round(204 * (1 - strength * 0.5))}, 51, 0.3)`;
      ctx.beginPath();
      ctx.ellipse(cx, cy, r, r * 0.7, 0, 0, TAU);
      ctx.fill();
      break;
    }
    case "phaseShimmer":
      ctx.globalAlpha = 0.5 + 0.5 * Math.sin(tick * 0.12);
      ctx.fillStyle = "rgba(128, 77, 204, 0.25)";
      ctx.beginPath();
      ctx.ellipse(cx, cy, 16, 14, 0, 0, TAU);
      ctx.fill();
      break;
    case "frozen":
      ctx.fillStyle = "rgba(153, 217, 255, 0.2)";
      ctx.beginPath();
      ctx.ellipse(cx, cy, 14, 12, 0, 0, TAU);
      ctx.fill();
      ctx.fillStyle = "rgba(179, 230, 255, 0.4)";
      for (let i = 0; i < 6; i++) {
        const a = (i * Math.PI) / 3 + tick * 0.01;
        const x = cx + 12 * Math.cos(a);
        const y = cy + 12 * Math.sin(a) * 0.6;
        ctx.fillRect(x - 1, y - 3, 2, 6);
      }
      break;
  }
}

/** Outline of an item icon centered on (cx, cy) with half-size r. */
function traceItemShape<TImage>(
  ctx: DrawSurface<TImage>,
  shape: ItemShape,
  cx: number,
  cy: number,
  r: number,
): void {
  switch (shape) {
    case "diamond":
      ctx.moveTo(cx, cy - r);
      ctx.lineTo(cx + r * 0.7, cy);
      ctx.lineTo(cx, cy + r);
      ctx.lineTo(cx - r * 0.7, cy);
      ctx.closePath();
      break;
    case "heart":
      ctx.moveTo(cx, cy + r * 0.8);
      ctx.lineTo(cx - r, cy - r * 0.2);
      ctx.arc(cx - r / 2, cy - r * 0.2, r / 2, Math.PI, 0);
      ctx.arc(cx + r / 2, cy - r * 0.2, r / 2, Math.PI, 0);
      ctx.closePath();
      break;
    case "star":
      for (let i = 0; i < 10; i++) {
        const a = -Math.PI / 2 + (i * Math.PI) / 5;
        const rr = i % 2 === 0 ? r : r * 0.45;
        const x = cx + Math.cos(a) * rr;
        const y = cy + Math.sin(a) * rr;
        if (i === 0) ctx.moveTo(x, y);
        else ctx.lineTo(x, y);
      }
      ctx.closePath();
      break;
    case "shield":
      ctx.moveTo(cx - r * 0.8, cy - r);
      ctx.lineTo(cx + r * 0.8, cy - r);
      ctx.lineTo(cx + r * 0.8, cy);
      ctx.lineTo(cx, cy + r);
      ctx.lineTo(cx - r * 0.8, cy);
      ctx.closePath();
      break;
    case "fence":
      ctx.moveTo(cx - r, cy - r * 0.5);
      ctx.lineTo(cx + r, cy - r * 0.5);
      ctx.lineTo(cx + r, cy + r * 0.5);
      ctx.lineTo(cx - r, cy + r * 0.5);
      ctx.closePath();
      break;
    case "coin":
      ctx.arc(cx, cy, r * 0.8, 0, TAU);
      break;
  }
}
