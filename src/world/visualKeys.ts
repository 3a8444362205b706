import { PROJECTILE_BEAM_TILES } from "../config/constants.js";
import { renderWarnOnce } from "../core/renderLog.js";

export type ItemShape = "diamond" | "heart" | "star" | "shield" | "fence" | "coin";

export type ProjectileStyle =
  | { kind: "beam"; lengthTiles: number }
  | { kind: "particle"; effect: string };

const ITEM_SHAPES = new Map<string, ItemShape>([
  ["gem", "diamond"],
  ["heart", "heart"],
  ["star", "star"],
  ["shield", "shield"],
  ["fence", "fence"],
  ["coin", "coin"],
]);

const DEFAULT_ITEM_SHAPE: ItemShape = "diamond";

const BEAM_PROJECTILES = new Map<string, number>([
  ["normal", PROJECTILE_BEAM_TILES],
  ["ice_beam", PROJECTILE_BEAM_TILES],
  ["bullet", 1.5],
]);

/** Projectiles whose artwork comes from the particle-effect provider. */
const PARTICLE_PROJECTILES = new Set([
  "tentacle",
  "axe",
  "rope",
  "spear",
  "soul_bolt",
  "haunt",
  "arcane_bolt",
  "fireball",
  "splash",
  "tidal_wave",
  "geyser",
  "grenade",
  "rocket",
  "talon",
  "gust",
  "shuriken",
  "poison_dart",
]);

const DEFAULT_PROJECTILE_STYLE: ProjectileStyle = {
  kind: "beam",
  lengthTiles: PROJECTILE_BEAM_TILES,
};

export const BACKGROUNDS = ["sky", "cityscape", "space", "desert", "ocean"] as const;
export type BackgroundKind = (typeof BACKGROUNDS)[number];
const DEFAULT_BACKGROUND: BackgroundKind = "sky";

function isBackgroundKind(key: string): key is BackgroundKind {
  return (BACKGROUNDS as readonly string[]).includes(key);
}

export function lookupItemShape(kind: string): ItemShape {
  const shape = ITEM_SHAPES.get(kind);
  if (shape) return shape;
  renderWarnOnce(`item:${kind}`, `unknown item kind "${kind}", drawing as ${DEFAULT_ITEM_SHAPE}`);
  return DEFAULT_ITEM_SHAPE;
}

export function lookupProjectileStyle(kind: string): ProjectileStyle {
  const length = BEAM_PROJECTILES.get(kind);
  if (length !== undefined) return { kind: "beam", lengthTiles: length };
  if (PARTICLE_PROJECTILES.has(kind)) return { kind: "particle", effect: kind };
  renderWarnOnce(`projectile:${kind}`, `unknown projectile kind "${kind}", drawing as beam`);
  return DEFAULT_PROJECTILE_STYLE;
}

export function lookupBackground(key: string): BackgroundKind {
  if (isBackgroundKind(key)) return key;
  renderWarnOnce(`background:${key}`, `unknown background "${key}", using ${DEFAULT_BACKGROUND}`);
  return DEFAULT_BACKGROUND;
}
