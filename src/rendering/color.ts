import type { ArgbColor } from "../world/types.js";

/** Packed 0xAARRGGBB to a CSS color string. */
export function argbToCss(color: ArgbColor, alphaScale = 1): string {
  const a = ((color >>> 24) & 0xff) / 255;
  const r = (color >>> 16) & 0xff;
  const g = (color >>> 8) & 0xff;
  const b = color & 0xff;
  const alpha = Math.max(0, Math.min(1, a * alphaScale));
  return `rgba(${r}, ${g}, ${b}, ${+alpha.toFixed(3)})`;
}

/** Mix a packed color toward white by `amount` (0-1), keeping its alpha. */
export function lighten(color: ArgbColor, amount: number): ArgbColor {
  const t = Math.max(0, Math.min(1, amount));
  const mix = (c: number) => Math.round(c + (255 - c) * t);
  const a = (color >>> 24) & 0xff;
  const r = mix((color >>> 16) & 0xff);
  const g = mix((color >>> 8) & 0xff);
  const b = mix(color & 0xff);
  return ((a << 24) | (r << 16) | (g << 8) | b) >>> 0;
}
