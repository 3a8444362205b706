import { ISO_HALF_H, ISO_HALF_W, TILE_CELL_HEIGHT } from "../config/constants.js";

export interface ScreenPoint {
  sx: number;
  sy: number;
}

export interface WorldPoint {
  wx: number;
  wy: number;
}

/** Screen-space translation applied after projection (the camera offset). */
export interface ScreenOffset {
  ox: number;
  oy: number;
}

export const ZERO_OFFSET: ScreenOffset = { ox: 0, oy: 0 };

/** World tile coordinates to the screen position of the tile diamond's center. */
export function worldToScreen(wx: number, wy: number, offset: ScreenOffset): ScreenPoint {
  return {
    sx: (wx - wy) * ISO_HALF_W + offset.ox,
    sy: (wx + wy) * ISO_HALF_H + offset.oy,
  };
}

/** Inverse of worldToScreen for the same offset. */
export function screenToWorld(sx: number, sy: number, offset: ScreenOffset): WorldPoint {
  const rx = (sx - offset.ox) / ISO_HALF_W;
  const ry = (sy - offset.oy) / ISO_HALF_H;
  return {
    wx: (rx + ry) / 2,
    wy: (ry - rx) / 2,
  };
}

/**
 * screenToWorld for real (zoomed) pixel coordinates, e.g. a pointer position.
 * The offset lives in virtual space, so pixels are unzoomed first.
 */
export function screenToWorldZoomed(
  sx: number,
  sy: number,
  offset: ScreenOffset,
  zoom: number,
): WorldPoint {
  return screenToWorld(sx / zoom, sy / zoom, offset);
}

/**
 * Top-left corner at which a tile image is drawn. The image is one cell tall;
 * its diamond occupies the bottom, raised geometry extends upward.
 */
export function tileDrawOrigin(tx: number, ty: number, offset: ScreenOffset): ScreenPoint {
  const center = worldToScreen(tx, ty, offset);
  return {
    sx: center.sx - ISO_HALF_W,
    sy: center.sy - (TILE_CELL_HEIGHT - ISO_HALF_H),
  };
}
