import { CULL_MARGIN_TILES } from "../config/constants.js";
import { type ScreenOffset, screenToWorld } from "./Projection.js";

/** Inclusive integer tile rectangle. Empty when maxX < minX or maxY < minY. */
export interface TileRange {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

/**
 * Tiles worth iterating for a viewport of `width` x `height` virtual pixels.
 *
 * The screen rectangle is a diamond in world space, so all four corners are
 * inverse-projected and boxed. The margin covers tall tile images whose base
 * is below the screen edge. Only tiles use this range; entities are drawn
 * wherever they are.
 */
export function computeVisibleTileRange(
  width: number,
  height: number,
  offset: ScreenOffset,
  worldWidth: number,
  worldHeight: number,
  margin = CULL_MARGIN_TILES,
): TileRange {
  const corners = [
    screenToWorld(0, 0, offset),
    screenToWorld(width, 0, offset),
    screenToWorld(0, height, offset),
    screenToWorld(width, height, offset),
  ];
  let minWx = Number.POSITIVE_INFINITY;
  let maxWx = Number.NEGATIVE_INFINITY;
  let minWy = Number.POSITIVE_INFINITY;
  let maxWy = Number.NEGATIVE_INFINITY;
  for (const c of corners) {
    minWx = Math.min(minWx, c.wx);
    maxWx = Math.max(maxWx, c.wx);
    minWy = Math.min(minWy, c.wy);
    maxWy = Math.max(maxWy, c.wy);
  }
  if (![minWx, maxWx, minWy, maxWy].every(Number.isFinite)) {
    return { minX: 0, maxX: -1, minY: 0, maxY: -1 };
  }
  return {
    minX: Math.max(0, Math.floor(minWx) - margin),
    maxX: Math.min(worldWidth - 1, Math.ceil(maxWx) + margin),
    minY: Math.max(0, Math.floor(minWy) - margin),
    maxY: Math.min(worldHeight - 1, Math.ceil(maxWy) + margin),
  };
}
