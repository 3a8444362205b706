import { VISUAL_LERP, VISUAL_SNAP_EPSILON } from "../config/constants.js";

export interface VisualPoint {
  readonly x: number;
  readonly y: number;
}

/**
 * Advance a smoothed position one frame toward its target.
 * First observation snaps; afterwards each axis closes `lerp` of the gap and
 * lands exactly on the target once within `epsilon`.
 */
export function stepVisual(
  prev: VisualPoint | undefined,
  targetX: number,
  targetY: number,
  lerp = VISUAL_LERP,
  epsilon = VISUAL_SNAP_EPSILON,
): VisualPoint {
  if (!prev || Number.isNaN(prev.x) || Number.isNaN(prev.y)) {
    return { x: targetX, y: targetY };
  }
  let x = prev.x + (targetX - prev.x) * lerp;
  let y = prev.y + (targetY - prev.y) * lerp;
  if (Math.abs(x - targetX) < epsilon) x = targetX;
  if (Math.abs(y - targetY) < epsilon) y = targetY;
  return { x, y };
}

/**
 * Render-only smoothed positions: one for the local player, one per remote
 * player. Owned by the render loop; only resetAll() clears it, which the host
 * calls on respawn and world change so nobody slides across the map.
 */
export class VisualPositions {
  private local: VisualPoint | undefined;
  private readonly remote = new Map<string, VisualPoint>();

  constructor(private lerp = VISUAL_LERP) {}

  setLerp(lerp: number): void {
    this.lerp = lerp;
  }

  get localPosition(): VisualPoint | undefined {
    return this.local;
  }

  remotePosition(id: string): VisualPoint | undefined {
    return this.remote.get(id);
  }

  updateLocal(targetX: number, targetY: number): VisualPoint {
    this.local = stepVisual(this.local, targetX, targetY, this.lerp);
    return this.local;
  }

  updateRemote(id: string, targetX: number, targetY: number): VisualPoint {
    const next = stepVisual(this.remote.get(id), targetX, targetY, this.lerp);
    this.remote.set(id, next);
    return next;
  }

  /** Drop remote entries whose player is gone. */
  retainRemote(isPresent: (id: string) => boolean): void {
    for (const id of [...this.remote.keys()]) {
      if (!isPresent(id)) this.remote.delete(id);
    }
  }

  resetAll(): void {
    this.local = undefined;
    this.remote.clear();
  }
}
