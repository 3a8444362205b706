import { REMOTE_MOVING_MS } from "../config/constants.js";

interface MotionEntry {
  x: number;
  y: number;
  movingUntil: number;
}

/**
 * Remote players carry no "moving" flag, so a player counts as walking for a
 * short while after its authoritative position last changed.
 */
export class RemoteMotion {
  private readonly entries = new Map<string, MotionEntry>();

  constructor(private readonly holdMs = REMOTE_MOVING_MS) {}

  /** Record the player's position at `now`; returns whether it is walking. */
  observe(id: string, x: number, y: number, now: number): boolean {
    const prev = this.entries.get(id);
    if (!prev || prev.x !== x || prev.y !== y) {
      this.entries.set(id, { x, y, movingUntil: now + this.holdMs });
      return true;
    }
    return now < prev.movingUntil;
  }

  retain(isPresent: (id: string) => boolean): void {
    for (const id of [...this.entries.keys()]) {
      if (!isPresent(id)) this.entries.delete(id);
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
