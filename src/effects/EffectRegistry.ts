/** Anything with a start time can live in an EffectRegistry. */
export interface TransientEvent {
  /** Wall-clock ms at which the effect started. */
  readonly startTime: number;
}

export interface LiveEffect<E extends TransientEvent> {
  readonly id: string;
  readonly event: Readonly<E>;
  readonly elapsed: number;
  /** elapsed / duration, in [0, 1]. */
  readonly progress: number;
}

/**
 * Time-keyed store of short-lived visual events of one kind.
 *
 * Producers (network handlers) only register; the render loop is the only
 * one that removes, and only once an event is older than the duration.
 * Events are frozen on registration. Registering an existing id replaces it.
 */
export class EffectRegistry<E extends TransientEvent> {
  private readonly entries = new Map<string, Readonly<E>>();

  constructor(
    readonly kind: string,
    readonly durationMs: number,
  ) {}

  register(id: string, event: E): void {
    this.entries.set(id, Object.freeze({ ...event }));
  }

  get(id: string): Readonly<E> | undefined {
    return this.entries.get(id);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Copy of the current entries. Registrations that happen while the caller
   * walks the copy land in the next frame's snapshot.
   */
  snapshot(): Array<[string, Readonly<E>]> {
    return [...this.entries];
  }

  /**
   * Evict expired events and return the ones to draw at `now`.
   * Events stamped in the future (clock skew) are kept but not drawn.
   */
  collect(now: number): LiveEffect<E>[] {
    const live: LiveEffect<E>[] = [];
    for (const [id, event] of this.snapshot()) {
      const elapsed = now - event.startTime;
      if (elapsed > this.durationMs) {
        // A producer may have re-registered the id since the snapshot.
        if (this.entries.get(id) === event) this.entries.delete(id);
        continue;
      }
      if (elapsed < 0) continue;
      live.push({ id, event, elapsed, progress: elapsed / this.durationMs });
    }
    return live;
  }

  clear(): void {
    this.entries.clear();
  }
}
