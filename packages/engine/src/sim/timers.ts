import { EngineError } from "../errors.js";

/**
 * Zero-argument callback activated when its timer runs out.
 */
export type TimedEvent = () => void;

/**
 * Per-node countdowns, keyed by the callback they activate.
 *
 * A stored value is the number of remaining sweeps: n > 0 means due on the
 * nth sweep from here, 0 means due now or already fired this tick. A fired
 * timer keeps reading 0 until the next sweep drops it. Absent means not
 * running.
 */
export class TimerRegistry {
  private readonly timers = new Map<TimedEvent, number>();
  private readonly fired = new Set<TimedEvent>();

  get size(): number {
    return this.timers.size;
  }

  get(handle: TimedEvent): number {
    return this.timers.get(handle) ?? -1;
  }

  set(handle: TimedEvent, value: number): void {
    if (typeof handle !== "function") {
      throw new EngineError("INVALID_TIMER_HANDLE", "Attempted to set a timer for a missing timed event");
    }
    if (!Number.isInteger(value)) {
      throw new EngineError("INVALID_TIMER_VALUE", `Timer value must be an integer, got ${value}`);
    }
    this.fired.delete(handle);
    if (value < 0) {
      this.timers.delete(handle);
    } else {
      this.timers.set(handle, value);
    }
  }

  clear(): void {
    this.timers.clear();
    this.fired.clear();
  }

  /**
   * One tick-processing pass: drop timers that fired on the previous tick,
   * decrement the rest, then fire the ones that ran out in the order they
   * were encountered. Nothing fires until the sweep is complete.
   */
  sweep(): number {
    if (this.timers.size === 0) return 0;
    const due: TimedEvent[] = [];
    for (const [handle, value] of this.timers) {
      if (value === 0 && this.fired.has(handle)) {
        this.timers.delete(handle);
        this.fired.delete(handle);
      } else if (value <= 1) {
        this.timers.set(handle, 0);
        this.fired.add(handle);
        due.push(handle);
      } else {
        this.timers.set(handle, value - 1);
      }
    }
    for (const event of due) event();
    return due.length;
  }

  /**
   * Fire timers that were set to 0 since the last sweep.
   */
  fireDue(): number {
    if (this.timers.size === this.fired.size) return 0;
    const due: TimedEvent[] = [];
    for (const [handle, value] of this.timers) {
      if (value === 0 && !this.fired.has(handle)) {
        this.fired.add(handle);
        due.push(handle);
      }
    }
    for (const event of due) event();
    return due.length;
  }
}
