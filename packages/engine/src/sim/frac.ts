import { ENGINE_CONFIG } from "../config.js";
import { EngineError } from "../errors.js";

/**
 * Fixed-point time. Rates and leftovers are integers in units of
 * 1 / FRAC_UNIT of a tick, so tick counts never depend on float drift.
 */
export const FRAC_BITS = ENGINE_CONFIG.fracBits;
export const FRAC_UNIT = 1 << FRAC_BITS;

export function toFrac(x: number): number {
  return Math.round(x * FRAC_UNIT);
}

export function fromFrac(f: number): number {
  return f / FRAC_UNIT;
}

export function mulFrac(a: number, b: number): number {
  return Math.floor((a * b) / FRAC_UNIT);
}

/**
 * Fixed-point fraction of a nominal frame covered by `deltaSeconds`.
 * At the nominal delta (1 / tickRate) this is exactly FRAC_UNIT.
 */
export function frameScale(deltaSeconds: number, tickRate: number = ENGINE_CONFIG.tickRate): number {
  if (!Number.isFinite(deltaSeconds) || deltaSeconds < 0) {
    throw new EngineError("INVALID_FRAME_DELTA", `Frame delta must be a finite number >= 0, got ${deltaSeconds}`);
  }
  return Math.round(deltaSeconds * tickRate * FRAC_UNIT);
}

/**
 * Split accumulated time into whole ticks and the fractional remainder.
 */
export function splitTicks(leftover: number): { ticks: number; leftover: number } {
  if (leftover < FRAC_UNIT) return { ticks: 0, leftover };
  const ticks = Math.floor(leftover / FRAC_UNIT);
  return { ticks, leftover: leftover - ticks * FRAC_UNIT };
}

export function assertTimeFactor(value: number, allowInherit: boolean): void {
  if (!Number.isInteger(value) || (!allowInherit && value < 0)) {
    throw new EngineError(
      "INVALID_TIME_FACTOR",
      `Time factor must be an integer${allowInherit ? "" : " >= 0"} in fixed-point units, got ${value}`,
    );
  }
}
