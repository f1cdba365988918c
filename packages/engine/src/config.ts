/**
 * Engine configuration.
 *
 * Tuning constants live in ENGINE_CONFIG; anything read from the
 * environment goes through ENGINE_ENV.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function optionalEnv(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

export function parseLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") {
    return v;
  }
  return null;
}

export const ENGINE_CONFIG = {
  // Fixed-point time: one tick == 1 << fracBits units
  fracBits: 12,

  // Nominal frames per second; a delta of 1/tickRate is one nominal frame
  tickRate: 60,

  // Spatial index
  defaultChunkWidth: 256,
  defaultChunkHeight: 256,

  // Debug frame summary cadence
  summaryEveryFrames: 600,
} as const;

export const ENGINE_ENV = {
  logLevel: parseLevel(optionalEnv("TICKWEAVE_LOG_LEVEL", "warn")) ?? "warn",
} as const;

/**
 * Effective level for a log tag. `TICKWEAVE_LOG_STATE=debug` overrides the
 * global level for the `state` tag (and `state:<name>` variants).
 */
export function levelForTag(tag: string): LogLevel {
  const scope = tag.split(":")[0].toUpperCase().replace(/[^A-Z0-9]/g, "_");
  return parseLevel(process.env[`TICKWEAVE_LOG_${scope}`]) ?? ENGINE_ENV.logLevel;
}
