export type EngineErrorCode =
  // Programming errors: a broken invariant at the call site, never retried
  | "INVALID_CHUNK_SIZE"
  | "INVALID_TIMER_HANDLE"
  | "INVALID_TIMER_VALUE"
  | "INVALID_TIME_FACTOR"
  | "INVALID_PRIORITY"
  | "INVALID_FRAME_DELTA"
  | "INVALID_GEOMETRY"
  | "INVALID_LAYER_ID"
  | "INVALID_VIEWPORT"
  | "ALREADY_ATTACHED"
  | "ATTACH_CYCLE"
  | "NOT_REGISTERED"
  | "REENTRANT_FRAME"
  // Raised by collaborators (asset loaders, renderers) and passed to the host
  | "RESOURCE_UNAVAILABLE";

/**
 * Error class for every failure the engine reports.
 * The `code` property identifies the specific violation.
 */
export class EngineError extends Error {
  override name = "EngineError";
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A backing resource (image, sound, sprite sheet) could not be obtained.
 * Thrown by collaborators; the engine lets it through without touching
 * scheduler or index state.
 */
export class ResourceError extends EngineError {
  override name = "ResourceError";
  readonly resource: string;

  constructor(resource: string, detail?: string) {
    super("RESOURCE_UNAVAILABLE", `Resource unavailable: ${resource}${detail ? ` (${detail})` : ""}`);
    this.resource = resource;
  }
}

export function isEngineError(err: unknown, code?: EngineErrorCode): err is EngineError {
  if (!(err instanceof EngineError)) return false;
  return code === undefined || err.code === code;
}
