export { ENGINE_CONFIG, ENGINE_ENV, parseLevel, type LogLevel } from "./config.js";
export { createLog, type Log, type LogFn } from "./log.js";
export { EngineError, ResourceError, isEngineError, type EngineErrorCode } from "./errors.js";

export { FRAC_BITS, FRAC_UNIT, toFrac, fromFrac, mulFrac, frameScale, splitTicks } from "./sim/frac.js";
export { TimerRegistry, type TimedEvent } from "./sim/timers.js";
export { SimNode, type NodeBehavior, type NodeOptions } from "./sim/node.js";
export { NodeGroup, type GroupOwner } from "./sim/group.js";
export { SimState, type FrameReport, type PendingChange, type SimStateOptions } from "./sim/state.js";

export {
  rect,
  rectsOverlap,
  rectContains,
  rectAround,
  boundsOf,
  translate,
  type Geometry,
  type Rect,
  type Vec2,
} from "./spatial/geometry.js";
export {
  Hitbox,
  HITBOX_ROLES,
  ROLE_LOCATOR,
  ROLE_OVERLAP,
  ROLE_SOLID,
  type HitboxOptions,
  type HitboxRole,
} from "./spatial/hitbox.js";
export { ChunkIndex, type ChunkIndexStats, type ChunkRange, type LayerRange } from "./spatial/chunks.js";
export { SimObject } from "./spatial/object.js";

export {
  Viewport,
  ViewportFrame,
  type CameraTarget,
  type Hud,
  type PresentCallback,
  type SceneLayer,
  type ScreenHud,
  type ViewportOptions,
} from "./render/viewport.js";
