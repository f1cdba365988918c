import { EngineError } from "../errors.js";
import type { ChunkIndex, LayerRange } from "../spatial/chunks.js";
import { rectAround, type Rect, type Vec2 } from "../spatial/geometry.js";
import type { Hitbox } from "../spatial/hitbox.js";
import { SimObject } from "../spatial/object.js";
import type { SimState } from "../sim/state.js";

/**
 * Everything a renderer needs for one viewport on one frame.
 */
export class ViewportFrame {
  constructor(
    readonly viewportId: number,
    /** Screen rectangle the viewport occupies. */
    readonly screen: Readonly<Rect>,
    /** World region visible through the viewport; null when nothing is in view. */
    readonly clip: Rect | null,
    private readonly index: ChunkIndex,
  ) {}

  forEachVisible(layers?: LayerRange): Hitbox[] {
    if (this.clip === null) return [];
    return this.index.forEachVisible(this.clip, layers);
  }

  /** Visible locators on draw layers below 0. */
  background(): Hitbox[] {
    return this.forEachVisible({ max: -1 });
  }

  /** Visible locators on draw layer 0 and above. */
  foreground(): Hitbox[] {
    return this.forEachVisible({ min: 0 });
  }
}

export type PresentCallback = (frame: ViewportFrame) => void;

/**
 * Scenery drawn behind (negative ids) or in front of (positive ids) the
 * indexed shapes.
 */
export interface SceneLayer {
  draw(frame: ViewportFrame): void;
}

export interface Hud {
  draw(frame: ViewportFrame): void;
}

/** State-wide overlay, drawn over the whole screen after every viewport. */
export interface ScreenHud {
  draw(state: SimState): void;
}

/** What a viewport is centred on: a free point or an object's position. */
export type CameraTarget = SimObject | Vec2;

export type ViewportOptions = {
  camera?: CameraTarget | null;
  hud?: Hud | null;
};

/**
 * A window onto the world: a screen rectangle plus the camera that decides
 * which world region shows through it.
 */
export class Viewport {
  private rect: Rect;
  camera: CameraTarget | null;
  hud: Hud | null;

  constructor(screen: Readonly<Rect>, options: ViewportOptions = {}) {
    Viewport.assertScreen(screen);
    this.rect = { ...screen };
    this.camera = options.camera ?? null;
    this.hud = options.hud ?? null;
  }

  private static assertScreen(screen: Readonly<Rect>): void {
    const edges = [screen.left, screen.top, screen.right, screen.bottom];
    if (!edges.every(Number.isFinite) || screen.right < screen.left || screen.bottom < screen.top) {
      throw new EngineError("INVALID_VIEWPORT", `Invalid viewport screen: ${edges.join(", ")}`);
    }
  }

  get screen(): Readonly<Rect> {
    return this.rect;
  }

  setScreen(screen: Readonly<Rect>): void {
    Viewport.assertScreen(screen);
    this.rect = { ...screen };
  }

  get width(): number {
    return this.rect.right - this.rect.left;
  }

  get height(): number {
    return this.rect.bottom - this.rect.top;
  }

  get isEmpty(): boolean {
    return this.width === 0 || this.height === 0;
  }

  /**
   * World region centred on the camera, sized like the screen rectangle.
   * Null without a camera, or when the camera object lives in another state.
   */
  clipIn(index: ChunkIndex): Rect | null {
    const camera = this.camera;
    if (camera === null) return null;
    if (camera instanceof SimObject && camera.state?.chunks !== index) return null;
    return rectAround({ x: camera.x, y: camera.y }, this.width, this.height);
  }
}
