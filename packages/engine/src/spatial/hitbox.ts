import { assertGeometry, boundsOf, cloneGeometry, rect, translate, type Geometry, type Rect, type Vec2 } from "./geometry.js";
import type { ChunkIndex, ChunkRange } from "./chunks.js";
import type { SimObject } from "./object.js";

export type HitboxRole = "locator" | "overlap" | "solid";

export const ROLE_LOCATOR = 1 << 0;
export const ROLE_OVERLAP = 1 << 1;
export const ROLE_SOLID = 1 << 2;

export const HITBOX_ROLES: readonly HitboxRole[] = ["locator", "overlap", "solid"];

export function roleBit(role: HitboxRole): number {
  switch (role) {
    case "locator":
      return ROLE_LOCATOR;
    case "overlap":
      return ROLE_OVERLAP;
    case "solid":
      return ROLE_SOLID;
  }
}

export type HitboxOptions = {
  roles?: readonly HitboxRole[];
  drawLayer?: number;
};

let nextHitboxId = 1;

/**
 * Indexed geometry. Locator hitboxes are found by renderers, overlap
 * hitboxes by sensors and solid hitboxes by collision checks; one hitbox may
 * carry any combination of the three.
 */
export class Hitbox {
  readonly id: number;
  private shape: Geometry;
  private box: Rect;
  private roleBits = 0;
  private layer: number;

  /** Index the hitbox is filed in while its object belongs to a state. */
  index: ChunkIndex | null = null;
  /** Object carrying this hitbox, if any. */
  object: SimObject | null = null;
  /** Chunks covered while at least one role is filed. Maintained by ChunkIndex. */
  chunkRange: ChunkRange | null = null;
  /** Number of roles currently filed in the index. Maintained by ChunkIndex. */
  roleCount = 0;

  constructor(geometry: Geometry, options: HitboxOptions = {}) {
    assertGeometry(geometry);
    this.id = nextHitboxId++;
    this.shape = cloneGeometry(geometry);
    this.box = boundsOf(geometry);
    this.layer = options.drawLayer ?? 0;
    for (const role of options.roles ?? []) this.roleBits |= roleBit(role);
  }

  static rect(left: number, top: number, right: number, bottom: number, options?: HitboxOptions): Hitbox {
    return new Hitbox({ kind: "rect", rect: rect(left, top, right, bottom) }, options);
  }

  static polygon(points: readonly Vec2[], options?: HitboxOptions): Hitbox {
    return new Hitbox({ kind: "polygon", points }, options);
  }

  get geometry(): Geometry {
    return this.shape;
  }

  /** Bounding rectangle; change it through `setBounds`, `setGeometry` or `moveBy`. */
  get bounds(): Readonly<Rect> {
    return this.box;
  }

  get roles(): number {
    return this.roleBits;
  }

  get drawLayer(): number {
    return this.layer;
  }

  hasRole(role: HitboxRole): boolean {
    return (this.roleBits & roleBit(role)) !== 0;
  }

  activeRoles(): HitboxRole[] {
    return HITBOX_ROLES.filter((role) => this.hasRole(role));
  }

  setBounds(left: number, top: number, right: number, bottom: number): void {
    this.setGeometry({ kind: "rect", rect: rect(left, top, right, bottom) });
  }

  setPolygon(points: readonly Vec2[]): void {
    this.setGeometry({ kind: "polygon", points });
  }

  setGeometry(geometry: Geometry): void {
    assertGeometry(geometry);
    this.shape = cloneGeometry(geometry);
    this.box = boundsOf(geometry);
    this.index?.onMoved(this);
  }

  moveBy(dx: number, dy: number): void {
    if (dx === 0 && dy === 0) return;
    this.setGeometry(translate(this.shape, dx, dy));
  }

  /**
   * Turn a role on or off. Returns false when the role already had the
   * requested state.
   */
  setRole(role: HitboxRole, active: boolean): boolean {
    const bit = roleBit(role);
    if (((this.roleBits & bit) !== 0) === active) return false;
    if (active) {
      this.roleBits |= bit;
      this.index?.register(this, role);
    } else {
      this.index?.unregister(this, role);
      this.roleBits &= ~bit;
    }
    return true;
  }

  setDrawLayer(drawLayer: number): void {
    if (drawLayer === this.layer) return;
    if (this.index !== null && this.hasRole("locator")) {
      this.index.changeDrawLayer(this, drawLayer);
    }
    this.layer = drawLayer;
  }
}
