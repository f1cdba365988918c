import type { SimState } from "../sim/state.js";
import type { Vec2 } from "./geometry.js";
import type { Hitbox } from "./hitbox.js";

let nextObjectId = 1;

/**
 * Something with a position that occupies space through its hitboxes.
 * While the object belongs to a state, its hitboxes are filed in that
 * state's chunk index.
 */
export class SimObject {
  readonly id: number;
  readonly name: string;
  private position: Vec2;
  private readonly hitboxes = new Set<Hitbox>();

  /** Container the object is active in. */
  state: SimState | null = null;
  /** Container the object will belong to once pending changes are applied. */
  nextState: SimState | null = null;

  constructor(options: { name?: string; x?: number; y?: number } = {}) {
    this.id = nextObjectId++;
    this.name = options.name ?? `object-${this.id}`;
    this.position = { x: options.x ?? 0, y: options.y ?? 0 };
  }

  get x(): number {
    return this.position.x;
  }

  get y(): number {
    return this.position.y;
  }

  listHitboxes(): Hitbox[] {
    return [...this.hitboxes];
  }

  addHitbox(hitbox: Hitbox): boolean {
    if (hitbox.object !== null) return false;
    hitbox.object = this;
    this.hitboxes.add(hitbox);
    this.state?.chunks.attach(hitbox);
    return true;
  }

  removeHitbox(hitbox: Hitbox): boolean {
    if (hitbox.object !== this) return false;
    hitbox.index?.detach(hitbox);
    this.hitboxes.delete(hitbox);
    hitbox.object = null;
    return true;
  }

  /** Translate the object and every hitbox it carries. */
  moveBy(dx: number, dy: number): void {
    this.position = { x: this.position.x + dx, y: this.position.y + dy };
    for (const hitbox of this.hitboxes) hitbox.moveBy(dx, dy);
  }

  moveTo(x: number, y: number): void {
    this.moveBy(x - this.position.x, y - this.position.y);
  }

  /** File every hitbox in `state`'s index. Called by the state. */
  enter(state: SimState): void {
    this.state = state;
    for (const hitbox of this.hitboxes) state.chunks.attach(hitbox);
  }

  /** Unfile every hitbox. Called by the state. */
  leave(): void {
    for (const hitbox of this.hitboxes) hitbox.index?.detach(hitbox);
    this.state = null;
  }
}
