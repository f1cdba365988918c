import { EngineError } from "../errors.js";
import { assertTimeFactor, splitTicks, mulFrac } from "./frac.js";
import { NodeGroup } from "./group.js";
import { TimerRegistry, type TimedEvent } from "./timers.js";
import type { SimState } from "./state.js";

/**
 * Per-node behaviour. Every hook is optional; a node without a behaviour
 * still keeps time and runs its timers and children.
 */
export interface NodeBehavior {
  /** Right after the node joins a group. `state` is null inside a detached tree. */
  onAdded?(node: SimNode, state: SimState | null): void;
  /** Right before the node leaves its group. */
  onRemoved?(node: SimNode, state: SimState | null): void;
  /** Once per tick, after the node's timers have been swept. */
  onTick?(node: SimNode, state: SimState): void;
  /** Once per frame, after every tick of the frame has run. */
  onFrame?(node: SimNode, state: SimState): void;
}

export type NodeOptions = {
  name?: string;
  priority?: number;
  /** Fixed-point ticks per nominal frame; negative inherits the state's factor. */
  timeFactor?: number;
  behavior?: NodeBehavior;
};

const NO_BEHAVIOR: NodeBehavior = {};

let nextNodeId = 1;

/**
 * A unit of simulation: keeps its own clock, timers and priority, and owns
 * an ordered group of child nodes that tick with it.
 */
export class SimNode {
  readonly id: number;
  readonly name: string;
  readonly children: NodeGroup;
  behavior: NodeBehavior;

  /** Group the node is currently linked into. Maintained by NodeGroup. */
  group: NodeGroup | null = null;
  /** Group the node will belong to once pending changes are applied. */
  nextGroup: NodeGroup | null = null;
  /** Owner of `group` when that group belongs to a node. */
  parent: SimNode | null = null;
  /** Container the node's tree is linked into, if any. */
  state: SimState | null = null;

  private currentPriority: number;
  private requestedPriority: number;
  private ownTimeFactor: number;
  private accumulated = 0;
  private readonly timers = new TimerRegistry();

  constructor(options: NodeOptions = {}) {
    this.id = nextNodeId++;
    this.name = options.name ?? `node-${this.id}`;
    this.behavior = options.behavior ?? NO_BEHAVIOR;
    this.children = new NodeGroup({ kind: "node", node: this });
    const priority = options.priority ?? 0;
    this.currentPriority = priority;
    this.requestedPriority = priority;
    const timeFactor = options.timeFactor ?? -1;
    assertTimeFactor(timeFactor, true);
    this.ownTimeFactor = timeFactor < 0 ? -1 : timeFactor;
  }

  /** Priority used for ordering right now. */
  get priority(): number {
    return this.currentPriority;
  }

  /** Priority the node is about to have once its group reaches a safe point. */
  get pendingPriority(): number {
    return this.requestedPriority;
  }

  setPriority(priority: number): void {
    if (!Number.isInteger(priority)) {
      throw new EngineError("INVALID_PRIORITY", `Priority must be an integer, got ${priority}`);
    }
    if (this.group === null) {
      this.requestedPriority = priority;
      this.currentPriority = priority;
    } else if (this.requestedPriority !== priority) {
      this.requestedPriority = priority;
      this.group.requestPriority(this);
    }
  }

  /**
   * Called by the owning group when a requested priority takes effect.
   */
  commitPriority(): void {
    this.currentPriority = this.requestedPriority;
  }

  get timeFactor(): number {
    return this.ownTimeFactor;
  }

  setTimeFactor(timeFactor: number): void {
    assertTimeFactor(timeFactor, true);
    this.ownTimeFactor = timeFactor < 0 ? -1 : timeFactor;
  }

  /**
   * Ticks per nominal frame this node actually experiences: the root
   * ancestor's factor, or the state's when the root inherits. Zero outside
   * a state.
   */
  get effectiveTimeFactor(): number {
    const state = this.state;
    if (state === null) return 0;
    let root: SimNode = this;
    while (root.parent !== null) root = root.parent;
    return root.ownTimeFactor < 0 ? state.timeFactor : root.ownTimeFactor;
  }

  /** Fractional tick progress carried into the next frame. */
  get leftover(): number {
    return this.accumulated;
  }

  /**
   * Remaining ticks before `event` fires; 0 when due or already fired this
   * tick, -1 when the timer is not running.
   */
  getTimer(event: TimedEvent): number {
    return this.timers.get(event);
  }

  setTimer(event: TimedEvent, ticks: number): void {
    this.timers.set(event, ticks);
  }

  /** Request removal from the node's logical group. */
  detach(): boolean {
    return this.nextGroup?.remove(this) ?? false;
  }

  /**
   * Add this frame's share of time and return how many ticks became due.
   */
  advance(scale: number): number {
    const split = splitTicks(this.accumulated + mulFrac(this.effectiveTimeFactor, scale));
    this.accumulated = split.leftover;
    return split.ticks;
  }

  tick(state: SimState): void {
    this.timers.sweep();
    this.behavior.onTick?.(this, state);
    this.timers.fireDue();
    this.children.forEach((child) => child.tick(state));
  }

  frame(state: SimState): void {
    this.behavior.onFrame?.(this, state);
    this.children.forEach((child) => child.frame(state));
  }

  /** Propagate the owning container through this subtree. */
  setState(state: SimState | null): void {
    this.state = state;
    this.children.forEach((child) => child.setState(state));
  }
}
