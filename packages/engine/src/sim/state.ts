import { ENGINE_CONFIG } from "../config.js";
import { EngineError } from "../errors.js";
import { createLog, type Log } from "../log.js";
import { Viewport, ViewportFrame, type PresentCallback, type SceneLayer, type ScreenHud } from "../render/viewport.js";
import { ChunkIndex } from "../spatial/chunks.js";
import { assertRect, type Rect } from "../spatial/geometry.js";
import type { SimObject } from "../spatial/object.js";
import { FRAC_UNIT, assertTimeFactor, frameScale } from "./frac.js";
import { NodeGroup } from "./group.js";
import type { SimNode } from "./node.js";

/**
 * A structural change (or a batch of priority changes) requested while a
 * pass was running, applied at the next flush of the state that queued it.
 */
export type PendingChange =
  | { kind: "node"; node: SimNode; to: NodeGroup | null }
  | { kind: "object"; object: SimObject; to: SimState | null }
  | { kind: "priority"; group: NodeGroup };

export type FrameReport = {
  frame: number;
  /** Tick passes run; the most ticks any top-level node had due. */
  passes: number;
  /** Top-level node ticks run across all passes. */
  ticks: number;
  /** Nodes that joined after the frame pass and were caught up. */
  caughtUp: number;
  /** Viewports rendered. */
  viewports: number;
};

export type SimStateOptions = {
  name?: string;
  chunkWidth?: number;
  chunkHeight?: number;
  /** Nominal frames per second used to convert frame deltas. */
  tickRate?: number;
  /** Fixed-point ticks per nominal frame for nodes that inherit. */
  timeFactor?: number;
  present?: PresentCallback | null;
};

function hasAncestorIn(node: SimNode, set: ReadonlySet<SimNode>): boolean {
  for (let p = node.parent; p !== null; p = p.parent) {
    if (set.has(p)) return true;
  }
  return false;
}

/**
 * Owns a node tree, a chunk index, the objects filed in it, render layers
 * and viewports, and drives them one frame at a time.
 *
 * Structural changes requested while the state is running a pass (or
 * flushing) are queued on this state and applied at the next flush, so no
 * hook ever sees a collection change under it.
 */
export class SimState {
  readonly name: string;
  readonly nodes: NodeGroup;
  readonly chunks: ChunkIndex;
  readonly tickRate: number;
  present: PresentCallback | null;

  private readonly log: Log;
  private readonly objects = new Set<SimObject>();
  private readonly pending: PendingChange[] = [];
  private readonly layers = new Map<number, SceneLayer>();
  private readonly viewports = new Map<number, Viewport>();
  private hud: ScreenHud | null = null;
  private readonly lateNodes = new Set<SimNode>();
  private ownTimeFactor: number;
  private isActive = false;
  private busy = 0;
  private framePhase = false;
  private frames = 0;

  constructor(options: SimStateOptions = {}) {
    this.name = options.name ?? "main";
    this.log = createLog(`state:${this.name}`);
    this.nodes = new NodeGroup({ kind: "state", state: this });
    this.chunks = new ChunkIndex(
      options.chunkWidth ?? ENGINE_CONFIG.defaultChunkWidth,
      options.chunkHeight ?? ENGINE_CONFIG.defaultChunkHeight,
    );
    const tickRate = options.tickRate ?? ENGINE_CONFIG.tickRate;
    if (!Number.isFinite(tickRate) || tickRate <= 0) {
      throw new EngineError("INVALID_TIME_FACTOR", `Tick rate must be positive, got ${tickRate}`);
    }
    this.tickRate = tickRate;
    const timeFactor = options.timeFactor ?? FRAC_UNIT;
    assertTimeFactor(timeFactor, false);
    this.ownTimeFactor = timeFactor;
    this.present = options.present ?? null;
  }

  get active(): boolean {
    return this.isActive;
  }

  /** True while a pass or a flush is running on this state. */
  get iterating(): boolean {
    return this.busy > 0;
  }

  get frameCount(): number {
    return this.frames;
  }

  get timeFactor(): number {
    return this.ownTimeFactor;
  }

  setTimeFactor(timeFactor: number): void {
    assertTimeFactor(timeFactor, false);
    this.ownTimeFactor = timeFactor;
  }

  /** Host lifecycle: the state starts receiving time. */
  activate(): void {
    if (this.isActive) return;
    this.isActive = true;
    this.log.info("Activated", { nodes: this.nodes.size, objects: this.objects.size });
  }

  /** Host lifecycle: time stops passing for everything in the state. */
  deactivate(): void {
    if (!this.isActive) return;
    this.isActive = false;
    this.log.info("Deactivated", { frames: this.frames });
  }

  // ---------------------------------------------------------------------------
  // Nodes
  // ---------------------------------------------------------------------------

  addNode(node: SimNode): boolean {
    return this.nodes.add(node);
  }

  removeNode(node: SimNode): boolean {
    return this.nodes.remove(node);
  }

  // ---------------------------------------------------------------------------
  // Objects
  // ---------------------------------------------------------------------------

  get objectCount(): number {
    return this.objects.size;
  }

  hasObject(object: SimObject): boolean {
    return object.state === this;
  }

  listObjects(): SimObject[] {
    return [...this.objects];
  }

  addObject(object: SimObject): boolean {
    if (object.nextState !== null) return false;
    object.nextState = this;
    const busy = this.busyFor(object.state);
    if (busy !== null) {
      busy.enqueue({ kind: "object", object, to: this });
    } else {
      SimState.moveObject(object, this);
    }
    return true;
  }

  removeObject(object: SimObject): boolean {
    if (object.nextState !== this) return false;
    object.nextState = null;
    const busy = this.busyFor(object.state);
    if (busy !== null) {
      busy.enqueue({ kind: "object", object, to: null });
    } else {
      SimState.moveObject(object, null);
    }
    return true;
  }

  private busyFor(current: SimState | null): SimState | null {
    if (this.iterating) return this;
    if (current?.iterating) return current;
    return null;
  }

  private static moveObject(object: SimObject, to: SimState | null): void {
    const from = object.state;
    if (from !== null) {
      from.objects.delete(object);
      object.leave();
    }
    if (to !== null) {
      to.objects.add(object);
      object.enter(to);
    }
  }

  /** Re-grid the chunk index; every filed hitbox is filed again. */
  setChunkDimensions(chunkWidth: number, chunkHeight: number): void {
    this.chunks.resize(chunkWidth, chunkHeight);
  }

  // ---------------------------------------------------------------------------
  // Deferred changes
  // ---------------------------------------------------------------------------

  get pendingCount(): number {
    return this.pending.length;
  }

  enqueue(change: PendingChange): void {
    this.pending.push(change);
  }

  /** Called by NodeGroup whenever a node becomes active in this state. */
  noteLinked(node: SimNode): void {
    if (this.framePhase) this.lateNodes.add(node);
  }

  /**
   * Apply queued structural changes, including any queued by hooks that run
   * while applying them. Does nothing while a pass is running.
   */
  applyPendingChanges(): number {
    if (this.busy > 0 || this.pending.length === 0) return 0;
    let applied = 0;
    this.busy++;
    try {
      for (let change = this.pending.shift(); change !== undefined; change = this.pending.shift()) {
        SimState.applyChange(change);
        applied++;
      }
    } finally {
      this.busy--;
    }
    return applied;
  }

  private static applyChange(change: PendingChange): void {
    if (change.kind === "object") {
      SimState.moveObject(change.object, change.to);
      return;
    }
    if (change.kind === "priority") {
      change.group.applyPriorityChanges();
      return;
    }
    const { node, to } = change;
    if (node.group !== null) node.group.unlink(node);
    if (to !== null) to.link(node);
  }

  private runPass(fn: () => void): void {
    this.busy++;
    try {
      fn();
    } finally {
      this.busy--;
    }
    this.applyPendingChanges();
  }

  // ---------------------------------------------------------------------------
  // Frame driver
  // ---------------------------------------------------------------------------

  /**
   * Advance one frame of `deltaSeconds`: accumulate time, run every due tick
   * pass, run the frame pass, catch up late joiners, then render.
   */
  advanceFrame(deltaSeconds: number): FrameReport {
    const scale = frameScale(deltaSeconds, this.tickRate);
    if (!this.isActive) {
      this.log.debug("Ignoring frame while inactive");
      return { frame: this.frames, passes: 0, ticks: 0, caughtUp: 0, viewports: 0 };
    }
    if (this.busy > 0) {
      throw new EngineError("REENTRANT_FRAME", `State ${this.name} cannot advance a frame from inside a pass`);
    }
    this.frames++;
    // Changes stranded by a hook that threw on an earlier frame.
    this.applyPendingChanges();

    const due = new Map<SimNode, number>();
    let passes = 0;
    for (const node of this.nodes.list()) {
      const ticks = node.advance(scale);
      if (ticks > 0) {
        due.set(node, ticks);
        passes = Math.max(passes, ticks);
      }
    }

    let ticks = 0;
    for (let pass = 0; pass < passes; pass++) {
      this.runPass(() =>
        this.nodes.forEach((node) => {
          const remaining = due.get(node) ?? 0;
          if (remaining === 0) return;
          due.set(node, remaining - 1);
          node.tick(this);
          ticks++;
        }),
      );
    }

    let caughtUp = 0;
    this.framePhase = true;
    try {
      this.runPass(() => this.nodes.forEach((node) => node.frame(this)));
      caughtUp = this.catchUpLateNodes();
    } finally {
      this.framePhase = false;
      this.lateNodes.clear();
    }

    const viewports = this.renderAll();

    if (this.frames % ENGINE_CONFIG.summaryEveryFrames === 0) {
      this.log.debug("Frame summary", {
        frame: this.frames,
        nodes: this.nodes.size,
        objects: this.objects.size,
        chunks: this.chunks.chunkCount,
        passes,
      });
    }

    return { frame: this.frames, passes, ticks, caughtUp, viewports };
  }

  /** Advance one nominal frame. */
  step(): FrameReport {
    return this.advanceFrame(1 / this.tickRate);
  }

  /**
   * Nodes that became active after the frame pass started missed their
   * `onFrame`; give it to them (and their subtrees) until none are left.
   */
  private catchUpLateNodes(): number {
    let count = 0;
    while (this.lateNodes.size > 0) {
      const late = new Set(this.lateNodes);
      this.lateNodes.clear();
      const roots = [...late].filter((node) => node.state === this && !hasAncestorIn(node, late));
      this.runPass(() => {
        for (const node of roots) node.frame(this);
      });
      count += roots.length;
    }
    return count;
  }

  // ---------------------------------------------------------------------------
  // Layers, viewports and rendering
  // ---------------------------------------------------------------------------

  getLayer(id: number): SceneLayer | undefined {
    return this.layers.get(id);
  }

  /**
   * Install a scene layer. Negative ids draw behind the indexed shapes,
   * positive ids in front; 0 is the shapes' own origin and cannot be used.
   */
  setLayer(id: number, layer: SceneLayer | null): boolean {
    if (!Number.isInteger(id) || id === 0) {
      throw new EngineError("INVALID_LAYER_ID", `Layer id must be a non-zero integer, got ${id}`);
    }
    if (layer === null) return this.removeLayer(id);
    this.layers.set(id, layer);
    return true;
  }

  removeLayer(id: number): boolean {
    return this.layers.delete(id);
  }

  clearLayers(): void {
    this.layers.clear();
  }

  getViewport(id: number): Viewport | undefined {
    return this.viewports.get(id);
  }

  setViewport(id: number, viewport: Viewport | null): boolean {
    if (!Number.isInteger(id)) {
      throw new EngineError("INVALID_VIEWPORT", `Viewport id must be an integer, got ${id}`);
    }
    if (viewport === null) return this.removeViewport(id);
    this.viewports.set(id, viewport);
    return true;
  }

  removeViewport(id: number): boolean {
    return this.viewports.delete(id);
  }

  clearViewports(): void {
    this.viewports.clear();
  }

  getHud(): ScreenHud | null {
    return this.hud;
  }

  setHud(hud: ScreenHud | null): void {
    this.hud = hud;
  }

  /** Render every viewport in ascending id order, then the state's HUD. */
  renderAll(): number {
    let rendered = 0;
    for (const id of [...this.viewports.keys()].sort((a, b) => a - b)) {
      if (this.render(id)) rendered++;
    }
    const hud = this.hud;
    if (hud !== null) this.runPass(() => hud.draw(this));
    return rendered;
  }

  /**
   * Render one viewport: background layers, the present callback, foreground
   * layers, then the viewport's HUD. `clip` overrides the camera's region.
   * Returns false for a missing or zero-area viewport.
   */
  render(viewportId: number, clip?: Rect): boolean {
    const viewport = this.viewports.get(viewportId);
    if (viewport === undefined || viewport.isEmpty) return false;
    if (clip !== undefined) assertRect(clip, "clip region");
    const frame = new ViewportFrame(viewportId, viewport.screen, clip ?? viewport.clipIn(this.chunks), this.chunks);
    const ordered = [...this.layers].sort(([a], [b]) => a - b);

    this.runPass(() => {
      if (frame.clip !== null) {
        for (const [id, layer] of ordered) if (id < 0) layer.draw(frame);
        this.present?.(frame);
        for (const [id, layer] of ordered) if (id > 0) layer.draw(frame);
      }
      viewport.hud?.draw(frame);
    });
    return true;
  }
}
