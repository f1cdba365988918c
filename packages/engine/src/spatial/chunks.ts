import { EngineError } from "../errors.js";
import { createLog } from "../log.js";
import { assertRect, rectsOverlap, type Rect } from "./geometry.js";
import type { Hitbox, HitboxRole } from "./hitbox.js";

/** Inclusive chunk coordinates covered by a rectangle. */
export type ChunkRange = {
  readonly x1: number;
  readonly y1: number;
  readonly x2: number;
  readonly y2: number;
};

export type LayerRange = { min?: number; max?: number };

export type ChunkIndexStats = {
  cellWrites: number;
  cellRemovals: number;
};

class Chunk {
  readonly locators = new Map<number, Set<Hitbox>>();
  readonly overlaps = new Set<Hitbox>();
  readonly solids = new Set<Hitbox>();

  constructor(
    readonly cx: number,
    readonly cy: number,
  ) {}

  locatorsAt(drawLayer: number): Set<Hitbox> {
    const existing = this.locators.get(drawLayer);
    if (existing) return existing;
    const bucket = new Set<Hitbox>();
    this.locators.set(drawLayer, bucket);
    return bucket;
  }

  has(hitbox: Hitbox, role: HitboxRole): boolean {
    switch (role) {
      case "locator":
        return this.locators.get(hitbox.drawLayer)?.has(hitbox) ?? false;
      case "overlap":
        return this.overlaps.has(hitbox);
      case "solid":
        return this.solids.has(hitbox);
    }
  }
}

function sameRange(a: ChunkRange, b: ChunkRange): boolean {
  return a.x1 === b.x1 && a.y1 === b.y1 && a.x2 === b.x2 && a.y2 === b.y2;
}

function inRange(r: ChunkRange, cx: number, cy: number): boolean {
  return cx >= r.x1 && cx <= r.x2 && cy >= r.y1 && cy <= r.y2;
}

function byId(a: Hitbox, b: Hitbox): number {
  return a.id - b.id;
}

const log = createLog("chunks");

/**
 * Uniform grid of chunks. Each hitbox is filed, for each of its active
 * roles, in every chunk its bounding rectangle covers. Chunks are created on
 * first use and kept.
 */
export class ChunkIndex {
  private width: number;
  private height: number;
  private readonly chunks = new Map<string, Chunk>();
  private readonly filed = new Set<Hitbox>();
  readonly stats: ChunkIndexStats = { cellWrites: 0, cellRemovals: 0 };

  constructor(chunkWidth: number, chunkHeight: number) {
    ChunkIndex.assertDimensions(chunkWidth, chunkHeight);
    this.width = chunkWidth;
    this.height = chunkHeight;
  }

  private static assertDimensions(chunkWidth: number, chunkHeight: number): void {
    if (!Number.isFinite(chunkWidth) || chunkWidth <= 0) {
      throw new EngineError("INVALID_CHUNK_SIZE", `Chunk width must be positive, got ${chunkWidth}`);
    }
    if (!Number.isFinite(chunkHeight) || chunkHeight <= 0) {
      throw new EngineError("INVALID_CHUNK_SIZE", `Chunk height must be positive, got ${chunkHeight}`);
    }
  }

  get chunkWidth(): number {
    return this.width;
  }

  get chunkHeight(): number {
    return this.height;
  }

  get chunkCount(): number {
    return this.chunks.size;
  }

  /** Hitboxes with at least one role filed. */
  get size(): number {
    return this.filed.size;
  }

  /**
   * Chunks covering `r`. The lower bound uses ceil(x / w) - 1, so a rectangle
   * edge lying exactly on a chunk boundary also lands in the chunk below it.
   */
  rangeFor(r: Readonly<Rect>): ChunkRange {
    return {
      x1: Math.ceil(r.left / this.width) - 1,
      y1: Math.ceil(r.top / this.height) - 1,
      x2: Math.floor(r.right / this.width),
      y2: Math.floor(r.bottom / this.height),
    };
  }

  /**
   * Start indexing `hitbox`, filing every role it already has.
   */
  attach(hitbox: Hitbox): void {
    if (hitbox.index !== null) {
      throw new EngineError("ALREADY_ATTACHED", `Hitbox ${hitbox.id} is already indexed`);
    }
    hitbox.index = this;
    for (const role of hitbox.activeRoles()) this.register(hitbox, role);
  }

  detach(hitbox: Hitbox): boolean {
    if (hitbox.index !== this) return false;
    for (const role of hitbox.activeRoles()) this.unregister(hitbox, role);
    hitbox.index = null;
    return true;
  }

  register(hitbox: Hitbox, role: HitboxRole): void {
    this.assertOwned(hitbox);
    let range = hitbox.chunkRange;
    if (hitbox.roleCount === 0 || range === null) {
      range = this.rangeFor(hitbox.bounds);
      hitbox.chunkRange = range;
      this.filed.add(hitbox);
    }
    hitbox.roleCount++;
    this.forEachChunk(range, (chunk) => this.file(chunk, hitbox, role));
  }

  unregister(hitbox: Hitbox, role: HitboxRole): void {
    this.assertOwned(hitbox);
    const range = hitbox.chunkRange;
    if (range === null) {
      throw new EngineError("NOT_REGISTERED", `Hitbox ${hitbox.id} has no filed roles`);
    }
    this.forEachExisting(range, (chunk) => this.unfile(chunk, hitbox, role));
    hitbox.roleCount--;
    if (hitbox.roleCount === 0) {
      hitbox.chunkRange = null;
      this.filed.delete(hitbox);
    }
  }

  /**
   * Re-file a hitbox after its bounds changed. Only chunks that enter or
   * leave its range are touched.
   */
  onMoved(hitbox: Hitbox): void {
    const previous = hitbox.chunkRange;
    if (previous === null) return;
    const next = this.rangeFor(hitbox.bounds);
    if (sameRange(previous, next)) return;
    hitbox.chunkRange = next;
    const roles = hitbox.activeRoles();

    this.forEachExisting(previous, (chunk) => {
      if (inRange(next, chunk.cx, chunk.cy)) return;
      for (const role of roles) this.unfile(chunk, hitbox, role);
    });
    for (let cy = next.y1; cy <= next.y2; cy++) {
      for (let cx = next.x1; cx <= next.x2; cx++) {
        if (inRange(previous, cx, cy)) continue;
        const chunk = this.chunkAt(cx, cy);
        for (const role of roles) this.file(chunk, hitbox, role);
      }
    }
  }

  /** Move a locator hitbox between draw-layer buckets of the chunks it covers. */
  changeDrawLayer(hitbox: Hitbox, drawLayer: number): void {
    this.assertOwned(hitbox);
    const range = hitbox.chunkRange;
    if (range === null || !hitbox.hasRole("locator")) return;
    const from = hitbox.drawLayer;
    this.forEachChunk(range, (chunk) => {
      if (chunk.locators.get(from)?.delete(hitbox)) this.stats.cellRemovals++;
      const bucket = chunk.locatorsAt(drawLayer);
      if (!bucket.has(hitbox)) {
        bucket.add(hitbox);
        this.stats.cellWrites++;
      }
    });
  }

  /**
   * Hitboxes with `role` whose bounds intersect `region`, each once, by id.
   */
  query(role: HitboxRole, region: Rect): Hitbox[] {
    assertRect(region, "query region");
    const found = new Set<Hitbox>();
    this.forEachExisting(this.rangeFor(region), (chunk) => {
      if (role === "locator") {
        for (const bucket of chunk.locators.values()) {
          for (const hitbox of bucket) found.add(hitbox);
        }
        return;
      }
      for (const hitbox of role === "overlap" ? chunk.overlaps : chunk.solids) found.add(hitbox);
    });
    return [...found].filter((hitbox) => rectsOverlap(hitbox.bounds, region)).sort(byId);
  }

  /**
   * Locator hitboxes intersecting `region` within `layers`, in ascending
   * draw-layer order (ties by id).
   */
  forEachVisible(region: Rect, layers: LayerRange = {}): Hitbox[] {
    assertRect(region, "visible region");
    const min = layers.min ?? -Infinity;
    const max = layers.max ?? Infinity;
    const found = new Set<Hitbox>();
    this.forEachExisting(this.rangeFor(region), (chunk) => {
      for (const [drawLayer, bucket] of chunk.locators) {
        if (drawLayer < min || drawLayer > max) continue;
        for (const hitbox of bucket) found.add(hitbox);
      }
    });
    return [...found]
      .filter((hitbox) => rectsOverlap(hitbox.bounds, region))
      .sort((a, b) => a.drawLayer - b.drawLayer || a.id - b.id);
  }

  /**
   * Change chunk dimensions. Every chunk is dropped and each indexed hitbox
   * is filed again under the new grid.
   */
  resize(chunkWidth: number, chunkHeight: number): void {
    ChunkIndex.assertDimensions(chunkWidth, chunkHeight);
    if (chunkWidth === this.width && chunkHeight === this.height) return;
    this.width = chunkWidth;
    this.height = chunkHeight;
    this.chunks.clear();
    for (const hitbox of this.filed) {
      const range = this.rangeFor(hitbox.bounds);
      hitbox.chunkRange = range;
      const roles = hitbox.activeRoles();
      this.forEachChunk(range, (chunk) => {
        for (const role of roles) this.file(chunk, hitbox, role);
      });
    }
    log.info(`Resized chunks to ${chunkWidth}x${chunkHeight}`, { hitboxes: this.filed.size });
  }

  /**
   * Coordinates of every chunk holding `hitbox` under `role`, sorted by x
   * then y. Scans all chunks; meant for diagnostics and tests.
   */
  chunksContaining(hitbox: Hitbox, role: HitboxRole): Array<[number, number]> {
    const cells: Array<[number, number]> = [];
    for (const chunk of this.chunks.values()) {
      if (chunk.has(hitbox, role)) cells.push([chunk.cx, chunk.cy]);
    }
    return cells.sort((a, b) => a[0] - b[0] || a[1] - b[1]);
  }

  private assertOwned(hitbox: Hitbox): void {
    if (hitbox.index !== this) {
      throw new EngineError("NOT_REGISTERED", `Hitbox ${hitbox.id} is not attached to this index`);
    }
  }

  private file(chunk: Chunk, hitbox: Hitbox, role: HitboxRole): void {
    const set = role === "locator" ? chunk.locatorsAt(hitbox.drawLayer) : role === "overlap" ? chunk.overlaps : chunk.solids;
    if (set.has(hitbox)) return;
    set.add(hitbox);
    this.stats.cellWrites++;
  }

  private unfile(chunk: Chunk, hitbox: Hitbox, role: HitboxRole): void {
    const set =
      role === "locator" ? chunk.locators.get(hitbox.drawLayer) : role === "overlap" ? chunk.overlaps : chunk.solids;
    if (set?.delete(hitbox)) this.stats.cellRemovals++;
  }

  private forEachChunk(range: ChunkRange, fn: (chunk: Chunk) => void): void {
    for (let cy = range.y1; cy <= range.y2; cy++) {
      for (let cx = range.x1; cx <= range.x2; cx++) {
        fn(this.chunkAt(cx, cy));
      }
    }
  }

  private forEachExisting(range: ChunkRange, fn: (chunk: Chunk) => void): void {
    for (let cy = range.y1; cy <= range.y2; cy++) {
      for (let cx = range.x1; cx <= range.x2; cx++) {
        const chunk = this.chunks.get(this.keyForCell(cx, cy));
        if (chunk) fn(chunk);
      }
    }
  }

  private chunkAt(cx: number, cy: number): Chunk {
    const key = this.keyForCell(cx, cy);
    const existing = this.chunks.get(key);
    if (existing) return existing;
    const chunk = new Chunk(cx, cy);
    this.chunks.set(key, chunk);
    return chunk;
  }

  private keyForCell(cx: number, cy: number): string {
    return `${cx},${cy}`;
  }
}
