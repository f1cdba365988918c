import test from "node:test";
import assert from "node:assert/strict";
import { isEngineError } from "../../errors.js";
import { ChunkIndex } from "../chunks.js";
import { rect, rectContains } from "../geometry.js";
import { Hitbox } from "../hitbox.js";

test("chunk dimensions must be positive", () => {
  for (const [w, h] of [
    [0, 256],
    [256, -1],
    [Number.NaN, 256],
  ]) {
    assert.throws(() => new ChunkIndex(w, h), (err) => isEngineError(err, "INVALID_CHUNK_SIZE"));
  }
});

test("a box touching the origin is filed in the four chunks around it", () => {
  const index = new ChunkIndex(256, 256);
  const box = Hitbox.rect(0, 0, 10, 10, { roles: ["solid"] });
  index.attach(box);

  assert.deepEqual(box.chunkRange, { x1: -1, y1: -1, x2: 0, y2: 0 });
  assert.deepEqual(index.chunksContaining(box, "solid"), [
    [-1, -1],
    [-1, 0],
    [0, -1],
    [0, 0],
  ]);
  assert.deepEqual(index.stats, { cellWrites: 4, cellRemovals: 0 });

  box.setBounds(300, 300, 310, 310);
  assert.deepEqual(index.chunksContaining(box, "solid"), [[1, 1]]);
  assert.deepEqual(index.stats, { cellWrites: 5, cellRemovals: 4 });
});

test("moving within the same chunk range touches no chunk", () => {
  const index = new ChunkIndex(256, 256);
  const box = Hitbox.rect(300, 300, 310, 310, { roles: ["solid", "overlap"] });
  index.attach(box);
  const before = { ...index.stats };
  const range = box.chunkRange;

  box.moveBy(5, 5);

  assert.deepEqual(index.stats, before);
  assert.equal(box.chunkRange, range);
  assert.deepEqual(box.bounds, rect(305, 305, 315, 315));
});

test("roles are filed and unfiled one at a time", () => {
  const index = new ChunkIndex(256, 256);
  const box = Hitbox.rect(10, 10, 20, 20, { roles: ["locator", "overlap"] });
  index.attach(box);
  assert.equal(box.roleCount, 2);
  assert.equal(index.size, 1);

  assert.equal(box.setRole("overlap", false), true);
  assert.equal(box.roleCount, 1);
  assert.deepEqual(index.query("overlap", rect(0, 0, 50, 50)), []);

  assert.equal(box.setRole("locator", false), true);
  assert.equal(box.setRole("locator", false), false);
  assert.equal(box.roleCount, 0);
  assert.equal(box.chunkRange, null);
  assert.equal(index.size, 0);

  assert.equal(box.setRole("solid", true), true);
  assert.deepEqual(index.query("solid", rect(0, 0, 50, 50)), [box]);
});

test("query returns exactly the hitboxes whose bounds intersect the region", () => {
  const index = new ChunkIndex(256, 256);
  const near = Hitbox.rect(100, 100, 150, 150, { roles: ["overlap"] });
  const far = Hitbox.rect(600, 600, 650, 650, { roles: ["overlap"] });
  const solidOnly = Hitbox.rect(100, 100, 150, 150, { roles: ["solid"] });
  for (const box of [far, solidOnly, near]) index.attach(box);

  const region = rect(90, 90, 160, 160);
  assert.deepEqual(index.query("overlap", region), [near]);
  assert.ok(rectContains(region, near.bounds));

  // Same chunk as `near`, but no intersection.
  assert.deepEqual(index.query("overlap", rect(200, 200, 250, 250)), []);
  // Shared edges count as intersecting.
  assert.deepEqual(index.query("overlap", rect(150, 150, 160, 160)), [near]);

  assert.deepEqual(index.query("overlap", rect(0, 0, 1000, 1000)), [near, far]);
});

test("a hitbox spanning many chunks is reported once", () => {
  const index = new ChunkIndex(100, 100);
  const wall = Hitbox.rect(0, 0, 1000, 1000, { roles: ["solid"] });
  index.attach(wall);

  assert.deepEqual(index.query("solid", rect(0, 0, 1000, 1000)), [wall]);
  assert.equal(index.chunksContaining(wall, "solid").length, 12 * 12);
});

test("polygons are indexed by their bounding rectangle", () => {
  const index = new ChunkIndex(256, 256);
  const tri = Hitbox.polygon(
    [
      { x: 0, y: 0 },
      { x: 300, y: 10 },
      { x: 10, y: 20 },
    ],
    { roles: ["solid"] },
  );
  index.attach(tri);

  assert.deepEqual(tri.bounds, rect(0, 0, 300, 20));
  assert.deepEqual(tri.chunkRange, { x1: -1, y1: -1, x2: 1, y2: 0 });
  assert.equal(index.chunksContaining(tri, "solid").length, 6);
});

test("changing draw layer moves a locator between buckets", () => {
  const index = new ChunkIndex(256, 256);
  const sprite = Hitbox.rect(10, 10, 20, 20, { roles: ["locator"], drawLayer: 2 });
  index.attach(sprite);
  const region = rect(0, 0, 30, 30);
  assert.deepEqual(index.forEachVisible(region, { min: 0 }), [sprite]);

  sprite.setDrawLayer(-3);

  assert.equal(sprite.drawLayer, -3);
  assert.deepEqual(index.forEachVisible(region, { min: 0 }), []);
  assert.deepEqual(index.forEachVisible(region, { max: -1 }), [sprite]);
  assert.deepEqual(index.chunksContaining(sprite, "locator"), [[0, 0]]);
  assert.deepEqual(index.stats, { cellWrites: 2, cellRemovals: 1 });
});

test("visible locators come back by draw layer, then id", () => {
  const index = new ChunkIndex(256, 256);
  const a = Hitbox.rect(0, 0, 5, 5, { roles: ["locator"], drawLayer: 1 });
  const b = Hitbox.rect(0, 0, 5, 5, { roles: ["locator"], drawLayer: -2 });
  const c = Hitbox.rect(0, 0, 5, 5, { roles: ["locator"], drawLayer: 0 });
  const d = Hitbox.rect(0, 0, 5, 5, { roles: ["locator"], drawLayer: 1 });
  for (const box of [d, c, b, a]) index.attach(box);

  assert.deepEqual(index.forEachVisible(rect(0, 0, 10, 10)), [b, c, a, d]);
  assert.deepEqual(index.query("locator", rect(0, 0, 10, 10)), [a, b, c, d]);
});

test("resizing re-files every hitbox under the new grid", () => {
  const index = new ChunkIndex(256, 256);
  const box = Hitbox.rect(300, 300, 310, 310, { roles: ["solid"] });
  index.attach(box);

  index.resize(100, 100);

  assert.equal(index.chunkWidth, 100);
  assert.deepEqual(box.chunkRange, { x1: 2, y1: 2, x2: 3, y2: 3 });
  assert.deepEqual(index.chunksContaining(box, "solid"), [
    [2, 2],
    [2, 3],
    [3, 2],
    [3, 3],
  ]);
  assert.deepEqual(index.query("solid", rect(305, 305, 306, 306)), [box]);
  assert.throws(() => index.resize(0, 10), (err) => isEngineError(err, "INVALID_CHUNK_SIZE"));
});

test("misuse of the index is reported", () => {
  const index = new ChunkIndex(256, 256);
  const other = new ChunkIndex(256, 256);
  const box = Hitbox.rect(0, 0, 1, 1);
  index.attach(box);

  assert.throws(() => index.attach(box), (err) => isEngineError(err, "ALREADY_ATTACHED"));
  assert.throws(() => index.unregister(box, "solid"), (err) => isEngineError(err, "NOT_REGISTERED"));
  assert.throws(() => other.register(box, "solid"), (err) => isEngineError(err, "NOT_REGISTERED"));
  assert.equal(other.detach(box), false);
  assert.equal(index.detach(box), true);
  assert.equal(box.index, null);
});

test("a hitbox keeps its own copy of the geometry it was given", () => {
  const index = new ChunkIndex(256, 256);
  const bounds = rect(0, 0, 10, 10);
  const box = new Hitbox({ kind: "rect", rect: bounds }, { roles: ["solid"] });
  index.attach(box);

  bounds.left = 300;
  bounds.right = 310;

  assert.deepEqual(box.bounds, rect(0, 0, 10, 10));
  assert.deepEqual(box.geometry, { kind: "rect", rect: rect(0, 0, 10, 10) });
  assert.deepEqual(index.query("solid", rect(0, 0, 5, 5)), [box]);
  assert.deepEqual(index.query("solid", rect(300, 0, 310, 10)), []);
});

test("invalid geometry is rejected", () => {
  assert.throws(() => Hitbox.rect(10, 0, 0, 10), (err) => isEngineError(err, "INVALID_GEOMETRY"));
  assert.throws(
    () =>
      Hitbox.polygon([
        { x: 0, y: 0 },
        { x: 1, y: 1 },
      ]),
    (err) => isEngineError(err, "INVALID_GEOMETRY"),
  );
  const index = new ChunkIndex(256, 256);
  assert.throws(() => index.query("solid", rect(0, 0, Number.NaN, 1)), (err) => isEngineError(err, "INVALID_GEOMETRY"));
});
