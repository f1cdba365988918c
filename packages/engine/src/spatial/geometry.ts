import { EngineError } from "../errors.js";

export type Vec2 = { x: number; y: number };

export type Rect = {
  left: number;
  top: number;
  right: number;
  bottom: number;
};

/**
 * Shape geometry. Polygons are indexed by their bounding rectangle.
 */
export type Geometry =
  | { readonly kind: "rect"; readonly rect: Readonly<Rect> }
  | { readonly kind: "polygon"; readonly points: readonly Readonly<Vec2>[] };

export function rect(left: number, top: number, right: number, bottom: number): Rect {
  return { left, top, right, bottom };
}

export function assertRect(r: Readonly<Rect>, what = "rectangle"): void {
  const finite =
    Number.isFinite(r.left) && Number.isFinite(r.top) && Number.isFinite(r.right) && Number.isFinite(r.bottom);
  if (!finite || r.right < r.left || r.bottom < r.top) {
    throw new EngineError(
      "INVALID_GEOMETRY",
      `Invalid ${what}: (${r.left}, ${r.top}) - (${r.right}, ${r.bottom})`,
    );
  }
}

export function assertGeometry(geometry: Geometry): void {
  if (geometry.kind === "rect") {
    assertRect(geometry.rect);
    return;
  }
  if (geometry.points.length < 3) {
    throw new EngineError("INVALID_GEOMETRY", `A polygon needs at least 3 points, got ${geometry.points.length}`);
  }
  for (const p of geometry.points) {
    if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) {
      throw new EngineError("INVALID_GEOMETRY", `Invalid polygon point (${p.x}, ${p.y})`);
    }
  }
}

export function cloneGeometry(geometry: Geometry): Geometry {
  if (geometry.kind === "rect") return { kind: "rect", rect: { ...geometry.rect } };
  return { kind: "polygon", points: geometry.points.map((p) => ({ x: p.x, y: p.y })) };
}

export function boundsOf(geometry: Geometry): Rect {
  if (geometry.kind === "rect") return { ...geometry.rect };
  let left = Infinity;
  let top = Infinity;
  let right = -Infinity;
  let bottom = -Infinity;
  for (const p of geometry.points) {
    if (p.x < left) left = p.x;
    if (p.x > right) right = p.x;
    if (p.y < top) top = p.y;
    if (p.y > bottom) bottom = p.y;
  }
  return { left, top, right, bottom };
}

export function translate(geometry: Geometry, dx: number, dy: number): Geometry {
  if (geometry.kind === "rect") {
    const r = geometry.rect;
    return { kind: "rect", rect: rect(r.left + dx, r.top + dy, r.right + dx, r.bottom + dy) };
  }
  return { kind: "polygon", points: geometry.points.map((p) => ({ x: p.x + dx, y: p.y + dy })) };
}

/** Closed-interval overlap: rectangles sharing an edge intersect. */
export function rectsOverlap(a: Readonly<Rect>, b: Readonly<Rect>): boolean {
  return a.left <= b.right && b.left <= a.right && a.top <= b.bottom && b.top <= a.bottom;
}

export function rectContains(outer: Readonly<Rect>, inner: Readonly<Rect>): boolean {
  return outer.left <= inner.left && outer.top <= inner.top && outer.right >= inner.right && outer.bottom >= inner.bottom;
}

export function rectAround(center: Vec2, width: number, height: number): Rect {
  return rect(center.x - width / 2, center.y - height / 2, center.x + width / 2, center.y + height / 2);
}
