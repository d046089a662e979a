/**
 * Axis-aligned bounding-box helpers.
 *
 * Aggregations return `null` for "no valid geometry" instead of an
 * `{Infinity, -Infinity}` box, so callers must pick their own fallback.
 */

import type { BBox, Point } from "../engines/layoutModel";

export function zeroBBox(): BBox {
  return { minX: 0, minY: 0, maxX: 0, maxY: 0 };
}

export function isFiniteBBox(b: BBox): boolean {
  return (
    Number.isFinite(b.minX) && Number.isFinite(b.minY) &&
    Number.isFinite(b.maxX) && Number.isFinite(b.maxY) &&
    b.minX <= b.maxX && b.minY <= b.maxY
  );
}

/** Bounding box of a point list; null when no point has finite coordinates. */
export function bboxOfPoints(points: Iterable<Point>): BBox | null {
  let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
  let seen = false;

  for (const p of points) {
    if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) continue;
    if (p.x < minX) minX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.x > maxX) maxX = p.x;
    if (p.y > maxY) maxY = p.y;
    seen = true;
  }

  return seen ? { minX, minY, maxX, maxY } : null;
}

/** Extend bbox to include another bbox */
export function extendBBox(a: BBox, b: BBox): BBox {
  return {
    minX: Math.min(a.minX, b.minX),
    minY: Math.min(a.minY, b.minY),
    maxX: Math.max(a.maxX, b.maxX),
    maxY: Math.max(a.maxY, b.maxY),
  };
}

/** Union of every defined, finite box; null when there is none. */
export function mergeBBoxes(boxes: Iterable<BBox | null | undefined>): BBox | null {
  let acc: BBox | null = null;
  for (const b of boxes) {
    if (!b || !isFiniteBBox(b)) continue;
    acc = acc ? extendBBox(acc, b) : { ...b };
  }
  return acc;
}

/** Check if two bboxes intersect (touching edges count). */
export function bboxIntersects(a: BBox, b: BBox): boolean {
  return a.minX <= b.maxX && a.maxX >= b.minX &&
         a.minY <= b.maxY && a.maxY >= b.minY;
}

/** Check if bbox contains point */
export function bboxContainsPoint(bbox: BBox, x: number, y: number): boolean {
  return x >= bbox.minX && x <= bbox.maxX && y >= bbox.minY && y <= bbox.maxY;
}

/** True when `outer` fully covers `inner`. */
export function bboxContains(outer: BBox, inner: BBox): boolean {
  return inner.minX >= outer.minX && inner.maxX <= outer.maxX &&
         inner.minY >= outer.minY && inner.maxY <= outer.maxY;
}

export function expandBBox(b: BBox, margin: number): BBox {
  return {
    minX: b.minX - margin,
    minY: b.minY - margin,
    maxX: b.maxX + margin,
    maxY: b.maxY + margin,
  };
}

/**
 * Scale a box about its center. Degenerate axes get a unit extent so the
 * result always has area.
 */
export function scaleBBox(b: BBox, factor: number): BBox {
  const cx = (b.minX + b.maxX) / 2;
  const cy = (b.minY + b.maxY) / 2;
  const hw = Math.max((b.maxX - b.minX) / 2, 0.5) * factor;
  const hh = Math.max((b.maxY - b.minY) / 2, 0.5) * factor;
  return { minX: cx - hw, minY: cy - hh, maxX: cx + hw, maxY: cy + hh };
}

export function bboxWidth(b: BBox): number {
  return b.maxX - b.minX;
}

export function bboxHeight(b: BBox): number {
  return b.maxY - b.minY;
}

export function bboxCenter(b: BBox): Point {
  return { x: (b.minX + b.maxX) / 2, y: (b.minY + b.maxY) / 2 };
}
