/**
 * Triangulator — polygon → triangle indices for the batched backend.
 *
 * Ear clipping comes from earcut. Degenerate input (fewer than three
 * distinct vertices, non-finite coordinates, zero area) is logged once per
 * element and skipped; nothing here throws into the render loop.
 */

import earcut from "earcut";
import type { Point } from "./layoutModel";
import { createLogger, warnOnce } from "../utils/logger";

const log = createLogger("Triangulator");

// ══════════════════════════════════════════════════════════════════════
// Types
// ══════════════════════════════════════════════════════════════════════

export interface Triangulation {
  /** Interleaved x, y. */
  vertices: number[];
  /** Three indices per triangle into `vertices / 2`. */
  indices: number[];
}

export interface TriangulatorStats {
  /** Polygons handed to earcut. */
  polygons: number;
  triangles: number;
  rejected: number;
}

const stats: TriangulatorStats = { polygons: 0, triangles: 0, rejected: 0 };

export function getTriangulatorStats(): TriangulatorStats {
  return { ...stats };
}

export function resetTriangulatorStats(): void {
  stats.polygons = 0;
  stats.triangles = 0;
  stats.rejected = 0;
}

export function emptyTriangulation(): Triangulation {
  return { vertices: [], indices: [] };
}

// ══════════════════════════════════════════════════════════════════════
// Polygons
// ══════════════════════════════════════════════════════════════════════

/** Drop a trailing vertex that repeats the first one. */
export function stripClosingVertex(points: Point[]): Point[] {
  if (points.length < 2) return points;
  const first = points[0];
  const last = points[points.length - 1];
  return first.x === last.x && first.y === last.y ? points.slice(0, -1) : points;
}

function reject(id: string | undefined, reason: string): null {
  stats.rejected++;
  if (id !== undefined) warnOnce(log, `tri:${id}`, `Skipping polygon ${id}: ${reason}`);
  else log.debug(`Skipping polygon: ${reason}`);
  return null;
}

/**
 * Triangulate one simple polygon. `id` keys the one-shot warning for
 * degenerate input.
 */
export function triangulatePolygon(points: Point[], id?: string): Triangulation | null {
  const ring = stripClosingVertex(points);
  if (ring.length < 3) return reject(id, `${ring.length} vertices`);

  const flat: number[] = [];
  for (const p of ring) {
    if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) return reject(id, "non-finite coordinate");
    flat.push(p.x, p.y);
  }

  stats.polygons++;
  const indices = earcut(flat);
  if (indices.length === 0) return reject(id, "zero area");

  stats.triangles += indices.length / 3;
  return { vertices: flat, indices };
}

/** Append `part` to `target`, offsetting its indices past the existing vertices. */
export function appendTriangulation(target: Triangulation, part: Triangulation): void {
  const offset = target.vertices.length / 2;
  for (const v of part.vertices) target.vertices.push(v);
  for (const i of part.indices) target.indices.push(i + offset);
}

/**
 * Triangulate several polygons into one vertex/index set. Rejected
 * polygons are skipped; the rest keep their order.
 */
export function triangulateMultiple(polygons: Point[][], id?: string): Triangulation {
  const out = emptyTriangulation();
  polygons.forEach((poly, i) => {
    const t = triangulatePolygon(poly, id !== undefined ? `${id}#${i}` : undefined);
    if (t) appendTriangulation(out, t);
  });
  return out;
}

// ══════════════════════════════════════════════════════════════════════
// Paths
// ══════════════════════════════════════════════════════════════════════

/**
 * Split a wire into one rectangle per segment. `extendEnds` pushes the first
 * and last segment out by half the width (square-end paths).
 */
export function pathToQuads(path: Point[], width: number, extendEnds = false): Point[][] {
  const hw = Math.abs(width) / 2;
  const quads: Point[][] = [];
  if (hw === 0) return quads;

  for (let i = 0; i < path.length - 1; i++) {
    let a = path[i];
    let b = path[i + 1];
    const dx = b.x - a.x;
    const dy = b.y - a.y;
    const len = Math.hypot(dx, dy);
    if (len === 0) continue;

    const ux = dx / len;
    const uy = dy / len;
    if (extendEnds && i === 0) a = { x: a.x - ux * hw, y: a.y - uy * hw };
    if (extendEnds && i === path.length - 2) b = { x: b.x + ux * hw, y: b.y + uy * hw };

    const nx = -uy * hw;
    const ny = ux * hw;
    quads.push([
      { x: a.x + nx, y: a.y + ny },
      { x: b.x + nx, y: b.y + ny },
      { x: b.x - nx, y: b.y - ny },
      { x: a.x - nx, y: a.y - ny },
    ]);
  }
  return quads;
}
