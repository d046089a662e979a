/**
 * 2D affine transforms for placement composition.
 *
 *   x' = a·x + c·y + e
 *   y' = b·x + d·y + f
 */

import type { Point, Transformation } from "../engines/layoutModel";

export interface Matrix2D {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
}

export const IDENTITY: Readonly<Matrix2D> = Object.freeze({ a: 1, b: 0, c: 0, d: 1, e: 0, f: 0 });

export function identityMatrix(): Matrix2D {
  return { ...IDENTITY };
}

export function isIdentity(m: Matrix2D): boolean {
  return m.a === 1 && m.b === 0 && m.c === 0 && m.d === 1 && m.e === 0 && m.f === 0;
}

/** `outer ∘ inner`: the result applies `inner` first, then `outer`. */
export function composeMatrices(outer: Matrix2D, inner: Matrix2D): Matrix2D {
  return {
    a: outer.a * inner.a + outer.c * inner.b,
    b: outer.b * inner.a + outer.d * inner.b,
    c: outer.a * inner.c + outer.c * inner.d,
    d: outer.b * inner.c + outer.d * inner.d,
    e: outer.a * inner.e + outer.c * inner.f + outer.e,
    f: outer.b * inner.e + outer.d * inner.f + outer.f,
  };
}

export function applyMatrix(m: Matrix2D, p: Point): Point {
  return {
    x: m.a * p.x + m.c * p.y + m.e,
    y: m.b * p.x + m.d * p.y + m.f,
  };
}

export function transformPoints(m: Matrix2D, points: Point[]): Point[] {
  return points.map((p) => applyMatrix(m, p));
}

export function determinant(m: Matrix2D): number {
  return m.a * m.d - m.b * m.c;
}

/** Uniform scale factor of the linear part (path widths, text heights). */
export function linearScale(m: Matrix2D): number {
  return Math.sqrt(Math.abs(determinant(m)));
}

/** cos/sin with exact values on quarter turns, so 90° placements land on integers. */
function trig(angleDeg: number): { cos: number; sin: number } {
  const norm = ((angleDeg % 360) + 360) % 360;
  switch (norm) {
    case 0: return { cos: 1, sin: 0 };
    case 90: return { cos: 0, sin: 1 };
    case 180: return { cos: -1, sin: 0 };
    case 270: return { cos: 0, sin: -1 };
    default: {
      const rad = (norm * Math.PI) / 180;
      return { cos: Math.cos(rad), sin: Math.sin(rad) };
    }
  }
}

/**
 * Instance matrix of one placement: reflect about x, rotate CCW,
 * magnify, then translate to `origin`.
 */
export function placementMatrix(t: Transformation | undefined, origin: Point): Matrix2D {
  const mag = t?.magnification ?? 1;
  const r = t?.reflected ? -1 : 1;
  const { cos, sin } = trig(t?.angle ?? 0);
  return {
    a: mag * cos,
    b: mag * sin,
    c: -mag * r * sin,
    d: mag * r * cos,
    e: origin.x,
    f: origin.y,
  };
}

