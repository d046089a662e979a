/**
 * Hierarchy Resolver — expands structure placements into world-space
 * geometry.
 *
 * Each structure is flattened once in its own coordinate frame and cached;
 * every placement then maps that cached list through its instance matrix.
 * The walk uses an explicit stack plus a "resolving" set, so reference
 * cycles are a reported data condition instead of a stack overflow.
 *
 * Usage:
 *   const { elements, cycles } = resolveStructure(library, "TOP");
 */

import type {
  BBox,
  GeometryElement,
  GridReferenceElement,
  LayerKey,
  Library,
  Point,
  ReferenceElement,
  Structure,
} from "./layoutModel";
import { compareLayerKeys, isReference, layerKeyString } from "./layoutModel";
import {
  IDENTITY,
  applyMatrix,
  composeMatrices,
  isIdentity,
  linearScale,
  placementMatrix,
  transformPoints,
  type Matrix2D,
} from "../utils/transform";
import { bboxOfPoints, expandBBox, mergeBBoxes } from "../utils/bbox";
import { createLogger, warnOnce } from "../utils/logger";

const log = createLogger("Resolver");

// ══════════════════════════════════════════════════════════════════════
// Types
// ══════════════════════════════════════════════════════════════════════

/** Where a resolved element was defined. */
export interface ElementSource {
  structureName: string;
  elementIndex: number;
}

export interface ResolvedElement {
  /** World-space copy; the library's own element is never mutated. */
  element: GeometryElement;
  source: ElementSource;
}

export interface ResolveReport {
  /** Each cycle closed on its first name, e.g. ["A", "B", "A"]. */
  cycles: string[][];
  missingReferences: string[];
}

export interface ResolveResult extends ResolveReport {
  elements: ResolvedElement[];
}

export interface ResolveCache {
  readonly library: Library;
  readonly structures: Map<string, Structure>;
  /** Flattened elements per structure, in that structure's own frame. */
  readonly local: Map<string, ResolvedElement[]>;
}

export interface ResolveOptions {
  /** Accumulated placement transform; identity by default. */
  transform?: Matrix2D;
  /** Share flattened sub-results across calls on the same library. */
  cache?: ResolveCache;
  /** References nested deeper than this are not expanded. */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 64;

// ══════════════════════════════════════════════════════════════════════
// Structure lookup
// ══════════════════════════════════════════════════════════════════════

function structureMap(library: Library): Map<string, Structure> {
  const map = new Map<string, Structure>();
  for (const s of library.structures) {
    if (!map.has(s.name)) map.set(s.name, s);
  }
  return map;
}

export function createResolveCache(library: Library): ResolveCache {
  return { library, structures: structureMap(library), local: new Map() };
}

export function findStructure(library: Library, name: string): Structure | undefined {
  return library.structures.find((s) => s.name === name);
}

/** Names of directly referenced structures, first occurrence order. */
export function getChildStructureNames(structure: Structure): string[] {
  const names = new Set<string>();
  for (const el of structure.elements) {
    if (isReference(el)) names.add(el.structureName);
  }
  return [...names];
}

export function getParentStructures(library: Library, name: string): Structure[] {
  return library.structures.filter((s) =>
    s.elements.some((el) => isReference(el) && el.structureName === name),
  );
}

/**
 * Structures no other structure references. A library that is one big
 * cycle has none; its first structure is returned instead.
 */
export function findTopStructures(library: Library): Structure[] {
  const referenced = new Set<string>();
  for (const s of library.structures) {
    for (const child of getChildStructureNames(s)) referenced.add(child);
  }
  const tops = library.structures.filter((s) => !referenced.has(s.name));
  if (tops.length === 0 && library.structures.length > 0) {
    return [library.structures[0]];
  }
  return tops;
}

// ══════════════════════════════════════════════════════════════════════
// Element transforms
// ══════════════════════════════════════════════════════════════════════

/** World-space extent of a geometry element; null when it has no points. */
export function computeElementBounds(element: GeometryElement): BBox | null {
  switch (element.type) {
    case "boundary":
      return bboxOfPoints(element.polygons.flat());
    case "path": {
      const b = bboxOfPoints(element.paths.flat());
      return b && element.width !== 0 ? expandBBox(b, Math.abs(element.width) / 2) : b;
    }
    case "box":
    case "node":
      return bboxOfPoints(element.points);
    case "text":
      return bboxOfPoints([element.position]);
  }
}

function withBounds<T extends GeometryElement>(element: T): T {
  const bounds = computeElementBounds(element);
  if (bounds) element.bounds = bounds;
  else delete element.bounds;
  return element;
}

/**
 * Copy of `element` mapped through `m`, bounds recomputed. Positive path
 * widths and text heights scale with the placement; negative (absolute)
 * widths do not.
 */
export function transformElement(element: GeometryElement, m: Matrix2D): GeometryElement {
  const scale = linearScale(m);
  switch (element.type) {
    case "boundary":
      return withBounds({ ...element, polygons: element.polygons.map((p) => transformPoints(m, p)) });
    case "path":
      return withBounds({
        ...element,
        paths: element.paths.map((p) => transformPoints(m, p)),
        width: element.width >= 0 ? element.width * scale : element.width,
      });
    case "box":
      return withBounds({ ...element, points: transformPoints(m, element.points) });
    case "node":
      return withBounds({ ...element, points: transformPoints(m, element.points) });
    case "text":
      return withBounds({
        ...element,
        position: applyMatrix(m, element.position),
        ...(element.height !== undefined ? { height: element.height * scale } : {}),
      });
  }
}

function gridOrigins(ref: GridReferenceElement): Point[] {
  const { columns, rows } = ref;
  if (columns <= 0 || rows <= 0) return [];
  const [origin, colCorner, rowCorner] = ref.corners;
  const colStep = { x: (colCorner.x - origin.x) / columns, y: (colCorner.y - origin.y) / columns };
  const rowStep = { x: (rowCorner.x - origin.x) / rows, y: (rowCorner.y - origin.y) / rows };

  const origins: Point[] = [];
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < columns; col++) {
      origins.push({
        x: origin.x + col * colStep.x + row * rowStep.x,
        y: origin.y + col * colStep.y + row * rowStep.y,
      });
    }
  }
  return origins;
}

/** One matrix per placed instance: positions for sref, rows × columns for aref. */
export function instanceMatrices(ref: ReferenceElement): Matrix2D[] {
  const origins = ref.type === "sref" ? ref.positions : gridOrigins(ref);
  return origins.map((o) => placementMatrix(ref.transformation, o));
}

// ══════════════════════════════════════════════════════════════════════
// Resolution
// ══════════════════════════════════════════════════════════════════════

interface Frame {
  structure: Structure;
  /** Next element to visit. */
  index: number;
  out: ResolvedElement[];
  /** Something below was cut by the depth limit; the result is not cached. */
  truncated: boolean;
}

function appendInstances(out: ResolvedElement[], child: ResolvedElement[], ref: ReferenceElement): void {
  for (const m of instanceMatrices(ref)) {
    for (const r of child) {
      out.push({ element: transformElement(r.element, m), source: r.source });
    }
  }
}

/**
 * Flatten `rootName` in its own frame, filling `cache.local` for every
 * structure walked. Structures cut by the depth limit, and their ancestors,
 * are not cached, so a shallower placement later resolves them in full.
 */
function resolveLocal(
  rootName: string,
  cache: ResolveCache,
  maxDepth: number,
  report: ResolveReport,
): ResolvedElement[] {
  const done = cache.local.get(rootName);
  if (done) return done;
  const root = cache.structures.get(rootName);
  if (!root) return [];

  const missing = new Set<string>();
  const resolving = new Set<string>([rootName]);
  const stack: Frame[] = [{ structure: root, index: 0, out: [], truncated: false }];
  let result: ResolvedElement[] = [];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    const { structure } = frame;

    if (frame.index >= structure.elements.length) {
      stack.pop();
      resolving.delete(structure.name);
      if (!frame.truncated) cache.local.set(structure.name, frame.out);

      const parent = stack[stack.length - 1];
      if (!parent) {
        result = frame.out;
        continue;
      }
      const ref = parent.structure.elements[parent.index];
      if (isReference(ref)) appendInstances(parent.out, frame.out, ref);
      if (frame.truncated) parent.truncated = true;
      parent.index++;
      continue;
    }

    const element = structure.elements[frame.index];

    if (!isReference(element)) {
      frame.out.push({
        element: transformElement(element, IDENTITY),
        source: { structureName: structure.name, elementIndex: frame.index },
      });
      frame.index++;
      continue;
    }

    const childName = element.structureName;
    const cached = cache.local.get(childName);
    if (cached) {
      appendInstances(frame.out, cached, element);
      frame.index++;
      continue;
    }

    if (resolving.has(childName)) {
      const path = stack.map((f) => f.structure.name);
      const cycle = [...path.slice(path.indexOf(childName)), childName];
      report.cycles.push(cycle);
      log.warn("Cyclic reference, branch skipped:", cycle.join(" → "));
      frame.index++;
      continue;
    }

    const child = cache.structures.get(childName);
    if (!child) {
      if (!missing.has(childName)) {
        missing.add(childName);
        report.missingReferences.push(childName);
        log.warn(`Referenced structure not found: ${childName} (in ${structure.name})`);
      }
      frame.index++;
      continue;
    }

    if (stack.length >= maxDepth) {
      warnOnce(log, `depth:${cache.library.name}:${childName}`, `Reference depth limit ${maxDepth} reached at ${childName}`);
      frame.truncated = true;
      frame.index++;
      continue;
    }

    resolving.add(childName);
    stack.push({ structure: child, index: 0, out: [], truncated: false });
  }

  return result;
}

/**
 * Flatten `structureName` into world-space geometry under `options.transform`.
 * Missing references contribute nothing; cyclic branches are cut and listed
 * in the result.
 */
export function resolveStructure(
  library: Library,
  structureName: string,
  options: ResolveOptions = {},
): ResolveResult {
  const cache = options.cache ?? createResolveCache(library);
  const transform = options.transform ?? IDENTITY;
  const report: ResolveReport = { cycles: [], missingReferences: [] };

  if (!cache.structures.has(structureName)) {
    log.warn(`Structure not found: ${structureName}`);
    return { elements: [], cycles: [], missingReferences: [structureName] };
  }

  const local = resolveLocal(structureName, cache, options.maxDepth ?? DEFAULT_MAX_DEPTH, report);
  const elements = isIdentity(transform)
    ? [...local]
    : local.map((r) => ({ element: transformElement(r.element, transform), source: r.source }));

  return { elements, ...report };
}

/** Resolve a reference element as seen from a parent frame `parent`. */
export function resolveReference(
  library: Library,
  ref: ReferenceElement,
  parent: Matrix2D = IDENTITY,
  cache: ResolveCache = createResolveCache(library),
): ResolveResult {
  const report: ResolveReport = { cycles: [], missingReferences: [] };
  if (!cache.structures.has(ref.structureName)) {
    log.warn(`Referenced structure not found: ${ref.structureName}`);
    return { elements: [], cycles: [], missingReferences: [ref.structureName] };
  }

  const local = resolveLocal(ref.structureName, cache, DEFAULT_MAX_DEPTH, report);
  const elements: ResolvedElement[] = [];
  for (const m of instanceMatrices(ref)) {
    const combined = composeMatrices(parent, m);
    for (const r of local) {
      elements.push({ element: transformElement(r.element, combined), source: r.source });
    }
  }
  return { elements, ...report };
}

/** Flatten every top-level structure. */
export function flattenLibrary(
  library: Library,
  options: Omit<ResolveOptions, "transform"> = {},
): Map<string, ResolvedElement[]> {
  const cache = options.cache ?? createResolveCache(library);
  const result = new Map<string, ResolvedElement[]>();
  for (const top of findTopStructures(library)) {
    result.set(top.name, resolveStructure(library, top.name, { ...options, cache }).elements);
  }
  return result;
}

// ══════════════════════════════════════════════════════════════════════
// Analysis
// ══════════════════════════════════════════════════════════════════════

/**
 * Every reference cycle in the library, found by iterative DFS. Each back
 * edge yields one cycle closed on its start name.
 */
export function detectCycles(library: Library): string[][] {
  const structures = structureMap(library);
  const state = new Map<string, "active" | "done">();
  const cycles: string[][] = [];

  for (const start of structures.keys()) {
    if (state.has(start)) continue;

    const path: string[] = [start];
    const pending: string[][] = [childrenOf(start)];
    state.set(start, "active");

    while (path.length > 0) {
      const queue = pending[pending.length - 1];
      const next = queue.shift();

      if (next === undefined) {
        const finished = path.pop();
        pending.pop();
        if (finished !== undefined) state.set(finished, "done");
        continue;
      }

      const s = state.get(next);
      if (s === "active") {
        cycles.push([...path.slice(path.indexOf(next)), next]);
      } else if (s === undefined && structures.has(next)) {
        state.set(next, "active");
        path.push(next);
        pending.push(childrenOf(next));
      }
    }
  }

  return cycles;

  function childrenOf(name: string): string[] {
    const s = structures.get(name);
    return s ? getChildStructureNames(s) : [];
  }
}

export function calculateStructureBounds(library: Library, structureName: string): BBox | null {
  const { elements } = resolveStructure(library, structureName);
  return mergeBBoxes(elements.map((r) => r.element.bounds));
}

/** Union of the bounds of every top-level structure; null for an empty library. */
export function calculateLibraryBounds(library: Library): BBox | null {
  const cache = createResolveCache(library);
  const boxes: (BBox | undefined)[] = [];
  for (const top of findTopStructures(library)) {
    for (const r of resolveStructure(library, top.name, { cache }).elements) {
      boxes.push(r.element.bounds);
    }
  }
  return mergeBBoxes(boxes);
}

/** Distinct layer keys, ascending. */
export function extractLayers(elements: Iterable<GeometryElement>): LayerKey[] {
  const keys = new Map<string, LayerKey>();
  for (const el of elements) {
    const k = layerKeyString(el.layer, el.dataType);
    if (!keys.has(k)) keys.set(k, { layer: el.layer, dataType: el.dataType });
  }
  return [...keys.values()].sort(compareLayerKeys);
}
