/**
 * Layout data model — library, structures and the element variants the
 * external decoder produces. Plain data, no behavior.
 *
 * Coordinates are structure-local database units until the hierarchy
 * resolver maps them into world space.
 */

// ══════════════════════════════════════════════════════════════════════
// Primitives
// ══════════════════════════════════════════════════════════════════════

export interface Point {
  x: number;
  y: number;
}

export interface BBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/** Placement transform in decomposed form. Applied reflect → rotate → magnify → translate. */
export interface Transformation {
  /** Mirror about the x axis before rotation. */
  reflected: boolean;
  /** Counter-clockwise rotation in degrees. */
  angle: number;
  magnification: number;
}

export interface LibraryUnits {
  /** User units per database unit (e.g. 0.001 for nm → µm). */
  userUnitsPerDbUnit: number;
  metersPerDbUnit: number;
}

// ══════════════════════════════════════════════════════════════════════
// Elements
// ══════════════════════════════════════════════════════════════════════

interface LayeredElementBase {
  layer: number;
  dataType: number;
  /** World-space extent, filled in by the resolver. Absent when the element has no points. */
  bounds?: BBox;
}

export interface BoundaryElement extends LayeredElementBase {
  type: "boundary";
  polygons: Point[][];
}

/** 0 = flush, 1 = round, 2 = half-width extension, 4 = custom extension. */
export type PathEndType = 0 | 1 | 2 | 4;

export interface PathElement extends LayeredElementBase {
  type: "path";
  paths: Point[][];
  width: number;
  pathType?: PathEndType;
}

export interface BoxElement extends LayeredElementBase {
  type: "box";
  points: Point[];
}

export interface NodeElement extends LayeredElementBase {
  type: "node";
  points: Point[];
}

export interface TextElement extends LayeredElementBase {
  type: "text";
  text: string;
  position: Point;
  /** Text height in world units; renderers fall back to a fixed pixel size. */
  height?: number;
}

export interface SingleReferenceElement {
  type: "sref";
  structureName: string;
  positions: Point[];
  transformation?: Transformation;
}

export interface GridReferenceElement {
  type: "aref";
  structureName: string;
  columns: number;
  rows: number;
  /** [origin, origin + columns·colPitch, origin + rows·rowPitch] */
  corners: [Point, Point, Point];
  transformation?: Transformation;
}

export type GeometryElement =
  | BoundaryElement
  | PathElement
  | BoxElement
  | NodeElement
  | TextElement;

export type ReferenceElement = SingleReferenceElement | GridReferenceElement;

export type LayoutElement = GeometryElement | ReferenceElement;

export type GeometryKind = GeometryElement["type"];

export function isReference(element: LayoutElement): element is ReferenceElement {
  return element.type === "sref" || element.type === "aref";
}

// ══════════════════════════════════════════════════════════════════════
// Containers
// ══════════════════════════════════════════════════════════════════════

export interface Structure {
  name: string;
  elements: LayoutElement[];
}

export interface Library {
  name: string;
  units: LibraryUnits;
  structures: Structure[];
}

// ══════════════════════════════════════════════════════════════════════
// Layer keys
// ══════════════════════════════════════════════════════════════════════

export interface LayerKey {
  layer: number;
  dataType: number;
}

export function layerKeyString(layer: number, dataType: number): string {
  return `${layer}_${dataType}`;
}

/** Ascending by layer, then dataType. */
export function compareLayerKeys(a: LayerKey, b: LayerKey): number {
  return a.layer - b.layer || a.dataType - b.dataType;
}
