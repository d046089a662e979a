/**
 * Spatial Index — quadtree over axis-aligned boxes for viewport culling
 * and hit-testing.
 *
 * An entry whose box spans several child regions is stored in every child
 * it overlaps, so raw `query` results may repeat an entry; callers dedupe.
 * An entry that covers a node's whole region stays at that node instead
 * of being pushed into all four children, which keeps die-sized shapes
 * from being copied into every leaf.
 *
 * Usage:
 *   const index = new SpatialIndex<Entry>(sceneBounds);
 *   for (const e of entries) index.insert(e);
 *   const hits = index.query(viewportBox);
 */

import type { BBox, Point } from "./layoutModel";
import { bboxContains, bboxContainsPoint, bboxIntersects } from "../utils/bbox";
import { createLogger } from "../utils/logger";

const log = createLogger("SpatialIndex");

// ══════════════════════════════════════════════════════════════════════
// Types
// ══════════════════════════════════════════════════════════════════════

export interface Bounded {
  bounds: BBox;
}

export interface SpatialIndexOptions {
  /** Entries a node holds before it splits. */
  capacity?: number;
  maxDepth?: number;
}

export interface SpatialIndexStatistics {
  nodeCount: number;
  leafCount: number;
  /** Deepest level actually reached. */
  depth: number;
  /** Distinct entries inserted. */
  itemCount: number;
  /** Stored references, counting multi-inserted entries once per node. */
  entryCount: number;
}

export const DEFAULT_CAPACITY = 8;
export const DEFAULT_MAX_DEPTH = 10;

interface QuadNode<T> {
  bounds: BBox;
  depth: number;
  items: T[];
  children: QuadNode<T>[] | null;
}

function createNode<T>(bounds: BBox, depth: number): QuadNode<T> {
  return { bounds, depth, items: [], children: null };
}

// ══════════════════════════════════════════════════════════════════════
// Quadtree
// ══════════════════════════════════════════════════════════════════════

export class SpatialIndex<T extends Bounded> {
  private root: QuadNode<T>;
  private readonly capacity: number;
  private readonly maxDepth: number;
  private itemCount = 0;

  constructor(bounds: BBox, options: SpatialIndexOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_CAPACITY);
    this.maxDepth = Math.max(0, options.maxDepth ?? DEFAULT_MAX_DEPTH);
    this.root = createNode(bounds, 0);
  }

  getBounds(): BBox {
    return this.root.bounds;
  }

  /** Returns false when the entry lies entirely outside the indexed region. */
  insert(item: T): boolean {
    if (!bboxIntersects(this.root.bounds, item.bounds)) {
      log.debug("Entry outside index bounds, skipped", item.bounds);
      return false;
    }
    this.insertInto(this.root, item);
    this.itemCount++;
    return true;
  }

  /** Entries whose box intersects `region`. May contain duplicates. */
  query(region: BBox): T[] {
    const out: T[] = [];
    const stack: QuadNode<T>[] = [this.root];

    while (stack.length > 0) {
      const node = stack.pop();
      if (!node || !bboxIntersects(node.bounds, region)) continue;
      for (const item of node.items) {
        if (bboxIntersects(item.bounds, region)) out.push(item);
      }
      if (node.children) stack.push(...node.children);
    }
    return out;
  }

  /** Entries whose box contains `p`. May contain duplicates. */
  queryPoint(p: Point): T[] {
    const out: T[] = [];
    const stack: QuadNode<T>[] = [this.root];

    while (stack.length > 0) {
      const node = stack.pop();
      if (!node || !bboxContainsPoint(node.bounds, p.x, p.y)) continue;
      for (const item of node.items) {
        if (bboxContainsPoint(item.bounds, p.x, p.y)) out.push(item);
      }
      if (node.children) stack.push(...node.children);
    }
    return out;
  }

  getStatistics(): SpatialIndexStatistics {
    const stats: SpatialIndexStatistics = {
      nodeCount: 0,
      leafCount: 0,
      depth: 0,
      itemCount: this.itemCount,
      entryCount: 0,
    };
    const stack: QuadNode<T>[] = [this.root];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) continue;
      stats.nodeCount++;
      stats.entryCount += node.items.length;
      stats.depth = Math.max(stats.depth, node.depth);
      if (node.children) stack.push(...node.children);
      else stats.leafCount++;
    }
    return stats;
  }

  /** Drop every entry; optionally re-root on new bounds. */
  clear(bounds: BBox = this.root.bounds): void {
    this.root = createNode(bounds, 0);
    this.itemCount = 0;
  }

  // ── Internals ──

  private insertInto(node: QuadNode<T>, item: T): void {
    if (node.children) {
      if (bboxContains(item.bounds, node.bounds)) {
        node.items.push(item);
        return;
      }
      for (const child of node.children) {
        if (bboxIntersects(child.bounds, item.bounds)) this.insertInto(child, item);
      }
      return;
    }

    node.items.push(item);
    if (node.items.length > this.capacity && node.depth < this.maxDepth) {
      this.subdivide(node);
    }
  }

  private subdivide(node: QuadNode<T>): void {
    const { minX, minY, maxX, maxY } = node.bounds;
    const midX = (minX + maxX) / 2;
    const midY = (minY + maxY) / 2;
    const d = node.depth + 1;

    node.children = [
      createNode<T>({ minX, minY, maxX: midX, maxY: midY }, d),
      createNode<T>({ minX: midX, minY, maxX, maxY: midY }, d),
      createNode<T>({ minX, minY: midY, maxX: midX, maxY }, d),
      createNode<T>({ minX: midX, minY: midY, maxX, maxY }, d),
    ];

    const items = node.items;
    node.items = [];
    for (const item of items) this.insertInto(node, item);
  }
}
