/**
 * Tests for engines/hierarchyResolver.ts
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  calculateLibraryBounds,
  calculateStructureBounds,
  createResolveCache,
  detectCycles,
  extractLayers,
  findStructure,
  findTopStructures,
  flattenLibrary,
  getChildStructureNames,
  getParentStructures,
  instanceMatrices,
  resolveReference,
  resolveStructure,
  transformElement,
} from "../engines/hierarchyResolver";
import { resetWarnOnce } from "../utils/logger";
import { aref, label, library, polygon, rect, sref, structure, wire } from "./fixtures";

const box = (minX: number, minY: number, maxX: number, maxY: number) => ({ minX, minY, maxX, maxY });

beforeEach(() => {
  resetWarnOnce();
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "log").mockImplementation(() => {});
});

// ══════════════════════════════════════════════════════════════════════
// Lookup
// ══════════════════════════════════════════════════════════════════════

describe("structure lookup", () => {
  const lib = library(
    structure("TOP", sref("A", 0, 0), sref("B", 0, 0), sref("A", 50, 0)),
    structure("A", sref("B", 0, 0)),
    structure("B", rect(1, 0, 0, 1, 1)),
  );

  it("findStructure finds by name", () => {
    expect(findStructure(lib, "A")?.name).toBe("A");
    expect(findStructure(lib, "Z")).toBeUndefined();
  });

  it("getChildStructureNames lists each child once, in order", () => {
    const top = findStructure(lib, "TOP");
    expect(top && getChildStructureNames(top)).toEqual(["A", "B"]);
  });

  it("getParentStructures lists every referencing structure", () => {
    expect(getParentStructures(lib, "B").map((s) => s.name)).toEqual(["TOP", "A"]);
    expect(getParentStructures(lib, "TOP")).toEqual([]);
  });

  it("findTopStructures returns unreferenced structures", () => {
    expect(findTopStructures(lib).map((s) => s.name)).toEqual(["TOP"]);
  });

  it("findTopStructures falls back to the first structure of a closed cycle", () => {
    const cyclic = library(structure("A", sref("B", 0, 0)), structure("B", sref("A", 0, 0)));
    expect(findTopStructures(cyclic).map((s) => s.name)).toEqual(["A"]);
    expect(findTopStructures(library())).toEqual([]);
  });
});

// ══════════════════════════════════════════════════════════════════════
// Resolution
// ══════════════════════════════════════════════════════════════════════

describe("resolveStructure", () => {
  it("returns the structure's own geometry under identity", () => {
    const lib = library(structure("LEAF", rect(1, 0, 0, 10, 10)));
    const { elements, cycles, missingReferences } = resolveStructure(lib, "LEAF");

    expect(elements).toHaveLength(1);
    expect(elements[0].element.bounds).toEqual(box(0, 0, 10, 10));
    expect(elements[0].source).toEqual({ structureName: "LEAF", elementIndex: 0 });
    expect(cycles).toEqual([]);
    expect(missingReferences).toEqual([]);
  });

  it("places a referenced structure through its transformation", () => {
    const lib = library(
      structure("TOP", sref("CELL", 100, 100, { reflected: false, angle: 90, magnification: 2 })),
      structure("CELL", polygon(1, [[1, 1], [2, 1], [2, 2]])),
    );
    const [resolved] = resolveStructure(lib, "TOP").elements;
    expect(resolved.element.type).toBe("boundary");
    if (resolved.element.type !== "boundary") return;
    expect(resolved.element.polygons[0][0]).toEqual({ x: 98, y: 102 });
    expect(resolved.source).toEqual({ structureName: "CELL", elementIndex: 0 });
  });

  it("composes nested placements", () => {
    const lib = library(
      structure("TOP", sref("MID", 100, 0)),
      structure("MID", sref("LEAF", 10, 0, { reflected: false, angle: 90, magnification: 1 })),
      structure("LEAF", rect(1, 0, 0, 4, 2)),
    );
    const { elements } = resolveStructure(lib, "TOP");
    expect(elements).toHaveLength(1);
    expect(elements[0].element.bounds).toEqual(box(108, 0, 110, 4));
  });

  it("expands a grid reference row-major", () => {
    const lib = library(
      structure("TOP", aref("UNIT", 3, 1, [[0, 0], [30, 0], [0, 10]])),
      structure("UNIT", rect(2, 0, 0, 5, 5)),
    );
    const { elements } = resolveStructure(lib, "TOP");
    expect(elements.map((r) => r.element.bounds?.minX)).toEqual([0, 10, 20]);
    expect(elements.every((r) => r.source.structureName === "UNIT")).toBe(true);
  });

  it("applies an outer transform", () => {
    const lib = library(structure("LEAF", rect(1, 0, 0, 10, 10)));
    const { elements } = resolveStructure(lib, "LEAF", {
      transform: { a: 1, b: 0, c: 0, d: 1, e: 5, f: 5 },
    });
    expect(elements[0].element.bounds).toEqual(box(5, 5, 15, 15));
  });

  it("terminates on a reference cycle and reports it", () => {
    const lib = library(
      structure("A", rect(1, 0, 0, 1, 1), sref("B", 10, 0)),
      structure("B", sref("A", 0, 0), rect(2, 0, 0, 1, 1)),
    );
    const { elements, cycles } = resolveStructure(lib, "A");
    expect(cycles).toEqual([["A", "B", "A"]]);
    expect(elements.map((r) => r.source.structureName)).toEqual(["A", "B"]);
  });

  it("reports a self-reference", () => {
    const lib = library(structure("S", rect(1, 0, 0, 1, 1), sref("S", 5, 5)));
    const { elements, cycles } = resolveStructure(lib, "S");
    expect(cycles).toEqual([["S", "S"]]);
    expect(elements).toHaveLength(1);
  });

  it("skips missing references and lists them once", () => {
    const lib = library(structure("TOP", sref("GHOST", 0, 0), rect(1, 0, 0, 1, 1), sref("GHOST", 5, 0)));
    const { elements, missingReferences } = resolveStructure(lib, "TOP");
    expect(elements).toHaveLength(1);
    expect(missingReferences).toEqual(["GHOST"]);
  });

  it("reports an unknown root structure", () => {
    const result = resolveStructure(library(), "NOPE");
    expect(result.elements).toEqual([]);
    expect(result.missingReferences).toEqual(["NOPE"]);
  });

  it("stops expanding at the depth limit", () => {
    const lib = library(
      structure("A", rect(1, 0, 0, 1, 1), sref("B", 0, 0)),
      structure("B", rect(2, 0, 0, 1, 1), sref("C", 0, 0)),
      structure("C", rect(3, 0, 0, 1, 1)),
    );
    expect(resolveStructure(lib, "A", { maxDepth: 2 }).elements).toHaveLength(2);
    expect(resolveStructure(lib, "A").elements).toHaveLength(3);
  });

  it("does not cache structures cut by the depth limit", () => {
    const lib = library(
      structure("A", rect(1, 0, 0, 1, 1), sref("B", 0, 0)),
      structure("B", rect(2, 0, 0, 1, 1), sref("C", 0, 0)),
      structure("C", rect(3, 0, 0, 1, 1)),
    );
    const cache = createResolveCache(lib);
    expect(resolveStructure(lib, "A", { maxDepth: 2, cache }).elements).toHaveLength(2);
    expect(cache.local.has("A")).toBe(false);
    expect(cache.local.has("B")).toBe(false);

    // B as the root is one level shallower, so C fits
    expect(resolveStructure(lib, "B", { maxDepth: 2, cache }).elements).toHaveLength(2);
    expect(cache.local.get("B")).toHaveLength(2);
  });

  it("reuses a structure's flattened geometry for differently transformed placements", () => {
    const lib = library(
      structure(
        "TOP",
        sref("CELL", 0, 0),
        sref("CELL", 50, 0, { reflected: false, angle: 90, magnification: 1 }),
      ),
      structure("CELL", rect(1, 0, 0, 10, 20)),
    );
    const cache = createResolveCache(lib);
    const first = resolveStructure(lib, "TOP", { cache });

    expect(first.elements.map((r) => r.element.bounds)).toEqual([box(0, 0, 10, 20), box(30, 0, 50, 10)]);
    expect(cache.local.get("CELL")?.[0].element.bounds).toEqual(box(0, 0, 10, 20));

    const second = resolveStructure(lib, "TOP", { cache });
    expect(second.elements.map((r) => r.element.bounds)).toEqual(first.elements.map((r) => r.element.bounds));
  });

  it("never mutates the library", () => {
    const leaf = rect(1, 0, 0, 10, 10);
    const lib = library(structure("TOP", sref("LEAF", 5, 5)), structure("LEAF", leaf));
    resolveStructure(lib, "TOP");
    expect(leaf).not.toHaveProperty("bounds");
    expect(leaf.polygons[0][0]).toEqual({ x: 0, y: 0 });
  });
});

describe("transformElement", () => {
  const mag3 = { a: 3, b: 0, c: 0, d: 3, e: 0, f: 0 };

  it("scales positive path widths and pads bounds by half the width", () => {
    const out = transformElement(wire(1, [[0, 0], [10, 0]], 2), mag3);
    expect(out.type === "path" && out.width).toBe(6);
    expect(out.bounds).toEqual(box(-3, -3, 33, 3));
  });

  it("keeps absolute (negative) path widths", () => {
    const out = transformElement(wire(1, [[0, 0], [10, 0]], -2), mag3);
    expect(out.type === "path" && out.width).toBe(-2);
    expect(out.bounds).toEqual(box(-1, -1, 31, 1));
  });

  it("scales text height and bounds the anchor point", () => {
    const out = transformElement(label(5, "VDD", 1, 2, 4), mag3);
    expect(out.type === "text" && out.height).toBe(12);
    expect(out.bounds).toEqual(box(3, 6, 3, 6));
  });

  it("omits bounds for an element without points", () => {
    const out = transformElement({ type: "boundary", layer: 1, dataType: 0, polygons: [] }, mag3);
    expect(out).not.toHaveProperty("bounds");
  });
});

describe("resolveReference", () => {
  it("places a reference inside a parent frame", () => {
    const lib = library(structure("LEAF", rect(1, 0, 0, 10, 10)));
    const { elements } = resolveReference(lib, sref("LEAF", 5, 0), { a: 1, b: 0, c: 0, d: 1, e: 0, f: 5 });
    expect(elements[0].element.bounds).toEqual(box(5, 5, 15, 15));
  });

  it("yields one matrix per position", () => {
    const ref = { ...sref("LEAF", 0, 0), positions: [{ x: 0, y: 0 }, { x: 1, y: 1 }] };
    expect(instanceMatrices(ref)).toHaveLength(2);
    expect(instanceMatrices(aref("LEAF", 2, 3, [[0, 0], [2, 0], [0, 3]]))).toHaveLength(6);
    expect(instanceMatrices(aref("LEAF", 0, 3, [[0, 0], [2, 0], [0, 3]]))).toHaveLength(0);
  });
});

// ══════════════════════════════════════════════════════════════════════
// Analysis
// ══════════════════════════════════════════════════════════════════════

describe("detectCycles", () => {
  it("finds a three-structure cycle once", () => {
    const lib = library(
      structure("A", sref("B", 0, 0)),
      structure("B", sref("C", 0, 0)),
      structure("C", sref("A", 0, 0)),
      structure("D", sref("A", 0, 0)),
    );
    expect(detectCycles(lib)).toEqual([["A", "B", "C", "A"]]);
  });

  it("returns nothing for a tree", () => {
    const lib = library(
      structure("TOP", sref("A", 0, 0), sref("B", 0, 0)),
      structure("A", sref("B", 0, 0)),
      structure("B", rect(1, 0, 0, 1, 1)),
    );
    expect(detectCycles(lib)).toEqual([]);
  });
});

describe("bounds and layers", () => {
  const lib = library(
    structure("TOP", sref("LEAF", 0, 0), rect(3, 20, 20, 30, 25, 1)),
    structure("LEAF", rect(1, 0, 0, 10, 10)),
  );

  it("calculateStructureBounds covers placed children", () => {
    expect(calculateStructureBounds(lib, "TOP")).toEqual(box(0, 0, 30, 25));
    expect(calculateStructureBounds(lib, "LEAF")).toEqual(box(0, 0, 10, 10));
  });

  it("calculateLibraryBounds unions the top structures", () => {
    const simple = library(structure("TOP", sref("LEAF", 0, 0)), structure("LEAF", rect(1, 0, 0, 10, 10)));
    expect(calculateLibraryBounds(simple)).toEqual(box(0, 0, 10, 10));
    expect(calculateLibraryBounds(library())).toBeNull();
  });

  it("extractLayers lists distinct keys ascending", () => {
    const elements = resolveStructure(lib, "TOP").elements.map((r) => r.element);
    expect(extractLayers([...elements, rect(1, 5, 5, 6, 6)])).toEqual([
      { layer: 1, dataType: 0 },
      { layer: 3, dataType: 1 },
    ]);
  });

  it("flattenLibrary resolves every top structure", () => {
    const flat = flattenLibrary(lib);
    expect([...flat.keys()]).toEqual(["TOP"]);
    expect(flat.get("TOP")).toHaveLength(2);
  });
});
