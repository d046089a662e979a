// Public API of the layout viewer engine.

export * from "./engines/layoutModel";
export {
  DEFAULT_MAX_DEPTH as DEFAULT_RESOLVE_DEPTH,
  createResolveCache,
  findStructure,
  getChildStructureNames,
  getParentStructures,
  findTopStructures,
  computeElementBounds,
  transformElement,
  instanceMatrices,
  resolveStructure,
  resolveReference,
  flattenLibrary,
  detectCycles,
  calculateStructureBounds,
  calculateLibraryBounds,
  extractLayers,
} from "./engines/hierarchyResolver";
export type {
  ElementSource,
  ResolvedElement,
  ResolveReport,
  ResolveResult,
  ResolveCache,
  ResolveOptions,
} from "./engines/hierarchyResolver";
export {
  DEFAULT_CAPACITY,
  DEFAULT_MAX_DEPTH as DEFAULT_INDEX_DEPTH,
  SpatialIndex,
} from "./engines/spatialIndex";
export type { Bounded, SpatialIndexOptions, SpatialIndexStatistics } from "./engines/spatialIndex";
export * from "./engines/sceneGraph";
export * from "./engines/layoutRenderer";
export * from "./engines/canvasRenderer";
export * from "./engines/webglRenderer";
export * from "./engines/renderTarget";
export type { GpuContext } from "./engines/gpuContext";
export * from "./engines/rendererFactory";

export * from "./stores/layerStyleStore";
export * from "./stores/viewerSettingsStore";

export * from "./hooks/useLayoutViewport";
export * from "./hooks/useLayoutRenderer";

export { createLogger, setLogLevel, getLogLevel, isLogLevel } from "./utils/logger";
export type { LogLevel, Logger } from "./utils/logger";
export type { Matrix2D } from "./utils/transform";
