/**
 * useLayoutViewport — viewport state, coordinate conversion, pan & zoom.
 *
 * Viewport width/height/zoom are in device pixels; the handlers take CSS
 * pixels from pointer events and scale by `devicePixelRatio`.
 */

import { useState, useCallback, useRef, useEffect } from "react";
import type { BBox, Point } from "../engines/layoutModel";
import type { Viewport } from "../engines/sceneGraph";
import { fitViewportToBounds, screenToWorld, worldToScreen } from "../engines/layoutRenderer";

// ── Pure helpers ──────────────────────────────────────────────────────

export const MIN_ZOOM = 1e-6;
export const MAX_ZOOM = 1e6;

/** Zoom by `factor`, keeping the world point under `screen` (device px) fixed. */
export function zoomViewportAt(vp: Viewport, screen: Point, factor: number): Viewport {
  const before = screenToWorld(screen, vp);
  const zoom = Math.max(MIN_ZOOM, Math.min(MAX_ZOOM, vp.zoom * factor));
  const after = screenToWorld(screen, { ...vp, zoom });
  return {
    ...vp,
    zoom,
    center: { x: vp.center.x + (before.x - after.x), y: vp.center.y + (before.y - after.y) },
  };
}

/** Shift the view by a screen-space drag of (dx, dy) device pixels. */
export function panViewport(vp: Viewport, dx: number, dy: number): Viewport {
  return {
    ...vp,
    center: { x: vp.center.x - dx / vp.zoom, y: vp.center.y + dy / vp.zoom },
  };
}

function devicePixelRatio(): number {
  return typeof window !== "undefined" && window.devicePixelRatio > 0 ? window.devicePixelRatio : 1;
}

// ── Types ─────────────────────────────────────────────────────────────

export interface UseLayoutViewportReturn {
  viewport: Viewport;
  viewportRef: React.MutableRefObject<Viewport>;
  setViewport: React.Dispatch<React.SetStateAction<Viewport>>;
  /** Convert canvas-relative CSS pixels → world coords. */
  screenToLayout: (screenX: number, screenY: number) => Point;
  /** Convert world coords → canvas-relative CSS pixels. */
  layoutToScreen: (x: number, y: number) => Point;
  /** Zoom about a canvas-relative CSS pixel position. */
  zoomAt: (screenX: number, screenY: number, factor: number) => void;
  /** Wheel-zoom handler (binds directly to onWheel). */
  handleWheel: (e: React.WheelEvent) => void;
  isPanning: boolean;
  startPan: (clientX: number, clientY: number) => void;
  updatePan: (clientX: number, clientY: number) => void;
  endPan: () => void;
  /** Frame `bounds`; null (empty scene) resets to the origin. */
  fitToBounds: (bounds: BBox | null, padding?: number) => void;
  /** New drawing-buffer size in device pixels. */
  resize: (width: number, height: number) => void;
}

// ── Hook ──────────────────────────────────────────────────────────────

export function useLayoutViewport(
  canvasRef: React.RefObject<HTMLCanvasElement | null>,
  initial: Partial<Viewport> = {},
): UseLayoutViewportReturn {
  const [viewport, setViewport] = useState<Viewport>(() => ({
    center: initial.center ?? { x: 0, y: 0 },
    width: initial.width ?? 800,
    height: initial.height ?? 600,
    zoom: initial.zoom ?? 1,
  }));
  const viewportRef = useRef(viewport);
  useEffect(() => { viewportRef.current = viewport; }, [viewport]);

  const [isPanning, setIsPanning] = useState(false);
  const panStartRef = useRef({ x: 0, y: 0 });

  // ── Coordinate conversion ──

  const screenToLayout = useCallback((screenX: number, screenY: number) => {
    const dpr = devicePixelRatio();
    return screenToWorld({ x: screenX * dpr, y: screenY * dpr }, viewportRef.current);
  }, []);

  const layoutToScreen = useCallback((x: number, y: number) => {
    const dpr = devicePixelRatio();
    const p = worldToScreen({ x, y }, viewportRef.current);
    return { x: p.x / dpr, y: p.y / dpr };
  }, []);

  // ── Zoom ──

  const zoomAt = useCallback((screenX: number, screenY: number, factor: number) => {
    const dpr = devicePixelRatio();
    setViewport((vp) => zoomViewportAt(vp, { x: screenX * dpr, y: screenY * dpr }, factor));
  }, []);

  const handleWheel = useCallback(
    (e: React.WheelEvent) => {
      e.preventDefault();
      const canvas = canvasRef.current;
      if (!canvas) return;
      const rect = canvas.getBoundingClientRect();
      zoomAt(e.clientX - rect.left, e.clientY - rect.top, e.deltaY > 0 ? 0.9 : 1.1);
    },
    [canvasRef, zoomAt],
  );

  // ── Panning ──

  const startPan = useCallback((clientX: number, clientY: number) => {
    setIsPanning(true);
    panStartRef.current = { x: clientX, y: clientY };
  }, []);

  const updatePan = useCallback((clientX: number, clientY: number) => {
    if (!isPanning) return;
    const dpr = devicePixelRatio();
    const dx = (clientX - panStartRef.current.x) * dpr;
    const dy = (clientY - panStartRef.current.y) * dpr;
    panStartRef.current = { x: clientX, y: clientY };
    setViewport((vp) => panViewport(vp, dx, dy));
  }, [isPanning]);

  const endPan = useCallback(() => {
    setIsPanning(false);
  }, []);

  // ── Fit & resize ──

  const fitToBounds = useCallback((bounds: BBox | null, padding = 1.1) => {
    setViewport((vp) => fitViewportToBounds(bounds, vp.width, vp.height, padding));
  }, []);

  const resize = useCallback((width: number, height: number) => {
    setViewport((vp) => (vp.width === width && vp.height === height ? vp : { ...vp, width, height }));
  }, []);

  return {
    viewport,
    viewportRef,
    setViewport,
    screenToLayout,
    layoutToScreen,
    zoomAt,
    handleWheel,
    isPanning,
    startPan,
    updatePan,
    endPan,
    fitToBounds,
    resize,
  };
}
