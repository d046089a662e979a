/**
 * useLayoutRenderer — binds a renderer to a canvas for the lifetime of a
 * component.
 *
 * Creates the renderer once the canvas is mounted, pushes library changes
 * into the scene graph, re-renders whenever the viewport changes, and
 * disposes on unmount.
 */

import { useCallback, useEffect, useRef, useState } from "react";
import type { Library } from "../engines/layoutModel";
import type { Viewport } from "../engines/sceneGraph";
import type { LayoutRenderer, RenderStatistics } from "../engines/layoutRenderer";
import { canvasTarget, type RenderTarget } from "../engines/renderTarget";
import { createRenderer, type CreateRendererOptions } from "../engines/rendererFactory";
import { createLogger } from "../utils/logger";

const log = createLogger("Renderer");

// ── Types ──

export type RendererFactoryFn = (target: RenderTarget, options: CreateRendererOptions) => Promise<LayoutRenderer>;

interface RendererInputs {
  canvasRef: React.RefObject<HTMLCanvasElement | null>;
  library: Library | null;
  startStructure?: string;
  viewport: Viewport;
  options?: CreateRendererOptions;
  /** Defaults to `createRenderer`. */
  factory?: RendererFactoryFn;
  /** Defaults to wrapping the canvas element. */
  toTarget?: (canvas: HTMLCanvasElement) => RenderTarget;
  /** Called after the scene is rebuilt for a new library (e.g. to fit the view). */
  onSceneLoaded?: (renderer: LayoutRenderer) => void;
}

export interface UseLayoutRendererReturn {
  renderer: LayoutRenderer | null;
  error: Error | null;
  statistics: RenderStatistics | null;
  /** Render the current viewport now. */
  render: () => void;
}

export function useLayoutRenderer(inputs: RendererInputs): UseLayoutRendererReturn {
  const {
    canvasRef,
    library,
    startStructure,
    viewport,
    options,
    factory = createRenderer,
    toTarget = canvasTarget,
    onSceneLoaded,
  } = inputs;

  const [renderer, setRenderer] = useState<LayoutRenderer | null>(null);
  const [error, setError] = useState<Error | null>(null);
  const [statistics, setStatistics] = useState<RenderStatistics | null>(null);
  const viewportRef = useRef(viewport);
  viewportRef.current = viewport;
  const optionsRef = useRef(options);
  const onSceneLoadedRef = useRef(onSceneLoaded);
  onSceneLoadedRef.current = onSceneLoaded;

  // ── Renderer lifecycle ──

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;

    let cancelled = false;
    let created: LayoutRenderer | null = null;

    factory(toTarget(canvas), optionsRef.current ?? {})
      .then((r) => {
        if (cancelled) {
          r.dispose();
          return;
        }
        created = r;
        setRenderer(r);
      })
      .catch((err: unknown) => {
        log.error("Renderer creation failed:", err);
        if (!cancelled) setError(err instanceof Error ? err : new Error(String(err)));
      });

    return () => {
      cancelled = true;
      created?.dispose();
      setRenderer(null);
    };
  }, [canvasRef, factory, toTarget]);

  // ── Scene binding ──

  useEffect(() => {
    if (!renderer) return;
    if (library) {
      renderer.setLibrary(library, startStructure);
      onSceneLoadedRef.current?.(renderer);
    } else {
      renderer.clearScene();
    }
  }, [renderer, library, startStructure]);

  // ── Frame ──

  const render = useCallback(() => {
    if (!renderer?.isReady()) return;
    renderer.render(viewportRef.current);
    setStatistics(renderer.getStatistics());
  }, [renderer]);

  useEffect(() => {
    render();
  }, [render, viewport, library]);

  return { renderer, error, statistics, render };
}
