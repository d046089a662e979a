/**
 * Renderer factory — backend selection with Canvas2D fallback, and
 * backend switching that keeps the already built scene graph.
 */

import type { LayoutRenderer, RendererBackend, RendererOptions } from "./layoutRenderer";
import { RendererInitError } from "./layoutRenderer";
import { Canvas2DRenderer } from "./canvasRenderer";
import { WebGLRenderer } from "./webglRenderer";
import type { RenderTarget } from "./renderTarget";
import type { BackendPreference, ViewerSettings } from "../stores/viewerSettingsStore";
import { createLogger } from "../utils/logger";

const log = createLogger("RendererFactory");

export interface CreateRendererOptions extends RendererOptions {
  backend?: BackendPreference;
  /** Fall back to Canvas2D when an explicitly requested WebGL2 backend fails. `auto` always falls back. */
  fallbackToCanvas2D?: boolean;
}

/** Map viewer settings onto renderer construction options. */
export function rendererOptionsFromSettings(settings: ViewerSettings): CreateRendererOptions {
  return {
    backend: settings.backend,
    fallbackToCanvas2D: settings.fallbackToCanvas2D,
    capacity: settings.indexCapacity,
    maxDepth: settings.indexMaxDepth,
    boundsPadding: settings.boundsPadding,
    defaultOpacity: settings.defaultOpacity,
    showFill: settings.showFill,
    showStroke: settings.showStroke,
    showText: settings.showText,
    backgroundColor: settings.backgroundColor,
  };
}

function construct(backend: RendererBackend, target: RenderTarget, options: RendererOptions): LayoutRenderer {
  return backend === "webgl2" ? new WebGLRenderer(target, options) : new Canvas2DRenderer(target, options);
}

/**
 * Bring the WebGL2 backend up on a scratch surface and tear it down again.
 * Returns the failure, or null when it worked or the target offers no scratch.
 */
async function tryWebGL2OnScratch(target: RenderTarget): Promise<unknown> {
  const scratch = target.createScratch?.();
  if (!scratch) return null;
  const trial = new WebGLRenderer(scratch);
  try {
    await trial.initialize();
    return null;
  } catch (err) {
    return err;
  } finally {
    trial.dispose();
  }
}

/**
 * Create and initialize a renderer. `auto` tries WebGL2 first; a failed
 * WebGL2 init falls back to Canvas2D unless fallback is disabled.
 *
 * WebGL2 is tried on a scratch surface first, so a failure there leaves the
 * target unbound for Canvas2D. A failure on the target itself after a
 * successful scratch run binds it to WebGL2, and the fallback then rejects.
 */
export async function createRenderer(
  target: RenderTarget,
  options: CreateRendererOptions = {},
): Promise<LayoutRenderer> {
  const { backend = "auto", fallbackToCanvas2D = true, ...rendererOptions } = options;

  if (backend !== "canvas2d") {
    let failure = await tryWebGL2OnScratch(target);
    if (failure === null) {
      const renderer = new WebGLRenderer(target, rendererOptions);
      try {
        await renderer.initialize();
        log.info("Using WebGL2 renderer");
        return renderer;
      } catch (err) {
        renderer.dispose();
        failure = err;
      }
    }
    if (backend === "webgl2" && !fallbackToCanvas2D) throw failure;
    log.warn("WebGL2 init failed, falling back to Canvas2D:", failure instanceof Error ? failure.message : failure);
  }

  const renderer = new Canvas2DRenderer(target, rendererOptions);
  await renderer.initialize();
  log.info(backend === "canvas2d" ? "Using Canvas2D renderer" : "Using Canvas2D renderer (fallback)");
  return renderer;
}

/**
 * Dispose `current` and bring up `backend` on `target`, re-attaching the
 * current scene graph, layer styles and render options without a rebuild.
 *
 * Switching between webgl2 and canvas2d needs a fresh target (a new canvas):
 * the one `current` drew into stays bound to its context kind.
 */
export async function switchBackend(
  current: LayoutRenderer,
  target: RenderTarget,
  backend: RendererBackend,
  options: RendererOptions = {},
): Promise<LayoutRenderer> {
  const sceneGraph = current.getSceneGraph();
  const renderOptions = current.getRenderOptions();
  const styles = sceneGraph.getLayerGroups().map((g) => ({
    layer: g.layer,
    dataType: g.dataType,
    style: current.getLayerStyle(g.layer, g.dataType),
  }));

  current.dispose();

  const next = construct(backend, target, { ...options, ...renderOptions, sceneGraph });
  try {
    await next.initialize();
  } catch (err) {
    next.dispose();
    throw err instanceof RendererInitError
      ? err
      : new RendererInitError(backend, "Backend switch failed", { cause: err });
  }

  for (const { layer, dataType, style } of styles) next.setLayerStyle(layer, dataType, style);
  log.info(`Switched ${current.backend} → ${next.backend}`);
  return next;
}
