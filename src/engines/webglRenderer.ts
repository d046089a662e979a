/**
 * WebGL Renderer — GPU-batched backend.
 *
 * Architecture:
 *   1. On init, compile the fill program and create the buffer pool.
 *   2. On every scene change, diff layer memberships into per-layer batches.
 *   3. Per frame, upload only the view matrix, then issue one drawElements
 *      per visible layer that has something on screen.
 *
 * Draw calls scale with the number of visible layers, not elements.
 */

import type { Viewport } from "./sceneGraph";
import {
  BaseRenderer,
  RendererInitError,
  type FrameResult,
  type LayerDrawList,
  type RendererCapabilities,
  type RendererOptions,
  type ViewTransform,
} from "./layoutRenderer";
import type { GpuContext } from "./gpuContext";
import type { RenderTarget } from "./renderTarget";
import { BufferPool, type BufferPoolStatistics } from "./geometryBuffer";
import { LayerBatchManager, type BatchStatistics } from "./layerBatch";
import { ShaderProgram } from "./shaderProgram";
import { FILL_FRAGMENT_SHADER, FILL_VERTEX_SHADER } from "./shaders";
import { hexToRgbaArray } from "../utils/color";

/**
 * Column-major mat3 taking world coordinates to clip space for `view`.
 */
export function computeClipMatrix(view: ViewTransform): Float32Array {
  const sx = (2 * view.scale) / view.width;
  const sy = (2 * view.scale) / view.height;
  const tx = (2 * view.offsetX) / view.width - 1;
  const ty = 1 - (2 * view.offsetY) / view.height;
  return new Float32Array([
    sx, 0, 0,
    0, sy, 0,
    tx, ty, 1,
  ]);
}

interface GpuResources {
  gl: GpuContext;
  program: ShaderProgram;
  pool: BufferPool;
  batches: LayerBatchManager;
}

export class WebGLRenderer extends BaseRenderer {
  readonly backend = "webgl2" as const;
  private readonly target: RenderTarget;
  private gpu: GpuResources | null = null;

  constructor(target: RenderTarget, options: RendererOptions = {}) {
    super(options, "WebGL");
    this.target = target;
  }

  getCapabilities(): RendererCapabilities {
    const size = this.gpu ? Number(this.gpu.gl.getParameter(this.gpu.gl.MAX_TEXTURE_SIZE)) : 0;
    return { backend: "webgl2", batched: true, maxTextureSize: Number.isFinite(size) ? size : 0 };
  }

  getBatchStatistics(): BatchStatistics | null {
    return this.gpu?.batches.getStatistics() ?? null;
  }

  getBufferPoolStatistics(): BufferPoolStatistics | null {
    return this.gpu?.pool.getStatistics() ?? null;
  }

  // ── Lifecycle ──

  protected initializeBackend(): void {
    const gl = this.target.getWebGL2();
    if (!gl) throw new RendererInitError("webgl2", "WebGL2 context unavailable");

    let program: ShaderProgram;
    try {
      program = ShaderProgram.create(gl, FILL_VERTEX_SHADER, FILL_FRAGMENT_SHADER);
    } catch (err) {
      throw new RendererInitError("webgl2", "Fill program could not be built", { cause: err });
    }

    const pool = new BufferPool(gl);
    this.gpu = { gl, program, pool, batches: new LayerBatchManager(pool) };

    gl.enable(gl.BLEND);
    gl.blendFunc(gl.SRC_ALPHA, gl.ONE_MINUS_SRC_ALPHA);
  }

  protected disposeBackend(): void {
    if (!this.gpu) return;
    const { batches, pool, program } = this.gpu;
    batches.dispose();
    pool.dispose();
    program.dispose();
    this.gpu = null;
  }

  protected onSceneChanged(): void {
    if (!this.gpu) return;
    const { created, changed, removed } = this.gpu.batches.sync(this.sceneGraph.getLayerGroups());
    this.log.debug(`Batches synced: +${created.length} ~${changed.length} -${removed.length}`);
  }

  // ── Frame ──

  protected drawLayers(layers: LayerDrawList[], view: ViewTransform, viewport: Viewport): FrameResult {
    if (!this.gpu) return { drawCalls: 0 };
    const { gl, program, batches } = this.gpu;

    const [r, g, b] = hexToRgbaArray(this.renderOptions.backgroundColor, 1);
    gl.viewport(0, 0, view.width, view.height);
    gl.clearColor(r, g, b, 1);
    gl.clear(gl.COLOR_BUFFER_BIT);

    if (!this.renderOptions.showFill) return { drawCalls: 0, triangles: 0 };

    program.use();
    program.setViewMatrix(computeClipMatrix(view));
    const position = program.getAttribLocation("a_position");

    let drawCalls = 0;
    let triangles = 0;
    for (const layer of layers) {
      if (!layer.style.fill) continue;
      const batch = batches.prepare(layer.key);
      if (!batch || batch.indexCount === 0) continue;

      program.setColor(hexToRgbaArray(layer.style.color, 1));
      program.setOpacity(layer.style.opacity);
      const calls = batch.draw(gl, position);
      drawCalls += calls;
      if (calls > 0) triangles += batch.triangleCount;
    }

    if (this.debugMode) {
      const s = batches.getStatistics();
      this.log.debug(
        `zoom ${viewport.zoom.toFixed(3)}: ${drawCalls} draws, ${triangles} triangles, ` +
          `${s.batchCount} batches (${s.dirtyCount} dirty, ${s.rebuilds} rebuilds)`,
      );
    }
    return { drawCalls, triangles };
  }
}
