/**
 * GPU buffer pairs (vertex + index) and the pool that recycles them.
 *
 * Handles are owned by the backend that created the pool: batches acquire
 * on first upload and release on disposal, and `BufferPool.dispose()`
 * deletes every handle it ever handed out.
 */

import type { GpuContext } from "./gpuContext";
import { createLogger } from "../utils/logger";

const log = createLogger("WebGL");

// ══════════════════════════════════════════════════════════════════════
// Geometry buffer
// ══════════════════════════════════════════════════════════════════════

export class GeometryBuffer {
  readonly id: number;
  private readonly gl: GpuContext;
  private vertexBuffer: WebGLBuffer | null;
  private indexBuffer: WebGLBuffer | null;
  private _vertexCount = 0;
  private _indexCount = 0;

  private constructor(gl: GpuContext, id: number, vbo: WebGLBuffer, ibo: WebGLBuffer) {
    this.gl = gl;
    this.id = id;
    this.vertexBuffer = vbo;
    this.indexBuffer = ibo;
  }

  /** Throws when the context cannot allocate buffers (lost context). */
  static create(gl: GpuContext, id: number): GeometryBuffer {
    const vbo = gl.createBuffer();
    const ibo = gl.createBuffer();
    if (!vbo || !ibo) {
      gl.deleteBuffer(vbo);
      gl.deleteBuffer(ibo);
      throw new Error("GPU buffer allocation failed");
    }
    return new GeometryBuffer(gl, id, vbo, ibo);
  }

  get vertexCount(): number {
    return this._vertexCount;
  }

  get indexCount(): number {
    return this._indexCount;
  }

  get isDisposed(): boolean {
    return this.vertexBuffer === null;
  }

  upload(vertices: Float32Array, indices: Uint32Array): void {
    const { gl } = this;
    if (!this.vertexBuffer || !this.indexBuffer) {
      log.warn(`upload() on disposed buffer #${this.id}`);
      return;
    }
    gl.bindBuffer(gl.ARRAY_BUFFER, this.vertexBuffer);
    gl.bufferData(gl.ARRAY_BUFFER, vertices, gl.STATIC_DRAW);
    gl.bindBuffer(gl.ELEMENT_ARRAY_BUFFER, this.indexBuffer);
    gl.bufferData(gl.ELEMENT_ARRAY_BUFFER, indices, gl.STATIC_DRAW);
    this._vertexCount = vertices.length / 2;
    this._indexCount = indices.length;
  }

  /** Bind both buffers and point `positionLocation` at the xy vertex stream. */
  bind(positionLocation: number): boolean {
    const { gl } = this;
    if (!this.vertexBuffer || !this.indexBuffer) return false;
    gl.bindBuffer(gl.ARRAY_BUFFER, this.vertexBuffer);
    gl.enableVertexAttribArray(positionLocation);
    gl.vertexAttribPointer(positionLocation, 2, gl.FLOAT, false, 0, 0);
    gl.bindBuffer(gl.ELEMENT_ARRAY_BUFFER, this.indexBuffer);
    return true;
  }

  dispose(): void {
    if (this.isDisposed) return;
    this.gl.deleteBuffer(this.vertexBuffer);
    this.gl.deleteBuffer(this.indexBuffer);
    this.vertexBuffer = null;
    this.indexBuffer = null;
    this._vertexCount = 0;
    this._indexCount = 0;
  }
}

// ══════════════════════════════════════════════════════════════════════
// Buffer pool
// ══════════════════════════════════════════════════════════════════════

export interface BufferPoolStatistics {
  total: number;
  inUse: number;
  available: number;
}

export class BufferPool {
  private readonly gl: GpuContext;
  private readonly maxIdle: number;
  private readonly available: GeometryBuffer[] = [];
  private readonly inUse = new Set<GeometryBuffer>();
  private nextId = 1;

  constructor(gl: GpuContext, maxIdle = 16) {
    this.gl = gl;
    this.maxIdle = maxIdle;
  }

  acquire(): GeometryBuffer {
    const buffer = this.available.pop() ?? GeometryBuffer.create(this.gl, this.nextId++);
    this.inUse.add(buffer);
    return buffer;
  }

  /** Return a handle for reuse; handles beyond the idle limit are deleted. */
  release(buffer: GeometryBuffer): void {
    if (!this.inUse.delete(buffer)) return;
    if (this.available.length < this.maxIdle) this.available.push(buffer);
    else buffer.dispose();
  }

  getStatistics(): BufferPoolStatistics {
    return {
      total: this.inUse.size + this.available.length,
      inUse: this.inUse.size,
      available: this.available.length,
    };
  }

  dispose(): void {
    for (const b of this.inUse) b.dispose();
    for (const b of this.available) b.dispose();
    this.inUse.clear();
    this.available.length = 0;
  }
}
