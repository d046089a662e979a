/**
 * The slice of WebGL2RenderingContext the batched backend drives.
 * A real context satisfies it structurally; tests pass a recording fake.
 */

export interface GpuContext {
  readonly ARRAY_BUFFER: number;
  readonly ELEMENT_ARRAY_BUFFER: number;
  readonly STATIC_DRAW: number;
  readonly FLOAT: number;
  readonly UNSIGNED_INT: number;
  readonly TRIANGLES: number;
  readonly VERTEX_SHADER: number;
  readonly FRAGMENT_SHADER: number;
  readonly COMPILE_STATUS: number;
  readonly LINK_STATUS: number;
  readonly COLOR_BUFFER_BIT: number;
  readonly BLEND: number;
  readonly SRC_ALPHA: number;
  readonly ONE_MINUS_SRC_ALPHA: number;
  readonly MAX_TEXTURE_SIZE: number;

  readonly drawingBufferWidth: number;
  readonly drawingBufferHeight: number;

  // Shaders & programs
  createShader(type: number): WebGLShader | null;
  shaderSource(shader: WebGLShader, source: string): void;
  compileShader(shader: WebGLShader): void;
  getShaderParameter(shader: WebGLShader, pname: number): unknown;
  getShaderInfoLog(shader: WebGLShader): string | null;
  deleteShader(shader: WebGLShader | null): void;
  createProgram(): WebGLProgram | null;
  attachShader(program: WebGLProgram, shader: WebGLShader): void;
  linkProgram(program: WebGLProgram): void;
  getProgramParameter(program: WebGLProgram, pname: number): unknown;
  getProgramInfoLog(program: WebGLProgram): string | null;
  deleteProgram(program: WebGLProgram | null): void;
  useProgram(program: WebGLProgram | null): void;
  getUniformLocation(program: WebGLProgram, name: string): WebGLUniformLocation | null;
  getAttribLocation(program: WebGLProgram, name: string): number;

  // Uniforms
  uniformMatrix3fv(location: WebGLUniformLocation | null, transpose: boolean, data: Float32Array): void;
  uniform4f(location: WebGLUniformLocation | null, x: number, y: number, z: number, w: number): void;
  uniform1f(location: WebGLUniformLocation | null, x: number): void;

  // Buffers
  createBuffer(): WebGLBuffer | null;
  bindBuffer(target: number, buffer: WebGLBuffer | null): void;
  bufferData(target: number, data: Float32Array | Uint32Array, usage: number): void;
  deleteBuffer(buffer: WebGLBuffer | null): void;
  enableVertexAttribArray(index: number): void;
  vertexAttribPointer(index: number, size: number, type: number, normalized: boolean, stride: number, offset: number): void;

  // Frame
  viewport(x: number, y: number, width: number, height: number): void;
  clearColor(r: number, g: number, b: number, a: number): void;
  clear(mask: number): void;
  enable(cap: number): void;
  blendFunc(sfactor: number, dfactor: number): void;
  drawElements(mode: number, count: number, type: number, offset: number): void;
  getParameter(pname: number): unknown;
  isContextLost(): boolean;
}
