/**
 * ShaderProgram — compiles and links once, caches uniform and attribute
 * locations, and exposes typed setters for the fill shader's uniforms.
 */

import type { GpuContext } from "./gpuContext";
import { FILL_ATTRIBUTES, FILL_UNIFORMS } from "./shaders";

export type FillUniform = (typeof FILL_UNIFORMS)[number];
export type FillAttribute = (typeof FILL_ATTRIBUTES)[number];

export class ShaderProgram {
  private readonly gl: GpuContext;
  private program: WebGLProgram | null;
  private readonly uniforms: Map<FillUniform, WebGLUniformLocation | null>;
  private readonly attributes: Map<FillAttribute, number>;

  private constructor(
    gl: GpuContext,
    program: WebGLProgram,
    uniforms: Map<FillUniform, WebGLUniformLocation | null>,
    attributes: Map<FillAttribute, number>,
  ) {
    this.gl = gl;
    this.program = program;
    this.uniforms = uniforms;
    this.attributes = attributes;
  }

  /** Throws with the driver's info log on compile or link failure. */
  static create(gl: GpuContext, vertexSource: string, fragmentSource: string): ShaderProgram {
    const vertexShader = compileShader(gl, gl.VERTEX_SHADER, vertexSource, "Vertex");
    let fragmentShader: WebGLShader;
    try {
      fragmentShader = compileShader(gl, gl.FRAGMENT_SHADER, fragmentSource, "Fragment");
    } catch (err) {
      gl.deleteShader(vertexShader);
      throw err;
    }

    const program = gl.createProgram();
    if (!program) {
      gl.deleteShader(vertexShader);
      gl.deleteShader(fragmentShader);
      throw new Error("Failed to create shader program");
    }
    gl.attachShader(program, vertexShader);
    gl.attachShader(program, fragmentShader);
    gl.linkProgram(program);

    // Shaders are no longer needed once linked
    gl.deleteShader(vertexShader);
    gl.deleteShader(fragmentShader);

    if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
      const error = gl.getProgramInfoLog(program);
      gl.deleteProgram(program);
      throw new Error(`Shader program linking failed: ${error}`);
    }

    const uniforms = new Map<FillUniform, WebGLUniformLocation | null>();
    for (const name of FILL_UNIFORMS) uniforms.set(name, gl.getUniformLocation(program, name));
    const attributes = new Map<FillAttribute, number>();
    for (const name of FILL_ATTRIBUTES) attributes.set(name, gl.getAttribLocation(program, name));

    return new ShaderProgram(gl, program, uniforms, attributes);
  }

  get isDisposed(): boolean {
    return this.program === null;
  }

  use(): void {
    this.gl.useProgram(this.program);
  }

  /** -1 when the attribute was optimized out. */
  getAttribLocation(name: FillAttribute): number {
    return this.attributes.get(name) ?? -1;
  }

  getUniformLocation(name: FillUniform): WebGLUniformLocation | null {
    return this.uniforms.get(name) ?? null;
  }

  setViewMatrix(matrix: Float32Array): void {
    this.gl.uniformMatrix3fv(this.getUniformLocation("u_viewMatrix"), false, matrix);
  }

  setColor([r, g, b, a]: readonly [number, number, number, number]): void {
    this.gl.uniform4f(this.getUniformLocation("u_color"), r, g, b, a);
  }

  setOpacity(opacity: number): void {
    this.gl.uniform1f(this.getUniformLocation("u_opacity"), opacity);
  }

  dispose(): void {
    if (!this.program) return;
    this.gl.deleteProgram(this.program);
    this.program = null;
  }
}

function compileShader(gl: GpuContext, type: number, source: string, label: string): WebGLShader {
  const shader = gl.createShader(type);
  if (!shader) throw new Error(`${label} shader creation failed`);
  gl.shaderSource(shader, source);
  gl.compileShader(shader);

  if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
    const error = gl.getShaderInfoLog(shader);
    gl.deleteShader(shader);
    throw new Error(`${label} shader compilation failed: ${error}`);
  }
  return shader;
}
