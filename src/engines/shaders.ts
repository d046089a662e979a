/**
 * Fill shader for the batched backend.
 *
 * Vertices arrive in world units; `u_viewMatrix` (column-major mat3)
 * maps them straight to clip space, so pan and zoom only touch this
 * uniform and never the vertex buffers.
 */
export const FILL_VERTEX_SHADER = `#version 300 es

in vec2 a_position;

uniform mat3 u_viewMatrix;

void main() {
  vec3 clip = u_viewMatrix * vec3(a_position, 1.0);
  gl_Position = vec4(clip.xy, 0.0, 1.0);
}
`;

/**
 * Flat per-layer color. `u_opacity` is kept apart from `u_color.a` so a
 * layer's opacity can change without re-deriving its color.
 */
export const FILL_FRAGMENT_SHADER = `#version 300 es

precision mediump float;

uniform vec4 u_color;
uniform float u_opacity;

out vec4 fragColor;

void main() {
  fragColor = vec4(u_color.rgb, u_color.a * u_opacity);
}
`;

export const FILL_UNIFORMS = ["u_viewMatrix", "u_color", "u_opacity"] as const;
export const FILL_ATTRIBUTES = ["a_position"] as const;
