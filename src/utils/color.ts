/**
 * Color helpers shared by the Canvas2D and WebGL backends.
 */

/** Parse `#rgb` or `#rrggbb`; null for anything else. */
export function parseHex(hex: string): [number, number, number] | null {
  const h = hex.trim().replace(/^#/, "");
  if (/^[0-9a-f]{3}$/i.test(h)) {
    return [
      parseInt(h[0] + h[0], 16),
      parseInt(h[1] + h[1], 16),
      parseInt(h[2] + h[2], 16),
    ];
  }
  if (/^[0-9a-f]{6}$/i.test(h)) {
    return [
      parseInt(h.slice(0, 2), 16),
      parseInt(h.slice(2, 4), 16),
      parseInt(h.slice(4, 6), 16),
    ];
  }
  return null;
}

const FALLBACK_RGB: [number, number, number] = [128, 128, 128];

export function hexToRgba(hex: string, alpha: number): string {
  const [r, g, b] = parseHex(hex) ?? FALLBACK_RGB;
  return `rgba(${r}, ${g}, ${b}, ${alpha})`;
}

/** Normalized 0..1 components for shader uniforms. */
export function hexToRgbaArray(hex: string, alpha: number): [number, number, number, number] {
  const [r, g, b] = parseHex(hex) ?? FALLBACK_RGB;
  return [r / 255, g / 255, b / 255, alpha];
}

function toHex2(v: number): string {
  return Math.round(Math.min(255, Math.max(0, v))).toString(16).padStart(2, "0");
}

/** h in degrees, s and l in 0..1. */
export function hslToHex(h: number, s: number, l: number): string {
  const hue = ((h % 360) + 360) % 360;
  const c = (1 - Math.abs(2 * l - 1)) * s;
  const x = c * (1 - Math.abs(((hue / 60) % 2) - 1));
  const m = l - c / 2;

  let rgb: [number, number, number];
  if (hue < 60) rgb = [c, x, 0];
  else if (hue < 120) rgb = [x, c, 0];
  else if (hue < 180) rgb = [0, c, x];
  else if (hue < 240) rgb = [0, x, c];
  else if (hue < 300) rgb = [x, 0, c];
  else rgb = [c, 0, x];

  return `#${rgb.map((v) => toHex2((v + m) * 255)).join("")}`;
}

const GOLDEN_ANGLE = 137.508;

/** Deterministic, well-spread color for a layer key. */
export function paletteColor(layer: number, dataType: number): string {
  const hue = (layer * GOLDEN_ANGLE + dataType * 47) % 360;
  return hslToHex(hue, 0.7, 0.55);
}
