/**
 * Layer Style Store — per-renderer color/opacity registry keyed by
 * (layer, dataType). Unset layers get a generated palette color.
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import type { LayerKey } from "../engines/layoutModel";
import { layerKeyString } from "../engines/layoutModel";
import { paletteColor } from "../utils/color";

// ── Types ─────────────────────────────────────────────────────────────

export interface LayerStyle {
  /** `#rrggbb` */
  color: string;
  opacity: number;
  fill: boolean;
  stroke: boolean;
  /** Screen pixels. */
  lineWidth: number;
}

export interface LayerStyleState {
  styles: Map<string, LayerStyle>;
  defaultOpacity: number;

  getStyle: (layer: number, dataType: number) => LayerStyle;
  setStyle: (layer: number, dataType: number, style: Partial<LayerStyle>) => void;
  /** Store generated styles for keys not yet registered. */
  ensureStyles: (keys: LayerKey[]) => void;
  setDefaultOpacity: (opacity: number) => void;
  clear: () => void;
}

export type LayerStyleStore = StoreApi<LayerStyleState>;

function clamp01(v: number): number {
  return Math.min(1, Math.max(0, v));
}

export function generateLayerStyle(layer: number, dataType: number, opacity: number): LayerStyle {
  return {
    color: paletteColor(layer, dataType),
    opacity: clamp01(opacity),
    fill: true,
    stroke: true,
    lineWidth: 1,
  };
}

// ── Store ─────────────────────────────────────────────────────────────

export function createLayerStyleStore(defaultOpacity = 0.7): LayerStyleStore {
  return createStore<LayerStyleState>()((set, get) => ({
    styles: new Map(),
    defaultOpacity: clamp01(defaultOpacity),

    getStyle: (layer, dataType) => {
      const { styles, defaultOpacity: opacity } = get();
      return styles.get(layerKeyString(layer, dataType)) ?? generateLayerStyle(layer, dataType, opacity);
    },

    setStyle: (layer, dataType, style) => {
      const current = get().getStyle(layer, dataType);
      const next: LayerStyle = { ...current, ...style };
      next.opacity = clamp01(next.opacity);
      next.lineWidth = Math.max(0, next.lineWidth);
      set((s) => {
        const styles = new Map(s.styles);
        styles.set(layerKeyString(layer, dataType), next);
        return { styles };
      });
    },

    ensureStyles: (keys) => {
      const { styles, defaultOpacity: opacity } = get();
      const missing = keys.filter((k) => !styles.has(layerKeyString(k.layer, k.dataType)));
      if (missing.length === 0) return;
      set((s) => {
        const next = new Map(s.styles);
        for (const k of missing) {
          next.set(layerKeyString(k.layer, k.dataType), generateLayerStyle(k.layer, k.dataType, opacity));
        }
        return { styles: next };
      });
    },

    setDefaultOpacity: (opacity) => set({ defaultOpacity: clamp01(opacity) }),

    clear: () => set({ styles: new Map() }),
  }));
}
