/**
 * Viewer Settings Store — backend choice, spatial-index tuning, render
 * options and log level.
 *
 * Renderers read a snapshot of these values at construction, so the store
 * is optional for library users who configure renderers directly.
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import { useStore } from "zustand";
import { isLogLevel, setLogLevel, type LogLevel } from "../utils/logger";

/* ------------------------------------------------------------------ */
/*  Types                                                             */
/* ------------------------------------------------------------------ */

export type BackendPreference = "auto" | "canvas2d" | "webgl2";

export interface ViewerSettings {
  backend: BackendPreference;
  fallbackToCanvas2D: boolean;
  indexCapacity: number;
  indexMaxDepth: number;
  boundsPadding: number;
  showFill: boolean;
  showStroke: boolean;
  showText: boolean;
  defaultOpacity: number;
  backgroundColor: string;
  logLevel: LogLevel;
}

export interface ViewerSettingsState {
  settings: ViewerSettings;
  update: (partial: Partial<ViewerSettings>) => void;
  reset: () => void;
}

export type ViewerSettingsStore = StoreApi<ViewerSettingsState>;

/* ------------------------------------------------------------------ */
/*  Defaults & validation                                             */
/* ------------------------------------------------------------------ */

export const DEFAULT_VIEWER_SETTINGS: Readonly<ViewerSettings> = Object.freeze({
  backend: "auto",
  fallbackToCanvas2D: true,
  indexCapacity: 8,
  indexMaxDepth: 10,
  boundsPadding: 1.1,
  showFill: true,
  showStroke: true,
  showText: true,
  defaultOpacity: 0.7,
  backgroundColor: "#1a1a1a",
  logLevel: "info",
});

const BACKENDS: readonly BackendPreference[] = ["auto", "canvas2d", "webgl2"];

function clamp(v: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, v));
}

/** Merge `partial` onto `base`, clamping numeric ranges and dropping invalid enums. */
export function sanitizeSettings(base: ViewerSettings, partial: Partial<ViewerSettings>): ViewerSettings {
  const next: ViewerSettings = { ...base, ...partial };

  if (!BACKENDS.includes(next.backend)) next.backend = base.backend;
  if (!isLogLevel(next.logLevel)) next.logLevel = base.logLevel;

  next.indexCapacity = Math.max(1, Math.floor(next.indexCapacity));
  next.indexMaxDepth = clamp(Math.floor(next.indexMaxDepth), 0, 32);
  next.boundsPadding = Math.max(1, next.boundsPadding);
  next.defaultOpacity = clamp(next.defaultOpacity, 0, 1);
  return next;
}

/* ------------------------------------------------------------------ */
/*  Store                                                             */
/* ------------------------------------------------------------------ */

export function createViewerSettingsStore(overrides: Partial<ViewerSettings> = {}): ViewerSettingsStore {
  const initial = sanitizeSettings({ ...DEFAULT_VIEWER_SETTINGS }, overrides);

  return createStore<ViewerSettingsState>()((set, get) => ({
    settings: initial,

    update: (partial) => {
      const settings = sanitizeSettings(get().settings, partial);
      if (settings.logLevel !== get().settings.logLevel) setLogLevel(settings.logLevel);
      set({ settings });
    },

    reset: () => {
      setLogLevel(DEFAULT_VIEWER_SETTINGS.logLevel);
      set({ settings: { ...DEFAULT_VIEWER_SETTINGS } });
    },
  }));
}

/** Application-wide instance. */
export const viewerSettingsStore = createViewerSettingsStore();

export function useViewerSettings<T>(selector: (s: ViewerSettingsState) => T): T {
  return useStore(viewerSettingsStore, selector);
}
