/**
 * Retarget Settings Store - tunable pipeline defaults
 *
 * Holds the option overrides every new RetargetSession starts from.
 * Vanilla store: usable from render loops and workers without React.
 */

import { createStore } from "zustand/vanilla";
import {
  DEFAULT_SMOOTHING_CONFIG,
  resolveSmoothingConfig,
  type SmoothingConfig,
} from "../lib/signal/SmoothingEngine";
import {
  DEFAULT_RETARGETER_OPTIONS,
  type RetargeterOptions,
} from "../retarget/Retargeter";
import {
  DEFAULT_POSE_MAPPER_OPTIONS,
  type PoseMapperOptions,
} from "../biomech/PoseMapper";

export type RetargetTuning = Omit<RetargeterOptions, "smoothing">;

export interface RetargetSettings {
  smoothing: SmoothingConfig;
  retarget: RetargetTuning;
  mapper: PoseMapperOptions;
  /** Timestamp step used when frames arrive without one */
  nominalFps: number;
}

interface RetargetSettingsState {
  settings: RetargetSettings;

  // Actions
  updateSmoothing: (patch: Partial<SmoothingConfig>) => void;
  updateRetarget: (patch: Partial<RetargetTuning>) => void;
  updateMapper: (patch: Partial<PoseMapperOptions>) => void;
  setNominalFps: (fps: number) => void;
  resetToDefaults: () => void;
}

function defaultSettings(): RetargetSettings {
  const { smoothing: _ignored, ...retarget } = DEFAULT_RETARGETER_OPTIONS;
  return {
    smoothing: resolveSmoothingConfig(DEFAULT_SMOOTHING_CONFIG),
    retarget,
    mapper: { ...DEFAULT_POSE_MAPPER_OPTIONS },
    nominalFps: 30,
  };
}

export const useRetargetSettingsStore = createStore<RetargetSettingsState>(
  (set) => ({
    settings: defaultSettings(),

    updateSmoothing: (patch) => {
      set((state) => ({
        settings: {
          ...state.settings,
          smoothing: resolveSmoothingConfig({
            ...state.settings.smoothing,
            ...patch,
          }),
        },
      }));
    },

    updateRetarget: (patch) => {
      set((state) => ({
        settings: {
          ...state.settings,
          retarget: { ...state.settings.retarget, ...patch },
        },
      }));
    },

    updateMapper: (patch) => {
      set((state) => ({
        settings: {
          ...state.settings,
          mapper: { ...state.settings.mapper, ...patch },
        },
      }));
    },

    setNominalFps: (fps) => {
      if (!(fps > 0)) return;
      set((state) => ({ settings: { ...state.settings, nominalFps: fps } }));
    },

    resetToDefaults: () => {
      set({ settings: defaultSettings() });
    },
  }),
);
