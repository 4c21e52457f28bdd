import { existsSync } from "node:fs";

export type EnvSource = Record<string, string | undefined>;

// Post-processing hooks of OrcaSlicer, SuperSlicer, PrusaSlicer/Slic3r and Bambu Studio.
export const LAYER_HEIGHT_ENV_VARS = [
  "ORCASLICER_LAYER_HEIGHT",
  "SUPERSLICER_LAYER_HEIGHT",
  "SLIC3R_LAYER_HEIGHT",
  "BAMBU_LAYER_HEIGHT",
  "LAYER_HEIGHT",
  "layer_height",
  "LAYERHEIGHT",
] as const;

export const OUTPUT_PATH_ENV_VARS = [
  "ORCASLICER_GCODE_OUTPUT_PATH",
  "SUPERSLICER_GCODE_OUTPUT_PATH",
  "SLIC3R_PP_OUTPUT_NAME",
  "BAMBU_GCODE_PATH",
] as const;

export const resolveLayerHeightFromEnv = (env: EnvSource): number | undefined => {
  for (const key of LAYER_HEIGHT_ENV_VARS) {
    const raw = env[key]?.trim();
    if (!raw) continue;
    const value = Number(raw);
    if (Number.isFinite(value) && value > 0) return value;
  }
  return undefined;
};

export const resolveInputPathFromEnv = (
  env: EnvSource,
  exists: (candidate: string) => boolean = existsSync,
): string | undefined => {
  for (const key of OUTPUT_PATH_ENV_VARS) {
    const candidate = env[key];
    if (candidate && exists(candidate)) return candidate;
  }
  return undefined;
};
