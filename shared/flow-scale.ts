import { z } from "zod";

export const DEFAULT_DEBUG_FILE = "/tmp/flow_scale_debug.txt";

export const ExtrusionMode = z.enum(["absolute", "relative"]);
export type TExtrusionMode = z.infer<typeof ExtrusionMode>;

const boundedRange = (bound: z.ZodNumber, label: string) =>
  z
    .object({
      start: bound.optional(),
      end: bound.optional(),
    })
    .refine((range) => range.start === undefined || range.end === undefined || range.start <= range.end, {
      message: `${label} start must not exceed ${label} end`,
    });

export const ZRange = boundedRange(z.number().finite(), "Z");
export type TZRange = z.infer<typeof ZRange>;

export const LayerRange = boundedRange(z.number().int().nonnegative(), "layer");
export type TLayerRange = z.infer<typeof LayerRange>;

/**
 * Resolved settings for one rewrite run. Built once by the config resolver,
 * never read from the environment by the rewriter itself.
 */
export const ScalingConfig = z
  .object({
    flowRatio: z.number().finite().positive(),
    zRange: ZRange.optional(),
    layerRange: LayerRange.optional(),
    layerHeight: z.number().finite().positive().optional(),
    force: z.boolean().default(false),
    debug: z.boolean().default(false),
  })
  .refine((cfg) => cfg.layerRange === undefined || cfg.layerHeight !== undefined, {
    message: "layer height is required when a layer range is given",
    path: ["layerHeight"],
  });

export type TScalingConfig = z.infer<typeof ScalingConfig>;
export type TScalingConfigInput = z.input<typeof ScalingConfig>;

export const RunStats = z.object({
  linesTotal: z.number().int().nonnegative(),
  linesModified: z.number().int().nonnegative(),
  g92Resets: z.number().int().nonnegative(),
  candidateLines: z.number().int().nonnegative(),
  inRangeLines: z.number().int().nonnegative(),
  malformedLines: z.number().int().nonnegative(),
  firstScaledLine: z.number().int().positive().nullable(),
  flowRatio: z.number(),
  zRange: ZRange.nullable(),
  layerRange: LayerRange.nullable(),
  layerHeight: z.number().nullable(),
  finalExtrusionMode: ExtrusionMode,
});

export type TRunStats = z.infer<typeof RunStats>;
