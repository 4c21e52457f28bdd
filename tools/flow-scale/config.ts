import { existsSync } from "node:fs";
import {
  DEFAULT_DEBUG_FILE,
  ScalingConfig,
  type TLayerRange,
  type TScalingConfig,
  type TZRange,
} from "../../shared/flow-scale";
import { resolveInputPathFromEnv, resolveLayerHeightFromEnv, type EnvSource } from "./slicer-env";

export class FlowScaleConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FlowScaleConfigError";
  }
}

export const STDIO_PATH = "-";

export const USAGE =
  "Usage: flow-scale -r <ratio> [-i in.gcode] [-o out.gcode|-] [-z <z-start>] [-Z <z-end>] " +
  "[-l <layer>|<start:end>] [-L <layer-height>] [-f] [-p] [-d] [-D [debug-file]] [input.gcode]";

export type ParsedArgs = {
  inFile?: string;
  outFile?: string;
  flowRatio?: string;
  zStart?: string;
  zEnd?: string;
  layers?: string;
  layerHeight?: string;
  debugFile?: string;
  force: boolean;
  inPlace: boolean;
  debug: boolean;
  help: boolean;
  positional: string[];
};

type ValueKey = "inFile" | "outFile" | "flowRatio" | "zStart" | "zEnd" | "layers" | "layerHeight";
type SwitchKey = "force" | "inPlace" | "debug" | "help";

const VALUE_FLAGS: Record<string, ValueKey> = {
  "-i": "inFile",
  "--in": "inFile",
  "-o": "outFile",
  "--out": "outFile",
  "-r": "flowRatio",
  "--flow-ratio": "flowRatio",
  "-z": "zStart",
  "--z-start": "zStart",
  "-Z": "zEnd",
  "--z-end": "zEnd",
  "-l": "layers",
  "--layers": "layers",
  "-L": "layerHeight",
  "--layer-height": "layerHeight",
};

const SWITCH_FLAGS: Record<string, SwitchKey> = {
  "-f": "force",
  "--force": "force",
  "-p": "inPlace",
  "--inplace": "inPlace",
  "-d": "debug",
  "--debug": "debug",
  "-h": "help",
  "--help": "help",
};

const DEBUG_FILE_FLAGS = new Set(["-D", "--debug-file"]);

export function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    force: false,
    inPlace: false,
    debug: false,
    help: false,
    positional: [],
  };

  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    const eq = token.startsWith("--") ? token.indexOf("=") : -1;
    const flag = eq === -1 ? token : token.slice(0, eq);
    const inline = eq === -1 ? undefined : token.slice(eq + 1);

    const valueKey = VALUE_FLAGS[flag];
    if (valueKey) {
      const value = inline ?? args[i + 1];
      if (value === undefined) {
        throw new FlowScaleConfigError(`Missing value for ${flag}`);
      }
      if (inline === undefined) i += 1;
      parsed[valueKey] = value;
      continue;
    }

    const switchKey = SWITCH_FLAGS[flag];
    if (switchKey) {
      if (inline !== undefined) {
        throw new FlowScaleConfigError(`${flag} does not take a value`);
      }
      parsed[switchKey] = true;
      continue;
    }

    if (DEBUG_FILE_FLAGS.has(flag)) {
      const next = args[i + 1];
      if (inline !== undefined) {
        parsed.debugFile = inline || DEFAULT_DEBUG_FILE;
      } else if (next !== undefined && !next.startsWith("-")) {
        parsed.debugFile = next;
        i += 1;
      } else {
        parsed.debugFile = DEFAULT_DEBUG_FILE;
      }
      continue;
    }

    if (token.startsWith("-") && token !== STDIO_PATH) {
      throw new FlowScaleConfigError(`Unknown option: ${token}`);
    }
    parsed.positional.push(token);
  }

  if (parsed.positional.length > 1) {
    throw new FlowScaleConfigError(`Unexpected extra arguments: ${parsed.positional.slice(1).join(" ")}`);
  }
  return parsed;
}

const parseNumberFlag = (flag: string, raw: string | undefined): number | undefined => {
  if (raw === undefined) return undefined;
  const value = Number(raw.trim());
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new FlowScaleConfigError(`Invalid number for ${flag}: ${raw}`);
  }
  return value;
};

const parseLayerIndex = (raw: string, spec: string): number | undefined => {
  const trimmed = raw.trim();
  if (trimmed === "") return undefined;
  if (!/^\d+$/.test(trimmed)) {
    throw new FlowScaleConfigError(`Invalid layer range: ${spec}`);
  }
  return Number(trimmed);
};

/** `3` selects one layer, `2:5` an inclusive range, `2:` and `:5` leave one side open. */
export function parseLayerSpec(spec: string): TLayerRange {
  const parts = spec.split(":");
  if (parts.length > 2) {
    throw new FlowScaleConfigError(`Invalid layer range: ${spec}`);
  }
  if (parts.length === 1) {
    const layer = parseLayerIndex(parts[0], spec);
    if (layer === undefined) {
      throw new FlowScaleConfigError(`Invalid layer range: ${spec}`);
    }
    return { start: layer, end: layer };
  }
  const start = parseLayerIndex(parts[0], spec);
  const end = parseLayerIndex(parts[1], spec);
  if (start === undefined && end === undefined) {
    throw new FlowScaleConfigError(`Invalid layer range: ${spec}`);
  }
  return { start, end };
}

export type ResolvedRun = {
  config: TScalingConfig;
  input: string;
  output: string;
  inPlace: boolean;
  debugToStderr: boolean;
  debugFile?: string;
};

export type ResolveOptions = {
  env?: EnvSource;
  exists?: (candidate: string) => boolean;
};

export function resolveRun(args: ParsedArgs, options: ResolveOptions = {}): ResolvedRun {
  const env = options.env ?? {};
  const exists = options.exists ?? existsSync;

  if (args.flowRatio === undefined) {
    throw new FlowScaleConfigError("Missing required --flow-ratio");
  }
  const flowRatio = parseNumberFlag("--flow-ratio", args.flowRatio);
  const zStart = parseNumberFlag("--z-start", args.zStart);
  const zEnd = parseNumberFlag("--z-end", args.zEnd);
  const layerRange = args.layers !== undefined ? parseLayerSpec(args.layers) : undefined;
  const layerHeight =
    parseNumberFlag("--layer-height", args.layerHeight) ?? resolveLayerHeightFromEnv(env);

  if (layerRange && layerHeight === undefined) {
    throw new FlowScaleConfigError(
      "Layer height not provided and could not be found in the slicer environment",
    );
  }

  const zRange: TZRange | undefined =
    zStart !== undefined || zEnd !== undefined ? { start: zStart, end: zEnd } : undefined;

  const result = ScalingConfig.safeParse({
    flowRatio,
    zRange,
    layerRange,
    layerHeight,
    force: args.force,
    debug: args.debug || args.debugFile !== undefined,
  });
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new FlowScaleConfigError(`Invalid configuration: ${message}`);
  }

  const input = args.inFile ?? resolveInputPathFromEnv(env, exists) ?? args.positional[0] ?? STDIO_PATH;
  if (args.inPlace && input === STDIO_PATH) {
    throw new FlowScaleConfigError("Cannot use --inplace with stdin input");
  }
  const output = args.inPlace ? input : args.outFile ?? STDIO_PATH;

  return {
    config: Object.freeze(result.data),
    input,
    output,
    inPlace: args.inPlace,
    debugToStderr: args.debug,
    debugFile: args.debugFile,
  };
}
