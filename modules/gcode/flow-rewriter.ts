import {
  ScalingConfig,
  type TExtrusionMode,
  type TLayerRange,
  type TRunStats,
  type TScalingConfig,
  type TScalingConfigInput,
  type TZRange,
} from "../../shared/flow-scale";
import {
  findWord,
  formatLike,
  parseGcodeLine,
  parseNumber,
  refreshChecksum,
  replaceWordValue,
  type GcodeWord,
} from "./gcode-words";

export class SafetyValidationError extends Error {
  constructor(public readonly lineNumber: number) {
    super(
      `No G92 E0 reset seen before the first line to scale (line ${lineNumber}); ` +
        "scaling E values from an unknown baseline may over- or under-extrude. " +
        "Use --force to override this check.",
    );
    this.name = "SafetyValidationError";
  }
}

const MOTION_COMMANDS = new Set(["G0", "G1", "G2", "G3"]);
const LAYER_EPSILON = 1e-6;
const Z_TOLERANCE = 1e-9;

const withinZ = (value: number, range: TZRange): boolean => {
  if (range.start !== undefined && value < range.start - Z_TOLERANCE) return false;
  if (range.end !== undefined && value > range.end + Z_TOLERANCE) return false;
  return true;
};

const withinLayers = (value: number, range: TLayerRange): boolean => {
  if (range.start !== undefined && value < range.start) return false;
  if (range.end !== undefined && value > range.end) return false;
  return true;
};

/**
 * Single-pass E-value rewriter. One instance per run: it owns the machine
 * state (height, extrusion mode, E baselines) accumulated from every line
 * it has seen, so lines must be fed in order.
 */
export class FlowRewriter {
  private readonly config: TScalingConfig;
  private currentZ = 0;
  private extrusionMode: TExtrusionMode = "absolute";
  private lastSourceE = 0;
  private lastEmittedE = 0;
  private resetSeen = false;
  private safetyChecked = false;
  private lineNumber = 0;

  private linesModified = 0;
  private g92Resets = 0;
  private candidateLines = 0;
  private inRangeLines = 0;
  private malformedLines = 0;
  private firstScaledLine: number | null = null;

  constructor(config: TScalingConfigInput) {
    this.config = Object.freeze(ScalingConfig.parse(config));
  }

  get currentLayer(): number {
    const { layerHeight } = this.config;
    if (layerHeight === undefined) return 0;
    return Math.floor(this.currentZ / layerHeight + LAYER_EPSILON);
  }

  get z(): number {
    return this.currentZ;
  }

  get mode(): TExtrusionMode {
    return this.extrusionMode;
  }

  process(line: string): string {
    this.lineNumber += 1;
    const output = this.classifyAndRewrite(line);
    if (output !== line) this.linesModified += 1;
    return output;
  }

  stats(): TRunStats {
    return {
      linesTotal: this.lineNumber,
      linesModified: this.linesModified,
      g92Resets: this.g92Resets,
      candidateLines: this.candidateLines,
      inRangeLines: this.inRangeLines,
      malformedLines: this.malformedLines,
      firstScaledLine: this.firstScaledLine,
      flowRatio: this.config.flowRatio,
      zRange: this.config.zRange ?? null,
      layerRange: this.config.layerRange ?? null,
      layerHeight: this.config.layerHeight ?? null,
      finalExtrusionMode: this.extrusionMode,
    };
  }

  private classifyAndRewrite(line: string): string {
    const parsed = parseGcodeLine(line);
    switch (parsed.command) {
      case "M82":
        this.extrusionMode = "absolute";
        return line;
      case "M83":
        this.extrusionMode = "relative";
        return line;
      case "G92":
        // A bare G92 zeroes every axis, E included.
        if (parsed.words.length === 0) this.resetExtrusion(0);
        else this.applyPositionReset(findWord(parsed, "E"));
        return line;
      default:
        break;
    }
    if (parsed.command === null || !MOTION_COMMANDS.has(parsed.command)) return line;

    const zWord = findWord(parsed, "Z");
    const eWord = findWord(parsed, "E");
    const z = zWord ? parseNumber(zWord.raw) : undefined;
    const e = eWord ? parseNumber(eWord.raw) : undefined;
    if (z === null || e === null) {
      this.malformedLines += 1;
      return line;
    }

    if (z !== undefined) this.currentZ = z;
    if (!eWord || e === undefined) return line;

    this.candidateLines += 1;
    if (!this.inRange()) {
      if (this.extrusionMode === "absolute") {
        this.lastSourceE = e;
        this.lastEmittedE = e;
      } else {
        this.lastSourceE += e;
        this.lastEmittedE += e;
      }
      return line;
    }

    this.inRangeLines += 1;
    this.checkSafety();
    return this.rewriteExtrusion(line, eWord, e, parsed.hasChecksum);
  }

  private applyPositionReset(eWord: GcodeWord | undefined): void {
    if (!eWord) return;
    const value = parseNumber(eWord.raw);
    if (value === null) {
      this.malformedLines += 1;
      return;
    }
    this.resetExtrusion(value);
  }

  private resetExtrusion(value: number): void {
    this.lastSourceE = value;
    this.lastEmittedE = value;
    if (value === 0) {
      this.g92Resets += 1;
      this.resetSeen = true;
    }
  }

  private inRange(): boolean {
    const { zRange, layerRange } = this.config;
    if (zRange && !withinZ(this.currentZ, zRange)) return false;
    if (layerRange && !withinLayers(this.currentLayer, layerRange)) return false;
    return true;
  }

  private checkSafety(): void {
    if (this.safetyChecked) return;
    this.safetyChecked = true;
    this.firstScaledLine = this.lineNumber;
    if (!this.config.force && !this.resetSeen) {
      throw new SafetyValidationError(this.lineNumber);
    }
  }

  private rewriteExtrusion(line: string, eWord: GcodeWord, e: number, hasChecksum: boolean): string {
    const { flowRatio } = this.config;
    let next: number;
    if (this.extrusionMode === "relative") {
      next = e * flowRatio;
      // Relative moves still advance the absolute baselines for a later M82.
      this.lastSourceE += e;
      this.lastEmittedE += next;
    } else {
      next = this.lastEmittedE + (e - this.lastSourceE) * flowRatio;
      this.lastSourceE = e;
      this.lastEmittedE = next;
    }

    const formatted = formatLike(next, eWord.raw);
    if (Number(formatted) === e) return line;
    const rewritten = replaceWordValue(line, eWord, formatted);
    return hasChecksum ? refreshChecksum(rewritten) : rewritten;
  }
}

export type RewriteResult = {
  lines: string[];
  stats: TRunStats;
};

/**
 * Rewrite a whole line sequence. Throws on safety validation failure, in
 * which case no output is returned at all.
 */
export function rewriteLines(lines: Iterable<string>, config: TScalingConfigInput): RewriteResult {
  const rewriter = new FlowRewriter(config);
  const out: string[] = [];
  for (const line of lines) {
    out.push(rewriter.process(line));
  }
  return { lines: out, stats: rewriter.stats() };
}
