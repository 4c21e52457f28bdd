import fs from "node:fs/promises";
import type { TRunStats } from "../../shared/flow-scale";

export type DebugContext = {
  input: string;
  output: string;
  inPlace: boolean;
};

type DebugValue = string | number | boolean | null | undefined;

const fmt = (value: DebugValue): string => (value === null || value === undefined ? "none" : String(value));

export const modifiedPercent = (stats: TRunStats): string => {
  const pct = stats.linesTotal > 0 ? (stats.linesModified / stats.linesTotal) * 100 : 0;
  return `${pct.toFixed(2)}%`;
};

export function buildDebugReport(stats: TRunStats, context: DebugContext): string {
  const entries: [string, DebugValue][] = [
    ["Input file", context.input],
    ["Output file", context.output],
    ["Flow ratio", stats.flowRatio],
    ["Inplace", context.inPlace],
    ["Z-start", stats.zRange?.start],
    ["Z-end", stats.zRange?.end],
    ["Layer mode", stats.layerRange !== null],
    ["Layer start", stats.layerRange?.start],
    ["Layer end", stats.layerRange?.end],
    ["Layer height", stats.layerHeight],
    ["Extrusion mode", stats.finalExtrusionMode],
    ["G92 E0 resets", stats.g92Resets],
    ["Total lines", stats.linesTotal],
    ["Lines modified", stats.linesModified],
    ["Modified %", modifiedPercent(stats)],
    ["Malformed lines", stats.malformedLines],
    ["First scaled line", stats.firstScaledLine],
  ];
  const lines = ["=== flow-scale debug ===", ...entries.map(([key, value]) => `${key}: ${fmt(value)}`)];
  return `${lines.join("\n")}\n`;
}

export type DebugTargets = {
  stderr?: NodeJS.WritableStream;
  filePath?: string;
};

/** A debug file that cannot be written only produces a warning. */
export async function emitDebugReport(report: string, targets: DebugTargets): Promise<void> {
  if (targets.stderr) {
    targets.stderr.write(report);
  }
  if (targets.filePath) {
    try {
      await fs.writeFile(targets.filePath, report, "utf8");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[flow-scale] could not write debug file ${targets.filePath}: ${message}`);
    }
  }
}
