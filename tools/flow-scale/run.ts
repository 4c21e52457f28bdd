import { SafetyValidationError, rewriteLines } from "../../modules/gcode/flow-rewriter";
import type { TRunStats } from "../../shared/flow-scale";
import { FlowScaleConfigError, USAGE, parseArgs, resolveRun } from "./config";
import { buildDebugReport, emitDebugReport } from "./debug-report";
import { readInputLines, writeOutputLines } from "./io";
import type { EnvSource } from "./slicer-env";

export const EXIT_OK = 0;
export const EXIT_CONFIG_ERROR = 1;
export const EXIT_SAFETY_ERROR = 1;

export type FlowScaleIo = {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  env: EnvSource;
  exists?: (candidate: string) => boolean;
};

export type FlowScaleOutcome = {
  exitCode: number;
  stats?: TRunStats;
};

/**
 * Resolve, read, rewrite, commit, report. Configuration and safety failures
 * are reported and mapped to an exit code before anything is written.
 */
export async function runFlowScale(argv: string[], io: FlowScaleIo): Promise<FlowScaleOutcome> {
  try {
    const args = parseArgs(argv);
    if (args.help) {
      io.stdout.write(`${USAGE}\n`);
      return { exitCode: EXIT_OK };
    }

    const run = resolveRun(args, { env: io.env, exists: io.exists });
    const input = await readInputLines(run.input, io.stdin);
    const { lines, stats } = rewriteLines(input, run.config);
    await writeOutputLines(run.output, lines, io.stdout, { inPlace: run.inPlace });

    if (run.config.debug) {
      const report = buildDebugReport(stats, {
        input: run.input,
        output: run.output,
        inPlace: run.inPlace,
      });
      await emitDebugReport(report, {
        stderr: run.debugToStderr ? io.stderr : undefined,
        filePath: run.debugFile,
      });
    }
    return { exitCode: EXIT_OK, stats };
  } catch (err) {
    if (err instanceof FlowScaleConfigError) {
      console.error(`[flow-scale] ${err.message}`);
      console.error(USAGE);
      return { exitCode: EXIT_CONFIG_ERROR };
    }
    if (err instanceof SafetyValidationError) {
      console.error(`[flow-scale] ${err.message}`);
      return { exitCode: EXIT_SAFETY_ERROR };
    }
    throw err;
  }
}
