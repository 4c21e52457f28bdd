#!/usr/bin/env -S tsx
/**
 * Slicer post-processing entry point. Scales E values by a flow ratio,
 * optionally only within a Z or layer window.
 *
 *   tsx cli/flow-scale.ts -r 0.95 -z 2.0 -Z 4.0 -i part.gcode -o part.scaled.gcode
 */
import { runFlowScale } from "../tools/flow-scale/run";

async function main() {
  const { exitCode } = await runFlowScale(process.argv.slice(2), {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
  });
  process.exitCode = exitCode;
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
