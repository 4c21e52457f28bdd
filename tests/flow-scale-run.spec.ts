import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Readable, Writable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { USAGE } from "../tools/flow-scale/config";
import {
  EXIT_CONFIG_ERROR,
  EXIT_OK,
  EXIT_SAFETY_ERROR,
  runFlowScale,
  type FlowScaleIo,
} from "../tools/flow-scale/run";

const RELATIVE_GCODE = ["; test part", "M83", "G92 E0", "G1 Z0.2", "G1 X1 E1.0", "G1 Z0.4", "G1 X2 E2.0", ""].join(
  "\n",
);

const sink = () => {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
};

const makeIo = (stdinText = "", env: Record<string, string> = {}) => {
  const stdout = sink();
  const stderr = sink();
  const io: FlowScaleIo = {
    stdin: Readable.from([stdinText]),
    stdout: stdout.stream,
    stderr: stderr.stream,
    env,
  };
  return { io, stdout: stdout.text, stderr: stderr.text };
};

describe("runFlowScale", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "flow-scale-run-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("streams stdin to stdout", async () => {
    const { io, stdout, stderr } = makeIo(RELATIVE_GCODE);

    const outcome = await runFlowScale(["-r", "0.5", "-z", "0.4"], io);

    expect(outcome.exitCode).toBe(EXIT_OK);
    expect(stdout()).toBe(
      ["; test part", "M83", "G92 E0", "G1 Z0.2", "G1 X1 E1.0", "G1 Z0.4", "G1 X2 E1.00000", ""].join("\n"),
    );
    expect(outcome.stats?.linesModified).toBe(1);
    expect(outcome.stats?.linesTotal).toBe(7);
    expect(stderr()).toBe("");
  });

  it("prints usage for --help", async () => {
    const { io, stdout } = makeIo();

    const outcome = await runFlowScale(["--help"], io);

    expect(outcome.exitCode).toBe(EXIT_OK);
    expect(stdout()).toBe(`${USAGE}\n`);
  });

  it("fails before reading input when the ratio is missing", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const { io, stdout } = makeIo(RELATIVE_GCODE);

    const outcome = await runFlowScale(["-z", "0.4"], io);

    expect(outcome.exitCode).toBe(EXIT_CONFIG_ERROR);
    expect(errorSpy).toHaveBeenCalledWith("[flow-scale] Missing required --flow-ratio");
    expect(stdout()).toBe("");
  });

  it("reports an unreadable input file as a configuration error", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const { io } = makeIo();

    const outcome = await runFlowScale(["-r", "1", "-i", path.join(dir, "missing.gcode")], io);

    expect(outcome.exitCode).toBe(EXIT_CONFIG_ERROR);
    expect(String(errorSpy.mock.calls[0][0])).toMatch(/^\[flow-scale\] Cannot read input /);
  });

  it("writes nothing when safety validation fails", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const input = path.join(dir, "part.gcode");
    const output = path.join(dir, "part.scaled.gcode");
    await fs.writeFile(input, "G1 X1 E1.0\nG1 X2 E2.0\n", "utf8");
    const { io } = makeIo();

    const outcome = await runFlowScale(["-r", "2", "-i", input, "-o", output], io);

    expect(outcome.exitCode).toBe(EXIT_SAFETY_ERROR);
    expect(outcome.exitCode).toBe(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    await expect(fs.access(output)).rejects.toThrow();
  });

  it("scales a file when forced", async () => {
    const input = path.join(dir, "part.gcode");
    const output = path.join(dir, "part.scaled.gcode");
    await fs.writeFile(input, "G1 X1 E1.0\nG1 X2 E2.0\n", "utf8");
    const { io, stderr } = makeIo();

    const outcome = await runFlowScale(["-r", "2", "-f", "-i", input, "-o", output], io);

    expect(outcome.exitCode).toBe(EXIT_OK);
    expect(stderr()).toBe("");
    expect(await fs.readFile(output, "utf8")).toBe("G1 X1 E2.00000\nG1 X2 E4.00000\n");
  });

  it("writes the debug report only to the file when stderr output is not asked for", async () => {
    const debugFile = path.join(dir, "debug.txt");
    const { io, stderr } = makeIo(RELATIVE_GCODE);

    const outcome = await runFlowScale(["-r", "0.5", "-D", debugFile], io);

    expect(outcome.exitCode).toBe(EXIT_OK);
    expect(stderr()).toBe("");
    const lines = (await fs.readFile(debugFile, "utf8")).split("\n");
    expect(lines).toContain("Lines modified: 2");
  });

  it("rewrites the slicer's file in place and writes a debug report", async () => {
    const input = path.join(dir, "plate.gcode");
    const debugFile = path.join(dir, "debug.txt");
    await fs.writeFile(input, RELATIVE_GCODE, "utf8");
    const { io, stderr } = makeIo("", { ORCASLICER_GCODE_OUTPUT_PATH: input, ORCASLICER_LAYER_HEIGHT: "0.2" });

    const outcome = await runFlowScale(["-r", "1.1", "-l", "2", "-p", "-d", "-D", debugFile], io);

    expect(outcome.exitCode).toBe(EXIT_OK);
    expect(await fs.readFile(input, "utf8")).toBe(
      ["; test part", "M83", "G92 E0", "G1 Z0.2", "G1 X1 E1.0", "G1 Z0.4", "G1 X2 E2.20000", ""].join("\n"),
    );
    expect((await fs.readdir(dir)).sort()).toEqual(["debug.txt", "plate.gcode"]);

    const report = await fs.readFile(debugFile, "utf8");
    expect(report).toBe(stderr());
    const lines = report.split("\n");
    expect(lines).toContain(`Input file: ${input}`);
    expect(lines).toContain("Layer start: 2");
    expect(lines).toContain("Layer height: 0.2");
    expect(lines).toContain("Lines modified: 1");
    expect(lines).toContain("Modified %: 14.29%");
  });
});
