import fs from "node:fs/promises";
import path from "node:path";
import { FlowScaleConfigError, STDIO_PATH } from "./config";

/** Split text into lines that keep their own terminators. */
export const splitLines = (text: string): string[] => text.match(/[^\n]*\n|[^\n]+$/g) ?? [];

const readStream = async (stream: NodeJS.ReadableStream): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf8");
};

export async function readInputLines(source: string, stdin: NodeJS.ReadableStream): Promise<string[]> {
  if (source === STDIO_PATH) {
    return splitLines(await readStream(stdin));
  }
  try {
    return splitLines(await fs.readFile(source, "utf8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FlowScaleConfigError(`Cannot read input ${source}: ${message}`);
  }
}

const writeStream = (stream: NodeJS.WritableStream, text: string): Promise<void> =>
  new Promise((resolve, reject) => {
    stream.write(text, (err?: Error | null) => (err ? reject(err) : resolve()));
  });

/**
 * Commit the full rewritten output. In-place targets are written to a sibling
 * temp file first and renamed over the input.
 */
export async function writeOutputLines(
  target: string,
  lines: string[],
  stdout: NodeJS.WritableStream,
  options: { inPlace?: boolean } = {},
): Promise<void> {
  const text = lines.join("");
  if (target === STDIO_PATH) {
    await writeStream(stdout, text);
    return;
  }
  if (!options.inPlace) {
    await fs.writeFile(target, text, "utf8");
    return;
  }
  const tempPath = path.join(path.dirname(target), `.${path.basename(target)}.flow-scale-${process.pid}.tmp`);
  try {
    await fs.writeFile(tempPath, text, "utf8");
    await fs.rename(tempPath, target);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}
