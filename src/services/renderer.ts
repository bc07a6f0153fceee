import { execFile } from "child_process";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { promisify } from "util";
import { RenderFailureError, errorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";

const execFileAsync = promisify(execFile);
const logger = rootLogger.child({ service: "renderer" });

export interface RenderContext {
  timezone?: string | null;
  locale?: string | null;
  output2x: boolean;
  dwellSecs: number;
}

export interface RenderRequest {
  appPath: string;
  config: Record<string, unknown>;
  context: RenderContext;
}

/**
 * Turns an app definition into WebP bytes.
 *
 * A zero-length buffer means the app had nothing to show; a rejected promise
 * (always a `RenderFailureError`) means the render itself failed.
 */
export interface Renderer {
  render(request: RenderRequest): Promise<Buffer>;
}

function configArgs(config: Record<string, unknown>): string[] {
  return Object.entries(config)
    .filter(([, value]) => value !== undefined && value !== null)
    .map(([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`);
}

/** Runs the `pixlet` CLI in a child process. */
export class PixletRenderer implements Renderer {
  constructor(
    private readonly binary: string,
    private readonly timeoutMs: number
  ) {}

  async render({ appPath, config, context }: RenderRequest): Promise<Buffer> {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "render-"));
    const output = path.join(workDir, "out.webp");

    const args = ["render", appPath, ...configArgs(config), "-o", output];
    if (context.output2x) args.push("--2x");
    if (context.locale) args.push("--locale", context.locale);

    const startedAt = Date.now();
    try {
      await execFileAsync(this.binary, args, {
        timeout: this.timeoutMs,
        env: context.timezone ? { ...process.env, TZ: context.timezone } : process.env,
      });
      const data = await readOutput(output);
      logger.debug({ appPath, bytes: data.length, ms: Date.now() - startedAt }, "Rendered app");
      return data;
    } catch (error) {
      throw new RenderFailureError(appPath, error);
    } finally {
      await fs.rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
        logger.warn({ workDir, error: errorMessage(error) }, "Failed to clean render directory");
      });
    }
  }
}

// No output file means the app produced no frames
async function readOutput(file: string): Promise<Buffer> {
  try {
    return await fs.readFile(file);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return Buffer.alloc(0);
    }
    throw error;
  }
}
