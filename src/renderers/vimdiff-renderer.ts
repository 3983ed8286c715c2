/**
 * Vimdiff Renderer
 * Drives `vimdiff ... +TOhtml` to produce vim's own HTML rendering
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { RenderError } from "../errors";
import type { RendererConfig, RenderRequest } from "../types";
import { BaseRenderer } from "./base-renderer";

export type ExecFn = (
  file: string,
  args: string[],
  options: { signal?: AbortSignal },
) => Promise<{ stdout: string; stderr: string }>;

const execFileAsync: ExecFn = (file, args, options) =>
  promisify(execFile)(file, args, options);

/**
 * Extract the version from `vimdiff --version` output
 * First line reads like "VIM - Vi IMproved 9.0 (2022 Jun 28, compiled ...)"
 */
export function parseVimVersion(output: string): string | null {
  const match = output.match(/^VIM - Vi IMproved (\d+(?:\.\d+)*)/m);
  return match ? match[1] : null;
}

/**
 * Compare dotted versions numerically, segment by segment
 */
export function isVersionAtLeast(version: string, minimum: string): boolean {
  const a = version.split(".").map(Number);
  const b = minimum.split(".").map(Number);
  for (let i = 0; i < Math.max(a.length, b.length); i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    if (x !== y) return x > y;
  }
  return true;
}

/**
 * Ex command writing the current buffer to `path`, whatever characters it holds
 *
 * @example
 * writeCommand("it's out.html") // "+exe 'w! ' . fnameescape('it''s out.html')"
 */
export function writeCommand(path: string): string {
  return `+exe 'w! ' . fnameescape('${path.replace(/'/g, "''")}')`;
}

export class VimdiffRenderer extends BaseRenderer {
  readonly name = "vimdiff";
  private versionChecked = false;

  constructor(
    private readonly config: RendererConfig,
    private readonly exec: ExecFn = execFileAsync,
  ) {
    super();
  }

  async checkVersion(signal?: AbortSignal): Promise<string> {
    const { stdout } = await this.exec("vimdiff", ["--version"], { signal });
    const version = parseVimVersion(stdout);
    const minimum = this.config.vimdiffMinimumVersion;

    if (version === null) {
      throw new RenderError("Could not determine the vimdiff version");
    }
    if (!isVersionAtLeast(version, minimum)) {
      throw new RenderError(
        `Found vimdiff version ${version}, but version ${minimum} or higher is required`,
        { version, minimum },
      );
    }

    this.versionChecked = true;
    return version;
  }

  protected async renderDifferences(request: RenderRequest): Promise<void> {
    if (!this.versionChecked) {
      await this.checkVersion(request.signal);
    }

    const args = [
      request.fileA,
      request.fileB,
      "-c",
      `:colorscheme ${request.colorScheme}`,
      "+TOhtml",
      writeCommand(request.outputPath),
      "+qall!",
    ];

    try {
      await this.exec("vimdiff", args, { signal: request.signal });
    } catch (error) {
      throw new RenderError(
        `vimdiff failed: ${error instanceof Error ? error.message : String(error)}`,
        { args },
      );
    }
  }
}
