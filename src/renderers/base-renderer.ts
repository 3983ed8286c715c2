/**
 * Base Renderer
 * Input checks and the no-differences case shared by every engine
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "node:path";
import { diffLines } from "diff";
import { RenderError } from "../errors";
import { NO_DIFFERENCES_HTML } from "../templates";
import { fileExists, isTextFile } from "../utils";
import type { DiffRenderer, RenderRequest, RenderResult } from "../types";

export interface LoadedInputs {
  textA: string;
  textB: string;
  changedLines: number;
}

/**
 * Number of lines added or removed between two texts
 */
export function countChangedLines(textA: string, textB: string): number {
  let changed = 0;
  for (const part of diffLines(textA, textB)) {
    if (part.added || part.removed) {
      changed += part.count ?? 0;
    }
  }
  return changed;
}

export abstract class BaseRenderer implements DiffRenderer {
  abstract readonly name: string;

  async render(request: RenderRequest): Promise<RenderResult> {
    const { outputPath } = request;
    const inputs = await this.loadInputs(request.fileA, request.fileB);

    await mkdir(dirname(outputPath), { recursive: true });

    if (inputs.changedLines === 0) {
      await writeFile(outputPath, NO_DIFFERENCES_HTML, "utf-8");
      return { outputPath, changedLines: 0 };
    }

    await this.renderDifferences(request, inputs);
    return { outputPath, changedLines: inputs.changedLines };
  }

  protected abstract renderDifferences(
    request: RenderRequest,
    inputs: LoadedInputs,
  ): Promise<void>;

  private async loadInputs(fileA: string, fileB: string): Promise<LoadedInputs> {
    for (const [n, path] of [fileA, fileB].entries()) {
      if (!(await fileExists(path))) {
        throw new RenderError(`Could not locate input file ${n + 1}: "${path}"`, { path });
      }
      if (!(await isTextFile(path))) {
        throw new RenderError(`Input file ${n + 1} "${path}" is not a text file`, { path });
      }
    }

    const [textA, textB] = await Promise.all([
      readFile(fileA, "utf-8"),
      readFile(fileB, "utf-8"),
    ]);

    return { textA, textB, changedLines: countChangedLines(textA, textB) };
  }
}
