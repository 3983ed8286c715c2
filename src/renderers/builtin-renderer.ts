/**
 * Builtin Renderer
 * Unified patch from `diff`, HTML from diff2html, page from Handlebars
 */

import { readFile, writeFile } from "fs/promises";
import { createRequire } from "node:module";
import { createTwoFilesPatch } from "diff";
import { html } from "diff2html";
import { colorSchemeStyles, loadPageTemplate } from "../templates";
import type { RendererConfig, RenderRequest } from "../types";
import { BaseRenderer, type LoadedInputs } from "./base-renderer";

const require = createRequire(import.meta.url);

let diff2htmlCss: string | undefined;

async function loadDiff2htmlCss(): Promise<string> {
  diff2htmlCss ??= await readFile(
    require.resolve("diff2html/bundles/css/diff2html.min.css"),
    "utf-8",
  );
  return diff2htmlCss;
}

export class BuiltinRenderer extends BaseRenderer {
  readonly name = "builtin renderer";

  constructor(private readonly config: RendererConfig) {
    super();
  }

  protected async renderDifferences(
    request: RenderRequest,
    inputs: LoadedInputs,
  ): Promise<void> {
    const patch = createTwoFilesPatch(request.fileA, request.fileB, inputs.textA, inputs.textB);

    const diffHtml = html(patch, {
      drawFileList: false,
      outputFormat: this.config.layout,
      matching: "lines",
    });

    const template = await loadPageTemplate(this.config.template);
    const styles = [await loadDiff2htmlCss(), colorSchemeStyles(request.colorScheme)].join("\n");

    const page = template({
      fileA: request.fileA,
      fileB: request.fileB,
      colorScheme: request.colorScheme,
      changedLines: inputs.changedLines,
      styles,
      diffHtml,
    });

    await writeFile(request.outputPath, page, "utf-8");
  }
}
