import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readFile, writeFile } from "fs/promises";
import { join } from "node:path";
import { RenderError } from "../errors";
import { makeTempDir, removeTempDir, testConfig } from "../testing/fakes";
import {
  BuiltinRenderer,
  VimdiffRenderer,
  countChangedLines,
  createRenderer,
  isVersionAtLeast,
  parseVimVersion,
  writeCommand,
} from ".";
import type { ExecFn } from "./vimdiff-renderer";

const signal = new AbortController().signal;

describe("countChangedLines", () => {
  it("is zero for identical text", () => {
    expect(countChangedLines("a\nb\n", "a\nb\n")).toBe(0);
  });

  it("counts removed and added lines", () => {
    expect(countChangedLines("a\nb\nc\n", "a\nx\nc\n")).toBe(2);
  });

  it("counts lines only present on one side", () => {
    expect(countChangedLines("a\n", "a\nb\nc\n")).toBe(2);
  });
});

describe("vim version helpers", () => {
  it("reads the version from the first line of --version", () => {
    const output = "VIM - Vi IMproved 9.0 (2022 Jun 28, compiled Jan 01 2024)\nIncluded patches: 1-1000\n";
    expect(parseVimVersion(output)).toBe("9.0");
  });

  it("returns null for unrelated output", () => {
    expect(parseVimVersion("NVIM v0.9.5")).toBeNull();
  });

  it("escapes the output path of the write command", () => {
    expect(writeCommand("/tmp/it's out.html")).toBe(
      "+exe 'w! ' . fnameescape('/tmp/it''s out.html')",
    );
  });

  it("compares versions segment by segment", () => {
    expect(isVersionAtLeast("7.3", "7.3")).toBe(true);
    expect(isVersionAtLeast("7.10", "7.3")).toBe(true);
    expect(isVersionAtLeast("7.2", "7.3")).toBe(false);
    expect(isVersionAtLeast("8", "7.3")).toBe(true);
  });
});

describe("renderers", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function inputs(a: string, b: string): Promise<[string, string]> {
    const fileA = join(dir, "a.txt");
    const fileB = join(dir, "b.txt");
    await writeFile(fileA, a);
    await writeFile(fileB, b);
    return [fileA, fileB];
  }

  // ==========================================================================
  // Shared input checks
  // ==========================================================================
  describe("input checks", () => {
    it("rejects a missing input file", async () => {
      const [fileA] = await inputs("a\n", "b\n");
      const missing = join(dir, "nope.txt");
      const renderer = new BuiltinRenderer(testConfig().renderer);

      const render = renderer.render({
        fileA,
        fileB: missing,
        outputPath: join(dir, "out.html"),
        colorScheme: "desert",
        signal,
      });

      await expect(render).rejects.toBeInstanceOf(RenderError);
      await expect(render).rejects.toThrow(`Could not locate input file 2: "${missing}"`);
    });

    it("refuses binary input instead of rendering it", async () => {
      const fileA = join(dir, "a.bin");
      await writeFile(fileA, Buffer.from([0x00, 0x01, 0x02]));
      const [, fileB] = await inputs("a\n", "b\n");
      const renderer = new BuiltinRenderer(testConfig().renderer);

      await expect(
        renderer.render({ fileA, fileB, outputPath: join(dir, "out.html"), colorScheme: "desert", signal }),
      ).rejects.toThrow(`Input file 1 "${fileA}" is not a text file`);
    });

    it("writes the no-differences page for identical inputs", async () => {
      const [fileA, fileB] = await inputs("same\n", "same\n");
      const outputPath = join(dir, "nested", "out.html");

      const result = await new BuiltinRenderer(testConfig().renderer).render({
        fileA,
        fileB,
        outputPath,
        colorScheme: "desert",
        signal,
      });

      expect(result).toEqual({ outputPath, changedLines: 0 });
      expect(await readFile(outputPath, "utf-8")).toBe(
        "<html><body>No differences were found</body></html>\n",
      );
    });
  });

  // ==========================================================================
  // Builtin engine
  // ==========================================================================
  describe("BuiltinRenderer", () => {
    it("renders a page naming both files and the color scheme", async () => {
      const [fileA, fileB] = await inputs("one\ntwo\n", "one\nthree\n");
      const outputPath = join(dir, "out.html");

      const result = await new BuiltinRenderer(testConfig().renderer).render({
        fileA,
        fileB,
        outputPath,
        colorScheme: "desert",
        signal,
      });

      const page = await readFile(outputPath, "utf-8");
      expect(result.changedLines).toBe(2);
      expect(page).toContain(`<title>${fileA} vs ${fileB}</title>`);
      expect(page).toContain('<body class="color-scheme-desert" data-color-scheme="desert">');
      expect(page).toContain('<p class="diffpress-summary">2 lines changed</p>');
      expect(page).toContain("d2h-wrapper");
    });

    it("produces identical output for identical runs", async () => {
      const [fileA, fileB] = await inputs("one\ntwo\n", "one\nthree\n");
      const renderer = new BuiltinRenderer(testConfig().renderer);
      const first = join(dir, "first.html");
      const second = join(dir, "second.html");

      await renderer.render({ fileA, fileB, outputPath: first, colorScheme: "desert", signal });
      await renderer.render({ fileA, fileB, outputPath: second, colorScheme: "desert", signal });

      expect(await readFile(second, "utf-8")).toBe(await readFile(first, "utf-8"));
    });

    it("uses a custom page template when configured", async () => {
      const [fileA, fileB] = await inputs("one\n", "two\n");
      const template = join(dir, "page.hbs");
      await writeFile(template, "{{colorScheme}}:{{changedLines}} {{plural changedLines \"line\" \"lines\"}}");
      const config = { ...testConfig().renderer, template };
      const outputPath = join(dir, "out.html");

      await new BuiltinRenderer(config).render({ fileA, fileB, outputPath, colorScheme: "morning", signal });

      expect(await readFile(outputPath, "utf-8")).toBe("morning:2 lines");
    });
  });

  // ==========================================================================
  // Vimdiff engine
  // ==========================================================================
  describe("VimdiffRenderer", () => {
    function fakeVim(version: string): { exec: ExecFn; calls: string[][] } {
      const calls: string[][] = [];
      const exec: ExecFn = vi.fn(async (_file: string, args: string[]) => {
        calls.push(args);
        if (args[0] === "--version") {
          return { stdout: `VIM - Vi IMproved ${version} (2020 Jan 01)\n`, stderr: "" };
        }
        const target = args
          .map((arg) => arg.match(/^\+exe 'w! ' \. fnameescape\('(.*)'\)$/))
          .find((match) => match !== null);
        if (target) await writeFile(target[1].replace(/''/g, "'"), "<html>vim</html>");
        return { stdout: "", stderr: "" };
      });
      return { exec, calls };
    }

    it("checks the version once and passes the color scheme to vim", async () => {
      const [fileA, fileB] = await inputs("one\n", "two\n");
      const { exec, calls } = fakeVim("8.2");
      const renderer = new VimdiffRenderer(testConfig().renderer, exec);
      const outputPath = join(dir, "out.html");

      await renderer.render({ fileA, fileB, outputPath, colorScheme: "desert", signal });
      await renderer.render({ fileA, fileB, outputPath, colorScheme: "desert", signal });

      expect(calls).toEqual([
        ["--version"],
        [fileA, fileB, "-c", ":colorscheme desert", "+TOhtml", writeCommand(outputPath), "+qall!"],
        [fileA, fileB, "-c", ":colorscheme desert", "+TOhtml", writeCommand(outputPath), "+qall!"],
      ]);
      expect(await readFile(outputPath, "utf-8")).toBe("<html>vim</html>");
    });

    it("writes to an output path with spaces and quotes", async () => {
      const [fileA, fileB] = await inputs("one\n", "two\n");
      const { exec } = fakeVim("9.0");
      const outputPath = join(dir, "team's report.html");

      await new VimdiffRenderer(testConfig().renderer, exec).render({
        fileA,
        fileB,
        outputPath,
        colorScheme: "desert",
        signal,
      });

      expect(await readFile(outputPath, "utf-8")).toBe("<html>vim</html>");
    });

    it("refuses a vimdiff older than the configured minimum", async () => {
      const [fileA, fileB] = await inputs("one\n", "two\n");
      const { exec } = fakeVim("7.2");
      const renderer = new VimdiffRenderer(testConfig().renderer, exec);

      await expect(
        renderer.render({ fileA, fileB, outputPath: join(dir, "out.html"), colorScheme: "desert", signal }),
      ).rejects.toThrow("Found vimdiff version 7.2, but version 7.3 or higher is required");
    });

    it("does not start vim for identical inputs", async () => {
      const [fileA, fileB] = await inputs("same\n", "same\n");
      const { exec, calls } = fakeVim("9.0");

      await new VimdiffRenderer(testConfig().renderer, exec).render({
        fileA,
        fileB,
        outputPath: join(dir, "out.html"),
        colorScheme: "desert",
        signal,
      });

      expect(calls).toEqual([]);
    });
  });

  it("createRenderer picks the configured engine", () => {
    const config = testConfig().renderer;
    expect(createRenderer(config)).toBeInstanceOf(BuiltinRenderer);
    expect(createRenderer({ ...config, engine: "vimdiff" })).toBeInstanceOf(VimdiffRenderer);
  });
});
