import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { writeFile } from "fs/promises";
import { join } from "node:path";
import { batchCommand } from "./batch";
import { makeTempDir, removeTempDir } from "../../testing/fakes";

describe("batchCommand", () => {
  let dir: string;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(async () => {
    dir = await makeTempDir();
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await removeTempDir(dir);
  });

  function stderr(): string {
    return errorSpy.mock.calls.map((call) => call.join(" ")).join("\n");
  }

  it("reports a missing batch file before any configuration problem", async () => {
    const missing = join(dir, "missing.csv");

    await batchCommand({ datafile: missing, username: "tester" });

    expect(stderr()).toContain(`Could not locate CSV file "${missing}" ... processing halted`);
    expect(stderr()).toContain("USAGE:  diffpress batch");
    expect(process.exitCode).toBe(1);
  });

  it("reports missing arguments with the usage text", async () => {
    await batchCommand({});

    expect(stderr()).toContain("Not enough command line arguments detected ... processing halted");
    expect(stderr()).toContain("USAGE:  diffpress batch");
    expect(process.exitCode).toBe(1);
  });

  it("rejects a timeout that is not a number", async () => {
    await batchCommand({ datafile: join(dir, "batch.csv"), username: "tester", timeout: "abc" });

    expect(stderr()).toContain("Invalid command line option (--timeout: Expected number");
    expect(stderr()).toContain("USAGE:  diffpress batch");
    expect(process.exitCode).toBe(1);
  });

  it("requires a Confluence base URL once the batch file is valid", async () => {
    const batch = join(dir, "batch.csv");
    await writeFile(batch, "a.txt,1,b.txt,2,out,3\n");
    const config = join(dir, "config.json");
    await writeFile(config, JSON.stringify({ confluence: { baseUrl: "" } }));

    await batchCommand({ datafile: batch, username: "tester", config });

    expect(stderr()).toContain(
      "No Confluence base URL configured (set confluence.baseUrl or pass --base-url) ... processing halted",
    );
    expect(process.exitCode).toBe(1);
  });
});
