/**
 * In-process collaborators for tests
 */

import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { ContentStoreError, PreconditionError, RenderError } from "../errors";
import { Logger, Tracker } from "../utils";
import { CANCELLED } from "../types";
import type {
  Cancelled,
  ContentStore,
  Credential,
  DiffpressConfig,
  DiffRenderer,
  Prompt,
  RenderRequest,
  RenderResult,
  RunContext,
} from "../types";

export class FakeContentStore implements ContentStore {
  fetchCalls: Array<{ id: string; destinationPath: string; credential: Credential }> = [];
  publishCalls: Array<{ id: string; sourcePath: string; credential: Credential }> = [];
  failPublish = false;
  ready = true;

  constructor(private readonly remote: Record<string, string> = {}) {}

  ensureReady(): void {
    if (!this.ready) {
      throw new PreconditionError("Content store is not configured");
    }
  }

  async fetch(id: string, destinationPath: string, credential: Credential): Promise<void> {
    this.fetchCalls.push({ id, destinationPath, credential });
    const content = this.remote[id];
    if (content === undefined) {
      throw new ContentStoreError("HTTP 404: Not Found", 404);
    }
    await mkdir(dirname(destinationPath), { recursive: true });
    await writeFile(destinationPath, content, "utf-8");
  }

  async publish(id: string, sourcePath: string, credential: Credential): Promise<void> {
    this.publishCalls.push({ id, sourcePath, credential });
    if (this.failPublish) {
      throw new ContentStoreError("HTTP 500: Internal Server Error", 500);
    }
  }
}

/**
 * write: writes "<fileA>|<fileB>" to the output path
 * noop: reports success without writing
 * throw: rejects with a RenderError
 */
export class FakeRenderer implements DiffRenderer {
  readonly name = "fake renderer";
  calls: RenderRequest[] = [];

  constructor(private readonly mode: "write" | "noop" | "throw" = "write") {}

  async render(request: RenderRequest): Promise<RenderResult> {
    this.calls.push(request);
    if (this.mode === "throw") {
      throw new RenderError("renderer exploded");
    }
    if (this.mode === "write") {
      await mkdir(dirname(request.outputPath), { recursive: true });
      await writeFile(request.outputPath, `${request.fileA}|${request.fileB}`, "utf-8");
    }
    return { outputPath: request.outputPath, changedLines: 1 };
  }
}

/**
 * Answers are consumed in order; when a queue runs dry the default applies
 */
export class FakePrompt implements Prompt {
  passwordMessages: string[] = [];
  confirmMessages: string[] = [];
  acknowledgeCount = 0;

  constructor(
    private readonly passwords: Array<string | Cancelled> = ["test-secret"],
    private readonly confirmations: Array<boolean | Cancelled> = [],
    private readonly acknowledgements: Array<void | Cancelled> = [],
  ) {}

  async password(message: string): Promise<string | Cancelled> {
    this.passwordMessages.push(message);
    return this.passwords.shift() ?? CANCELLED;
  }

  async confirm(message: string): Promise<boolean | Cancelled> {
    this.confirmMessages.push(message);
    return this.confirmations.shift() ?? false;
  }

  async acknowledge(): Promise<void | Cancelled> {
    this.acknowledgeCount++;
    return this.acknowledgements.shift();
  }
}

export function testConfig(): DiffpressConfig {
  return {
    confluence: { baseUrl: "https://wiki.example.test", apiPath: "/rest/api", timeout: 1000 },
    renderer: {
      engine: "builtin",
      colorScheme: "desert",
      layout: "side-by-side",
      vimdiffMinimumVersion: "7.3",
      template: null,
      timeout: 1000,
    },
    batch: { pauseBetweenRows: false, strict: false, overwrite: "always" },
    logging: { level: "error" },
  };
}

export function createTestContext(overrides: Partial<RunContext> = {}): RunContext {
  return {
    config: testConfig(),
    contentStore: new FakeContentStore(),
    diffRenderer: new FakeRenderer(),
    prompt: new FakePrompt(),
    tracker: new Tracker(),
    logger: new Logger("error"),
    ...overrides,
  };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "diffpress-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
