/**
 * Confluence Store
 * ContentStore backed by the Confluence REST API (Basic auth)
 *
 * fetch: page body (storage format) reduced to plain text
 * publish: file uploaded as a page attachment, replacing one of the same name
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import { basename, dirname } from "node:path";
import { load } from "cheerio";
import { z } from "zod";
import { ContentStoreError, PreconditionError } from "../errors";
import type { ConfluenceConfig, ContentStore, Credential } from "../types";
import type { Logger } from "../utils";

const PageSchema = z.object({
  id: z.string(),
  title: z.string().optional(),
  body: z.object({
    storage: z.object({
      value: z.string(),
    }),
  }),
});

export interface ConfluenceStoreOptions {
  config: ConfluenceConfig;
  logger: Logger;
  debug?: boolean;
}

/**
 * Plain text of a storage-format page body
 * Code macros win: their bodies are the file contents verbatim.
 */
export function storageToText(storage: string): string {
  const $ = load(storage, { xml: true });

  const code = $("ac\\:plain-text-body");
  const blocks =
    code.length > 0
      ? code.map((_, el) => $(el).text()).get()
      : $.root()
          .children()
          .map((_, el) => $(el).text())
          .get();

  const text = blocks.join("\n");
  return text.endsWith("\n") ? text : `${text}\n`;
}

export class ConfluenceStore implements ContentStore {
  private readonly apiBase: string;

  constructor(private readonly options: ConfluenceStoreOptions) {
    const { baseUrl, apiPath } = options.config;
    this.apiBase = `${baseUrl.replace(/\/+$/, "")}/${apiPath.replace(/^\/+|\/+$/g, "")}`;
  }

  ensureReady(): void {
    if (!this.options.config.baseUrl) {
      throw new PreconditionError(
        "No Confluence base URL configured (set confluence.baseUrl or pass --base-url)",
      );
    }
  }

  async fetch(
    id: string,
    destinationPath: string,
    credential: Credential,
    signal: AbortSignal,
  ): Promise<void> {
    const url = `${this.apiBase}/content/${encodeURIComponent(id)}?expand=body.storage`;
    const response = await this.request("GET", url, credential, signal);
    const page = PageSchema.parse(await response.json());

    await mkdir(dirname(destinationPath), { recursive: true });
    await writeFile(destinationPath, storageToText(page.body.storage.value), "utf-8");
  }

  async publish(
    id: string,
    sourcePath: string,
    credential: Credential,
    signal: AbortSignal,
  ): Promise<void> {
    const content = await readFile(sourcePath, "utf-8");

    const form = new FormData();
    form.append("file", new Blob([content], { type: "text/html" }), basename(sourcePath));
    form.append("minorEdit", "true");

    const url = `${this.apiBase}/content/${encodeURIComponent(id)}/child/attachment`;
    await this.request("PUT", url, credential, signal, form);
  }

  private async request(
    method: "GET" | "PUT",
    url: string,
    credential: Credential,
    signal: AbortSignal,
    body?: FormData,
  ): Promise<Response> {
    if (this.options.debug) {
      this.options.logger.debug(`${method} ${url}`);
    }

    const token = Buffer.from(`${credential.username}:${credential.password}`).toString("base64");
    const headers: Record<string, string> = {
      Authorization: `Basic ${token}`,
      Accept: "application/json",
    };
    if (body) {
      headers["X-Atlassian-Token"] = "no-check";
    }

    const response = await fetch(url, { method, headers, body, signal });

    if (!response.ok) {
      throw new ContentStoreError(
        `HTTP ${response.status}: ${response.statusText}`,
        response.status,
        { method, url },
      );
    }

    return response;
  }
}
