/**
 * Batch Tracker
 * Unified tracking for transfer counters and issues
 */

import { writeFile } from "fs/promises";
import { ZodError } from "zod";
import { ContentStoreError, RenderError, TimeoutError } from "../errors";
import type { BatchResult } from "../types/batch";

// ============================================================================
// Issue Types
// ============================================================================

export type IssueType = "row" | "fetch" | "render" | "publish" | "resource";

export type RowIssueReason = "malformed";

export type FetchIssueReason =
  | "timeout"
  | "invalid-response"
  | "not-found"
  | "fetch-failed";

export type RenderIssueReason =
  | "timeout"
  | "missing-source"
  | "render-failed"
  | "overwrite-declined"
  | "no-output";

export type PublishIssueReason = "timeout" | "invalid-response" | "publish-failed";

export type ResourceIssueReason = "schema-validation" | "invalid-json" | "read-error";

interface BaseIssue {
  path: string;
  row?: number;
  details?: string;
}

export interface RowIssue extends BaseIssue {
  type: "row";
  reason: RowIssueReason;
}

export interface FetchIssue extends BaseIssue {
  type: "fetch";
  reason: FetchIssueReason;
}

export interface RenderIssue extends BaseIssue {
  type: "render";
  reason: RenderIssueReason;
}

export interface PublishIssue extends BaseIssue {
  type: "publish";
  reason: PublishIssueReason;
}

export interface ResourceIssue extends BaseIssue {
  type: "resource";
  reason: ResourceIssueReason;
}

export type Issue = RowIssue | FetchIssue | RenderIssue | PublishIssue | ResourceIssue;

export interface TransferStats {
  fetchedFiles: number;
  publishedFiles: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function hasCode(error: Error, code: string): boolean {
  return "code" in error && error.code === code;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => `${e.path.join(".")}: ${e.message}`)
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  if (error instanceof Error) {
    return { reason: "read-error", details: error.message };
  }
  return { reason: "read-error", details: String(error) };
}

function mapFetchError(error: unknown): IssueInfo<FetchIssueReason> {
  if (error instanceof TimeoutError) {
    return { reason: "timeout", details: error.message };
  }
  if (error instanceof ContentStoreError) {
    if (error.status === 404) {
      return { reason: "not-found", details: error.message };
    }
    return { reason: "invalid-response", details: error.message };
  }
  if (error instanceof Error) {
    if (hasCode(error, "ENOENT")) {
      return { reason: "not-found", details: error.message };
    }
    return { reason: "fetch-failed", details: error.message };
  }
  return { reason: "fetch-failed", details: String(error) };
}

function mapRenderError(error: unknown): IssueInfo<RenderIssueReason> {
  if (error instanceof TimeoutError) {
    return { reason: "timeout", details: error.message };
  }
  if (error instanceof RenderError || error instanceof Error) {
    return { reason: "render-failed", details: error.message };
  }
  return { reason: "render-failed", details: String(error) };
}

function mapPublishError(error: unknown): IssueInfo<PublishIssueReason> {
  if (error instanceof TimeoutError) {
    return { reason: "timeout", details: error.message };
  }
  if (error instanceof ContentStoreError) {
    return { reason: "invalid-response", details: error.message };
  }
  if (error instanceof Error) {
    return { reason: "publish-failed", details: error.message };
  }
  return { reason: "publish-failed", details: String(error) };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private fetchedFiles = 0;
  private publishedFiles = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  incrementFetched(): void {
    this.fetchedFiles++;
  }

  incrementPublished(): void {
    this.publishedFiles++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackIssue(issue: Issue): void {
    this.issues.push(issue);
  }

  trackError(
    path: string,
    error: unknown,
    type: "fetch" | "render" | "publish" | "resource",
    row?: number,
  ): void {
    switch (type) {
      case "fetch": {
        const { reason, details } = mapFetchError(error);
        this.issues.push({ type: "fetch", path, row, reason, details });
        break;
      }
      case "render": {
        const { reason, details } = mapRenderError(error);
        this.issues.push({ type: "render", path, row, reason, details });
        break;
      }
      case "publish": {
        const { reason, details } = mapPublishError(error);
        this.issues.push({ type: "publish", path, row, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): TransferStats {
    return {
      fetchedFiles: this.fetchedFiles,
      publishedFiles: this.publishedFiles,
      issues: this.issues,
      duration: new Date().getTime() - this.startTime.getTime(),
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportReport(outputPath: string, result: BatchResult): Promise<void> {
    const stats = this.getStats();

    const exported = {
      summary: {
        ...result,
        fetchedFiles: stats.fetchedFiles,
        publishedFiles: stats.publishedFiles,
        duration: stats.duration,
      },
      issues: this.groupIssuesByTypeAndReason(),
    };

    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  private groupIssuesByTypeAndReason(): Record<IssueType, Record<string, Issue[]>> {
    const grouped: Record<IssueType, Record<string, Issue[]>> = {
      row: {},
      fetch: {},
      render: {},
      publish: {},
      resource: {},
    };

    for (const issue of this.issues) {
      const bucket = grouped[issue.type];
      (bucket[issue.reason] ??= []).push(issue);
    }

    return grouped;
  }
}
