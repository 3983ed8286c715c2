/**
 * Run context - flows through the entire batch pipeline
 * Holds the resolved collaborators, the credential and run flags;
 * nothing here lives in module-level state.
 */

import type { DiffpressConfig } from "./config";
import type { ContentStore, Credential, DiffRenderer, Prompt } from "./collaborators";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  RowIssue,
  FetchIssue,
  RenderIssue,
  PublishIssue,
  ResourceIssue,
  RowIssueReason,
  FetchIssueReason,
  RenderIssueReason,
  PublishIssueReason,
  ResourceIssueReason,
  TransferStats,
} from "../utils/tracker";

export interface RunContext {
  // Input - provided at initialization
  config: DiffpressConfig;
  contentStore: ContentStore;
  diffRenderer: DiffRenderer;
  prompt: Prompt;

  // Unified tracking for counters and issues
  tracker: Tracker;
  logger: Logger;

  debug?: boolean;
  verbose?: boolean;

  // Set once the operator has entered a password
  credential?: Credential;
}
