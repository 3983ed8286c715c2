/**
 * Central type exports
 */

// Configuration
export type {
  DiffpressConfig,
  PartialDiffpressConfig,
  ConfluenceConfig,
  RendererConfig,
  BatchConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  DiffpressConfigSchema,
  PartialDiffpressConfigSchema,
} from "./config";

// Batch
export type {
  ComparisonRow,
  RowField,
  ParseResult,
  RowOutcome,
  BatchResult,
  BatchState,
} from "./batch";
export { ROW_FIELDS } from "./batch";

// Collaborators
export type {
  Credential,
  ContentStore,
  DiffRenderer,
  RenderRequest,
  RenderResult,
  Prompt,
  Cancelled,
} from "./collaborators";
export { CANCELLED } from "./collaborators";

// Context
export type {
  RunContext,
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
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";
