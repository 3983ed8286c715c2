/**
 * Batch data types
 */

// ============================================================================
// Row Parser
// ============================================================================

/**
 * One actionable record of the batch description file.
 *
 * Field order on disk:
 * sourceLocator1,fetchId1,sourceLocator2,fetchId2,outputLocator,publishId
 */
export interface ComparisonRow {
  sourceLocator1: string;
  fetchId1: string;
  sourceLocator2: string;
  fetchId2: string;
  outputLocator: string;
  publishId: string;
}

export const ROW_FIELDS = [
  "sourceLocator1",
  "fetchId1",
  "sourceLocator2",
  "fetchId2",
  "outputLocator",
  "publishId",
] as const satisfies ReadonlyArray<keyof ComparisonRow>;

export type RowField = (typeof ROW_FIELDS)[number];

export type ParseResult =
  | { kind: "row"; row: ComparisonRow }
  | { kind: "skip"; reason: "comment" | "blank" }
  | { kind: "malformed"; missing: RowField[]; fieldCount: number };

// ============================================================================
// Job Runner
// ============================================================================

export interface RowOutcome {
  rendered: boolean;
  published: boolean;
  fetched: number;
  errors: string[];
}

// ============================================================================
// Orchestrator
// ============================================================================

export interface BatchResult {
  totalRows: number;
  succeededRows: number;
  failedRows: number;
  malformedRows: number;
  publishedRows: number;
  // Set when the operator stopped the run at a between-rows pause
  stoppedEarly: boolean;
}

export type BatchState =
  | "init"
  | "validating-input"
  | "awaiting-credential"
  | "processing-rows"
  | "done"
  | "aborted";
