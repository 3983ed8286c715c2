/**
 * Pipeline modules export
 */

export { parseRow, splitLines } from "./row-parser";
export { runComparisonJob } from "./job-runner";
export { runBatch, batchExitCode } from "./orchestrator";
export { summary } from "./summary";
