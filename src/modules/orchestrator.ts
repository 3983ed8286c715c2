/**
 * Batch Orchestrator Module
 * Validates the batch file, obtains the credential once and drives every row
 *
 * State flow: init → validating-input → awaiting-credential →
 * processing-rows → done. A PreconditionError before processing-rows
 * means no row was touched (aborted).
 */

import { readFile } from "fs/promises";
import { PreconditionError } from "../errors";
import { fileExists, isTextFile } from "../utils";
import { CANCELLED } from "../types";
import type { BatchResult, BatchState, Credential, ParseResult, RunContext } from "../types";
import { parseRow, splitLines } from "./row-parser";
import { runComparisonJob } from "./job-runner";

interface ParsedLine {
  lineNumber: number;
  result: ParseResult;
}

export async function runBatch(
  ctx: RunContext,
  batchFilePath: string,
  username: string,
): Promise<BatchResult> {
  const { logger, tracker } = ctx;
  let state: BatchState = "init";

  function enter(next: BatchState): void {
    logger.debug(`Batch state ${state} -> ${next}`);
    state = next;
  }

  let lines: ParsedLine[];
  try {
    // ==========================================================================
    // Validate input
    // ==========================================================================

    enter("validating-input");
    lines = await readBatchFile(batchFilePath, username);
    ctx.contentStore.ensureReady();

    // ==========================================================================
    // Credential, requested exactly once
    // ==========================================================================

    enter("awaiting-credential");
    const credential = await requestCredential(ctx, username);
    logger.redact(credential.password);
    ctx.credential = credential;
  } catch (error) {
    enter("aborted");
    throw error;
  }

  // ============================================================================
  // Rows, strictly sequential in file order
  // ============================================================================

  enter("processing-rows");

  const result: BatchResult = {
    totalRows: 0,
    succeededRows: 0,
    failedRows: 0,
    malformedRows: 0,
    publishedRows: 0,
    stoppedEarly: false,
  };

  const records = lines.filter((line) => line.result.kind !== "skip");

  for (const [index, { lineNumber, result: parsed }] of records.entries()) {
    result.totalRows++;

    if (parsed.kind === "malformed") {
      result.failedRows++;
      result.malformedRows++;
      const missing = parsed.missing.length > 0 ? `missing ${parsed.missing.join(", ")}` : "";
      const details = [`${parsed.fieldCount} field(s)`, missing].filter(Boolean).join(", ");
      tracker.trackIssue({
        type: "row",
        reason: "malformed",
        path: batchFilePath,
        row: lineNumber,
        details,
      });
      logger.warn(`Row ${lineNumber}: malformed record in "${batchFilePath}" (${details}) ... skipping`);
    } else if (parsed.kind === "row") {
      const outcome = await runComparisonJob(ctx, parsed.row, lineNumber);
      if (outcome.rendered) {
        result.succeededRows++;
      } else {
        result.failedRows++;
      }
      if (outcome.published) {
        result.publishedRows++;
      }
    }

    const isLast = index === records.length - 1;
    if (!isLast && ctx.config.batch.pauseBetweenRows) {
      const answer = await ctx.prompt.acknowledge("Press <ENTER> to continue");
      if (answer === CANCELLED) {
        logger.warn(`Batch stopped by operator after row ${lineNumber}`);
        result.stoppedEarly = true;
        break;
      }
    }
  }

  enter("done");
  return result;
}

/**
 * Preconditions on the batch file: present, text, and at least one comma
 */
async function readBatchFile(batchFilePath: string, username: string): Promise<ParsedLine[]> {
  if (!batchFilePath || !username) {
    throw new PreconditionError("Not enough command line arguments detected");
  }

  if (!(await fileExists(batchFilePath))) {
    throw new PreconditionError(`Could not locate CSV file "${batchFilePath}"`, {
      path: batchFilePath,
    });
  }

  if (!(await isTextFile(batchFilePath))) {
    throw new PreconditionError(`Data input file "${batchFilePath}" is not a TEXT file`, {
      path: batchFilePath,
    });
  }

  const content = await readFile(batchFilePath, "utf-8");
  if (!content.includes(",")) {
    throw new PreconditionError(`Data input file "${batchFilePath}" is not a CSV file`, {
      path: batchFilePath,
    });
  }

  return splitLines(content).map(({ lineNumber, text }) => ({
    lineNumber,
    result: parseRow(text),
  }));
}

async function requestCredential(ctx: RunContext, username: string): Promise<Credential> {
  for (;;) {
    const password = await ctx.prompt.password(
      `Please enter the password for username: "${username}":`,
    );
    if (password === CANCELLED) {
      throw new PreconditionError("Password entry was cancelled");
    }
    if (password !== "") {
      return { username, password };
    }
    ctx.logger.error("Password cannot be blank");
  }
}

/**
 * Process exit status for a finished batch
 * Lenient runs succeed whenever preconditions held; strict runs also
 * require every row to have rendered.
 */
export function batchExitCode(result: BatchResult, strict: boolean): number {
  return strict && result.failedRows > 0 ? 1 : 0;
}
