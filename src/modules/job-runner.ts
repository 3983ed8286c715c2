/**
 * Comparison Job Runner Module
 * Fetches missing sources, renders the comparison and publishes it for one row
 *
 * Every failure is recorded on the returned outcome and the tracker; nothing
 * here aborts the batch.
 */

import { rm } from "fs/promises";
import { errorMessage } from "../errors";
import { fileExists, normalizeOutputPath, withTimeout } from "../utils";
import { CANCELLED } from "../types";
import type { ComparisonRow, Credential, RowOutcome, RunContext } from "../types";

export async function runComparisonJob(
  ctx: RunContext,
  row: ComparisonRow,
  rowNumber: number,
): Promise<RowOutcome> {
  if (!ctx.credential) {
    throw new Error("Credential must be obtained before rows are processed");
  }

  const { config, contentStore, diffRenderer, tracker, logger } = ctx;
  const credential: Credential = ctx.credential;
  const outcome: RowOutcome = { rendered: false, published: false, fetched: 0, errors: [] };

  function fail(message: string): void {
    outcome.errors.push(message);
    logger.error(`Row ${rowNumber}: ${message}`);
  }

  // ============================================================================
  // 1. Make sure both sources are present locally
  // ============================================================================

  const sources = [
    { n: 1, path: row.sourceLocator1, id: row.fetchId1 },
    { n: 2, path: row.sourceLocator2, id: row.fetchId2 },
  ];

  for (const source of sources) {
    if (await fileExists(source.path)) continue;

    logger.info(`Downloading input file ${source.n} "${source.path}" from page ${source.id} ...`);

    let failure: unknown;
    try {
      await withTimeout(`Fetch of page ${source.id}`, config.confluence.timeout, (signal) =>
        contentStore.fetch(source.id, source.path, credential, signal),
      );
    } catch (error) {
      failure = error;
    }

    if (await fileExists(source.path)) {
      outcome.fetched++;
      tracker.incrementFetched();
      continue;
    }

    const message = `failed to fetch source ${source.n} "${source.path}" (page ${source.id})`;
    if (failure === undefined) {
      tracker.trackIssue({
        type: "fetch",
        reason: "not-found",
        path: source.path,
        row: rowNumber,
        details: "content store reported success but no file was written",
      });
      fail(message);
    } else {
      tracker.trackError(source.path, failure, "fetch", rowNumber);
      fail(`${message}: ${errorMessage(failure)}`);
    }
  }

  // ============================================================================
  // 2. Render, only with both sources in place
  // ============================================================================

  const artifactPath = normalizeOutputPath(row.outputLocator);
  const sourcesPresent =
    (await fileExists(row.sourceLocator1)) && (await fileExists(row.sourceLocator2));

  if (!sourcesPresent) {
    tracker.trackIssue({
      type: "render",
      reason: "missing-source",
      path: artifactPath,
      row: rowNumber,
    });
    fail(`skipping comparison for "${artifactPath}": source files are incomplete`);
    return outcome;
  }

  let renderFailed = false;
  try {
    if (!(await clearStaleArtifact(ctx, artifactPath))) {
      tracker.trackIssue({
        type: "render",
        reason: "overwrite-declined",
        path: artifactPath,
        row: rowNumber,
      });
      fail(`existing file "${artifactPath}" was kept; comparison not rendered`);
      return outcome;
    }

    logger.info(`Creating comparison "${artifactPath}" with ${diffRenderer.name}`);
    await withTimeout(`Rendering of "${artifactPath}"`, config.renderer.timeout, (signal) =>
      diffRenderer.render({
        fileA: row.sourceLocator1,
        fileB: row.sourceLocator2,
        outputPath: artifactPath,
        colorScheme: config.renderer.colorScheme,
        signal,
      }),
    );
  } catch (error) {
    renderFailed = true;
    tracker.trackError(artifactPath, error, "render", rowNumber);
    fail(`rendering of "${artifactPath}" failed: ${errorMessage(error)}`);
  }

  // The renderer may report success without writing anything
  outcome.rendered = await fileExists(artifactPath);
  if (!outcome.rendered) {
    if (!renderFailed) {
      tracker.trackIssue({
        type: "render",
        reason: "no-output",
        path: artifactPath,
        row: rowNumber,
      });
      fail(`renderer produced no file at "${artifactPath}"`);
    }
    return outcome;
  }

  // ============================================================================
  // 3. Publish the rendered artifact
  // ============================================================================

  logger.info(`Publishing "${artifactPath}" to page ${row.publishId} ...`);
  try {
    await withTimeout(`Publish to page ${row.publishId}`, config.confluence.timeout, (signal) =>
      contentStore.publish(row.publishId, artifactPath, credential, signal),
    );
    outcome.published = true;
    tracker.incrementPublished();
  } catch (error) {
    tracker.trackError(artifactPath, error, "publish", rowNumber);
    fail(`failed to publish "${artifactPath}" to page ${row.publishId}: ${errorMessage(error)}`);
  }

  return outcome;
}

/**
 * Remove an artifact left from an earlier run so the existence check after
 * rendering only sees fresh output. Returns false when it must be kept.
 */
async function clearStaleArtifact(ctx: RunContext, artifactPath: string): Promise<boolean> {
  if (!(await fileExists(artifactPath))) return true;

  switch (ctx.config.batch.overwrite) {
    case "never":
      return false;
    case "prompt": {
      const answer = await ctx.prompt.confirm(`Filename "${artifactPath}" exists ... overwrite?`);
      if (answer === CANCELLED || !answer) return false;
      break;
    }
    case "always":
      break;
  }

  ctx.logger.warn(`Local file "${artifactPath}" will be removed`);
  await rm(artifactPath, { force: true });
  return true;
}
