/**
 * Row Parser Module
 * Turns one line of the batch description file into a comparison row
 *
 * Fields are comma separated with no quoting: a comma inside a path or
 * identifier cannot be expressed and splits the field.
 */

import { ROW_FIELDS } from "../types";
import type { ComparisonRow, ParseResult, RowField } from "../types";

// Whitespace, control characters and DEL are dropped from every record
const NON_PRINTABLE = /[\s\u0000-\u001f\u007f]/g;

export function parseRow(rawLine: string): ParseResult {
  if (rawLine.trimStart().startsWith("#")) {
    return { kind: "skip", reason: "comment" };
  }

  const line = rawLine.replace(NON_PRINTABLE, "");
  if (line === "") {
    return { kind: "skip", reason: "blank" };
  }

  const fields = line.split(",");
  const missing: RowField[] = ROW_FIELDS.filter((_, i) => !fields[i]);

  if (missing.length > 0 || fields.length !== ROW_FIELDS.length) {
    return { kind: "malformed", missing, fieldCount: fields.length };
  }

  const [sourceLocator1, fetchId1, sourceLocator2, fetchId2, outputLocator, publishId] =
    fields;

  const row: ComparisonRow = {
    sourceLocator1,
    fetchId1,
    sourceLocator2,
    fetchId2,
    outputLocator,
    publishId,
  };

  return { kind: "row", row };
}

/**
 * Split file contents into lines, keeping 1-based line numbers
 */
export function splitLines(content: string): Array<{ lineNumber: number; text: string }> {
  const lines = content.split("\n");
  // A trailing newline does not start another record
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.map((text, i) => ({ lineNumber: i + 1, text }));
}
