/**
 * Usage text and fatal error reporting for CLI commands
 */

import chalk from "chalk";
import { errorMessage } from "../errors";

const OFFSET = "    ";

function usage(command: string, lines: string[]): string {
  const endline = `\n${OFFSET.repeat(4)}`;
  return `diffpress ${command}${endline}${lines.join(endline)}`;
}

export const BATCH_USAGE = usage("batch", [
  "[ --datafile <the name of a properly formatted CSV file *REQUIRED*> ]",
  "[ --username <the confluence username to use for authentication *REQUIRED*> ]",
  "[ --base-url <the confluence base URL, overrides confluence.baseUrl> ]",
  "[ --config <a configuration file> ]",
  "[ --timeout <milliseconds allowed per confluence or render call> ]",
  "[ --engine <builtin|vimdiff> ] [ --strict ] [ --no-pause ] [ --yes ]",
  "[ --report <path of a JSON report> ] [ --debug ] [ --verbose ]",
]);

export const COMPARE_USAGE = usage("compare", [
  "[ --infile1 <the path and name of input file 1 *REQUIRED*> ]",
  "[ --infile2 <the path and name of input file 2 *REQUIRED*> ]",
  "[ --outfile <the path and name of output file *REQUIRED*> ]",
  "[ --colorscheme <the color scheme to use *OPTIONAL*> ]",
  "[ --engine <builtin|vimdiff> ] [ --config <a configuration file> ] [ --yes ]",
]);

/**
 * Print a fatal error followed by the command's usage
 */
export function reportFatal(error: unknown, usageText: string): void {
  console.error("");
  console.error(`${OFFSET}${chalk.red("ERROR:")}  ${errorMessage(error)} ... processing halted`);
  console.error("");
  console.error(`${OFFSET}USAGE:  ${usageText}`);
  console.error("");
}
