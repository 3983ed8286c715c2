/**
 * Terminal Prompt
 * Interactive operator input powered by @inquirer/prompts
 */

import { confirm, input, password } from "@inquirer/prompts";
import type { Ora } from "ora";
import { CANCELLED } from "../types";
import type { Cancelled, Prompt } from "../types";

const OFFSET = "    ";

/**
 * Ctrl-C inside a prompt rejects with ExitPromptError
 */
function isExitPromptError(error: unknown): boolean {
  return error instanceof Error && error.name === "ExitPromptError";
}

async function orCancelled<T>(question: Promise<T>): Promise<T | Cancelled> {
  try {
    return await question;
  } catch (error) {
    if (isExitPromptError(error)) return CANCELLED;
    throw error;
  }
}

/**
 * A spinner passed in is stopped before every question
 */
export class TerminalPrompt implements Prompt {
  constructor(private readonly spinner?: Ora) {}

  password(message: string): Promise<string | Cancelled> {
    this.spinner?.stop();
    return orCancelled(password({ message: `${OFFSET}${message}`, mask: false }));
  }

  confirm(message: string): Promise<boolean | Cancelled> {
    this.spinner?.stop();
    return orCancelled(confirm({ message: `${OFFSET}WARNING:  ${message}`, default: false }));
  }

  async acknowledge(message: string): Promise<void | Cancelled> {
    this.spinner?.stop();
    const answer = await orCancelled(input({ message }));
    return answer === CANCELLED ? CANCELLED : undefined;
  }
}
