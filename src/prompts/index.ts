export { TerminalPrompt } from "./terminal-prompt";
