/**
 * Capabilities injected into the batch pipeline
 * Real implementations live in src/stores, src/renderers and src/prompts;
 * tests supply fakes.
 */

/**
 * Operator credential for the content store.
 * Held in memory for one run only.
 */
export interface Credential {
  readonly username: string;
  readonly password: string;
}

export interface ContentStore {
  /** Throws a PreconditionError when the store cannot be reached at all */
  ensureReady(): void;

  /** Retrieve the content named by `id` into `destinationPath` */
  fetch(
    id: string,
    destinationPath: string,
    credential: Credential,
    signal: AbortSignal,
  ): Promise<void>;

  /** Publish the file at `sourcePath` under `id` */
  publish(
    id: string,
    sourcePath: string,
    credential: Credential,
    signal: AbortSignal,
  ): Promise<void>;
}

export interface RenderRequest {
  fileA: string;
  fileB: string;
  // Already normalized to .html/.htm
  outputPath: string;
  colorScheme: string;
  signal: AbortSignal;
}

export interface RenderResult {
  outputPath: string;
  changedLines: number;
}

export interface DiffRenderer {
  readonly name: string;
  render(request: RenderRequest): Promise<RenderResult>;
}

export const CANCELLED: unique symbol = Symbol("cancelled");
export type Cancelled = typeof CANCELLED;

export interface Prompt {
  password(message: string): Promise<string | Cancelled>;
  confirm(message: string): Promise<boolean | Cancelled>;
  acknowledge(message: string): Promise<void | Cancelled>;
}
