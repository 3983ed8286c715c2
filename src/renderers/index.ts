/**
 * Diff renderer exports
 */

import type { DiffRenderer, RendererConfig } from "../types";
import { BuiltinRenderer } from "./builtin-renderer";
import { VimdiffRenderer } from "./vimdiff-renderer";

export { BaseRenderer, countChangedLines } from "./base-renderer";
export { BuiltinRenderer } from "./builtin-renderer";
export {
  VimdiffRenderer,
  parseVimVersion,
  isVersionAtLeast,
  writeCommand,
} from "./vimdiff-renderer";

export function createRenderer(config: RendererConfig): DiffRenderer {
  switch (config.engine) {
    case "builtin":
      return new BuiltinRenderer(config);
    case "vimdiff":
      return new VimdiffRenderer(config);
  }
}
