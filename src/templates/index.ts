/**
 * Template utilities for Handlebars page rendering
 */

import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import { COLOR_SCHEMES, getDefaultPageTemplate } from "./defaults";

export { NO_DIFFERENCES_HTML } from "./defaults";

export interface PageTemplateContext {
  fileA: string;
  fileB: string;
  colorScheme: string;
  changedLines: number;
  styles: string;
  diffHtml: string;
}

Handlebars.registerHelper("plural", (count: unknown, singular: unknown, plural: unknown) =>
  count === 1 ? String(singular) : String(plural),
);

/**
 * Load and compile a page template from file path or use default
 * Errors reading a custom template bubble up to the renderer
 */
export async function loadPageTemplate(
  templatePath: string | null,
): Promise<HandlebarsTemplateDelegate<PageTemplateContext>> {
  if (templatePath === null) {
    return Handlebars.compile<PageTemplateContext>(getDefaultPageTemplate());
  }

  const templateContent = await readFile(templatePath, "utf-8");
  return Handlebars.compile<PageTemplateContext>(templateContent);
}

/**
 * Page-level CSS for a color scheme
 */
export function colorSchemeStyles(colorScheme: string): string {
  const colors = COLOR_SCHEMES[colorScheme] ?? COLOR_SCHEMES.default;
  return [
    `body { background: ${colors.background}; color: ${colors.foreground}; font-family: sans-serif; }`,
    `.diffpress-title { color: ${colors.heading}; font-size: 1.2em; }`,
  ].join("\n");
}
