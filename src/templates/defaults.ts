/**
 * Built-in default templates
 * Used when no page template is configured
 */

/**
 * Page wrapping the diff2html markup of one comparison
 */
export function getDefaultPageTemplate(): string {
  return `<!DOCTYPE html>
<html>
<head>
<meta charset="UTF-8">
<title>{{fileA}} vs {{fileB}}</title>
<style>
{{{styles}}}
</style>
</head>
<body class="color-scheme-{{colorScheme}}" data-color-scheme="{{colorScheme}}">
<h1 class="diffpress-title">{{fileA}} &harr; {{fileB}}</h1>
<p class="diffpress-summary">{{changedLines}} {{plural changedLines "line" "lines"}} changed</p>
{{{diffHtml}}}
</body>
</html>
`;
}

/**
 * Output written when the two inputs have no differing lines
 */
export const NO_DIFFERENCES_HTML = "<html><body>No differences were found</body></html>\n";

/**
 * Page colors per scheme; unknown schemes fall back to "default"
 */
export const COLOR_SCHEMES: Record<string, { background: string; foreground: string; heading: string }> = {
  default: { background: "#ffffff", foreground: "#1f2328", heading: "#1f2328" },
  desert: { background: "#333333", foreground: "#ffffff", heading: "#f0e68c" },
  evening: { background: "#333333", foreground: "#ffffff", heading: "#ffa500" },
  morning: { background: "#e4e4e4", foreground: "#000000", heading: "#a52a2a" },
};
