/**
 * Rendered artifacts always carry an .html or .htm extension
 *
 * @example
 * normalizeOutputPath("out/report") // "out/report.html"
 * normalizeOutputPath("out/report.HTM") // "out/report.HTM"
 */
export function normalizeOutputPath(path: string): string {
  return /\.html?$/i.test(path) ? path : `${path}.html`;
}
