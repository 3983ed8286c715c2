import { describe, it, expect } from "vitest";
import { normalizeOutputPath } from "./output-path";

describe("normalizeOutputPath", () => {
  it("appends .html to a bare locator", () => {
    expect(normalizeOutputPath("out/report")).toBe("out/report.html");
  });

  it("keeps .html and .htm in any case", () => {
    expect(normalizeOutputPath("out/report.html")).toBe("out/report.html");
    expect(normalizeOutputPath("out/report.HTM")).toBe("out/report.HTM");
  });

  it("appends to other extensions rather than replacing them", () => {
    expect(normalizeOutputPath("out/report.txt")).toBe("out/report.txt.html");
  });
});
