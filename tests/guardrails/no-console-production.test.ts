import fs from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { productionSources } from "../support/source-files";

const FORBIDDEN_CONSOLE_PATTERN = /console\.(log|warn|error)\s*\(/;

describe("console usage guardrail", () => {
  it("blocks console.log / console.warn / console.error in production code paths", () => {
    const offenders = productionSources()
      .filter((file) => FORBIDDEN_CONSOLE_PATTERN.test(fs.readFileSync(file, "utf8")))
      .map((file) => path.relative(process.cwd(), file));

    expect(offenders).toEqual([]);
  });

  it("would fail when raw console.log usage appears", () => {
    const source = "export const demo = () => { console.log('debug line'); };";
    expect(FORBIDDEN_CONSOLE_PATTERN.test(source)).toBe(true);
  });
});
