import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { ProgramImage, parseProgramText } from "@/mepa-ast";
import { createSession } from "..";

const caseDir = new URL("../../../mepa_case/", import.meta.url);

function loadCase(name: string): ProgramImage {
  const file = fileURLToPath(new URL(name, caseDir));
  const image = new ProgramImage();
  image.replaceAll(parseProgramText(readFileSync(file, "utf8")), file);
  return image;
}

describe("sample programs", () => {
  it.each([
    ["countdown.mepa", [3n, 2n, 1n]],
    ["arith.mepa", [-4n, 12n]],
    ["max.mepa", [30n]],
  ])("%s runs to PARA", (name, expected) => {
    const report = createSession(loadCase(name)).run();
    expect(report.ok && report.haltReason).toBe("PARA");
    expect(report.output).toEqual(expected);
  });
});
