import { describe, it, expect } from "vitest";
import { ProgramError, ProgramImage } from "..";

describe("ProgramImage", () => {
  it("keeps lines in ascending line-number order regardless of insertion", () => {
    const image = new ProgramImage();
    image.setLine(30, "PARA");
    image.setLine(5, "INPP");
    image.setLine(10, "  CRCT 1  ");
    expect(image.entries()).toEqual([
      [5, "INPP"],
      [10, "CRCT 1"],
      [30, "PARA"],
    ]);
    expect(image.modified).toBe(true);
  });

  it("reports insert vs update", () => {
    const image = new ProgramImage();
    expect(image.setLine(1, "NADA")).toBe("inserted");
    expect(image.setLine(1, "PARA")).toBe("updated");
    expect(image.get(1)).toBe("PARA");
  });

  it("rejects negative line numbers", () => {
    const image = new ProgramImage();
    expect(() => image.setLine(-1, "NADA")).toThrow(ProgramError);
  });

  it("deletes single lines", () => {
    const image = new ProgramImage();
    image.setLine(1, "NADA");
    expect(image.deleteLine(1)).toBe(true);
    expect(image.deleteLine(1)).toBe(false);
    expect(image.size).toBe(0);
  });

  it("deletes a range and returns the removed pairs", () => {
    const image = new ProgramImage();
    for (const ln of [1, 2, 3, 10]) image.setLine(ln, `CRCT ${ln}`);
    const removed = image.deleteRange(2, 9);
    expect(removed).toEqual([
      [2, "CRCT 2"],
      [3, "CRCT 3"],
    ]);
    expect(image.entries().map(([ln]) => ln)).toEqual([1, 10]);
  });

  it("rejects an inverted range", () => {
    const image = new ProgramImage();
    expect(() => image.deleteRange(5, 1)).toThrow("範囲が不正です");
  });

  it("replaceAll resets the modified flag and remembers the file", () => {
    const image = new ProgramImage();
    image.setLine(1, "NADA");
    image.replaceAll([[2, "PARA"]], "prog.mepa");
    expect(image.entries()).toEqual([[2, "PARA"]]);
    expect(image.modified).toBe(false);
    expect(image.filename).toBe("prog.mepa");
  });
});
