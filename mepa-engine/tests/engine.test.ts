import { describe, it, expect } from "vitest";
import { ProgramImage } from "@/mepa-ast";
import { MepaEngine } from "..";
import { programOf } from "./helpers";

describe("MepaEngine.run", () => {
  it.each([0n, 42n, -13n, 9007199254740993n, -123456789012345678901234567890n])(
    "CRCT %s; IMPR; PARA emits the value and keeps it on the stack",
    (v) => {
      const engine = new MepaEngine(programOf(`CRCT ${v}`, "IMPR", "PARA"));
      const result = engine.run();
      expect(result).toEqual({ status: "halted", reason: "PARA", steps: 3, output: [v] });
      expect(engine.state?.stack).toEqual([v]);
    },
  );

  it("keeps sums past 2^53 exact", () => {
    const engine = new MepaEngine(
      programOf(
        "CRCT 9007199254740991",
        "CRCT 1",
        "SOMA",
        "CRCT 1",
        "SOMA",
        "CRCT 9007199254740991",
        "SUBT",
        "IMPR",
      ),
    );
    expect(engine.run().output).toEqual([2n]);
  });

  it("keeps repeated products integral", () => {
    const lines = ["CRCT 1"];
    for (let i = 0; i < 21; i += 1) lines.push("CRCT 1000000000000000", "MULT");
    lines.push("IMPR");
    const result = new MepaEngine(programOf(...lines)).run();
    expect(result.output).toEqual([10n ** 315n]);
  });

  it("computes floor division for negative operands", () => {
    const engine = new MepaEngine(programOf("CRCT -7", "CRCT 2", "DIVI", "PARA"));
    engine.run();
    expect(engine.state?.stack).toEqual([-4n]);
  });

  it("AMEM n followed by DMEM n leaves memory unchanged", () => {
    const engine = new MepaEngine(
      programOf("AMEM 3", "CRCT 7", "ARMZ 1", "AMEM 4", "DMEM 4", "PARA"),
    );
    engine.run();
    expect(engine.state?.memory).toEqual([0n, 7n, 0n]);
  });

  it("starts at the INPP line when one exists", () => {
    const engine = new MepaEngine(programOf("CRCT 1", "IMPR", "INPP", "CRCT 2", "IMPR"));
    const result = engine.run();
    expect(result).toEqual({
      status: "halted",
      reason: "end-of-program",
      steps: 3,
      output: [2n],
    });
  });

  it("executes in ascending line order regardless of insertion order", () => {
    const image = new ProgramImage();
    image.setLine(30, "IMPR");
    image.setLine(5, "CRCT 8");
    image.setLine(40, "PARA");
    const result = new MepaEngine(image).run();
    expect(result.output).toEqual([8n]);
  });

  it("reports the failing line number", () => {
    const engine = new MepaEngine(programOf("AMEM 1", "CRVL 5", "PARA"));
    const result = engine.run();
    if (result.status !== "failed") throw new Error("expected failure");
    expect(result.error.kind).toBe("MemoryOutOfBounds");
    expect(result.error.line).toBe(20);
    expect(result.error.message).toBe(
      "行 20 でエラー: メモリアドレス 5 が範囲外です (0..0)",
    );
    expect(result.steps).toBe(1);
    // 中断後の状態は破棄される
    expect(engine.mode).toBe("Idle");
    expect(engine.state).toBeUndefined();
  });

  it("keeps output produced before a failure", () => {
    const result = new MepaEngine(programOf("CRCT 3", "IMPR", "CRCT 0", "DIVI")).run();
    expect(result.status).toBe("failed");
    expect(result.output).toEqual([3n]);
  });

  it("an empty program cannot start", () => {
    const result = new MepaEngine(new ProgramImage()).run();
    if (result.status !== "failed") throw new Error("expected failure");
    expect(result.error.kind).toBe("EmptyProgram");
    expect(result.error.line).toBeUndefined();
  });

  it("a back-jumping loop never halts within the step bound", () => {
    const engine = new MepaEngine(programOf("L1: CRCT 1", "DSVS L1"));
    const result = engine.run({ maxSteps: 101 });
    expect(result.status).toBe("step-limit");
    expect(result.steps).toBe(101);
    expect(engine.state?.stack).toHaveLength(51);
    expect(engine.mode).toBe("Running");
  });

  it("duplicate labels jump to the greater line number", () => {
    const engine = new MepaEngine(
      programOf("DSVS L1", "L1: CRCT 1", "IMPR", "PARA", "L1: CRCT 2", "IMPR", "PARA"),
    );
    expect(engine.run().output).toEqual([2n]);
  });

  it("DSVF with a non-zero condition falls through", () => {
    const engine = new MepaEngine(programOf("CRCT 1", "DSVF nowhere", "CRCT 9", "IMPR", "PARA"));
    const result = engine.run();
    expect(result.status).toBe("halted");
    expect(result.output).toEqual([9n]);
    expect(engine.state?.stack).toEqual([9n]);
  });

  it("computes a countdown loop", () => {
    const engine = new MepaEngine(
      programOf(
        "INPP",
        "AMEM 1",
        "CRCT 3",
        "ARMZ 0",
        "LOOP: CRVL 0",
        "CRCT 0",
        "CMMA",
        "DSVF FIM",
        "CRVL 0",
        "IMPR",
        "CRCT 1",
        "SUBT",
        "ARMZ 0",
        "DSVS LOOP",
        "FIM: DMEM 1",
        "PARA",
      ),
    );
    const result = engine.run();
    expect(result.output).toEqual([3n, 2n, 1n]);
    expect(engine.state?.memory).toEqual([]);
    expect(engine.state?.stack).toEqual([]);
  });

  it("forwards IMPR output to the sink with its line", () => {
    const seen: Array<[bigint, number]> = [];
    const engine = new MepaEngine(programOf("CRCT 5", "IMPR", "IMPR"), {
      onOutput: (value, line) => seen.push([value, line]),
    });
    engine.run();
    expect(seen).toEqual([
      [5n, 20],
      [5n, 30],
    ]);
  });

  it("each run starts from a fresh state", () => {
    const engine = new MepaEngine(programOf("AMEM 1", "CRCT 1", "PARA"));
    engine.run();
    engine.run();
    expect(engine.state?.memory).toEqual([0n]);
    expect(engine.state?.stack).toEqual([1n]);
    expect(engine.state?.output).toEqual([]);
  });

  it("picks up program edits at the next start", () => {
    const image = programOf("CRCT 1", "IMPR");
    const engine = new MepaEngine(image);
    expect(engine.run().output).toEqual([1n]);
    image.setLine(10, "CRCT 2");
    expect(engine.run().output).toEqual([2n]);
  });

  it("hands out a copy of the state", () => {
    const engine = new MepaEngine(programOf("AMEM 1", "CRCT 4", "PARA"));
    engine.run();
    const view = engine.state;
    view?.stack.push(99n);
    view?.memory.push(5n);
    view?.output.push(1n);
    expect(engine.state).toMatchObject({ stack: [4n], memory: [0n], output: [] });
  });
});

describe("MepaEngine.step", () => {
  it("reports continue, jumped and halted", () => {
    const engine = new MepaEngine(programOf("CRCT 0", "DSVF 40", "NADA", "PARA"));
    engine.start("DebugPaused");
    expect(engine.step()).toEqual({ kind: "continue", line: 10, output: [] });
    expect(engine.step()).toEqual({ kind: "jumped", line: 20, target: 40, output: [] });
    expect(engine.step()).toEqual({ kind: "halted", line: 40, reason: "PARA", output: [] });
    expect(engine.mode).toBe("Halted");
  });

  it("halts when the last line falls through", () => {
    const engine = new MepaEngine(programOf("NADA"));
    engine.start("DebugPaused");
    expect(engine.step()).toEqual({
      kind: "halted",
      line: 10,
      reason: "end-of-program",
      output: [],
    });
    expect(engine.pending).toBeUndefined();
  });

  it("returns the values IMPR emitted in that step", () => {
    const engine = new MepaEngine(programOf("CRCT 6", "IMPR", "PARA"));
    engine.start("DebugPaused");
    engine.step();
    expect(engine.step()).toEqual({ kind: "continue", line: 20, output: [6n] });
  });

  it("discards the state when the output sink throws", () => {
    const engine = new MepaEngine(programOf("CRCT 1", "IMPR", "PARA"), {
      onOutput: () => {
        throw new Error("sink closed");
      },
    });
    engine.start("DebugPaused");
    engine.step();
    expect(() => engine.step()).toThrow("sink closed");
    expect(engine.mode).toBe("Idle");
    expect(engine.state).toBeUndefined();
  });

  it("throws when not started", () => {
    expect(() => new MepaEngine(programOf("NADA")).step()).toThrow(
      "engine has not been started",
    );
  });
});
