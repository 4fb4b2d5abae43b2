import type { ExecutionMode, HaltReason } from "@/lib/mepa-schema";
import {
  buildSnapshot,
  findStartIndex,
  type ProgramLine,
  type ProgramSnapshot,
  type ProgramSource,
} from "@/mepa-ast";
import { MachineError } from "../core/errors";
import { cloneState, createMachineState, type MachineState } from "../core/state";
import { applyInstruction, type ControlEffect } from "../semantics";

export type EngineOptions = {
  /** IMPR の出力先。値は state.output にも蓄積される */
  onOutput?: (value: bigint, line: number) => void;
};

export type RunOptions = {
  /** 実行命令数の上限。省略時は無制限 */
  maxSteps?: number;
};

/** output はその 1 ステップで IMPR が出力した値 */
export type StepResult =
  | { kind: "continue"; line: number; output: bigint[] }
  | { kind: "jumped"; line: number; target: number; output: bigint[] }
  | { kind: "halted"; line?: number; reason: HaltReason; output: bigint[] }
  | { kind: "failed"; line: number; error: MachineError; output: bigint[] };

export type StartResult =
  | { kind: "ready"; pending: ProgramLine }
  | { kind: "failed"; error: MachineError };

export type RunResult =
  | { status: "halted"; reason: HaltReason; steps: number; output: bigint[] }
  | { status: "step-limit"; steps: number; output: bigint[] }
  | { status: "failed"; error: MachineError; steps: number; output: bigint[] };

const EMPTY_SNAPSHOT: ProgramSnapshot = {
  lines: [],
  lineIndex: new Map(),
  labels: new Map(),
};

/**
 * MEPA の実行エンジン。スタック・メモリ・PC を 1 インスタンスで占有する。
 * 行表とラベル表は開始時点のスナップショットを使う。
 */
export class MepaEngine {
  private snap: ProgramSnapshot = EMPTY_SNAPSHOT;
  private machine: MachineState | undefined;

  constructor(
    private readonly source: ProgramSource,
    private readonly options: EngineOptions = {},
  ) {}

  /** プログラムイメージが変わったら呼ぶ */
  rebuild(): ProgramSnapshot {
    this.snap = buildSnapshot(this.source.entries());
    return this.snap;
  }

  /** 実行状態の複製。書き換えてもエンジンには影響しない */
  get state(): Readonly<MachineState> | undefined {
    return this.machine && cloneState(this.machine);
  }

  get mode(): ExecutionMode {
    return this.machine?.mode ?? "Idle";
  }

  /** 次に実行される命令。PC が末尾を越えていれば undefined */
  get pending(): ProgramLine | undefined {
    if (!this.machine) return undefined;
    return this.snap.lines[this.machine.pc];
  }

  /** 状態を作り直し、INPP（なければ先頭行）から開始できるようにする */
  start(mode: Extract<ExecutionMode, "Running" | "DebugPaused">): StartResult {
    this.machine = undefined;
    this.rebuild();
    const startIndex = findStartIndex(this.snap);
    if (startIndex === undefined) {
      return {
        kind: "failed",
        error: new MachineError("EmptyProgram", "実行するコードがありません"),
      };
    }
    this.machine = createMachineState(startIndex, mode);
    return { kind: "ready", pending: this.snap.lines[startIndex] };
  }

  /** 実行状態を破棄して Idle に戻す */
  discard(): void {
    this.machine = undefined;
  }

  step(): StepResult {
    const state = this.machine;
    if (!state) {
      throw new Error("engine has not been started");
    }
    if (state.mode === "Halted") {
      return { kind: "halted", reason: "end-of-program", output: [] };
    }

    const entry = this.snap.lines[state.pc];
    if (!entry) {
      state.mode = "Halted";
      return { kind: "halted", reason: "end-of-program", output: [] };
    }

    const output: bigint[] = [];
    let effect: ControlEffect;
    try {
      effect = applyInstruction(entry, state, {
        snapshot: this.snap,
        emit: (value) => {
          state.output.push(value);
          output.push(value);
          this.options.onOutput?.(value, entry.line);
        },
      });
    } catch (err) {
      // 中断した実行の状態は信用できないので、原因を問わず破棄する
      this.machine = undefined;
      if (err instanceof MachineError) {
        return { kind: "failed", line: entry.line, error: err.atLine(entry.line), output };
      }
      throw err;
    }
    state.steps += 1;

    switch (effect.kind) {
      case "halt":
        state.mode = "Halted";
        return { kind: "halted", line: entry.line, reason: "PARA", output };
      case "jump":
        state.pc = effect.index;
        return { kind: "jumped", line: entry.line, target: effect.line, output };
      case "next":
        state.pc += 1;
        if (state.pc >= this.snap.lines.length) {
          state.mode = "Halted";
          return { kind: "halted", line: entry.line, reason: "end-of-program", output };
        }
        return { kind: "continue", line: entry.line, output };
    }
  }

  /** リセットして PARA・末尾・エラーのいずれかまで止まらずに実行する */
  run(options: RunOptions = {}): RunResult {
    const started = this.start("Running");
    if (started.kind === "failed") {
      return { status: "failed", error: started.error, steps: 0, output: [] };
    }
    const state = this.machine;
    if (!state) {
      throw new Error("engine failed to start");
    }
    const maxSteps = options.maxSteps ?? Number.POSITIVE_INFINITY;

    while (state.steps < maxSteps) {
      const result = this.step();
      if (result.kind === "halted") {
        return {
          status: "halted",
          reason: result.reason,
          steps: state.steps,
          output: [...state.output],
        };
      }
      if (result.kind === "failed") {
        return {
          status: "failed",
          error: result.error,
          steps: state.steps,
          output: [...state.output],
        };
      }
    }

    return { status: "step-limit", steps: state.steps, output: [...state.output] };
  }
}
