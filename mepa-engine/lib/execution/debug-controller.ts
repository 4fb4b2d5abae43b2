import type { ExecutionMode, HaltReason, MachineInspection } from "@/lib/mepa-schema";
import type { ProgramLine } from "@/mepa-ast";
import { InvalidStateError, type MachineError } from "../core/errors";
import type { MepaEngine } from "./engine";
import { inspectState } from "./inspect";

export type DebugStartResult =
  | { kind: "paused"; pending: ProgramLine }
  | { kind: "failed"; error: MachineError };

export type DebugStepResult =
  | { kind: "paused"; executed: ProgramLine; pending: ProgramLine; output: bigint[] }
  | { kind: "halted"; executed?: ProgramLine; reason: HaltReason; output: bigint[] }
  | { kind: "failed"; error: MachineError; output: bigint[] };

/**
 * 1 命令ずつ止めながら実行するための状態機械。
 * Idle → DebugPaused → Halted。stop() でいつでも Idle に戻る。
 */
export class DebugController {
  constructor(private readonly engine: MepaEngine) {}

  get mode(): ExecutionMode {
    return this.engine.mode;
  }

  /** 状態をリセットして DebugPaused に入り、最初の命令を返す */
  start(): DebugStartResult {
    const started = this.engine.start("DebugPaused");
    if (started.kind === "failed") {
      return { kind: "failed", error: started.error };
    }
    return { kind: "paused", pending: started.pending };
  }

  step(): DebugStepResult {
    if (this.mode !== "DebugPaused") {
      throw new InvalidStateError(
        "デバッグモードではありません。先に DEBUG を実行してください",
        this.mode,
      );
    }

    const executed = this.engine.pending;
    const result = this.engine.step();
    const { output } = result;

    switch (result.kind) {
      case "failed":
        return { kind: "failed", error: result.error, output };
      case "halted":
        return { kind: "halted", executed, reason: result.reason, output };
      case "continue":
      case "jumped": {
        const pending = this.engine.pending;
        if (!executed || !pending) {
          throw new Error("debug step lost track of the program counter");
        }
        return { kind: "paused", executed, pending, output };
      }
    }
  }

  /** DebugPaused / Halted から Idle に戻し、状態を破棄する */
  stop(): void {
    const mode = this.mode;
    if (mode !== "DebugPaused" && mode !== "Halted") {
      throw new InvalidStateError("デバッグモードではありません", mode);
    }
    this.engine.discard();
  }

  inspect(): MachineInspection {
    const state = this.engine.state;
    if (!state) {
      throw new InvalidStateError("検査できる実行状態がありません", this.mode);
    }
    return inspectState(state);
  }
}
