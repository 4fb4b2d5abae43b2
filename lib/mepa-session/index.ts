import type { ProgramLine, ProgramSource } from "@/mepa-ast";
import {
  DebugController,
  InvalidStateError,
  MachineError,
  MepaEngine,
  type EngineOptions,
  type RunOptions,
} from "@/mepa-engine";
import {
  MEPA_SCHEMA_VERSION,
  type ControlError,
  type ControlResult,
  type DebugReport,
  type ExecutionMode,
  type FailureReport,
  type InspectReport,
  type InstructionView,
  type RunReport,
  type StopReport,
} from "@/lib/mepa-schema";

export type { EngineOptions, RunOptions };

export type SessionOptions = EngineOptions & {
  /** run() の既定の命令数上限 */
  maxSteps?: number;
};

function toView(entry: ProgramLine | undefined): InstructionView | undefined {
  return entry ? { line: entry.line, text: entry.text } : undefined;
}

function toControlError(err: unknown): ControlError {
  if (err instanceof MachineError) {
    return { type: err.kind, message: err.message, line: err.line, detail: err.detail };
  }
  if (err instanceof InvalidStateError) {
    return { type: "InvalidState", message: err.message, detail: { mode: err.mode } };
  }
  return {
    type: "InternalError",
    message: err instanceof Error ? err.message : "実行中に例外が発生しました",
    detail: err,
  };
}

function buildFailure(err: unknown, output: bigint[] = []): FailureReport {
  return {
    ok: false,
    schemaVersion: MEPA_SCHEMA_VERSION,
    error: toControlError(err),
    output,
  };
}

/**
 * REPL などの呼び出し側に向けた制御面。
 * 例外は投げず、成功レポートか構造化エラーを返す。
 */
export class MepaSession {
  private readonly engine: MepaEngine;
  private readonly controller: DebugController;
  private readonly defaultMaxSteps?: number;

  constructor(source: ProgramSource, options: SessionOptions = {}) {
    const { maxSteps, ...engineOptions } = options;
    this.engine = new MepaEngine(source, engineOptions);
    this.controller = new DebugController(this.engine);
    this.defaultMaxSteps = maxSteps;
  }

  get mode(): ExecutionMode {
    return this.engine.mode;
  }

  /** プログラムが編集されたあとに呼ぶ（実行開始時にも自動で作り直す） */
  rebuild(): void {
    this.engine.rebuild();
  }

  run(options: RunOptions = {}): ControlResult<RunReport> {
    try {
      const result = this.engine.run({
        maxSteps: options.maxSteps ?? this.defaultMaxSteps,
      });
      if (result.status === "failed") {
        return buildFailure(result.error, result.output);
      }
      return {
        ok: true,
        schemaVersion: MEPA_SCHEMA_VERSION,
        kind: "run",
        status: result.status,
        haltReason: result.status === "halted" ? result.reason : undefined,
        steps: result.steps,
        output: result.output,
      };
    } catch (err) {
      this.engine.discard();
      return buildFailure(err);
    }
  }

  debugStart(): ControlResult<DebugReport> {
    try {
      const started = this.controller.start();
      if (started.kind === "failed") return buildFailure(started.error);
      return {
        ok: true,
        schemaVersion: MEPA_SCHEMA_VERSION,
        kind: "debug",
        mode: this.mode,
        pending: toView(started.pending),
        output: [],
      };
    } catch (err) {
      this.engine.discard();
      return buildFailure(err);
    }
  }

  debugStep(): ControlResult<DebugReport> {
    try {
      const result = this.controller.step();
      if (result.kind === "failed") return buildFailure(result.error, result.output);
      return {
        ok: true,
        schemaVersion: MEPA_SCHEMA_VERSION,
        kind: "debug",
        mode: this.mode,
        executed: toView(result.executed),
        pending: result.kind === "paused" ? toView(result.pending) : undefined,
        haltReason: result.kind === "halted" ? result.reason : undefined,
        output: result.output,
      };
    } catch (err) {
      // 状態違反なら実行状態はそのまま（Halted の検査を続けられる）
      if (!(err instanceof InvalidStateError)) this.engine.discard();
      return buildFailure(err);
    }
  }

  debugStop(): ControlResult<StopReport> {
    try {
      this.controller.stop();
      return { ok: true, schemaVersion: MEPA_SCHEMA_VERSION, kind: "stop", mode: this.mode };
    } catch (err) {
      return buildFailure(err);
    }
  }

  inspect(): ControlResult<InspectReport> {
    try {
      const inspection = this.controller.inspect();
      return {
        ok: true,
        schemaVersion: MEPA_SCHEMA_VERSION,
        kind: "inspect",
        mode: this.mode,
        ...inspection,
      };
    } catch (err) {
      return buildFailure(err);
    }
  }
}

export function createSession(
  source: ProgramSource,
  options: SessionOptions = {},
): MepaSession {
  return new MepaSession(source, options);
}
