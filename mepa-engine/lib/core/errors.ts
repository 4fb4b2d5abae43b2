import type { ExecutionMode, MachineErrorKind } from "@/lib/mepa-schema";

export class MachineError extends Error {
  readonly kind: MachineErrorKind;
  readonly reason: string;
  readonly line?: number;
  detail?: unknown;

  constructor(
    kind: MachineErrorKind,
    reason: string,
    line?: number,
    detail?: unknown,
  ) {
    super(line === undefined ? reason : `行 ${line} でエラー: ${reason}`);
    this.name = "MachineError";
    this.kind = kind;
    this.reason = reason;
    this.line = line;
    this.detail = detail;
  }

  /** 発生箇所の行番号を付けた同種のエラーを返す */
  atLine(line: number): MachineError {
    return new MachineError(this.kind, this.reason, line, this.detail);
  }
}

// デバッグ操作を不正な状態で呼んだ場合（マシン状態には触れない）
export class InvalidStateError extends Error {
  readonly mode: ExecutionMode;

  constructor(message: string, mode: ExecutionMode) {
    super(message);
    this.name = "InvalidStateError";
    this.mode = mode;
  }
}
