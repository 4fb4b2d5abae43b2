export const MEPA_SCHEMA_VERSION = "1.0.0" as const;

export type ExecutionMode = "Idle" | "Running" | "DebugPaused" | "Halted";

export type HaltReason = "PARA" | "end-of-program";

/** 実行時エラーの分類（いずれも実行全体を打ち切る） */
export type MachineErrorKind =
  | "StackUnderflow"
  | "MemoryOutOfBounds"
  | "InvalidAllocation"
  | "MalformedArguments"
  | "UnresolvedTarget"
  | "UnknownOpcode"
  | "DivisionByZero"
  | "EmptyProgram";

export type ControlErrorType = MachineErrorKind | "InvalidState" | "InternalError";

export type ControlError = {
  type: ControlErrorType;
  message: string;
  /** 失敗した命令の行番号（開始前のエラーでは無し） */
  line?: number;
  detail?: unknown;
};

export type InstructionView = {
  line: number;
  text: string;
};

// ---------- Inspection ----------

export type CellView = {
  address: number;
  value: bigint;
  region: "memory" | "stack";
};

export type MachineInspection = {
  memory: bigint[];
  stack: bigint[];
  /** メモリ → スタック（底から頂上）の順に通し番号を振った一覧 */
  cells: CellView[];
};

// ---------- Reports ----------

export type RunReport = {
  ok: true;
  schemaVersion: typeof MEPA_SCHEMA_VERSION;
  kind: "run";
  status: "halted" | "step-limit";
  haltReason?: HaltReason;
  steps: number;
  output: bigint[];
};

export type DebugReport = {
  ok: true;
  schemaVersion: typeof MEPA_SCHEMA_VERSION;
  kind: "debug";
  mode: ExecutionMode;
  /** 直前に実行した命令（debugStart では無し） */
  executed?: InstructionView;
  /** 次に実行される命令。Halted では無し */
  pending?: InstructionView;
  haltReason?: HaltReason;
  output: bigint[];
};

export type StopReport = {
  ok: true;
  schemaVersion: typeof MEPA_SCHEMA_VERSION;
  kind: "stop";
  mode: ExecutionMode;
};

export type InspectReport = MachineInspection & {
  ok: true;
  schemaVersion: typeof MEPA_SCHEMA_VERSION;
  kind: "inspect";
  mode: ExecutionMode;
};

export type FailureReport = {
  ok: false;
  schemaVersion: typeof MEPA_SCHEMA_VERSION;
  error: ControlError;
  /** 失敗までに IMPR が出力した値 */
  output: bigint[];
};

export type ControlResult<T> = T | FailureReport;
