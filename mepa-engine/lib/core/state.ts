import type { ExecutionMode } from "@/lib/mepa-schema";

/** スタック/メモリ/出力の値は任意精度整数。アドレスや個数は number のまま */
export type MachineState = {
  stack: bigint[];
  memory: bigint[];
  /** 昇順に並べた行列へのインデックス */
  pc: number;
  mode: ExecutionMode;
  steps: number;
  /** IMPR が出力した値（出力順） */
  output: bigint[];
};

// 実行開始ごとに丸ごと作り直す
export function createMachineState(pc: number, mode: ExecutionMode): MachineState {
  return { stack: [], memory: [], pc, mode, steps: 0, output: [] };
}

export function cloneState(state: MachineState): MachineState {
  return {
    ...state,
    stack: [...state.stack],
    memory: [...state.memory],
    output: [...state.output],
  };
}
