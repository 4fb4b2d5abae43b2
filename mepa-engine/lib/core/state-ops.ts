import { MachineError } from "./errors";
import type { MachineState } from "./state";

/** 比較・論理演算の真偽値は 1/0 としてスタックに積む */
export function toValue(value: bigint | boolean): bigint {
  if (typeof value === "boolean") return value ? 1n : 0n;
  return value;
}

export function push(state: MachineState, value: bigint | boolean): void {
  state.stack.push(toValue(value));
}

export function pop(state: MachineState): bigint {
  const value = state.stack.pop();
  if (value === undefined) {
    throw new MachineError("StackUnderflow", "スタックが空です");
  }
  return value;
}

export function peek(state: MachineState): bigint {
  if (state.stack.length === 0) {
    throw new MachineError("StackUnderflow", "スタックが空です");
  }
  return state.stack[state.stack.length - 1];
}

/** 右オペランド b、左オペランド a の順に取り出して [a, b] を返す */
export function popOperands(state: MachineState): [a: bigint, b: bigint] {
  if (state.stack.length < 2) {
    throw new MachineError(
      "StackUnderflow",
      `オペランドが不足しています (必要: 2, スタック: ${state.stack.length})`,
    );
  }
  const b = pop(state);
  const a = pop(state);
  return [a, b];
}

export function checkAddress(state: MachineState, address: number): void {
  if (address < 0) {
    throw new MachineError("MemoryOutOfBounds", `負のメモリアドレスです: ${address}`);
  }
  if (address >= state.memory.length) {
    const range =
      state.memory.length === 0
        ? "メモリ未割り当て"
        : `0..${state.memory.length - 1}`;
    throw new MachineError(
      "MemoryOutOfBounds",
      `メモリアドレス ${address} が範囲外です (${range})`,
    );
  }
}

export function load(state: MachineState, address: number): bigint {
  checkAddress(state, address);
  return state.memory[address];
}

export function store(state: MachineState, address: number, value: bigint): void {
  checkAddress(state, address);
  state.memory[address] = value;
}

export function allocate(state: MachineState, count: number): void {
  if (count < 0) {
    throw new MachineError("InvalidAllocation", `AMEM の引数が負です: ${count}`);
  }
  for (let i = 0; i < count; i += 1) state.memory.push(0n);
}

export function deallocate(state: MachineState, count: number): void {
  if (count < 0) {
    throw new MachineError("InvalidAllocation", `DMEM の引数が負です: ${count}`);
  }
  if (count > state.memory.length) {
    throw new MachineError(
      "InvalidAllocation",
      `DMEM ${count} は割り当て済みのメモリ (${state.memory.length}) を超えています`,
    );
  }
  state.memory.length -= count;
}
