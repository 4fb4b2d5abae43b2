import type { Opcode, ProgramLine, ProgramSnapshot } from "@/mepa-ast";
import { resolveTarget } from "@/mepa-ast";
import { MachineError } from "../core/errors";
import type { MachineState } from "../core/state";
import {
  allocate,
  deallocate,
  load,
  peek,
  pop,
  popOperands,
  push,
  store,
} from "../core/state-ops";
import { expectIntArg, expectSingleArg, expectValueArg } from "./operands";

/** 命令実行後の制御の行き先 */
export type ControlEffect =
  | { kind: "next" }
  | { kind: "jump"; index: number; line: number }
  | { kind: "halt" };

export type ExecContext = {
  snapshot: ProgramSnapshot;
  emit: (value: bigint) => void;
};

type BinaryOpcode = Extract<
  Opcode,
  | "SOMA"
  | "SUBT"
  | "MULT"
  | "CONJ"
  | "DISJ"
  | "CMME"
  | "CMMA"
  | "CMIG"
  | "CMDG"
  | "CMEG"
  | "CMAG"
>;

const BINARY_OPS: Record<BinaryOpcode, (a: bigint, b: bigint) => bigint | boolean> = {
  SOMA: (a, b) => a + b,
  SUBT: (a, b) => a - b,
  MULT: (a, b) => a * b,
  CONJ: (a, b) => a !== 0n && b !== 0n,
  DISJ: (a, b) => a !== 0n || b !== 0n,
  CMME: (a, b) => a < b,
  CMMA: (a, b) => a > b,
  CMIG: (a, b) => a === b,
  CMDG: (a, b) => a !== b,
  CMEG: (a, b) => a <= b,
  CMAG: (a, b) => a >= b,
};

const NEXT: ControlEffect = { kind: "next" };

function assertNever(op: never, entry: ProgramLine): never {
  throw new Error(`unsupported opcode '${String(op)}' at line ${entry.line}`);
}

/** 床関数による整数除算（負の商は -∞ 方向に丸める） */
export function floorDiv(a: bigint, b: bigint): bigint {
  // bigint の `/` は 0 方向への切り捨て
  const q = a / b;
  return a % b !== 0n && (a < 0n) !== (b < 0n) ? q - 1n : q;
}

function jumpTo(ctx: ExecContext, entry: ProgramLine, token: string): ControlEffect {
  const res = resolveTarget(ctx.snapshot, token);
  if (res.kind === "unresolved") {
    throw new MachineError(
      "UnresolvedTarget",
      `${entry.instr.mnemonic}: ラベル/行 '${token}' が見つかりません`,
      undefined,
      { target: token },
    );
  }
  return { kind: "jump", index: res.index, line: res.line };
}

/**
 * 1 命令を実行して state を更新する。
 * 失敗は MachineError（行番号なし）として投げ、呼び出し側で行番号を付ける。
 */
export function applyInstruction(
  entry: ProgramLine,
  state: MachineState,
  ctx: ExecContext,
): ControlEffect {
  const { instr } = entry;

  switch (instr.opcode) {
    case "none":
    case "INPP":
    case "NADA":
      return NEXT;
    case "unknown":
      throw new MachineError(
        "UnknownOpcode",
        `未知の命令です: ${instr.mnemonic}`,
        undefined,
        { mnemonic: instr.mnemonic },
      );
    case "PARA":
      return { kind: "halt" };
    case "AMEM":
      allocate(state, expectIntArg(instr));
      return NEXT;
    case "DMEM":
      deallocate(state, expectIntArg(instr));
      return NEXT;
    case "CRCT":
      push(state, expectValueArg(instr));
      return NEXT;
    case "CRVL":
      push(state, load(state, expectIntArg(instr)));
      return NEXT;
    case "ARMZ": {
      const address = expectIntArg(instr);
      const value = pop(state);
      store(state, address, value);
      return NEXT;
    }
    case "SOMA":
    case "SUBT":
    case "MULT":
    case "CONJ":
    case "DISJ":
    case "CMME":
    case "CMMA":
    case "CMIG":
    case "CMDG":
    case "CMEG":
    case "CMAG": {
      const [a, b] = popOperands(state);
      push(state, BINARY_OPS[instr.opcode](a, b));
      return NEXT;
    }
    case "DIVI": {
      const [a, b] = popOperands(state);
      if (b === 0n) {
        throw new MachineError("DivisionByZero", "ゼロ除算です");
      }
      push(state, floorDiv(a, b));
      return NEXT;
    }
    case "INVR":
      push(state, -pop(state));
      return NEXT;
    case "DSVS":
      return jumpTo(ctx, entry, expectSingleArg(instr));
    case "DSVF": {
      const target = expectSingleArg(instr);
      const cond = pop(state);
      // 非 0 なら飛び先は参照しない
      if (cond !== 0n) return NEXT;
      return jumpTo(ctx, entry, target);
    }
    case "IMPR":
      ctx.emit(peek(state));
      return NEXT;
    default:
      return assertNever(instr.opcode, entry);
  }
}
