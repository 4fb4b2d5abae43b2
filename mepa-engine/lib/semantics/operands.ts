import type { Instruction } from "@/mepa-ast";
import { parseIntegerToken, parseValueToken } from "@/mepa-ast";
import { MachineError } from "../core/errors";

export function expectSingleArg(instr: Instruction): string {
  if (instr.args.length !== 1) {
    throw new MachineError(
      "MalformedArguments",
      `${instr.mnemonic} は引数を 1 つ必要とします (got: ${instr.args.length})`,
      undefined,
      { args: instr.args },
    );
  }
  return instr.args[0];
}

export function expectIntArg(instr: Instruction): number {
  const raw = expectSingleArg(instr);
  const value = parseIntegerToken(raw);
  if (value === undefined) {
    throw new MachineError(
      "MalformedArguments",
      `${instr.mnemonic} の引数が整数ではありません: '${raw}'`,
      undefined,
      { arg: raw },
    );
  }
  return value;
}

/** CRCT の即値。アドレスや個数と違い桁数に上限はない */
export function expectValueArg(instr: Instruction): bigint {
  const raw = expectSingleArg(instr);
  const value = parseValueToken(raw);
  if (value === undefined) {
    throw new MachineError(
      "MalformedArguments",
      `${instr.mnemonic} の引数が整数ではありません: '${raw}'`,
      undefined,
      { arg: raw },
    );
  }
  return value;
}
