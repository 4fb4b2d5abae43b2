// MEPA 命令の型定義

export const OPCODES = [
  "INPP",
  "PARA",
  "AMEM",
  "DMEM",
  "CRCT",
  "CRVL",
  "ARMZ",
  "SOMA",
  "SUBT",
  "MULT",
  "DIVI",
  "INVR",
  "CONJ",
  "DISJ",
  "CMME",
  "CMMA",
  "CMIG",
  "CMDG",
  "CMEG",
  "CMAG",
  "DSVS",
  "DSVF",
  "NADA",
  "IMPR",
] as const;

export type Opcode = (typeof OPCODES)[number];

export type Identifier = string;

/**
 * 1 行分の命令。
 * - opcode "none": 空行やラベルのみの行
 * - opcode "unknown": 認識できないニーモニック（実行時にエラー）
 */
export type Instruction = {
  label?: Identifier;
  opcode: Opcode | "none" | "unknown";
  /** 大文字化したニーモニック。none のときは空文字 */
  mnemonic: string;
  args: string[];
  text: string;
};
