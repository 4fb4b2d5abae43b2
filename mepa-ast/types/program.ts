// プログラムイメージとスナップショットの型定義

import type { Identifier, Instruction } from "./instruction";

export type LineNumber = number;

export type ProgramEntry = readonly [line: LineNumber, text: string];

export type ProgramLine = {
  line: LineNumber;
  text: string;
  instr: Instruction;
};

export type LabelTable = Map<Identifier, LineNumber>;

/** 実行開始時に固定される行・ラベル表 */
export type ProgramSnapshot = {
  lines: ProgramLine[];
  lineIndex: Map<LineNumber, number>;
  labels: LabelTable;
};

// ジャンプ先解決結果の分類
export type TargetResolution =
  | { kind: "line"; line: LineNumber; index: number; label?: Identifier }
  | { kind: "unresolved"; target: string };

export type ProgramSource = {
  entries(): Iterable<ProgramEntry>;
};

export type { Identifier, Instruction };
