import type {
  LabelTable,
  ProgramEntry,
  ProgramLine,
  ProgramSnapshot,
  TargetResolution,
} from "../types/program";
import { parseInstruction, parseIntegerToken } from "./parser";

/**
 * 行番号順に命令を解析し、行インデックスとラベル表を作る。
 * 同じラベルが複数行にある場合は行番号の大きい方が勝つ。
 */
export function buildSnapshot(entries: Iterable<ProgramEntry>): ProgramSnapshot {
  const lines: ProgramLine[] = [...entries]
    .sort(([a], [b]) => a - b)
    .map(([line, text]) => ({ line, text, instr: parseInstruction(text) }));

  const lineIndex = new Map<number, number>();
  const labels: LabelTable = new Map();

  lines.forEach((entry, index) => {
    lineIndex.set(entry.line, index);
    if (entry.instr.label !== undefined) {
      labels.set(entry.instr.label, entry.line);
    }
  });

  return { lines, lineIndex, labels };
}

/** INPP を含む最初の行、なければ先頭行。空プログラムは undefined */
export function findStartIndex(snapshot: ProgramSnapshot): number | undefined {
  if (snapshot.lines.length === 0) return undefined;
  const inpp = snapshot.lines.findIndex((l) => l.instr.opcode === "INPP");
  return inpp >= 0 ? inpp : 0;
}

// 行番号として解決を試み、だめならラベルとして解決する
export function resolveTarget(
  snapshot: ProgramSnapshot,
  token: string,
): TargetResolution {
  const asLine = parseIntegerToken(token);
  if (asLine !== undefined) {
    const index = snapshot.lineIndex.get(asLine);
    if (index !== undefined) return { kind: "line", line: asLine, index };
  }

  const labelLine = snapshot.labels.get(token);
  if (labelLine !== undefined) {
    const index = snapshot.lineIndex.get(labelLine);
    if (index !== undefined) {
      return { kind: "line", line: labelLine, index, label: token };
    }
  }

  return { kind: "unresolved", target: token };
}
