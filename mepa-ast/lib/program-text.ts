import type { ProgramEntry } from "../types/program";

/**
 * 保存形式 `<行番号> <命令>` を読み込む。
 * 先頭が 0 以上の整数でない行は黙って読み飛ばす。同じ行番号は後勝ち。
 */
export function parseProgramText(text: string): ProgramEntry[] {
  const byLine = new Map<number, string>();

  for (const rawLine of text.split(/\r?\n/)) {
    const trimmed = rawLine.trim();
    if (trimmed === "") continue;

    const match = trimmed.match(/^(\S+)(?:\s+([\s\S]*))?$/);
    if (!match) continue;
    const [, head, rest] = match;
    if (!/^\+?\d+$/.test(head)) continue;
    const line = Number(head);
    if (!Number.isSafeInteger(line)) continue;

    byLine.set(line, rest ?? "");
  }

  return [...byLine.entries()].sort(([a], [b]) => a - b);
}

export function formatProgramText(entries: Iterable<ProgramEntry>): string {
  let out = "";
  for (const [line, text] of entries) {
    out += `${line} ${text}\n`;
  }
  return out;
}
