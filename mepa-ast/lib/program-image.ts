import type { LineNumber, ProgramEntry, ProgramSource } from "../types/program";

export class ProgramError extends Error {
  detail?: unknown;

  constructor(message: string, detail?: unknown) {
    super(message);
    this.name = "ProgramError";
    this.detail = detail;
  }
}

function assertLineNumber(line: number): void {
  if (!Number.isSafeInteger(line) || line < 0) {
    throw new ProgramError(`行番号は 0 以上の整数で指定してください (got: ${line})`, {
      line,
    });
  }
}

/**
 * 行番号 → 命令テキストの疎な対応表。
 * 実行順は常に行番号の昇順で、連続性は仮定しない。
 */
export class ProgramImage implements ProgramSource {
  private readonly lines = new Map<LineNumber, string>();
  private dirty = false;
  private currentFile: string | undefined;

  get size(): number {
    return this.lines.size;
  }

  get modified(): boolean {
    return this.dirty;
  }

  get filename(): string | undefined {
    return this.currentFile;
  }

  get(line: LineNumber): string | undefined {
    return this.lines.get(line);
  }

  setLine(line: LineNumber, text: string): "inserted" | "updated" {
    assertLineNumber(line);
    const existed = this.lines.has(line);
    this.lines.set(line, text.trim());
    this.dirty = true;
    return existed ? "updated" : "inserted";
  }

  deleteLine(line: LineNumber): boolean {
    const removed = this.lines.delete(line);
    if (removed) this.dirty = true;
    return removed;
  }

  deleteRange(first: LineNumber, last: LineNumber): ProgramEntry[] {
    if (first > last) {
      throw new ProgramError("範囲が不正です（開始行 > 終了行）", { first, last });
    }
    const removed = this.entries().filter(([ln]) => ln >= first && ln <= last);
    for (const [ln] of removed) this.lines.delete(ln);
    if (removed.length > 0) this.dirty = true;
    return removed;
  }

  entries(): ProgramEntry[] {
    return [...this.lines.keys()]
      .sort((a, b) => a - b)
      .map((ln) => [ln, this.lines.get(ln) ?? ""] as const);
  }

  /** ファイルから読み込んだ内容で置き換える（未変更扱い） */
  replaceAll(entries: Iterable<ProgramEntry>, filename?: string): void {
    this.lines.clear();
    for (const [ln, text] of entries) {
      assertLineNumber(ln);
      this.lines.set(ln, text.trim());
    }
    this.currentFile = filename;
    this.dirty = false;
  }

  markSaved(filename: string): void {
    this.currentFile = filename;
    this.dirty = false;
  }

  clear(): void {
    this.lines.clear();
    this.dirty = false;
    this.currentFile = undefined;
  }
}
