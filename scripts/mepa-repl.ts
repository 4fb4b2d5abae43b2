#!/usr/bin/env tsx
import { promises as fs } from "node:fs";
import path from "node:path";
import process from "node:process";
import readline from "node:readline";
import { fileURLToPath } from "node:url";
import {
  ProgramError,
  ProgramImage,
  formatProgramText,
  parseProgramText,
} from "../mepa-ast";
import { createSession, type MepaSession } from "../lib/mepa-session";

const LIST_PAGE_SIZE = 20;

export type ReplIO = {
  write(line: string): void;
  /** 1 行入力を受け取る。入力が終わっていれば undefined */
  ask(prompt: string): Promise<string | undefined>;
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, content: string): Promise<void>;
};

export type ReplOutcome = "continue" | "exit";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * MEPA の対話コマンドを処理する。入出力は ReplIO に委ねる。
 * LOAD / LIST / INS / DEL / SAVE / RUN / DEBUG / NEXT / STOP / STACK / EXIT
 */
export class MepaRepl {
  readonly program = new ProgramImage();
  private readonly session: MepaSession;
  private debugging = false;

  constructor(private readonly io: ReplIO) {
    this.session = createSession(this.program, {
      onOutput: (value) => this.io.write(String(value)),
    });
  }

  get inDebugMode(): boolean {
    return this.debugging;
  }

  async execute(input: string): Promise<ReplOutcome> {
    const trimmed = input.trim();
    if (trimmed === "") return "continue";

    const match = trimmed.match(/^(\S+)(?:\s+([\s\S]*))?$/);
    const cmd = (match?.[1] ?? "").toUpperCase();
    const argsText = (match?.[2] ?? "").trim();

    // 編集や再実行の前にデバッグを抜ける
    if (this.debugging && ["LOAD", "RUN", "INS", "DEL", "EXIT"].includes(cmd)) {
      this.stopDebug();
    }

    switch (cmd) {
      case "EXIT":
        await this.offerSave("未保存の変更があります。終了前に保存しますか? (y/n): ");
        this.io.write("終了します...");
        return "exit";
      case "LOAD":
        await this.load(argsText);
        break;
      case "LIST":
        await this.list();
        break;
      case "INS":
        this.insert(argsText);
        break;
      case "DEL":
        this.remove(argsText);
        break;
      case "SAVE":
        await this.save(argsText);
        break;
      case "RUN":
        this.run();
        break;
      case "DEBUG":
        this.debugStart();
        break;
      case "NEXT":
        this.debugNext();
        break;
      case "STOP":
        if (!this.debugging) {
          this.io.write("デバッグモードではありません");
          break;
        }
        this.stopDebug();
        break;
      case "STACK":
        this.showStack();
        break;
      default:
        this.io.write("エラー: 無効なコマンドです");
    }
    return "continue";
  }

  private async offerSave(prompt: string): Promise<void> {
    if (!this.program.modified) return;
    const answer = (await this.io.ask(prompt))?.trim().toLowerCase();
    if (answer !== "y") return;
    await this.writeProgram(this.program.filename);
  }

  private async writeProgram(filename: string | undefined): Promise<void> {
    if (filename === undefined) {
      this.io.write("保存に失敗しました: ファイル名が指定されていません");
      return;
    }
    try {
      await this.io.writeFile(filename, formatProgramText(this.program.entries()));
      this.program.markSaved(filename);
      this.io.write(`ファイル '${filename}' を保存しました`);
    } catch (err) {
      this.io.write(`保存に失敗しました: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  private async load(filename: string): Promise<void> {
    if (filename === "") {
      this.io.write("エラー: ファイル名を指定してください");
      return;
    }
    await this.offerSave(
      "未保存の変更があります。別のファイルを読み込む前に保存しますか? (y/n): ",
    );

    let text: string;
    try {
      text = await this.io.readFile(filename);
    } catch (err) {
      if (isNotFound(err)) {
        this.io.write(`エラー: ファイル '${filename}' が見つかりません`);
      } else {
        this.io.write(
          `ファイルの読み込みに失敗しました: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
      return;
    }

    this.program.replaceAll(parseProgramText(text), filename);
    this.session.rebuild();
    this.io.write(`ファイル '${filename}' を読み込みました`);
  }

  private async list(): Promise<void> {
    const entries = this.program.entries();
    if (entries.length === 0) {
      this.io.write("メモリにコードがありません");
      return;
    }
    for (let i = 0; i < entries.length; i += LIST_PAGE_SIZE) {
      for (const [ln, text] of entries.slice(i, i + LIST_PAGE_SIZE)) {
        this.io.write(`${ln} ${text}`);
      }
      if (i + LIST_PAGE_SIZE < entries.length) {
        const answer = await this.io.ask("続けるには Enter を押してください");
        if (answer === undefined) return;
      }
    }
  }

  private insert(argsText: string): void {
    const match = argsText.match(/^(\S+)\s+([\s\S]+)$/);
    if (!match) {
      this.io.write("エラー: INS <行> <命令> の形式で指定してください");
      return;
    }
    const [, lineText, instrText] = match;
    if (!/^[+-]?\d+$/.test(lineText)) {
      this.io.write("エラー: 行番号が不正です");
      return;
    }
    const line = Number(lineText);
    if (line < 0) {
      this.io.write("エラー: 行番号に負の値は使えません");
      return;
    }

    try {
      const kind = this.program.setLine(line, instrText);
      this.io.write(kind === "updated" ? "行を更新しました:" : "行を挿入しました:");
      this.io.write(`${line} ${this.program.get(line) ?? ""}`);
      this.session.rebuild();
    } catch (err) {
      if (err instanceof ProgramError) {
        this.io.write(`エラー: ${err.message}`);
        return;
      }
      throw err;
    }
  }

  private remove(argsText: string): void {
    const parts = argsText.split(/\s+/).filter((p) => p !== "");
    if (parts.length === 0 || parts.length > 2) {
      this.io.write("エラー: DEL <行> または DEL <開始行> <終了行> の形式で指定してください");
      return;
    }
    if (!parts.every((p) => /^[+-]?\d+$/.test(p))) {
      this.io.write("エラー: 行番号が不正です");
      return;
    }
    const [first, last] = parts.map(Number);

    if (last === undefined) {
      if (!this.program.deleteLine(first)) {
        this.io.write(`エラー: 行 ${first} は存在しません`);
        return;
      }
      this.io.write("行を削除しました:");
      this.io.write(String(first));
      this.session.rebuild();
      return;
    }

    if (first > last) {
      this.io.write("エラー: 範囲が不正です（開始行 > 終了行）");
      return;
    }
    const removed = this.program.deleteRange(first, last);
    if (removed.length === 0) {
      this.io.write(`範囲 ${first}-${last} に行がありません`);
      return;
    }
    this.io.write("行を削除しました:");
    for (const [ln, text] of removed) this.io.write(`${ln} ${text}`);
    this.session.rebuild();
  }

  private async save(argsText: string): Promise<void> {
    if (this.program.size === 0) {
      this.io.write("エラー: 保存するコードがありません");
      return;
    }
    await this.writeProgram(argsText === "" ? this.program.filename : argsText);
  }

  private run(): void {
    if (this.program.size === 0) {
      this.io.write("エラー: メモリにコードがありません");
      return;
    }
    const report = this.session.run();
    if (!report.ok) {
      this.io.write(`実行エラー: ${report.error.message}`);
    }
  }

  private debugStart(): void {
    if (this.program.size === 0) {
      this.io.write("エラー: メモリにコードがありません");
      return;
    }
    this.io.write("デバッグモードを開始します:");
    const report = this.session.debugStart();
    if (!report.ok) {
      this.debugging = false;
      this.io.write(`エラー: ${report.error.message}`);
      return;
    }
    this.debugging = true;
    if (report.pending) {
      this.io.write(`${report.pending.line} ${report.pending.text}`);
    }
  }

  private debugNext(): void {
    if (!this.debugging) {
      this.io.write("エラー: デバッグモードではありません。先に DEBUG を実行してください");
      return;
    }
    if (this.session.mode === "Halted") {
      this.io.write("プログラムは既に終了しています");
      return;
    }

    const report = this.session.debugStep();
    if (!report.ok) {
      if (report.error.type !== "InvalidState") this.debugging = false;
      this.io.write(`エラー: ${report.error.message}`);
      return;
    }
    if (report.haltReason === "PARA") {
      this.io.write("プログラムが終了しました (PARA)");
    } else if (report.haltReason === "end-of-program") {
      this.io.write("プログラムが終了しました");
    } else if (report.pending) {
      this.io.write(`${report.pending.line} ${report.pending.text}`);
    }
  }

  private stopDebug(): void {
    this.session.debugStop();
    this.debugging = false;
    this.io.write("デバッグモードを終了しました");
  }

  private showStack(): void {
    if (!this.debugging) {
      this.io.write("STACK コマンドはデバッグモードでのみ使用できます");
      return;
    }
    const report = this.session.inspect();
    if (!report.ok) {
      this.io.write(`エラー: ${report.error.message}`);
      return;
    }
    if (report.cells.length === 0) {
      this.io.write("スタックは空です");
      return;
    }
    this.io.write("スタックの内容");
    for (const cell of report.cells) {
      this.io.write(`${cell.address}: ${cell.value}`);
    }
  }
}

async function main() {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: process.stdin.isTTY,
  });
  const lines = rl[Symbol.asyncIterator]();
  rl.on("SIGINT", () => {
    process.stdout.write("\nEXIT で終了してください\n> ");
  });

  const io: ReplIO = {
    write: (line) => console.log(line),
    ask: async (prompt) => {
      process.stdout.write(prompt);
      const next = await lines.next();
      return next.done ? undefined : next.value;
    },
    readFile: (filePath) => fs.readFile(filePath, "utf8"),
    writeFile: (filePath, content) => fs.writeFile(filePath, content, "utf8"),
  };

  const repl = new MepaRepl(io);
  console.log("MEPA インタプリタ - EXIT で終了します");

  while (true) {
    const input = await io.ask("> ");
    if (input === undefined) {
      console.log("\n終了します...");
      break;
    }
    try {
      if ((await repl.execute(input)) === "exit") break;
    } catch (err) {
      console.error("エラー:", err instanceof Error ? err.message : err);
    }
  }
  rl.close();
}

const isMain =
  process.argv[1] !== undefined &&
  path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isMain) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
