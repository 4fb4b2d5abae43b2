#!/usr/bin/env tsx
import { promises as fs } from "node:fs";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";
import { ProgramImage, parseProgramText } from "../mepa-ast";
import { createSession, type MepaSession } from "../lib/mepa-session";
import {
  MEPA_SCHEMA_VERSION,
  type ControlError,
  type ControlResult,
  type RunReport,
} from "../lib/mepa-schema";

const DEFAULT_TARGET = "mepa_case";

type CliOptions = {
  maxSteps?: number;
  trace: boolean;
};

type ParsedArgs = {
  options: CliOptions;
  targets: string[];
};

type RunFn = (
  image: ProgramImage,
  options: CliOptions,
) => ControlResult<RunReport>;

async function main() {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
    return;
  }
  const { options, targets } = parsed;
  const targetList = targets.length > 0 ? targets : [DEFAULT_TARGET];
  const files = await collectMepaFiles(targetList);
  if (files.length === 0) {
    console.error("MEPA ファイルが見つかりませんでした。");
    process.exit(1);
  }

  let hadFailure = false;
  for (const filePath of files) {
    const ok = await runSingleCase(filePath, options);
    if (!ok) hadFailure = true;
  }

  if (hadFailure) {
    process.exit(1);
  }
}

function parseArgs(argv: string[]): ParsedArgs {
  const options: CliOptions = { trace: false };
  const targets: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      targets.push(arg);
      continue;
    }

    const [flag, maybeValue] = arg.includes("=")
      ? ((): [string, string | undefined] => {
          const [k, v] = arg.split("=", 2);
          return [k, v];
        })()
      : [arg, undefined];

    switch (flag) {
      case "--max-steps": {
        const value = maybeValue ?? argv[++i];
        const parsed = Number.parseInt(value ?? "", 10);
        if (!Number.isFinite(parsed) || parsed <= 0) {
          throw new Error("--max-steps は正の整数で指定してください");
        }
        options.maxSteps = parsed;
        break;
      }
      case "--trace": {
        options.trace = true;
        break;
      }
      case "--help": {
        printUsage();
        process.exit(0);
        break;
      }
      default:
        throw new Error(`未知のフラグです: ${flag}`);
    }
  }

  return { options, targets };
}

function printUsage() {
  console.log(`MEPA プログラム一括実行スクリプト
Usage: tsx scripts/run-mepa.ts [options] [file|dir ...]

Options:
  --max-steps <n>   実行命令数の上限。超えた場合は失敗扱い (default: 無制限)
  --trace           1 命令ずつデバッグ実行し、実行した命令を表示する
  --help            このヘルプを表示

引数を省略すると mepa_case/ 以下の全 .mepa を実行します。`);
}

async function collectMepaFiles(targets: string[]): Promise<string[]> {
  const collected = new Set<string>();
  for (const raw of targets) {
    const resolved = path.resolve(raw);
    try {
      const stats = await fs.stat(resolved);
      if (stats.isDirectory()) {
        await collectFromDir(resolved, collected);
      } else if (stats.isFile() && resolved.endsWith(".mepa")) {
        collected.add(resolved);
      }
    } catch (err) {
      console.error(`パスを解決できませんでした: ${raw}`);
      console.error(err);
    }
  }
  return Array.from(collected).sort();
}

async function collectFromDir(dir: string, acc: Set<string>) {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  await Promise.all(
    entries.map(async (entry) => {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await collectFromDir(fullPath, acc);
      } else if (entry.isFile() && entry.name.endsWith(".mepa")) {
        acc.add(fullPath);
      }
    }),
  );
}

function printValue(value: bigint) {
  console.log(String(value));
}

/** デバッグ実行で 1 命令ずつ進め、実行した命令を表示する */
function traceProgram(
  session: MepaSession,
  options: CliOptions,
): ControlResult<RunReport> {
  const started = session.debugStart();
  if (!started.ok) return started;

  const maxSteps = options.maxSteps ?? Number.POSITIVE_INFINITY;
  let steps = 0;
  const output: bigint[] = [];

  while (steps < maxSteps) {
    const report = session.debugStep();
    if (!report.ok) return { ...report, output: [...output, ...report.output] };
    steps += 1;
    output.push(...report.output);
    if (report.executed) {
      console.log(`  [trace] ${report.executed.line} ${report.executed.text}`);
    }
    if (report.mode === "Halted") {
      return {
        ok: true,
        schemaVersion: MEPA_SCHEMA_VERSION,
        kind: "run",
        status: "halted",
        haltReason: report.haltReason,
        steps,
        output,
      };
    }
  }

  session.debugStop();
  return {
    ok: true,
    schemaVersion: MEPA_SCHEMA_VERSION,
    kind: "run",
    status: "step-limit",
    steps,
    output,
  };
}

const defaultRun: RunFn = (image, options) => {
  const session = createSession(image, { onOutput: printValue });
  if (options.trace) return traceProgram(session, options);
  return session.run({ maxSteps: options.maxSteps });
};

async function runSingleCase(
  filePath: string,
  options: CliOptions,
  runFn: RunFn = defaultRun,
): Promise<boolean> {
  const relPath = path.relative(process.cwd(), filePath) || filePath;
  console.log(`\n=== ${relPath} ===`);

  let source: string;
  try {
    source = await fs.readFile(filePath, "utf8");
  } catch (err) {
    console.error("ファイルを読み込めませんでした", err);
    return false;
  }

  const image = new ProgramImage();
  image.replaceAll(parseProgramText(source), filePath);

  try {
    const report = runFn(image, options);
    if (!report.ok) {
      printRunResult(undefined, report.error);
      return false;
    }
    printRunResult(report);
    // 上限に達した場合は停止しなかったものとして失敗扱いにする
    return report.status === "halted";
  } catch (err) {
    console.error("実行に失敗しました", err);
    return false;
  }
}

function printRunResult(report?: RunReport, error?: ControlError) {
  if (report) {
    const reason = report.haltReason ? ` (${report.haltReason})` : "";
    console.log(`result     : ${report.status}${reason}`);
    console.log(`steps      : ${report.steps}`);
    console.log(`output     : ${report.output.join(", ") || "(none)"}`);
  }

  if (error) {
    console.log("result     : failed");
    console.log(`error.type : ${error.type}`);
    if (error.line !== undefined) console.log(`error.line : ${error.line}`);
    console.log(`error.msg  : ${error.message}`);
  }
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

export { parseArgs, runSingleCase, traceProgram };
