import { OPCODES, type Instruction, type Opcode } from "../types/instruction";

const OPCODE_SET: ReadonlySet<string> = new Set(OPCODES);

/**
 * 1 行分の命令テキストを構造化する。失敗はしない。
 * `[label:] OPCODE [arg ...]` を想定し、解釈できない部分は unknown / none として残す。
 */
export function parseInstruction(rawText: string): Instruction {
  const text = rawText.trim();
  const { label, rest } = splitLabel(text);

  if (rest === "") {
    return { label, opcode: "none", mnemonic: "", args: [], text };
  }

  const tokens = tokenizeOrSplit(rest);
  const [head, ...args] = tokens;
  if (head === undefined) {
    return { label, opcode: "none", mnemonic: "", args: [], text };
  }

  const mnemonic = head.toUpperCase();
  return {
    label,
    opcode: isOpcode(mnemonic) ? mnemonic : "unknown",
    mnemonic,
    args,
    text,
  };
}

export function isLabelName(value: string): boolean {
  return /^[\p{L}\p{N}_]+$/u.test(value);
}

/** 整数として解釈できるトークンのみ数値化する（安全整数の範囲外は undefined） */
export function parseIntegerToken(token: string): number | undefined {
  const trimmed = token.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return undefined;
  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) return undefined;
  return value === 0 ? 0 : value;
}

/** スタック/メモリに載せる値のトークンを任意精度整数として解釈する */
export function parseValueToken(token: string): bigint | undefined {
  const trimmed = token.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return undefined;
  // BigInt は先頭の '+' を受け付けない
  return BigInt(trimmed.startsWith("+") ? trimmed.slice(1) : trimmed);
}

// --- 内部実装 ---

function isOpcode(value: string): value is Opcode {
  return OPCODE_SET.has(value);
}

function splitLabel(text: string): { label?: string; rest: string } {
  const colon = text.indexOf(":");
  if (colon < 0) return { rest: text };

  const candidate = text.slice(0, colon).trim();
  if (candidate === "" || !isLabelName(candidate)) {
    // ラベルとして不正ならコロンは通常の文字として扱う
    return { rest: text };
  }
  return { label: candidate, rest: text.slice(colon + 1).trim() };
}

class TokenizeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TokenizeError";
  }
}

function tokenizeOrSplit(text: string): string[] {
  try {
    return tokenize(text);
  } catch (err) {
    if (err instanceof TokenizeError) {
      // 閉じていない引用符などは空白区切りにフォールバック
      return text.split(/\s+/).filter((t) => t !== "");
    }
    throw err;
  }
}

/**
 * シェル風の字句分割。引用符で囲まれた部分は空白を含めて 1 トークンになる。
 * 閉じていない引用符や末尾のバックスラッシュは TokenizeError。
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let i = 0;

  const isWhitespace = (ch: string) => /\s/.test(ch);

  while (i < text.length) {
    const ch = text[i];

    if (isWhitespace(ch)) {
      if (inToken) {
        tokens.push(current);
        current = "";
        inToken = false;
      }
      i += 1;
      continue;
    }

    inToken = true;

    if (ch === "\\") {
      const next = text[i + 1];
      if (next === undefined) {
        throw new TokenizeError("末尾にエスケープ文字があります");
      }
      current += next;
      i += 2;
      continue;
    }

    if (ch === "'") {
      const end = text.indexOf("'", i + 1);
      if (end < 0) throw new TokenizeError("引用符 ' が閉じていません");
      current += text.slice(i + 1, end);
      i = end + 1;
      continue;
    }

    if (ch === '"') {
      let j = i + 1;
      let closed = false;
      while (j < text.length) {
        const c = text[j];
        if (c === '"') {
          closed = true;
          break;
        }
        if (c === "\\" && (text[j + 1] === '"' || text[j + 1] === "\\")) {
          current += text[j + 1];
          j += 2;
          continue;
        }
        current += c;
        j += 1;
      }
      if (!closed) throw new TokenizeError('引用符 " が閉じていません');
      i = j + 1;
      continue;
    }

    current += ch;
    i += 1;
  }

  if (inToken) tokens.push(current);
  return tokens;
}
