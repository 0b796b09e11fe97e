/**
 * 字符串字面量扫描器
 * 不依赖完整语法，仅用字符级自动机切出单/双/三引号字面量的位置
 */
import type { QuoteStyle, Token } from "../types";
import { CodePositionCalculator } from "../performance";

/**
 * 统一换行符为 \n
 */
export function normalizeNewlines(s: string): string {
  return s.replace(/\r\n?/g, "\n");
}

/**
 * 取字面量的内容（不含引号）
 */
export function tokenInnerText(text: string, token: Token): string {
  return text.slice(token.innerStart, token.innerEnd);
}

/**
 * 三引号字面量：从 start 起找到下一个未转义的同类三引号
 * 返回 [innerEnd, end]，未闭合时两者均为文本末尾
 */
function scanTriple(text: string, start: number, quoteChar: string): [number, number] {
  const closing = quoteChar.repeat(3);
  const n = text.length;
  let j = start + 3;
  while (j < n) {
    const c = text[j];
    if (c === "\\") {
      j += 2;
      continue;
    }
    if (c === quoteChar && text.startsWith(closing, j)) {
      return [j, j + 3];
    }
    j++;
  }
  return [n, n];
}

/**
 * 单行字面量：遇到匹配引号结束；行尾或文本末尾视为未闭合
 * 返回 [innerEnd, end]
 */
function scanSingle(text: string, start: number, quoteChar: string): [number, number] {
  const n = text.length;
  let j = start + 1;
  while (j < n) {
    const c = text[j];
    if (c === "\n" || c === "\r") {
      return [j, j];
    }
    if (c === "\\") {
      // 反斜杠后紧跟换行时不吞掉换行，字面量在本行结束
      j += j + 1 < n && text[j + 1] !== "\n" && text[j + 1] !== "\r" ? 2 : 1;
      continue;
    }
    if (c === quoteChar) {
      return [j, j + 1];
    }
    j++;
  }
  return [n, n];
}

/**
 * 扫描文本中的全部字符串字面量（有序、互不重叠）
 * 纯函数，不会抛错；未闭合的字面量按容错规则截断
 */
export function scanStringLiterals(text: string): Token[] {
  const n = text.length;
  const tokens: Token[] = [];
  const positions = new CodePositionCalculator(text);
  let i = 0;

  while (i < n) {
    const ch = text[i];
    if (ch !== '"' && ch !== "'") {
      i++;
      continue;
    }

    const start = i;
    const isTriple = text.startsWith(ch.repeat(3), i);
    let quote: QuoteStyle;
    let innerStart: number;
    let innerEnd: number;
    let end: number;

    if (isTriple) {
      quote = ch === '"' ? '"""' : "'''";
      innerStart = start + 3;
      [innerEnd, end] = scanTriple(text, start, ch);
    } else {
      quote = ch === '"' ? '"' : "'";
      innerStart = start + 1;
      [innerEnd, end] = scanSingle(text, start, ch);
    }
    // 未闭合且内容为空时 end 可能小于 innerStart
    innerEnd = Math.max(innerEnd, Math.min(innerStart, n));
    end = Math.max(end, innerEnd);

    tokens.push({
      start,
      end,
      innerStart: Math.min(innerStart, n),
      innerEnd,
      quote,
      isTriple,
      startLine: positions.lineAt(start),
      endLine: positions.lineAt(Math.max(start, end - 1)),
    });
    i = Math.max(end, start + 1);
  }

  return tokens;
}
