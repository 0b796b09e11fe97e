/**
 * 安全替换
 * 按字面量引号类型转义译文，只改写字面量内容区间
 */
import type { Token } from "../types";

/**
 * 单/双引号字面量的转义
 * - 未转义的定界引号前补反斜杠（已有的 \" 保持不变）
 * - 原始换行写成 \n
 * - 结尾孤立的反斜杠补成 \\，避免吞掉收尾引号
 */
export function escapeForQuote(s: string, quote: string): string {
  let out = "";
  let i = 0;
  while (i < s.length) {
    const c = s[i];
    if (c === "\\") {
      if (i + 1 >= s.length) {
        out += "\\\\";
        i++;
        continue;
      }
      if (s[i + 1] === "\n") {
        out += "\\\\" + "\\n";
        i += 2;
        continue;
      }
      out += c + s[i + 1];
      i += 2;
      continue;
    }
    if (c === "\n") {
      out += "\\n";
    } else if (c === quote) {
      out += "\\" + c;
    } else {
      out += c;
    }
    i++;
  }
  return out;
}

/**
 * 三引号字面量的内容清理
 * - 连续三个未转义的定界引号在第三个前插入反斜杠
 * - 结尾的未转义定界引号会和收尾三引号连成一片，需要转义
 * - 结尾孤立的反斜杠补成 \\
 */
export function sanitizeTripleContent(s: string, tripleQuote: string): string {
  const q = tripleQuote[0];
  let out = "";
  let run = 0;
  let i = 0;
  while (i < s.length) {
    const c = s[i];
    if (c === "\\") {
      if (i + 1 >= s.length) {
        out += "\\\\";
        i++;
      } else {
        out += c + s[i + 1];
        i += 2;
      }
      run = 0;
      continue;
    }
    if (c === q) {
      if (run === 2) {
        out += "\\" + c;
        run = 0;
      } else {
        out += c;
        run++;
      }
    } else {
      out += c;
      run = 0;
    }
    i++;
  }
  if (run > 0) {
    out = out.slice(0, -1) + "\\" + q;
  }
  return out;
}

/**
 * 按字面量类型得到可直接写入内容区间的安全文本
 */
export function safeContentFor(token: Token, translated: string): string {
  return token.isTriple
    ? sanitizeTripleContent(translated, token.quote)
    : escapeForQuote(translated, token.quote);
}

/**
 * 用译文替换字面量内容，引号与文件其余部分保持不变
 * 返回新的完整文本
 */
export function replaceToken(text: string, token: Token, translated: string): string {
  return text.slice(0, token.innerStart) + safeContentFor(token, translated) + text.slice(token.innerEnd);
}
