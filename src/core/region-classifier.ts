/**
 * 结构区域识别
 * 根据块起始行与缩进推断 python / label / screen 块的行范围
 */
import type { Region, RegionKind, Token } from "../types";

/**
 * 块起始行模式
 */
export const BLOCK_OPENERS: ReadonlyArray<{ kind: Region["kind"]; pattern: RegExp }> = [
  {
    kind: "protected-code",
    pattern:
      /^\s*(?:init(?:\s+-?\d+)?\s+)?python(?:\s+early)?(?:\s+hide)?(?:\s+in\s+\w+)?\s*:\s*(?:#.*)?$/,
  },
  {
    kind: "label",
    pattern: /^\s*label\s+[A-Za-z_.][A-Za-z0-9_.]*(?:\([^)]*\))?\s*:\s*(?:#.*)?$/,
  },
  {
    kind: "screen",
    pattern: /^\s*screen\s+[A-Za-z_][A-Za-z0-9_]*.*:\s*$/,
  },
];

/**
 * 区域判定优先级，越靠前越优先
 */
const REGION_PRIORITY: ReadonlyArray<Region["kind"]> = ["protected-code", "screen", "label"];

/**
 * 行首缩进宽度，制表符与空格都按 1 计
 */
export function indentWidth(line: string): number {
  let i = 0;
  while (i < line.length && (line[i] === " " || line[i] === "\t")) {
    i++;
  }
  return i;
}

function isBlankOrComment(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === "" || trimmed.startsWith("#");
}

function scanWith(lines: string[], kind: Region["kind"], pattern: RegExp): Region[] {
  const regions: Region[] = [];
  const n = lines.length;
  let i = 0;
  while (i < n) {
    if (!pattern.test(lines[i])) {
      i++;
      continue;
    }
    const baseIndent = indentWidth(lines[i]);
    let j = i + 1;
    while (j < n) {
      if (isBlankOrComment(lines[j])) {
        j++;
        continue;
      }
      if (indentWidth(lines[j]) <= baseIndent) {
        break;
      }
      j++;
    }
    // 起始行 i+1，结束行为 j（1-based，即收尾行的前一行）
    regions.push({ kind, startLine: i + 1, endLine: j });
    i = j;
  }
  return regions;
}

/**
 * 识别文本中的全部结构区域
 * 同类区域互不重叠，不同类区域之间不做合并
 */
export function detectRegions(text: string): Region[] {
  // 与字面量扫描器的行号保持一致：\n、\r\n 与单独的 \r 都是换行
  const lines = text.split(/\r\n|\r|\n/);
  return BLOCK_OPENERS.flatMap(({ kind, pattern }) => scanWith(lines, kind, pattern));
}

/**
 * 行号所属的区域类型
 */
export function regionOfLine(line: number, regions: Region[]): RegionKind {
  for (const kind of REGION_PRIORITY) {
    if (regions.some((r) => r.kind === kind && r.startLine <= line && line <= r.endLine)) {
      return kind;
    }
  }
  return "root";
}

/**
 * 字面量所属的区域类型（按起始行判定）
 */
export function regionOfToken(token: Token, regions: Region[]): RegionKind {
  return regionOfLine(token.startLine, regions);
}
