/**
 * 官方翻译格式输出
 * 生成 `translate <lang> strings:` 块，由引擎在运行时按原文查找译文
 */
import path from "path";
import type { TranslationRecord } from "../types";
import { recordFile } from "../io/translation-loader";

export interface TlPair {
  original: string;
  translated: string;
  id: string;
}

/**
 * 单文件模式下所有条目写入的文件名
 */
export const TL_STRINGS_FILE = "strings.rpy";

/**
 * 包含换行时用三引号，否则用双引号并转义内部双引号
 */
export function quoteBlock(s: string): string {
  const escaped = s.replace(/\\/g, "\\\\");
  if (s.includes("\n")) {
    return `"""${escaped}"""`;
  }
  return `"${escaped.replace(/"/g, '\\"')}"`;
}

/**
 * 生成 strings 脚本内容
 * 同一原文只保留首次出现的译文，出现不同译文时加 CONFLICT 注释；空白原文丢弃
 */
export function buildStringsContent(pairs: ReadonlyArray<TlPair>, lang: string): string {
  const seen = new Map<string, string>();
  const conflicts = new Map<string, Set<string>>();

  for (const { original, translated } of pairs) {
    const first = seen.get(original);
    if (first === undefined) {
      seen.set(original, translated);
    } else if (first !== translated) {
      const set = conflicts.get(original) ?? new Set([first]);
      set.add(translated);
      conflicts.set(original, set);
    }
  }

  const lines = [`translate ${lang} strings:`];
  for (const [original, translated] of seen) {
    if (original.trim() === "") continue;
    const conflict = conflicts.get(original);
    if (conflict) {
      lines.push(`    # CONFLICT for old: ${JSON.stringify(original)} -> ${JSON.stringify([...conflict].sort())}`);
    }
    lines.push(`    old ${quoteBlock(original)}`);
    lines.push(`    new ${quoteBlock(translated)}`);
    lines.push("");
  }
  return lines.join("\n") + "\n";
}

/**
 * 按输出文件分组
 * perFile 时键为源文件相对路径（扩展名统一为 .rpy），否则全部归入 strings.rpy
 * 无法确定所属文件的条目被忽略
 */
export function groupForTl(records: ReadonlyArray<TranslationRecord>, perFile: boolean): Map<string, TlPair[]> {
  const groups = new Map<string, TlPair[]>();
  for (const record of records) {
    const rel = recordFile(record);
    if (!rel) continue;

    const parsed = path.posix.parse(rel);
    const key = perFile ? path.posix.join(parsed.dir, parsed.name + ".rpy") : TL_STRINGS_FILE;
    const group = groups.get(key) ?? [];
    group.push({ original: record.original, translated: record.translated, id: record.id });
    groups.set(key, group);
  }
  return new Map([...groups.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}
