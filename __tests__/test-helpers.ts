/**
 * 测试辅助工具
 * 构造翻译单元、临时工程目录与 JSONL 翻译文件
 */
import * as fs from "fs";
import * as path from "path";
import { tmpdir } from "os";
import crypto from "crypto";
import type { TranslationUnit } from "../src/types";

/**
 * 构造翻译单元，未给出的字段保持 undefined
 */
export function unit(
  id: string,
  originalText: string,
  translatedText: string,
  extra: Partial<TranslationUnit> = {}
): TranslationUnit {
  return { id, originalText, translatedText, ...extra };
}

/**
 * 按行拼接脚本文本（不带结尾换行）
 */
export function script(...lines: string[]): string {
  return lines.join("\n");
}

/**
 * 创建临时目录，并按 { 相对路径: 内容 } 写入文件
 */
export function createTempProject(files: Record<string, string> = {}): string {
  const uniqueId = `${Date.now()}-${crypto.randomBytes(6).toString("hex")}`;
  const root = path.join(tmpdir(), `script-patch-${uniqueId}`);
  fs.mkdirSync(root, { recursive: true });
  for (const [rel, content] of Object.entries(files)) {
    const filePath = path.join(root, rel);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, "utf8");
  }
  return root;
}

/**
 * 把记录写成 JSONL 文件
 */
export function writeJsonl(filePath: string, records: ReadonlyArray<Record<string, unknown>>): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, records.map((r) => JSON.stringify(r)).join("\n") + "\n", "utf8");
  return filePath;
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
