/**
 * 翻译数据加载
 * 读取 JSONL 格式的翻译结果，并按源文件整理为翻译单元
 */
import fs from "fs";
import type { TranslationRecord, TranslationUnit } from "../types";
import type { PatchError } from "../core/error-handler";
import { createPatchError } from "../core/error-handler";

/**
 * 译文字段名（按优先级）
 */
export const TRANS_KEYS = ["zh", "cn", "zh_cn", "translation", "text_zh", "target", "tgt", "zh_final"] as const;

/**
 * 原文字段名（按优先级）
 */
export const EN_KEYS = ["en", "text", "english", "source", "src", "original", "english_text"] as const;

export interface LoadResult {
  records: TranslationRecord[];
  errors: PatchError[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function asInt(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) return parseInt(value, 10);
  return undefined;
}

function firstNonBlank(obj: Record<string, unknown>, keys: ReadonlyArray<string>): string | undefined {
  for (const key of keys) {
    const value = asText(obj[key]);
    if (value !== undefined && value.trim() !== "") {
      return value;
    }
  }
  return undefined;
}

function recordId(obj: Record<string, unknown>): string | undefined {
  const id = asText(obj.id) || asText(obj.id_hash);
  if (id) return id;
  const file = asText(obj.file);
  const line = asInt(obj.line);
  const idx = asInt(obj.idx);
  if (file && line !== undefined && idx !== undefined) {
    return `${file}:${line}:${idx}`;
  }
  return undefined;
}

/**
 * 解析 JSONL 文本
 * 空行跳过；坏行、没有 id 或没有译文的条目记录为警告后跳过
 */
export function parseTranslationLines(content: string): LoadResult {
  const records: TranslationRecord[] = [];
  const errors: PatchError[] = [];
  const seen = new Map<string, number>();

  content.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === "") return;
    const lineNo = index + 1;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (e) {
      const originalError = e instanceof Error ? e : undefined;
      errors.push(createPatchError("INPUT002", [line.slice(0, 80), String(lineNo)], { line: lineNo, originalError }));
      return;
    }
    if (!isPlainObject(parsed)) {
      errors.push(createPatchError("INPUT002", [line.slice(0, 80), String(lineNo)], { line: lineNo }));
      return;
    }

    const id = recordId(parsed);
    const translated = firstNonBlank(parsed, TRANS_KEYS);
    if (!id || translated === undefined) {
      errors.push(createPatchError("INPUT001", [id ? `${id}: no translation` : `line ${lineNo}: no id`], { line: lineNo }));
      return;
    }

    const record: TranslationRecord = {
      id,
      original: firstNonBlank(parsed, EN_KEYS) ?? "",
      translated,
      raw: parsed,
    };
    // 同一 id 出现多次时以后出现的为准
    const previous = seen.get(id);
    if (previous !== undefined) {
      records[previous] = record;
    } else {
      seen.set(id, records.length);
      records.push(record);
    }
  });

  return { records, errors };
}

/**
 * 读取 JSONL 翻译文件
 */
export function loadTranslations(filePath: string): LoadResult {
  return parseTranslationLines(fs.readFileSync(filePath, "utf8"));
}

/**
 * 条目所属的源文件相对路径
 */
export function recordFile(record: TranslationRecord): string | undefined {
  const file = asText(record.raw.file);
  if (file) return file;
  const sep = record.id.indexOf(":");
  return sep > 0 ? record.id.slice(0, sep) : undefined;
}

/**
 * 把一条记录转换为翻译单元
 * line / idx 字段优先，其次取 id 末尾的 ":行号:序号"
 */
export function toTranslationUnit(record: TranslationRecord, file?: string): TranslationUnit {
  const raw = record.raw;
  let lineHint = asInt(raw.line);
  let indexHint = asInt(raw.idx);
  if (lineHint === undefined && file && record.id.startsWith(file + ":")) {
    const parts = record.id.split(":");
    lineHint = asInt(parts[parts.length - 2]);
    indexHint = asInt(parts[parts.length - 1]);
    if (lineHint === undefined || indexHint === undefined) {
      lineHint = undefined;
      indexHint = undefined;
    }
  }
  return {
    id: record.id,
    file,
    originalText: record.original,
    translatedText: record.translated,
    lineHint,
    indexHint,
    anchorPrev: asText(raw.anchor_prev),
    anchorNext: asText(raw.anchor_next),
  };
}

/**
 * 选出属于某个文件的翻译单元：id 以 "rel:" 开头，或 file 字段等于 rel
 */
export function unitsForFile(records: ReadonlyArray<TranslationRecord>, rel: string): TranslationUnit[] {
  return records
    .filter((r) => r.id.startsWith(rel + ":") || asText(r.raw.file) === rel)
    .map((r) => toTranslationUnit(r, rel));
}
