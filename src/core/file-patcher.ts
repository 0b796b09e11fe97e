/**
 * 单文件回填
 * advanced: 逐条翻译顺序处理，每次替换后重新扫描字面量与区域
 * simple:   兼容旧流程，按 (行, 序号) 直接替换
 */
import type { TranslationUnit } from "../types";
import { scanStringLiterals } from "./literal-scanner";
import type { ResolverOptions } from "./match-resolver";
import { resolveMatch } from "./match-resolver";
import { placeholderMismatch } from "./placeholder";
import { detectRegions, regionOfLine } from "./region-classifier";
import { PatchReport } from "./report-collector";
import { escapeForQuote, replaceToken } from "./safe-replacer";

export interface AdvancedPatchResult {
  text: string;
  modified: boolean;
  report: PatchReport;
}

export interface SimplePatchResult {
  text: string;
  applied: number;
  warnings: number;
}

const MISSING_POSITION = Number.MAX_SAFE_INTEGER;

/**
 * 检查翻译单元是否完整，完整时返回 null
 */
export function validateUnit(unit: TranslationUnit): string | null {
  if (typeof unit.id !== "string" || unit.id === "") {
    return "missing id";
  }
  if (typeof unit.originalText !== "string" || unit.originalText === "") {
    return "missing original text";
  }
  if (typeof unit.translatedText !== "string" || unit.translatedText.trim() === "") {
    return "missing translated text";
  }
  if (unit.lineHint !== undefined && !(Number.isInteger(unit.lineHint) && unit.lineHint > 0)) {
    return `invalid line hint: ${unit.lineHint}`;
  }
  if (unit.indexHint !== undefined && !(Number.isInteger(unit.indexHint) && unit.indexHint >= 0)) {
    return `invalid index hint: ${unit.indexHint}`;
  }
  return null;
}

/**
 * 按 (行号, 序号, id) 升序排列，缺少位置信息的排在最后
 */
export function sortUnits(units: ReadonlyArray<TranslationUnit>): TranslationUnit[] {
  return [...units].sort(
    (a, b) =>
      (a.lineHint ?? MISSING_POSITION) - (b.lineHint ?? MISSING_POSITION) ||
      (a.indexHint ?? MISSING_POSITION) - (b.indexHint ?? MISSING_POSITION) ||
      (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

/**
 * 多级匹配回填一个文件
 * 单条失败不会影响其他条目；没有任何成功替换时原样返回文本
 */
export function patchFileAdvanced(
  text: string,
  file: string,
  units: ReadonlyArray<TranslationUnit>,
  options: ResolverOptions = {}
): AdvancedPatchResult {
  const report = new PatchReport();
  let current = text;

  for (const unit of sortUnits(units)) {
    const problem = validateUnit(unit);
    if (problem) {
      report.fail(unit.id || "<missing>", file, "malformed_unit", problem);
      continue;
    }

    // 偏移在每次替换后都会失效，必须基于当前文本重新扫描
    const tokens = scanStringLiterals(current);
    const regions = detectRegions(current);
    const resolution = resolveMatch(current, tokens, regions, unit, options);

    if (resolution.kind === "none") {
      report.fail(unit.id, file, "not_found_or_ambiguous");
      continue;
    }
    if (resolution.kind === "protected") {
      report.warn(unit.id, file, "protected_region_skip", resolution.tier, "protected-code", false);
      continue;
    }

    const patched = replaceToken(current, resolution.token, unit.translatedText);
    if (patched === current) {
      report.noop(unit.id, file, resolution.regionKind);
      continue;
    }
    current = patched;

    const mismatch = placeholderMismatch(unit.originalText, unit.translatedText);
    if (mismatch) {
      const message = `region=${resolution.regionKind}; placeholder_mismatch ${mismatch}`;
      report.warn(unit.id, file, resolution.tier, message, resolution.regionKind, true);
    } else {
      report.ok(unit.id, file, resolution.tier, resolution.regionKind);
    }
  }

  return { text: current, modified: current !== text, report };
}

const DQ_RE = /"((?:\\.|[^"\\])*)"/g;
const SQ_RE = /'((?:\\.|[^'\\])*)'/g;

/**
 * 替换行中第 index 个字符串字面量（先双引号，再单引号）
 */
export function replaceNthOnLine(line: string, index: number, translated: string): string | null {
  if (index < 0) return null;

  const doubles = [...line.matchAll(DQ_RE)];
  const singles = [...line.matchAll(SQ_RE)];
  const useDouble = index < doubles.length;
  const match = useDouble ? doubles[index] : singles[index - doubles.length];
  const quote = useDouble ? '"' : "'";
  if (!match || match.index === undefined) return null;

  const innerStart = match.index + 1;
  const innerEnd = innerStart + match[1].length;
  return line.slice(0, innerStart) + escapeForQuote(translated, quote) + line.slice(innerEnd);
}

/**
 * 在首个不在 python 块内的 "原文" / '原文' 处替换一次
 */
function replaceQuotedOnce(
  lines: string[],
  unit: TranslationUnit,
  isProtected: (line: number) => boolean
): boolean {
  for (const quote of ['"', "'"]) {
    const needle = quote + unit.originalText + quote;
    for (let i = 0; i < lines.length; i++) {
      const pos = lines[i].indexOf(needle);
      if (pos === -1 || isProtected(i + 1)) continue;
      lines[i] =
        lines[i].slice(0, pos) +
        quote +
        escapeForQuote(unit.translatedText, quote) +
        quote +
        lines[i].slice(pos + needle.length);
      return true;
    }
  }
  return false;
}

/**
 * 兼容模式回填
 * 有位置信息的条目按 (行, 序号) 直接替换；没有位置信息的条目在首个带引号的原文处替换一次
 * python 块内的行一律跳过
 */
export function patchFileSimple(text: string, units: ReadonlyArray<TranslationUnit>): SimplePatchResult {
  // 奇数位是原样保留的换行符，行号与区域识别一致
  const parts = text.split(/(\r\n|\r|\n)/);
  const lines = parts.filter((_, i) => i % 2 === 0);
  // 替换不会增减行数，区域只需计算一次
  const regions = detectRegions(text);
  const isProtected = (line: number) => regionOfLine(line, regions) === "protected-code";
  let applied = 0;
  let warnings = 0;

  const noteApplied = (unit: TranslationUnit) => {
    applied++;
    if (unit.originalText && placeholderMismatch(unit.originalText, unit.translatedText)) {
      warnings++;
    }
  };

  for (const unit of units) {
    const { lineHint, indexHint } = unit;
    if (lineHint === undefined || indexHint === undefined) continue;
    if (lineHint < 1 || lineHint > lines.length) continue;
    if (isProtected(lineHint)) {
      warnings++;
      continue;
    }
    const replaced = replaceNthOnLine(lines[lineHint - 1], indexHint, unit.translatedText);
    if (replaced !== null) {
      lines[lineHint - 1] = replaced;
      noteApplied(unit);
    }
  }

  for (const unit of units) {
    if (unit.lineHint !== undefined && unit.indexHint !== undefined) continue;
    if (!unit.originalText) continue;

    if (replaceQuotedOnce(lines, unit, isProtected)) {
      noteApplied(unit);
    }
  }

  const patched = parts.map((part, i) => (i % 2 === 0 ? lines[i / 2] : part)).join("");
  return { text: patched, applied, warnings };
}
