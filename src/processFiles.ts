/**
 * 工程级回填流程
 * 加载翻译、筛选脚本文件、逐文件回填并写出镜像文件 / TL 脚本 / 报告
 */

import fs from "fs";
import path from "path";
import { glob } from "glob";
import type { PatchOptions, TranslationRecord, TranslationUnit } from "./types";
import type { NormalizedPatchOptions } from "./core/config-normalizer";
import { CONFIG_DEFAULTS, normalizeConfig } from "./core/config-normalizer";
import type { PatchError } from "./core/error-handler";
import {
  createPatchError,
  enhanceError,
  ErrorSeverity,
  formatErrorForUser,
  logError,
  outcomeError,
} from "./core/error-handler";
import type { AdvancedPatchResult } from "./core/file-patcher";
import { patchFileAdvanced, patchFileSimple } from "./core/file-patcher";
import type { StatusCounts } from "./core/report-collector";
import { PatchReport } from "./core/report-collector";
import { isSafePath, safeWriteOutput, withSuffix, writeBackup, writeTextFile } from "./io/file-writer";
import { loadTranslations, unitsForFile } from "./io/translation-loader";
import { buildStringsContent, groupForTl } from "./tl/strings-builder";

export interface ProjectPatchResult {
  /** 参与处理的脚本文件（相对项目根目录，使用 / 分隔） */
  files: string[];
  /** 已写出（dryRun 时为将要写出）的文件路径 */
  writtenFiles: string[];
  report: PatchReport;
  counts: StatusCounts;
  /** simple 模式下的替换数与警告数 */
  applied: number;
  warnings: number;
  reportPath?: string;
  /** 文件级错误（读写失败、翻译文件无法加载等） */
  errors: PatchError[];
  /** 单个翻译条目的 FAIL / WARN，只记录不影响 success */
  issues: PatchError[];
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function emptyResult(): ProjectPatchResult {
  const report = new PatchReport();
  return {
    files: [],
    writtenFiles: [],
    report,
    counts: report.counts(),
    applied: 0,
    warnings: 0,
    errors: [],
    issues: [],
  };
}

/**
 * 列出需要处理的 .rpy 文件
 * 任一路径段命中 excludeDirs，或位于输出目录之内的文件都会被跳过
 */
export async function findScriptFiles(root: string, opts: NormalizedPatchOptions): Promise<string[]> {
  const matches = await glob(opts.glob, { cwd: root, nodir: true, posix: true });
  const outRoot = path.resolve(opts.outDir);
  const outInsideRoot = outRoot !== path.resolve(root) && isSafePath(root, outRoot);
  const exclude = new Set(opts.excludeDirs);

  return matches
    .filter((rel) => path.posix.extname(rel).toLowerCase() === ".rpy")
    .filter((rel) => !rel.split("/").some((part) => exclude.has(part)))
    .filter((rel) => !(outInsideRoot && isSafePath(outRoot, path.join(root, rel))))
    .sort();
}

function recordError(errors: PatchError[], error: PatchError): void {
  logError(error);
  errors.push(error);
}

function readSource(absPath: string, errors: PatchError[]): string | undefined {
  try {
    return fs.readFileSync(absPath, "utf8");
  } catch (error) {
    recordError(errors, enhanceError(toError(error), absPath));
    return undefined;
  }
}

function writeOutput(
  outRoot: string,
  rel: string,
  content: string,
  opts: NormalizedPatchOptions,
  errors: PatchError[]
): string | undefined {
  try {
    const written = safeWriteOutput(outRoot, rel, content, opts.outputSuffix);
    if (written === null) {
      recordError(errors, createPatchError("FILE003", [rel], { filePath: rel }));
      return undefined;
    }
    return written;
  } catch (error) {
    recordError(errors, enhanceError(toError(error), path.join(outRoot, rel), true));
    return undefined;
  }
}

function writeTlScripts(
  records: TranslationRecord[],
  outRoot: string,
  opts: NormalizedPatchOptions,
  result: ProjectPatchResult
): void {
  const tlDir = path.join(outRoot, CONFIG_DEFAULTS.TL_ROOT, opts.lang);
  for (const [name, pairs] of groupForTl(records, opts.tlPerFile)) {
    const outPath = path.join(tlDir, name);
    if (!isSafePath(tlDir, outPath)) {
      recordError(result.errors, createPatchError("FILE003", [name], { filePath: name }));
      continue;
    }
    const content = buildStringsContent(pairs, opts.lang);
    if (!opts.dryRun) {
      try {
        writeTextFile(outPath, content);
      } catch (error) {
        recordError(result.errors, enhanceError(toError(error), outPath, true));
        continue;
      }
    }
    result.writtenFiles.push(outPath);
  }
  console.log(`[TL] ${result.writtenFiles.length} strings script(s) for "${opts.lang}" in ${tlDir}`);
}

function patchAdvanced(
  root: string,
  outRoot: string,
  records: TranslationRecord[],
  opts: NormalizedPatchOptions,
  result: ProjectPatchResult
): void {
  for (const rel of result.files) {
    const units = unitsForFile(records, rel);
    if (units.length === 0) continue;

    const text = readSource(path.join(root, rel), result.errors);
    if (text === undefined) continue;

    const patched = patchFileAdvanced(text, rel, units, { proximityWindow: opts.proximityWindow });
    result.report.merge(patched.report);
    for (const outcome of patched.report.rows) {
      const issue = outcomeError(outcome);
      if (issue) {
        logError(issue);
        result.issues.push(issue);
      }
    }
    if (!patched.modified) continue;

    if (opts.dryRun) {
      result.writtenFiles.push(withSuffix(path.join(outRoot, rel), opts.outputSuffix));
      continue;
    }
    const written = writeOutput(outRoot, rel, patched.text, opts, result.errors);
    if (written) {
      result.writtenFiles.push(written);
    }
  }

  if (opts.reportPath) {
    try {
      writeTextFile(opts.reportPath, result.report.toTsv());
      result.reportPath = opts.reportPath;
      console.log(`Report written to: ${opts.reportPath}`);
    } catch (error) {
      recordError(result.errors, enhanceError(toError(error), opts.reportPath, true));
    }
  }
}

function patchSimple(
  root: string,
  outRoot: string,
  records: TranslationRecord[],
  opts: NormalizedPatchOptions,
  result: ProjectPatchResult
): void {
  for (const rel of result.files) {
    const units = unitsForFile(records, rel);
    if (units.length === 0) continue;

    const absPath = path.join(root, rel);
    const text = readSource(absPath, result.errors);
    if (text === undefined) continue;

    const patched = patchFileSimple(text, units);
    result.applied += patched.applied;
    result.warnings += patched.warnings;
    if (patched.applied === 0 && patched.warnings === 0) continue;

    if (opts.dryRun) {
      result.writtenFiles.push(withSuffix(path.join(outRoot, rel), opts.outputSuffix));
      continue;
    }
    if (opts.backup) {
      try {
        writeBackup(absPath, text);
      } catch (error) {
        recordError(result.errors, enhanceError(toError(error), absPath, true));
        continue;
      }
    }
    const written = writeOutput(outRoot, rel, patched.text, opts, result.errors);
    if (written) {
      result.writtenFiles.push(written);
    }
  }
  console.log(`Applied replacements: ${result.applied}, warnings: ${result.warnings}`);
}

/**
 * 回填整个工程
 * 单个文件的读写失败只记录错误，不会中断其余文件
 */
export async function processProject(
  projectRoot: string,
  translationsPath: string,
  options: PatchOptions = {}
): Promise<ProjectPatchResult> {
  const opts = normalizeConfig(options, translationsPath);
  const result = emptyResult();
  const root = path.resolve(projectRoot);
  const outRoot = path.resolve(opts.outDir);

  let records: TranslationRecord[];
  try {
    const loaded = loadTranslations(translationsPath);
    loaded.errors.forEach((e) => recordError(result.errors, e));
    records = loaded.records;
  } catch (error) {
    recordError(result.errors, enhanceError(toError(error), translationsPath));
    return result;
  }
  console.log(`Loaded ${records.length} translation records.`);

  if (opts.tlMode) {
    writeTlScripts(records, outRoot, opts, result);
  } else {
    result.files = await findScriptFiles(root, opts);
    console.log(`Found ${result.files.length} files to process.`);

    if (opts.mode === "simple") {
      patchSimple(root, outRoot, records, opts, result);
    } else {
      patchAdvanced(root, outRoot, records, opts, result);
    }
  }

  result.counts = result.report.counts();
  console.log(`Output root: ${outRoot}`);
  if (opts.dryRun) {
    console.log("Dry run: no files were written.");
  }
  return result;
}

/**
 * 在内存中回填一段文本
 */
export function patchText(
  text: string,
  units: ReadonlyArray<TranslationUnit>,
  options: PatchOptions & { file?: string } = {}
): AdvancedPatchResult {
  const opts = normalizeConfig(options);
  return patchFileAdvanced(text, options.file ?? "<memory>", units, {
    proximityWindow: opts.proximityWindow,
  });
}

/**
 * 执行回填并提供友好的错误汇总
 * 这是推荐给最终用户使用的包装函数
 */
export async function executePatch(
  projectRoot: string,
  translationsPath: string,
  options: PatchOptions = {}
): Promise<ProjectPatchResult & { success: boolean; friendlyErrorMessage?: string }> {
  try {
    const result = await processProject(projectRoot, translationsPath, options);
    const fatal = result.errors.filter((e) => e.severity !== ErrorSeverity.WARNING);
    if (fatal.length > 0) {
      const messages = fatal.map((err) => formatErrorForUser(err));
      return {
        ...result,
        success: false,
        friendlyErrorMessage: `回填过程中发生了 ${fatal.length} 个错误:\n\n${messages.join("\n\n---------------\n\n")}`,
      };
    }
    return { ...result, success: true };
  } catch (error) {
    const topLevelError = enhanceError(toError(error));
    return {
      ...emptyResult(),
      success: false,
      errors: [topLevelError],
      friendlyErrorMessage: formatErrorForUser(topLevelError),
    };
  }
}
