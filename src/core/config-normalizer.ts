/**
 * 配置规范化模块
 * 统一处理用户配置与默认值，保证内部使用的配置没有 undefined
 */

import path from "path";
import type { PatchMode, PatchOptions } from "../types";

/**
 * 默认值常量 - 集中定义所有默认值
 * 所有配置默认值都应该在这里定义，避免分散在代码各处
 */
export const CONFIG_DEFAULTS = {
  // 输入输出
  OUT_DIR: "out_patch",
  GLOB: "**/*.rpy",
  EXCLUDE_DIRS: ["tl"],
  OUTPUT_SUFFIX: ".zh.rpy",
  BACKUP_SUFFIX: ".bak.rpy",
  REPORT_SUFFIX: ".patch_report.tsv",
  MODE: "advanced",
  DRY_RUN: false,
  BACKUP: false,

  // TL 模式
  TL_MODE: false,
  LANG: "zh_CN",
  TL_PER_FILE: true,
  TL_ROOT: path.join("game", "tl"),

  // 匹配引擎
  PROXIMITY_WINDOW: 200,
  // 模糊匹配的最低分与领先差距，不作为可调参数暴露
  FUZZY_MIN_SCORE: 92,
  FUZZY_MIN_MARGIN: 3,
} as const;

/**
 * 规范化后的配置 - 所有配置项都有确定的值
 */
export interface NormalizedPatchOptions {
  outDir: string;
  glob: string;
  excludeDirs: string[];
  mode: PatchMode;
  dryRun: boolean;
  backup: boolean;
  tlMode: boolean;
  lang: string;
  tlPerFile: boolean;
  outputSuffix: string;
  /** 未提供翻译文件路径且用户也未指定时为 undefined，此时不写报告 */
  reportPath?: string;
  proximityWindow: number;
}

/**
 * 由翻译文件路径推导默认报告路径：替换最后一个扩展名
 */
export function defaultReportPath(translationsPath: string): string {
  const parsed = path.parse(translationsPath);
  return path.join(parsed.dir, parsed.name + CONFIG_DEFAULTS.REPORT_SUFFIX);
}

/**
 * 规范化配置
 */
export function normalizeConfig(
  options: PatchOptions = {},
  translationsPath?: string
): NormalizedPatchOptions {
  const excludeDirs = (options.excludeDirs ?? [...CONFIG_DEFAULTS.EXCLUDE_DIRS])
    .map((d) => d.trim())
    .filter((d) => d !== "");

  return {
    outDir: options.outDir || CONFIG_DEFAULTS.OUT_DIR,
    glob: options.glob || CONFIG_DEFAULTS.GLOB,
    excludeDirs,
    mode: options.mode ?? CONFIG_DEFAULTS.MODE,
    dryRun: options.dryRun ?? CONFIG_DEFAULTS.DRY_RUN,
    backup: options.backup ?? CONFIG_DEFAULTS.BACKUP,
    tlMode: options.tlMode ?? CONFIG_DEFAULTS.TL_MODE,
    lang: options.lang ?? CONFIG_DEFAULTS.LANG,
    tlPerFile: options.tlPerFile ?? CONFIG_DEFAULTS.TL_PER_FILE,
    outputSuffix: options.outputSuffix || CONFIG_DEFAULTS.OUTPUT_SUFFIX,
    reportPath:
      options.reportPath ?? (translationsPath ? defaultReportPath(translationsPath) : undefined),
    proximityWindow: options.proximityWindow ?? CONFIG_DEFAULTS.PROXIMITY_WINDOW,
  };
}
