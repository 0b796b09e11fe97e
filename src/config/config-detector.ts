/**
 * 配置检测工具 - 专门用于配置验证和问题诊断
 * 不修改用户传入的配置，只进行验证和报告问题
 */

import type { PatchOptions } from "../types";
import { normalizeConfig } from "../core/config-normalizer";
import type { PatchError } from "../core/error-handler";
import { createPatchError } from "../core/error-handler";

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const PATCH_MODES = ["advanced", "simple"];

/**
 * 配置检测工具类
 * 专门负责配置的验证、检查和问题报告
 */
export class ConfigDetector {
  /**
   * 验证配置是否有效
   * 不会修改原配置，只返回验证结果
   */
  static validateConfig(userOptions: PatchOptions): ConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (userOptions.glob !== undefined && userOptions.glob.trim() === "") {
      errors.push("文件匹配模式 (glob) 不能为空");
    }

    if (userOptions.mode !== undefined && !PATCH_MODES.includes(userOptions.mode)) {
      errors.push(`未知的回填模式: ${String(userOptions.mode)}`);
    }

    if (
      userOptions.proximityWindow !== undefined &&
      !(Number.isInteger(userOptions.proximityWindow) && userOptions.proximityWindow >= 0)
    ) {
      errors.push(`邻近窗口 (proximityWindow) 必须是非负整数: ${userOptions.proximityWindow}`);
    }

    if (userOptions.lang !== undefined && !/^[A-Za-z_][A-Za-z0-9_]*$/.test(userOptions.lang)) {
      errors.push(`TL 语言名无效: "${userOptions.lang}"`);
    }

    if (userOptions.outputSuffix !== undefined && !userOptions.outputSuffix.startsWith(".")) {
      errors.push(`输出后缀必须以 "." 开头: ${userOptions.outputSuffix}`);
    }

    const normalized = normalizeConfig(userOptions);

    if (normalized.backup && normalized.dryRun) {
      warnings.push("dryRun 模式下不会写入备份文件 (backup 无效)");
    }

    if (normalized.backup && normalized.mode !== "simple") {
      warnings.push("backup 只在 simple 模式下生效");
    }

    if (normalized.tlMode && normalized.mode === "simple") {
      warnings.push("tlMode 会忽略 simple 模式，直接生成 strings 脚本");
    }

    if (!userOptions.tlMode && (userOptions.lang !== undefined || userOptions.tlPerFile !== undefined)) {
      warnings.push("未开启 tlMode，lang / tlPerFile 不会生效");
    }

    if (normalized.excludeDirs.length === 0) {
      warnings.push("未排除任何目录，tl 目录下的翻译脚本也会被处理");
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
    };
  }

  /**
   * 把验证错误转换为 CONFIG001 错误对象
   */
  static toPatchErrors(result: ConfigValidationResult): PatchError[] {
    return result.errors.map((message) => createPatchError("CONFIG001", [message]));
  }
}
