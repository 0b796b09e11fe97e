import { processProject, patchText, executePatch, findScriptFiles } from "./processFiles";
import type { ProjectPatchResult } from "./processFiles";
import type { PatchOptions } from "./types";

// 导出核心模块
export { scanStringLiterals, tokenInnerText, normalizeNewlines } from "./core/literal-scanner";
export { detectRegions, regionOfLine, regionOfToken } from "./core/region-classifier";
export { resolveMatch, anchorInterval } from "./core/match-resolver";
export type { MatchResolution, ResolverOptions } from "./core/match-resolver";
export { replaceToken, escapeForQuote, sanitizeTripleContent } from "./core/safe-replacer";
export { PatchReport, REPORT_HEADER } from "./core/report-collector";
export { placeholderSet, placeholderMismatch, computeSemanticSignature } from "./core/placeholder";
export { tokenSetRatio, similarityRatio, fuzzyScore } from "./core/fuzzy";
export { patchFileAdvanced, patchFileSimple, validateUnit } from "./core/file-patcher";
export { normalizeConfig, CONFIG_DEFAULTS } from "./core/config-normalizer";
export type { NormalizedPatchOptions } from "./core/config-normalizer";
export { createPatchError, formatErrorForUser, outcomeError, ErrorCategory, ErrorSeverity } from "./core/error-handler";
export type { PatchError } from "./core/error-handler";

// 导出配置与输入输出
export { ConfigDetector } from "./config";
export { loadTranslations, parseTranslationLines, unitsForFile } from "./io/translation-loader";
export { buildStringsContent, quoteBlock, groupForTl } from "./tl/strings-builder";

export * from "./types";
export { processProject, patchText, executePatch, findScriptFiles };
export type { ProjectPatchResult };

/**
 * 统一的回填主函数
 */
export async function patchProject(
  projectRoot: string,
  translationsPath: string,
  options: PatchOptions = {}
): Promise<ProjectPatchResult> {
  return processProject(projectRoot, translationsPath, options);
}

export default patchProject;
