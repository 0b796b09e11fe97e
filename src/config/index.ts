/**
 * 配置系统入口
 */
export { ConfigDetector } from "./config-detector";
export type { ConfigValidationResult } from "./config-detector";
export { normalizeConfig, defaultReportPath, CONFIG_DEFAULTS } from "../core/config-normalizer";
export type { NormalizedPatchOptions } from "../core/config-normalizer";
