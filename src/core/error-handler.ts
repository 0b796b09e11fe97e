/**
 * 错误处理模块
 * 提供统一的错误处理机制，包括错误类型、错误生成和格式化方法
 */

import type { MatchOutcome } from "../types";

// 错误类别枚举
export enum ErrorCategory {
  CONFIG = "CONFIG", // 配置错误
  INPUT = "INPUT", // 翻译数据错误
  MATCH = "MATCH", // 匹配 / 回填错误
  FILE_OPERATION = "FILE_OPERATION", // 文件操作错误
  UNKNOWN = "UNKNOWN", // 未知错误
}

// 错误严重级别
export enum ErrorSeverity {
  WARNING = "WARNING", // 警告，不会中断处理
  ERROR = "ERROR", // 错误，可能中断当前文件处理
  FATAL = "FATAL", // 致命错误，中断整个处理流程
}

// 统一错误接口
export interface PatchError {
  code: string; // 错误代码，例如 CONFIG001
  category: ErrorCategory; // 错误类别
  message: string; // 错误信息
  details?: string; // 详细信息
  filePath?: string; // 相关文件路径
  line?: number; // 行号
  severity: ErrorSeverity; // 严重级别
  suggestion?: string; // 修复建议
  originalError?: Error; // 原始错误
}

// 预定义错误代码和对应信息
interface ErrorDefinition {
  code: string;
  category: ErrorCategory;
  messageTemplate: string;
  severity: ErrorSeverity;
  suggestionTemplate?: string;
}

// 错误定义集
const errorDefinitions: Record<string, ErrorDefinition> = {
  // 配置错误
  CONFIG001: {
    code: "CONFIG001",
    category: ErrorCategory.CONFIG,
    messageTemplate: "配置无效: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请检查命令行参数或配置对象，特别是 {0}",
  },

  // 翻译数据错误
  INPUT001: {
    code: "INPUT001",
    category: ErrorCategory.INPUT,
    messageTemplate: "翻译条目不完整: {0}",
    severity: ErrorSeverity.WARNING,
    suggestionTemplate: "条目需要 id、原文和非空译文，该条目已跳过",
  },
  INPUT002: {
    code: "INPUT002",
    category: ErrorCategory.INPUT,
    messageTemplate: "无法解析的 JSON 行: {0}",
    severity: ErrorSeverity.WARNING,
    suggestionTemplate: "请检查翻译文件第 {1} 行的 JSON 格式",
  },

  // 匹配错误
  MATCH001: {
    code: "MATCH001",
    category: ErrorCategory.MATCH,
    messageTemplate: "找不到唯一匹配的字符串: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "请补充行号、序号或上下文锚点，或确认原文与源文件一致",
  },
  MATCH002: {
    code: "MATCH002",
    category: ErrorCategory.MATCH,
    messageTemplate: "匹配位于 python 代码块内，已跳过: {0}",
    severity: ErrorSeverity.WARNING,
    suggestionTemplate: "代码块中的字符串不会被自动回填，如确需翻译请手动处理",
  },
  MATCH003: {
    code: "MATCH003",
    category: ErrorCategory.MATCH,
    messageTemplate: "占位符不一致 ({0}): {1}",
    severity: ErrorSeverity.WARNING,
    suggestionTemplate: "请检查译文是否遗漏或多出了 [name]、%s 等占位符，该条目仍已替换",
  },

  // 文件操作错误
  FILE001: {
    code: "FILE001",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "读取文件失败: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "请确认文件存在且有读取权限，检查文件路径是否正确",
  },
  FILE002: {
    code: "FILE002",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "写入文件失败: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "请确认目标目录存在且有写入权限，检查磁盘空间是否足够",
  },
  FILE003: {
    code: "FILE003",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "不安全的输出路径: {0}",
    severity: ErrorSeverity.WARNING,
    suggestionTemplate: "输出路径必须位于输出目录之内，该文件已跳过",
  },

  // 通用错误
  GENERAL001: {
    code: "GENERAL001",
    category: ErrorCategory.UNKNOWN,
    messageTemplate: "未知错误: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "如果问题持续存在，请附上报告文件提交问题",
  },
};

/**
 * 创建格式化的错误对象
 */
export function createPatchError(
  errorCode: string,
  params: string[] = [],
  options: {
    filePath?: string;
    line?: number;
    originalError?: Error;
  } = {}
): PatchError {
  const definition = errorDefinitions[errorCode] ?? errorDefinitions.GENERAL001;

  // 替换消息模板中的参数
  let message = definition.messageTemplate;
  let suggestion = definition.suggestionTemplate || "";

  params.forEach((param, index) => {
    message = message.replace(`{${index}}`, String(param));
    suggestion = suggestion.replace(`{${index}}`, String(param));
  });

  return {
    code: definition.code,
    category: definition.category,
    message,
    details: options.originalError ? options.originalError.message : undefined,
    filePath: options.filePath,
    line: options.line,
    severity: definition.severity,
    suggestion,
    originalError: options.originalError,
  };
}

/**
 * 把单条回填结果映射为错误对象，OK / NOOP 返回 undefined
 */
export function outcomeError(outcome: MatchOutcome): PatchError | undefined {
  const options = { filePath: outcome.file };
  if (outcome.status === "FAIL") {
    return outcome.methodTag === "malformed_unit"
      ? createPatchError("INPUT001", [`${outcome.unitId}: ${outcome.message}`], options)
      : createPatchError("MATCH001", [outcome.unitId], options);
  }
  if (outcome.status === "WARN") {
    return outcome.methodTag === "protected_region_skip"
      ? createPatchError("MATCH002", [outcome.unitId], options)
      : createPatchError("MATCH003", [outcome.unitId, outcome.message], options);
  }
  return undefined;
}

/**
 * 格式化错误为单条日志
 */
export function formatError(error: PatchError): string {
  let formattedMessage = `[${error.code}] ${error.message}`;

  if (error.filePath) {
    formattedMessage += `\n文件: ${error.filePath}`;
    if (error.line) {
      formattedMessage += `:${error.line}`;
    }
  }

  if (error.details && error.details !== error.message) {
    formattedMessage += `\n详情: ${error.details}`;
  }

  if (error.suggestion) {
    formattedMessage += `\n建议: ${error.suggestion}`;
  }

  return formattedMessage;
}

/**
 * 记录错误
 */
export function logError(error: PatchError): void {
  const formattedError = formatError(error);

  if (error.severity === ErrorSeverity.WARNING) {
    console.warn(formattedError);
  } else {
    console.error(formattedError);
  }
}

/**
 * 提供给最终用户的错误格式化方法
 */
export function formatErrorForUser(error: PatchError): string {
  let message = `错误(${error.code}): ${error.message}`;

  if (error.filePath) {
    message += `\n文件位置: ${error.filePath}`;
    if (error.line) {
      message += ` 第 ${error.line} 行`;
    }
  }

  if (error.suggestion) {
    message += `\n\n修复建议:\n${error.suggestion}`;
  }

  return message;
}

/**
 * 根据原始异常推断更具体的错误代码
 */
export function enhanceError(error: Error, filePath?: string, writing = false): PatchError {
  const errorMessage = error.message;
  const errno = "code" in error && typeof error.code === "string" ? error.code : "";

  const fileErrnos = ["ENOENT", "EACCES", "EPERM", "ENOSPC", "EISDIR", "ENOTDIR"];
  if (fileErrnos.includes(errno) || errorMessage.includes("no such file")) {
    return createPatchError(writing ? "FILE002" : "FILE001", [filePath || errorMessage], {
      filePath,
      originalError: error,
    });
  }

  return createPatchError("GENERAL001", [errorMessage], {
    filePath,
    originalError: error,
  });
}
