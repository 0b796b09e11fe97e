/**
 * 错误处理单元测试
 */
import { expect, test, describe, afterEach, vi } from "vitest";
import { PatchReport } from "../src/core/report-collector";
import {
  createPatchError,
  enhanceError,
  formatError,
  formatErrorForUser,
  logError,
  outcomeError,
  ErrorCategory,
  ErrorSeverity,
} from "../src/core/error-handler";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("错误处理", () => {
  test("按错误代码创建错误对象", () => {
    const error = createPatchError("MATCH001", ["Hello"], { filePath: "game/script.rpy", line: 3 });

    expect(error).toMatchObject({
      code: "MATCH001",
      category: ErrorCategory.MATCH,
      severity: ErrorSeverity.ERROR,
      message: "找不到唯一匹配的字符串: Hello",
      filePath: "game/script.rpy",
      line: 3,
    });
  });

  test("模板参数同时替换到建议中", () => {
    const error = createPatchError("INPUT002", ["{bad", "7"]);
    expect(error.suggestion).toBe("请检查翻译文件第 7 行的 JSON 格式");
  });

  test("未知代码按 GENERAL001 处理", () => {
    expect(createPatchError("NOPE", ["x"]).code).toBe("GENERAL001");
  });

  test("格式化", () => {
    const error = createPatchError("FILE002", ["out/a.zh.rpy"], {
      filePath: "out/a.zh.rpy",
      originalError: new Error("disk full"),
    });

    expect(formatError(error)).toBe(
      [
        "[FILE002] 写入文件失败: out/a.zh.rpy",
        "文件: out/a.zh.rpy",
        "详情: disk full",
        "建议: 请确认目标目录存在且有写入权限，检查磁盘空间是否足够",
      ].join("\n")
    );
    expect(formatErrorForUser(createPatchError("MATCH002", ["Secret"], { filePath: "a.rpy", line: 2 }))).toBe(
      "错误(MATCH002): 匹配位于 python 代码块内，已跳过: Secret\n文件位置: a.rpy 第 2 行\n\n修复建议:\n代码块中的字符串不会被自动回填，如确需翻译请手动处理"
    );
  });

  test("按严重级别选择输出通道", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    logError(createPatchError("INPUT001", ["x"]));
    logError(createPatchError("FILE001", ["y"]));

    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  test("回填结果映射为错误代码", () => {
    const report = new PatchReport();
    const rows = [
      report.ok("ok", "a.rpy", "S4-unique", "root"),
      report.noop("same", "a.rpy", "label"),
      report.fail("lost", "a.rpy", "not_found_or_ambiguous"),
      report.fail("bad", "a.rpy", "malformed_unit", "missing original text"),
      report.warn("code", "a.rpy", "protected_region_skip", "S4-unique", "protected-code", false),
      report.warn("ph", "a.rpy", "S4-unique", "region=root; placeholder_mismatch [name] vs []", "root", true),
    ];

    const errors = rows.map(outcomeError);
    expect(errors.map((e) => e?.code)).toEqual([undefined, undefined, "MATCH001", "INPUT001", "MATCH002", "MATCH003"]);
    expect(errors.map((e) => e?.filePath)).toEqual([undefined, undefined, "a.rpy", "a.rpy", "a.rpy", "a.rpy"]);
    expect(errors[3]?.message).toBe("翻译条目不完整: bad: missing original text");
    expect(errors[5]?.message).toBe("占位符不一致 (ph): region=root; placeholder_mismatch [name] vs []");
    expect(errors[5]?.severity).toBe(ErrorSeverity.WARNING);
  });

  describe("enhanceError", () => {
    function errnoError(code: string): Error {
      return Object.assign(new Error(`${code}: failed`), { code });
    }

    test("文件系统错误映射为读取或写入错误", () => {
      expect(enhanceError(errnoError("ENOENT"), "a.rpy").code).toBe("FILE001");
      expect(enhanceError(errnoError("EACCES"), "a.rpy", true).code).toBe("FILE002");
    });

    test("其他错误映射为 GENERAL001", () => {
      const error = enhanceError(new Error("boom"));
      expect(error.code).toBe("GENERAL001");
      expect(error.message).toBe("未知错误: boom");
    });
  });
});
