import { expect, test, describe, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { executePatch, patchText, processProject } from "../src/processFiles";
import { createTempProject, removeDir, script, unit, writeJsonl } from "./test-helpers";

const SCRIPT = script(
  "label start:",
  '    e "Hello, world!"',
  '    e "Bye"',
  "init python:",
  '    x = "Secret"'
);

const RECORDS = [
  { id: "game/script.rpy:2:0", en: "Hello, world!", zh: "你好，世界！" },
  { id: "game/script.rpy:9:0", en: "Missing", zh: "缺失" },
  { id_hash: "h-secret", file: "game/script.rpy", en: "Secret", zh: "秘密" },
];

let root = "";
let translations = "";
let outDir = "";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});

  root = createTempProject({
    "game/script.rpy": SCRIPT,
    "game/other.rpy": 'e "Other"\n',
    "game/tl/zh_CN/old.rpy": 'e "Old"\n',
    "notes.txt": "not a script",
  });
  translations = writeJsonl(path.join(root, "trans.jsonl"), RECORDS);
  outDir = path.join(root, "out");
});

afterEach(() => {
  removeDir(root);
  vi.restoreAllMocks();
});

describe("工程级回填", () => {
  test("advanced 模式写出镜像文件与报告", async () => {
    const result = await processProject(root, translations, { outDir });

    expect(result.files).toEqual(["game/other.rpy", "game/script.rpy"]);
    expect(result.writtenFiles).toEqual([path.join(outDir, "game", "script.zh.rpy")]);
    expect(result.counts).toEqual({ OK: 1, NOOP: 0, WARN: 1, FAIL: 1 });
    expect(result.errors).toEqual([]);
    expect(result.issues.map((e) => [e.code, e.filePath])).toEqual([
      ["MATCH001", "game/script.rpy"],
      ["MATCH002", "game/script.rpy"],
    ]);

    expect(fs.readFileSync(path.join(outDir, "game", "script.zh.rpy"), "utf8")).toBe(
      script("label start:", '    e "你好，世界！"', '    e "Bye"', "init python:", '    x = "Secret"')
    );
    // 源文件保持不变
    expect(fs.readFileSync(path.join(root, "game", "script.rpy"), "utf8")).toBe(SCRIPT);

    expect(result.reportPath).toBe(path.join(root, "trans.patch_report.tsv"));
    expect(fs.readFileSync(path.join(root, "trans.patch_report.tsv"), "utf8")).toBe(
      [
        "id\tfile\tstatus\tmethod\tmessage",
        "game/script.rpy:2:0\tgame/script.rpy\tOK\tS1-line-idx\tregion=label",
        "game/script.rpy:9:0\tgame/script.rpy\tFAIL\tnot_found_or_ambiguous\t",
        "h-secret\tgame/script.rpy\tWARN\tprotected_region_skip\tS4-unique",
      ].join("\n") + "\n"
    );
  });

  test("dryRun 不写出镜像文件", async () => {
    const result = await processProject(root, translations, { outDir, dryRun: true });

    expect(result.writtenFiles).toEqual([path.join(outDir, "game", "script.zh.rpy")]);
    expect(fs.existsSync(outDir)).toBe(false);
    expect(result.counts.OK).toBe(1);
  });

  test("输出目录在工程内时不会被再次处理", async () => {
    await processProject(root, translations, { outDir });
    const second = await processProject(root, translations, { outDir });

    expect(second.files).toEqual(["game/other.rpy", "game/script.rpy"]);
  });

  test("simple 模式与备份", async () => {
    const result = await processProject(root, translations, { outDir, mode: "simple", backup: true });

    expect(result.applied).toBe(1);
    expect(result.warnings).toBe(0);
    expect(result.writtenFiles).toEqual([path.join(outDir, "game", "script.zh.rpy")]);
    expect(fs.readFileSync(path.join(root, "game", "script.bak.rpy"), "utf8")).toBe(SCRIPT);
    expect(fs.readFileSync(path.join(outDir, "game", "script.zh.rpy"), "utf8")).toBe(
      script("label start:", '    e "你好，世界！"', '    e "Bye"', "init python:", '    x = "Secret"')
    );
  });

  test("TL 模式按源文件生成 strings 脚本", async () => {
    const result = await processProject(root, translations, { outDir, tlMode: true });
    const tlFile = path.join(outDir, "game", "tl", "zh_CN", "game", "script.rpy");

    expect(result.writtenFiles).toEqual([tlFile]);
    expect(fs.readFileSync(tlFile, "utf8")).toBe(
      [
        "translate zh_CN strings:",
        '    old "Hello, world!"',
        '    new "你好，世界！"',
        "",
        '    old "Missing"',
        '    new "缺失"',
        "",
        '    old "Secret"',
        '    new "秘密"',
        "",
      ].join("\n") + "\n"
    );
  });

  test("TL 模式不拆分时写入 strings.rpy", async () => {
    const result = await processProject(root, translations, { outDir, tlMode: true, tlPerFile: false, lang: "ja" });
    expect(result.writtenFiles).toEqual([path.join(outDir, "game", "tl", "ja", "strings.rpy")]);
  });

  test("翻译文件不存在时记录错误并返回", async () => {
    const result = await processProject(root, path.join(root, "missing.jsonl"), { outDir });

    expect(result.errors.map((e) => e.code)).toEqual(["FILE001"]);
    expect(result.files).toEqual([]);
  });

  test("executePatch 汇总错误", async () => {
    const failed = await executePatch(root, path.join(root, "missing.jsonl"), { outDir });
    expect(failed.success).toBe(false);
    expect(failed.friendlyErrorMessage).toContain("错误(FILE001)");

    // 单条翻译的 FAIL / WARN 不影响整体结果
    const ok = await executePatch(root, translations, { outDir });
    expect(ok.success).toBe(true);
    expect(ok.issues).toHaveLength(2);
  });
});

describe("内存回填", () => {
  test("patchText", () => {
    const result = patchText(SCRIPT, [unit("u1", "Bye", "再见")], { file: "game/script.rpy" });

    expect(result.text).toBe(
      script("label start:", '    e "Hello, world!"', '    e "再见"', "init python:", '    x = "Secret"')
    );
    expect(result.report.rows[0]).toMatchObject({ file: "game/script.rpy", status: "OK", methodTag: "S4-unique" });
  });
});
