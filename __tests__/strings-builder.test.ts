import { expect, test, describe } from "vitest";
import { buildStringsContent, groupForTl, quoteBlock } from "../src/tl/strings-builder";
import type { TranslationRecord } from "../src/types";

function record(id: string, original: string, translated: string, raw: Record<string, unknown> = {}): TranslationRecord {
  return { id, original, translated, raw };
}

describe("TL strings 脚本", () => {
  test("quoteBlock", () => {
    expect(quoteBlock('say "hi"')).toBe('"say \\"hi\\""');
    expect(quoteBlock("a\\b")).toBe('"a\\\\b"');
    expect(quoteBlock("line1\nline2")).toBe('"""line1\nline2"""');
  });

  test("首次出现的译文优先，冲突加注释，空白原文丢弃", () => {
    const content = buildStringsContent(
      [
        { original: "Hello", translated: "你好", id: "1" },
        { original: "Hello", translated: "您好", id: "2" },
        { original: "Bye", translated: "再见", id: "3" },
        { original: "  ", translated: "空", id: "4" },
        { original: "Hello", translated: "你好", id: "5" },
      ],
      "zh_CN"
    );

    expect(content).toBe(
      [
        "translate zh_CN strings:",
        '    # CONFLICT for old: "Hello" -> ["你好","您好"]',
        '    old "Hello"',
        '    new "你好"',
        "",
        '    old "Bye"',
        '    new "再见"',
        "",
      ].join("\n") + "\n"
    );
  });

  test("没有条目时只有块头", () => {
    expect(buildStringsContent([], "ja")).toBe("translate ja strings:\n");
  });

  describe("groupForTl", () => {
    const records = [
      record("game/script.rpy:2:0", "Hello", "你好"),
      record("h", "Yes", "是", { file: "game/ch1.rpy" }),
      record("x", "Orphan", "孤立"),
    ];

    test("按源文件分组，无法确定文件的条目被忽略", () => {
      const groups = groupForTl(records, true);
      expect([...groups.keys()]).toEqual(["game/ch1.rpy", "game/script.rpy"]);
      expect(groups.get("game/script.rpy")).toEqual([{ original: "Hello", translated: "你好", id: "game/script.rpy:2:0" }]);
    });

    test("不拆分时全部写入 strings.rpy", () => {
      const groups = groupForTl(records, false);
      expect([...groups.keys()]).toEqual(["strings.rpy"]);
      expect(groups.get("strings.rpy")?.map((p) => p.id)).toEqual(["game/script.rpy:2:0", "h"]);
    });
  });
});
