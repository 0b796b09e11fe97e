import { expect, test, describe } from "vitest";
import { detectRegions, indentWidth, regionOfLine, regionOfToken } from "../../src/core/region-classifier";
import { scanStringLiterals } from "../../src/core/literal-scanner";
import { script } from "../test-helpers";

describe("结构区域识别", () => {
  const text = script(
    "label start:",
    '    e "Hi"',
    "    python:",
    '        x = "code"',
    '    e "Bye"',
    "",
    "screen main():",
    '    text "Menu"'
  );

  test("按缩进推断 python / label / screen 块的行范围", () => {
    expect(detectRegions(text)).toEqual([
      { kind: "protected-code", startLine: 3, endLine: 4 },
      { kind: "label", startLine: 1, endLine: 6 },
      { kind: "screen", startLine: 7, endLine: 8 },
    ]);
  });

  test("python 块优先于外层 label", () => {
    const regions = detectRegions(text);
    expect(regionOfLine(2, regions)).toBe("label");
    expect(regionOfLine(4, regions)).toBe("protected-code");
    expect(regionOfLine(5, regions)).toBe("label");
    expect(regionOfLine(8, regions)).toBe("screen");
    expect(regionOfLine(9, regions)).toBe("root");
  });

  test("\\r 与 \\r\\n 换行同样分行", () => {
    const crText = ["init python:", '    x = "Secret"', "label start:", '    e "Other"'].join("\r");
    expect(detectRegions(crText)).toEqual([
      { kind: "protected-code", startLine: 1, endLine: 2 },
      { kind: "label", startLine: 3, endLine: 4 },
    ]);
    expect(detectRegions(crText.replace(/\r/g, "\r\n"))).toEqual(detectRegions(crText));
    expect(scanStringLiterals(crText).map((t) => t.startLine)).toEqual([2, 4]);
  });

  test("字面量按起始行归属区域", () => {
    const regions = detectRegions(text);
    const kinds = scanStringLiterals(text).map((t) => regionOfToken(t, regions));
    expect(kinds).toEqual(["label", "protected-code", "label", "screen"]);
  });

  test("空行与注释行不会结束区域", () => {
    const regions = detectRegions(
      script("label a:", '    e "x"', "# comment", "", '    e "y"', 'e "z"')
    );
    expect(regions).toEqual([{ kind: "label", startLine: 1, endLine: 5 }]);
    expect(regionOfLine(6, regions)).toBe("root");
  });

  test("识别 init python / python early / 带参数的 label", () => {
    const openers = ["init python:", "init -1 python:", "python early:", "init python in store:", "label ch1(a, b):"];
    for (const opener of openers) {
      const [region] = detectRegions(script(opener, "    pass"));
      expect(region).toMatchObject({ startLine: 1, endLine: 2 });
    }
    expect(detectRegions(script("init -1 python:", "    pass"))[0].kind).toBe("protected-code");
    expect(detectRegions(script("label ch1(a, b):", "    pass"))[0].kind).toBe("label");
  });

  test("不是块起始的行不产生区域", () => {
    expect(detectRegions(script('$ python_var = "x"', 'e "label start:"'))).toEqual([]);
  });

  test("文件末尾的块延伸到最后一行", () => {
    const regions = detectRegions(script("init python:", '    a = "1"', '    b = "2"'));
    expect(regions).toEqual([{ kind: "protected-code", startLine: 1, endLine: 3 }]);
  });

  describe("制表符缩进（已知局限）", () => {
    test("制表符与空格都按 1 个宽度计", () => {
      expect(indentWidth("\t\tx")).toBe(2);
      expect(indentWidth("  \tx")).toBe(3);
      expect(indentWidth("x")).toBe(0);
    });

    test("两个制表符的 python 块会吞掉后面缩进三个空格的行", () => {
      const regions = detectRegions(
        script("label t:", "\t\tpython:", '\t\t\tx = "a"', '   e "b"', 'e "c"')
      );
      // 视觉上第 4 行不在 python 块内，但按字符数计算缩进为 3 > 2
      expect(regionOfLine(4, regions)).toBe("protected-code");
      expect(regionOfLine(5, regions)).toBe("root");
    });
  });
});
