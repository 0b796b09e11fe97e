import { expect, test, describe } from "vitest";
import { fuzzyScore, similarityRatio, tokenSetRatio } from "../../src/core/fuzzy";

describe("模糊评分", () => {
  test("字符串相似度", () => {
    expect(similarityRatio("abc", "abc")).toBe(100);
    expect(similarityRatio("", "abc")).toBe(0);
    expect(similarityRatio("", "")).toBe(100);
    expect(similarityRatio("kitten", "sitting")).toBeCloseTo(57.14, 2);
  });

  test("词序与重复词不影响词集合评分", () => {
    expect(tokenSetRatio("the cat sat", "sat the cat")).toBe(100);
    expect(tokenSetRatio("go go go", "go")).toBe(100);
  });

  test("一方的词集合包含另一方时为满分", () => {
    expect(tokenSetRatio("open the door", "open the door now")).toBe(100);
  });

  test("只差一个标点的长句得到高分", () => {
    const score = tokenSetRatio(
      "Welcome back to the old house, my friend.",
      "Welcome back to the old house, my friend!"
    );
    expect(score).toBeCloseTo((1 - 1 / 41) * 100, 6);
  });

  test("没有公共词时得分很低", () => {
    expect(tokenSetRatio("hello world", "goodbye moon")).toBeLessThan(60);
  });

  test("空白文本得 0 分", () => {
    expect(tokenSetRatio("   ", "text")).toBe(0);
  });

  test("邻近匹配评分受长度差约束", () => {
    expect(tokenSetRatio("Hello", "Hello there, friend")).toBe(100);
    expect(fuzzyScore("Hello", "Hello there, friend")).toBeCloseTo((5 / 19) * 100, 6);
    expect(fuzzyScore("the cat sat", "sat the cat")).toBeCloseTo(similarityRatio("the cat sat", "sat the cat"), 6);
  });
});
