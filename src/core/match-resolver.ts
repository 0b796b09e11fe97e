/**
 * 多级匹配
 * 在当前文本的字面量中为一条翻译选出唯一、可安全替换的目标
 *
 * 匹配层级（依次尝试，前一级没有唯一结果才进入下一级）：
 *   S1   行号 + 序号精确命中
 *   S2   以行号为中心的窗口内唯一精确匹配
 *   S3   上下文锚点限定区间内精确匹配（多个时取最接近区间中点者）
 *   S3.5 锚点区间内语义签名唯一匹配
 *   S4   全文件唯一精确匹配
 *   S5   按引号类型限定的唯一精确匹配（跳过 python 块）
 *   S6   窗口内模糊匹配，要求高分且与第二名拉开差距
 *
 * S1-S4 选中的字面量若位于 python 块，直接以 protected 结束，不再向下尝试。
 */
import type { QuoteStyle, Region, RegionKind, Token, TranslationUnit } from "../types";
import { CONFIG_DEFAULTS } from "./config-normalizer";
import { fuzzyScore } from "./fuzzy";
import { normalizeNewlines, tokenInnerText } from "./literal-scanner";
import { computeSemanticSignature } from "./placeholder";
import { regionOfToken } from "./region-classifier";

export type MatchResolution =
  | { kind: "match"; token: Token; tier: string; regionKind: RegionKind }
  | { kind: "protected"; tier: string }
  | { kind: "none" };

export interface ResolverOptions {
  /** 邻近窗口（行） */
  proximityWindow?: number;
}

interface ResolverContext {
  text: string;
  tokens: Token[];
  regions: Region[];
  unit: TranslationUnit;
  target: string;
  window: number;
}

type Tier = (ctx: ResolverContext) => MatchResolution | undefined;

const QUOTE_ORDER: ReadonlyArray<QuoteStyle> = ['"""', "'''", '"', "'"];

function innerOf(ctx: ResolverContext, token: Token): string {
  return normalizeNewlines(tokenInnerText(ctx.text, token));
}

function isExact(ctx: ResolverContext, token: Token): boolean {
  return innerOf(ctx, token) === ctx.target;
}

function midLine(token: Token): number {
  return Math.floor((token.startLine + token.endLine) / 2);
}

function nearbyTokens(ctx: ResolverContext, line: number): Token[] {
  return ctx.tokens.filter((t) => Math.abs(midLine(t) - line) <= ctx.window);
}

/**
 * 选中候选：位于 python 块时拒绝
 */
function accept(ctx: ResolverContext, token: Token, tier: string): MatchResolution {
  const regionKind = regionOfToken(token, ctx.regions);
  if (regionKind === "protected-code") {
    return { kind: "protected", tier };
  }
  return { kind: "match", token, tier, regionKind };
}

/**
 * 锚点限定的偏移区间；两个锚点都没找到时返回 undefined
 */
export function anchorInterval(
  text: string,
  anchorPrev?: string,
  anchorNext?: string
): { start: number; end: number } | undefined {
  let start = 0;
  let end = text.length;
  let found = false;
  if (anchorPrev) {
    const i = text.indexOf(anchorPrev);
    if (i !== -1) {
      start = i + anchorPrev.length;
      found = true;
    }
  }
  if (anchorNext) {
    const j = text.indexOf(anchorNext, start);
    if (j !== -1) {
      end = j;
      found = true;
    }
  }
  return found ? { start, end } : undefined;
}

const lineAndIndex: Tier = (ctx) => {
  const { lineHint, indexHint } = ctx.unit;
  if (lineHint === undefined) return undefined;

  const candidates = ctx.tokens.filter((t) => t.startLine <= lineHint && lineHint <= t.endLine);
  if (indexHint !== undefined) {
    const onLine = candidates.filter((t) => t.startLine === lineHint && t.endLine === lineHint);
    const token = indexHint >= 0 ? onLine[indexHint] : undefined;
    if (token && isExact(ctx, token)) {
      return accept(ctx, token, "S1-line-idx");
    }
  }
  const exact = candidates.filter((t) => isExact(ctx, t));
  if (exact.length === 1) {
    return accept(ctx, exact[0], "S1-line-exact");
  }
  return undefined;
};

const proximity: Tier = (ctx) => {
  const { lineHint } = ctx.unit;
  if (lineHint === undefined) return undefined;
  const exact = nearbyTokens(ctx, lineHint).filter((t) => isExact(ctx, t));
  if (exact.length === 1) {
    return accept(ctx, exact[0], "S2-nearby");
  }
  return undefined;
};

const anchored: Tier = (ctx) => {
  const interval = anchorInterval(ctx.text, ctx.unit.anchorPrev, ctx.unit.anchorNext);
  if (!interval) return undefined;

  const inside = ctx.tokens.filter((t) => t.start >= interval.start && t.end <= interval.end);
  const exact = inside.filter((t) => isExact(ctx, t));
  if (exact.length === 1) {
    return accept(ctx, exact[0], "S3-anchors");
  }
  if (exact.length > 1) {
    const mid = Math.floor((interval.start + interval.end) / 2);
    const distanceToMid = (t: Token) => Math.abs(Math.floor((t.innerStart + t.innerEnd) / 2) - mid);
    const closest = exact.reduce((best, t) => (distanceToMid(t) < distanceToMid(best) ? t : best));
    return accept(ctx, closest, "S3-anchors-closest");
  }

  const signature = computeSemanticSignature(ctx.target);
  const sameSignature = inside.filter((t) => computeSemanticSignature(innerOf(ctx, t)) === signature);
  if (sameSignature.length === 1) {
    return accept(ctx, sameSignature[0], "S3.5-semantic");
  }
  return undefined;
};

const uniqueInFile: Tier = (ctx) => {
  const exact = ctx.tokens.filter((t) => isExact(ctx, t));
  if (exact.length === 1) {
    return accept(ctx, exact[0], "S4-unique");
  }
  return undefined;
};

const uniqueByQuote: Tier = (ctx) => {
  for (const quote of QUOTE_ORDER) {
    const candidates: Array<{ token: Token; regionKind: RegionKind }> = [];
    for (const token of ctx.tokens) {
      if (token.quote !== quote || !isExact(ctx, token)) continue;
      const regionKind = regionOfToken(token, ctx.regions);
      if (regionKind !== "protected-code") {
        candidates.push({ token, regionKind });
      }
    }
    if (candidates.length === 1) {
      const [{ token, regionKind }] = candidates;
      return { kind: "match", token, tier: "S5-replace-once", regionKind };
    }
  }
  return undefined;
};

const fuzzyNearby: Tier = (ctx) => {
  const { lineHint } = ctx.unit;
  if (lineHint === undefined) return undefined;

  const scored: Array<{ score: number; token: Token; regionKind: RegionKind }> = [];
  for (const token of nearbyTokens(ctx, lineHint)) {
    const score = fuzzyScore(ctx.target, innerOf(ctx, token));
    if (score < CONFIG_DEFAULTS.FUZZY_MIN_SCORE) continue;
    const regionKind = regionOfToken(token, ctx.regions);
    if (regionKind !== "protected-code") {
      scored.push({ score, token, regionKind });
    }
  }
  if (scored.length === 0) return undefined;

  scored.sort((a, b) => b.score - a.score || a.token.innerStart - b.token.innerStart);
  const [top, runnerUp] = scored;
  // 同分或分差过小时宁可失败也不猜
  if (runnerUp && top.score - runnerUp.score < CONFIG_DEFAULTS.FUZZY_MIN_MARGIN) {
    return undefined;
  }
  return {
    kind: "match",
    token: top.token,
    tier: `S6-fuzzy-nearby(${Math.round(top.score)})`,
    regionKind: top.regionKind,
  };
};

const TIERS: ReadonlyArray<Tier> = [
  lineAndIndex,
  proximity,
  anchored,
  uniqueInFile,
  uniqueByQuote,
  fuzzyNearby,
];

/**
 * 为翻译单元选出唯一的替换目标
 * tokens / regions 必须来自当前 text 的最新扫描结果
 */
export function resolveMatch(
  text: string,
  tokens: Token[],
  regions: Region[],
  unit: TranslationUnit,
  options: ResolverOptions = {}
): MatchResolution {
  const ctx: ResolverContext = {
    text,
    tokens,
    regions,
    unit,
    target: normalizeNewlines(unit.originalText),
    window: options.proximityWindow ?? CONFIG_DEFAULTS.PROXIMITY_WINDOW,
  };
  for (const tier of TIERS) {
    const resolution = tier(ctx);
    if (resolution) {
      return resolution;
    }
  }
  return { kind: "none" };
}
