/**
 * 轻量模糊评分（0-100），基于 Levenshtein 距离
 */
import { distance } from "fastest-levenshtein";

/**
 * 两个字符串的相似度，100 表示完全相同
 */
export function similarityRatio(a: string, b: string): number {
  if (a === b) return 100;
  const maxLength = Math.max(a.length, b.length);
  if (a.length === 0 || b.length === 0) return 0;
  return (1 - distance(a, b) / maxLength) * 100;
}

function tokenize(s: string): Set<string> {
  return new Set(s.split(/\s+/).filter((w) => w !== ""));
}

/**
 * 词集合相似度
 * 取公共词集合与各自差集拼接后的最高相似度，对词序与重复词不敏感
 */
export function tokenSetRatio(a: string, b: string): number {
  const tokensA = tokenize(a);
  const tokensB = tokenize(b);
  if (tokensA.size === 0 || tokensB.size === 0) return 0;

  const intersection = [...tokensA].filter((w) => tokensB.has(w)).sort();
  const diffAB = [...tokensA].filter((w) => !tokensB.has(w)).sort();
  const diffBA = [...tokensB].filter((w) => !tokensA.has(w)).sort();

  if (intersection.length > 0 && (diffAB.length === 0 || diffBA.length === 0)) {
    return 100;
  }

  const sect = intersection.join(" ");
  const diffABJoined = diffAB.join(" ");
  const diffBAJoined = diffBA.join(" ");
  let best = similarityRatio(diffABJoined, diffBAJoined);
  if (sect !== "") {
    best = Math.max(
      best,
      similarityRatio(sect, `${sect} ${diffABJoined}`),
      similarityRatio(sect, `${sect} ${diffBAJoined}`),
      similarityRatio(`${sect} ${diffABJoined}`, `${sect} ${diffBAJoined}`)
    );
  }
  return best;
}

/**
 * 邻近模糊匹配使用的评分：词集合与整串相似度取较低者
 * 词集合包含关系会给出满分，需要整串相似度约束长度差
 */
export function fuzzyScore(a: string, b: string): number {
  return Math.min(tokenSetRatio(a, b), similarityRatio(a, b));
}
