/**
 * 占位符检测与语义签名
 */
import crypto from "crypto";

// 单次指令（不成对）
export const SINGLE_TEXT_TAGS: ReadonlySet<string> = new Set(["w", "nw", "p", "fast", "k"]);
// 成对标签
export const PAIRED_TEXT_TAGS: ReadonlySet<string> = new Set([
  "i",
  "b",
  "u",
  "color",
  "a",
  "size",
  "font",
  "alpha",
]);

// [name]
const PH_SQUARE = /\[[A-Za-z_][A-Za-z0-9_]*\]/g;
// %s / %02d / %(name)s / %.2f
const PH_PERCENT = /%(?:\([^)]+\))?[+#0\- ]?\d*(?:\.\d+)?[sdifeEfgGxXo]/g;
// {0} / {0:.2f} / {0!r:>8}
const PH_BRACE_INDEX = /\{\d+(?:![rsa])?(?::[^{}]+)?\}/g;
// {name} / {name!r:>8}
const PH_BRACE_NAME = /\{([A-Za-z_][A-Za-z0-9_]*)(?:![rsa])?(?::[^{}]+)?\}/g;

/**
 * 是否处于 {{...}} 转义中
 */
function isEscapedBrace(s: string, start: number, end: number): boolean {
  return (start > 0 && s[start - 1] === "{") || (end < s.length && s[end] === "}");
}

function* iterPlaceholders(s: string): Generator<string> {
  for (const re of [PH_SQUARE, PH_PERCENT, PH_BRACE_INDEX, PH_BRACE_NAME]) {
    for (const m of s.matchAll(re)) {
      const start = m.index ?? 0;
      const end = start + m[0].length;
      if (m[0].startsWith("{") && isEscapedBrace(s, start, end)) {
        continue;
      }
      // 文本标签 {i} {w} 不算占位符
      const name = re === PH_BRACE_NAME ? m[1] : undefined;
      if (name !== undefined && (SINGLE_TEXT_TAGS.has(name) || PAIRED_TEXT_TAGS.has(name))) {
        continue;
      }
      yield m[0];
    }
  }
}

/**
 * 文本中出现的占位符集合
 */
export function placeholderSet(s: string): Set<string> {
  return new Set(iterPlaceholders(s));
}

/**
 * 比较原文与译文的占位符集合
 * 一致时返回 null，否则返回形如 "[a, b] vs [a]" 的说明
 */
export function placeholderMismatch(original: string, translated: string): string | null {
  const a = [...placeholderSet(original)].sort();
  const b = [...placeholderSet(translated)].sort();
  if (a.length === b.length && a.every((ph, i) => ph === b[i])) {
    return null;
  }
  return `[${a.join(", ")}] vs [${b.join(", ")}]`;
}

const TAG_OPEN = /^\{([A-Za-z_][A-Za-z0-9_]*)(?:=[^}]*)?\}/;
const TAG_CLOSE = /^\{\/([A-Za-z_][A-Za-z0-9_]*)\}/;

/**
 * 去除文本标签，保留文字与占位符
 */
export function stripTextTags(s: string): string {
  let out = "";
  let i = 0;
  while (i < s.length) {
    const ch = s[i];
    if (ch === "{") {
      if (s[i + 1] === "{") {
        out += "{";
        i += 2;
        continue;
      }
      const rest = s.slice(i);
      const open = TAG_OPEN.exec(rest);
      if (open && (SINGLE_TEXT_TAGS.has(open[1]) || PAIRED_TEXT_TAGS.has(open[1]))) {
        i += open[0].length;
        continue;
      }
      const close = TAG_CLOSE.exec(rest);
      if (close && PAIRED_TEXT_TAGS.has(close[1])) {
        i += close[0].length;
        continue;
      }
    }
    out += ch;
    i++;
  }
  return out;
}

export function normalizeForSignature(s: string): string {
  return stripTextTags(s).replace(/\s+/g, " ").trim().toLowerCase();
}

/**
 * 语义签名：去标签、折叠空白、忽略大小写后取 SHA-1 前 12 位
 */
export function computeSemanticSignature(s: string): string {
  const hash = crypto.createHash("sha1").update(normalizeForSignature(s), "utf8").digest("hex");
  return `sig:v2:${hash.slice(0, 12)}`;
}
