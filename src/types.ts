/**
 * 公共类型定义
 * 字符串字面量、结构区域、翻译单元与回填结果
 */

/**
 * 字面量的引号风格
 */
export type QuoteStyle = "'" | '"' | "'''" | '"""';

/**
 * 源文本中识别出的一个字符串字面量
 * 所有偏移都是针对“当前”文本的半开区间，每次编辑后都需要重新扫描
 */
export interface Token {
  /** 外层起点（含引号） */
  start: number;
  /** 外层终点（含引号） */
  end: number;
  /** 内容起点（不含引号） */
  innerStart: number;
  /** 内容终点（不含引号） */
  innerEnd: number;
  quote: QuoteStyle;
  isTriple: boolean;
  /** 1-based */
  startLine: number;
  /** 1-based */
  endLine: number;
}

/**
 * 结构区域类型
 * - protected-code: python 代码块，禁止回填
 * - label: 对话块（label）
 * - screen: 界面块（screen）
 * - root: 未被任何块覆盖的顶层
 */
export type RegionKind = "protected-code" | "label" | "screen" | "root";

/**
 * 结构区域（1-based 闭区间）
 */
export interface Region {
  kind: Exclude<RegionKind, "root">;
  startLine: number;
  endLine: number;
}

/**
 * 一条待回填的翻译
 */
export interface TranslationUnit {
  id: string;
  /** 源文件相对路径 */
  file?: string;
  /** 原文，三引号字面量时可以跨行 */
  originalText: string;
  translatedText: string;
  lineHint?: number;
  indexHint?: number;
  anchorPrev?: string;
  anchorNext?: string;
}

export type MatchStatus = "OK" | "NOOP" | "WARN" | "FAIL";

/**
 * 单个翻译单元的回填结果，生成后不可修改
 */
export interface MatchOutcome {
  readonly unitId: string;
  readonly file: string;
  readonly status: MatchStatus;
  /** 命中的匹配层级标记，或失败原因标记 */
  readonly methodTag: string;
  readonly regionKind?: RegionKind;
  readonly message: string;
  /** 文件文本是否因此单元发生了变化 */
  readonly applied: boolean;
}

/**
 * 回填模式
 * - advanced: 多级匹配引擎
 * - simple: 按 (行, 序号) 直接替换的兼容模式
 */
export type PatchMode = "advanced" | "simple";

/**
 * 回填配置选项
 */
export interface PatchOptions {
  /**
   * 输出目录（镜像目录树）
   * 默认 "out_patch"
   */
  outDir?: string;

  /**
   * 需要处理的文件 glob 模式（相对于项目根目录）
   * 默认 "**&#47;*.rpy"
   */
  glob?: string;

  /**
   * 需要排除的目录名
   * 默认 ["tl"]
   */
  excludeDirs?: string[];

  /**
   * 回填模式，默认 "advanced"
   */
  mode?: PatchMode;

  /**
   * 只生成报告，不写文件
   */
  dryRun?: boolean;

  /**
   * 写出前为原文件保存 .bak.rpy 备份（仅 simple 模式）
   */
  backup?: boolean;

  /**
   * 输出为官方翻译格式 tl/<lang>/*.rpy，而不是镜像文件
   */
  tlMode?: boolean;

  /**
   * TL 语言目录名，默认 "zh_CN"
   */
  lang?: string;

  /**
   * TL 模式下是否按源文件拆分，默认 true
   */
  tlPerFile?: boolean;

  /**
   * 镜像文件后缀，默认 ".zh.rpy"
   */
  outputSuffix?: string;

  /**
   * TSV 报告路径，默认与翻译文件同名、后缀为 .patch_report.tsv
   */
  reportPath?: string;

  /**
   * 邻近匹配的行窗口，默认 200
   */
  proximityWindow?: number;
}

/**
 * 一条从 JSONL 读取的翻译记录
 */
export interface TranslationRecord {
  id: string;
  original: string;
  translated: string;
  /** 原始 JSON 对象 */
  raw: Record<string, unknown>;
}
