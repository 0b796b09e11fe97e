#!/usr/bin/env node

import { Command } from 'commander';
import path from 'path';
import { executePatch } from './processFiles';
import { ConfigDetector } from './config/config-detector';
import { logError } from './core/error-handler';
import { PatchOptions } from './types';

export interface CliOptions {
  outDir?: string;
  glob?: string;
  excludeDirs?: string;
  simple?: boolean;
  dryRun?: boolean;
  backup?: boolean;
  tlMode?: boolean;
  lang?: string;
  tlPerFile: boolean;
  report?: string;
  suffix?: string;
  window?: string;
}

/**
 * 命令行参数转换为回填配置
 */
export function toPatchOptions(cmdOptions: CliOptions): PatchOptions {
  return {
    outDir: cmdOptions.outDir ? path.resolve(cmdOptions.outDir) : undefined,
    glob: cmdOptions.glob,
    excludeDirs: cmdOptions.excludeDirs?.split(','),
    mode: cmdOptions.simple ? 'simple' : 'advanced',
    dryRun: cmdOptions.dryRun,
    backup: cmdOptions.backup,
    tlMode: cmdOptions.tlMode,
    lang: cmdOptions.lang,
    // --no-tl-per-file 总会产生一个值，只在 TL 模式下传递
    tlPerFile: cmdOptions.tlMode ? cmdOptions.tlPerFile : undefined,
    reportPath: cmdOptions.report ? path.resolve(cmdOptions.report) : undefined,
    outputSuffix: cmdOptions.suffix,
    proximityWindow: cmdOptions.window !== undefined ? Number(cmdOptions.window) : undefined,
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('script-patch')
    .description('把翻译结果回填到 Ren\'Py 脚本 (.rpy) 的字符串字面量中')
    .version('1.0.0')
    .argument('<projectRoot>', '脚本工程根目录')
    .argument('<translations>', '翻译结果 JSONL 文件')
    .option('-o, --out-dir <dir>', '输出目录', 'out_patch')
    .option('-g, --glob <pattern>', '要处理的文件 glob 模式', '**/*.rpy')
    .option('--exclude-dirs <dirs>', '逗号分隔的排除目录名', 'tl')
    .option('--simple', '使用按 (行, 序号) 直接替换的兼容模式')
    .option('--dry-run', '只生成报告，不写出文件')
    .option('--backup', '写出前保存 .bak.rpy 备份 (simple 模式)')
    .option('--tl-mode', '输出为 tl/<lang>/ 下的 translate strings 脚本')
    .option('--lang <lang>', 'TL 语言目录名 (默认: zh_CN)')
    .option('--no-tl-per-file', 'TL 模式下输出单一 strings.rpy')
    .option('--report <path>', 'TSV 报告路径 (默认: <translations>.patch_report.tsv)')
    .option('--suffix <suffix>', '镜像文件后缀 (默认: .zh.rpy)')
    .option('--window <lines>', '邻近匹配的行窗口 (默认: 200)')
    .action(async (projectRoot: string, translations: string, cmdOptions: CliOptions) => {
      const options = toPatchOptions(cmdOptions);

      const validation = ConfigDetector.validateConfig(options);
      validation.warnings.forEach((w) => console.warn(`警告: ${w}`));
      if (!validation.valid) {
        ConfigDetector.toPatchErrors(validation).forEach(logError);
        process.exit(1);
      }

      console.log(`处理工程: ${path.resolve(projectRoot)}`);
      const result = await executePatch(projectRoot, path.resolve(translations), options);

      const { OK, NOOP, WARN, FAIL } = result.counts;
      if (options.mode === 'simple' || options.tlMode) {
        console.log(`写出了 ${result.writtenFiles.length} 个文件`);
      } else {
        console.log(`写出了 ${result.writtenFiles.length} 个文件: OK=${OK} NOOP=${NOOP} WARN=${WARN} FAIL=${FAIL}`);
      }

      if (!result.success) {
        console.error(result.friendlyErrorMessage);
        process.exit(1);
      }
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync()
    .catch((error: unknown) => {
      console.error('处理文件时出错:', error);
      process.exit(1);
    });
}
