/**
 * 输出写入
 * 镜像目录、备份文件与原子写入
 */
import crypto from "crypto";
import fs from "fs";
import path from "path";
import { CONFIG_DEFAULTS } from "../core/config-normalizer";

/**
 * 确保目录存在
 */
function ensureDirectoryExistence(filePath: string): void {
  const dirname = path.dirname(filePath);
  if (fs.existsSync(dirname)) {
    return;
  }
  ensureDirectoryExistence(dirname);
  fs.mkdirSync(dirname);
}

/**
 * 目标路径解析后是否仍位于 base 目录之内
 */
export function isSafePath(baseDir: string, targetPath: string): boolean {
  const relative = path.relative(path.resolve(baseDir), path.resolve(targetPath));
  if (relative === ".." || relative.startsWith(".." + path.sep)) {
    return false;
  }
  return !path.isAbsolute(relative);
}

/**
 * 替换文件的最后一个扩展名
 */
export function withSuffix(filePath: string, suffix: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, parsed.name + suffix);
}

/**
 * 写入文本文件，自动创建父目录
 * atomic 时先写入同目录下的临时文件再重命名
 */
export function writeTextFile(filePath: string, content: string, options: { atomic?: boolean } = {}): void {
  const atomic = options.atomic ?? true;
  ensureDirectoryExistence(filePath);
  if (!atomic) {
    fs.writeFileSync(filePath, content, "utf8");
    return;
  }

  const tmpPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${crypto.randomBytes(4).toString("hex")}.tmp`
  );
  try {
    fs.writeFileSync(tmpPath, content, "utf8");
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    fs.rmSync(tmpPath, { force: true });
    throw error;
  }
}

/**
 * 写出镜像文件 outRoot/rel（扩展名替换为 suffix）
 * 路径越出 outRoot 时不写入并返回 null，否则返回写入的路径
 */
export function safeWriteOutput(
  outRoot: string,
  rel: string,
  content: string,
  suffix: string = CONFIG_DEFAULTS.OUTPUT_SUFFIX
): string | null {
  const outPath = withSuffix(path.join(outRoot, rel), suffix);
  if (!isSafePath(outRoot, outPath)) {
    return null;
  }
  writeTextFile(outPath, content);
  return outPath;
}

/**
 * 在源文件旁写入 .bak.rpy 备份，返回备份路径
 */
export function writeBackup(sourcePath: string, content: string): string {
  const backupPath = withSuffix(sourcePath, CONFIG_DEFAULTS.BACKUP_SUFFIX);
  writeTextFile(backupPath, content);
  return backupPath;
}
