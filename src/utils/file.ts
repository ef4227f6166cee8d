import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';

/**
 * 读取 JSON 文件。
 *
 * @param filePath - 文件路径。
 * @returns 解析后的值，文件不存在时返回 null。
 * @throws 文件内容不是合法 JSON 时抛出错误（错误信息包含文件路径）。
 */
export function readJsonFile<T = unknown>(filePath: string): T | null {
  if (!existsSync(filePath)) {
    return null;
  }
  const raw = readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(raw) as T;
  } catch (err) {
    throw new Error(`Invalid JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * 将值写入 JSON 文件，自动创建目录。
 *
 * @param filePath - 文件路径。
 * @param data - 要写入的值。
 */
export function writeJsonFile(filePath: string, data: unknown): void {
  ensureDir(dirname(filePath));
  writeFileSync(filePath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
}

/**
 * 确保目录存在，不存在则递归创建。
 *
 * @param dirPath - 目录路径。
 */
export function ensureDir(dirPath: string): void {
  mkdirSync(dirPath, { recursive: true });
}
