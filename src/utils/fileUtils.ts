/**
 * 文件操作工具函数
 *
 * @fileoverview 文件操作工具函数集合
 * @version 1.0.0
 * @since 1.0.0
 * @license MIT
 */

import { promises as fs } from 'fs';

/**
 * 确保目录存在
 *
 * 创建目录（包括必要的父目录），目录已存在时不做任何事。
 *
 * @param dirPath - 要确保存在的目录路径
 *
 * @example
 * await ensureDirectoryExists('./exports');
 */
export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) {
      throw error;
    }
  }
}

/**
 * 生成安全的文件名
 *
 * 移除路径分隔符与控制字符，空白替换为下划线。
 *
 * @param name - 原始名称
 * @param extension - 文件扩展名（可选，含点号）
 *
 * @example
 * generateSafeFileName('health report', '.json'); // 'health_report.json'
 */
export function generateSafeFileName(name: string, extension: string = ''): string {
  const safeName = name
    .replace(/[<>:"/\\|?*\u0000-\u001f]/g, ' ')
    .replace(/\s+/g, '_')
    .replace(/^_+|_+$/g, '');

  const maxLength = 255 - extension.length;
  return safeName.substring(0, maxLength) + extension;
}

/**
 * 列出目录中的文件名，目录不存在时返回空列表
 */
export async function listFileNames(dirPath: string): Promise<string[]> {
  try {
    return await fs.readdir(dirPath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}
