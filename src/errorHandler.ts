/**
 * 错误处理工具
 *
 * 把任意抛出值转换为分类后的 MonitorError，并在消息中掩码凭据。
 *
 * @fileoverview 错误处理与敏感信息掩码
 * @version 1.0.0
 * @since 1.0.0
 * @license MIT
 */

import { MonitorError, ErrorCategory } from './types.js';
import { MySQLErrorClassifier } from './errors/errorClassifier.js';

/**
 * 消息中需要掩码的凭据模式
 */
const SENSITIVE_PATTERNS: ReadonlyArray<[RegExp, string]> = [
  [/(password|passwd|pwd)\s*[=:]\s*("[^"]*"|'[^']*'|\S+)/gi, '$1=***'],
  [/(api[_-]?key|token|secret)\s*[=:]\s*("[^"]*"|'[^']*'|\S+)/gi, '$1=***'],
  [/(x-api-key|authorization)\s*:\s*\S+/gi, '$1: ***'],
  [/(mysql:\/\/[^:@/\s]+):[^@\s]+@/gi, '$1:***@']
];

/**
 * 错误处理器工具类
 */
export class ErrorHandler {
  /**
   * 安全错误转换
   *
   * @public
   * @static
   * @param {unknown} error - 原始错误
   * @param {string} [context] - 上下文，会附加到消息末尾
   * @param {boolean} [maskSensitive=true] - 是否掩码敏感信息
   * @returns {MonitorError} 分类后的错误
   *
   * @example
   * const safeError = ErrorHandler.safeError(error, 'InnoDBCollector');
   */
  public static safeError(
    error: unknown,
    context?: string,
    maskSensitive: boolean = true
  ): MonitorError {
    const classified = MySQLErrorClassifier.classifyError(error, context);

    if (maskSensitive) {
      classified.message = this.maskSensitiveInfo(classified.message);
    }

    return classified;
  }

  /**
   * 掩码敏感信息
   *
   * @public
   * @static
   * @param {string} message - 原始消息
   * @returns {string} 掩码后的消息
   */
  public static maskSensitiveInfo(message: string): string {
    return SENSITIVE_PATTERNS.reduce(
      (masked, [pattern, replacement]) => masked.replace(pattern, replacement),
      message
    );
  }

  /**
   * 判断错误是否可恢复
   */
  public static isRecoverableError(error: unknown): boolean {
    return MySQLErrorClassifier.classifyError(error).recoverable;
  }

  /**
   * 获取错误类别
   */
  public static categoryOf(error: unknown): ErrorCategory {
    return MySQLErrorClassifier.categorize(error);
  }

  /**
   * 提取错误消息，供日志与报告使用
   */
  public static messageOf(error: unknown): string {
    if (error instanceof Error) {
      return this.maskSensitiveInfo(error.message);
    }
    return this.maskSensitiveInfo(String(error));
  }
}
