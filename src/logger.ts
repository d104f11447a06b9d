/**
 * 日志记录系统
 *
 * 全局结构化日志入口。日志级别、格式与文件输出从环境变量读取，
 * 巡检入口在加载配置后可再次调整。
 *
 * @fileoverview 全局日志实例
 * @version 1.0.0
 * @since 1.0.0
 * @license MIT
 */

import { StructuredLogger, LogLevel, LogConfig, isLogLevel } from './logging/structuredLogger.js';
import { StringConstants } from './constants.js';

/**
 * 从环境变量读取日志配置
 *
 * @param {NodeJS.ProcessEnv} env - 环境变量
 * @returns {Partial<LogConfig>} 日志配置
 */
export function logConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<LogConfig> {
  const config: Partial<LogConfig> = {};

  const level = env[StringConstants.ENV_LOG_LEVEL]?.toLowerCase();
  if (level && isLogLevel(level)) {
    config.level = level;
  }

  const format = env[StringConstants.ENV_LOG_FORMAT]?.toLowerCase();
  if (format === 'json' || format === 'text' || format === 'pretty') {
    config.format = format;
  }

  const filePath = env[StringConstants.ENV_LOG_FILE];
  if (filePath) {
    config.filePath = filePath;
    config.output = 'both';
  }

  return config;
}

/**
 * 全局结构化日志记录器实例
 *
 * @example
 * logger.info('巡检开始', 'HealthMonitor', { level: 'advanced' });
 * logger.error('采集失败', 'CollectorSet', new Error('timeout'));
 *
 * const collectorLogger = logger.child('InnoDBCollector');
 * collectorLogger.debug('读取缓冲池状态');
 */
export const logger: StructuredLogger = StructuredLogger.getInstance(logConfigFromEnv());

export { StructuredLogger, LogLevel };
export type { LogConfig };
