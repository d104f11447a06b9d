/**
 * 结构化日志记录器
 *
 * 提供多格式的结构化日志记录，支持异步文件写入、
 * 敏感字段过滤和日志回调。
 *
 * @fileoverview 结构化日志记录器实现
 * @since 1.0.0
 */

import { promises as fs } from 'fs';
import {
  MonitorError,
  ErrorCategory,
  ErrorSeverity
} from '../types.js';

/**
 * 日志级别枚举
 */
export enum LogLevel {
  /** 调试信息（最详细） */
  DEBUG = 'debug',
  /** 一般信息 */
  INFO = 'info',
  /** 警告信息 */
  WARN = 'warn',
  /** 错误信息 */
  ERROR = 'error',
  /** 致命错误（最严重） */
  FATAL = 'fatal'
}

/**
 * 日志配置接口
 */
export interface LogConfig {
  /** 日志级别 */
  level: LogLevel;
  /** 日志格式 */
  format: 'json' | 'text' | 'pretty';
  /** 输出目标 */
  output: 'console' | 'file' | 'both' | 'none';
  /** 日志文件路径 */
  filePath?: string;
  /** 是否显示时间戳 */
  enableTimestamp: boolean;
  /** 是否启用颜色 */
  enableColors: boolean;
  /** 敏感字段列表（会被过滤，大小写不敏感） */
  sensitiveFields: string[];
}

/**
 * 日志条目接口
 */
export interface LogEntry {
  /** 日志时间戳 */
  timestamp: Date;
  /** 日志级别 */
  level: LogLevel;
  /** 日志消息内容 */
  message: string;
  /** 日志分类 */
  category: string;
  /** 额外的元数据 */
  metadata?: Record<string, unknown>;
  /** 错误对象 */
  error?: MonitorError;
  /** 巡检运行ID（用于跟踪一次巡检） */
  runId?: string;
}

/**
 * 日志回调函数类型
 */
export type LogCallback = (entry: LogEntry) => void;

/**
 * 颜色代码
 */
const COLORS = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
};

/**
 * 日志级别颜色映射
 */
const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: COLORS.blue,
  [LogLevel.INFO]: COLORS.green,
  [LogLevel.WARN]: COLORS.yellow,
  [LogLevel.ERROR]: COLORS.red,
  [LogLevel.FATAL]: COLORS.bright + COLORS.red
};

/**
 * 日志级别权重（用于过滤）
 */
const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.FATAL]: 50
};

/**
 * 判断字符串是否为合法日志级别
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

/**
 * 结构化日志记录器
 *
 * 控制台输出写入 stderr，stdout 留给渲染后的报告。
 *
 * @class StructuredLogger
 * @since 1.0.0
 */
export class StructuredLogger {
  private config: LogConfig;
  private callbacks: Set<LogCallback> = new Set();
  private boundCategory?: string;
  private currentRunId?: string;
  private writeQueue: Promise<void> = Promise.resolve();

  /**
   * 默认配置
   */
  private static readonly DEFAULT_CONFIG: LogConfig = {
    level: LogLevel.INFO,
    format: 'pretty',
    output: 'console',
    enableTimestamp: true,
    enableColors: true,
    sensitiveFields: ['password', 'apikey', 'api_key', 'token', 'secret', 'authorization']
  };

  /**
   * 全局实例
   */
  private static instance?: StructuredLogger;

  /**
   * 获取全局日志实例
   *
   * @public
   * @static
   * @param {Partial<LogConfig>} [config] - 日志配置
   * @returns {StructuredLogger} 日志实例
   */
  public static getInstance(config?: Partial<LogConfig>): StructuredLogger {
    if (!StructuredLogger.instance) {
      StructuredLogger.instance = new StructuredLogger(config);
    } else if (config) {
      StructuredLogger.instance.updateConfig(config);
    }
    return StructuredLogger.instance;
  }

  constructor(config?: Partial<LogConfig>) {
    this.config = { ...StructuredLogger.DEFAULT_CONFIG, ...config };
  }

  /**
   * 更新配置
   */
  public updateConfig(config: Partial<LogConfig>): void {
    this.config = { ...this.config, ...config };
  }

  public addCallback(callback: LogCallback): void {
    this.callbacks.add(callback);
  }

  /**
   * 设置当前巡检运行ID，之后的日志条目都会带上它
   */
  public setRunId(runId: string | undefined): void {
    this.currentRunId = runId;
  }

  public debug(message: string, category?: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, category, metadata);
  }

  public info(message: string, category?: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, category, metadata);
  }

  public warn(message: string, category?: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, category, metadata);
  }

  public error(message: string, category?: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, category, metadata, error);
  }

  public fatal(message: string, category?: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, message, category, metadata, error);
  }

  /**
   * 记录结构化日志
   *
   * @public
   * @param {LogLevel} level - 日志级别
   * @param {string} message - 日志消息
   * @param {string} [category] - 日志分类，子记录器会忽略该参数
   * @param {Record<string, unknown>} [metadata] - 元数据
   * @param {Error} [error] - 错误对象
   */
  public log(
    level: LogLevel,
    message: string,
    category?: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    if (LEVEL_WEIGHTS[level] < LEVEL_WEIGHTS[this.config.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      category: this.boundCategory ?? category ?? 'default',
      message,
      metadata: this.maskSensitiveFields(metadata),
      runId: this.currentRunId
    };

    if (error) {
      entry.error = error instanceof MonitorError ? error : new MonitorError(
        error.message,
        ErrorCategory.UNKNOWN,
        ErrorSeverity.MEDIUM,
        error
      );
    }

    this.outputLog(this.formatLogEntry(entry));
    this.invokeCallbacks(entry);
  }

  /**
   * 创建子日志记录器
   *
   * 子记录器共享配置快照与回调集合，并固定使用给定分类。
   *
   * @public
   * @param {string} category - 日志分类
   * @returns {StructuredLogger} 子日志记录器
   */
  public child(category: string): StructuredLogger {
    const childLogger = new StructuredLogger(this.config);
    childLogger.callbacks = this.callbacks;
    childLogger.boundCategory = category;
    childLogger.currentRunId = this.currentRunId;
    return childLogger;
  }

  /**
   * 等待所有挂起的文件写入完成
   */
  public flush(): Promise<void> {
    return this.writeQueue;
  }

  private formatLogEntry(entry: LogEntry): string {
    switch (this.config.format) {
      case 'json':
        return this.formatJson(entry);
      case 'text':
        return this.formatText(entry);
      default:
        return this.formatPretty(entry);
    }
  }

  private formatJson(entry: LogEntry): string {
    const jsonEntry = {
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      category: entry.category,
      message: entry.message,
      ...entry.metadata && { metadata: entry.metadata },
      ...entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          category: entry.error.category,
          severity: entry.error.severity,
          code: entry.error.code
        }
      },
      ...entry.runId && { runId: entry.runId }
    };

    return JSON.stringify(jsonEntry);
  }

  private formatText(entry: LogEntry): string {
    const timestamp = this.config.enableTimestamp ? `[${entry.timestamp.toISOString()}] ` : '';
    const level = `[${entry.level.toUpperCase()}] `;
    const category = `[${entry.category}] `;
    const run = entry.runId ? ` (run:${entry.runId})` : '';
    const error = entry.error ? ` Error: ${entry.error.message}` : '';

    let result = `${timestamp}${level}${category}${entry.message}${error}${run}`;

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      result += ` ${JSON.stringify(entry.metadata)}`;
    }

    return result;
  }

  private formatPretty(entry: LogEntry): string {
    const timestamp = this.config.enableTimestamp
      ? `${COLORS.dim}[${entry.timestamp.toISOString()}]${COLORS.reset} `
      : '';

    const level = this.config.enableColors
      ? `${LEVEL_COLORS[entry.level]}[${entry.level.toUpperCase()}]${COLORS.reset} `
      : `[${entry.level.toUpperCase()}] `;

    const category = `${COLORS.cyan}[${entry.category}]${COLORS.reset} `;
    const run = entry.runId ? `${COLORS.dim} (run:${entry.runId})${COLORS.reset}` : '';
    const error = entry.error
      ? `${COLORS.red} Error: ${entry.error.message}${COLORS.reset}`
      : '';

    let message = `${timestamp}${level}${category}${entry.message}${error}${run}`;

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      message += ` ${COLORS.dim}${JSON.stringify(entry.metadata)}${COLORS.reset}`;
    }

    return message;
  }

  private outputLog(formattedLog: string): void {
    switch (this.config.output) {
      case 'console':
        process.stderr.write(formattedLog + '\n');
        break;
      case 'file':
        this.writeToFile(formattedLog);
        break;
      case 'both':
        process.stderr.write(formattedLog + '\n');
        this.writeToFile(formattedLog);
        break;
      case 'none':
        break;
    }
  }

  /**
   * 追加写入日志文件，写入按顺序排队
   */
  private writeToFile(log: string): void {
    const filePath = this.config.filePath;
    if (!filePath) {
      return;
    }

    this.writeQueue = this.writeQueue
      .then(() => fs.appendFile(filePath, log + '\n'))
      .catch((error: unknown) => {
        // 文件写入失败时回退到 stderr
        process.stderr.write(`Failed to write to log file: ${String(error)}\n${log}\n`);
      });
  }

  private invokeCallbacks(entry: LogEntry): void {
    this.callbacks.forEach(callback => {
      try {
        callback(entry);
      } catch (error) {
        process.stderr.write(`Error in log callback: ${String(error)}\n`);
      }
    });
  }

  /**
   * 掩码敏感字段（递归处理嵌套对象）
   */
  private maskSensitiveFields(metadata?: Record<string, unknown>): Record<string, unknown> | undefined {
    if (!metadata) {
      return metadata;
    }

    const sensitive = new Set(this.config.sensitiveFields.map(field => field.toLowerCase()));
    const masked: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(metadata)) {
      if (sensitive.has(key.toLowerCase())) {
        masked[key] = '***';
      } else if (isPlainRecord(value)) {
        masked[key] = this.maskSensitiveFields(value);
      } else {
        masked[key] = value;
      }
    }

    return masked;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}
